import { setTimeout as sleep } from "timers/promises";
import { packageArtifact, type ExportArtifact } from "./artifact.js";
import type { CacheStore } from "./cache-store.js";
import { errorMessage } from "./errors.js";
import type { ExportRun, ExportStateStore } from "./export-state.js";
import { pageFingerprint } from "./fingerprint.js";
import { companyPageSchema } from "./schemas.js";
import type { CompanyDataSource, CompanyRecord, SearchFilters } from "./types.js";

export interface ExportOptions {
  filters: SearchFilters;
  pageSize: number;
  /** Freshness demanded of cached pages. */
  cacheTtlSeconds: number;
  /** Pause between page fetches. */
  pageDelayMs: number;
  /** Highest page the provider will serve for one query. */
  maxPages: number;
}

export interface ExportRequest {
  startPage?: number;
  resume?: boolean;
}

export interface ExportResult {
  run_id: string;
  status: "completed" | "failed";
  reason: string;
  artifact: ExportArtifact;
  last_successful_page: number;
}

/**
 * Drives a multi-page export. Pages are fetched one at a time in ascending
 * order; Export State is checkpointed after every page so a failed run can
 * be resumed at the page after the last success.
 */
export class ExportOrchestrator {
  private activeRunId: string | null = null;
  private stopRequested = false;

  constructor(
    private readonly state: ExportStateStore,
    private readonly cache: CacheStore,
    private readonly source: CompanyDataSource,
    private readonly options: ExportOptions,
  ) {}

  isRunning(): boolean {
    return this.activeRunId !== null;
  }

  /** Ask the running export to halt at the next page boundary. */
  requestStop(): boolean {
    if (!this.activeRunId) return false;
    this.stopRequested = true;
    return true;
  }

  async runExport(request: ExportRequest = {}): Promise<ExportResult> {
    let run = request.resume ? await this.state.resume() : await this.state.start(request.startPage ?? 1);
    this.activeRunId = run.run_id;
    this.stopRequested = false;

    const { filters, pageSize, cacheTtlSeconds, pageDelayMs, maxPages } = this.options;
    const companies: CompanyRecord[] = [];
    const firstPage = run.start_page;
    let lastPage: number | null = null;
    let page = run.start_page;
    let outcome: { status: "completed" | "failed"; reason: string };

    console.log(`Starting export ${run.run_id} from page ${page}`);

    try {
      for (;;) {
        if (this.stopRequested) {
          outcome = { status: "failed", reason: `Stopped by operator before page ${page}` };
          break;
        }
        if (page > maxPages) {
          outcome = { status: "completed", reason: `Page limit reached (${maxPages} pages)` };
          break;
        }

        let items: CompanyRecord[];
        try {
          const result = await this.cache.getOrFetch(
            pageFingerprint(filters, page, pageSize),
            () => this.source.fetchPage(filters, page, pageSize),
            { ttlSeconds: cacheTtlSeconds, schema: companyPageSchema },
          );
          items = result.companies;
        } catch (error) {
          console.error(`Error on page ${page}:`, error);
          outcome = { status: "failed", reason: `Error on page ${page}: ${errorMessage(error)}` };
          break;
        }

        if (items.length === 0) {
          outcome = { status: "completed", reason: "No more results" };
          break;
        }

        companies.push(...items);
        run = await this.state.recordPageSuccess(run, page, items.length);
        lastPage = page;
        console.log(`Fetched page ${page}, got ${items.length} companies. Total: ${companies.length}`);

        if (items.length < pageSize) {
          outcome = { status: "completed", reason: "All results retrieved" };
          break;
        }

        page++;
        if (pageDelayMs > 0) await sleep(pageDelayMs);
      }

      run = await this.finish(run, outcome);
    } catch (error) {
      // Checkpoint writes failed; leave the run resumable rather than stuck processing.
      console.error(`Export ${run.run_id} aborted:`, error);
      try {
        await this.state.recordFailure(run, `Export aborted: ${errorMessage(error)}`);
      } catch (recordError) {
        console.error(`Could not record failure for export ${run.run_id}:`, recordError);
      }
      throw error;
    } finally {
      this.activeRunId = null;
      this.stopRequested = false;
    }

    console.log(`Export ${run.run_id} ${outcome.status}: ${outcome.reason} (${companies.length} companies)`);

    return {
      run_id: run.run_id,
      status: outcome.status,
      reason: outcome.reason,
      artifact: packageArtifact(companies, lastPage === null ? null : firstPage, lastPage),
      last_successful_page: run.last_successful_page,
    };
  }

  private async finish(run: ExportRun, outcome: { status: "completed" | "failed"; reason: string }): Promise<ExportRun> {
    return outcome.status === "completed"
      ? this.state.recordCompletion(run, outcome.reason)
      : this.state.recordFailure(run, outcome.reason);
  }
}
