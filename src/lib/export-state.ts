import { randomUUID } from "crypto";
import { z } from "zod";
import { ConflictError, ValidationError } from "./errors.js";
import type { KeyValueStore } from "./store.js";

/* ── Key helpers ── */
const K = {
  state: () => "export:state",
  lock: () => "export:lock",
  archive: (runId: string) => `export:archive:${runId}`,
  archiveIdx: () => "export:archive:",
};

export type ExportStatus = "idle" | "processing" | "completed" | "failed";

export interface ExportRun {
  run_id: string;
  status: ExportStatus;
  start_page: number;
  /** Page the loop is on, or will fetch next. */
  current_page: number;
  last_successful_page: number;
  total_companies: number;
  reason: string | null;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
}

export interface ExportSnapshot {
  run_id: string | null;
  status: ExportStatus;
  current_page: number;
  last_successful_page: number;
  total_companies: number;
  can_resume: boolean;
  reason: string | null;
  updated_at: string | null;
}

const runSchema: z.ZodType<ExportRun> = z.object({
  run_id: z.string(),
  status: z.enum(["idle", "processing", "completed", "failed"]),
  start_page: z.number().int(),
  current_page: z.number().int(),
  last_successful_page: z.number().int(),
  total_companies: z.number().int(),
  reason: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  completed_at: z.string().nullable(),
});

export function canResume(run: Pick<ExportRun, "status" | "last_successful_page">): boolean {
  return (run.status === "failed" || run.status === "idle") && run.last_successful_page > 0;
}

/**
 * Durable record of the single export run. A lock key taken with
 * set-if-absent guards against two runs processing at once.
 */
export class ExportStateStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly archiveTtlSeconds = 30 * 86400,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async current(): Promise<ExportRun | null> {
    const raw = await this.store.get(K.state());
    if (raw === null) return null;
    return runSchema.parse(JSON.parse(raw));
  }

  /** Begin a fresh run at `fromPage`. Pages before it count as covered. */
  async start(fromPage = 1): Promise<ExportRun> {
    if (!Number.isInteger(fromPage) || fromPage < 1) {
      throw new ValidationError("start_page must be a positive integer");
    }
    return this.begin(() => ({ startPage: fromPage, lastSuccessful: fromPage - 1, total: 0 }));
  }

  /** Continue the previous run one page after its last successful page. */
  async resume(): Promise<ExportRun> {
    return this.begin((previous) => {
      if (!previous || !canResume(previous)) {
        throw new ValidationError("There is no interrupted export to resume");
      }
      return {
        startPage: previous.last_successful_page + 1,
        lastSuccessful: previous.last_successful_page,
        total: previous.total_companies,
      };
    });
  }

  async recordPageSuccess(run: ExportRun, page: number, itemCount: number): Promise<ExportRun> {
    const active = await this.requireActive(run);
    if (page !== active.last_successful_page + 1) {
      throw new ConflictError(
        `Page ${page} recorded out of order (last successful page is ${active.last_successful_page})`,
      );
    }
    return this.save({
      ...active,
      current_page: page + 1,
      last_successful_page: page,
      total_companies: active.total_companies + itemCount,
      updated_at: this.now().toISOString(),
    });
  }

  async recordFailure(run: ExportRun, reason: string): Promise<ExportRun> {
    return this.finish(run, "failed", reason);
  }

  async recordCompletion(run: ExportRun, reason: string): Promise<ExportRun> {
    return this.finish(run, "completed", reason);
  }

  async snapshot(): Promise<ExportSnapshot> {
    const run = await this.current();
    if (!run) {
      return {
        run_id: null,
        status: "idle",
        current_page: 0,
        last_successful_page: 0,
        total_companies: 0,
        can_resume: false,
        reason: null,
        updated_at: null,
      };
    }
    return {
      run_id: run.run_id,
      status: run.status,
      current_page: run.current_page,
      last_successful_page: run.last_successful_page,
      total_companies: run.total_companies,
      can_resume: canResume(run),
      reason: run.reason,
      updated_at: run.updated_at,
    };
  }

  /**
   * Mark a run left processing by a previous process as failed so it can be
   * resumed. Call once at startup, before serving requests.
   */
  async recoverInterrupted(): Promise<ExportRun | null> {
    const run = await this.current();
    if (!run || run.status !== "processing") {
      await this.store.del(K.lock());
      return null;
    }
    console.warn(`Export run ${run.run_id} was interrupted at page ${run.current_page}, marking failed`);
    return this.finish(run, "failed", "Interrupted by process restart");
  }

  /** Archived runs, newest first. */
  async history(limit = 20): Promise<ExportRun[]> {
    const keys = await this.store.keys(K.archiveIdx());
    const runs: ExportRun[] = [];
    for (const key of keys) {
      const raw = await this.store.get(key);
      if (raw === null) continue;
      const parsed = runSchema.safeParse(JSON.parse(raw));
      if (parsed.success) runs.push(parsed.data);
    }
    runs.sort((a, b) => b.created_at.localeCompare(a.created_at));
    return runs.slice(0, limit);
  }

  private async begin(
    plan: (previous: ExportRun | null) => { startPage: number; lastSuccessful: number; total: number },
  ): Promise<ExportRun> {
    const runId = randomUUID();
    if (!(await this.store.setIfAbsent(K.lock(), runId))) {
      const holder = await this.store.get(K.lock());
      const state = await this.current();
      if (state?.status === "processing") {
        throw new ConflictError(`Export ${state.run_id} is already in progress`);
      }
      if (holder !== null && holder !== state?.run_id) {
        throw new ConflictError("Another export is starting");
      }
      // The lock outlived its finished run; take it over.
      await this.store.del(K.lock());
      if (!(await this.store.setIfAbsent(K.lock(), runId))) {
        throw new ConflictError("Another export is starting");
      }
    }

    try {
      const previous = await this.current();
      const { startPage, lastSuccessful, total } = plan(previous);
      if (previous) {
        await this.store.set(K.archive(previous.run_id), JSON.stringify(previous), this.archiveTtlSeconds);
      }

      const now = this.now().toISOString();
      const run: ExportRun = {
        run_id: runId,
        status: "processing",
        start_page: startPage,
        current_page: startPage,
        last_successful_page: lastSuccessful,
        total_companies: total,
        reason: null,
        created_at: now,
        updated_at: now,
        completed_at: null,
      };
      return await this.save(run);
    } catch (error) {
      await this.store.del(K.lock());
      throw error;
    }
  }

  private async finish(run: ExportRun, status: "completed" | "failed", reason: string): Promise<ExportRun> {
    const active = await this.requireActive(run);
    const now = this.now().toISOString();
    const finished = await this.save({ ...active, status, reason, updated_at: now, completed_at: now });
    if ((await this.store.get(K.lock())) === run.run_id) {
      await this.store.del(K.lock());
    }
    return finished;
  }

  private async requireActive(run: ExportRun): Promise<ExportRun> {
    const active = await this.current();
    if (!active || active.run_id !== run.run_id || active.status !== "processing") {
      throw new ConflictError(`Export run ${run.run_id} is no longer active`);
    }
    return active;
  }

  private async save(run: ExportRun): Promise<ExportRun> {
    await this.store.set(K.state(), JSON.stringify(run));
    return run;
  }
}
