import { beforeEach, describe, expect, it } from "vitest";
import { exportFilters } from "../src/config/export-filters.js";
import { CacheStore } from "../src/lib/cache-store.js";
import { ConflictError, UpstreamError } from "../src/lib/errors.js";
import { ExportOrchestrator } from "../src/lib/export-orchestrator.js";
import { ExportStateStore } from "../src/lib/export-state.js";
import { MemoryStore } from "../src/lib/store.js";
import { FakeSource, deferred, makeCompanies } from "./helpers/fake-source.js";

describe("ExportOrchestrator", () => {
  let source: FakeSource;
  let state: ExportStateStore;
  let orchestrator: ExportOrchestrator;

  const build = (maxPages = 100) => {
    const store = new MemoryStore();
    state = new ExportStateStore(store);
    orchestrator = new ExportOrchestrator(state, new CacheStore(store), source, {
      filters: exportFilters,
      pageSize: 10,
      cacheTtlSeconds: 3600,
      pageDelayMs: 0,
      maxPages,
    });
  };

  beforeEach(() => {
    source = new FakeSource(makeCompanies(60));
    build();
  });

  it("fetches pages in order until an empty page", async () => {
    const result = await orchestrator.runExport();

    expect(result.status).toBe("completed");
    expect(result.reason).toBe("No more results");
    expect(result.last_successful_page).toBe(6);
    expect(source.pageCalls).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(source.filtersSeen[0]).toEqual(exportFilters);
    expect(result.artifact.companies.map((c) => c.name)).toEqual(makeCompanies(60).map((c) => c.name));
    expect(result.artifact.first_page).toBe(1);
    expect(result.artifact.last_page).toBe(6);
    expect(await state.snapshot()).toMatchObject({ status: "completed", total_companies: 60, can_resume: false });
  });

  it("stops after a short page", async () => {
    source.companies = makeCompanies(55);
    const result = await orchestrator.runExport();

    expect(result.reason).toBe("All results retrieved");
    expect(source.pageCalls).toEqual([1, 2, 3, 4, 5, 6]);
    expect(result.artifact.companies).toHaveLength(55);
  });

  it("stops at the page limit", async () => {
    build(3);
    const result = await orchestrator.runExport();

    expect(result).toMatchObject({ status: "completed", reason: "Page limit reached (3 pages)", last_successful_page: 3 });
    expect(result.artifact.companies).toHaveLength(30);
  });

  it("starts from the requested page", async () => {
    const result = await orchestrator.runExport({ startPage: 3 });

    expect(source.pageCalls).toEqual([3, 4, 5, 6, 7]);
    expect(result.artifact.companies[0]?.name).toBe("Company 21");
    expect(result.artifact.first_page).toBe(3);
    expect((await state.snapshot()).total_companies).toBe(40);
  });

  it("fails with the pages fetched so far and resumes after the last success", async () => {
    source.failPages.set(5, new UpstreamError("rate_limit", "PDL API rate limit exceeded", 429));

    const failed = await orchestrator.runExport();
    expect(failed.status).toBe("failed");
    expect(failed.reason).toBe("Error on page 5: PDL API rate limit exceeded");
    expect(failed.last_successful_page).toBe(4);
    expect(failed.artifact.companies).toHaveLength(40);
    expect(failed.artifact.last_page).toBe(4);
    expect(await state.snapshot()).toMatchObject({ status: "failed", can_resume: true, last_successful_page: 4 });

    source.failPages.clear();
    source.pageCalls.length = 0;
    const resumed = await orchestrator.runExport({ resume: true });

    expect(source.pageCalls).toEqual([5, 6, 7]);
    expect(resumed.status).toBe("completed");
    expect(resumed.artifact.first_page).toBe(5);
    expect(resumed.artifact.last_page).toBe(6);
    expect(await state.snapshot()).toMatchObject({ last_successful_page: 6, total_companies: 60 });

    const combined = [...failed.artifact.companies, ...resumed.artifact.companies].map((c) => c.name);
    expect(combined).toEqual(makeCompanies(60).map((c) => c.name));
  });

  it("reuses cached pages when the export is restarted from the top", async () => {
    source.failPages.set(5, new Error("socket hang up"));
    await orchestrator.runExport();
    source.failPages.clear();

    const result = await orchestrator.runExport();
    expect(source.pageCalls).toEqual([1, 2, 3, 4, 5, 5, 6, 7]);
    expect(result.artifact.companies).toHaveLength(60);
  });

  it("fails without rows when the first page errors", async () => {
    source.failPages.set(1, new Error("socket hang up"));
    const result = await orchestrator.runExport();

    expect(result).toMatchObject({ status: "failed", last_successful_page: 0 });
    expect(result.artifact.companies).toHaveLength(0);
    expect(result.artifact.first_page).toBeNull();
    expect((await state.snapshot()).can_resume).toBe(false);
  });

  it("halts at the next page boundary when asked to stop", async () => {
    source.beforeFetch = (page) => {
      if (page === 2) orchestrator.requestStop();
    };
    const result = await orchestrator.runExport();

    expect(result).toMatchObject({ status: "failed", reason: "Stopped by operator before page 3", last_successful_page: 2 });
    expect(result.artifact.companies).toHaveLength(20);
    expect(source.pageCalls).toEqual([1, 2]);
    expect(orchestrator.isRunning()).toBe(false);
    expect((await state.snapshot()).can_resume).toBe(true);
  });

  it("has nothing to stop when idle", () => {
    expect(orchestrator.requestStop()).toBe(false);
  });

  it("rejects a concurrent export without disturbing the running one", async () => {
    const entered = deferred();
    const gate = deferred();
    source.beforeFetch = async (page) => {
      if (page !== 1) return;
      entered.resolve();
      await gate.promise;
    };

    const running = orchestrator.runExport();
    await entered.promise;
    expect(orchestrator.isRunning()).toBe(true);

    const runId = (await state.current())?.run_id;
    await expect(orchestrator.runExport()).rejects.toBeInstanceOf(ConflictError);
    expect(await state.current()).toMatchObject({ run_id: runId, status: "processing" });
    expect(orchestrator.isRunning()).toBe(true);

    gate.resolve();
    const result = await running;
    expect(result.run_id).toBe(runId);
    expect(result.artifact.companies).toHaveLength(60);
  });
});
