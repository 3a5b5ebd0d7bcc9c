// /src/lib/airtable/fetchAll.test.ts
import { describe, it, expect, vi } from "vitest";

import { MemoryRecordStore, captureLogger } from "../../test/fakes";
import { RetryExecutor } from "../resilience/retry";
import { RecordFetcher } from "./fetchAll";

function setup(pageSize: number) {
  const store = new MemoryRecordStore(pageSize);
  for (let i = 1; i <= 5; i++) store.seed("Applicants", { "Applicant ID": `APP-${i}` });
  const { logger, entries } = captureLogger();
  const executor = new RetryExecutor({ sleep: vi.fn(async (_ms: number) => {}), logger });
  return { store, entries, fetcher: new RecordFetcher(store, executor, logger) };
}

describe("RecordFetcher.fetchAll", () => {
  it("follows the continuation token and keeps page order", async () => {
    const { store, fetcher, entries } = setup(2);

    const records = await fetcher.fetchAll("Applicants");

    expect(records.map((r) => r.fields["Applicant ID"])).toEqual(["APP-1", "APP-2", "APP-3", "APP-4", "APP-5"]);
    expect(store.calls).toEqual([
      { method: "list", table: "Applicants" },
      { method: "list", table: "Applicants", offset: "2" },
      { method: "list", table: "Applicants", offset: "4" },
    ]);
    expect(entries).toContainEqual({ level: "info", message: "Retrieved 5 records from Applicants" });
  });

  it("returns an empty list for an empty table", async () => {
    const { fetcher } = setup(2);
    await expect(fetcher.fetchAll("Personal Details")).resolves.toEqual([]);
  });

  it("retries a page that fails transiently", async () => {
    const { store, fetcher } = setup(2);
    store.failWhen("list", "Applicants", { skip: 1, times: 1 });

    const records = await fetcher.fetchAll("Applicants");

    expect(records).toHaveLength(5);
    expect(store.calls.map((c) => c.offset)).toEqual([undefined, "2", "2", "4"]);
  });

  it("aborts the whole read when a page keeps failing", async () => {
    const { store, fetcher } = setup(2);
    store.failWhen("list", "Applicants", { skip: 1 });

    await expect(fetcher.fetchAll("Applicants")).rejects.toThrow("simulated list failure");
    expect(store.calls).toHaveLength(4);
  });
});
