// /src/lib/airtable/fetchAll.ts

import type { RawRecord } from "../../contracts";
import { createLogger, type Logger } from "../log/logger";
import type { RetryExecutor } from "../resilience/retry";
import type { RecordStore } from "./client";

/**
 * Reads whole tables by following the store's `offset` continuation token.
 */
export class RecordFetcher {
  private readonly logger: Logger;

  constructor(
    private readonly store: RecordStore,
    private readonly executor: RetryExecutor,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger("AIRTABLE");
  }

  /**
   * Pages are concatenated in fetch order. A page that still fails after retries
   * aborts the whole read; no partial list is returned.
   */
  async fetchAll(table: string): Promise<RawRecord[]> {
    const all: RawRecord[] = [];
    let offset: string | undefined;

    do {
      const pageOffset = offset;
      const page = await this.executor.execute(
        () => this.store.listRecords(table, pageOffset),
        undefined,
        `List ${table}`,
      );
      all.push(...page.records);
      offset = page.offset || undefined;
    } while (offset);

    this.logger.info(`Retrieved ${all.length} records from ${table}`);
    return all;
  }
}
