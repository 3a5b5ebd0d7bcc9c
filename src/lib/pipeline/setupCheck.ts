// /src/lib/pipeline/setupCheck.ts
//
// Connectivity check run before the first batch: every configured table must list,
// and the text generator must answer a short prompt.

import type { TableNames } from "../../contracts";
import type { RecordStore } from "../airtable/client";
import { errorMessage } from "../errors";
import { createLogger, type Logger } from "../log/logger";
import type { TextGenerator } from "../openai/client";
import type { RetryExecutor } from "../resilience/retry";

export const SETUP_TEST_PROMPT = "Please respond with just the word 'SUCCESS' if you can read this.";

export type CheckResult = {
  name: string;
  ok: boolean;
  detail?: string;
};

export type SetupReport = {
  ok: boolean;
  checks: CheckResult[];
};

export type SetupCheckDeps = {
  store: RecordStore;
  executor: RetryExecutor;
  generator: TextGenerator;
  tables: TableNames;
  logger?: Logger;
};

export class SetupCheck {
  private readonly deps: SetupCheckDeps;
  private readonly logger: Logger;

  constructor(deps: SetupCheckDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger("SETUP");
  }

  /**
   * One list call per table (first page only), then one generate call. Failures are
   * reported, never thrown.
   */
  async run(): Promise<SetupReport> {
    const checks: CheckResult[] = [];

    for (const table of Object.values(this.deps.tables)) {
      checks.push(
        await this.check(`Table '${table}' reachable`, async () => {
          const page = await this.deps.executor.execute(
            () => this.deps.store.listRecords(table),
            undefined,
            `List ${table}`,
          );
          return `${page.records.length} records on first page`;
        }),
      );
    }

    checks.push(
      await this.check("Text generation", async () => {
        const reply = await this.deps.generator.generate(SETUP_TEST_PROMPT);
        return `Response: ${reply.trim()}`;
      }),
    );

    return { ok: checks.every((c) => c.ok), checks };
  }

  private async check(name: string, task: () => Promise<string>): Promise<CheckResult> {
    try {
      const detail = await task();
      this.logger.info(`[PASS] ${name}`);
      return { name, ok: true, detail };
    } catch (err) {
      const detail = errorMessage(err);
      this.logger.error(`[FAIL] ${name}: ${detail}`);
      return { name, ok: false, detail };
    }
  }
}
