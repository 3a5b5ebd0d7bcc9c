// /src/lib/pipeline/applicantPipeline.ts

import {
  APPLICANT_FIELDS,
  SHORTLISTED_FIELDS,
  type BatchResult,
  type RawRecord,
  type RecordFields,
  type ShortlistStatus,
  type TableNames,
} from "../../contracts";
import type { RecordStore } from "../airtable/client";
import type { RecordFetcher } from "../airtable/fetchAll";
import { errorMessage } from "../errors";
import { createLogger, type Logger } from "../log/logger";
import type { NarrativeEvaluator } from "../openai/narrativeEvaluator";
import { sleep as defaultSleep, type RetryExecutor, type Sleep } from "../resilience/retry";
import { evaluateShortlist } from "../shortlist/evaluator";
import type { ShortlistPolicy } from "../shortlist/policy";
import type { RecordTranscoder } from "../transcoder/transcoder";

export type ApplicantPipelineDeps = {
  store: RecordStore;
  fetcher: RecordFetcher;
  executor: RetryExecutor;
  transcoder: RecordTranscoder;
  narrative: NarrativeEvaluator;
  policy: ShortlistPolicy;
  tables: TableNames;
  /** Pause between applicants in a batch. */
  rateLimitDelayMs?: number;
  sleep?: Sleep;
  now?: () => Date;
  logger?: Logger;
};

export type ApplicantRunResult = {
  compressed: boolean;
  shortlisted: boolean;
  llmEvaluated: boolean;
};

function readApplicantId(record: RawRecord): string | null {
  const v = record.fields[APPLICANT_FIELDS.applicantId];
  if (typeof v === "string" && v.trim().length > 0) return v;
  if (typeof v === "number") return String(v);
  return null;
}

function readCompressedJson(record: RawRecord): string {
  const v = record.fields[APPLICANT_FIELDS.compressedJson];
  return typeof v === "string" ? v : "";
}

/**
 * Applicant-level operations on top of the transcoder, the shortlist evaluator and
 * the narrative evaluator. Everything runs sequentially; one applicant is fully
 * processed before the next starts.
 */
export class ApplicantPipeline {
  private readonly deps: ApplicantPipelineDeps;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(deps: ApplicantPipelineDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger("PIPELINE");
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Applicants are matched on their own "Applicant ID" field (equality).
   */
  async findApplicant(applicantId: string): Promise<RawRecord | null> {
    const applicants = await this.deps.fetcher.fetchAll(this.deps.tables.applicants);
    return applicants.find((a) => readApplicantId(a) === applicantId) ?? null;
  }

  /**
   * Compresses the applicant's rows and stores the JSON on the applicant record.
   * Remote failures while writing propagate.
   */
  async compressApplicant(applicantId: string): Promise<boolean> {
    const record = await this.deps.transcoder.compress(applicantId);
    if (!record) return false;

    const applicant = await this.findApplicant(applicantId);
    if (!applicant) {
      this.logger.error(`Applicant ${applicantId} not found`);
      return false;
    }

    await this.writeApplicant(applicant.id, { [APPLICANT_FIELDS.compressedJson]: JSON.stringify(record) });
    return true;
  }

  /**
   * Rebuilds the normalized rows from the applicant's stored JSON.
   */
  async decompressApplicant(applicantId: string): Promise<boolean> {
    const applicant = await this.findApplicant(applicantId);
    const json = applicant ? readCompressedJson(applicant) : "";
    if (!applicant || !json) {
      this.logger.error(`No compressed data found for ${applicantId}`);
      return false;
    }

    return this.deps.transcoder.decompress(applicantId, json);
  }

  async processShortlist(applicantId: string): Promise<boolean> {
    const found = await this.loadStoredJson(applicantId);
    if (!found) return false;
    return this.shortlist(applicantId, found.applicant, found.json);
  }

  async processNarrativeEvaluation(applicantId: string): Promise<boolean> {
    const found = await this.loadStoredJson(applicantId);
    if (!found) return false;
    return this.narrate(applicantId, found.applicant, found.json);
  }

  /**
   * compress + persist, then shortlist, then narrative evaluation.
   */
  async processApplicant(applicantId: string): Promise<ApplicantRunResult> {
    const compressed = await this.compressApplicant(applicantId);
    if (!compressed) {
      return { compressed: false, shortlisted: false, llmEvaluated: false };
    }

    const shortlisted = await this.processShortlist(applicantId);
    const llmEvaluated = await this.processNarrativeEvaluation(applicantId);
    return { compressed, shortlisted, llmEvaluated };
  }

  /**
   * Runs every applicant through the pipeline. A failing applicant is logged and
   * counted in `errors`; the batch carries on with the next one.
   *
   * `shortlisted` and `llm_evaluated` count applicants whose step completed, whatever
   * the shortlist outcome was.
   */
  async processAllApplicants(): Promise<BatchResult> {
    const results: BatchResult = { compressed: 0, shortlisted: 0, llm_evaluated: 0, errors: 0 };

    let applicants: RawRecord[];
    try {
      applicants = await this.deps.fetcher.fetchAll(this.deps.tables.applicants);
    } catch (err) {
      this.logger.error(`Error in batch processing: ${errorMessage(err)}`);
      results.errors++;
      return results;
    }

    let started = false;
    for (const applicant of applicants) {
      const applicantId = readApplicantId(applicant);
      if (!applicantId) continue;

      if (started && (this.deps.rateLimitDelayMs ?? 0) > 0) {
        await this.sleep(this.deps.rateLimitDelayMs ?? 0);
      }
      started = true;

      try {
        const record = await this.deps.transcoder.compress(applicantId);
        if (!record) {
          results.errors++;
          continue;
        }

        const json = JSON.stringify(record);
        await this.writeApplicant(applicant.id, { [APPLICANT_FIELDS.compressedJson]: json });
        results.compressed++;

        if (await this.shortlist(applicantId, applicant, json)) results.shortlisted++;
        if (await this.narrate(applicantId, applicant, json)) results.llm_evaluated++;
      } catch (err) {
        this.logger.error(`Error processing applicant ${applicantId}: ${errorMessage(err)}`);
        results.errors++;
      }
    }

    this.logger.info("Batch processing completed", results);
    return results;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async loadStoredJson(applicantId: string): Promise<{ applicant: RawRecord; json: string } | null> {
    let applicant: RawRecord | null;
    try {
      applicant = await this.findApplicant(applicantId);
    } catch (err) {
      this.logger.error(`Error loading applicant ${applicantId}: ${errorMessage(err)}`);
      return null;
    }

    if (!applicant) {
      this.logger.error(`Applicant ${applicantId} not found`);
      return null;
    }

    const json = readCompressedJson(applicant);
    if (!json) {
      this.logger.warn(`No compressed JSON found for ${applicantId}`);
      return null;
    }

    return { applicant, json };
  }

  private async shortlist(applicantId: string, applicant: RawRecord, json: string): Promise<boolean> {
    try {
      const decision = evaluateShortlist(json, this.deps.policy, { now: this.now() });
      const status: ShortlistStatus = decision.passed ? "Shortlisted" : "Not Qualified";

      await this.writeApplicant(applicant.id, { [APPLICANT_FIELDS.shortlistStatus]: status });

      if (decision.passed) {
        const table = this.deps.tables.shortlisted;
        await this.deps.executor.execute(
          () =>
            this.deps.store.createRecord(table, {
              [SHORTLISTED_FIELDS.applicant]: [applicant.id],
              [SHORTLISTED_FIELDS.compressedJson]: json,
              [SHORTLISTED_FIELDS.scoreReason]: decision.rationale,
            }),
          undefined,
          `Create ${table}`,
        );
        this.logger.info(`Created shortlisted lead for ${applicantId}`);
      }

      this.logger.info(`Shortlist processed for ${applicantId}: ${status} - ${decision.rationale}`);
      return true;
    } catch (err) {
      this.logger.error(`Error processing shortlist for ${applicantId}: ${errorMessage(err)}`);
      return false;
    }
  }

  private async narrate(applicantId: string, applicant: RawRecord, json: string): Promise<boolean> {
    try {
      const evaluation = await this.deps.narrative.evaluate(applicantId, json);

      await this.writeApplicant(applicant.id, {
        [APPLICANT_FIELDS.llmSummary]: evaluation.summary,
        [APPLICANT_FIELDS.llmScore]: evaluation.score,
        [APPLICANT_FIELDS.llmFollowUps]: evaluation.follow_ups,
      });

      this.logger.info(`LLM evaluation updated for ${applicantId}`);
      return true;
    } catch (err) {
      this.logger.error(`Error processing LLM evaluation for ${applicantId}: ${errorMessage(err)}`);
      return false;
    }
  }

  private async writeApplicant(recordId: string, fields: RecordFields): Promise<void> {
    const table = this.deps.tables.applicants;
    await this.deps.executor.execute(
      () => this.deps.store.updateRecord(table, recordId, fields),
      undefined,
      `Update ${table}/${recordId}`,
    );
  }
}
