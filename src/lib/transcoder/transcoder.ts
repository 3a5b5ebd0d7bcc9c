// /src/lib/transcoder/transcoder.ts

import {
  CanonicalPatchSchema,
  emptyPersonal,
  emptySalary,
  type CanonicalPatch,
  type CanonicalRecord,
  type ExperienceEntry,
  type RawRecordSet,
  type RecordFields,
  type TableNames,
} from "../../contracts";
import type { RecordStore } from "../airtable/client";
import type { RecordFetcher } from "../airtable/fetchAll";
import { errorMessage } from "../errors";
import { createLogger, type Logger } from "../log/logger";
import type { RetryExecutor } from "../resilience/retry";
import {
  experienceToFields,
  isLinkedTo,
  personalToFields,
  salaryToFields,
  toExperienceEntry,
  toPersonal,
  toSalary,
} from "./fieldMap";

export type RecordTranscoderDeps = {
  store: RecordStore;
  fetcher: RecordFetcher;
  executor: RetryExecutor;
  tables: TableNames;
  logger?: Logger;
};

/**
 * Converts between the normalized tables (personal / experience / salary rows linked
 * to an applicant) and the single canonical record.
 *
 * Nothing is cached: every call reads the tables again.
 */
export class RecordTranscoder {
  private readonly store: RecordStore;
  private readonly fetcher: RecordFetcher;
  private readonly executor: RetryExecutor;
  private readonly tables: TableNames;
  private readonly logger: Logger;

  constructor(deps: RecordTranscoderDeps) {
    this.store = deps.store;
    this.fetcher = deps.fetcher;
    this.executor = deps.executor;
    this.tables = deps.tables;
    this.logger = deps.logger ?? createLogger("TRANSCODER");
  }

  /**
   * First linked personal row, every linked experience row (fetch order), first linked salary row.
   * Throws if a table cannot be read.
   */
  async loadApplicantData(applicantId: string): Promise<RawRecordSet> {
    const personalRows = await this.fetcher.fetchAll(this.tables.personal);
    const experienceRows = await this.fetcher.fetchAll(this.tables.experience);
    const salaryRows = await this.fetcher.fetchAll(this.tables.salary);

    return {
      personal: personalRows.find((r) => isLinkedTo(r, applicantId)) ?? null,
      experience: experienceRows.filter((r) => isLinkedTo(r, applicantId)),
      salary: salaryRows.find((r) => isLinkedTo(r, applicantId)) ?? null,
    };
  }

  /**
   * Returns null only when the tables could not be read. Missing personal or salary
   * rows produce default sections.
   */
  async compress(applicantId: string): Promise<CanonicalRecord | null> {
    let data: RawRecordSet;
    try {
      data = await this.loadApplicantData(applicantId);
    } catch (err) {
      this.logger.error(`Error compressing data for ${applicantId}: ${errorMessage(err)}`);
      return null;
    }

    const record: CanonicalRecord = {
      personal: data.personal ? toPersonal(data.personal.fields) : emptyPersonal(),
      experience: data.experience.map((r) => toExperienceEntry(r.fields)),
      salary: data.salary ? toSalary(data.salary.fields) : emptySalary(),
    };

    this.logger.info(`Compressed data for applicant ${applicantId}`);
    return record;
  }

  /**
   * Writes a canonical JSON document back to the tables: personal, then experience,
   * then salary. Sections missing from the document are left alone.
   *
   * Experience is a full replace: every linked row is deleted before the document's
   * entries are created. There is no transaction; a failure part-way stops the
   * remaining steps and keeps what was already written.
   */
  async decompress(applicantId: string, compressedJson: string): Promise<boolean> {
    let doc: CanonicalPatch;
    try {
      doc = CanonicalPatchSchema.parse(JSON.parse(compressedJson));
    } catch (err) {
      this.logger.error(`Invalid canonical JSON for ${applicantId}: ${errorMessage(err)}`);
      return false;
    }

    try {
      if (doc.personal) {
        await this.upsertLinked(this.tables.personal, applicantId, personalToFields(applicantId, doc.personal));
      }

      if (doc.experience) {
        await this.replaceExperience(applicantId, doc.experience);
      }

      if (doc.salary) {
        await this.upsertLinked(this.tables.salary, applicantId, salaryToFields(applicantId, doc.salary));
      }
    } catch (err) {
      this.logger.error(`Error decompressing data for ${applicantId}: ${errorMessage(err)}`);
      return false;
    }

    this.logger.info(`Decompressed data for applicant ${applicantId}`);
    return true;
  }

  private async upsertLinked(table: string, applicantId: string, fields: RecordFields): Promise<void> {
    const rows = await this.fetcher.fetchAll(table);
    const existing = rows.find((r) => isLinkedTo(r, applicantId));

    if (existing) {
      await this.executor.execute(
        () => this.store.updateRecord(table, existing.id, fields),
        undefined,
        `Update ${table}/${existing.id}`,
      );
    } else {
      await this.executor.execute(() => this.store.createRecord(table, fields), undefined, `Create ${table}`);
    }
  }

  private async replaceExperience(applicantId: string, entries: ExperienceEntry[]): Promise<void> {
    const table = this.tables.experience;
    const rows = await this.fetcher.fetchAll(table);

    for (const row of rows.filter((r) => isLinkedTo(r, applicantId))) {
      await this.executor.execute(() => this.store.deleteRecord(table, row.id), undefined, `Delete ${table}/${row.id}`);
    }

    for (const entry of entries) {
      await this.executor.execute(
        () => this.store.createRecord(table, experienceToFields(applicantId, entry)),
        undefined,
        `Create ${table}`,
      );
    }
  }
}
