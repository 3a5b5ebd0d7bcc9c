// /src/lib/airtable/client.ts

import { z } from "zod";
import type { ListRecordsResponse, RawRecord, RecordFields } from "../../contracts";

export type AirtableClientConfig = {
  token: string;
  baseId: string;
  apiUrl?: string; // default https://api.airtable.com/v0
  fetchImpl?: typeof fetch;
};

/**
 * CRUD over named tables. Implementations make exactly one remote call per method;
 * retries belong to the caller.
 */
export interface RecordStore {
  listRecords(table: string, offset?: string): Promise<ListRecordsResponse>;
  getRecord(table: string, id: string): Promise<RawRecord>;
  createRecord(table: string, fields: RecordFields): Promise<RawRecord>;
  updateRecord(table: string, id: string, fields: RecordFields): Promise<RawRecord>;
  deleteRecord(table: string, id: string): Promise<void>;
}

export class AirtableApiError extends Error {
  status: number;
  bodyText?: string;

  constructor(message: string, status: number, bodyText?: string) {
    super(message);
    this.name = "AirtableApiError";
    this.status = status;
    if (bodyText !== undefined) {
      this.bodyText = bodyText;
    }
  }
}

const RawRecordSchema = z.object({
  id: z.string().min(1),
  fields: z.record(z.unknown()).default({}),
  createdTime: z.string().optional(),
});

const ListRecordsResponseSchema = z.object({
  records: z.array(RawRecordSchema).default([]),
  offset: z.string().min(1).optional(),
});

const DeleteRecordResponseSchema = z.object({
  id: z.string(),
  deleted: z.boolean(),
});

export class AirtableClient implements RecordStore {
  private token: string;
  private baseId: string;
  private apiUrl: string;
  private fetchImpl: typeof fetch;

  constructor(cfg: AirtableClientConfig) {
    this.token = cfg.token;
    this.baseId = cfg.baseId;
    this.apiUrl = (cfg.apiUrl ?? "https://api.airtable.com/v0").replace(/\/+$/, "");
    this.fetchImpl = cfg.fetchImpl ?? fetch;
  }

  private async request<S extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: S,
    body?: unknown,
  ): Promise<z.output<S>> {
    const url = `${this.apiUrl}/${encodeURIComponent(this.baseId)}/${path}`;

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.token}`,
      Accept: "application/json",
      ...(body !== undefined ? { "Content-Type": "application/json" } : {}),
    };

    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    const res = await this.fetchImpl(url, init);
    const text = await res.text().catch(() => "");

    if (!res.ok) {
      throw new AirtableApiError(`Airtable ${method} ${path} failed`, res.status, text);
    }

    let json: unknown;
    try {
      json = text ? JSON.parse(text) : {};
    } catch {
      throw new AirtableApiError(`Airtable ${method} ${path} returned a non-JSON body`, res.status, text);
    }

    return schema.parse(json);
  }

  // ---------------------------------------------------------------------------
  // Records
  // ---------------------------------------------------------------------------

  async listRecords(table: string, offset?: string): Promise<ListRecordsResponse> {
    const query = offset ? `?${new URLSearchParams({ offset }).toString()}` : "";
    return this.request("GET", `${encodeURIComponent(table)}${query}`, ListRecordsResponseSchema);
  }

  async getRecord(table: string, id: string): Promise<RawRecord> {
    return this.request("GET", recordPath(table, id), RawRecordSchema);
  }

  async createRecord(table: string, fields: RecordFields): Promise<RawRecord> {
    return this.request("POST", encodeURIComponent(table), RawRecordSchema, { fields });
  }

  /**
   * PATCH: only the given fields change; the rest of the row is kept.
   */
  async updateRecord(table: string, id: string, fields: RecordFields): Promise<RawRecord> {
    return this.request("PATCH", recordPath(table, id), RawRecordSchema, { fields });
  }

  async deleteRecord(table: string, id: string): Promise<void> {
    const resp = await this.request("DELETE", recordPath(table, id), DeleteRecordResponseSchema);
    if (!resp.deleted) {
      throw new AirtableApiError(`Airtable DELETE ${table}/${id} was not applied`, 200);
    }
  }
}

function recordPath(table: string, id: string): string {
  return `${encodeURIComponent(table)}/${encodeURIComponent(id)}`;
}
