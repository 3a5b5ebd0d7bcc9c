// /src/contracts/records.ts
/**
 * Remote record store shapes (Airtable-style REST API).
 */

/** Field values are untyped on the wire; readers narrow them. */
export type RecordFields = Record<string, unknown>;

export interface RawRecord {
  id: string;
  fields: RecordFields;
  createdTime?: string;
}

export interface ListRecordsResponse {
  records: RawRecord[];
  /** Continuation token; absent on the last page. */
  offset?: string;
}

/**
 * Raw rows of one applicant across the normalized tables.
 */
export interface RawRecordSet {
  personal: RawRecord | null;
  experience: RawRecord[];
  salary: RawRecord | null;
}

export type TableKey = "applicants" | "personal" | "experience" | "salary" | "shortlisted";

export type TableNames = Readonly<Record<TableKey, string>>;

export const DEFAULT_TABLE_NAMES: TableNames = Object.freeze({
  applicants: "Applicants",
  personal: "Personal Details",
  experience: "Work Experience",
  salary: "Salary Preferences",
  shortlisted: "Shortlisted Leads",
});

/** Multi-valued link from child rows back to the applicant (membership, not equality). */
export const APPLICANT_LINK_FIELD = "Applicant ID";

export const PERSONAL_FIELDS = {
  name: "Full Name",
  email: "Email",
  location: "Location",
  linkedin: "LinkedIn",
} as const;

export const EXPERIENCE_FIELDS = {
  company: "Company",
  title: "Title",
  start: "Start Date",
  end: "End Date",
  technologies: "Technologies",
} as const;

export const SALARY_FIELDS = {
  preferred_rate: "Preferred Rate",
  minimum_rate: "Minimum Rate",
  currency: "Currency",
  availability: "Availability",
} as const;

/** Fields of the applicants table written by the pipeline. */
export const APPLICANT_FIELDS = {
  applicantId: "Applicant ID",
  compressedJson: "Compressed JSON",
  shortlistStatus: "Shortlist Status",
  llmSummary: "LLM Summary",
  llmScore: "LLM Score",
  llmFollowUps: "LLM Follow-Ups",
} as const;

export const SHORTLISTED_FIELDS = {
  applicant: "Applicant",
  compressedJson: "Compressed JSON",
  scoreReason: "Score Reason",
} as const;

export type ShortlistStatus = "Shortlisted" | "Not Qualified";
