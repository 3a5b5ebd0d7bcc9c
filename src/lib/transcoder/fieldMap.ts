// /src/lib/transcoder/fieldMap.ts
//
// Field dictionary between store rows and the canonical record.
// Readers never throw: anything absent or of the wrong type becomes the section default.

import {
  APPLICANT_LINK_FIELD,
  EXPERIENCE_FIELDS,
  PERSONAL_FIELDS,
  SALARY_FIELDS,
  type ExperienceEntry,
  type Personal,
  type RawRecord,
  type RecordFields,
  type Salary,
} from "../../contracts";

function readString(fields: RecordFields, key: string, fallback = ""): string {
  const v = fields[key];
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return fallback;
}

function readNumber(fields: RecordFields, key: string): number {
  const v = fields[key];
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return 0;
}

/**
 * Child rows point at applicants through a multi-valued link field.
 */
export function isLinkedTo(record: RawRecord, applicantId: string): boolean {
  const link = record.fields[APPLICANT_LINK_FIELD];
  return Array.isArray(link) && link.includes(applicantId);
}

export function toPersonal(fields: RecordFields): Personal {
  return {
    name: readString(fields, PERSONAL_FIELDS.name),
    email: readString(fields, PERSONAL_FIELDS.email),
    location: readString(fields, PERSONAL_FIELDS.location),
    linkedin: readString(fields, PERSONAL_FIELDS.linkedin),
  };
}

export function toExperienceEntry(fields: RecordFields): ExperienceEntry {
  return {
    company: readString(fields, EXPERIENCE_FIELDS.company),
    title: readString(fields, EXPERIENCE_FIELDS.title),
    start: readString(fields, EXPERIENCE_FIELDS.start),
    end: readString(fields, EXPERIENCE_FIELDS.end),
    technologies: readString(fields, EXPERIENCE_FIELDS.technologies),
  };
}

export function toSalary(fields: RecordFields): Salary {
  return {
    preferred_rate: readNumber(fields, SALARY_FIELDS.preferred_rate),
    minimum_rate: readNumber(fields, SALARY_FIELDS.minimum_rate),
    currency: readString(fields, SALARY_FIELDS.currency, "USD"),
    availability: readNumber(fields, SALARY_FIELDS.availability),
  };
}

export function personalToFields(applicantId: string, p: Personal): RecordFields {
  return {
    [APPLICANT_LINK_FIELD]: [applicantId],
    [PERSONAL_FIELDS.name]: p.name,
    [PERSONAL_FIELDS.email]: p.email,
    [PERSONAL_FIELDS.location]: p.location,
    [PERSONAL_FIELDS.linkedin]: p.linkedin,
  };
}

export function experienceToFields(applicantId: string, e: ExperienceEntry): RecordFields {
  return {
    [APPLICANT_LINK_FIELD]: [applicantId],
    [EXPERIENCE_FIELDS.company]: e.company,
    [EXPERIENCE_FIELDS.title]: e.title,
    [EXPERIENCE_FIELDS.start]: e.start,
    [EXPERIENCE_FIELDS.end]: e.end,
    [EXPERIENCE_FIELDS.technologies]: e.technologies,
  };
}

export function salaryToFields(applicantId: string, s: Salary): RecordFields {
  return {
    [APPLICANT_LINK_FIELD]: [applicantId],
    [SALARY_FIELDS.preferred_rate]: s.preferred_rate,
    [SALARY_FIELDS.minimum_rate]: s.minimum_rate,
    [SALARY_FIELDS.currency]: s.currency,
    [SALARY_FIELDS.availability]: s.availability,
  };
}
