// /src/contracts/candidate.ts
/**
 * Canonical applicant record - LOCKED CONTRACT
 *
 * One JSON document per applicant, stored on the applicant row as "Compressed JSON".
 * Keys are the persisted wire names; changing them breaks documents already written.
 *
 * Every field is always present after parsing: absent values become "" / 0 / "USD".
 */

import { z } from "zod";

/** Text field; null and absent both read as the fallback. */
const text = (fallback = "") =>
  z
    .string()
    .nullish()
    .transform((v) => v ?? fallback);

export const PersonalSchema = z.object({
  name: text(),
  email: text(),
  location: text(),
  linkedin: text(),
});
export type Personal = z.infer<typeof PersonalSchema>;

/**
 * `start` / `end` are YYYY-MM-DD strings. A null, empty or "present" `end` means ongoing;
 * null is stored as "".
 */
export const ExperienceEntrySchema = z.object({
  company: text(),
  title: text(),
  start: text(),
  end: text(),
  technologies: text(),
});
export type ExperienceEntry = z.infer<typeof ExperienceEntrySchema>;

/**
 * Rates are hourly; `availability` is hours per week.
 */
export const SalarySchema = z.object({
  preferred_rate: z.number().default(0),
  minimum_rate: z.number().default(0),
  currency: text("USD"),
  availability: z.number().default(0),
});
export type Salary = z.infer<typeof SalarySchema>;

export const CanonicalRecordSchema = z.object({
  personal: PersonalSchema.default({}),
  experience: z.array(ExperienceEntrySchema).default([]),
  salary: SalarySchema.default({}),
});
export type CanonicalRecord = z.infer<typeof CanonicalRecordSchema>;

/**
 * Document accepted for write-back. Sections left out are not touched in the store.
 */
export const CanonicalPatchSchema = z.object({
  personal: PersonalSchema.optional(),
  experience: z.array(ExperienceEntrySchema).optional(),
  salary: SalarySchema.optional(),
});
export type CanonicalPatch = z.infer<typeof CanonicalPatchSchema>;

export function emptyPersonal(): Personal {
  return PersonalSchema.parse({});
}

export function emptySalary(): Salary {
  return SalarySchema.parse({});
}
