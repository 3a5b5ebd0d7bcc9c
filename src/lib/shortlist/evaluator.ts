// /src/lib/shortlist/evaluator.ts

import { CanonicalRecordSchema, type EligibilityDecision, type ExperienceEntry } from "../../contracts";
import { errorMessage } from "../errors";
import { createLogger, type Logger } from "../log/logger";
import type { ShortlistPolicy } from "./policy";

/**
 * -------------------------
 * Dates
 * -------------------------
 */

type YearMonth = { year: number; month: number };

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Strict YYYY-MM-DD; rejects impossible calendar days such as 2023-02-30.
 */
export function parseIsoDate(value: string): YearMonth | null {
  const m = ISO_DATE.exec(value);
  if (!m) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12 || day < 1) return null;

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;

  return { year, month };
}

function isOngoing(end: string): boolean {
  return end === "" || end.toLowerCase() === "present";
}

/**
 * Whole calendar months between two dates; day of month is ignored.
 */
function monthsBetween(start: YearMonth, end: YearMonth): number {
  return (end.year - start.year) * 12 + (end.month - start.month);
}

/**
 * -------------------------
 * Criteria
 * -------------------------
 */

/**
 * Sum of per-entry months (negative spans count as 0) over 12. Entries with an
 * unparseable date are skipped.
 */
export function calculateExperienceYears(experience: readonly ExperienceEntry[], now: Date): number {
  const today: YearMonth = { year: now.getFullYear(), month: now.getMonth() + 1 };
  let totalMonths = 0;

  for (const entry of experience) {
    const start = parseIsoDate(entry.start);
    if (!start) continue;

    const end = isOngoing(entry.end) ? today : parseIsoDate(entry.end);
    if (!end) continue;

    totalMonths += Math.max(0, monthsBetween(start, end));
  }

  return totalMonths / 12;
}

/**
 * One decimal place, exact halves to even: 4.25 -> "4.2", 4.75 -> "4.8".
 */
export function formatYears(years: number): string {
  const scaled = years * 10;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  const tenths = diff > 0.5 || (diff === 0.5 && floor % 2 === 1) ? floor + 1 : floor;
  return (tenths / 10).toFixed(1);
}

export function hasTier1Experience(
  experience: readonly ExperienceEntry[],
  tier1Companies: readonly string[],
): boolean {
  return experience.some((entry) => {
    const company = entry.company.toLowerCase();
    return tier1Companies.some((t) => company.includes(t));
  });
}

/**
 * -------------------------
 * Public API
 * -------------------------
 */

export const EVALUATION_ERROR_RATIONALE = "Error in evaluation";

export type EvaluateShortlistOptions = {
  /** Resolves ongoing roles. Defaults to the current date. */
  now?: Date;
  logger?: Logger;
};

/**
 * Experience AND compensation AND location.
 *
 * `reasons` only lists criteria that passed, so a rejected applicant still shows
 * what did qualify. Any parse or type error yields a failed decision with the
 * rationale "Error in evaluation".
 */
export function evaluateShortlist(
  compressedJson: string,
  policy: ShortlistPolicy,
  options?: EvaluateShortlistOptions,
): EligibilityDecision {
  const now = options?.now ?? new Date();

  try {
    const record = CanonicalRecordSchema.parse(JSON.parse(compressedJson));
    const reasons: string[] = [];

    const years = calculateExperienceYears(record.experience, now);
    const hasTier1 = hasTier1Experience(record.experience, policy.tier1_companies);

    const experiencePassed = years >= policy.min_experience_years || hasTier1;
    if (experiencePassed) {
      if (years >= policy.min_experience_years) reasons.push(`${formatYears(years)} years experience`);
      if (hasTier1) reasons.push("Tier-1 company experience");
    }

    const { preferred_rate, availability } = record.salary;
    const compensationPassed =
      preferred_rate <= policy.max_hourly_rate && availability >= policy.min_availability_hours;
    if (compensationPassed) {
      reasons.push(`Rate $${preferred_rate}/hr, ${availability}hrs/week available`);
    }

    const location = record.personal.location.toLowerCase();
    const locationPassed = policy.qualified_locations.some((q) => location.includes(q));
    if (locationPassed) {
      reasons.push(`Located in ${location}`);
    }

    const passed = experiencePassed && compensationPassed && locationPassed;

    return Object.freeze({
      passed,
      reasons: Object.freeze(reasons),
      rationale: `${passed ? "QUALIFIED" : "NOT QUALIFIED"}: ${reasons.join("; ")}`,
    });
  } catch (err) {
    (options?.logger ?? createLogger("SHORTLIST")).error(
      `Error evaluating shortlist criteria: ${errorMessage(err)}`,
    );
    return Object.freeze({ passed: false, reasons: Object.freeze([]), rationale: EVALUATION_ERROR_RATIONALE });
  }
}
