// /src/lib/shortlist/policy.ts

import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "../errors";

/**
 * Default policy file, shipped beside this module.
 */
export const DEFAULT_POLICY_PATH = fileURLToPath(new URL("./shortlist-policy.json", import.meta.url));

const lowerCaseList = z.array(z.string().trim().min(1).transform((s) => s.toLowerCase()));

export const ShortlistPolicySchema = z
  .object({
    version: z.string().min(1).optional(),
    tier1_companies: lowerCaseList,
    qualified_locations: lowerCaseList,
    min_experience_years: z.number().min(0),
    max_hourly_rate: z.number().min(0),
    min_availability_hours: z.number().min(0),
  })
  .strict();

export type ShortlistPolicy = {
  readonly version?: string;
  readonly tier1_companies: readonly string[];
  readonly qualified_locations: readonly string[];
  readonly min_experience_years: number;
  readonly max_hourly_rate: number;
  readonly min_availability_hours: number;
};

/**
 * Validates and freezes a policy. List entries are trimmed and lower-cased, since
 * matching is done against lower-cased company and location strings.
 */
export function parseShortlistPolicy(raw: unknown): ShortlistPolicy {
  const parsed = ShortlistPolicySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      "Shortlist policy failed validation.",
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }

  const p = parsed.data;
  return Object.freeze({
    ...p,
    tier1_companies: Object.freeze([...p.tier1_companies]),
    qualified_locations: Object.freeze([...p.qualified_locations]),
  });
}

export async function loadShortlistPolicy(filePath: string = DEFAULT_POLICY_PATH): Promise<ShortlistPolicy> {
  const absolute = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);

  const text = await readFile(absolute, "utf8");

  let raw: unknown;
  try {
    raw = JSON.parse(text) as unknown;
  } catch (e) {
    const msg = e instanceof Error ? e.message : "Unknown JSON parse error";
    throw new ConfigError("Failed to parse shortlist policy JSON.", [msg]);
  }

  return parseShortlistPolicy(raw);
}
