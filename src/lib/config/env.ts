// /src/lib/config/env.ts

import { z } from "zod";
import { DEFAULT_TABLE_NAMES, type TableNames } from "../../contracts";
import { ConfigError } from "../errors";

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
  AIRTABLE_TOKEN: z.string().trim().min(1, "is required"),
  AIRTABLE_BASE_ID: z.string().trim().min(1, "is required"),
  AIRTABLE_API_URL: z.string().url().default("https://api.airtable.com/v0"),

  OPENAI_API_KEY: z.string().trim().min(1, "is required"),
  OPENAI_MODEL: z.string().trim().min(1).default("gpt-4.1-mini"),
  OPENAI_TIMEOUT_MS: intFromEnv(30_000, 1),

  MAX_API_RETRIES: intFromEnv(3, 1),
  RETRY_BACKOFF_BASE: z.coerce.number().min(1).default(2),
  RATE_LIMIT_DELAY_MS: intFromEnv(500, 0),

  SHORTLIST_POLICY_PATH: z.string().trim().min(1).optional(),
});

export const REQUIRED_ENV_VARS = ["AIRTABLE_TOKEN", "AIRTABLE_BASE_ID", "OPENAI_API_KEY"] as const;

/**
 * Required variables that are unset or blank, in declaration order.
 */
export function missingEnvVars(env: NodeJS.ProcessEnv = process.env): string[] {
  return REQUIRED_ENV_VARS.filter((name) => !env[name]?.trim());
}

export type AppConfig = {
  readonly airtable: { readonly token: string; readonly baseId: string; readonly apiUrl: string };
  readonly openai: { readonly apiKey: string; readonly model: string; readonly timeoutMs: number };
  readonly tables: TableNames;
  readonly retry: { readonly maxAttempts: number; readonly backoffBase: number };
  readonly rateLimitDelayMs: number;
  readonly shortlistPolicyPath?: string;
};

/**
 * Validates the environment once and returns a frozen config. Every missing or
 * invalid variable is reported in one ConfigError.
 *
 * Empty strings count as unset, matching how .env files are usually filled in.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => typeof v === "string" && v.trim().length > 0),
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`, issues);
  }

  const e = parsed.data;
  return Object.freeze({
    airtable: Object.freeze({ token: e.AIRTABLE_TOKEN, baseId: e.AIRTABLE_BASE_ID, apiUrl: e.AIRTABLE_API_URL }),
    openai: Object.freeze({ apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL, timeoutMs: e.OPENAI_TIMEOUT_MS }),
    tables: DEFAULT_TABLE_NAMES,
    retry: Object.freeze({ maxAttempts: e.MAX_API_RETRIES, backoffBase: e.RETRY_BACKOFF_BASE }),
    rateLimitDelayMs: e.RATE_LIMIT_DELAY_MS,
    ...(e.SHORTLIST_POLICY_PATH ? { shortlistPolicyPath: e.SHORTLIST_POLICY_PATH } : {}),
  });
}
