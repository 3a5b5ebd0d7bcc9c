// /src/lib/errors.ts

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Best-effort message for logging an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
