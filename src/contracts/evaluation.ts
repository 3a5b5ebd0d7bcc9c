// /src/contracts/evaluation.ts

export interface EligibilityDecision {
  readonly passed: boolean;
  /** Clauses for the criteria that passed, in evaluation order. */
  readonly reasons: readonly string[];
  /** "QUALIFIED: ..." or "NOT QUALIFIED: ..." */
  readonly rationale: string;
}

/**
 * Structured commentary from the text-generation service.
 * `score` is 1-10; 0 is reserved for "could not evaluate".
 */
export interface NarrativeEvaluation {
  summary: string;
  score: number;
  issues: string;
  follow_ups: string;
}

export interface BatchResult {
  compressed: number;
  shortlisted: number;
  llm_evaluated: number;
  errors: number;
}
