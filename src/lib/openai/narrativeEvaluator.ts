// /src/lib/openai/narrativeEvaluator.ts

import type { NarrativeEvaluation } from "../../contracts";
import { createLogger, type Logger } from "../log/logger";
import type { RetryExecutor } from "../resilience/retry";
import type { TextGenerator } from "./client";
import { parseNarrativeResponse } from "./narrativeParser";
import { buildEvaluationPrompt } from "./promptTemplates";

export const NARRATIVE_MAX_ATTEMPTS = 3;

/**
 * Result when the model could not be reached. Score 0 appears nowhere else.
 */
export const NARRATIVE_FALLBACK: Readonly<NarrativeEvaluation> = Object.freeze({
  summary: "LLM evaluation failed",
  score: 0,
  issues: "API error",
  follow_ups: "Retry evaluation",
});

export class NarrativeEvaluator {
  private readonly logger: Logger;

  constructor(
    private readonly generator: TextGenerator,
    private readonly executor: RetryExecutor,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger("LLM");
  }

  /**
   * Never throws: when every attempt fails the fixed fallback is returned and the
   * parser is not run.
   */
  async evaluate(applicantId: string, compressedJson: string): Promise<NarrativeEvaluation> {
    const prompt = buildEvaluationPrompt(compressedJson);

    let text: string;
    try {
      text = await this.executor.execute(
        () => this.generator.generate(prompt),
        NARRATIVE_MAX_ATTEMPTS,
        `LLM evaluation for ${applicantId}`,
      );
    } catch {
      // exhaustion is already logged by the executor
      return { ...NARRATIVE_FALLBACK };
    }

    const result = parseNarrativeResponse(text);
    this.logger.info(`LLM evaluation completed for ${applicantId}`);
    return result;
  }
}
