// /src/lib/openai/client.ts
import OpenAI from "openai";

export type OpenAIClientOptions = {
  apiKey: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
};

/**
 * Single-shot text generation. One call, one remote request: retries are the
 * caller's job (see RetryExecutor).
 */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export class OpenAITextGenerator implements TextGenerator {
  private client: OpenAI;
  private model: string;
  private temperature: number;

  constructor(opts: OpenAIClientOptions) {
    // SDK-level retries are off so attempts are counted and logged in one place.
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      maxRetries: 0,
      timeout: opts.timeoutMs ?? 30_000,
    });
    this.model = opts.model ?? "gpt-4.1-mini";
    this.temperature = opts.temperature ?? 0.2;
  }

  async generate(prompt: string): Promise<string> {
    const resp = await this.client.responses.create({
      model: this.model,
      input: prompt,
      temperature: this.temperature,
      store: false,
    });

    const text = resp.output_text;
    if (!text || typeof text !== "string" || text.trim().length === 0) {
      throw new Error("OpenAI response missing output_text.");
    }

    return text;
  }
}
