// /src/lib/pipeline/createPipeline.ts

import { AirtableClient } from "../airtable/client";
import { RecordFetcher } from "../airtable/fetchAll";
import type { AppConfig } from "../config/env";
import { OpenAITextGenerator } from "../openai/client";
import { NarrativeEvaluator } from "../openai/narrativeEvaluator";
import { RetryExecutor } from "../resilience/retry";
import type { ShortlistPolicy } from "../shortlist/policy";
import { RecordTranscoder } from "../transcoder/transcoder";
import { ApplicantPipeline } from "./applicantPipeline";
import { SetupCheck } from "./setupCheck";

function createStore(config: AppConfig): AirtableClient {
  return new AirtableClient({
    token: config.airtable.token,
    baseId: config.airtable.baseId,
    apiUrl: config.airtable.apiUrl,
  });
}

function createExecutor(config: AppConfig): RetryExecutor {
  return new RetryExecutor({
    maxAttempts: config.retry.maxAttempts,
    backoffBase: config.retry.backoffBase,
  });
}

function createGenerator(config: AppConfig): OpenAITextGenerator {
  return new OpenAITextGenerator({
    apiKey: config.openai.apiKey,
    model: config.openai.model,
    timeoutMs: config.openai.timeoutMs,
  });
}

/**
 * Wires the production collaborators from a validated config.
 */
export function createApplicantPipeline(config: AppConfig, policy: ShortlistPolicy): ApplicantPipeline {
  const store = createStore(config);
  const executor = createExecutor(config);

  const fetcher = new RecordFetcher(store, executor);
  const transcoder = new RecordTranscoder({ store, fetcher, executor, tables: config.tables });

  const narrative = new NarrativeEvaluator(createGenerator(config), executor);

  return new ApplicantPipeline({
    store,
    fetcher,
    executor,
    transcoder,
    narrative,
    policy,
    tables: config.tables,
    rateLimitDelayMs: config.rateLimitDelayMs,
  });
}

export function createSetupCheck(config: AppConfig): SetupCheck {
  return new SetupCheck({
    store: createStore(config),
    executor: createExecutor(config),
    generator: createGenerator(config),
    tables: config.tables,
  });
}
