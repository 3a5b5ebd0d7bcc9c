// /src/cli.ts
/**
 * Applicant pipeline CLI.
 *
 *   npx tsx src/cli.ts check
 *   npx tsx src/cli.ts compress <applicantId>
 *   npx tsx src/cli.ts decompress <applicantId>
 *   npx tsx src/cli.ts shortlist <applicantId>
 *   npx tsx src/cli.ts evaluate <applicantId>
 *   npx tsx src/cli.ts process <applicantId>
 *   npx tsx src/cli.ts process-all
 *
 * Env: see .env.example (AIRTABLE_TOKEN, AIRTABLE_BASE_ID, OPENAI_API_KEY required).
 */

import * as dotenv from "dotenv";
import { REQUIRED_ENV_VARS, loadConfig, missingEnvVars } from "./lib/config/env";
import { ConfigError } from "./lib/errors";
import type { ApplicantPipeline } from "./lib/pipeline/applicantPipeline";
import { createApplicantPipeline, createSetupCheck } from "./lib/pipeline/createPipeline";
import { loadShortlistPolicy } from "./lib/shortlist/policy";

const COMMANDS = ["check", "compress", "decompress", "shortlist", "evaluate", "process", "process-all"] as const;
type Command = (typeof COMMANDS)[number];
type PipelineCommand = Exclude<Command, "check">;

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

function usage(): string {
  return `Usage: applicant-pipeline <${COMMANDS.join("|")}> [applicantId]`;
}

/**
 * Reports each required variable, the policy file, then store and model connectivity.
 */
async function runCheck(): Promise<number> {
  const missing = missingEnvVars();
  for (const name of REQUIRED_ENV_VARS) {
    console.log(`[${missing.includes(name) ? "FAIL" : "PASS"}] ${name} configured`);
  }
  if (missing.length > 0) return 1;

  const config = loadConfig();
  const policy = await loadShortlistPolicy(config.shortlistPolicyPath);
  console.log(`[PASS] Shortlist policy loaded (${policy.tier1_companies.length} tier-1 companies)`);

  const report = await createSetupCheck(config).run();
  console.log(report.ok ? "All checks passed." : "Some checks failed.");
  return report.ok ? 0 : 1;
}

async function run(pipeline: ApplicantPipeline, command: PipelineCommand, applicantId: string): Promise<boolean> {
  switch (command) {
    case "compress":
      return pipeline.compressApplicant(applicantId);
    case "decompress":
      return pipeline.decompressApplicant(applicantId);
    case "shortlist":
      return pipeline.processShortlist(applicantId);
    case "evaluate":
      return pipeline.processNarrativeEvaluation(applicantId);
    case "process": {
      const result = await pipeline.processApplicant(applicantId);
      console.log(result);
      return result.compressed && result.shortlisted && result.llmEvaluated;
    }
    case "process-all": {
      const result = await pipeline.processAllApplicants();
      console.log(result);
      return result.errors === 0;
    }
    default: {
      const _exhaustive: never = command;
      return _exhaustive;
    }
  }
}

async function main(argv: string[]): Promise<number> {
  const [command, applicantId = ""] = argv;

  if (!isCommand(command)) {
    console.error(usage());
    return 2;
  }
  if (command !== "process-all" && command !== "check" && !applicantId.trim()) {
    console.error(`"${command}" needs an applicant id.\n${usage()}`);
    return 2;
  }

  dotenv.config();
  if (command === "check") return runCheck();

  const config = loadConfig();
  const policy = await loadShortlistPolicy(config.shortlistPolicyPath);
  const pipeline = createApplicantPipeline(config, policy);

  const ok = await run(pipeline, command, applicantId.trim());
  console.log(`${command}${applicantId ? ` ${applicantId}` : ""}: ${ok ? "ok" : "failed"}`);
  return ok ? 0 : 1;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    if (err instanceof ConfigError) {
      console.error(`[CONFIG] ${err.message}`);
      for (const issue of err.issues) console.error(`  - ${issue}`);
    } else {
      console.error(err);
    }
    process.exitCode = 1;
  });
