// /src/lib/openai/narrativeParser.ts

import type { NarrativeEvaluation } from "../../contracts";
import { NARRATIVE_MARKERS } from "./promptTemplates";

/** Used when a `Score:` line is present but not an integer. */
export const UNPARSEABLE_SCORE = 5;

const INTEGER = /^[+-]?\d+$/;
const BULLET_PREFIXES = ["•", "-"] as const;

function remainder(line: string, marker: string): string {
  return line.slice(marker.length).trim();
}

function parseScore(value: string): number {
  return INTEGER.test(value) ? Number.parseInt(value, 10) : UNPARSEABLE_SCORE;
}

function appendLine(existing: string, line: string): string {
  return existing ? `${existing}\n${line}` : line;
}

/**
 * Reads the marker-per-line reply into a fully populated evaluation.
 *
 * Markers are case-sensitive and must start the line. Bullet lines ("•" or "-")
 * are appended to follow_ups, so a list under "Follow-Ups:" is collected.
 * Fields whose marker never appears keep their initial value ("" / score 0).
 */
export function parseNarrativeResponse(text: string): NarrativeEvaluation {
  const result: NarrativeEvaluation = { summary: "", score: 0, issues: "", follow_ups: "" };

  for (const line of text.trim().split(/\r?\n/)) {
    if (line.startsWith(NARRATIVE_MARKERS.summary)) {
      result.summary = remainder(line, NARRATIVE_MARKERS.summary);
    } else if (line.startsWith(NARRATIVE_MARKERS.score)) {
      result.score = parseScore(remainder(line, NARRATIVE_MARKERS.score));
    } else if (line.startsWith(NARRATIVE_MARKERS.issues)) {
      result.issues = remainder(line, NARRATIVE_MARKERS.issues);
    } else if (line.startsWith(NARRATIVE_MARKERS.followUps)) {
      result.follow_ups = remainder(line, NARRATIVE_MARKERS.followUps);
    } else if (BULLET_PREFIXES.some((p) => line.startsWith(p))) {
      result.follow_ups = appendLine(result.follow_ups, line.trim());
    }
  }

  return result;
}
