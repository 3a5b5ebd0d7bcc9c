// /src/lib/openai/promptTemplates.ts

/**
 * Prompting contract:
 * - The model only comments on the applicant; the shortlist decision is made elsewhere.
 * - The reply must use the four line markers below, which narrativeParser.ts reads.
 */

export const NARRATIVE_MARKERS = {
  summary: "Summary:",
  score: "Score:",
  issues: "Issues:",
  followUps: "Follow-Ups:",
} as const;

export function buildEvaluationPrompt(compressedJson: string): string {
  return `
You are a recruiting analyst. Given this JSON applicant profile, do four things:

1. Provide a concise 75-word summary.
2. Rate overall candidate quality from 1-10 (higher is better).
3. List any data gaps or inconsistencies you notice.
4. Suggest up to three follow-up questions to clarify gaps.

Applicant Profile JSON:
${compressedJson}

Return exactly in this format:
${NARRATIVE_MARKERS.summary} <text>
${NARRATIVE_MARKERS.score} <integer>
${NARRATIVE_MARKERS.issues} <comma-separated list or 'None'>
${NARRATIVE_MARKERS.followUps}
• <question 1>
• <question 2>
• <question 3>
`;
}
