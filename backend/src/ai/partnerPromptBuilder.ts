// backend/src/ai/partnerPromptBuilder.ts

import { ENTITY_TERMS } from "../content/familyRules";
import type { Directive, Transcript, Unit } from "../types/roleplay";
import {
  ABSOLUTE_RULES,
  FEEDBACK_INSTRUCTIONS,
  GLOSS_INSTRUCTIONS,
  PARTNER_PERSONA,
} from "./staticPartnerMessages";

export const FEEDBACK_TRANSCRIPT_TURNS = 30;

function bulletList(items: readonly string[]): string {
  return items.map((q) => `- ${q}`).join("\n");
}

export function buildPredeterminedBlock(unit: Unit): string {
  if (unit.partnerQuestions.length === 0) {
    return "PREDETERMINED QUESTIONS: none. Only answer what the student asks.";
  }
  return [
    `PREDETERMINED QUESTIONS (${unit.id}): you may ask ONLY these, each when the student has just asked you the same thing:`,
    ...unit.partnerQuestions.map((q, i) => `${i + 1}. ${q}`),
    `Once you have used them, only answer what the student asks. No phrases like '你可以问我…'.`,
  ].join("\n");
}

export function buildComplianceBlock(unit: Unit, directive: Directive): string {
  const prohibitedTerms = directive.prohibited.map((e) => `${ENTITY_TERMS[e]} (${e})`);

  const lines = [
    `STRICT COMPLIANCE (${unit.id}): cover only the target questions below, in order. Do NOT suggest questions.`,
    `If the student drifts, briefly remind them to continue.`,
    ``,
    `Ordered target questions:`,
    bulletList(unit.questions.map((q) => q.text)),
    ``,
    `Progress hint: covered indices [${directive.covered.join(", ")}]; next_index ${directive.nextIndex}; next_question ${directive.nextQuestion}; remaining_count ${directive.remaining.length}.`,
    `Allowed remaining questions:`,
    directive.remaining.length > 0 ? bulletList(directive.remaining) : "- (none)",
  ];

  if (prohibitedTerms.length > 0) {
    lines.push(
      ``,
      `PROHIBITED: the student does not have: ${prohibitedTerms.join(", ")}.`,
      `Never ask about them, and skip any question that mentions them.`
    );
  }

  lines.push(``, `Directive (JSON): ${JSON.stringify(directive)}`);
  return lines.join("\n");
}

/** System context for one role-play turn, most binding rules first. */
export function buildPartnerContext(unit: Unit, directive: Directive): string[] {
  const guidance = unit.roleplayGuidance
    ? `${PARTNER_PERSONA}\nUnit-specific guidance: ${unit.roleplayGuidance}`
    : PARTNER_PERSONA;

  return [
    ...ABSOLUTE_RULES,
    guidance,
    buildPredeterminedBlock(unit),
    buildComplianceBlock(unit, directive),
  ];
}

export function buildGlossContext(): string[] {
  return [GLOSS_INSTRUCTIONS];
}

export function renderTranscript(transcript: Transcript, maxTurns = FEEDBACK_TRANSCRIPT_TURNS): string {
  const lines: string[] = [];
  for (const turn of transcript) {
    const t = turn.text.trim();
    if (t) lines.push(`${turn.role}: ${t}`);
  }
  return lines.slice(-maxTurns).join("\n");
}

export function buildFeedbackRequest(unit: Unit, transcript: Transcript): string {
  const lines = [`Unit: ${unit.title}`];
  if (unit.objectives.length > 0) lines.push(`Objectives: ${unit.objectives.join("; ")}`);
  lines.push(
    `Here is the transcript of our role play. Please give brief, encouraging feedback as specified.`,
    ``,
    renderTranscript(transcript)
  );
  return lines.join("\n");
}

export function buildFeedbackContext(): string[] {
  return [FEEDBACK_INSTRUCTIONS];
}
