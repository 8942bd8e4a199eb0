// backend/src/services/coverageTracker.ts

import type { CoverageState, Transcript, UnitQuestion } from "../types/roleplay";
import { turnTexts } from "./transcriptText";

function evidenceFor(question: UnitQuestion): string[] {
  const keywords = question.keywords.filter((k) => k.length > 0);
  return keywords.length > 0 ? keywords : [question.text];
}

/** Keyword-substring coverage over turns from both roles. */
export function computeCoverage(
  questions: readonly UnitQuestion[],
  transcript: Transcript
): CoverageState {
  const joined = turnTexts(transcript).join("\n");

  const covered: number[] = [];
  const remaining: string[] = [];

  questions.forEach((q, i) => {
    const hit = joined.length > 0 && evidenceFor(q).some((k) => joined.includes(k));
    if (hit) covered.push(i);
    else remaining.push(q.text);
  });

  const firstOpen = questions.findIndex((_, i) => !covered.includes(i));
  const nextIndex = firstOpen >= 0 ? firstOpen : Math.max(0, questions.length - 1);

  return { covered, nextIndex, remaining };
}
