// backend/src/services/transcriptText.ts

import type { Transcript, TurnRole } from "../types/roleplay";

/** Non-empty trimmed turn texts, optionally restricted to one role. */
export function turnTexts(transcript: Transcript, role?: TurnRole): string[] {
  const out: string[] = [];
  for (const turn of transcript) {
    if (role && turn.role !== role) continue;
    const t = typeof turn.text === "string" ? turn.text.trim() : "";
    if (t) out.push(t);
  }
  return out;
}

// Full-width spaces, newlines and other whitespace runs become one ASCII space.
export function normalizeWhitespace(text: string): string {
  return text.replace(/[\s　]+/g, " ").trim();
}

export function studentText(transcript: Transcript): string {
  return normalizeWhitespace(turnTexts(transcript, "student").join(" "));
}
