// backend/src/validation/transcriptParser.ts

import type { Turn, TurnRole } from "../types/roleplay";

export type ParsedTranscript = {
  turns: Turn[];
  skipped: number;
};

// Clients built against the chat-completions shape send user/assistant.
const ROLE_ALIASES = new Map<string, TurnRole>([
  ["student", "student"],
  ["user", "student"],
  ["partner", "partner"],
  ["assistant", "partner"],
]);

function toRole(v: unknown): TurnRole | null {
  if (typeof v !== "string") return null;
  return ROLE_ALIASES.get(v.trim().toLowerCase()) ?? null;
}

function toText(entry: Record<string, unknown>): string | null {
  if (typeof entry.text === "string") return entry.text;
  if (typeof entry.content === "string") return entry.content;
  return null;
}

/**
 * Turn request history into a transcript. Entries without a known role or a
 * string text are dropped and counted; they never fail the request.
 */
export function parseTranscript(raw: unknown): ParsedTranscript {
  if (!Array.isArray(raw)) return { turns: [], skipped: 0 };

  const turns: Turn[] = [];
  let skipped = 0;

  for (const entry of raw) {
    if (!entry || typeof entry !== "object" || Array.isArray(entry)) {
      skipped += 1;
      continue;
    }
    const record: Record<string, unknown> = { ...entry };
    const role = toRole(record.role);
    const text = toText(record);
    if (!role || text === null) {
      skipped += 1;
      continue;
    }
    turns.push({ role, text });
  }

  return { turns, skipped };
}
