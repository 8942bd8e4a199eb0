// backend/src/services/roleplayService.ts

import {
  buildFeedbackContext,
  buildFeedbackRequest,
  buildGlossContext,
  buildPartnerContext,
} from "../ai/partnerPromptBuilder";
import { isFarewell, normalizeApologies } from "../ai/partnerOutputGuard";
import { FAREWELL_REPLY, GENERIC_OPENER } from "../ai/staticPartnerMessages";
import type { TextGenerator } from "../ai/textGenerator";
import type { UnitCatalog } from "../state/unitCatalog";
import type { Directive, Transcript, Turn } from "../types/roleplay";
import { parseTranscript } from "../validation/transcriptParser";
import { buildDirective, DEFAULT_ENGINE_CONFIG, type EngineConfig } from "./turnDirective";

export type RoleplayServiceDeps = {
  catalog: UnitCatalog;
  generator: TextGenerator;
  maxHistoryTurns?: number;
  random?: () => number;
  engine?: EngineConfig;
};

export type RoleplayOpening = {
  unitId: string;
  greeting: string;
  firstQuestion: string;
  opening: string;
};

export type DirectivePreview = {
  directive: Directive;
  skippedTurns: number;
};

export type TurnResult = {
  reply: string;
  directive: Directive;
  farewell: boolean;
};

export type RoleplayService = ReturnType<typeof createRoleplayService>;

export function createRoleplayService(deps: RoleplayServiceDeps) {
  const { catalog, generator } = deps;
  const random = deps.random ?? Math.random;
  const engine = deps.engine ?? DEFAULT_ENGINE_CONFIG;
  const maxHistoryTurns = Math.max(1, deps.maxHistoryTurns ?? 60);

  // The engine always sees the full history; the model only the recent tail.
  const promptTail = (transcript: Transcript): Transcript => transcript.slice(-maxHistoryTurns);

  function startRoleplay(unitId: string): RoleplayOpening {
    const unit = catalog.getUnit(unitId);
    const greetings = unit.greetings;
    const pick = Math.min(greetings.length - 1, Math.max(0, Math.floor(random() * greetings.length)));
    const greeting = greetings[pick] ?? "";
    const firstQuestion = unit.questions[0]?.text ?? GENERIC_OPENER;
    const opening = [greeting, firstQuestion].filter((s) => s.length > 0).join("\n");
    return { unitId: unit.id, greeting, firstQuestion, opening };
  }

  function previewDirective(unitId: string, history: unknown): DirectivePreview {
    const { turns, skipped } = parseTranscript(history);
    return { directive: buildDirective(catalog, unitId, turns, engine), skippedTurns: skipped };
  }

  async function takeTurn(unitId: string, message: string, history: unknown): Promise<TurnResult> {
    const unit = catalog.getUnit(unitId);
    const studentTurn: Turn = { role: "student", text: message.trim() };
    const transcript: Turn[] = [...parseTranscript(history).turns, studentTurn];

    const directive = buildDirective(catalog, unit.id, transcript, engine);

    if (isFarewell(studentTurn.text)) {
      return { reply: FAREWELL_REPLY, directive, farewell: true };
    }

    const raw = await generator.generate({
      intent: "ROLEPLAY_TURN",
      context: buildPartnerContext(unit, directive),
      transcript: promptTail(transcript),
    });
    return { reply: normalizeApologies(raw), directive, farewell: false };
  }

  async function translate(text: string): Promise<{ english: string }> {
    const english = await generator.generate({
      intent: "TRANSLATE_GLOSS",
      context: buildGlossContext(),
      transcript: [{ role: "student", text: text.trim() }],
    });
    return { english };
  }

  async function feedback(unitId: string, history: unknown): Promise<{ feedback: string }> {
    const unit = catalog.getUnit(unitId);
    const { turns } = parseTranscript(history);
    const text = await generator.generate({
      intent: "END_FEEDBACK",
      context: buildFeedbackContext(),
      transcript: [{ role: "student", text: buildFeedbackRequest(unit, turns) }],
    });
    return { feedback: text };
  }

  return { startRoleplay, previewDirective, takeTurn, translate, feedback };
}
