//backend/src/ai/generationPolicy.ts

import type { PartnerIntent } from "./partnerIntent";

export type GenerationDefaults = {
  temperature: number;
  maxOutputTokens: number;
};

export function getGenerationDefaults(intent: PartnerIntent): GenerationDefaults {
  switch (intent) {
    case "ROLEPLAY_TURN":
      return { temperature: 0.6, maxOutputTokens: 300 };

    // one short English line, keep it literal
    case "TRANSLATE_GLOSS":
      return { temperature: 0.2, maxOutputTokens: 80 };

    case "END_FEEDBACK":
      return { temperature: 0.4, maxOutputTokens: 400 };

    default:
      return { temperature: 0.4, maxOutputTokens: 200 };
  }
}
