// backend/src/ai/__tests__/generationPolicy.test.ts

import { describe, it, expect } from "vitest";
import { getGenerationDefaults } from "../generationPolicy";

describe("getGenerationDefaults", () => {
  it("keeps glosses short and literal", () => {
    expect(getGenerationDefaults("TRANSLATE_GLOSS")).toEqual({ temperature: 0.2, maxOutputTokens: 80 });
  });

  it("gives role-play turns and feedback their own budgets", () => {
    expect(getGenerationDefaults("ROLEPLAY_TURN")).toEqual({ temperature: 0.6, maxOutputTokens: 300 });
    expect(getGenerationDefaults("END_FEEDBACK")).toEqual({ temperature: 0.4, maxOutputTokens: 400 });
  });
});
