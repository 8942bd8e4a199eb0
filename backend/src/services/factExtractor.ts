// backend/src/services/factExtractor.ts

import { DEFAULT_FACT_RULES, FACT_KEYS, type FactRule } from "../content/familyRules";
import type { FactKey, FactTable, FactValue, Transcript } from "../types/roleplay";
import { studentText } from "./transcriptText";

export function emptyFactTable(): FactTable {
  return {
    hasOlderBrother: "unknown",
    hasYoungerBrother: "unknown",
    hasOlderSister: "unknown",
    hasYoungerSister: "unknown",
    hasPet: "unknown",
  };
}

function resolveFact(fact: FactKey, text: string, rules: readonly FactRule[]): FactValue {
  const own = rules.filter((r) => r.fact === fact);

  if (own.some((r) => r.polarity === "negation" && r.pattern.test(text))) {
    return "asserted_absent";
  }
  if (own.some((r) => r.polarity === "affirmation" && r.pattern.test(text))) {
    return "asserted_present";
  }
  return "unknown";
}

/**
 * Reads learner turns only. A denial anywhere in the learner's text beats any
 * affirmation of the same fact, whatever the turn order.
 */
export function extractFacts(
  transcript: Transcript,
  rules: readonly FactRule[] = DEFAULT_FACT_RULES
): FactTable {
  const facts = emptyFactTable();
  const text = studentText(transcript);
  if (!text) return facts;

  for (const key of FACT_KEYS) {
    facts[key] = resolveFact(key, text, rules);
  }
  return facts;
}
