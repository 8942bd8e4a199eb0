// backend/src/services/familyComposition.ts

import {
  DEFAULT_COMPOSITION_CONFIG,
  SIBLING_KEYS,
  type CompositionConfig,
  type CompositionPattern,
} from "../content/familyRules";
import type { FactTable, SiblingFactKey, Transcript } from "../types/roleplay";
import { studentText } from "./transcriptText";

function statedSizes(text: string, config: CompositionConfig): number[] {
  const sizes: number[] = [];
  for (const [size, tokens] of Object.entries(config.sizeTokens)) {
    if (tokens.some((t) => text.includes(t))) sizes.push(Number(size));
  }
  return sizes;
}

function namedSiblings(text: string, config: CompositionConfig): SiblingFactKey[] {
  return SIBLING_KEYS.filter((key) => text.includes(config.siblingTerms[key]));
}

function sameSiblingSet(a: readonly SiblingFactKey[], b: readonly SiblingFactKey[]): boolean {
  return a.length === b.length && a.every((k) => b.includes(k));
}

/**
 * Finds the single composition pattern the learner's text states, or null when
 * the statement is missing, incomplete or contradictory.
 */
export function matchCompositionPattern(
  text: string,
  config: CompositionConfig = DEFAULT_COMPOSITION_CONFIG
): CompositionPattern | null {
  if (!config.parentAndSelfTerms.every((t) => text.includes(t))) return null;

  // Two different household sizes in one history is not something we guess about.
  const sizes = statedSizes(text, config);
  if (sizes.length !== 1) return null;

  const named = namedSiblings(text, config);
  const pattern = config.patterns.find(
    (p) => p.size === sizes[0] && sameSiblingSet(p.siblings, named)
  );
  return pattern ?? null;
}

export function declaresNoSiblings(
  text: string,
  config: CompositionConfig = DEFAULT_COMPOSITION_CONFIG
): boolean {
  return config.noSiblingPhrases.some((p) => text.includes(p));
}

export function resolveComposition(
  facts: FactTable,
  transcript: Transcript,
  config: CompositionConfig = DEFAULT_COMPOSITION_CONFIG
): FactTable {
  const resolved: FactTable = { ...facts };
  const text = studentText(transcript);
  if (!text) return resolved;

  if (declaresNoSiblings(text, config)) {
    for (const key of SIBLING_KEYS) resolved[key] = "asserted_absent";
    return resolved;
  }

  const pattern = matchCompositionPattern(text, config);
  if (!pattern) return resolved;

  for (const key of SIBLING_KEYS) {
    if (!pattern.siblings.includes(key)) {
      resolved[key] = "asserted_absent";
    } else if (resolved[key] !== "asserted_absent") {
      resolved[key] = "asserted_present";
    }
  }
  return resolved;
}
