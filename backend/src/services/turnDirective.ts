// backend/src/services/turnDirective.ts

import {
  DEFAULT_COMPOSITION_CONFIG,
  DEFAULT_ENTITY_REFERENCES,
  DEFAULT_FACT_RULES,
  type CompositionConfig,
  type EntityReference,
  type FactRule,
} from "../content/familyRules";
import type { UnitCatalog } from "../state/unitCatalog";
import type { Directive, FactTable, Transcript } from "../types/roleplay";
import { filterQuestions, prohibitedEntities } from "./constraintFilter";
import { computeCoverage } from "./coverageTracker";
import { extractFacts } from "./factExtractor";
import { resolveComposition } from "./familyComposition";

export type EngineConfig = {
  factRules: readonly FactRule[];
  composition: CompositionConfig;
  references: readonly EntityReference[];
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  factRules: DEFAULT_FACT_RULES,
  composition: DEFAULT_COMPOSITION_CONFIG,
  references: DEFAULT_ENTITY_REFERENCES,
});

export function inferFacts(
  transcript: Transcript,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): FactTable {
  return resolveComposition(extractFacts(transcript, config.factRules), transcript, config.composition);
}

/**
 * Recomputes everything from the full transcript on every call. No state is
 * kept between calls, so the same (unitId, transcript) always gives an equal
 * Directive. Throws UnitNotFoundError before doing any work.
 */
export function buildDirective(
  catalog: UnitCatalog,
  unitId: string,
  transcript: Transcript,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): Directive {
  const unit = catalog.getUnit(unitId);

  const coverage = computeCoverage(unit.questions, transcript);
  const facts = inferFacts(transcript, config);
  const remaining = filterQuestions(coverage.remaining, facts, config.references);

  const catalogNext = unit.questions[coverage.nextIndex]?.text ?? "";
  const nextQuestion = remaining.includes(catalogNext)
    ? catalogNext
    : remaining[0] ?? catalogNext;

  return {
    unitId: unit.id,
    remaining,
    nextIndex: coverage.nextIndex,
    nextQuestion,
    covered: coverage.covered,
    prohibited: prohibitedEntities(facts),
  };
}
