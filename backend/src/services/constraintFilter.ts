// backend/src/services/constraintFilter.ts

import {
  DEFAULT_ENTITY_REFERENCES,
  FACT_ENTITIES,
  FACT_KEYS,
  type EntityReference,
} from "../content/familyRules";
import type { FactTable, FamilyEntity } from "../types/roleplay";

export function referencesAbsentEntity(
  question: string,
  facts: FactTable,
  references: readonly EntityReference[] = DEFAULT_ENTITY_REFERENCES
): boolean {
  return references.some(
    (ref) =>
      question.includes(ref.term) &&
      ref.facts.length > 0 &&
      ref.facts.every((key) => facts[key] === "asserted_absent")
  );
}

/**
 * Drops questions about anything the learner said they don't have. When every
 * question would be dropped, the input list comes back unchanged.
 */
export function filterQuestions(
  questions: readonly string[],
  facts: FactTable,
  references: readonly EntityReference[] = DEFAULT_ENTITY_REFERENCES
): string[] {
  const allowed = questions.filter((q) => !referencesAbsentEntity(q, facts, references));
  return allowed.length > 0 ? allowed : [...questions];
}

export function prohibitedEntities(facts: FactTable): FamilyEntity[] {
  return FACT_KEYS.filter((key) => facts[key] === "asserted_absent").map(
    (key) => FACT_ENTITIES[key]
  );
}
