// backend/src/state/unitCatalog.ts

import type { Unit, UnitQuestion, UnitSummary } from "../types/roleplay";
import { UnitNotFoundError } from "../utils/errors";

export type UnitCatalog = {
  getUnit(unitId: string): Unit;
  getQuestions(unitId: string): readonly string[];
  listUnits(): UnitSummary[];
};

function freezeUnit(unit: Unit): Unit {
  const questions: UnitQuestion[] = unit.questions.map((q) =>
    Object.freeze({ text: q.text, keywords: Object.freeze([...q.keywords]) })
  );
  return Object.freeze({
    ...unit,
    objectives: Object.freeze([...unit.objectives]),
    greetings: Object.freeze([...unit.greetings]),
    partnerQuestions: Object.freeze([...unit.partnerQuestions]),
    questions: Object.freeze(questions),
  });
}

/**
 * Read-only catalog built once from the authored units. Units are copied and
 * frozen so request handlers can share them.
 */
export function createUnitCatalog(units: readonly Unit[]): UnitCatalog {
  const byId = new Map<string, Unit>();
  for (const unit of units) {
    if (byId.has(unit.id)) throw new Error(`Duplicate unit id: ${unit.id}`);
    byId.set(unit.id, freezeUnit(unit));
  }
  const order = [...byId.keys()];

  const getUnit = (unitId: string): Unit => {
    const unit = byId.get((unitId || "").trim());
    if (!unit) throw new UnitNotFoundError(unitId);
    return unit;
  };

  return {
    getUnit,
    getQuestions: (unitId) => getUnit(unitId).questions.map((q) => q.text),
    listUnits: () =>
      order.map((id) => {
        const unit = getUnit(id);
        return {
          id: unit.id,
          title: unit.title,
          objectives: [...unit.objectives],
          totalQuestions: unit.questions.length,
        };
      }),
  };
}
