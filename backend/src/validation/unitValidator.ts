// backend/src/validation/unitValidator.ts

import type { Unit, UnitQuestion } from "../types/roleplay";

type ValidationResult = { ok: boolean; errors: string[] };

export type ParseUnitsResult =
  | { ok: true; units: Unit[] }
  | { ok: false; errors: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

const UNIT_ID_RE = /^[A-Za-z0-9_-]{1,40}$/;

export function parseUnitsDocument(input: unknown, sourcePath: string): ParseUnitsResult {
  const errors: string[] = [];

  const pushError = (path: string, message: string) => {
    errors.push(`${sourcePath}: ${path} ${message}`);
  };

  if (!isRecord(input) || !Array.isArray(input.units)) {
    return { ok: false, errors: [`${sourcePath}: units must be an array`] };
  }
  if (input.units.length === 0) {
    return { ok: false, errors: [`${sourcePath}: units must not be empty`] };
  }

  const seenIds = new Set<string>();
  const units: Unit[] = [];

  input.units.forEach((raw: unknown, ui: number) => {
    const at = `units[${ui}]`;
    if (!isRecord(raw)) {
      pushError(at, "must be an object");
      return;
    }

    const id = isNonEmptyString(raw.id) ? raw.id.trim() : "";
    if (!id) {
      pushError(`${at}.id`, "is required");
    } else if (!UNIT_ID_RE.test(id)) {
      pushError(`${at}.id`, "must use letters, digits, '-' or '_' only");
    } else if (seenIds.has(id)) {
      pushError(`${at}.id`, `duplicates "${id}"`);
    } else {
      seenIds.add(id);
    }

    if (!isNonEmptyString(raw.title)) pushError(`${at}.title`, "is required");

    const stringList = (field: string, value: unknown, required: boolean): string[] => {
      if (value === undefined || value === null) {
        if (required) pushError(`${at}.${field}`, "must be a non-empty array");
        return [];
      }
      if (!Array.isArray(value)) {
        pushError(`${at}.${field}`, "must be an array");
        return [];
      }
      const out: string[] = [];
      value.forEach((entry: unknown, i: number) => {
        if (!isNonEmptyString(entry)) {
          pushError(`${at}.${field}[${i}]`, "must be a non-empty string");
          return;
        }
        out.push(entry.trim());
      });
      if (required && out.length === 0) pushError(`${at}.${field}`, "must be a non-empty array");
      return out;
    };

    const objectives = stringList("objectives", raw.objectives, false);
    const greetings = stringList("greetings", raw.greetings, true);
    const partnerQuestions = stringList("partnerQuestions", raw.partnerQuestions, false);

    if (raw.roleplayGuidance !== undefined && typeof raw.roleplayGuidance !== "string") {
      pushError(`${at}.roleplayGuidance`, "must be a string");
    }
    const roleplayGuidance =
      typeof raw.roleplayGuidance === "string" ? raw.roleplayGuidance.trim() : "";

    const questions: UnitQuestion[] = [];
    if (!Array.isArray(raw.questions) || raw.questions.length === 0) {
      pushError(`${at}.questions`, "must be a non-empty array");
    } else {
      const seenText = new Set<string>();
      raw.questions.forEach((q: unknown, qi: number) => {
        const qAt = `${at}.questions[${qi}]`;
        if (!isRecord(q)) {
          pushError(qAt, "must be an object");
          return;
        }
        if (!isNonEmptyString(q.text)) {
          pushError(`${qAt}.text`, "is required");
          return;
        }
        const text = q.text.trim();
        if (seenText.has(text)) pushError(`${qAt}.text`, "duplicates an earlier question");
        seenText.add(text);

        const keywords: string[] = [];
        if (q.keywords !== undefined) {
          if (!Array.isArray(q.keywords)) {
            pushError(`${qAt}.keywords`, "must be an array");
          } else {
            q.keywords.forEach((k: unknown, ki: number) => {
              if (isNonEmptyString(k)) keywords.push(k.trim());
              else pushError(`${qAt}.keywords[${ki}]`, "must be a non-empty string");
            });
          }
        }
        questions.push({ text, keywords });
      });
    }

    units.push({
      id,
      title: isNonEmptyString(raw.title) ? raw.title.trim() : "",
      objectives,
      greetings,
      roleplayGuidance,
      partnerQuestions,
      questions,
    });
  });

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, units };
}

export function validateUnitsDocument(input: unknown, sourcePath: string): ValidationResult {
  const result = parseUnitsDocument(input, sourcePath);
  return result.ok ? { ok: true, errors: [] } : { ok: false, errors: result.errors };
}
