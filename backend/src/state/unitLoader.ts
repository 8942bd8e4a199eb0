// src/state/unitLoader.ts

import fs from "fs";
import path from "path";
import { parse as parseYaml } from "yaml";
import { parseUnitsDocument } from "../validation/unitValidator";
import type { Unit } from "../types/roleplay";

export const UNITS_FILE_NAME = "units.yaml";

export function unitFileCandidates(override?: string): string[] {
  // An explicit path is the only candidate.
  const explicit = (override || "").trim();
  if (explicit) return [path.resolve(process.cwd(), explicit)];

  const candidates: string[] = [];
  candidates.push(
    //preferred: beside the compiled/loaded module
    path.resolve(__dirname, "..", "units", UNITS_FILE_NAME),
    //fallbacks for running from the repo root or from backend/
    path.join(process.cwd(), "backend", "src", "units", UNITS_FILE_NAME),
    path.join(process.cwd(), "src", "units", UNITS_FILE_NAME)
  );
  return candidates;
}

export function parseUnitsYaml(source: string, sourcePath: string): Unit[] {
  let doc: unknown;
  try {
    doc = parseYaml(source);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${sourcePath}: invalid YAML (${msg})`);
  }

  const result = parseUnitsDocument(doc, sourcePath);
  if (!result.ok) {
    throw new Error(`Invalid unit catalog:\n- ${result.errors.join("\n- ")}`);
  }
  return result.units;
}

/**
 * Load the unit catalog once at startup. Throws when the file is missing or
 * invalid: the server has nothing to serve without it.
 */
export function loadUnits(override?: string): Unit[] {
  const candidates = unitFileCandidates(override);
  const unitsPath = candidates.find((p) => fs.existsSync(p));
  if (!unitsPath) {
    throw new Error(`[unitLoader] ${UNITS_FILE_NAME} not found. Tried: ${candidates.join(", ")}`);
  }

  const source = fs.readFileSync(unitsPath, "utf-8");
  return parseUnitsYaml(source, unitsPath);
}
