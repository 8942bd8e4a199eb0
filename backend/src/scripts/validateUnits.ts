// backend/src/scripts/validateUnits.ts

import fs from "fs/promises";
import path from "path";
import { parse as parseYaml } from "yaml";
import { unitFileCandidates } from "../state/unitLoader";
import { validateUnitsDocument } from "../validation/unitValidator";

type Args = {
  files: string[];
};

export function parseArgs(argv: string[]): Args {
  const files: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const key = argv[i];
    const value = argv[i + 1];
    if (key === "--file" && value) {
      files.push(path.resolve(process.cwd(), value));
      i += 1;
    }
  }

  return { files };
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

async function defaultUnitsFile(): Promise<string | null> {
  for (const candidate of unitFileCandidates()) {
    if (await fileExists(candidate)) return candidate;
  }
  return null;
}

export async function validateFile(file: string): Promise<string[]> {
  let raw = "";
  try {
    raw = await fs.readFile(file, "utf8");
  } catch {
    return ["failed to read file"];
  }

  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch {
    return ["invalid YAML"];
  }

  const rel = path.basename(file);
  const result = validateUnitsDocument(doc, rel);
  const prefix = `${rel}: `;
  return result.errors.map((e) => (e.startsWith(prefix) ? e.slice(prefix.length) : e));
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const files = [...args.files];
  if (files.length === 0) {
    const found = await defaultUnitsFile();
    if (!found) {
      console.log("units.yaml not found");
      process.exitCode = 1;
      return;
    }
    files.push(found);
  }

  let failed = false;
  for (const file of files) {
    const errors = await validateFile(file);
    if (errors.length === 0) continue;

    failed = true;
    console.log(file);
    for (const err of errors) {
      console.log(`  - ${err}`);
    }
    console.log("");
  }

  if (!failed) {
    console.log("OK");
    return;
  }
  process.exitCode = 1;
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
