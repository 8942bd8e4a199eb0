// backend/src/services/__tests__/familyComposition.test.ts

import { describe, it, expect } from "vitest";
import { DEFAULT_COMPOSITION_CONFIG } from "../../content/familyRules";
import type { FactTable } from "../../types/roleplay";
import { emptyFactTable, extractFacts } from "../factExtractor";
import { matchCompositionPattern, resolveComposition } from "../familyComposition";
import { partner, student } from "./fixtures";

function resolve(...texts: string[]): FactTable {
  const transcript = texts.map(student);
  return resolveComposition(extractFacts(transcript), transcript);
}

describe("composition patterns", () => {
  it("enumerates every zero-to-three sibling combination once", () => {
    const patterns = DEFAULT_COMPOSITION_CONFIG.patterns;
    const bySize = (size: number) => patterns.filter((p) => p.size === size).length;

    expect(patterns).toHaveLength(15);
    expect([bySize(3), bySize(4), bySize(5), bySize(6)]).toEqual([1, 4, 6, 4]);
    for (const p of patterns) expect(p.size).toBe(3 + p.siblings.length);
  });

  it("matches size plus exact enumeration", () => {
    expect(matchCompositionPattern("我家有四口人爸爸妈妈姐姐和我")).toEqual({
      size: 4,
      siblings: ["hasOlderSister"],
    });
    expect(matchCompositionPattern("我家有五口人爸爸妈妈姐姐和我")).toBeNull();
  });
});

describe("resolveComposition", () => {
  it("resolves parents-and-me households to no siblings", () => {
    expect(resolve("我家有三口人爸爸妈妈和我")).toEqual({
      hasOlderBrother: "asserted_absent",
      hasYoungerBrother: "asserted_absent",
      hasOlderSister: "asserted_absent",
      hasYoungerSister: "asserted_absent",
      hasPet: "unknown",
    });
  });

  it("keeps the one named sibling and rules out the rest", () => {
    expect(resolve("我家有四口人爸爸妈妈姐姐和我")).toEqual({
      hasOlderBrother: "asserted_absent",
      hasYoungerBrother: "asserted_absent",
      hasOlderSister: "asserted_present",
      hasYoungerSister: "asserted_absent",
      hasPet: "unknown",
    });
  });

  it("resolves two- and three-sibling households", () => {
    expect(resolve("我家有五口人：爸爸、妈妈、哥哥、妹妹和我。")).toEqual({
      hasOlderBrother: "asserted_present",
      hasYoungerBrother: "asserted_absent",
      hasOlderSister: "asserted_absent",
      hasYoungerSister: "asserted_present",
      hasPet: "unknown",
    });

    expect(resolve("我家有六口人，爸爸妈妈哥哥弟弟姐姐和我")).toEqual({
      hasOlderBrother: "asserted_present",
      hasYoungerBrother: "asserted_present",
      hasOlderSister: "asserted_present",
      hasYoungerSister: "asserted_absent",
      hasPet: "unknown",
    });
  });

  it("leaves facts alone when the count does not fit the list", () => {
    expect(resolve("我家有五口人爸爸妈妈姐姐和我")).toEqual(emptyFactTable());
  });

  it("leaves facts alone when two household sizes are stated", () => {
    expect(resolve("我家有三口人。", "不对，我家有四口人爸爸妈妈姐姐和我")).toEqual(
      emptyFactTable()
    );
  });

  it("needs both parents and the learner in the list", () => {
    expect(resolve("我家有四口人，姐姐和我")).toEqual(emptyFactTable());
  });

  it("keeps an extractor denial for a named sibling", () => {
    const facts = resolve("我没有姐姐。", "我家有四口人爸爸妈妈姐姐和我");
    expect(facts.hasOlderSister).toBe("asserted_absent");
    expect(facts.hasOlderBrother).toBe("asserted_absent");
  });

  it("treats a no-siblings declaration as ruling out every sibling", () => {
    const input: FactTable = { ...emptyFactTable(), hasOlderBrother: "asserted_present", hasPet: "asserted_present" };
    const out = resolveComposition(input, [student("我是独生子女。")]);

    expect(out).toEqual({
      hasOlderBrother: "asserted_absent",
      hasYoungerBrother: "asserted_absent",
      hasOlderSister: "asserted_absent",
      hasYoungerSister: "asserted_absent",
      hasPet: "asserted_present",
    });
    expect(input.hasOlderBrother).toBe("asserted_present");
  });

  it("ignores the partner's own family description", () => {
    const transcript = [partner("我家有三口人爸爸妈妈和我")];
    expect(resolveComposition(emptyFactTable(), transcript)).toEqual(emptyFactTable());
  });
});
