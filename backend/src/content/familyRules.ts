// backend/src/content/familyRules.ts

import type { FactKey, FamilyEntity, SiblingFactKey } from "../types/roleplay";

export type FactPolarity = "negation" | "affirmation";

export type FactRule = {
  fact: FactKey;
  polarity: FactPolarity;
  pattern: RegExp;
};

export type CompositionPattern = {
  size: number;
  siblings: readonly SiblingFactKey[];
};

export type CompositionConfig = {
  siblingTerms: Readonly<Record<SiblingFactKey, string>>;
  parentAndSelfTerms: readonly string[];
  sizeTokens: Readonly<Record<number, readonly string[]>>;
  noSiblingPhrases: readonly string[];
  patterns: readonly CompositionPattern[];
};

export type EntityReference = {
  term: string;
  facts: readonly FactKey[];
};

export const SIBLING_KEYS: readonly SiblingFactKey[] = Object.freeze([
  "hasOlderBrother",
  "hasYoungerBrother",
  "hasOlderSister",
  "hasYoungerSister",
]);

export const FACT_KEYS: readonly FactKey[] = Object.freeze([...SIBLING_KEYS, "hasPet"]);

export const SIBLING_TERMS: Readonly<Record<SiblingFactKey, string>> = Object.freeze({
  hasOlderBrother: "哥哥",
  hasYoungerBrother: "弟弟",
  hasOlderSister: "姐姐",
  hasYoungerSister: "妹妹",
});

export const FACT_ENTITIES: Readonly<Record<FactKey, FamilyEntity>> = Object.freeze({
  hasOlderBrother: "older_brother",
  hasYoungerBrother: "younger_brother",
  hasOlderSister: "older_sister",
  hasYoungerSister: "younger_sister",
  hasPet: "pet",
});

export const ENTITY_TERMS: Readonly<Record<FamilyEntity, string>> = Object.freeze({
  older_brother: "哥哥",
  younger_brother: "弟弟",
  older_sister: "姐姐",
  younger_sister: "妹妹",
  pet: "宠物",
});

// 两个, 3只 ... A question word (几个) is not a count.
const COUNT = "[一二两三四五六七八九十\\d]+";
const ANIMAL = "[猫狗鸟鱼]";
// Possession wording directly after 没/不 (没有养…, 不养…) is part of a denial.
const NOT_NEGATED = "(?<![没不]\\s*有?\\s*)";

function siblingRules(fact: SiblingFactKey): FactRule[] {
  const term = SIBLING_TERMS[fact];
  return [
    { fact, polarity: "negation", pattern: new RegExp(`我\\s*没\\s*有\\s*${term}`) },
    { fact, polarity: "negation", pattern: new RegExp(`没\\s*有?\\s*${term}`) },
    { fact, polarity: "affirmation", pattern: new RegExp(`我\\s*有\\s*${term}`) },
    { fact, polarity: "affirmation", pattern: new RegExp(`有\\s*${term}`) },
    { fact, polarity: "affirmation", pattern: new RegExp(`有\\s*${COUNT}\\s*个\\s*${term}`) },
  ];
}

/**
 * Ordered fact rules. The extractor evaluates every negation rule of a fact
 * before any affirmation rule of that fact, so "没有哥哥" stays absent even
 * though "有哥哥" is a substring of it.
 */
export const DEFAULT_FACT_RULES: readonly FactRule[] = Object.freeze([
  ...siblingRules("hasOlderBrother"),
  ...siblingRules("hasYoungerBrother"),
  ...siblingRules("hasOlderSister"),
  ...siblingRules("hasYoungerSister"),
  { fact: "hasPet", polarity: "negation", pattern: /没\s*有?\s*宠物/ },
  { fact: "hasPet", polarity: "negation", pattern: /[没不]\s*有?\s*养\s*了?\s*宠物/ },
  { fact: "hasPet", polarity: "affirmation", pattern: /有\s*宠物/ },
  { fact: "hasPet", polarity: "affirmation", pattern: new RegExp(`${NOT_NEGATED}养\\s*了?\\s*宠物`) },
  {
    fact: "hasPet",
    polarity: "affirmation",
    pattern: new RegExp(`${NOT_NEGATED}(?:有|养\\s*了?)\\s*${COUNT}\\s*[只条]\\s*${ANIMAL}`),
  },
] satisfies FactRule[]);

/**
 * Every sibling combination of zero to three categories, each paired with the
 * household size it implies (two parents, the learner, the named siblings).
 */
function enumerateCompositionPatterns(): CompositionPattern[] {
  const patterns: CompositionPattern[] = [];
  const total = 1 << SIBLING_KEYS.length;
  for (let mask = 0; mask < total; mask += 1) {
    const siblings = SIBLING_KEYS.filter((_, i) => (mask & (1 << i)) !== 0);
    if (siblings.length > 3) continue;
    patterns.push({ size: 3 + siblings.length, siblings: Object.freeze(siblings) });
  }
  return patterns.sort((a, b) => a.size - b.size);
}

const HOUSEHOLD_SIZE_TOKENS: Readonly<Record<number, readonly string[]>> = {
  3: ["三口人", "三个人", "3口人", "3个人"],
  4: ["四口人", "四个人", "4口人", "4个人"],
  5: ["五口人", "五个人", "5口人", "5个人"],
  6: ["六口人", "六个人", "6口人", "6个人"],
};

export const DEFAULT_COMPOSITION_CONFIG: CompositionConfig = Object.freeze({
  siblingTerms: SIBLING_TERMS,
  parentAndSelfTerms: Object.freeze(["爸爸", "妈妈", "我"]),
  sizeTokens: HOUSEHOLD_SIZE_TOKENS,
  noSiblingPhrases: Object.freeze(["没有兄弟姐妹", "没兄弟姐妹", "独生子", "独生女"]),
  patterns: Object.freeze(enumerateCompositionPatterns()),
});

// "兄弟姐妹" is only off-limits once every sibling category is known absent.
export const DEFAULT_ENTITY_REFERENCES: readonly EntityReference[] = Object.freeze([
  { term: "兄弟姐妹", facts: SIBLING_KEYS },
  { term: "哥哥", facts: ["hasOlderBrother"] },
  { term: "弟弟", facts: ["hasYoungerBrother"] },
  { term: "姐姐", facts: ["hasOlderSister"] },
  { term: "妹妹", facts: ["hasYoungerSister"] },
  { term: "宠物", facts: ["hasPet"] },
] satisfies EntityReference[]);
