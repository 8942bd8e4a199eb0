// backend/src/ai/partnerOutputGuard.ts

const FAREWELL_PATTERNS: RegExp[] = [
  /再见/,
  /拜拜/,
  /回头见/,
  /\bgood\s*bye\b/i,
  /\bbye\b/i,
];

/** The partner apologises with 对不起 only; 抱歉 (很抱歉, 真抱歉 …) is rewritten. */
export function normalizeApologies(text: string): string {
  if (!text) return text;
  return text.replace(/抱歉/g, "对不起");
}

export function isFarewell(message: string): boolean {
  const t = (message || "").trim();
  if (!t) return false;
  return FAREWELL_PATTERNS.some((re) => re.test(t));
}
