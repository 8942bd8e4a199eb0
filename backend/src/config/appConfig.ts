//backend/src/config/appConfig.ts

function readInt(name: string, fallback: number, min = 1): number {
  const raw = String(process.env[name] || "").trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) return fallback;
  return Math.max(min, Math.trunc(n));
}

function readString(name: string, fallback = ""): string {
  const raw = String(process.env[name] || "").trim();
  return raw || fallback;
}

export function getPort(): number {
  return readInt("PORT", 3000);
}

export function getMaxTurnChars(): number {
  return readInt("MAX_TURN_CHARS", 600);
}

export function getMaxHistoryTurns(): number {
  return readInt("MAX_HISTORY_TURNS", 60);
}

export function getGenerationTimeoutMs(): number {
  return readInt("GENERATION_TIMEOUT_MS", 20_000, 1000);
}

export function getOpenAIModel(): string {
  return readString("OPENAI_MODEL", "gpt-4o-mini");
}

export function getOpenAIKey(): string {
  return readString("OPENAI_API_KEY");
}

export function getAppVersion(): string {
  return readString("APP_VERSION", "1.0.0");
}

export function getUnitsFileOverride(): string {
  return readString("UNITS_FILE");
}

/** Empty list means "any origin". */
export function getAllowedOrigins(): string[] {
  return readString("ALLOWED_ORIGINS")
    .split(",")
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
}

/** Shared secret for the role-play API; empty leaves it open (local dev). */
export function getAuthToken(): string {
  return readString("AUTH_TOKEN");
}
