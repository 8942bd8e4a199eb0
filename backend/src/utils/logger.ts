// backend/src/utils/logger.ts

type LogLevel = "info" | "warn" | "error";

type LogFields = Record<string, string | number | boolean | undefined>;

function truncate(msg: string, max = 500): string {
  return msg.length > max ? `${msg.slice(0, max)}…` : msg;
}

/** One JSON line per event. Never pass learner text in `fields`. */
export function logEvent(level: LogLevel, msg: string, fields: LogFields = {}): void {
  const line = JSON.stringify({ level, msg, ...fields });
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export function logServerError(context: string, err: unknown, requestId?: string) {
  const rid =
    typeof requestId === "string" && requestId.trim() ? ` requestId=${requestId.trim()}` : "";
  const name = err instanceof Error && err.name ? ` ${err.name}` : "";
  const msg = err instanceof Error ? err.message : String(err || "unknown error");

  console.error(`[${context}]${rid}${name} ${truncate(msg)}`.trim());
}
