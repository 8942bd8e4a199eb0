// backend/src/utils/errors.ts

export type AppErrorCode = "NOT_FOUND" | "GENERATION_FAILED" | "AI_NOT_CONFIGURED";

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: AppErrorCode,
    public readonly status: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnitNotFoundError extends AppError {
  constructor(public readonly unitId: string) {
    super(`Unknown unitId: ${unitId}`, "NOT_FOUND", 404);
  }
}

// One failed generation for one turn. Callers surface it; nobody retries.
export class TransientGenerationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "GENERATION_FAILED", 502, { cause });
  }
}

export class GenerationUnavailableError extends AppError {
  constructor(message = "OPENAI_API_KEY is not set") {
    super(message, "AI_NOT_CONFIGURED", 503);
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
