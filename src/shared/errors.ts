export type EngineErrorKind =
  | "InvalidInput"
  | "UnsupportedEntityType"
  | "UnsupportedJurisdiction"
  | "ConfigurationError";

const statusByKind: Record<EngineErrorKind, number> = {
  InvalidInput: 400,
  UnsupportedEntityType: 422,
  UnsupportedJurisdiction: 422,
  ConfigurationError: 500
};

export interface ErrorPayload {
  errorKind: EngineErrorKind;
  message: string;
}

export class EngineError extends Error {
  readonly code: EngineErrorKind;
  readonly statusCode: number;
  readonly details: Record<string, unknown> | null;

  constructor(code: EngineErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.statusCode = statusByKind[code];
    this.details = details ?? null;
  }

  toPayload(): ErrorPayload {
    return {
      errorKind: this.code,
      message: this.message
    };
  }
}

export function invalidInput(message: string, details?: Record<string, unknown>): EngineError {
  return new EngineError("InvalidInput", message, details);
}

export function configurationError(message: string, details?: Record<string, unknown>): EngineError {
  return new EngineError("ConfigurationError", message, details);
}

export type ItemResult<T> = { ok: true; value: T } | { ok: false; error: ErrorPayload };

/**
 * Runs one batch item. Engine errors are attached to the item so the rest of the
 * batch continues; anything else is a defect and propagates.
 */
export function settleItem<T>(compute: () => T): ItemResult<T> {
  try {
    return { ok: true, value: compute() };
  } catch (error) {
    if (error instanceof EngineError) {
      return { ok: false, error: error.toPayload() };
    }

    throw error;
  }
}

export async function settleItemAsync<T>(compute: () => Promise<T>): Promise<ItemResult<T>> {
  try {
    return { ok: true, value: await compute() };
  } catch (error) {
    if (error instanceof EngineError) {
      return { ok: false, error: error.toPayload() };
    }

    throw error;
  }
}

export function requireFinite(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw invalidInput(`${field} must be a finite number.`, { field });
  }

  return value;
}

export function requireNonNegative(value: number, field: string): number {
  requireFinite(value, field);
  if (value < 0) {
    throw invalidInput(`${field} must not be negative.`, { field, value });
  }

  return value;
}
