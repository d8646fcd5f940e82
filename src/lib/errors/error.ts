import type { ErrorCodeType } from '@/lib/errors/error-codes';

/**
 * JSON value type that survives a round-trip through a jsonb column.
 */
export type JsonValue = string | number | boolean | null | { [key: string]: JsonValue } | JsonValue[];

export type ErrorCategory =
  | 'auth'
  | 'config'
  | 'network'
  | 'parse'
  | 'schema'
  | 'conflict'
  | 'not_found'
  | 'remote'
  | 'db'
  | 'unknown';

export type ErrorDetail = {
  field?: string;
  issue?: string;
  message?: string;
};

export type AppError = {
  code: ErrorCodeType;
  category: ErrorCategory;
  message: string;
  retryable: boolean;
  redacted_context?: Record<string, JsonValue>;
  details?: ErrorDetail[];
};

export function isAppError(err: unknown): err is AppError {
  if (!err || typeof err !== 'object') return false;
  // Structural check only; codes are not validated against ErrorCode here.
  return (
    'code' in err &&
    'category' in err &&
    'message' in err &&
    'retryable' in err &&
    typeof err.code === 'string' &&
    typeof err.category === 'string' &&
    typeof err.message === 'string' &&
    typeof err.retryable === 'boolean'
  );
}

export function hasErrorCode(err: unknown, code: ErrorCodeType): err is AppError {
  return isAppError(err) && err.code === code;
}

export function errorMessage(err: unknown): string {
  if (isAppError(err)) return err.message;
  return err instanceof Error ? err.message : String(err);
}

export function toPublicError(err: unknown): AppError {
  if (isAppError(err)) return err;
  return { code: 'INTERNAL_ERROR', category: 'unknown', message: 'Internal error', retryable: false };
}

/** Lossy conversion for attaching arbitrary values to `redacted_context`. */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === 'object') {
    const out: Record<string, JsonValue> = {};
    for (const [key, v] of Object.entries(value)) {
      if (v !== undefined) out[key] = toJsonValue(v);
    }
    return out;
  }
  return String(value);
}
