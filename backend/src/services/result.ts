export type ErrorCode =
  | "ALREADY_REGISTERED"
  | "USER_NOT_REGISTERED"
  | "INVALID_USER"
  | "INVALID_STAT_NAME"
  | "INVALID_STAT_VALUE"
  | "STAT_NOT_FOUND"
  | "TYPE_MISMATCH"
  | "VALUE_TOO_LONG"
  | "THROTTLED"
  | "INVALID_QUERY"
  | "TRANSPORT_ERROR";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

export function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

export function describeUnknownError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
