export interface ServiceFailure {
  ok: false;
  status: number;
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

export type ServiceResult<T> = { ok: true; data: T } | ServiceFailure;

export function success<T>(data: T): ServiceResult<T> {
  return { ok: true, data };
}

export function failure(
  status: number,
  error: string,
  message: string,
  details?: Record<string, unknown>
): ServiceFailure {
  return details ? { ok: false, status, error, message, details } : { ok: false, status, error, message };
}
