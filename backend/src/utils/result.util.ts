import { ServiceErrorKind, ServiceResult } from '../types';

export const ok = <T>(value: T): ServiceResult<T> => ({ ok: true, value });

export const fail = <T = never>(kind: ServiceErrorKind, message: string): ServiceResult<T> => ({
  ok: false,
  error: { kind, message }
});
