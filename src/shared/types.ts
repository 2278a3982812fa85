export type Ok<T> = { ok: true; value: T };
export type Err<E = unknown> = { ok: false; error: E };
export type Result<T, E = unknown> = Ok<T> | Err<E>;
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/** Unsubscribe handle returned by every subscribe/on* call */
export type Disposer = () => void;

/** Structured log/event correlation, passed explicitly instead of ambient scopes */
export type LogContext = {
  sessionId: string;
  host?: string;
  operation?: string;
};
