// === src/shared/errors.ts ===
export enum ErrorCategory {
  Configuration = 'CONFIGURATION',
  Connection = 'CONNECTION',
  Transport = 'TRANSPORT',
  InvalidArgument = 'INVALID_ARGUMENT',
  InvalidState = 'INVALID_STATE',
  Timeout = 'TIMEOUT',
  Unknown = 'UNKNOWN',
}

export class XError extends Error {
  constructor(
    public category: ErrorCategory,
    message: string,
    public detail?: unknown,
  ) {
    super(message);
    this.name = `XError/${category}`;
  }
}

export function isXError(e: unknown, category?: ErrorCategory): e is XError {
  return e instanceof XError && (category === undefined || e.category === category);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Fail fast on programming errors at public entry points */
export function invalidArgument(message: string, detail?: unknown): XError {
  return new XError(ErrorCategory.InvalidArgument, message, detail);
}
