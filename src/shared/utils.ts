// === src/shared/utils.ts ===

export function safeJson<T>(v: T): string {
  try {
    return JSON.stringify(v);
  } catch {
    return String(v);
  }
}

/** JSON parse that returns undefined instead of throwing */
export function safeParseJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

export function clamp(n: number, a: number, b: number) {
  return Math.max(a, Math.min(b, n));
}

/** Escape a literal for use inside a RegExp source */
export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Fire every listener; a throwing listener must not starve the others */
export function notifyAll<T>(
  listeners: Iterable<(value: T) => void>,
  value: T,
  onError: (e: unknown) => void,
) {
  for (const l of Array.from(listeners)) {
    try {
      l(value);
    } catch (e) {
      onError(e);
    }
  }
}
