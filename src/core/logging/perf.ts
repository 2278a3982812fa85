// === src/core/logging/perf.ts ===

export function perfNow() {
  const [s, ns] = process.hrtime();
  return s * 1e3 + ns / 1e6;
}

export interface FunctionCall {
  name: string;
  start: number;
  duration: number;
}

export interface FunctionStats {
  count: number;
  totalTime: number;
  avgTime: number;
  maxTime: number;
}

export interface CaptureResult {
  duration: number;
  functionCalls: FunctionCall[];
  functionSummary: Record<string, FunctionStats>;
}

export class PerformanceProfiler {
  private isEnabled = false;
  private isCapturing = false;
  private startTime = 0;
  private functionCalls: FunctionCall[] = [];

  public enable() {
    this.isEnabled = true;
  }

  public disable() {
    this.isEnabled = false;
    this.isCapturing = false;
  }

  /** Fast OFF/ON branch for callers (keeps overhead at zero when off) */
  public isOn(): boolean {
    return this.isEnabled;
  }

  public recordFunctionCall(name: string, start: number, duration: number) {
    if (!this.isEnabled) return;
    this.functionCalls.push({ name, start, duration });
  }

  public startCapture() {
    if (this.isCapturing || !this.isEnabled) return;
    this.isCapturing = true;
    this.startTime = perfNow();
    this.functionCalls = [];
  }

  public stopCapture(): CaptureResult {
    const duration = this.isCapturing ? perfNow() - this.startTime : 0;
    this.isCapturing = false;
    const functionCalls = this.functionCalls;
    this.functionCalls = [];
    return { duration, functionCalls, functionSummary: summarize(functionCalls) };
  }
}

function summarize(calls: FunctionCall[]): Record<string, FunctionStats> {
  const out: Record<string, FunctionStats> = {};
  for (const c of calls) {
    const s = (out[c.name] ??= { count: 0, totalTime: 0, avgTime: 0, maxTime: 0 });
    s.count++;
    s.totalTime += c.duration;
    s.maxTime = Math.max(s.maxTime, c.duration);
  }
  for (const s of Object.values(out)) s.avgTime = s.count ? s.totalTime / s.count : 0;
  return out;
}

export const globalProfiler = new PerformanceProfiler();

export function measureBlock<T>(name: string, fn: () => Promise<T>): Promise<T>;
export function measureBlock<T>(name: string, fn: () => T): T;
export function measureBlock<T>(name: string, fn: () => T | Promise<T>): T | Promise<T> {
  if (!globalProfiler.isOn()) return fn();
  const t0 = perfNow();
  try {
    const r = fn();
    if (r instanceof Promise) {
      return r.finally(() => globalProfiler.recordFunctionCall(name, t0, perfNow() - t0));
    }
    globalProfiler.recordFunctionCall(name, t0, perfNow() - t0);
    return r;
  } catch (e) {
    globalProfiler.recordFunctionCall(name, t0, perfNow() - t0);
    throw e;
  }
}

/** Method decorator: records call timings into globalProfiler while it is on */
export function measure(name?: string) {
  return function <A extends unknown[], R>(
    _target: object,
    propertyKey: string,
    descriptor: TypedPropertyDescriptor<(...args: A) => R>,
  ) {
    const originalMethod = descriptor.value;
    if (!originalMethod) return descriptor;
    const funcName = name || propertyKey;
    descriptor.value = function (this: unknown, ...args: A): R {
      // OFF: run the original straight away, zero timer calls
      if (!globalProfiler.isOn()) return originalMethod.apply(this, args);
      return measureBlock(funcName, () => originalMethod.apply(this, args));
    };
    return descriptor;
  };
}
