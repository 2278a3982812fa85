// === src/core/buffer/OutputBuffer.ts ===
import { LINE_MAX_LENGTH, SCROLLBACK_DEFAULT_LINES } from '../../shared/const.js';
import { ErrorCategory, XError, invalidArgument } from '../../shared/errors.js';
import type { Disposer } from '../../shared/types.js';
import { notifyAll } from '../../shared/utils.js';
import { getLogger } from '../logging/logger.js';

export type Line = Readonly<{ seq: number; text: string }>;

export type BufferChange = Readonly<{
  appended: readonly Line[];
  evicted: readonly Line[];
  cleared: boolean;
}>;

export type BufferChangeListener = (change: BufferChange) => void;

export type BufferMetrics = {
  capacity: number;
  count: number;
  firstSeq: number | undefined;
  lastSeq: number | undefined;
  version: number;
};

/** Anything a search can read a consistent view from */
export interface SnapshotSource {
  snapshot(): readonly Line[];
  readonly version: number;
}

export interface IOutputBuffer extends SnapshotSource {
  readonly capacity: number;
  readonly count: number;
  append(text: string): Line;
  appendMany(texts: readonly string[]): Line[];
  getLines(startSeq: number, count: number): Line[];
  getAllText(): string;
  clear(): void;
  subscribe(listener: BufferChangeListener): Disposer;
  getMetrics(): BufferMetrics;
}

/**
 * Bounded append-only scrollback.
 *
 * Storage is a fixed ring; once `capacity` is reached each append overwrites
 * the oldest slot (FIFO eviction). Sequence numbers start at 0 and are never
 * reused, `clear()` included. Each append runs to completion on the event loop
 * and snapshots are frozen copies, so a reader never sees a half-written line.
 */
export class OutputBuffer implements IOutputBuffer {
  readonly capacity: number;
  private ring: Array<Line | undefined>;
  private head = 0; // index of the oldest line
  private size = 0;
  private nextSeq = 0;
  private _version = 0;
  private listeners = new Set<BufferChangeListener>();
  private log = getLogger('OutputBuffer');

  constructor(capacity: number = SCROLLBACK_DEFAULT_LINES) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new XError(
        ErrorCategory.Configuration,
        `OutputBuffer capacity must be a positive integer (got ${capacity})`,
      );
    }
    this.capacity = capacity;
    this.ring = new Array<Line | undefined>(capacity);
  }

  get count() {
    return this.size;
  }

  /** Bumped on every mutation; lets readers skip work on an unchanged buffer */
  get version() {
    return this._version;
  }

  get firstSeq(): number | undefined {
    return this.size ? this.at(0).seq : undefined;
  }

  get lastSeq(): number | undefined {
    return this.size ? this.at(this.size - 1).seq : undefined;
  }

  append(text: string): Line {
    const { appended, evicted } = this.write([text]);
    this.emit({ appended, evicted, cleared: false });
    return appended[0];
  }

  /** Batch append with a single change notice */
  appendMany(texts: readonly string[]): Line[] {
    if (!texts.length) return [];
    const { appended, evicted } = this.write(texts);
    this.emit({ appended, evicted, cleared: false });
    return appended;
  }

  snapshot(): readonly Line[] {
    const out: Line[] = new Array<Line>(this.size);
    for (let i = 0; i < this.size; i++) out[i] = this.at(i);
    return Object.freeze(out);
  }

  /** Lines with seq in [startSeq, startSeq + count) that are still retained */
  getLines(startSeq: number, count: number): Line[] {
    if (!Number.isInteger(startSeq) || !Number.isInteger(count) || count < 0) {
      throw invalidArgument(`getLines(${startSeq}, ${count}): integer seq and count >= 0 expected`);
    }
    const first = this.firstSeq;
    if (first === undefined || count === 0) return [];
    const from = Math.max(startSeq, first) - first;
    const to = Math.min(startSeq + count - first, this.size);
    const out: Line[] = [];
    for (let i = from; i < to; i++) out.push(this.at(i));
    return out;
  }

  getAllText(): string {
    return this.snapshot()
      .map((l) => l.text)
      .join('\n');
  }

  clear() {
    if (!this.size) return;
    this.ring = new Array<Line | undefined>(this.capacity);
    this.head = 0;
    this.size = 0;
    this._version++;
    // nextSeq stays: sequence numbers are never reused
    this.emit({ appended: [], evicted: [], cleared: true });
  }

  subscribe(listener: BufferChangeListener): Disposer {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getMetrics(): BufferMetrics {
    return {
      capacity: this.capacity,
      count: this.size,
      firstSeq: this.firstSeq,
      lastSeq: this.lastSeq,
      version: this._version,
    };
  }

  private write(texts: readonly string[]) {
    // the whole batch is checked before anything is stored
    for (const text of texts) {
      if (typeof text !== 'string') {
        throw invalidArgument(`OutputBuffer.append expects a string (got ${typeof text})`);
      }
    }
    const appended: Line[] = [];
    const evicted: Line[] = [];
    for (const text of texts) {
      const line: Line = Object.freeze({ seq: this.nextSeq++, text: truncateLine(text) });
      if (this.size < this.capacity) {
        this.ring[(this.head + this.size) % this.capacity] = line;
        this.size++;
      } else {
        evicted.push(this.at(0));
        this.ring[this.head] = line;
        this.head = (this.head + 1) % this.capacity;
      }
      appended.push(line);
    }
    this._version++;
    return { appended, evicted };
  }

  private at(i: number): Line {
    const line = this.ring[(this.head + i) % this.capacity];
    if (!line) {
      throw new XError(ErrorCategory.InvalidState, `OutputBuffer slot ${i} is empty`);
    }
    return line;
  }

  private emit(change: BufferChange) {
    notifyAll(this.listeners, change, (e) => this.log.error('change listener threw', e));
  }
}

/** Overlong lines are cut, never rejected; a surrogate pair is not split */
function truncateLine(text: string): string {
  if (text.length <= LINE_MAX_LENGTH) return text;
  let end = LINE_MAX_LENGTH;
  const last = text.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) end--;
  return text.slice(0, end);
}
