// === src/core/search/SearchSession.ts ===
import { invalidArgument } from '../../shared/errors.js';
import { err, ok, type Disposer, type LogContext, type Result } from '../../shared/types.js';
import type { SnapshotSource } from '../buffer/OutputBuffer.js';
import { getLogger, type Logger } from '../logging/logger.js';
import {
  SearchService,
  createSearchQuery,
  type ISearchService,
  type MatchResult,
  type SearchQuery,
  type SearchQueryInput,
} from './SearchService.js';

/** idle: no query · active: query with matches · empty: query with zero matches */
export type SearchStatus = 'idle' | 'active' | 'empty';

export type SearchResultsChanged = Readonly<{
  query: SearchQuery | undefined;
  status: SearchStatus;
  matchCount: number;
  /** cursor index, -1 when no match is selected */
  index: number;
  reason: 'start' | 'invalidate' | 'close';
}>;

export type NavigateToLine = Readonly<{
  match: MatchResult;
  index: number;
  matchCount: number;
}>;

export interface SearchObserver {
  onResultsChanged?(e: SearchResultsChanged): void;
  onNavigate?(e: NavigateToLine): void;
  onInvalidQuery?(e: Readonly<{ query: SearchQuery; error: string }>): void;
}

export type NavigationFailure = 'no-matches' | 'inactive';
export type NavigationResult = Result<NavigateToLine, NavigationFailure>;

export type HighlightKind = 'none' | 'match' | 'current';

export type SearchSessionOptions = {
  service?: ISearchService;
  context?: LogContext;
};

/**
 * Stateful cursor over the last query's matches.
 *
 * {idle} → start → {active|empty, cursor=none} → next/previous → {active, cursor=k}.
 * invalidate() re-queries the current snapshot and keeps the cursor on the
 * same match, or the nearest surviving one by seq.
 */
export class SearchSession {
  private log: Logger;
  private service: ISearchService;
  private observers = new Set<SearchObserver>();

  private _query?: SearchQuery;
  private matches: readonly MatchResult[] = [];
  private index = -1;
  private lastError?: string;
  private seenVersion = -1;

  constructor(
    private source: SnapshotSource,
    opts: SearchSessionOptions = {},
  ) {
    if (!source || typeof source.snapshot !== 'function') {
      throw invalidArgument('SearchSession requires a snapshot source');
    }
    this.service = opts.service ?? new SearchService();
    this.log = getLogger('SearchSession', { ...opts.context, operation: 'search' });
  }

  get query(): SearchQuery | undefined {
    return this._query;
  }

  get status(): SearchStatus {
    if (!this._query) return 'idle';
    return this.matches.length ? 'active' : 'empty';
  }

  get isActive(): boolean {
    return this._query !== undefined;
  }

  get matchCount(): number {
    return this.matches.length;
  }

  get currentIndex(): number {
    return this.index;
  }

  get current(): MatchResult | undefined {
    return this.index >= 0 ? this.matches[this.index] : undefined;
  }

  /** "3/10" style position; current is 1-based, 0 when nothing is selected */
  get position(): { current: number; total: number } {
    return { current: this.index + 1, total: this.matches.length };
  }

  /** Error message of the last query when it could not be compiled */
  get invalidReason(): string | undefined {
    return this.lastError;
  }

  getMatches(): readonly MatchResult[] {
    return this.matches;
  }

  start(input: SearchQuery | SearchQueryInput | string): SearchResultsChanged {
    const q = createSearchQuery(input);
    this._query = q;
    this.index = -1;
    this.run(q, true);
    this.log.debug(`start pattern="${q.pattern}" matches=${this.matches.length}`);
    return this.changed('start');
  }

  next(): NavigationResult {
    return this.move(+1);
  }

  previous(): NavigationResult {
    return this.move(-1);
  }

  /**
   * Re-runs the stored query against a fresh snapshot. A buffer whose version
   * did not move since the last run is not rescanned.
   */
  invalidate(): SearchResultsChanged | undefined {
    const q = this._query;
    if (!q) return undefined;
    if (this.source.version === this.seenVersion) return undefined;

    const prev = this.current;
    this.run(q, false);
    this.index = prev ? this.relocate(prev) : -1;
    return this.changed('invalidate');
  }

  close(): void {
    if (!this._query) return;
    this._query = undefined;
    this.matches = [];
    this.index = -1;
    this.lastError = undefined;
    this.seenVersion = -1;
    this.changed('close');
  }

  /** Matches whose seq falls in [startSeq, startSeq + count) */
  matchesInRange(startSeq: number, count: number): MatchResult[] {
    if (count < 0) throw invalidArgument(`matchesInRange: count must be >= 0 (got ${count})`);
    const end = startSeq + count;
    return this.matches.filter((m) => m.seq >= startSeq && m.seq < end);
  }

  highlightAt(seq: number, column: number): HighlightKind {
    for (let i = 0; i < this.matches.length; i++) {
      const m = this.matches[i];
      if (m.seq > seq) break;
      if (m.seq === seq && column >= m.offset && column < m.offset + m.length) {
        return i === this.index ? 'current' : 'match';
      }
    }
    return 'none';
  }

  subscribe(observer: SearchObserver): Disposer {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  // ── internals ─────────────────────────────────────────────────
  /** An invalid query is reported on start(), and again only if its error text changes */
  private run(q: SearchQuery, announce: boolean) {
    this.seenVersion = this.source.version;
    const prevError = this.lastError;
    const { matches, error } = this.service.execute(this.source.snapshot(), q);
    this.matches = matches;
    this.lastError = error;
    if (error && (announce || error !== prevError)) {
      this.log.warn(`invalid query "${q.pattern}": ${error}`);
      const payload = Object.freeze({ query: q, error });
      this.emit((o) => o.onInvalidQuery?.(payload));
    }
  }

  private move(step: 1 | -1): NavigationResult {
    if (!this._query) return err('inactive');
    const n = this.matches.length;
    if (!n) return err('no-matches');
    if (this.index < 0) this.index = step > 0 ? 0 : n - 1;
    else this.index = (this.index + step + n) % n;

    const nav: NavigateToLine = Object.freeze({
      match: this.matches[this.index],
      index: this.index,
      matchCount: n,
    });
    this.emit((o) => o.onNavigate?.(nav));
    return ok(nav);
  }

  /** Same (seq, offset) if it survived, else nearest by seq (ties → the later match) */
  private relocate(prev: MatchResult): number {
    if (!this.matches.length) return -1;
    let best = 0;
    let bestDist = Infinity;
    for (let i = 0; i < this.matches.length; i++) {
      const m = this.matches[i];
      if (m.seq === prev.seq && m.offset === prev.offset) return i;
      const dist = Math.abs(m.seq - prev.seq);
      if (dist < bestDist || (dist === bestDist && m.seq > prev.seq)) {
        best = i;
        bestDist = dist;
      }
    }
    return best;
  }

  private changed(reason: SearchResultsChanged['reason']): SearchResultsChanged {
    const e: SearchResultsChanged = Object.freeze({
      query: this._query,
      status: this.status,
      matchCount: this.matches.length,
      index: this.index,
      reason,
    });
    this.emit((o) => o.onResultsChanged?.(e));
    return e;
  }

  /** A throwing observer is logged and skipped; the others still get the event */
  private emit(deliver: (o: SearchObserver) => void) {
    for (const o of Array.from(this.observers)) {
      try {
        deliver(o);
      } catch (e) {
        this.log.error('search observer threw', e);
      }
    }
  }
}
