// === src/core/search/SearchService.ts ===
import { invalidArgument } from '../../shared/errors.js';
import { err, ok, type Result } from '../../shared/types.js';
import { escapeRegExp } from '../../shared/utils.js';
import type { Line } from '../buffer/OutputBuffer.js';
import { measure } from '../logging/perf.js';

export type SearchQuery = Readonly<{
  pattern: string;
  caseSensitive: boolean;
  wholeWord: boolean;
  /** pattern is a regular expression instead of literal text */
  regex: boolean;
}>;

export type SearchQueryInput = Partial<Omit<SearchQuery, 'pattern'>> & { pattern: string };

export type MatchResult = Readonly<{
  seq: number;
  offset: number;
  length: number;
  text: string;
}>;

export type SearchOutcome = Readonly<{
  matches: readonly MatchResult[];
  /** set when the query itself is unusable (e.g. bad regex syntax) */
  error?: string;
}>;

export function createSearchQuery(input: SearchQueryInput | string): SearchQuery {
  const q = typeof input === 'string' ? { pattern: input } : input;
  if (typeof q?.pattern !== 'string') {
    throw invalidArgument('SearchQuery.pattern must be a string');
  }
  return Object.freeze({
    pattern: q.pattern,
    caseSensitive: q.caseSensitive ?? false,
    wholeWord: q.wholeWord ?? false,
    regex: q.regex ?? false,
  });
}

export function sameQuery(a: SearchQuery, b: SearchQuery): boolean {
  return (
    a.pattern === b.pattern &&
    a.caseSensitive === b.caseSensitive &&
    a.wholeWord === b.wholeWord &&
    a.regex === b.regex
  );
}

/** Query → global RegExp. Word boundaries are lookarounds so patterns may start/end with punctuation. */
export function compileQuery(q: SearchQuery): Result<RegExp, string> {
  let source = q.regex ? q.pattern : escapeRegExp(q.pattern);
  if (q.wholeWord) source = `(?<![\\w])(?:${source})(?![\\w])`;
  try {
    return ok(new RegExp(source, q.caseSensitive ? 'g' : 'gi'));
  } catch (e) {
    return err(e instanceof Error ? e.message : String(e));
  }
}

export interface ISearchService {
  query(snapshot: readonly Line[], q: SearchQuery): MatchResult[];
  execute(snapshot: readonly Line[], q: SearchQuery): SearchOutcome;
}

/**
 * Stateless scan over a buffer snapshot. Same snapshot + same query → same
 * result; matches within a line never overlap and come out ordered by
 * (seq, offset) because the snapshot is already in seq order.
 */
export class SearchService implements ISearchService {
  query(snapshot: readonly Line[], q: SearchQuery): MatchResult[] {
    return [...this.execute(snapshot, q).matches];
  }

  @measure('SearchService.execute')
  execute(snapshot: readonly Line[], q: SearchQuery): SearchOutcome {
    if (!q.pattern) return { matches: [] };
    const compiled = compileQuery(q);
    if (!compiled.ok) return { matches: [], error: compiled.error };
    const re = compiled.value;

    const matches: MatchResult[] = [];
    for (const line of snapshot) {
      if (!line.text) continue;
      re.lastIndex = 0;
      let m: RegExpExecArray | null;
      while ((m = re.exec(line.text)) !== null) {
        if (m[0].length === 0) {
          // empty regex match: step over it, it is not a result
          re.lastIndex++;
          continue;
        }
        matches.push(
          Object.freeze({ seq: line.seq, offset: m.index, length: m[0].length, text: m[0] }),
        );
      }
    }
    return { matches: Object.freeze(matches) };
  }
}
