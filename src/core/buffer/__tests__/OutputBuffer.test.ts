// === src/core/buffer/__tests__/OutputBuffer.test.ts ===
import { LINE_MAX_LENGTH } from '../../../shared/const.js';
import { ErrorCategory, XError } from '../../../shared/errors.js';
import { OutputBuffer, type BufferChange } from '../OutputBuffer.js';

describe('OutputBuffer', () => {
  it('assigns sequence numbers from 0 in append order', () => {
    const buf = new OutputBuffer(10);
    expect(buf.append('a')).toEqual({ seq: 0, text: 'a' });
    expect(buf.append('b')).toEqual({ seq: 1, text: 'b' });
    expect(buf.count).toBe(2);
    expect(buf.firstSeq).toBe(0);
    expect(buf.lastSeq).toBe(1);
  });

  it('never holds more than capacity and keeps the most recent lines (FIFO)', () => {
    const buf = new OutputBuffer(5);
    for (let i = 0; i < 23; i++) {
      buf.append(`line ${i}`);
      expect(buf.count).toBeLessThanOrEqual(5);
    }
    expect(buf.snapshot().map((l) => l.text)).toEqual([
      'line 18',
      'line 19',
      'line 20',
      'line 21',
      'line 22',
    ]);
    expect(buf.firstSeq).toBe(18);
    expect(buf.lastSeq).toBe(22);
  });

  it('capacity 1 keeps only the last line', () => {
    const buf = new OutputBuffer(1);
    buf.appendMany(['x', 'y', 'z']);
    expect(buf.snapshot()).toEqual([{ seq: 2, text: 'z' }]);
  });

  it('snapshot is frozen and unaffected by later appends', () => {
    const buf = new OutputBuffer(3);
    buf.appendMany(['a', 'b']);
    const snap = buf.snapshot();
    buf.appendMany(['c', 'd']);
    expect(Object.isFrozen(snap)).toBe(true);
    expect(snap.map((l) => l.text)).toEqual(['a', 'b']);
    expect(buf.snapshot().map((l) => l.text)).toEqual(['b', 'c', 'd']);
  });

  it('truncates overlong lines instead of rejecting them', () => {
    const buf = new OutputBuffer(2);
    const line = buf.append('x'.repeat(LINE_MAX_LENGTH + 10));
    expect(line.text.length).toBe(LINE_MAX_LENGTH);
  });

  it('does not split a surrogate pair when truncating', () => {
    const buf = new OutputBuffer(2);
    const text = 'x'.repeat(LINE_MAX_LENGTH - 1) + '\u{1F600}' + 'tail';
    const line = buf.append(text);
    expect(line.text).toBe('x'.repeat(LINE_MAX_LENGTH - 1));
  });

  it('rejects invalid capacity as a configuration error', () => {
    for (const bad of [0, -1, 1.5, Number.NaN]) {
      expect(() => new OutputBuffer(bad)).toThrow(XError);
    }
    try {
      new OutputBuffer(0);
    } catch (e) {
      expect(e).toBeInstanceOf(XError);
      if (e instanceof XError) expect(e.category).toBe(ErrorCategory.Configuration);
    }
  });

  it('clear() empties the buffer but never reuses sequence numbers', () => {
    const buf = new OutputBuffer(4);
    buf.appendMany(['a', 'b', 'c']);
    const v = buf.version;
    buf.clear();
    expect(buf.count).toBe(0);
    expect(buf.firstSeq).toBeUndefined();
    expect(buf.version).toBeGreaterThan(v);
    expect(buf.append('d').seq).toBe(3);
  });

  it('getLines returns the retained part of the requested seq window', () => {
    const buf = new OutputBuffer(3);
    buf.appendMany(['l0', 'l1', 'l2', 'l3', 'l4']); // retains seq 2..4
    expect(buf.getLines(0, 4).map((l) => l.seq)).toEqual([2, 3]);
    expect(buf.getLines(3, 10).map((l) => l.seq)).toEqual([3, 4]);
    expect(buf.getLines(10, 2)).toEqual([]);
    expect(() => buf.getLines(0, -1)).toThrow(XError);
  });

  it('getAllText joins retained lines with newlines', () => {
    const buf = new OutputBuffer(3);
    buf.appendMany(['one', 'two']);
    expect(buf.getAllText()).toBe('one\ntwo');
  });

  it('notifies subscribers with appended and evicted lines', () => {
    const buf = new OutputBuffer(2);
    const changes: BufferChange[] = [];
    const off = buf.subscribe((c) => changes.push(c));
    buf.appendMany(['a', 'b', 'c']);
    buf.clear();
    off();
    buf.append('d');

    expect(changes).toHaveLength(2);
    expect(changes[0].appended.map((l) => l.text)).toEqual(['a', 'b', 'c']);
    expect(changes[0].evicted.map((l) => l.text)).toEqual(['a']);
    expect(changes[1]).toEqual({ appended: [], evicted: [], cleared: true });
  });

  it('rejects non-string input', () => {
    const buf = new OutputBuffer(2);
    expect(() => buf.append(JSON.parse('null'))).toThrow(XError);
  });

  it('stores nothing when any line of a batch is not a string', () => {
    const buf = new OutputBuffer(4);
    buf.append('kept');
    const changes: BufferChange[] = [];
    buf.subscribe((c) => changes.push(c));
    const batch: string[] = ['a', JSON.parse('5')];
    expect(() => buf.appendMany(batch)).toThrow(XError);
    expect(buf.snapshot()).toEqual([{ seq: 0, text: 'kept' }]);
    expect(buf.version).toBe(1);
    expect(changes).toEqual([]);
    expect(buf.append('next').seq).toBe(1);
  });

  it('a throwing subscriber neither fails the append nor starves later subscribers', () => {
    const buf = new OutputBuffer(4);
    const seen: string[] = [];
    buf.subscribe(() => {
      throw new Error('listener failed');
    });
    buf.subscribe((c) => seen.push(...c.appended.map((l) => l.text)));

    expect(buf.append('a')).toEqual({ seq: 0, text: 'a' });
    expect(buf.count).toBe(1);
    expect(seen).toEqual(['a']);
  });

  it('reports metrics', () => {
    const buf = new OutputBuffer(3);
    buf.appendMany(['a', 'b']);
    expect(buf.getMetrics()).toEqual({ capacity: 3, count: 2, firstSeq: 0, lastSeq: 1, version: 1 });
  });
});
