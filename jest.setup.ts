/// <reference types="jest" />
import * as fs from 'fs';
import * as path from 'path';

import { globalProfiler, type CaptureResult } from './src/core/logging/perf.js';

const __PERF_ON__ = process.env.PERF === '1';

// ── console.* only while a test is running; late logs after teardown are dropped ──
// Writes go straight to stdout/stderr, bypassing Jest's CustomConsole.
let testActive = false;

const write =
  (stream: NodeJS.WriteStream) =>
  (...args: unknown[]) => {
    if (!testActive) return;
    const msg = args.map((a) => (typeof a === 'string' ? a : JSON.stringify(a))).join(' ');
    stream.write(msg + '\n');
  };

console.log = write(process.stdout);
console.info = write(process.stdout);
console.debug = write(process.stdout);
console.warn = write(process.stderr);
console.error = write(process.stderr);

beforeAll(() => {
  testActive = true;
});
beforeEach(() => {
  testActive = true;
});
afterEach(() => {
  testActive = false;
});

// ── PERF=1: profile the whole test file and print a summary ──────────
beforeAll(() => {
  if (!__PERF_ON__) return;
  globalProfiler.enable();
  globalProfiler.startCapture();
});

afterAll(() => {
  if (!__PERF_ON__) return;
  testActive = true;
  const result = globalProfiler.stopCapture();
  globalProfiler.disable();
  printSummary(result);
  if (process.env.PERF_JSON === '1') writeJson(result);
  testActive = false;
});

function printSummary(result: CaptureResult) {
  const top = Object.entries(result.functionSummary)
    .map(([name, s]) => ({
      name,
      calls: s.count,
      total_ms: s.totalTime.toFixed(1),
      avg_ms: s.avgTime.toFixed(2),
      max_ms: s.maxTime.toFixed(1),
    }))
    .sort((a, b) => Number(b.total_ms) - Number(a.total_ms))
    .slice(0, 15);
  console.log('\n=== PERF (node/jest) ===');
  console.log(`duration: ${result.duration.toFixed(1)} ms`);
  for (const r of top) {
    console.log(`${r.name}  calls=${r.calls} total=${r.total_ms}ms avg=${r.avg_ms}ms max=${r.max_ms}ms`);
  }
}

// <repo>/src/__test__/out/perf/perf-<test>-<worker>-<pid>.json
function writeJson(result: CaptureResult) {
  const testPath = expect.getState().testPath;
  const testBase = testPath ? path.basename(testPath).replace(/\.[^.]+$/, '') : 'unknown';
  const outDir = process.env.PERF_JSON_DIR
    ? path.resolve(process.env.PERF_JSON_DIR)
    : path.resolve(process.cwd(), 'src', '__test__', 'out', 'perf');
  fs.mkdirSync(outDir, { recursive: true });
  const outPath = path.join(
    outDir,
    `perf-${testBase}-w${process.env.JEST_WORKER_ID ?? '0'}-pid${process.pid}.json`,
  );
  const payload = {
    schema: 'ssh-scrollback-core.perf.v1',
    ts: Date.now(),
    node: process.versions.node,
    perf: result,
  };
  fs.writeFileSync(outPath, JSON.stringify(payload, null, 2), 'utf8');
}
