// === src/core/connection/__tests__/ConnectionLifecycleController.test.ts ===
import { FakeTransport, settle, type FakeTarget } from '../../../__test__/helpers/fakeTransport.js';
import { ErrorCategory, isXError } from '../../../shared/errors.js';
import { clearBufferedLogs, getBufferedLogs } from '../../logging/logger.js';
import {
  ConnectionLifecycleController,
  type ConnectionStatusEvent,
} from '../ConnectionLifecycleController.js';
import { NO_RETRY_POLICY, createRetryPolicy } from '../RetryPolicy.js';

const TARGET: FakeTarget = { host: 'test-host' };

function setup(policy = createRetryPolicy({ maxAttempts: 3, baseDelayMs: 100, multiplier: 2 })) {
  const transport = new FakeTransport();
  const ctrl = new ConnectionLifecycleController<FakeTarget>({
    transport,
    target: TARGET,
    retryPolicy: policy,
    context: { sessionId: 'sess-1', host: 'test-host' },
  });
  const events: ConnectionStatusEvent[] = [];
  ctrl.subscribe((e) => events.push(e));
  return { transport, ctrl, events };
}

const states = (events: ConnectionStatusEvent[]) => events.map((e) => e.state);

async function rejectionOf(p: Promise<unknown>): Promise<unknown> {
  try {
    await p;
  } catch (e) {
    return e;
  }
  return undefined;
}

describe('ConnectionLifecycleController', () => {
  beforeEach(() => jest.useFakeTimers());
  afterEach(() => jest.useRealTimers());

  it('idle → connecting → connected on success', async () => {
    const { transport, ctrl, events } = setup();
    await expect(ctrl.connect()).resolves.toBe('connected');
    expect(states(events)).toEqual(['connecting', 'connected']);
    expect(events[0].previous).toBe('idle');
    expect(transport.connectCalls).toBe(1);
    expect(Object.isFrozen(events[0])).toBe(true);
    expect(events[1].context).toEqual({ sessionId: 'sess-1', host: 'test-host' });
  });

  it('retries with 100/200/400 ms backoff and fails without a fourth retry', async () => {
    const { transport, ctrl, events } = setup();
    transport.script({ fail: 'refused' }, { fail: 'refused' }, { fail: 'refused' }, { fail: 'refused' });

    await expect(ctrl.connect()).resolves.toBe('reconnecting');
    expect(events[1]).toMatchObject({ state: 'reconnecting', attempt: 1, delayMs: 100, error: 'refused' });

    await jest.advanceTimersByTimeAsync(99);
    expect(transport.connectCalls).toBe(1);
    await jest.advanceTimersByTimeAsync(1);
    await settle();
    expect(transport.connectCalls).toBe(2);
    expect(events[3]).toMatchObject({ state: 'reconnecting', attempt: 2, delayMs: 200 });

    await jest.advanceTimersByTimeAsync(200);
    await settle();
    expect(transport.connectCalls).toBe(3);
    expect(events[5]).toMatchObject({ state: 'reconnecting', attempt: 3, delayMs: 400 });

    await jest.advanceTimersByTimeAsync(400);
    await settle();
    expect(transport.connectCalls).toBe(4);
    expect(ctrl.state).toBe('failed');

    await jest.advanceTimersByTimeAsync(60_000);
    await settle();
    expect(transport.connectCalls).toBe(4);
    expect(states(events)).toEqual([
      'connecting',
      'reconnecting',
      'connecting',
      'reconnecting',
      'connecting',
      'reconnecting',
      'connecting',
      'failed',
    ]);
    expect(events[7].message).toBe('Reconnection failed after 3 attempts');
  });

  it('disconnect() while reconnecting cancels the scheduled retry', async () => {
    const { transport, ctrl, events } = setup();
    transport.script({ fail: 'refused' });
    await ctrl.connect();
    expect(ctrl.state).toBe('reconnecting');

    const p = ctrl.disconnect();
    expect(ctrl.state).toBe('disconnected');
    await p;

    await jest.advanceTimersByTimeAsync(10_000);
    await settle();
    expect(transport.connectCalls).toBe(1);
    expect(states(events)).toEqual(['connecting', 'reconnecting', 'disconnected']);
  });

  it('disconnect() while connecting aborts the attempt and discards its result', async () => {
    const { transport, ctrl, events } = setup();
    transport.script('hang');
    const pending = ctrl.connect();
    expect(ctrl.state).toBe('connecting');

    await ctrl.disconnect();
    expect(transport.lastSignal?.aborted).toBe(true);
    await expect(pending).resolves.toBe('disconnected');

    await jest.advanceTimersByTimeAsync(10_000);
    expect(states(events)).toEqual(['connecting', 'disconnected']);
    expect(transport.disconnectCalls).toBe(1);
  });

  it('overlapping connect() is a no-op returning the current state', async () => {
    const { transport, ctrl } = setup();
    transport.script('hang');
    const first = ctrl.connect();
    await expect(ctrl.connect()).resolves.toBe('connecting');
    expect(transport.connectCalls).toBe(1);

    transport.completePending();
    await expect(first).resolves.toBe('connected');
    await expect(ctrl.connect()).resolves.toBe('connected');
    expect(transport.connectCalls).toBe(1);
  });

  it('unexpected drop from connected reconnects and resets the attempt counter', async () => {
    const { transport, ctrl, events } = setup();
    await ctrl.connect();
    transport.drop('socket hang up');
    expect(events[2]).toMatchObject({
      state: 'reconnecting',
      previous: 'connected',
      attempt: 1,
      delayMs: 100,
      error: 'socket hang up',
    });

    await jest.advanceTimersByTimeAsync(100);
    await settle();
    expect(ctrl.state).toBe('connected');
    expect(ctrl.snapshot().attempt).toBe(0);
  });

  it('clean close from connected goes to disconnected', async () => {
    const { transport, ctrl, events } = setup();
    await ctrl.connect();
    transport.exit(0);
    expect(ctrl.state).toBe('disconnected');
    expect(events[2].message).toBe('Shell exited (0)');
  });

  it('with maxAttempts 0 a drop passes reconnecting → failed at once', async () => {
    const { transport, ctrl, events } = setup(NO_RETRY_POLICY);
    await ctrl.connect();
    transport.drop();
    expect(states(events)).toEqual(['connecting', 'connected', 'reconnecting', 'failed']);
    expect(events[2].attempt).toBe(0);
  });

  it('with maxAttempts 0 a failed first connect fails immediately', async () => {
    const { transport, ctrl, events } = setup(NO_RETRY_POLICY);
    transport.script({ fail: 'no route to host' });
    await expect(ctrl.connect()).resolves.toBe('failed');
    expect(events[1].message).toBe('Connection failed: no route to host');
  });

  it('failed refuses connect() until reset()', async () => {
    const { transport, ctrl } = setup(NO_RETRY_POLICY);
    transport.script({ fail: 'refused' });
    await ctrl.connect();

    const e = await rejectionOf(ctrl.connect());
    expect(isXError(e, ErrorCategory.InvalidState)).toBe(true);

    expect(ctrl.reset()).toBe('idle');
    await expect(ctrl.connect()).resolves.toBe('connected');
  });

  it('reset() is refused while a connection is active', async () => {
    const { ctrl } = setup();
    await ctrl.connect();
    expect(() => ctrl.reset()).toThrow(/Cannot reset while connected/);
  });

  it('disconnect() from idle and from failed lands in disconnected', async () => {
    const idle = setup();
    await expect(idle.ctrl.disconnect()).resolves.toBe('disconnected');
    expect(idle.transport.disconnectCalls).toBe(0);

    const failed = setup(NO_RETRY_POLICY);
    failed.transport.script({ fail: 'x' });
    await failed.ctrl.connect();
    await expect(failed.ctrl.disconnect()).resolves.toBe('disconnected');
  });

  it('queues transitions requested from inside an observer', async () => {
    const { transport, ctrl, events } = setup();
    const seenDuringCallback: string[] = [];
    ctrl.subscribe((e) => {
      if (e.state === 'connecting') {
        ctrl.disconnect().catch(() => undefined);
        seenDuringCallback.push(ctrl.state);
      }
    });

    await expect(ctrl.connect()).resolves.toBe('disconnected');
    expect(seenDuringCallback).toEqual(['connecting']);
    expect(states(events)).toEqual(['connecting', 'disconnected']);
    expect(transport.connectCalls).toBe(1);
  });

  it('a throwing status listener does not block others', async () => {
    const { ctrl, events } = setup();
    ctrl.subscribe(() => {
      throw new Error('listener failure');
    });
    await ctrl.connect();
    expect(states(events)).toEqual(['connecting', 'connected']);
  });

  it('pause() holds a due retry until resume()', async () => {
    const { transport, ctrl, events } = setup();
    transport.script({ fail: 'network down' });
    await ctrl.connect();

    ctrl.pause();
    expect(ctrl.snapshot().paused).toBe(true);
    expect(events[2]).toMatchObject({ state: 'reconnecting', paused: true, message: 'Reconnection paused' });
    await jest.advanceTimersByTimeAsync(5_000);
    expect(transport.connectCalls).toBe(1);

    ctrl.resume();
    await jest.advanceTimersByTimeAsync(100);
    await settle();
    expect(transport.connectCalls).toBe(2);
    expect(ctrl.state).toBe('connected');
  });

  it('write/resize reach the transport only while connected', async () => {
    const { transport, ctrl } = setup();
    expect(ctrl.write('ls\n')).toBe(false);
    await ctrl.connect();
    expect(ctrl.write('ls\n')).toBe(true);
    ctrl.resize(120, 40);
    expect(transport.written).toEqual(['ls\n']);
    expect(transport.sizes).toEqual([[120, 40]]);
    expect(() => ctrl.resize(0, 10)).toThrow(/positive integers/);
  });

  it('forwards transport data while the link is up and drops it afterwards', async () => {
    const { transport, ctrl } = setup();
    const chunks: Array<string | Buffer> = [];
    ctrl.onData((c) => chunks.push(c));
    transport.emitData('before');
    await ctrl.connect();
    transport.emitData('hello');
    await ctrl.disconnect();
    transport.emitData('late');
    expect(chunks).toEqual(['hello']);
  });

  it('dispose() disconnects and detaches from the transport', async () => {
    const { transport, ctrl } = setup();
    await ctrl.connect();
    await ctrl.dispose();
    expect(ctrl.state).toBe('disconnected');
    expect(transport.listenerCount).toBe(0);
    const e = await rejectionOf(ctrl.connect());
    expect(isXError(e, ErrorCategory.InvalidState)).toBe(true);
  });

  it('tags log lines with the session context', async () => {
    clearBufferedLogs();
    const { ctrl } = setup();
    await ctrl.connect();
    const lines = getBufferedLogs().filter((l) => l.includes('[ConnectionLifecycle]'));
    expect(lines.length).toBeGreaterThan(0);
    expect(lines.every((l) => l.includes('{session=sess-1 host=test-host}'))).toBe(true);
  });
});
