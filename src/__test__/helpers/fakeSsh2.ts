import { EventEmitter } from 'events';

/** Stand-in for an ssh2 shell channel */
export class FakeChannel extends EventEmitter {
  stderr = new EventEmitter();
  write = jest.fn();
  setWindow = jest.fn();
  end = jest.fn();
}

export const fakeClients: FakeClient[] = [];

/**
 * Stand-in for ssh2's Client. Nothing touches the network: tests drive
 * 'ready' / 'error' / 'close' by emitting them.
 */
export class FakeClient extends EventEmitter {
  config?: unknown;
  shellOptions?: unknown;
  shellError?: Error;
  channel?: FakeChannel;

  connect = jest.fn((config: unknown) => {
    this.config = config;
  });

  end = jest.fn(() => {
    this.emit('close');
  });

  shell = jest.fn((options: unknown, cb: (err: Error | undefined, channel: FakeChannel) => void) => {
    this.shellOptions = options;
    const channel = new FakeChannel();
    if (this.shellError) {
      cb(this.shellError, channel);
      return;
    }
    this.channel = channel;
    cb(undefined, channel);
  });

  constructor() {
    super();
    fakeClients.push(this);
  }
}

export function lastClient(): FakeClient {
  const c = fakeClients[fakeClients.length - 1];
  if (!c) throw new Error('no ssh client was created');
  return c;
}

export function resetFakeSsh() {
  fakeClients.length = 0;
}
