import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../../src/core/logging/index.js';
import { ResourceWatcher, type WatchPhase } from '../../src/runtime/resource-watcher.js';
import { FakeWatch } from '../helpers/fake-watch.js';

const logger = createLogger({ level: 'fatal' });

describe('ResourceWatcher', () => {
  let watches: FakeWatch[];
  let failures: Array<Error | undefined>;
  let events: Array<[WatchPhase, unknown]>;

  function createWatcher(onEvent?: (phase: WatchPhase, object: unknown) => void) {
    return new ResourceWatcher({
      path: '/apis/certops.io/v1alpha1/certificates',
      watchFactory: () => {
        const watch = new FakeWatch(failures.shift());
        watches.push(watch);
        return watch;
      },
      onEvent: onEvent ?? ((phase, object) => events.push([phase, object])),
      logger,
      timeoutSeconds: 300,
      reconnect: { baseDelayMs: 1000, maxDelayMs: 30_000 },
    });
  }

  function lastWatch(): FakeWatch {
    const watch = watches.at(-1);
    if (!watch) {
      throw new Error('no watch opened');
    }
    return watch;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    watches = [];
    failures = [];
    events = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should watch the collection with bookmarks and a timeout', async () => {
    const watcher = createWatcher();
    watcher.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(watches).toHaveLength(1);
    expect(lastWatch().path).toBe('/apis/certops.io/v1alpha1/certificates');
    expect(lastWatch().params).toEqual({ allowWatchBookmarks: true, timeoutSeconds: 300 });
    watcher.stop();
  });

  it('should forward object events and skip bookmarks, errors and unknown types', async () => {
    const watcher = createWatcher();
    watcher.start();
    await vi.advanceTimersByTimeAsync(0);

    const object = { metadata: { name: 'web' } };
    lastWatch().emit('ADDED', object);
    lastWatch().emit('BOOKMARK', { metadata: { resourceVersion: '12' } });
    lastWatch().emit('ERROR', { message: 'too old resource version' });
    lastWatch().emit('SYNCED', object);
    lastWatch().emit('DELETED', object);

    expect(events).toEqual([
      ['ADDED', object],
      ['DELETED', object],
    ]);
    watcher.stop();
  });

  it('should keep watching when the event handler throws', async () => {
    const onEvent = vi.fn(() => {
      throw new Error('handler failed');
    });
    const watcher = createWatcher(onEvent);
    watcher.start();
    await vi.advanceTimersByTimeAsync(0);

    lastWatch().emit('ADDED', {});
    lastWatch().emit('MODIFIED', {});

    expect(onEvent).toHaveBeenCalledTimes(2);
    watcher.stop();
  });

  it('should reconnect at once after a clean close', async () => {
    const watcher = createWatcher();
    watcher.start();
    await vi.advanceTimersByTimeAsync(0);

    lastWatch().end();
    await vi.advanceTimersByTimeAsync(0);

    expect(watches).toHaveLength(2);
    expect(watcher.attempts).toBe(0);
    watcher.stop();
  });

  it('should back off exponentially after errors', async () => {
    const watcher = createWatcher();
    watcher.start();
    await vi.advanceTimersByTimeAsync(0);

    lastWatch().end(new Error('connection reset'));
    expect(watcher.attempts).toBe(1);
    await vi.advanceTimersByTimeAsync(999);
    expect(watches).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(watches).toHaveLength(2);

    lastWatch().end(new Error('connection reset'));
    expect(watcher.attempts).toBe(2);
    await vi.advanceTimersByTimeAsync(1999);
    expect(watches).toHaveLength(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(watches).toHaveLength(3);
    watcher.stop();
  });

  it('should reset the attempt count once events arrive', async () => {
    const watcher = createWatcher();
    watcher.start();
    await vi.advanceTimersByTimeAsync(0);

    lastWatch().end(new Error('connection reset'));
    await vi.advanceTimersByTimeAsync(1000);
    lastWatch().emit('ADDED', { metadata: { name: 'web' } });

    expect(watcher.attempts).toBe(0);
    watcher.stop();
  });

  it('should treat a failed connection like an error', async () => {
    failures = [new Error('connect ECONNREFUSED')];
    const watcher = createWatcher();
    watcher.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(watcher.attempts).toBe(1);
    await vi.advanceTimersByTimeAsync(1000);
    expect(watches).toHaveLength(2);
    watcher.stop();
  });

  it('should abort the connection and stay stopped', async () => {
    const watcher = createWatcher();
    watcher.start();
    await vi.advanceTimersByTimeAsync(0);
    const watch = lastWatch();

    watcher.stop();
    watch.end(new Error('aborted'));
    await vi.advanceTimersByTimeAsync(60_000);

    expect(watch.controller.signal.aborted).toBe(true);
    expect(watches).toHaveLength(1);
  });
});
