/**
 * Collection Loader Tests
 *
 * Scheduling, cancellation, cursor bookkeeping and delegate notifications
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  ConcurrentLoadBehavior,
  LoadReason,
  describePageLoad,
  type LoadCancelledEvent,
  type LoadFinishedEvent,
  type LoadQueuedEvent,
  type LoadSkippedEvent,
  type LoadStartedEvent,
} from '@pageflow/shared';
import { CollectionLoader } from '../collection-loader.js';
import { ConstructionError } from '../../errors.js';
import { ConcurrentExecutor, SerialExecutor } from '../../pipeline/executors.js';
import { Task } from '../../pipeline/task.js';
import { FakeHelper, RecordingDelegate, sleep, type FakePage, type FakeResults } from './test-helpers.js';

describe('CollectionLoader', () => {
  let helper: FakeHelper;
  let delegate: RecordingDelegate;
  let loader: CollectionLoader<string, FakeResults, string[], string>;

  function setup(pages: Record<string, FakePage>): void {
    helper = new FakeHelper(pages);
    delegate = new RecordingDelegate();
    loader = new CollectionLoader<string, FakeResults, string[], string>(helper, { loaderId: 'test-loader' });
    loader.delegate = delegate;
  }

  beforeEach(() => {
    setup({
      p0: { next: 'p1', previous: 'm1' },
      p1: { next: 'p2', previous: 'ignored' },
      p2: {},
      m1: { next: 'ignored', previous: 'm2' },
    });
  });

  afterEach(() => {
    loader.shutdown();
  });

  describe('loadInitialPage', () => {
    it('should set both cursors from the initial page', async () => {
      loader.loadInitialPage();
      await loader.whenIdle();

      expect(loader.nextPageToken).toBe('p1');
      expect(loader.previousPageToken).toBe('m1');
      expect(delegate.log).toEqual(['start:initial-page:p0', 'finish:initial-page:p0:ok']);
    });

    it('should return the load id', async () => {
      const loadId = loader.loadInitialPage();

      expect(loadId).toMatch(/^[0-9a-f-]{36}$/);
      await loader.whenIdle();
    });

    it('should cancel queued loads and finish them before the initial page', async () => {
      loader.load(describePageLoad('a', LoadReason.NEXT_PAGE));
      loader.load(describePageLoad('b', LoadReason.NEXT_PAGE));
      loader.load(describePageLoad('c', LoadReason.NEXT_PAGE));
      loader.loadInitialPage();
      await loader.whenIdle();

      expect(delegate.log).toEqual([
        'start:next-page:a',
        'finish:next-page:a:CancellationError',
        'start:next-page:b',
        'finish:next-page:b:CancellationError',
        'start:next-page:c',
        'finish:next-page:c:CancellationError',
        'start:initial-page:p0',
        'finish:initial-page:p0:ok',
      ]);
      // Cancelled before running: the helper's tasks never executed
      expect(helper.executed).toEqual(['p0']);
    });

    it('should cancel the current load while it is fetching', async () => {
      setup({ a: { hold: true }, p0: { next: 'p1' } });

      loader.load(describePageLoad('a', LoadReason.NEXT_PAGE));
      await vi.waitFor(() => expect(helper.executed).toEqual(['a']));

      loader.loadInitialPage();
      await loader.whenIdle();

      expect(delegate.log).toEqual([
        'start:next-page:a',
        'finish:next-page:a:CancellationError',
        'start:initial-page:p0',
        'finish:initial-page:p0:ok',
      ]);
      expect(loader.nextPageToken).toBe('p1');
    });
  });

  describe('loadNextPage', () => {
    it('should do nothing without a next page token', () => {
      expect(loader.loadNextPage()).toBeUndefined();
      expect(helper.created).toEqual([]);
      expect(loader.isLoading).toBe(false);
    });

    it('should update only the next cursor', async () => {
      loader.loadInitialPage();
      await loader.whenIdle();

      loader.loadNextPage();
      await loader.whenIdle();

      expect(loader.nextPageToken).toBe('p2');
      expect(loader.previousPageToken).toBe('m1');
    });

    it('should clear the next cursor at the end of the collection', async () => {
      loader.loadInitialPage();
      await loader.whenIdle();
      loader.loadNextPage();
      await loader.whenIdle();
      loader.loadNextPage();
      await loader.whenIdle();

      expect(loader.nextPageToken).toBeUndefined();
      expect(loader.loadNextPage()).toBeUndefined();
      expect(helper.created).toEqual(['p0', 'p1', 'p2']);
    });

    it('should create one fetch task for back to back calls', async () => {
      loader.loadInitialPage();
      await loader.whenIdle();

      const first = loader.loadNextPage();
      const second = loader.loadNextPage();
      await loader.whenIdle();

      expect(first).toBeDefined();
      expect(second).toBeUndefined();
      expect(helper.created.filter((token) => token === 'p1')).toHaveLength(1);
      expect(delegate.log.filter((line) => line.startsWith('finish:next-page'))).toEqual([
        'finish:next-page:p1:ok',
      ]);
    });
  });

  describe('loadPreviousPage', () => {
    it('should update only the previous cursor', async () => {
      loader.loadInitialPage();
      await loader.whenIdle();

      loader.loadPreviousPage();
      await loader.whenIdle();

      expect(loader.previousPageToken).toBe('m2');
      expect(loader.nextPageToken).toBe('p1');
      expect(delegate.log.slice(-2)).toEqual(['start:previous-page:m1', 'finish:previous-page:m1:ok']);
    });

    it('should do nothing without a previous page token', () => {
      expect(loader.loadPreviousPage()).toBeUndefined();
      expect(helper.created).toEqual([]);
    });
  });

  describe('load ordering', () => {
    it('should finish loads in submission order whatever the fetch latency', async () => {
      setup({
        a: { delayMs: 30 },
        b: { delayMs: 15 },
        c: { delayMs: 1 },
      });

      loader.load(describePageLoad('a', LoadReason.SYNC));
      loader.load(describePageLoad('b', LoadReason.SYNC));
      loader.load(describePageLoad('c', LoadReason.SYNC));
      await loader.whenIdle();

      expect(delegate.log).toEqual([
        'start:sync:a',
        'finish:sync:a:ok',
        'start:sync:b',
        'finish:sync:b:ok',
        'start:sync:c',
        'finish:sync:c:ok',
      ]);
    });

    it('should never have more than one load current or fetching', async () => {
      setup({
        a: { delayMs: 5 },
        b: { delayMs: 1 },
        c: { delayMs: 3 },
        d: {},
      });
      const currentSeen: number[] = [];
      loader.on('load:started', () => {
        currentSeen.push(loader.currentPageLoad ? 1 : 0);
      });

      for (const token of ['a', 'b', 'c', 'd']) {
        loader.load(describePageLoad(token, LoadReason.NEXT_PAGE));
      }
      expect(loader.pendingPageLoads.map((load) => load.pageToken)).toEqual(['a', 'b', 'c', 'd']);
      expect(loader.currentPageLoad).toBeUndefined();

      await loader.whenIdle();

      expect(helper.maxRunning).toBe(1);
      expect(currentSeen).toEqual([1, 1, 1, 1]);
      expect(loader.isLoading).toBe(false);
    });

    it('should hold fetches of several loaders to a shared ceiling', async () => {
      setup({ a: { delayMs: 10 }, b: { delayMs: 10 } });
      const fetchExecutor = new ConcurrentExecutor({ name: 'shared-fetch', maxConcurrent: 1 });
      const first = new CollectionLoader<string, FakeResults, string[], string>(helper, {
        loaderId: 'first',
        fetchExecutor,
      });
      const second = new CollectionLoader<string, FakeResults, string[], string>(helper, {
        loaderId: 'second',
        fetchExecutor,
      });

      first.load(describePageLoad('a', LoadReason.NEXT_PAGE));
      second.load(describePageLoad('b', LoadReason.NEXT_PAGE));
      await Promise.all([first.whenIdle(), second.whenIdle()]);

      expect(helper.executed).toEqual(['a', 'b']);
      expect(helper.maxRunning).toBe(1);
    });

    it('should overlap fetches of several loaders without a ceiling', async () => {
      setup({ a: { delayMs: 10 }, b: { delayMs: 10 } });
      const fetchExecutor = new ConcurrentExecutor({ name: 'shared-fetch' });
      const first = new CollectionLoader<string, FakeResults, string[], string>(helper, { fetchExecutor });
      const second = new CollectionLoader<string, FakeResults, string[], string>(helper, { fetchExecutor });

      first.load(describePageLoad('a', LoadReason.NEXT_PAGE));
      second.load(describePageLoad('b', LoadReason.NEXT_PAGE));
      await Promise.all([first.whenIdle(), second.whenIdle()]);

      expect(helper.maxRunning).toBe(2);
    });

    it('should leave sync loads out of the cursors', async () => {
      setup({ s: { next: 'n', previous: 'p' } });

      loader.load(describePageLoad('s', LoadReason.SYNC));
      await loader.whenIdle();

      expect(loader.nextPageToken).toBeUndefined();
      expect(loader.previousPageToken).toBeUndefined();
    });
  });

  describe('concurrent load behaviors', () => {
    it('should skip a load while another one is queued', async () => {
      loader.load(describePageLoad('p0', LoadReason.INITIAL_PAGE));
      const skipped = loader.load(describePageLoad('p1', LoadReason.NEXT_PAGE), ConcurrentLoadBehavior.SKIP);
      await loader.whenIdle();

      expect(skipped).toBeUndefined();
      expect(helper.created).toEqual(['p0']);
      expect(delegate.log).toEqual(['start:initial-page:p0', 'finish:initial-page:p0:ok']);
    });

    it('should admit a skip load when idle', async () => {
      const loadId = loader.load(describePageLoad('p0', LoadReason.INITIAL_PAGE), ConcurrentLoadBehavior.SKIP);
      await loader.whenIdle();

      expect(loadId).toBeDefined();
      expect(delegate.log).toEqual(['start:initial-page:p0', 'finish:initial-page:p0:ok']);
    });

    it('should replace the queue but keep the current load', async () => {
      setup({ a: { hold: true }, b: {}, c: {}, d: {} });

      loader.load(describePageLoad('a', LoadReason.SYNC));
      loader.load(describePageLoad('b', LoadReason.SYNC));
      loader.load(describePageLoad('c', LoadReason.SYNC));
      await vi.waitFor(() => expect(helper.executed).toEqual(['a']));

      loader.load(describePageLoad('d', LoadReason.SYNC), ConcurrentLoadBehavior.REPLACE_QUEUE);
      helper.release('a');
      await loader.whenIdle();

      expect(delegate.log).toEqual([
        'start:sync:a',
        'finish:sync:a:ok',
        'start:sync:b',
        'finish:sync:b:CancellationError',
        'start:sync:c',
        'finish:sync:c:CancellationError',
        'start:sync:d',
        'finish:sync:d:ok',
      ]);
    });

    it('should skip a load for a page already queued', async () => {
      loader.load(describePageLoad('p1', LoadReason.NEXT_PAGE));
      const samePage = loader.load(
        describePageLoad('p1', LoadReason.SYNC),
        ConcurrentLoadBehavior.SKIP_SAME_PAGE_INFO
      );
      const sameLoad = loader.load(describePageLoad('p1', LoadReason.NEXT_PAGE), ConcurrentLoadBehavior.SKIP_SAME);
      const otherLoad = loader.load(describePageLoad('p2', LoadReason.NEXT_PAGE), ConcurrentLoadBehavior.SKIP_SAME);
      await loader.whenIdle();

      expect(samePage).toBeUndefined();
      expect(sameLoad).toBeUndefined();
      expect(otherLoad).toBeDefined();
      expect(helper.created).toEqual(['p1', 'p2']);
    });
  });

  describe('page equality', () => {
    class CaseInsensitiveHelper extends FakeHelper {
      readonly prefix = 'page:';

      isSamePage(a: string, b: string): boolean {
        return `${this.prefix}${a.toLowerCase()}` === `${this.prefix}${b.toLowerCase()}`;
      }
    }

    beforeEach(() => {
      helper = new CaseInsensitiveHelper();
      loader = new CollectionLoader<string, FakeResults, string[], string>(helper, { loaderId: 'test-loader' });
      loader.delegate = delegate;
    });

    it('should compare pages with the helper method', async () => {
      loader.load(describePageLoad('p1', LoadReason.NEXT_PAGE));
      const samePage = loader.load(describePageLoad('P1', LoadReason.SYNC), ConcurrentLoadBehavior.SKIP_SAME_PAGE_INFO);
      const sameLoad = loader.load(describePageLoad('P1', LoadReason.NEXT_PAGE), ConcurrentLoadBehavior.SKIP_SAME);
      const otherPage = loader.load(describePageLoad('p2', LoadReason.SYNC), ConcurrentLoadBehavior.SKIP_SAME_PAGE_INFO);
      await loader.whenIdle();

      expect(samePage).toBeUndefined();
      expect(sameLoad).toBeUndefined();
      expect(otherPage).toBeDefined();
      expect(helper.created).toEqual(['p1', 'p2']);
    });
  });

  describe('cancelAll', () => {
    it('should be a no-op when idle', () => {
      const cancelled: LoadCancelledEvent[] = [];
      loader.on('load:cancelled', (event: LoadCancelledEvent) => cancelled.push(event));

      loader.cancelAll();

      expect(cancelled).toEqual([]);
      expect(delegate.log).toEqual([]);
      expect(loader.isLoading).toBe(false);
    });

    it('should cancel every load and still notify each of them', async () => {
      setup({ a: { hold: true }, b: {} });
      const cancelled: LoadCancelledEvent[] = [];
      loader.on('load:cancelled', (event: LoadCancelledEvent) => cancelled.push(event));

      loader.load(describePageLoad('a', LoadReason.NEXT_PAGE));
      loader.load(describePageLoad('b', LoadReason.NEXT_PAGE));
      await vi.waitFor(() => expect(helper.executed).toEqual(['a']));

      loader.cancelAll();
      await loader.whenIdle();

      expect(cancelled.map((event) => event.wasCurrent)).toEqual([true, false]);
      expect(delegate.log).toEqual([
        'start:next-page:a',
        'finish:next-page:a:CancellationError',
        'start:next-page:b',
        'finish:next-page:b:CancellationError',
      ]);
    });

    it('should leave the loader ready for new loads', async () => {
      loader.loadInitialPage();
      loader.cancelAll();
      await loader.whenIdle();

      expect(loader.nextPageToken).toBeUndefined();

      loader.loadInitialPage();
      await loader.whenIdle();

      expect(loader.nextPageToken).toBe('p1');
      expect(delegate.log.slice(-1)).toEqual(['finish:initial-page:p0:ok']);
    });
  });

  describe('failures', () => {
    it('should report a construction failure without queueing anything', () => {
      helper.failConstructionFor.add('p0');

      const loadId = loader.loadInitialPage();

      expect(loadId).toBeUndefined();
      expect(delegate.log).toEqual(['finish:initial-page:p0:ConstructionError']);
      expect(loader.isLoading).toBe(false);

      const result = delegate.results[0];
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ConstructionError);
        expect(result.error.cause).toEqual(new Error('no route to p0'));
      }
    });

    it('should leave the cursors unchanged when a fetch fails', async () => {
      setup({ p0: { next: 'p1', previous: 'm1' }, p1: { error: new Error('network down') } });

      loader.loadInitialPage();
      await loader.whenIdle();
      loader.loadNextPage();
      await loader.whenIdle();

      expect(loader.nextPageToken).toBe('p1');
      expect(loader.previousPageToken).toBe('m1');
      const last = delegate.results[1];
      expect(last).toEqual({ ok: false, error: new Error('network down') });
    });

    it('should fail the load when the delegate vetoes the import', async () => {
      delegate.beforeFinish = () => {
        throw new Error('veto');
      };

      loader.loadInitialPage();
      await loader.whenIdle();

      expect(delegate.log).toEqual(['start:initial-page:p0', 'finish:initial-page:p0:Error']);
      expect(loader.nextPageToken).toBeUndefined();
    });

    it('should keep scheduling when a delegate callback throws', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
      loader.setDelegateCallbacks({
        didFinishLoading: () => {
          throw new Error('delegate bug');
        },
      });

      loader.loadInitialPage();
      await loader.whenIdle();
      loader.loadNextPage();
      await loader.whenIdle();

      expect(helper.created).toEqual(['p0', 'p1']);
      expect(consoleError).toHaveBeenCalledTimes(2);
      consoleError.mockRestore();
    });
  });

  describe('delegate', () => {
    it('should remove objects missing from a fresh initial page', async () => {
      setup({ p0: { items: ['y', 'w'] } });
      helper.collection = ['x', 'y', 'z'];
      delegate.deletable = (object) => object !== 'z';

      loader.loadInitialPage();
      await loader.whenIdle();

      expect(helper.collection).toEqual(['y', 'z', 'w']);
    });

    it('should not remove objects on a next page', async () => {
      setup({ p1: { items: ['w'] } });
      helper.collection = ['x'];

      loader.load(describePageLoad('p1', LoadReason.NEXT_PAGE));
      await loader.whenIdle();

      expect(helper.collection).toEqual(['x', 'w']);
    });

    it('should notify the delegate captured when the load was admitted', async () => {
      const later = new RecordingDelegate();

      loader.loadInitialPage();
      loader.delegate = later;
      await loader.whenIdle();

      expect(delegate.log).toEqual(['start:initial-page:p0', 'finish:initial-page:p0:ok']);
      expect(later.log).toEqual([]);
    });

    it('should run without a delegate', async () => {
      loader.delegate = undefined;

      loader.loadInitialPage();
      await loader.whenIdle();

      expect(loader.nextPageToken).toBe('p1');
    });

    it('should accept callbacks', async () => {
      const started: string[] = [];
      const finished: boolean[] = [];
      loader.setDelegateCallbacks({
        willStartLoading: (description) => started.push(description.pageToken),
        didFinishLoading: (_description, result) => finished.push(result.ok),
      });

      loader.loadInitialPage();
      await loader.whenIdle();

      expect(started).toEqual(['p0']);
      expect(finished).toEqual([true]);
    });
  });

  describe('extra dependencies', () => {
    it('should not start a load before its extra dependencies finish', async () => {
      const order: string[] = [];
      const gate = new Task('gate', new SerialExecutor('gate'), () => {
        order.push('gate');
      });
      loader.setDelegateCallbacks({
        willStartLoading: (description) => order.push(`start:${description.pageToken}`),
      });

      loader.load(describePageLoad('p0', LoadReason.INITIAL_PAGE), ConcurrentLoadBehavior.QUEUE, [gate]);
      await sleep(20);

      expect(order).toEqual([]);

      gate.schedule();
      await loader.whenIdle();

      expect(order).toEqual(['gate', 'start:p0']);
    });
  });

  describe('events', () => {
    it('should emit lifecycle events', async () => {
      const queued: LoadQueuedEvent[] = [];
      const started: LoadStartedEvent[] = [];
      const finished: LoadFinishedEvent[] = [];
      loader.on('load:queued', (event: LoadQueuedEvent) => queued.push(event));
      loader.on('load:started', (event: LoadStartedEvent) => started.push(event));
      loader.on('load:finished', (event: LoadFinishedEvent) => finished.push(event));

      const loadId = loader.loadInitialPage();
      await loader.whenIdle();

      expect(queued).toHaveLength(1);
      expect(queued[0].type).toBe('load:queued');
      expect(queued[0].loaderId).toBe('test-loader');
      expect(queued[0].loadId).toBe(loadId);
      expect(queued[0].behavior).toBe('cancel-all-other');
      expect(queued[0].queueDepth).toBe(1);
      expect(started[0].loadId).toBe(loadId);
      expect(started[0].reason).toBe('initial-page');
      expect(finished[0].loadId).toBe(loadId);
      expect(finished[0].succeeded).toBe(true);
      expect(finished[0].errorName).toBeUndefined();
      expect(finished[0].timestamp).toBeTruthy();
    });

    it('should emit a skipped event', () => {
      const skipped: LoadSkippedEvent[] = [];
      loader.on('load:skipped', (event: LoadSkippedEvent) => skipped.push(event));

      loader.load(describePageLoad('a', LoadReason.NEXT_PAGE));
      loader.load(describePageLoad('b', LoadReason.NEXT_PAGE), ConcurrentLoadBehavior.SKIP_SAME_REASON);

      expect(skipped).toHaveLength(1);
      expect(skipped[0].reason).toBe('next-page');
      expect(skipped[0].behavior).toBe('skip-same-reason');
    });

    it('should describe failures in the finished event', () => {
      const finished: LoadFinishedEvent[] = [];
      loader.on('load:finished', (event: LoadFinishedEvent) => finished.push(event));
      helper.failConstructionFor.add('p0');

      loader.loadInitialPage();

      expect(finished).toHaveLength(1);
      expect(finished[0].loadId).toBeUndefined();
      expect(finished[0].succeeded).toBe(false);
      expect(finished[0].errorName).toBe('ConstructionError');
      expect(finished[0].errorMessage).toBe('Could not build the fetch task for a initial-page load');
    });

    it('should keep loading when a listener throws', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
      const startedError = new Error('started listener failed');
      const finishedError = new Error('finished listener failed');
      loader.once('load:started', () => {
        throw startedError;
      });
      loader.once('load:finished', () => {
        throw finishedError;
      });

      loader.load(describePageLoad('a', LoadReason.SYNC));
      loader.load(describePageLoad('b', LoadReason.SYNC));
      await loader.whenIdle();

      expect(delegate.log).toEqual(['start:sync:a', 'finish:sync:a:ok', 'start:sync:b', 'finish:sync:b:ok']);
      expect(consoleError.mock.calls).toEqual([
        ['Collection loader test-loader: load:started listener threw:', startedError],
        ['Collection loader test-loader: load:finished listener threw:', finishedError],
      ]);
      expect(loader.isLoading).toBe(false);
      consoleError.mockRestore();
    });

    it('should log lifecycle lines in debug mode', async () => {
      const consoleDebug = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const debugLoader = new CollectionLoader<string, FakeResults, string[], string>(helper, {
        loaderId: 'verbose',
        debug: true,
      });

      const loadId = debugLoader.loadInitialPage();
      await debugLoader.whenIdle();

      expect(consoleDebug.mock.calls.map((call) => call[0])).toEqual([
        `[collection-loader:verbose] Queued initial-page load ${loadId} (cancel-all-other)`,
        `[collection-loader:verbose] Started initial-page load ${loadId}`,
        `[collection-loader:verbose] Finished initial-page load ${loadId}: ok`,
      ]);
      consoleDebug.mockRestore();
    });
  });
});
