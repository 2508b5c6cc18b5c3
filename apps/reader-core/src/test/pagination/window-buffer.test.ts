/**
 * Window Buffer Engine Tests
 *
 * Exercises the engine directly against a reducer store:
 * - staged window loads and eviction
 * - shifts and their guards
 * - external eviction and refresh
 * - load failures and superseded commits
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Phase } from '@chapterwise/shared-types';
import { TypedEventEmitter } from '../../api/events/emitter';
import { Store } from '../../helpers/store';
import type { NavigatorEvents } from '../../reader/navigator/navigator-interface';
import { NotInitializedError } from '../../reader/pagination/errors';
import { GlobalIndexMapper } from '../../reader/pagination/global-index-mapper';
import { WindowBufferEngine } from '../../reader/pagination/window-buffer';
import {
  initialReaderWindowState,
  readerWindowReducer,
  type ReaderWindowAction,
  type ReaderWindowState,
} from '../../reader/pagination/window-state';
import {
  createUniformChapterSource,
  flushPromises,
  type FakeChapterSource,
} from '../fixtures';

interface EngineHarness {
  engine: WindowBufferEngine<string>;
  store: Store<ReaderWindowState, ReaderWindowAction>;
  mapper: GlobalIndexMapper;
  events: TypedEventEmitter<NavigatorEvents>;
  source: FakeChapterSource;
}

function createHarness(source: FakeChapterSource, windowSize = 5): EngineHarness {
  const mapper = new GlobalIndexMapper();
  const store = new Store<ReaderWindowState, ReaderWindowAction>(initialReaderWindowState, readerWindowReducer);
  const events = new TypedEventEmitter<NavigatorEvents>();
  const engine = new WindowBufferEngine(source, mapper, store, events, {
    windowSize,
    maxLoadAttempts: 2,
    debug: false,
  });

  mapper.buildMapping(source.pageCounts.map((_, chapterIndex) => ({ chapterIndex, pageCount: 1 })));
  store.dispatch({
    type: 'OPEN',
    payload: { sessionId: 'test-session', totalChapters: source.pageCounts.length, totalGlobalPages: mapper.totalPages },
  });
  store.dispatch({ type: 'PHASE', payload: { type: 'RESET', centerChapter: 2 } });

  return { engine, store, mapper, events, source };
}

function enterSteady(store: Store<ReaderWindowState, ReaderWindowAction>, chapterIndex: number): void {
  store.dispatch({ type: 'PHASE', payload: { type: 'RECENTERED', centerChapter: chapterIndex } });
  store.dispatch({ type: 'PHASE', payload: { type: 'CHAPTER_ENTERED', chapterIndex } });
}

describe('WindowBufferEngine', () => {
  let warnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  // ==========================================================================
  // loadWindow
  // ==========================================================================

  describe('loadWindow', () => {
    it('should load the window around the center and commit it', async () => {
      const { engine, store, mapper } = createHarness(createUniformChapterSource(10, 10));

      const result = await engine.loadWindow(2, { activeChapter: 2 });

      expect(result).toEqual({
        applied: true,
        window: [0, 1, 2, 3, 4],
        loaded: [0, 1, 2, 3, 4],
        evicted: [],
        unavailable: [],
      });
      expect(store.getValue().status).toBe('ready');
      expect(store.getValue().residentChapters).toEqual([0, 1, 2, 3, 4]);
      expect(store.getValue().activeChapter).toBe(2);
      expect(mapper.totalPages).toBe(55);
      expect(engine.getChapterStatus(4)).toBe('resident');
      expect(engine.getChapterStatus(5)).toBe('absent');
    });

    it('should evict chapters that leave the window', async () => {
      const { engine, events } = createHarness(createUniformChapterSource(10, 10));
      const evicted: number[] = [];
      events.on('chapterEvicted', ({ chapterIndex, reason }) => {
        if (reason === 'window') evicted.push(chapterIndex);
      });

      await engine.loadWindow(2, { activeChapter: 2 });
      const result = await engine.loadWindow(9, { activeChapter: 9 });

      expect(result.window).toEqual([5, 6, 7, 8, 9]);
      expect(result.evicted).toEqual([0, 1, 2, 3, 4]);
      expect(evicted).toEqual([0, 1, 2, 3, 4]);
      expect(engine.getResidentChapters()).toEqual([5, 6, 7, 8, 9]);
    });

    it('should only load chapters that are not already resident', async () => {
      const source = createUniformChapterSource(10, 10);
      const { engine } = createHarness(source);

      await engine.loadWindow(2, { activeChapter: 2 });
      const result = await engine.loadWindow(4, { activeChapter: 4 });

      expect(result.window).toEqual([2, 3, 4, 5, 6]);
      expect(result.loaded).toEqual([5, 6]);
      expect(source.loadsOf(3)).toBe(1);
    });

    it('should keep the active chapter inside the window when none is given', async () => {
      const { engine, store } = createHarness(createUniformChapterSource(10, 10));

      await engine.loadWindow(2, { activeChapter: 1 });
      await engine.loadWindow(3);
      expect(store.getValue().activeChapter).toBe(1);

      await engine.loadWindow(8);
      expect(store.getValue().activeChapter).toBe(7);
    });

    it('should report chapters as loading while their load is pending', async () => {
      const source = createUniformChapterSource(10, 10);
      const { engine } = createHarness(source);

      source.hold();
      const pending = engine.loadWindow(2, { activeChapter: 2 });
      await flushPromises();

      expect(engine.getChapterStatus(3)).toBe('loading');
      expect(engine.getResidentChapters()).toEqual([]);

      source.release();
      await pending;
      expect(engine.getChapterStatus(3)).toBe('resident');
    });

    it('should discard staged chapters when the commit is no longer current', async () => {
      const { engine, store, mapper } = createHarness(createUniformChapterSource(10, 10));
      await engine.loadWindow(2, { activeChapter: 2 });

      const result = await engine.loadWindow(9, { activeChapter: 9, isCurrent: () => false });

      expect(result.applied).toBe(false);
      expect(result.window).toEqual([0, 1, 2, 3, 4]);
      expect(store.getValue().window).toEqual([0, 1, 2, 3, 4]);
      expect(engine.getResidentChapters()).toEqual([0, 1, 2, 3, 4]);
      expect(mapper.getChapterPageCount(9)).toBe(1);
    });
  });

  // ==========================================================================
  // Load failures
  // ==========================================================================

  describe('load failures', () => {
    it('should retry a failed load once', async () => {
      const source = createUniformChapterSource(10, 10, { failures: { 3: 1 } });
      const { engine } = createHarness(source);

      const result = await engine.loadWindow(2, { activeChapter: 2 });

      expect(result.unavailable).toEqual([]);
      expect(source.loadsOf(3)).toBe(2);
      expect(engine.getChapterStatus(3)).toBe('resident');
    });

    it('should mark a neighbour that keeps failing as unavailable', async () => {
      const source = createUniformChapterSource(10, 10, { failures: { 3: Infinity } });
      const { engine, store, events } = createHarness(source);
      const reasons: string[] = [];
      events.on('chapterUnavailable', ({ reason }) => reasons.push(reason));

      const result = await engine.loadWindow(2, { activeChapter: 2, requiredChapter: 2 });

      expect(result.unavailable).toEqual([3]);
      expect(store.getValue().unavailableChapters).toEqual([3]);
      expect(engine.getChapterStatus(3)).toBe('unavailable');
      expect(reasons).toEqual(['Chapter 3 failed to load after 2 attempt(s): parse error in chapter 3']);
      expect(warnSpy).toHaveBeenCalledWith('[WindowBuffer] Chapter 3 unavailable', {
        reason: 'Chapter 3 failed to load after 2 attempt(s): parse error in chapter 3',
      });
    });

    it('should reject and change nothing when the required chapter fails', async () => {
      const source = createUniformChapterSource(10, 10);
      const { engine, store } = createHarness(source);
      await engine.loadWindow(2, { activeChapter: 2 });
      const before = store.getValue();
      source.failures.set(8, Infinity);

      await expect(engine.loadWindow(8, { activeChapter: 8, requiredChapter: 8 })).rejects.toMatchObject({
        code: 'LoadFailure',
        chapterIndex: 8,
        attempts: 2,
      });

      expect(store.getValue()).toBe(before);
      expect(engine.getResidentChapters()).toEqual([0, 1, 2, 3, 4]);
    });

    it('should open a new session only after the required chapter loads', async () => {
      const source = createUniformChapterSource(10, 10);
      const { engine, store, mapper } = createHarness(source);
      await engine.loadWindow(2, { activeChapter: 2 });
      const before = store.getValue();
      const openSession = vi.fn();
      source.failures.set(7, Infinity);

      await expect(
        engine.runExclusive(tx => tx.openWindow([5, 6, 7, 8, 9], openSession, { requiredChapter: 7, activeChapter: 7 }))
      ).rejects.toMatchObject({ chapterIndex: 7 });

      expect(openSession).not.toHaveBeenCalled();
      expect(store.getValue()).toBe(before);
      expect(engine.getResidentChapters()).toEqual([0, 1, 2, 3, 4]);
      expect(mapper.totalPages).toBe(55);
    });

    it('should reload every chapter of a new session window', async () => {
      const source = createUniformChapterSource(10, 10);
      const { engine, store, events } = createHarness(source);
      await engine.loadWindow(2, { activeChapter: 2 });
      const released: string[] = [];
      events.on('chapterEvicted', ({ chapterIndex, reason }) => released.push(`${reason}:${chapterIndex}`));
      const openSession = vi.fn();

      const result = await engine.runExclusive(tx => tx.openWindow([2, 3, 4, 5, 6], openSession, { activeChapter: 4 }));

      expect(openSession).toHaveBeenCalledTimes(1);
      expect(result.loaded).toEqual([2, 3, 4, 5, 6]);
      expect(result.evicted).toEqual([]);
      expect(released).toEqual(['reset:0', 'reset:1', 'reset:2', 'reset:3', 'reset:4']);
      expect(source.loadsOf(3)).toBe(2);
      expect(store.getValue().activeChapter).toBe(4);
    });

    it('should treat an invalid page count as a load failure', async () => {
      const source = createUniformChapterSource(10, 10);
      source.pageCounts[4] = -2;
      const { engine } = createHarness(source);

      const result = await engine.loadWindow(2, { activeChapter: 2 });

      expect(result.unavailable).toEqual([4]);
      expect(source.loadsOf(4)).toBe(2);
    });
  });

  // ==========================================================================
  // Shifts
  // ==========================================================================

  describe('shifts', () => {
    it('should not shift during STARTUP', async () => {
      const { engine, store } = createHarness(createUniformChapterSource(10, 10));
      await engine.loadWindow(2, { activeChapter: 3 });

      expect(store.getValue().phase.phase).toBe(Phase.Startup);
      expect(await engine.shiftForward()).toBe(false);
      expect(store.getValue().window).toEqual([0, 1, 2, 3, 4]);
    });

    it('should drop the trailing chapter and append the leading one', async () => {
      const { engine, store, events } = createHarness(createUniformChapterSource(10, 10));
      await engine.loadWindow(2, { activeChapter: 3 });
      enterSteady(store, 2);

      const order: string[] = [];
      events.on('chapterEvicted', ({ chapterIndex }) => order.push(`evicted:${chapterIndex}`));
      events.on('chapterLoaded', ({ chapterIndex }) => order.push(`loaded:${chapterIndex}`));
      events.on('windowShifted', ({ window }) => order.push(`shifted:${window.join(',')}`));

      expect(await engine.shiftForward()).toBe(true);

      expect(store.getValue().window).toEqual([1, 2, 3, 4, 5]);
      expect(engine.getResidentChapters()).toEqual([1, 2, 3, 4, 5]);
      expect(order).toEqual(['evicted:0', 'loaded:5', 'shifted:1,2,3,4,5']);
    });

    it('should keep a full contiguous window until the end of the book', async () => {
      const { engine, store } = createHarness(createUniformChapterSource(10, 10));
      await engine.loadWindow(2, { activeChapter: 2 });
      enterSteady(store, 2);
      const starts: number[] = [];
      const readToLeadingEdge = () => {
        const { window } = store.getValue();
        store.dispatch({ type: 'SET_ACTIVE_CHAPTER', payload: window[window.length - 1] });
      };

      readToLeadingEdge();
      while (await engine.shiftForward()) {
        const next = store.getValue().window;
        expect(next).toHaveLength(5);
        expect(next).toEqual(Array.from({ length: 5 }, (_, offset) => next[0] + offset));
        expect(engine.getResidentChapters()).toEqual(next);
        starts.push(next[0]);
        readToLeadingEdge();
      }

      expect(starts).toEqual([1, 2, 3, 4, 5]);
      expect(store.getValue().window).toEqual([5, 6, 7, 8, 9]);
      expect(engine.getResidentChapters()).toEqual([5, 6, 7, 8, 9]);
    });

    it('should shift backward', async () => {
      const { engine, store } = createHarness(createUniformChapterSource(10, 10));
      await engine.loadWindow(5, { activeChapter: 4 });
      enterSteady(store, 5);

      expect(await engine.shiftBackward()).toBe(true);
      expect(store.getValue().window).toEqual([2, 3, 4, 5, 6]);
      expect(engine.getChapterStatus(7)).toBe('absent');
    });

    it('should not shift past a document boundary', async () => {
      const { engine, store } = createHarness(createUniformChapterSource(10, 10));
      await engine.loadWindow(9, { activeChapter: 8 });
      enterSteady(store, 7);

      expect(await engine.shiftForward()).toBe(false);
      expect(store.getValue().window).toEqual([5, 6, 7, 8, 9]);
    });

    it('should not shift when the active chapter would be dropped', async () => {
      const { engine, store } = createHarness(createUniformChapterSource(10, 10));
      await engine.loadWindow(5, { activeChapter: 3 });
      enterSteady(store, 5);

      expect(await engine.shiftForward()).toBe(false);
      expect(store.getValue().window).toEqual([3, 4, 5, 6, 7]);
      expect(engine.getChapterStatus(3)).toBe('resident');
    });

    it('should keep the window when the appended chapter fails', async () => {
      const source = createUniformChapterSource(10, 10, { failures: { 5: Infinity } });
      const { engine, store } = createHarness(source);
      await engine.loadWindow(2, { activeChapter: 3 });
      enterSteady(store, 2);

      expect(await engine.shiftForward()).toBe(true);
      expect(store.getValue().window).toEqual([1, 2, 3, 4, 5]);
      expect(store.getValue().unavailableChapters).toEqual([5]);
    });
  });

  // ==========================================================================
  // External eviction
  // ==========================================================================

  describe('markChapterEvicted', () => {
    it('should never evict the active chapter', async () => {
      const { engine } = createHarness(createUniformChapterSource(10, 10));
      await engine.loadWindow(2, { activeChapter: 2 });

      expect(await engine.markChapterEvicted(2)).toBe(false);
      expect(engine.getChapterStatus(2)).toBe('resident');
    });

    it('should evict other chapters and reload them on refresh', async () => {
      const source = createUniformChapterSource(10, 10);
      const { engine, store } = createHarness(source);
      await engine.loadWindow(2, { activeChapter: 2 });

      expect(await engine.markChapterEvicted(4)).toBe(true);
      expect(engine.getChapterStatus(4)).toBe('evicted');
      expect(store.getValue().residentChapters).toEqual([0, 1, 2, 3]);
      expect(store.getValue().window).toEqual([0, 1, 2, 3, 4]);

      const result = await engine.runExclusive(tx => tx.refreshWindow());
      expect(result.loaded).toEqual([4]);
      expect(source.loadsOf(4)).toBe(2);
      expect(engine.getChapterStatus(4)).toBe('resident');
    });

    it('should ignore chapters that are not resident', async () => {
      const { engine } = createHarness(createUniformChapterSource(10, 10));
      await engine.loadWindow(2, { activeChapter: 2 });

      expect(await engine.markChapterEvicted(8)).toBe(false);
    });
  });

  // ==========================================================================
  // Reads
  // ==========================================================================

  describe('getPageContent', () => {
    it('should throw before the first commit', () => {
      const { engine } = createHarness(createUniformChapterSource(10, 10));
      expect(() => engine.getPageContent(0)).toThrow(NotInitializedError);
    });

    it('should return resident content with its location', async () => {
      const { engine } = createHarness(createUniformChapterSource(10, 10));
      await engine.loadWindow(2, { activeChapter: 2 });

      expect(engine.getPageContent(23)).toEqual({
        kind: 'page',
        location: { globalPageIndex: 23, chapterIndex: 2, inChapterPageIndex: 3 },
        content: 'chapter-2',
      });
    });

    it('should report pages of chapters outside the window as not resident', async () => {
      const { engine } = createHarness(createUniformChapterSource(10, 10));
      await engine.loadWindow(2, { activeChapter: 2 });

      expect(engine.getPageContent(51)).toEqual({
        kind: 'not-resident',
        location: { globalPageIndex: 51, chapterIndex: 6, inChapterPageIndex: 0 },
      });
    });
  });

  describe('getDebugInfo', () => {
    it('should summarize the buffer', async () => {
      const { engine } = createHarness(createUniformChapterSource(10, 10));
      await engine.loadWindow(2, { activeChapter: 2 });

      expect(engine.getDebugInfo()).toBe(
        'WindowBuffer[phase=STARTUP, window=[0,1,2,3,4], active=2, resident=[0,1,2,3,4], unavailable=[], inFlight=0]'
      );
    });
  });
});
