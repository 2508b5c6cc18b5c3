/**
 * Window Buffer Engine
 *
 * Keeps the chapters of the current window resident and nothing else.
 *
 * - Loads are staged and committed in one synchronous step, so a chapter is
 *   either fully present or absent for every reader of the state
 * - All mutations run under one semaphore; reads never wait for it
 * - One in-flight load per chapter index, shared by every caller
 * - A chapter load is retried up to `maxLoadAttempts`; a window member that
 *   still fails is kept in the window as `unavailable`
 */

import type { ChapterStatus, PageLocation } from '@chapterwise/shared-types';
import type { TypedEventEmitter } from '../../api/events/emitter';
import { createLogger, type Logger } from '../../helpers/logger';
import { Semaphore } from '../../helpers/semaphore';
import type { Store } from '../../helpers/store';
import type {
  ChapterPayload,
  ChapterSource,
  NavigatorEvents,
  PageContentResult,
} from '../navigator/navigator-interface';
import type { PageMeasurement, PageMeasurer } from '../renderer/page-measurer';
import { ChapterLoadError, NotInitializedError, describeCause } from './errors';
import type { GlobalIndexMapper } from './global-index-mapper';
import { canShift } from './phase-machine';
import { clampChapter, computeWindow, type ShiftDirection } from './window-calculator';
import type { ReaderWindowAction, ReaderWindowState } from './window-state';

export interface ResidentChapter<TContent> {
  chapterIndex: number;
  content: TContent;
  pageCount: number;
  pageStartOffsets?: number[];
}

export interface WindowBufferOptions {
  windowSize: number;
  maxLoadAttempts: number;
  debug: boolean;
}

export interface ApplyWindowOptions {
  /** Chapter whose load failure aborts the whole commit */
  requiredChapter?: number;
  /** Active chapter after the commit; must be a member of the new window */
  activeChapter?: number;
  /** Checked once loads settle; returning false discards the staged chapters */
  isCurrent?: () => boolean;
}

interface CommitOptions extends ApplyWindowOptions {
  /** Replaces the current session; runs after the loads settle, right before the commit */
  openSession?: () => void;
}

export interface LoadWindowResult {
  applied: boolean;
  window: number[];
  loaded: number[];
  evicted: number[];
  unavailable: number[];
}

/**
 * Buffer operations available while the buffer lock is held
 */
export interface BufferTransaction<TContent> {
  loadWindow(centerChapterIndex: number, options?: ApplyWindowOptions): Promise<LoadWindowResult>;
  /** Reload evicted or unavailable members of the current window without moving it */
  refreshWindow(options?: ApplyWindowOptions): Promise<LoadWindowResult>;
  /**
   * Load `window` from scratch for a new session. If the required chapter
   * fails, the current session is left untouched.
   */
  openWindow(window: number[], openSession: () => void, options?: ApplyWindowOptions): Promise<LoadWindowResult>;
  shiftForward(): Promise<boolean>;
  shiftBackward(): Promise<boolean>;
  markChapterEvicted(chapterIndex: number): boolean;
  /** Re-measure every resident chapter; returns the chapters whose page count changed */
  remeasureResident(): Promise<number[]>;
  reset(): void;
  isResident(chapterIndex: number): boolean;
  getResidentChapter(chapterIndex: number): ResidentChapter<TContent> | undefined;
}

type LoadOutcome<TContent> =
  | { chapterIndex: number; ok: true; chapter: ResidentChapter<TContent> }
  | { chapterIndex: number; ok: false; error: ChapterLoadError };

type WindowStore = Store<ReaderWindowState, ReaderWindowAction>;

const ascending = (a: number, b: number): number => a - b;

export class WindowBufferEngine<TContent = string> {
  private resident = new Map<number, ResidentChapter<TContent>>();
  private unavailable = new Map<number, string>();
  private evicted = new Set<number>();
  private inFlight = new Map<number, Promise<LoadOutcome<TContent>>>();

  private readonly mutex = new Semaphore(1);
  private readonly logger: Logger;
  private readonly transaction: BufferTransaction<TContent>;

  constructor(
    private readonly source: ChapterSource<TContent>,
    private readonly mapper: GlobalIndexMapper,
    private readonly store: WindowStore,
    private readonly events: TypedEventEmitter<NavigatorEvents>,
    private readonly options: WindowBufferOptions,
    private readonly measurer?: PageMeasurer<TContent>
  ) {
    this.logger = createLogger('WindowBuffer', () => this.options.debug);
    this.transaction = {
      loadWindow: (center, applyOptions) => this.applyWindow(this.computeWindow(center), applyOptions),
      refreshWindow: (applyOptions) => this.applyWindow([...this.store.getValue().window], applyOptions),
      openWindow: (window, openSession, applyOptions) => this.applyWindow(window, { ...applyOptions, openSession }),
      shiftForward: () => this.shift('forward'),
      shiftBackward: () => this.shift('backward'),
      markChapterEvicted: (chapterIndex) => this.evictExternally(chapterIndex),
      remeasureResident: () => this.remeasureResident(),
      reset: () => this.reset(),
      isResident: (chapterIndex) => this.resident.has(chapterIndex),
      getResidentChapter: (chapterIndex) => this.resident.get(chapterIndex),
    };
  }

  get windowSize(): number {
    return this.options.windowSize;
  }

  // ==========================================================================
  // Locked operations
  // ==========================================================================

  /**
   * Run a compound mutation while holding the buffer lock
   */
  runExclusive<T>(task: (tx: BufferTransaction<TContent>) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(() => task(this.transaction));
  }

  loadWindow(centerChapterIndex: number, options?: ApplyWindowOptions): Promise<LoadWindowResult> {
    return this.runExclusive(tx => tx.loadWindow(centerChapterIndex, options));
  }

  shiftForward(): Promise<boolean> {
    return this.runExclusive(tx => tx.shiftForward());
  }

  shiftBackward(): Promise<boolean> {
    return this.runExclusive(tx => tx.shiftBackward());
  }

  /**
   * External eviction notice, e.g. memory pressure in the rendering layer.
   * Ignored for the active chapter.
   */
  markChapterEvicted(chapterIndex: number): Promise<boolean> {
    return this.runExclusive(async tx => tx.markChapterEvicted(chapterIndex));
  }

  // ==========================================================================
  // Reads (lock-free, last committed state)
  // ==========================================================================

  computeWindow(centerChapterIndex: number): number[] {
    return computeWindow(centerChapterIndex, this.store.getValue().totalChapters, this.options.windowSize);
  }

  getWindow(): number[] {
    return [...this.store.getValue().window];
  }

  getResidentChapters(): number[] {
    return [...this.resident.keys()].sort(ascending);
  }

  getUnavailableChapters(): number[] {
    return [...this.unavailable.keys()].sort(ascending);
  }

  getChapterStatus(chapterIndex: number): ChapterStatus {
    if (this.resident.has(chapterIndex)) return 'resident';
    if (this.inFlight.has(chapterIndex)) return 'loading';
    if (this.unavailable.has(chapterIndex)) return 'unavailable';
    if (this.evicted.has(chapterIndex)) return 'evicted';
    return 'absent';
  }

  getPageContent(globalPageIndex: number): PageContentResult<TContent> {
    if (this.store.getValue().status !== 'ready') {
      throw new NotInitializedError('getPageContent');
    }

    const location = this.withCharacterOffset(this.mapper.locate(globalPageIndex));
    const chapter = this.resident.get(location.chapterIndex);
    if (chapter) {
      return { kind: 'page', location, content: chapter.content };
    }

    const reason = this.unavailable.get(location.chapterIndex);
    if (reason !== undefined) {
      return { kind: 'unavailable', location, reason };
    }

    return { kind: 'not-resident', location };
  }

  /**
   * Attach the measured start offset of the page, when known
   */
  withCharacterOffset(location: PageLocation): PageLocation {
    const offset = this.resident.get(location.chapterIndex)?.pageStartOffsets?.[location.inChapterPageIndex];
    return offset === undefined ? location : { ...location, characterOffset: offset };
  }

  getDebugInfo(): string {
    const state = this.store.getValue();
    return `WindowBuffer[phase=${state.phase.phase}, window=[${state.window.join(',')}], ` +
      `active=${state.activeChapter}, resident=[${this.getResidentChapters().join(',')}], ` +
      `unavailable=[${this.getUnavailableChapters().join(',')}], inFlight=${this.inFlight.size}]`;
  }

  // ==========================================================================
  // Mutations (lock held by the caller)
  // ==========================================================================

  private async applyWindow(target: number[], options: CommitOptions = {}): Promise<LoadWindowResult> {
    const previous = this.store.getValue();
    const toLoad = options.openSession
      ? target
      : target.filter(chapterIndex => !this.resident.has(chapterIndex));

    this.logger.debug('Applying window', {
      from: previous.window,
      to: target,
      toLoad,
    });

    const outcomes = await Promise.all(toLoad.map(chapterIndex => this.fetchChapter(chapterIndex)));

    if (options.isCurrent && !options.isCurrent()) {
      this.logger.debug('Discarding staged chapters for a superseded window', { target });
      return { applied: false, window: [...previous.window], loaded: [], evicted: [], unavailable: [] };
    }

    const requiredFailure = outcomes.find(
      outcome => !outcome.ok && outcome.chapterIndex === options.requiredChapter
    );
    if (requiredFailure && !requiredFailure.ok) {
      // Nothing has been touched yet: the previous window stays as it was
      throw requiredFailure.error;
    }

    if (options.openSession) {
      this.reset();
      options.openSession();
    }
    const state = this.store.getValue();

    // Commit: evict, admit and publish in one synchronous step
    const targetSet = new Set(target);
    const evicted: number[] = [];
    for (const chapterIndex of this.getResidentChapters()) {
      if (!targetSet.has(chapterIndex)) {
        this.resident.delete(chapterIndex);
        evicted.push(chapterIndex);
      }
    }
    for (const chapterIndex of [...this.unavailable.keys()]) {
      if (!targetSet.has(chapterIndex)) this.unavailable.delete(chapterIndex);
    }
    for (const chapterIndex of [...this.evicted]) {
      if (!targetSet.has(chapterIndex)) this.evicted.delete(chapterIndex);
    }

    const loaded: number[] = [];
    const unavailable: number[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        this.admit(outcome.chapter);
        loaded.push(outcome.chapterIndex);
      } else {
        this.unavailable.set(outcome.chapterIndex, outcome.error.message);
        unavailable.push(outcome.chapterIndex);
      }
    }

    const activeChapter = options.activeChapter ?? this.keepActiveInside(state, target, targetSet);
    this.store.dispatch({
      type: 'COMMIT_WINDOW',
      payload: {
        window: target,
        residentChapters: this.getResidentChapters(),
        unavailableChapters: this.getUnavailableChapters(),
        totalGlobalPages: this.mapper.totalPages,
        activeChapter,
      },
    });

    evicted.forEach(chapterIndex => this.events.emit('chapterEvicted', { chapterIndex, reason: 'window' }));
    this.announceOutcomes(outcomes);

    this.logger.debug('Window committed', { window: target, loaded, evicted, unavailable });
    return { applied: true, window: target, loaded, evicted, unavailable };
  }

  private async shift(direction: ShiftDirection): Promise<boolean> {
    const state = this.store.getValue();
    if (state.status !== 'ready' || state.window.length === 0) {
      return false;
    }
    if (!canShift(state.phase)) {
      this.logger.debug(`shift ${direction} ignored during ${state.phase.phase}`);
      return false;
    }

    const window = state.window;
    const first = window[0];
    const last = window[window.length - 1];
    const appended = direction === 'forward' ? last + 1 : first - 1;
    const dropped = direction === 'forward' ? first : last;

    if (appended < 0 || appended >= state.totalChapters) {
      this.logger.debug(`shift ${direction}: at document boundary`, { window });
      return false;
    }
    if (dropped === state.activeChapter) {
      this.logger.debug(`shift ${direction}: would drop the active chapter`, { window, dropped });
      return false;
    }

    const outcome = this.resident.has(appended) ? null : await this.fetchChapter(appended);

    const nextWindow = direction === 'forward'
      ? [...window.slice(1), appended]
      : [appended, ...window.slice(0, -1)];

    // Trailing chapter leaves before the leading one joins
    const droppedWasResident = this.resident.delete(dropped);
    this.unavailable.delete(dropped);
    this.evicted.delete(dropped);

    if (outcome?.ok) {
      this.admit(outcome.chapter);
    } else if (outcome) {
      this.unavailable.set(appended, outcome.error.message);
    }

    this.store.dispatch({
      type: 'COMMIT_WINDOW',
      payload: {
        window: nextWindow,
        residentChapters: this.getResidentChapters(),
        unavailableChapters: this.getUnavailableChapters(),
        totalGlobalPages: this.mapper.totalPages,
      },
    });

    if (droppedWasResident) {
      this.events.emit('chapterEvicted', { chapterIndex: dropped, reason: 'shift' });
    }
    if (outcome) {
      this.announceOutcomes([outcome]);
    }
    this.events.emit('windowShifted', { direction, dropped, appended, window: [...nextWindow] });

    this.logger.debug(`Shifted ${direction}`, { from: window, to: nextWindow, dropped, appended });
    return true;
  }

  private evictExternally(chapterIndex: number): boolean {
    const state = this.store.getValue();
    if (chapterIndex === state.activeChapter) {
      this.logger.debug(`Ignoring eviction of active chapter ${chapterIndex}`);
      return false;
    }
    if (!this.resident.delete(chapterIndex)) {
      return false;
    }

    if (state.window.includes(chapterIndex)) {
      this.evicted.add(chapterIndex);
    }

    this.store.dispatch({
      type: 'SET_RESIDENCY',
      payload: {
        residentChapters: this.getResidentChapters(),
        unavailableChapters: this.getUnavailableChapters(),
      },
    });
    this.events.emit('chapterEvicted', { chapterIndex, reason: 'external' });
    this.logger.debug(`Evicted chapter ${chapterIndex} on external request`);
    return true;
  }

  private async remeasureResident(): Promise<number[]> {
    const changed: number[] = [];

    for (const chapterIndex of this.getResidentChapters()) {
      const current = this.resident.get(chapterIndex);
      if (!current) continue;

      let next: ResidentChapter<TContent>;
      try {
        next = this.measurer
          ? { ...current, ...(await this.measure(current.content, chapterIndex)) }
          : await this.resolveChapter(chapterIndex);
      } catch (error) {
        // Keep the previous layout for this chapter; it is still displayable
        this.logger.warn(`Re-measuring chapter ${chapterIndex} failed: ${describeCause(error)}`);
        continue;
      }

      this.resident.set(chapterIndex, next);
      if (this.mapper.updateChapterPageCount(chapterIndex, next.pageCount)) {
        changed.push(chapterIndex);
      }
    }

    this.store.dispatch({ type: 'SET_TOTAL_PAGES', payload: this.mapper.totalPages });
    return changed;
  }

  private reset(): void {
    const released = this.getResidentChapters();
    this.resident.clear();
    this.unavailable.clear();
    this.evicted.clear();
    released.forEach(chapterIndex => this.events.emit('chapterEvicted', { chapterIndex, reason: 'reset' }));
  }

  // ==========================================================================
  // Loading
  // ==========================================================================

  /**
   * Shared, retried load of one chapter. Never rejects.
   */
  private fetchChapter(chapterIndex: number): Promise<LoadOutcome<TContent>> {
    const pending = this.inFlight.get(chapterIndex);
    if (pending) return pending;

    const request = this.loadWithRetry(chapterIndex).finally(() => {
      this.inFlight.delete(chapterIndex);
    });
    this.inFlight.set(chapterIndex, request);
    return request;
  }

  private async loadWithRetry(chapterIndex: number): Promise<LoadOutcome<TContent>> {
    const attempts = Math.max(1, this.options.maxLoadAttempts);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const chapter = await this.resolveChapter(chapterIndex);
        return { chapterIndex, ok: true, chapter };
      } catch (error) {
        lastError = error;
        this.logger.debug(`Load attempt ${attempt}/${attempts} for chapter ${chapterIndex} failed`, {
          reason: describeCause(error),
        });
      }
    }

    return { chapterIndex, ok: false, error: new ChapterLoadError(chapterIndex, attempts, lastError) };
  }

  private async resolveChapter(chapterIndex: number): Promise<ResidentChapter<TContent>> {
    const payload: ChapterPayload<TContent> = await this.source.loadChapter(chapterIndex);
    if (!Number.isInteger(payload.pageCount) || payload.pageCount < 0) {
      throw new Error(`invalid page count ${payload.pageCount}`);
    }

    if (this.measurer) {
      const measured = await this.measure(payload.pageContent, chapterIndex);
      return { chapterIndex, content: payload.pageContent, ...measured };
    }

    return {
      chapterIndex,
      content: payload.pageContent,
      pageCount: Math.max(1, payload.pageCount),
    };
  }

  private async measure(content: TContent, chapterIndex: number): Promise<{ pageCount: number; pageStartOffsets?: number[] }> {
    if (!this.measurer) {
      throw new Error('no page measurer configured');
    }
    const measurement: PageMeasurement = await this.measurer.measure(content, chapterIndex);
    if (!Number.isInteger(measurement.pageCount) || measurement.pageCount < 0) {
      throw new Error(`invalid measured page count ${measurement.pageCount}`);
    }
    return {
      pageCount: Math.max(1, measurement.pageCount),
      pageStartOffsets: measurement.pageStartOffsets,
    };
  }

  private admit(chapter: ResidentChapter<TContent>): void {
    this.resident.set(chapter.chapterIndex, chapter);
    this.unavailable.delete(chapter.chapterIndex);
    this.evicted.delete(chapter.chapterIndex);
    this.mapper.updateChapterPageCount(chapter.chapterIndex, chapter.pageCount);
  }

  private announceOutcomes(outcomes: LoadOutcome<TContent>[]): void {
    for (const outcome of outcomes) {
      if (outcome.ok) {
        this.events.emit('chapterLoaded', {
          chapterIndex: outcome.chapterIndex,
          pageCount: outcome.chapter.pageCount,
        });
      } else {
        this.logger.warn(`Chapter ${outcome.chapterIndex} unavailable`, { reason: outcome.error.message });
        this.events.emit('chapterUnavailable', {
          chapterIndex: outcome.chapterIndex,
          reason: outcome.error.message,
        });
      }
    }
  }

  private keepActiveInside(state: ReaderWindowState, target: number[], targetSet: Set<number>): number | undefined {
    if (state.activeChapter !== null && targetSet.has(state.activeChapter)) {
      return state.activeChapter;
    }
    if (target.length === 0) return undefined;
    const center = clampChapter(target[Math.floor(target.length / 2)], state.totalChapters);
    return center;
  }
}
