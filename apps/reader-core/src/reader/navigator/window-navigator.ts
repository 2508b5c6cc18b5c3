/**
 * Window Navigator
 *
 * Public entry point of the chapter window engine. Turns navigation intents
 * from the host and position reports from the rendering layer into window
 * loads, phase transitions and shifts, and publishes the result.
 *
 * - Every mutating call runs under the buffer lock, one at a time
 * - Reads (`getWindowInfo`, `getPageContent`, stores) never wait
 * - A navigation overtaken by a newer one resolves with the current
 *   location and leaves no trace
 */

import type { Readable } from 'svelte/store';
import { v4 as uuidv4 } from 'uuid';
import type {
  BookmarkRecord,
  ChapterStatus,
  PageLocation,
  Phase,
  ReadingPosition,
  WindowInfo,
} from '@chapterwise/shared-types';
import { DisposableStore, type Disposable } from '../../api/disposable';
import { TypedEventEmitter } from '../../api/events';
import { createMemoizedSelector, shallowRecordEqual } from '../../api/reactive-selector';
import { createLogger, type Logger } from '../../helpers/logger';
import { Store } from '../../helpers/store';
import { InvalidChapterError, InvalidPageError, NotInitializedError } from '../pagination/errors';
import { GlobalIndexMapper } from '../pagination/global-index-mapper';
import { canShift, type PhaseEvent } from '../pagination/phase-machine';
import type { BufferTransaction } from '../pagination/window-buffer';
import { WindowBufferEngine } from '../pagination/window-buffer';
import {
  computeWindow,
  isInWindow,
  shiftDirectionFor,
  windowCenter,
} from '../pagination/window-calculator';
import {
  initialReaderWindowState,
  readerWindowReducer,
  type ReaderWindowAction,
  type ReaderWindowState,
} from '../pagination/window-state';
import { pageForOffset, type PageMeasurer } from '../renderer/page-measurer';
import {
  locationsEqual,
  type ChapterSource,
  type NavigatorEventListener,
  type NavigatorEvents,
  type PageContentResult,
  type WindowNavigatorConfig,
} from './navigator-interface';

export interface ActiveWindowSnapshot {
  activeChapter: number | null;
  window: number[];
}

type Transaction<TContent> = BufferTransaction<TContent>;

export class WindowNavigator<TContent = string> {
  private readonly mapper = new GlobalIndexMapper();
  private readonly store = new Store<ReaderWindowState, ReaderWindowAction>(
    initialReaderWindowState,
    readerWindowReducer
  );
  private readonly events = new TypedEventEmitter<NavigatorEvents>();
  private readonly subscriptions = new DisposableStore();
  private readonly buffer: WindowBufferEngine<TContent>;
  private readonly logger: Logger;

  /** Bumped by every navigation intent; older tickets are superseded */
  private latestTicket = 0;

  /** Full snapshot, republished on every committed change */
  readonly state: Readable<ReaderWindowState>;
  readonly activeWindow: Readable<ActiveWindowSnapshot>;
  readonly phase: Readable<Phase>;
  readonly location: Readable<PageLocation | null>;

  constructor(
    private readonly source: ChapterSource<TContent>,
    readonly config: WindowNavigatorConfig,
    measurer?: PageMeasurer<TContent>
  ) {
    this.logger = createLogger('WindowNavigator', () => this.config.debug);
    this.buffer = new WindowBufferEngine(
      source,
      this.mapper,
      this.store,
      this.events,
      {
        windowSize: config.windowSize,
        maxLoadAttempts: config.maxLoadAttempts,
        debug: config.debug,
      },
      measurer
    );

    this.state = createMemoizedSelector(this.store, state => state);
    this.activeWindow = createMemoizedSelector(
      this.store,
      (state): ActiveWindowSnapshot => ({ activeChapter: state.activeChapter, window: state.window }),
      shallowRecordEqual
    );
    this.phase = createMemoizedSelector(this.store, state => state.phase.phase);
    this.location = createMemoizedSelector(this.store, state => state.location, locationsEqual);
  }

  get isReady(): boolean {
    return this.store.getValue().status === 'ready';
  }

  get sessionId(): string | null {
    return this.store.getValue().sessionId;
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Open the document at a chapter or a saved bookmark.
   * Starts a new session: phase returns to STARTUP and the window is centered
   * on the start chapter. If the start chapter cannot be loaded the navigator
   * keeps its current session.
   */
  initialize(start: number | BookmarkRecord): Promise<PageLocation> {
    this.takeTicket();

    return this.buffer.runExclusive(async (tx) => {
      const reported = await this.source.getChapterCount();
      const totalChapters = Number.isFinite(reported) ? Math.max(0, Math.floor(reported)) : 0;

      const savedOffset = typeof start === 'number' ? undefined : start.characterOffset;
      const startChapter = typeof start === 'number' ? start : start.chapterIndex;
      const startPage = typeof start === 'number' ? 0 : start.inChapterPageIndex;

      if (!Number.isInteger(startChapter) || startChapter < 0 || startChapter >= totalChapters) {
        throw new InvalidChapterError(startChapter, totalChapters);
      }
      if (!Number.isInteger(startPage) || startPage < 0) {
        throw new InvalidPageError(startChapter, startPage, this.config.fallbackPageCount);
      }

      const startWindow = computeWindow(startChapter, totalChapters, this.config.windowSize);

      // The open session, if any, stays current until the start chapter has loaded
      await tx.openWindow(
        startWindow,
        () => {
          this.mapper.buildMapping(
            Array.from({ length: totalChapters }, (_, chapterIndex) => ({
              chapterIndex,
              pageCount: this.config.fallbackPageCount,
            }))
          );
          this.store.dispatch({
            type: 'OPEN',
            payload: { sessionId: uuidv4(), totalChapters, totalGlobalPages: this.mapper.totalPages },
          });
          this.applyPhase({ type: 'RESET', centerChapter: windowCenter(startWindow) ?? startChapter });
        },
        { requiredChapter: startChapter, activeChapter: startChapter }
      );

      const offsets = tx.getResidentChapter(startChapter)?.pageStartOffsets;
      const page = savedOffset !== undefined && offsets
        ? pageForOffset(offsets, savedOffset)
        : this.mapper.clampPage(startChapter, startPage);

      const location = this.anchored(this.locationFor(startChapter, page), savedOffset);
      this.store.dispatch({ type: 'SET_LOCATION', payload: location });

      this.logger.debug('Initialized', {
        sessionId: this.store.getValue().sessionId,
        totalChapters,
        window: this.store.getValue().window,
        location,
      });
      return location;
    });
  }

  /**
   * End the session and release every resident chapter.
   * Listeners stay registered for the next `initialize`.
   */
  close(): Promise<void> {
    this.takeTicket();
    return this.buffer.runExclusive(async (tx) => {
      tx.reset();
      this.store.dispatch({ type: 'CLOSE' });
    });
  }

  /**
   * Drop every listener registered through `on`
   */
  destroy(): void {
    this.subscriptions.dispose();
    this.events.dispose();
  }

  // ============================================================================
  // Navigation intents
  // ============================================================================

  navigateToGlobalPage(globalPageIndex: number): Promise<PageLocation> {
    const ticket = this.takeTicket();
    return this.buffer.runExclusive(async (tx) => {
      this.requireReady('navigateToGlobalPage');
      const target = this.mapper.locate(globalPageIndex);
      return this.jumpTo(tx, ticket, target.chapterIndex, target.inChapterPageIndex);
    });
  }

  /**
   * Jump to a chapter. Pages past the chapter's measured end are clamped.
   */
  navigateToChapter(chapterIndex: number, inChapterPageIndex = 0): Promise<PageLocation> {
    const ticket = this.takeTicket();
    return this.buffer.runExclusive(async (tx) => {
      this.requireReady('navigateToChapter');
      this.assertCoordinate(chapterIndex, inChapterPageIndex);
      return this.jumpTo(tx, ticket, chapterIndex, inChapterPageIndex);
    });
  }

  nextPage(): Promise<PageLocation> {
    return this.buffer.runExclusive(async (tx) => {
      const current = this.currentLocation('nextPage');
      if (current.globalPageIndex + 1 >= this.mapper.totalPages) {
        return current;
      }
      return this.moveTo(tx, this.mapper.locate(current.globalPageIndex + 1));
    });
  }

  previousPage(): Promise<PageLocation> {
    return this.buffer.runExclusive(async (tx) => {
      const current = this.currentLocation('previousPage');
      if (current.globalPageIndex === 0) {
        return current;
      }
      return this.moveTo(tx, this.mapper.locate(current.globalPageIndex - 1));
    });
  }

  nextChapter(): Promise<PageLocation> {
    return this.buffer.runExclusive(async (tx) => {
      const current = this.currentLocation('nextChapter');
      if (current.chapterIndex + 1 >= this.mapper.chapterCount) {
        return current;
      }
      return this.enterChapter(tx, current.chapterIndex + 1, 0);
    });
  }

  previousChapter(): Promise<PageLocation> {
    return this.buffer.runExclusive(async (tx) => {
      const current = this.currentLocation('previousChapter');
      if (current.chapterIndex === 0) {
        return current;
      }
      return this.enterChapter(tx, current.chapterIndex - 1, 0);
    });
  }

  // ============================================================================
  // Rendering layer reports
  // ============================================================================

  /**
   * The reader's viewport moved into a chapter. Drives phase evaluation and
   * at most one window shift.
   */
  onActiveChapterEntered(chapterIndex: number): Promise<void> {
    return this.buffer.runExclusive(async (tx) => {
      this.requireReady('onActiveChapterEntered');
      this.assertChapter(chapterIndex);
      await this.enterChapter(tx, chapterIndex);
    });
  }

  /**
   * Page-level position report. A chapter change goes through the
   * chapter-entered path.
   */
  reportPosition(chapterIndex: number, inChapterPageIndex: number): Promise<PageLocation> {
    return this.buffer.runExclusive(async (tx) => {
      this.requireReady('reportPosition');
      this.assertCoordinate(chapterIndex, inChapterPageIndex);

      if (chapterIndex !== this.store.getValue().activeChapter) {
        return this.enterChapter(tx, chapterIndex, inChapterPageIndex);
      }

      const location = this.locationFor(chapterIndex, this.mapper.clampPage(chapterIndex, inChapterPageIndex));
      this.store.dispatch({ type: 'SET_LOCATION', payload: location });
      return location;
    });
  }

  /**
   * Layout changed: re-measure resident chapters and keep the reader on the
   * text they were looking at.
   */
  repaginate(): Promise<PageLocation> {
    return this.buffer.runExclusive(async (tx) => {
      const before = this.currentLocation('repaginate');
      const chapterIndex = before.chapterIndex;
      const countBefore = this.mapper.getChapterPageCount(chapterIndex);
      const anchor = before.characterOffset
        ?? tx.getResidentChapter(chapterIndex)?.pageStartOffsets?.[before.inChapterPageIndex];

      const changedChapters = await tx.remeasureResident();

      const countAfter = this.mapper.getChapterPageCount(chapterIndex);
      const offsets = tx.getResidentChapter(chapterIndex)?.pageStartOffsets;
      const page = anchor !== undefined && offsets
        ? pageForOffset(offsets, anchor)
        : this.mapper.clampPage(chapterIndex, (before.inChapterPageIndex / countBefore) * countAfter);

      const location = this.anchored(this.locationFor(chapterIndex, page), anchor);
      this.store.dispatch({ type: 'SET_LOCATION', payload: location });
      this.events.emit('repaginated', { changedChapters, location });

      this.logger.debug('Repaginated', { changedChapters, before, after: location });
      return location;
    });
  }

  /**
   * Reload window members that were evicted or could not be loaded
   */
  refreshWindow(): Promise<WindowInfo> {
    return this.buffer.runExclusive(async (tx) => {
      this.requireReady('refreshWindow');
      await tx.refreshWindow();
      this.resolveCurrentLocation();
      return this.getWindowInfo();
    });
  }

  /**
   * External eviction notice. Ignored for the active chapter.
   */
  markChapterEvicted(chapterIndex: number): Promise<boolean> {
    return this.buffer.runExclusive(async (tx) => {
      this.requireReady('markChapterEvicted');
      this.assertChapter(chapterIndex);
      return tx.markChapterEvicted(chapterIndex);
    });
  }

  // ============================================================================
  // Reads
  // ============================================================================

  getWindowInfo(): WindowInfo {
    this.requireReady('getWindowInfo');
    const state = this.store.getValue();
    return {
      activeChapter: state.activeChapter ?? 0,
      loadedChapterIndices: [...state.residentChapters],
      window: [...state.window],
      unavailableChapterIndices: [...state.unavailableChapters],
      totalChapters: state.totalChapters,
      totalGlobalPages: state.totalGlobalPages,
      phase: state.phase.phase,
    };
  }

  getPageContent(globalPageIndex: number): PageContentResult<TContent> {
    return this.buffer.getPageContent(globalPageIndex);
  }

  getCurrentLocation(): PageLocation {
    return this.currentLocation('getCurrentLocation');
  }

  getReadingPosition(): ReadingPosition {
    const location = this.currentLocation('getReadingPosition');
    const totalGlobalPages = this.mapper.totalPages;
    return {
      chapterIndex: location.chapterIndex,
      inChapterPageIndex: location.inChapterPageIndex,
      characterOffset: location.characterOffset,
      globalPageIndex: location.globalPageIndex,
      totalGlobalPages,
      percent: totalGlobalPages === 0 ? 0 : (location.globalPageIndex + 1) / totalGlobalPages,
    };
  }

  createBookmark(): BookmarkRecord {
    const location = this.currentLocation('createBookmark');
    const bookmark: BookmarkRecord = {
      chapterIndex: location.chapterIndex,
      inChapterPageIndex: location.inChapterPageIndex,
    };
    if (location.characterOffset !== undefined) {
      bookmark.characterOffset = location.characterOffset;
    }
    return bookmark;
  }

  getChapterStatus(chapterIndex: number): ChapterStatus {
    return this.buffer.getChapterStatus(chapterIndex);
  }

  getChapterPageCounts(): number[] {
    return this.mapper.getChapterPageCounts().map(entry => entry.pageCount);
  }

  getDebugInfo(): string {
    return this.buffer.getDebugInfo();
  }

  // ============================================================================
  // Events
  // ============================================================================

  on<K extends keyof NavigatorEvents>(event: K, listener: NavigatorEventListener<K>): Disposable {
    return this.subscriptions.add(this.events.on(event, listener));
  }

  once<K extends keyof NavigatorEvents>(event: K, listener: NavigatorEventListener<K>): Disposable {
    return this.subscriptions.add(this.events.once(event, listener));
  }

  // ============================================================================
  // Internals (lock held)
  // ============================================================================

  private async jumpTo(
    tx: Transaction<TContent>,
    ticket: number,
    chapterIndex: number,
    inChapterPageIndex: number
  ): Promise<PageLocation> {
    const isCurrent = () => ticket === this.latestTicket;
    if (!isCurrent()) {
      return this.supersede(chapterIndex);
    }

    const state = this.store.getValue();
    if (!isInWindow(state.window, chapterIndex)) {
      const result = await tx.loadWindow(chapterIndex, {
        requiredChapter: chapterIndex,
        activeChapter: chapterIndex,
        isCurrent,
      });
      if (!result.applied) {
        return this.supersede(chapterIndex);
      }
      this.recenter(result.window);
    } else if (!tx.isResident(chapterIndex)) {
      const result = await tx.refreshWindow({
        requiredChapter: chapterIndex,
        activeChapter: chapterIndex,
        isCurrent,
      });
      if (!result.applied) {
        return this.supersede(chapterIndex);
      }
    } else {
      this.store.dispatch({ type: 'SET_ACTIVE_CHAPTER', payload: chapterIndex });
    }

    this.applyPhase({ type: 'JUMP_LANDED', chapterIndex, policy: this.config.jumpPhasePolicy });

    const location = this.locationFor(chapterIndex, this.mapper.clampPage(chapterIndex, inChapterPageIndex));
    this.store.dispatch({ type: 'SET_LOCATION', payload: location });
    this.logger.debug('Jumped', { location, window: this.store.getValue().window });
    return location;
  }

  private async enterChapter(
    tx: Transaction<TContent>,
    chapterIndex: number,
    inChapterPageIndex?: number
  ): Promise<PageLocation> {
    const before = this.store.getValue();

    if (!isInWindow(before.window, chapterIndex)) {
      const result = await tx.loadWindow(chapterIndex, { requiredChapter: chapterIndex, activeChapter: chapterIndex });
      this.recenter(result.window);
    } else if (!tx.isResident(chapterIndex)) {
      await tx.refreshWindow({ requiredChapter: chapterIndex, activeChapter: chapterIndex });
    } else {
      this.store.dispatch({ type: 'SET_ACTIVE_CHAPTER', payload: chapterIndex });
    }

    this.applyPhase({ type: 'CHAPTER_ENTERED', chapterIndex });

    const state = this.store.getValue();
    const direction = shiftDirectionFor(state.window, chapterIndex, this.config.edgeMargin);
    if (direction && canShift(state.phase)) {
      await (direction === 'forward' ? tx.shiftForward() : tx.shiftBackward());
    }

    const requestedPage = inChapterPageIndex
      ?? (before.location?.chapterIndex === chapterIndex ? before.location.inChapterPageIndex : 0);
    const location = this.locationFor(chapterIndex, this.mapper.clampPage(chapterIndex, requestedPage));
    this.store.dispatch({ type: 'SET_LOCATION', payload: location });
    return location;
  }

  private async moveTo(tx: Transaction<TContent>, target: PageLocation): Promise<PageLocation> {
    if (target.chapterIndex !== this.store.getValue().activeChapter) {
      return this.enterChapter(tx, target.chapterIndex, target.inChapterPageIndex);
    }
    const location = this.locationFor(target.chapterIndex, target.inChapterPageIndex);
    this.store.dispatch({ type: 'SET_LOCATION', payload: location });
    return location;
  }

  /**
   * A full recompute during STARTUP moves the designated center
   */
  private recenter(window: number[]): void {
    const center = windowCenter(window);
    if (center !== null) {
      this.applyPhase({ type: 'RECENTERED', centerChapter: center });
    }
  }

  private applyPhase(event: PhaseEvent): void {
    const from = this.store.getValue().phase.phase;
    this.store.dispatch({ type: 'PHASE', payload: event });
    const to = this.store.getValue().phase.phase;

    if (from !== to) {
      const chapterIndex = event.type === 'RESET' || event.type === 'RECENTERED'
        ? event.centerChapter
        : event.chapterIndex;
      this.logger.debug(`Phase ${from} -> ${to}`, { chapterIndex, event: event.type });
      this.events.emit('phaseChanged', { from, to, chapterIndex });
    }
  }

  private supersede(targetChapter: number): PageLocation {
    this.logger.debug(`Navigation to chapter ${targetChapter} superseded`);
    this.events.emit('navigationSuperseded', { targetChapter });
    return this.currentLocation('navigation');
  }

  /**
   * Page counts before the active chapter may have changed; recompute the
   * global index of the current position
   */
  private resolveCurrentLocation(): void {
    const location = this.store.getValue().location;
    if (!location) return;
    const page = this.mapper.clampPage(location.chapterIndex, location.inChapterPageIndex);
    this.store.dispatch({
      type: 'SET_LOCATION',
      payload: this.anchored(this.locationFor(location.chapterIndex, page), location.characterOffset),
    });
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private takeTicket(): number {
    this.latestTicket += 1;
    return this.latestTicket;
  }

  private locationFor(chapterIndex: number, inChapterPageIndex: number): PageLocation {
    return this.buffer.withCharacterOffset({
      globalPageIndex: this.mapper.globalIndexFor(chapterIndex, inChapterPageIndex),
      chapterIndex,
      inChapterPageIndex,
    });
  }

  private anchored(location: PageLocation, characterOffset: number | undefined): PageLocation {
    return characterOffset === undefined ? location : { ...location, characterOffset };
  }

  private currentLocation(operation: string): PageLocation {
    const location = this.store.getValue().location;
    if (!location || !this.isReady) {
      throw new NotInitializedError(operation);
    }
    return location;
  }

  private requireReady(operation: string): void {
    if (!this.isReady) {
      throw new NotInitializedError(operation);
    }
  }

  private assertChapter(chapterIndex: number): void {
    if (!this.mapper.hasChapter(chapterIndex)) {
      throw new InvalidChapterError(chapterIndex, this.mapper.chapterCount);
    }
  }

  private assertCoordinate(chapterIndex: number, inChapterPageIndex: number): void {
    this.assertChapter(chapterIndex);
    if (!Number.isInteger(inChapterPageIndex) || inChapterPageIndex < 0) {
      throw new InvalidPageError(chapterIndex, inChapterPageIndex, this.mapper.getChapterPageCount(chapterIndex));
    }
  }
}
