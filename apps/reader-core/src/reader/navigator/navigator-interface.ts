/**
 * Navigator Interface
 *
 * Contracts between the chapter window engine, the document parser that
 * feeds it and the rendering layer that displays it.
 */

import type { PageLocation, Phase } from '@chapterwise/shared-types';
import type { JumpPhasePolicy } from '../pagination/phase-machine';
import type { ShiftDirection } from '../pagination/window-calculator';

// ============================================================================
// Chapter Source
// ============================================================================

/**
 * Parsed chapter as delivered by the document parser
 */
export interface ChapterPayload<TContent = string> {
  /** Chapter markup or any parser-specific content handle */
  pageContent: TContent;

  /** Page count under the current layout */
  pageCount: number;
}

/**
 * Document parser boundary. Calls may be slow and may overlap; a rejected
 * `loadChapter` is treated as a load failure.
 */
export interface ChapterSource<TContent = string> {
  getChapterCount(): Promise<number>;
  loadChapter(chapterIndex: number): Promise<ChapterPayload<TContent>>;
}

// ============================================================================
// Page content handed to the rendering layer
// ============================================================================

export type PageContentResult<TContent = string> =
  | { kind: 'page'; location: PageLocation; content: TContent }
  | { kind: 'unavailable'; location: PageLocation; reason: string }
  | { kind: 'not-resident'; location: PageLocation };

// ============================================================================
// Configuration
// ============================================================================

export interface WindowNavigatorConfig {
  /** Number of chapters kept resident. Default: 5 */
  windowSize: number;

  /**
   * Distance from a window edge at which entering a chapter slides the
   * window by one chapter. Default: 0 (only the edge chapter itself)
   */
  edgeMargin: number;

  /** Page count assumed for chapters that have not been measured. Default: 1 */
  fallbackPageCount: number;

  /** Attempts per chapter load, including the first. Default: 2 */
  maxLoadAttempts: number;

  /** Whether a jump landing on or past the starting center ends STARTUP. Default: 'promote' */
  jumpPhasePolicy: JumpPhasePolicy;

  /** Verbose console logging */
  debug: boolean;
}

// ============================================================================
// Navigator Events
// ============================================================================

export type EvictionReason = 'window' | 'shift' | 'external' | 'reset';

export interface NavigatorEvents {
  /** A chapter's content became resident */
  chapterLoaded: { chapterIndex: number; pageCount: number };

  /** A chapter's content was released */
  chapterEvicted: { chapterIndex: number; reason: EvictionReason };

  /** A window member could not be loaded */
  chapterUnavailable: { chapterIndex: number; reason: string };

  /** The window slid by one chapter */
  windowShifted: { direction: ShiftDirection; dropped: number; appended: number; window: number[] };

  /** Phase changed (fires once per document session) */
  phaseChanged: { from: Phase; to: Phase; chapterIndex: number };

  /** A navigation was overtaken by a newer one and its loads were discarded */
  navigationSuperseded: { targetChapter: number };

  /** Page counts were re-measured */
  repaginated: { changedChapters: number[]; location: PageLocation };
}

export type NavigatorEventListener<K extends keyof NavigatorEvents> = (
  data: NavigatorEvents[K]
) => void;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if two locations point to the same page and anchor
 */
export function locationsEqual(a: PageLocation | null, b: PageLocation | null): boolean {
  if (a === b) return true;
  if (!a || !b) return false;
  return (
    a.globalPageIndex === b.globalPageIndex &&
    a.chapterIndex === b.chapterIndex &&
    a.inChapterPageIndex === b.inChapterPageIndex &&
    a.characterOffset === b.characterOffset
  );
}
