/**
 * Pagination types shared between the window engine and reader shells
 */

/**
 * Zero-based page index spanning every chapter in document order
 */
export type GlobalPageIndex = number;

/**
 * A materialized position in the book.
 * Always derived from the current chapter page counts, never stored as truth.
 */
export interface PageLocation {
  globalPageIndex: GlobalPageIndex;
  chapterIndex: number;
  inChapterPageIndex: number;
  /** Character offset of the page start inside the chapter, when measured */
  characterOffset?: number;
}

export interface ChapterPageCount {
  chapterIndex: number;
  pageCount: number;
}

/**
 * Buffer lifecycle phase
 */
export const Phase = {
  Startup: 'STARTUP',
  Steady: 'STEADY',
} as const;

export type Phase = (typeof Phase)[keyof typeof Phase];

export type ChapterStatus = 'absent' | 'loading' | 'resident' | 'evicted' | 'unavailable';

/**
 * Snapshot handed to the rendering layer
 */
export interface WindowInfo {
  activeChapter: number;
  /** Chapters whose content is currently held in memory, ascending */
  loadedChapterIndices: number[];
  /** The window members, ascending and contiguous */
  window: number[];
  /** Window members whose content could not be loaded */
  unavailableChapterIndices: number[];
  totalChapters: number;
  totalGlobalPages: number;
  phase: Phase;
}
