/**
 * Global Index Mapper
 *
 * Maps a document-wide page counter to (chapter, in-chapter page) and back.
 * The table is a list of chapter start offsets; a page count change only
 * rewrites the starts of the chapters after it.
 */

import type { ChapterPageCount, GlobalPageIndex, PageLocation } from '@chapterwise/shared-types';
import { InvalidChapterError, InvalidPageError, OutOfRangeError } from './errors';

export class GlobalIndexMapper {
  private pageCounts: number[] = [];
  private chapterStarts: number[] = [];
  private total = 0;

  /** Number of chapter starts rewritten by the last rebuild (full or partial) */
  private lastRebuildSpan = 0;

  get chapterCount(): number {
    return this.pageCounts.length;
  }

  get totalPages(): number {
    return this.total;
  }

  /**
   * Rebuild the whole table. Entries must cover chapters 0..n-1 in order.
   */
  buildMapping(chapterPageCounts: ReadonlyArray<ChapterPageCount>): void {
    const counts: number[] = [];
    chapterPageCounts.forEach((entry, position) => {
      if (entry.chapterIndex !== position) {
        throw new InvalidChapterError(entry.chapterIndex, chapterPageCounts.length);
      }
      counts.push(normalizePageCount(entry.chapterIndex, entry.pageCount));
    });

    this.pageCounts = counts;
    this.chapterStarts = new Array<number>(counts.length);
    this.rebuildFrom(0);
  }

  /**
   * Resolve a global page to its chapter coordinate
   */
  locate(globalPageIndex: GlobalPageIndex): PageLocation {
    if (!Number.isInteger(globalPageIndex) || globalPageIndex < 0 || globalPageIndex >= this.total) {
      throw new OutOfRangeError(globalPageIndex, this.total);
    }

    // Last chapter whose start is <= the requested page
    let low = 0;
    let high = this.chapterStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.chapterStarts[mid] <= globalPageIndex) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return {
      globalPageIndex,
      chapterIndex: low,
      inChapterPageIndex: globalPageIndex - this.chapterStarts[low],
    };
  }

  globalIndexFor(chapterIndex: number, inChapterPageIndex: number): GlobalPageIndex {
    this.assertChapter(chapterIndex);
    const pageCount = this.pageCounts[chapterIndex];
    if (!Number.isInteger(inChapterPageIndex) || inChapterPageIndex < 0 || inChapterPageIndex >= pageCount) {
      throw new InvalidPageError(chapterIndex, inChapterPageIndex, pageCount);
    }
    return this.chapterStarts[chapterIndex] + inChapterPageIndex;
  }

  /**
   * Record a measured page count.
   * @returns false when the count is unchanged and nothing was rebuilt
   */
  updateChapterPageCount(chapterIndex: number, newCount: number): boolean {
    this.assertChapter(chapterIndex);
    const count = normalizePageCount(chapterIndex, newCount);
    if (this.pageCounts[chapterIndex] === count) {
      return false;
    }

    this.pageCounts[chapterIndex] = count;
    // Starts up to and including this chapter are unaffected
    this.rebuildFrom(chapterIndex + 1);
    return true;
  }

  getChapterPageCount(chapterIndex: number): number {
    this.assertChapter(chapterIndex);
    return this.pageCounts[chapterIndex];
  }

  getChapterStart(chapterIndex: number): GlobalPageIndex {
    this.assertChapter(chapterIndex);
    return this.chapterStarts[chapterIndex];
  }

  getChapterPageCounts(): ChapterPageCount[] {
    return this.pageCounts.map((pageCount, chapterIndex) => ({ chapterIndex, pageCount }));
  }

  /**
   * Clamp a page index into the chapter's known range
   */
  clampPage(chapterIndex: number, inChapterPageIndex: number): number {
    const pageCount = this.getChapterPageCount(chapterIndex);
    return Math.min(Math.max(0, Math.floor(inChapterPageIndex)), pageCount - 1);
  }

  hasChapter(chapterIndex: number): boolean {
    return Number.isInteger(chapterIndex) && chapterIndex >= 0 && chapterIndex < this.pageCounts.length;
  }

  getLastRebuildSpan(): number {
    return this.lastRebuildSpan;
  }

  private rebuildFrom(firstChapter: number): void {
    let next = firstChapter === 0
      ? 0
      : this.chapterStarts[firstChapter - 1] + this.pageCounts[firstChapter - 1];

    for (let chapter = firstChapter; chapter < this.pageCounts.length; chapter++) {
      this.chapterStarts[chapter] = next;
      next += this.pageCounts[chapter];
    }

    this.total = next;
    this.lastRebuildSpan = Math.max(0, this.pageCounts.length - firstChapter);
  }

  private assertChapter(chapterIndex: number): void {
    if (!this.hasChapter(chapterIndex)) {
      throw new InvalidChapterError(chapterIndex, this.pageCounts.length);
    }
  }
}

/**
 * Page counts are non-negative whole numbers; an empty chapter still occupies one page
 */
function normalizePageCount(chapterIndex: number, pageCount: number): number {
  if (!Number.isInteger(pageCount) || pageCount < 0) {
    throw new InvalidPageError(chapterIndex, pageCount, pageCount);
  }
  return Math.max(1, pageCount);
}
