/**
 * Global Index Mapper Tests
 *
 * Covers:
 * - Round trip between global pages and chapter coordinates
 * - Range errors
 * - Suffix-only rebuild on page count changes
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { GlobalIndexMapper } from '../../reader/pagination/global-index-mapper';
import {
  InvalidChapterError,
  InvalidPageError,
  OutOfRangeError,
} from '../../reader/pagination/errors';

function counts(...pageCounts: number[]) {
  return pageCounts.map((pageCount, chapterIndex) => ({ chapterIndex, pageCount }));
}

describe('GlobalIndexMapper', () => {
  let mapper: GlobalIndexMapper;

  beforeEach(() => {
    mapper = new GlobalIndexMapper();
    mapper.buildMapping(counts(3, 5, 2, 4));
  });

  // ==========================================================================
  // buildMapping
  // ==========================================================================

  describe('buildMapping', () => {
    it('should compute chapter starts and total pages', () => {
      expect(mapper.totalPages).toBe(14);
      expect(mapper.chapterCount).toBe(4);
      expect([0, 1, 2, 3].map(c => mapper.getChapterStart(c))).toEqual([0, 3, 8, 10]);
    });

    it('should raise empty chapters to one page', () => {
      mapper.buildMapping(counts(0, 2));
      expect(mapper.getChapterPageCount(0)).toBe(1);
      expect(mapper.totalPages).toBe(3);
    });

    it('should reject entries out of chapter order', () => {
      expect(() => mapper.buildMapping([{ chapterIndex: 1, pageCount: 2 }])).toThrow(InvalidChapterError);
    });

    it('should reject fractional page counts', () => {
      expect(() => mapper.buildMapping(counts(2.5))).toThrow(InvalidPageError);
    });

    it('should reject negative page counts', () => {
      expect(() => mapper.buildMapping(counts(3, -1))).toThrow(InvalidPageError);
    });

    it('should handle an empty book', () => {
      mapper.buildMapping([]);
      expect(mapper.totalPages).toBe(0);
      expect(() => mapper.locate(0)).toThrow(OutOfRangeError);
    });
  });

  // ==========================================================================
  // locate / globalIndexFor
  // ==========================================================================

  describe('locate', () => {
    it('should resolve pages at chapter boundaries', () => {
      expect(mapper.locate(0)).toEqual({ globalPageIndex: 0, chapterIndex: 0, inChapterPageIndex: 0 });
      expect(mapper.locate(2)).toEqual({ globalPageIndex: 2, chapterIndex: 0, inChapterPageIndex: 2 });
      expect(mapper.locate(3)).toEqual({ globalPageIndex: 3, chapterIndex: 1, inChapterPageIndex: 0 });
      expect(mapper.locate(13)).toEqual({ globalPageIndex: 13, chapterIndex: 3, inChapterPageIndex: 3 });
    });

    it('should round trip every global page', () => {
      for (let page = 0; page < mapper.totalPages; page++) {
        const location = mapper.locate(page);
        expect(mapper.globalIndexFor(location.chapterIndex, location.inChapterPageIndex)).toBe(page);
      }
    });

    it('should be monotonic in document order', () => {
      const flattened: string[] = [];
      for (let page = 0; page < mapper.totalPages; page++) {
        const { chapterIndex, inChapterPageIndex } = mapper.locate(page);
        flattened.push(`${chapterIndex}:${inChapterPageIndex}`);
      }
      expect(flattened.slice(0, 5)).toEqual(['0:0', '0:1', '0:2', '1:0', '1:1']);
      expect(flattened).toHaveLength(14);
    });

    it('should throw OutOfRange for negative, fractional and past-the-end pages', () => {
      expect(() => mapper.locate(-1)).toThrow(OutOfRangeError);
      expect(() => mapper.locate(1.5)).toThrow(OutOfRangeError);
      expect(() => mapper.locate(14)).toThrow('Global page 14 is outside [0, 14)');
    });
  });

  describe('globalIndexFor', () => {
    it('should reject unknown chapters', () => {
      expect(() => mapper.globalIndexFor(4, 0)).toThrow(InvalidChapterError);
      expect(() => mapper.globalIndexFor(-1, 0)).toThrow(InvalidChapterError);
    });

    it('should reject pages outside the chapter', () => {
      expect(() => mapper.globalIndexFor(1, 5)).toThrow('Page 5 is outside [0, 5) in chapter 1');
      expect(() => mapper.globalIndexFor(1, -1)).toThrow(InvalidPageError);
    });
  });

  // ==========================================================================
  // updateChapterPageCount
  // ==========================================================================

  describe('updateChapterPageCount', () => {
    it('should be a no-op when the count is unchanged', () => {
      expect(mapper.updateChapterPageCount(1, 5)).toBe(false);
      expect(mapper.totalPages).toBe(14);
    });

    it('should reject a negative count and keep the table', () => {
      expect(() => mapper.updateChapterPageCount(1, -4)).toThrow(InvalidPageError);
      expect(mapper.getChapterPageCount(1)).toBe(5);
      expect(mapper.totalPages).toBe(14);
    });

    it('should leave the prefix untouched when a count shrinks from 10 to 7', () => {
      mapper.buildMapping(counts(4, 6, 10, 3, 8));
      const prefix = [0, 1, 2].map(c => mapper.getChapterStart(c));
      const pageInChapter1 = mapper.globalIndexFor(1, 5);

      expect(mapper.updateChapterPageCount(2, 7)).toBe(true);

      expect([0, 1, 2].map(c => mapper.getChapterStart(c))).toEqual(prefix);
      expect(mapper.globalIndexFor(1, 5)).toBe(pageInChapter1);
      expect(mapper.getChapterStart(3)).toBe(17);
      expect(mapper.getChapterStart(4)).toBe(20);
      expect(mapper.totalPages).toBe(28);
    });

    it('should only rewrite the chapters after the updated one', () => {
      mapper.buildMapping(counts(1, 1, 1, 1, 1, 1));
      expect(mapper.getLastRebuildSpan()).toBe(6);

      mapper.updateChapterPageCount(3, 4);
      expect(mapper.getLastRebuildSpan()).toBe(2);
    });

    it('should keep locate consistent after an update', () => {
      mapper.updateChapterPageCount(0, 1);
      expect(mapper.locate(1)).toEqual({ globalPageIndex: 1, chapterIndex: 1, inChapterPageIndex: 0 });
      expect(mapper.totalPages).toBe(12);
    });

    it('should be idempotent', () => {
      mapper.updateChapterPageCount(2, 9);
      const starts = [0, 1, 2, 3].map(c => mapper.getChapterStart(c));
      expect(mapper.updateChapterPageCount(2, 9)).toBe(false);
      expect([0, 1, 2, 3].map(c => mapper.getChapterStart(c))).toEqual(starts);
    });
  });

  describe('clampPage', () => {
    it('should clamp into the chapter range', () => {
      expect(mapper.clampPage(1, 99)).toBe(4);
      expect(mapper.clampPage(1, -3)).toBe(0);
      expect(mapper.clampPage(1, 2.7)).toBe(2);
    });
  });
});
