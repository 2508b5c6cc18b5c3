/**
 * Page Measurer
 *
 * Rendering-layer contract used when the layout changes: a pure function of
 * (content block, viewport) to page count and page start offsets. It knows
 * nothing about chapters beyond the index it is handed, nor about windows.
 *
 * `TextPageMeasurer` is a line-wrapping measurer for plain text blocks, used
 * by hosts without a real layout engine and by tests.
 */

import { InvalidConfigError } from '../pagination/errors';

export interface PageMeasurement {
  pageCount: number;
  /** Character offset at which each page starts, ascending, first entry 0 */
  pageStartOffsets?: number[];
}

export interface PageMeasurer<TContent = string> {
  measure(content: TContent, chapterIndex: number): PageMeasurement | Promise<PageMeasurement>;
}

export interface Viewport {
  /** Characters that fit on one line */
  charsPerLine: number;
  /** Lines that fit on one page */
  linesPerPage: number;
}

export const DEFAULT_VIEWPORT: Viewport = {
  charsPerLine: 60,
  linesPerPage: 30,
};

/**
 * Start offsets of the wrapped lines of a text block.
 * Paragraphs break on '\n'; lines break greedily at spaces, and a word longer
 * than a line is split.
 */
export function layoutLines(text: string, charsPerLine: number): number[] {
  const lineStarts: number[] = [];
  let paragraphStart = 0;

  for (const paragraph of text.split('\n')) {
    if (paragraph.length === 0) {
      lineStarts.push(paragraphStart);
    } else {
      let lineStart = 0;
      while (lineStart < paragraph.length) {
        lineStarts.push(paragraphStart + lineStart);
        if (paragraph.length - lineStart <= charsPerLine) break;

        const limit = lineStart + charsPerLine;
        const breakAt = paragraph.lastIndexOf(' ', limit);
        let next = breakAt > lineStart ? breakAt + 1 : limit;
        while (next < paragraph.length && paragraph[next] === ' ') next++;
        lineStart = next;
      }
    }
    paragraphStart += paragraph.length + 1;
  }

  return lineStarts;
}

export function measureTextBlock(text: string, viewport: Viewport): Required<PageMeasurement> {
  assertViewport(viewport);

  const lineStarts = layoutLines(text, viewport.charsPerLine);
  const pageStartOffsets: number[] = [];
  for (let line = 0; line < lineStarts.length; line += viewport.linesPerPage) {
    pageStartOffsets.push(lineStarts[line]);
  }

  if (pageStartOffsets.length === 0) {
    pageStartOffsets.push(0);
  }

  return { pageCount: pageStartOffsets.length, pageStartOffsets };
}

/**
 * Page containing a character offset: the last page starting at or before it
 */
export function pageForOffset(pageStartOffsets: readonly number[], characterOffset: number): number {
  let page = 0;
  for (let index = 0; index < pageStartOffsets.length; index++) {
    if (pageStartOffsets[index] <= characterOffset) {
      page = index;
    } else {
      break;
    }
  }
  return page;
}

export class TextPageMeasurer implements PageMeasurer<string> {
  private viewport: Viewport;

  constructor(viewport: Viewport = DEFAULT_VIEWPORT) {
    assertViewport(viewport);
    this.viewport = { ...viewport };
  }

  getViewport(): Viewport {
    return { ...this.viewport };
  }

  /**
   * Change the layout; the next repagination picks it up
   */
  setViewport(viewport: Partial<Viewport>): void {
    const next = { ...this.viewport, ...viewport };
    assertViewport(next);
    this.viewport = next;
  }

  measure(content: string): Required<PageMeasurement> {
    return measureTextBlock(content, this.viewport);
  }
}

function assertViewport(viewport: Viewport): void {
  if (!Number.isInteger(viewport.charsPerLine) || viewport.charsPerLine < 1) {
    throw new InvalidConfigError('charsPerLine', `expected a positive integer, got ${viewport.charsPerLine}`);
  }
  if (!Number.isInteger(viewport.linesPerPage) || viewport.linesPerPage < 1) {
    throw new InvalidConfigError('linesPerPage', `expected a positive integer, got ${viewport.linesPerPage}`);
  }
}
