/**
 * Window arithmetic over chapter indices.
 * Pure functions; the buffer engine owns the state.
 */

/**
 * Contiguous window of min(windowSize, totalChapters) chapters centered as
 * closely as possible on `centerChapterIndex`, pinned at both document ends.
 */
export function computeWindow(
  centerChapterIndex: number,
  totalChapters: number,
  windowSize: number
): number[] {
  if (totalChapters <= 0) return [];

  const size = Math.min(windowSize, totalChapters);
  const center = clampChapter(centerChapterIndex, totalChapters);

  let start = Math.max(0, center - Math.floor(windowSize / 2));
  const end = Math.min(totalChapters - 1, start + size - 1);
  start = Math.max(0, end - size + 1);

  return Array.from({ length: end - start + 1 }, (_, offset) => start + offset);
}

/**
 * The designated center of a window: its middle member, or the upper-middle for even sizes
 */
export function windowCenter(window: readonly number[]): number | null {
  if (window.length === 0) return null;
  return window[Math.floor(window.length / 2)];
}

export function clampChapter(chapterIndex: number, totalChapters: number): number {
  return Math.min(Math.max(0, Math.floor(chapterIndex)), totalChapters - 1);
}

export function isInWindow(window: readonly number[], chapterIndex: number): boolean {
  return window.length > 0 && chapterIndex >= window[0] && chapterIndex <= window[window.length - 1];
}

export type ShiftDirection = 'forward' | 'backward';

/**
 * Decide whether entering `chapterIndex` should slide the window.
 * A shift fires when the chapter is within `edgeMargin` of an edge and
 * strictly closer to that edge than to the opposite one.
 */
export function shiftDirectionFor(
  window: readonly number[],
  chapterIndex: number,
  edgeMargin: number
): ShiftDirection | null {
  if (!isInWindow(window, chapterIndex)) return null;

  const toLeading = window[window.length - 1] - chapterIndex;
  const toTrailing = chapterIndex - window[0];

  if (toLeading <= edgeMargin && toLeading < toTrailing) return 'forward';
  if (toTrailing <= edgeMargin && toTrailing < toLeading) return 'backward';
  return null;
}
