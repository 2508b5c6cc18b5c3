/**
 * Reading position types exchanged with the persistence layer
 */

/**
 * Bookmark record a reader shell stores and hands back on reopen.
 * The storage format is owned by the shell.
 */
export interface BookmarkRecord {
  chapterIndex: number;
  inChapterPageIndex: number;
  characterOffset?: number;
}

export interface ReadingPosition extends BookmarkRecord {
  globalPageIndex: number;
  totalGlobalPages: number;
  /** Progress through the whole book (0.0 - 1.0) */
  percent: number;
}
