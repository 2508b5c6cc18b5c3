export {
  Phase,
  type GlobalPageIndex,
  type PageLocation,
  type ChapterPageCount,
  type ChapterStatus,
  type WindowInfo,
} from './pagination';

export type { BookmarkRecord, ReadingPosition } from './progress';
