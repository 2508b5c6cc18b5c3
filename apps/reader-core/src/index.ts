/**
 * Chapter window engine
 *
 * Keeps a bounded window of chapters resident, maps a document-wide page
 * index onto them and publishes the reader's position.
 */

export * from './reader/navigator';

export { GlobalIndexMapper } from './reader/pagination/global-index-mapper';
export {
  computeWindow,
  windowCenter,
  shiftDirectionFor,
  type ShiftDirection,
} from './reader/pagination/window-calculator';
export {
  phaseReducer,
  canShift,
  type PhaseState,
  type PhaseEvent,
  type JumpPhasePolicy,
} from './reader/pagination/phase-machine';
export {
  WindowBufferEngine,
  type BufferTransaction,
  type LoadWindowResult,
  type ResidentChapter,
} from './reader/pagination/window-buffer';
export type { ReaderWindowState } from './reader/pagination/window-state';
export {
  ReaderError,
  OutOfRangeError,
  InvalidChapterError,
  InvalidPageError,
  NotInitializedError,
  ChapterLoadError,
  InvalidConfigError,
  isReaderError,
  type ReaderErrorCode,
} from './reader/pagination/errors';

export {
  TextPageMeasurer,
  measureTextBlock,
  pageForOffset,
  DEFAULT_VIEWPORT,
  type PageMeasurer,
  type PageMeasurement,
  type Viewport,
} from './reader/renderer/page-measurer';

export type { Disposable } from './api/disposable';

export * from '@chapterwise/shared-types';
