import type { PageLocation } from '@chapterwise/shared-types';
import type { Reducer } from '../../helpers/store';
import { createStartupPhase, phaseReducer, type PhaseEvent, type PhaseState } from './phase-machine';

/**
 * Published snapshot of one open document
 */
export interface ReaderWindowState {
  sessionId: string | null;
  status: 'idle' | 'ready';
  totalChapters: number;
  totalGlobalPages: number;
  window: number[];
  activeChapter: number | null;
  phase: PhaseState;
  residentChapters: number[];
  unavailableChapters: number[];
  location: PageLocation | null;
}

export interface WindowCommit {
  window: number[];
  residentChapters: number[];
  unavailableChapters: number[];
  totalGlobalPages: number;
  activeChapter?: number;
}

export type ReaderWindowAction =
  | { type: 'OPEN'; payload: { sessionId: string; totalChapters: number; totalGlobalPages: number } }
  | { type: 'COMMIT_WINDOW'; payload: WindowCommit }
  | { type: 'SET_RESIDENCY'; payload: { residentChapters: number[]; unavailableChapters: number[] } }
  | { type: 'SET_ACTIVE_CHAPTER'; payload: number }
  | { type: 'PHASE'; payload: PhaseEvent }
  | { type: 'SET_TOTAL_PAGES'; payload: number }
  | { type: 'SET_LOCATION'; payload: PageLocation | null }
  | { type: 'CLOSE' };

export const initialReaderWindowState: ReaderWindowState = {
  sessionId: null,
  status: 'idle',
  totalChapters: 0,
  totalGlobalPages: 0,
  window: [],
  activeChapter: null,
  phase: createStartupPhase(0),
  residentChapters: [],
  unavailableChapters: [],
  location: null,
};

export const readerWindowReducer: Reducer<ReaderWindowState, ReaderWindowAction> = (state, action) => {
  switch (action.type) {
    case 'OPEN':
      return {
        ...initialReaderWindowState,
        sessionId: action.payload.sessionId,
        totalChapters: action.payload.totalChapters,
        totalGlobalPages: action.payload.totalGlobalPages,
      };

    case 'COMMIT_WINDOW':
      return {
        ...state,
        status: 'ready',
        window: action.payload.window,
        residentChapters: action.payload.residentChapters,
        unavailableChapters: action.payload.unavailableChapters,
        totalGlobalPages: action.payload.totalGlobalPages,
        activeChapter: action.payload.activeChapter ?? state.activeChapter,
      };

    case 'SET_RESIDENCY':
      return {
        ...state,
        residentChapters: action.payload.residentChapters,
        unavailableChapters: action.payload.unavailableChapters,
      };

    case 'SET_ACTIVE_CHAPTER':
      return { ...state, activeChapter: action.payload };

    case 'PHASE': {
      const phase = phaseReducer(state.phase, action.payload);
      return phase === state.phase ? state : { ...state, phase };
    }

    case 'SET_TOTAL_PAGES':
      return { ...state, totalGlobalPages: action.payload };

    case 'SET_LOCATION':
      return { ...state, location: action.payload };

    case 'CLOSE':
      return initialReaderWindowState;

    default:
      return state;
  }
};
