/**
 * Buffer phase state machine.
 *
 * STARTUP holds until the reader reaches the designated center chapter of the
 * starting window; STEADY is terminal until the next document is opened.
 */

import { Phase } from '@chapterwise/shared-types';

export type PhaseState =
  | { phase: typeof Phase.Startup; centerChapter: number }
  | { phase: typeof Phase.Steady; enteredAtChapter: number };

/**
 * How a navigation jump interacts with STARTUP:
 * - `promote`: landing on or past the designated center enters STEADY
 * - `await-entry`: only a chapter-entered report can end STARTUP
 */
export type JumpPhasePolicy = 'promote' | 'await-entry';

export type PhaseEvent =
  | { type: 'RESET'; centerChapter: number }
  | { type: 'RECENTERED'; centerChapter: number }
  | { type: 'CHAPTER_ENTERED'; chapterIndex: number }
  | { type: 'JUMP_LANDED'; chapterIndex: number; policy: JumpPhasePolicy };

export function createStartupPhase(centerChapter: number): PhaseState {
  return { phase: Phase.Startup, centerChapter };
}

export function phaseReducer(state: PhaseState, event: PhaseEvent): PhaseState {
  if (event.type === 'RESET') {
    return createStartupPhase(event.centerChapter);
  }

  // No event leaves STEADY
  if (state.phase === Phase.Steady) {
    return state;
  }

  switch (event.type) {
    case 'RECENTERED':
      return event.centerChapter === state.centerChapter
        ? state
        : createStartupPhase(event.centerChapter);

    case 'CHAPTER_ENTERED':
      return event.chapterIndex === state.centerChapter
        ? { phase: Phase.Steady, enteredAtChapter: event.chapterIndex }
        : state;

    case 'JUMP_LANDED':
      return event.policy === 'promote' && event.chapterIndex >= state.centerChapter
        ? { phase: Phase.Steady, enteredAtChapter: event.chapterIndex }
        : state;

    default:
      return state;
  }
}

/**
 * Incremental sliding is only allowed once the buffer has settled
 */
export function canShift(state: PhaseState): boolean {
  return state.phase === Phase.Steady;
}
