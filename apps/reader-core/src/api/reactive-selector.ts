/**
 * Store-to-Svelte bridge
 * Turns reducer store selectors into svelte readable channels
 * @module api/reactive-selector
 */

import { readable, type Readable } from 'svelte/store';
import type { Store } from '../helpers/store';

/**
 * Create a readable channel that only publishes when the selected slice changes
 *
 * @param store - Reducer store to follow
 * @param selector - Extracts the slice to publish
 * @param equalityFn - Decides whether two slices are the same value
 *
 * @example
 * ```typescript
 * const phase = createMemoizedSelector(windowStore, state => state.phase.phase);
 * const stop = phase.subscribe(value => console.log(value));
 * ```
 */
export function createMemoizedSelector<TState, TAction, TSelected>(
  store: Store<TState, TAction>,
  selector: (state: TState) => TSelected,
  equalityFn: (a: TSelected, b: TSelected) => boolean = Object.is
): Readable<TSelected> {
  return readable<TSelected>(selector(store.getValue()), (set) => {
    let previousValue = selector(store.getValue());
    set(previousValue);

    return store.subscribe((state) => {
      const newValue = selector(state);
      if (!equalityFn(newValue, previousValue)) {
        previousValue = newValue;
        set(newValue);
      }
    });
  });
}

/**
 * Shallow array comparison for index lists rebuilt on every commit
 */
export function shallowArrayEqual<TItem>(a: readonly TItem[], b: readonly TItem[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((item, index) => item === b[index]);
}

/**
 * Shallow comparison of flat records
 */
export function shallowRecordEqual<TRecord extends object>(a: TRecord, b: TRecord): boolean {
  if (a === b) return true;
  const left = ownEntries(a);
  const right = new Map(ownEntries(b));
  if (left.length !== right.size) return false;
  return left.every(([key, value]) => {
    if (!right.has(key)) return false;
    const other = right.get(key);
    if (Array.isArray(value) && Array.isArray(other)) {
      return shallowArrayEqual(value, other);
    }
    return Object.is(value, other);
  });
}

function ownEntries(record: object): Array<[string, unknown]> {
  return Object.entries(record);
}

export function createArraySelector<TState, TAction, TItem>(
  store: Store<TState, TAction>,
  selector: (state: TState) => TItem[]
): Readable<TItem[]> {
  return createMemoizedSelector(store, selector, shallowArrayEqual);
}
