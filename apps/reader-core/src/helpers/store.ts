/**
 * Reducer-driven store backed by a svelte writable.
 * Subscribers always receive the latest state; intermediate states are not buffered.
 */

import { writable, get, type Writable } from 'svelte/store';

export type Reducer<TState, TAction> = (state: TState, action: TAction) => TState;

export type Subscriber<TState> = (state: TState) => void;

export class Store<TState, TAction> {
  private state: Writable<TState>;

  constructor(
    initialState: TState,
    private reducer: Reducer<TState, TAction>
  ) {
    this.state = writable(initialState);
  }

  dispatch(action: TAction): void {
    this.state.update(current => this.reducer(current, action));
  }

  getValue(): TState {
    return get(this.state);
  }

  /**
   * Subscribe to state changes. The subscriber is called immediately with the current state.
   * @returns Unsubscribe function
   */
  subscribe(subscriber: Subscriber<TState>): () => void {
    return this.state.subscribe(subscriber);
  }
}
