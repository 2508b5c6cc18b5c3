/**
 * Disposable handles for subscriptions
 * @module api/disposable
 */

export interface Disposable {
  dispose(): void;
}

/**
 * Create a disposable from a cleanup function. Repeated dispose calls run the cleanup once.
 */
export function createDisposable(dispose: () => void): Disposable {
  let disposed = false;
  return {
    dispose: () => {
      if (!disposed) {
        disposed = true;
        dispose();
      }
    }
  };
}

/**
 * Holds the subscriptions a component owns and releases them together
 */
export class DisposableStore implements Disposable {
  private disposables: Set<Disposable> = new Set();
  private disposed = false;

  add<T extends Disposable>(disposable: T): T {
    if (this.disposed) {
      disposable.dispose();
      return disposable;
    }
    this.disposables.add(disposable);
    return disposable;
  }

  /**
   * Track a plain unsubscribe function, e.g. from a svelte store
   */
  addUnsubscriber(unsubscribe: () => void): Disposable {
    return this.add(createDisposable(unsubscribe));
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.disposables.forEach(d => d.dispose());
    this.disposables.clear();
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get size(): number {
    return this.disposables.size;
  }
}
