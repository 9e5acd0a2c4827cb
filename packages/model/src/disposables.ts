export interface DisposableLike {
  dispose(): void;
}

export function toDisposable(fn: () => void): DisposableLike {
  return { dispose: fn };
}

/**
 * Collects subscriptions so a service can release them in one call.
 */
export class DisposableStore implements DisposableLike {
  #items: DisposableLike[] = [];
  #disposed = false;

  add(item: DisposableLike): DisposableLike {
    if (this.#disposed) {
      item.dispose();
      return item;
    }
    this.#items.push(item);
    return item;
  }

  get isDisposed(): boolean {
    return this.#disposed;
  }

  dispose(): void {
    if (this.#disposed) return;
    this.#disposed = true;
    for (const item of this.#items.splice(0, this.#items.length)) {
      item.dispose();
    }
  }
}
