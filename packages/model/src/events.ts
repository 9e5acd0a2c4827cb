import { toDisposable, type DisposableLike } from "./disposables.js";
import { errorMessage } from "./errors.js";
import { nullLogger, type Logger } from "./logger.js";

export type Listener<T> = (value: T) => void;

/**
 * Subscription side of an emitter.
 */
export type Event<T> = (listener: Listener<T>) => DisposableLike;

/**
 * Synchronous emitter. A throwing listener is logged and does not stop the
 * others.
 */
export class SimpleEmitter<T> {
  #listeners = new Set<Listener<T>>();

  constructor(private readonly logger: Logger = nullLogger) {}

  readonly event: Event<T> = (listener) => this.on(listener);

  on(listener: Listener<T>): DisposableLike {
    this.#listeners.add(listener);
    return toDisposable(() => this.#listeners.delete(listener));
  }

  get listenerCount(): number {
    return this.#listeners.size;
  }

  emit(value: T): void {
    for (const listener of [...this.#listeners]) {
      try {
        listener(value);
      } catch (error) {
        this.logger.error(`event listener failed: ${errorMessage(error)}`);
      }
    }
  }
}
