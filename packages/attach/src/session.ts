/**
 * Attach Package - Session Store
 *
 * String key/value storage that survives a host reload but not the host
 * session. Pending attach requests live here between generation and reload.
 */

export interface SessionStore {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  delete(key: string): void;
}

/**
 * In-process session store.
 */
export class MemorySessionStore implements SessionStore {
  readonly #values = new Map<string, string>();

  get(key: string): string | undefined {
    return this.#values.get(key);
  }

  set(key: string, value: string): void {
    this.#values.set(key, value);
  }

  delete(key: string): void {
    this.#values.delete(key);
  }
}
