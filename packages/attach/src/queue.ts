/**
 * Attach Package - Pending Attach Queue
 *
 * Requests that could not be resolved before the host reloaded. The queue is
 * persisted as newline-separated `rootIdentity|typeName|artifactPath` records,
 * deduplicated and sorted ordinally, so the stored string is the same however
 * the requests arrived. Field values must not contain `|` or line breaks.
 */

import type { SessionStore } from "./session.js";

export interface AttachRequest {
  rootIdentity: string;
  typeName: string;

  /** Artifact the type was generated into; may be empty */
  artifactPath: string;
}

export const PENDING_ATTACH_KEY = "viewbind.pendingAttach";

export class PendingAttachQueue {
  constructor(
    private readonly store: SessionStore,
    private readonly key: string = PENDING_ATTACH_KEY
  ) {}

  /**
   * Add a request. Returns false when an identical record is already queued.
   */
  add(request: AttachRequest): boolean {
    const records = this.#readRecords();
    const record = formatAttachRecord(request);
    if (records.includes(record)) return false;
    this.#writeRecords([...records, record]);
    return true;
  }

  list(): AttachRequest[] {
    return parseAttachRecords(this.store.get(this.key) ?? "");
  }

  /**
   * Return every queued request and clear the queue.
   */
  takeAll(): AttachRequest[] {
    const requests = this.list();
    this.clear();
    return requests;
  }

  clear(): void {
    this.store.delete(this.key);
  }

  get size(): number {
    return this.list().length;
  }

  #readRecords(): string[] {
    return this.list().map(formatAttachRecord);
  }

  #writeRecords(records: readonly string[]): void {
    const sorted = [...new Set(records)].sort(compareOrdinal);
    if (sorted.length === 0) {
      this.clear();
      return;
    }
    this.store.set(this.key, sorted.join("\n"));
  }
}

/* =============================================================================
 * RECORD FORMAT
 * ============================================================================= */

export function formatAttachRecord(request: AttachRequest): string {
  return `${request.rootIdentity}|${request.typeName}|${request.artifactPath}`;
}

/**
 * Parse stored records. Blank lines and records with fewer than two fields
 * are skipped.
 */
export function parseAttachRecords(text: string): AttachRequest[] {
  const requests: AttachRequest[] = [];
  for (const line of text.split("\n")) {
    const parts = line.replace(/\r$/, "").split("|");
    const [rootIdentity, typeName, artifactPath] = parts;
    if (parts.length < 2 || !rootIdentity || !typeName) continue;
    requests.push({ rootIdentity, typeName, artifactPath: artifactPath ?? "" });
  }
  return requests;
}

function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
