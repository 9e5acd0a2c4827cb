/**
 * Attach Package - Template Store
 *
 * Persisted templates by identity. `load` hands out the editable instance
 * form; changes reach the store only through `save`.
 */

import { cloneTree, type ObjectNode } from "@viewbind/model";

export interface TemplateStore {
  load(rootIdentity: string): ObjectNode | undefined;
  save(rootIdentity: string, root: ObjectNode): void;
  list(): string[];
}

export class MemoryTemplateStore implements TemplateStore {
  readonly #templates = new Map<string, ObjectNode>();

  constructor(entries: Iterable<readonly [string, ObjectNode]> = []) {
    for (const [id, root] of entries) {
      this.save(id, root);
    }
  }

  load(rootIdentity: string): ObjectNode | undefined {
    const root = this.#templates.get(rootIdentity);
    return root ? cloneTree(root) : undefined;
  }

  save(rootIdentity: string, root: ObjectNode): void {
    this.#templates.set(rootIdentity, cloneTree(root));
  }

  list(): string[] {
    return [...this.#templates.keys()];
  }
}
