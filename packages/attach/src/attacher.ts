/**
 * Attach Package - Deferred Attacher
 *
 * Attaches a generated behaviour type to its template root. A type that the
 * host has not compiled yet is queued and retried on the next reload.
 *
 * Request lifecycle: requested → applied | queued; queued → (reload) →
 * applied | unresolved.
 */

import { errorMessage, hasCapability, nullLogger, type Logger } from "@viewbind/model";
import { PendingAttachQueue, type AttachRequest } from "./queue.js";
import type { HostTypeRegistry } from "./registry.js";
import type { TemplateStore } from "./templates.js";

export type AttachOutcome = "applied" | "queued" | "unresolved";

export interface AttachResult {
  request: AttachRequest;
  outcome: AttachOutcome;

  /** A capability was added to the root by this call */
  attached: boolean;
}

export interface DeferredAttacherOptions {
  logger?: Logger;

  /**
   * Keep requests that are still unresolved after a reload in the queue for
   * the next one. Off by default: such requests are dropped and reported.
   */
  requeueUnresolved?: boolean;
}

export class DeferredAttacher {
  readonly #logger: Logger;
  readonly #requeueUnresolved: boolean;

  constructor(
    private readonly registry: HostTypeRegistry,
    private readonly templates: TemplateStore,
    private readonly queue: PendingAttachQueue,
    options: DeferredAttacherOptions = {}
  ) {
    this.#logger = options.logger ?? nullLogger;
    this.#requeueUnresolved = options.requeueUnresolved ?? false;
  }

  /**
   * Attach now when the type resolves, otherwise queue the request.
   * Never waits for a reload.
   */
  requestAttach(rootIdentity: string, typeName: string, artifactPath: string): AttachResult {
    const request: AttachRequest = { rootIdentity, typeName, artifactPath };
    const applied = this.#tryApply(request);
    if (applied) return applied;

    this.queue.add(request);
    this.#logger.info(`attach of ${typeName} to ${rootIdentity} queued until the next reload`);
    return { request, outcome: "queued", attached: false };
  }

  /**
   * Retry every queued request. The queue is cleared before the retries run;
   * a request that throws is handled like one that did not resolve.
   */
  processReload(): AttachResult[] {
    const results: AttachResult[] = [];
    for (const request of this.queue.takeAll()) {
      let applied: AttachResult | undefined;
      let failure: string | undefined;
      try {
        applied = this.#tryApply(request);
      } catch (error) {
        failure = errorMessage(error);
      }
      if (applied) {
        results.push(applied);
        continue;
      }

      const reason = failure ?? "type not found after reload";
      if (this.#requeueUnresolved) {
        this.queue.add(request);
        this.#logger.info(`${request.typeName} still unresolved (${reason}); kept for the next reload`);
        results.push({ request, outcome: "queued", attached: false });
      } else {
        this.#logger.warn(`could not attach ${request.typeName} to ${request.rootIdentity}: ${reason}`);
        results.push({ request, outcome: "unresolved", attached: false });
      }
    }
    return results;
  }

  get pending(): readonly AttachRequest[] {
    return this.queue.list();
  }

  /**
   * Undefined when the type or the root cannot be resolved yet.
   */
  #tryApply(request: AttachRequest): AttachResult | undefined {
    const type = this.registry.resolveType(request.typeName, request.artifactPath || undefined);
    if (!type) return undefined;

    if (!this.registry.isBehavior(type)) {
      return { request, outcome: "applied", attached: false };
    }

    const root = this.templates.load(request.rootIdentity);
    if (!root) return undefined;

    if (hasCapability(root, type.fullName)) {
      return { request, outcome: "applied", attached: false };
    }

    root.capabilities.push({ typeName: type.fullName, fields: {} });
    this.templates.save(request.rootIdentity, root);
    this.#logger.info(`attached ${type.fullName} to ${request.rootIdentity}`);
    return { request, outcome: "applied", attached: true };
  }
}
