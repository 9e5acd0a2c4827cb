/**
 * Attach Package - Reference Assigner
 *
 * Declarative-reference mode: writes a persisted reference into every slot of
 * the attached behaviour instance, once its type has been compiled.
 */

import {
  capabilitiesOf,
  DEFAULT_CATALOG,
  findByPath,
  formatPath,
  nullLogger,
  type BindingDescriptor,
  type Capability,
  type Logger,
  type ObjectNode,
  type ObjectReference,
} from "@viewbind/model";
import type { HostTypeRegistry } from "./registry.js";
import { emptyStats, type AssignmentStats, type AssignmentStatsStore } from "./stats.js";
import type { TemplateStore } from "./templates.js";

export interface ReferenceAssignerOptions {
  /** Type name of plain node references */
  nodeType?: string;

  logger?: Logger;
}

export class ReferenceAssigner {
  readonly #nodeType: string;
  readonly #logger: Logger;

  constructor(
    private readonly registry: HostTypeRegistry,
    private readonly templates: TemplateStore,
    private readonly stats: AssignmentStatsStore,
    options: ReferenceAssignerOptions = {}
  ) {
    this.#nodeType = options.nodeType ?? DEFAULT_CATALOG.nodeType;
    this.#logger = options.logger ?? nullLogger;
  }

  /**
   * Assign every descriptor into the behaviour of `typeName` on the root.
   *
   * Returns zero stats without recording them when the root, the type or
   * the attached instance is missing. Descriptors without a matching slot are
   * counted in `total` and otherwise skipped.
   */
  assign(
    rootIdentity: string,
    typeName: string,
    descriptors: readonly BindingDescriptor[],
    artifactPath?: string
  ): AssignmentStats {
    const stats = emptyStats();

    const type = this.registry.resolveType(typeName, artifactPath);
    const root = this.templates.load(rootIdentity);
    const instance = type && root ? root.capabilities.find(c => c.typeName === type.fullName) : undefined;
    if (!type || !root || !instance) return stats;

    for (const descriptor of descriptors) {
      stats.total++;

      const slot = this.registry.resolveSlot(type, descriptor.fieldName);
      if (!slot) continue;

      const node = findByPath(root, descriptor.path);
      if (!node) {
        stats.missingPath++;
        this.#logger.warn(`${rootIdentity}: no node at ${formatPath(descriptor.path)} for ${descriptor.fieldName}`);
        continue;
      }

      const value = this.#resolveValue(node, descriptor);
      if (!value) {
        stats.missingCapability++;
        this.#logger.warn(
          `${rootIdentity}: no ${descriptor.typeName} at index ${descriptor.capabilityIndex} on ${formatPath(descriptor.path)}`
        );
        continue;
      }

      slot.write(instance, value);
      stats.success++;
    }

    this.templates.save(rootIdentity, root);
    this.stats.record(rootIdentity, stats);
    return stats;
  }

  /**
   * The capability at the descriptor's index, the node itself, or the node's
   * container capability.
   */
  #resolveValue(node: ObjectNode, descriptor: BindingDescriptor): ObjectReference | undefined {
    const path = [...descriptor.path];
    if (!descriptor.isCapabilityReference && descriptor.typeName === this.#nodeType) {
      return { kind: "node", path };
    }

    const index = descriptor.isCapabilityReference ? descriptor.capabilityIndex : 0;
    const capability: Capability | undefined = capabilitiesOf(node, descriptor.typeName)[index];
    if (!capability) return undefined;
    return { kind: "capability", path, typeName: descriptor.typeName, index };
  }
}
