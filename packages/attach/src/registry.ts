/**
 * Attach Package - Host Type Registry
 *
 * The host compiles generated artifacts on its own schedule. Until a reload
 * has picked an artifact up, its class cannot be resolved by name; everything
 * that needs the compiled type goes through this registry.
 */

import type { Capability, Event, ObjectReference } from "@viewbind/model";

/**
 * A type known to the host after a reload.
 */
export interface HostType {
  /** Class name as declared */
  name: string;

  /** Name qualified by enclosing namespaces (`Views.MainView`) */
  fullName: string;

  /** Short name of the first `extends` target */
  baseName?: string;

  /** Compiled unit (artifact path) the type came from; absent for built-ins */
  unit?: string;

  /** Persisted reference slots, by field name */
  slots: readonly string[];
}

/**
 * A persisted field of a behaviour instance.
 */
export interface ReferenceSlot {
  name: string;
  write(instance: Capability, value: ObjectReference): void;
}

export interface ReloadEvent {
  /** Artifact paths compiled by this reload */
  paths: readonly string[];
}

export interface HostTypeRegistry {
  /**
   * Resolve a type by name, first within the artifact's compiled unit, then
   * across every loaded unit.
   */
  resolveType(typeName: string, artifactPath?: string): HostType | undefined;

  /** Whether the type's base chain reaches the behaviour base */
  isBehavior(type: HostType): boolean;

  resolveSlot(type: HostType, fieldName: string): ReferenceSlot | undefined;

  /** Fires after the host has compiled and loaded new code */
  readonly onDidReload: Event<ReloadEvent>;
}

/**
 * Hands generated source to the host for its next compile.
 */
export interface ArtifactCompiler {
  stage(path: string, source: string): void;
}

/**
 * Slot backed by `Capability.fields`.
 */
export function fieldSlot(name: string): ReferenceSlot {
  return {
    name,
    write(instance, value) {
      instance.fields ??= {};
      instance.fields[name] = value;
    },
  };
}
