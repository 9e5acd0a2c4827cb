// Attach package public API

// Session-scoped queue
export type { SessionStore } from "./session.js";
export { MemorySessionStore } from "./session.js";
export type { AttachRequest } from "./queue.js";
export { PendingAttachQueue, PENDING_ATTACH_KEY, formatAttachRecord, parseAttachRecords } from "./queue.js";

// Host contracts and stand-ins
export type { ArtifactCompiler, HostType, HostTypeRegistry, ReferenceSlot, ReloadEvent } from "./registry.js";
export { fieldSlot } from "./registry.js";
export type { CompiledUnitRegistryOptions } from "./compiled-units.js";
export { CompiledUnitRegistry } from "./compiled-units.js";
export type { TemplateStore } from "./templates.js";
export { MemoryTemplateStore } from "./templates.js";

// Attach and assignment
export type { AttachOutcome, AttachResult, DeferredAttacherOptions } from "./attacher.js";
export { DeferredAttacher } from "./attacher.js";
export type { ReferenceAssignerOptions } from "./assigner.js";
export { ReferenceAssigner } from "./assigner.js";
export type { AssignmentStats } from "./stats.js";
export { AssignmentStatsStore, emptyStats } from "./stats.js";
