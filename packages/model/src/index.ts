// Model package public API

// Template tree and binding types
export type {
  ObjectNode,
  Capability,
  ObjectReference,
  TargetKind,
  BindingMarker,
  BindingDescriptor,
} from "./types.js";
export { descriptorKey } from "./types.js";

// Settings
export type {
  BindingMode,
  TypePrefix,
  CapabilityCatalog,
  IncludeSettings,
  NamingSettings,
  ClassRules,
  OutputSettings,
  GenerationSettings,
  GenerationOptions,
} from "./settings.js";
export {
  DEFAULT_CATALOG,
  DEFAULT_PREFIXES,
  DEFAULT_INCLUDE,
  DEFAULT_NAMING,
  DEFAULT_OUTPUT,
  DEFAULT_SETTINGS,
  normalizeSettings,
  autoIncludeTypes,
  isKnownCapabilityType,
  qualifyTypeName,
  shortTypeName,
} from "./settings.js";

// Tree helpers
export type { VisitContext } from "./tree.js";
export { walk, findByPath, capabilitiesOf, hasCapability, cloneTree, formatPath, createNode } from "./tree.js";

// Errors
export type { ViewBindErrorCodeType, ViewBindWarning, ViewBindWarningCodeType } from "./errors.js";
export { ViewBindError, ViewBindErrorCode, ViewBindWarningCode, errorMessage } from "./errors.js";

// Logging, events, disposables
export type { Logger } from "./logger.js";
export { nullLogger, createConsoleLogger } from "./logger.js";
export type { Listener, Event } from "./events.js";
export { SimpleEmitter } from "./events.js";
export type { DisposableLike } from "./disposables.js";
export { toDisposable, DisposableStore } from "./disposables.js";
