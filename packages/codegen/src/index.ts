// Codegen package public API

// Discovery and naming
export { discover, recommendMarker, dedupeDescriptors, sortDescriptors } from "./discovery.js";
export {
  rename,
  prefixFor,
  applyTypePrefix,
  toPrivateCamelCase,
  ensureUniqueFieldNames,
  propertyName,
  stripKnownPrefix,
} from "./naming.js";
export { sanitizeIdentifier, toPascalCase, toCamelCase, isReservedWord, validateClassName } from "./identifiers.js";

// Merge engine
export type { MergeOptions, MergeResult } from "./merge.js";
export { mergeArtifact } from "./merge.js";
export type { RegionLayout } from "./emit.js";
export { renderRegion, renderSkeleton, escapeString } from "./emit.js";
export type { RegionName, RegionMarkers } from "./markers.js";
export { REGION_MARKERS, USER_CODE_MARKERS, REGION_ORDER } from "./markers.js";
export type { ClassDeclaration, ClassBody } from "./scan.js";
export { findClassDeclaration, findClassBody, findRegion } from "./scan.js";
export type { Span, SourceEdit } from "./edit.js";
export { detectEol } from "./edit.js";

// Generation
export type { GenerateViewOptions, GeneratedView } from "./generate.js";
export { generateView, collectFields, classNameFor } from "./generate.js";
