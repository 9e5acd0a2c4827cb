/**
 * Codegen Package - Region Markers
 *
 * Marker lines delimit the machine-owned regions of a generated artifact.
 * They are part of the on-disk format: each sits on its own line, optionally
 * indented, and must not be edited by hand.
 */

export type RegionName = "fields" | "props" | "assign";

export interface RegionMarkers {
  start: string;
  end: string;
}

export const REGION_MARKERS: Readonly<Record<RegionName, RegionMarkers>> = {
  fields: { start: "// <auto-fields>", end: "// </auto-fields>" },
  props: { start: "// <auto-props>", end: "// </auto-props>" },
  assign: { start: "// <auto-assign>", end: "// </auto-assign>" },
};

/** Delimits hand-written members in the first-generation skeleton */
export const USER_CODE_MARKERS: RegionMarkers = {
  start: "// <user-code>",
  end: "// </user-code>",
};

/** Managed regions in upsert order */
export const REGION_ORDER: readonly RegionName[] = ["fields", "props", "assign"];

/**
 * Pattern matching a whole marker line, indentation included.
 */
export function markerLinePattern(marker: string): RegExp {
  const escaped = marker.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
  return new RegExp(`^[ \\t]*${escaped}[ \\t]*\\r?$`, "gm");
}
