/**
 * Codegen Package - View Generation
 *
 * Entry points tying discovery, naming and merge together for one root.
 */

import {
  ViewBindError,
  ViewBindErrorCode,
  type BindingDescriptor,
  type GenerationSettings,
  type ObjectNode,
  type ViewBindWarning,
} from "@viewbind/model";
import { discover } from "./discovery.js";
import { validateClassName } from "./identifiers.js";
import { mergeArtifact, type MergeOptions } from "./merge.js";
import type { RegionName } from "./markers.js";
import { rename } from "./naming.js";

export interface GenerateViewOptions extends MergeOptions {
  /** Current artifact text; undefined when the artifact does not exist yet */
  existing?: string;

  /** Template identity, carried into errors */
  rootIdentity?: string;
}

export interface GeneratedView {
  className: string;
  descriptors: BindingDescriptor[];
  text: string;
  changed: boolean;
  created: boolean;
  recovered: RegionName[];
  warnings: ViewBindWarning[];
}

/**
 * Final field list of a root: discovered, deduplicated, sorted and renamed.
 */
export function collectFields(root: ObjectNode, settings: GenerationSettings): BindingDescriptor[] {
  return rename(discover(root, settings), settings);
}

/**
 * Class name for a root, which is the root's own name.
 *
 * @throws ViewBindError INVALID_NAME when the name breaks the class rules
 */
export function classNameFor(root: ObjectNode, settings: GenerationSettings, rootIdentity?: string): string {
  const problem = validateClassName(root.name, settings.classRules);
  if (problem !== undefined) {
    throw new ViewBindError(`Invalid class name: ${problem}`, ViewBindErrorCode.INVALID_NAME, rootIdentity);
  }
  return root.name;
}

/**
 * Generate or update the view artifact of a root. Nothing is written here;
 * callers persist `text` when `changed` is set.
 */
export function generateView(
  root: ObjectNode,
  settings: GenerationSettings,
  options: GenerateViewOptions = {}
): GeneratedView {
  const className = classNameFor(root, settings, options.rootIdentity);
  const descriptors = collectFields(root, settings);
  const merged = mergeArtifact(options.existing, className, descriptors, settings, options);
  return { className, descriptors, ...merged };
}
