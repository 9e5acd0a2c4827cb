/**
 * Model Package - Generation Settings
 *
 * This file contains:
 * 1. The resolved settings shape every stage reads
 * 2. Default values for all option groups
 * 3. Normalization from user-facing partial options
 */

import { ViewBindError, ViewBindErrorCode } from "./errors.js";

/* =============================================================================
 * RESOLVED SETTINGS
 * ============================================================================= */

/**
 * How generated fields get their values.
 * - explicit-init: a generated init method looks every field up by path
 * - declarative-reference: fields are persisted; values are written into the
 *   template instance after the generated type has been loaded
 */
export type BindingMode = "explicit-init" | "declarative-reference";

export interface TypePrefix {
  typeName: string;
  prefix: string;
}

/**
 * Capability type names the generator knows about.
 */
export interface CapabilityCatalog {
  /** First-priority tier for auto targets (buttons, toggles, inputs) */
  interactive: readonly string[];

  /** Second-priority tier for auto targets (text, images) */
  display: readonly string[];

  /** Scroll views, scrollbars and dropdowns; auto-included only on request */
  extended: readonly string[];

  /** Layout capability every laid-out node carries */
  containerType: string;

  /** Type name used for plain node references */
  nodeType: string;

  /** Base type a generated view class derives from */
  behaviorBase: string;

  /** Further types accepted by capability markers */
  extra: readonly string[];
}

export interface IncludeSettings {
  /** Interactive and display types are bound without a marker */
  autoIncludeCommon: boolean;

  /** Extended types are bound without a marker */
  autoIncludeExtended: boolean;
}

export interface NamingSettings {
  /** Ordered type → prefix table; first match wins */
  prefixes: readonly TypePrefix[];
  useTypePrefix: boolean;
  underscoreCamelCase: boolean;
  generateProperties: boolean;
  stripPrefixInPropertyNames: boolean;
}

export interface ClassRules {
  requireUppercase: boolean;
}

export interface OutputSettings {
  /** Module the generated file imports its runtime types from */
  importSource: string;

  /** Local name of that namespace import; types are emitted as `ui.Button` */
  typeNamespace: string;

  indent: string;

  /** Name of the generated initializer in explicit-init mode */
  initMethod: string;

  /** Folder generated artifacts are written to */
  outputDir: string;
}

export interface GenerationSettings {
  include: IncludeSettings;
  naming: NamingSettings;
  classRules: ClassRules;
  bindingMode: BindingMode;

  /** Wrap the class in `export namespace ...`; empty for none */
  namespace: string;

  /** Base type written into the class signature */
  baseType: string;

  catalog: CapabilityCatalog;
  output: OutputSettings;

  /** Log when a missing marker region is re-inserted */
  logMarkerRecovery: boolean;
}

/* =============================================================================
 * USER-FACING OPTIONS
 * ============================================================================= */

export interface GenerationOptions {
  include?: Partial<IncludeSettings>;
  naming?: Partial<NamingSettings>;
  classRules?: Partial<ClassRules>;
  bindingMode?: BindingMode;
  namespace?: string;
  baseType?: string;
  catalog?: Partial<CapabilityCatalog>;
  output?: Partial<OutputSettings>;
  logMarkerRecovery?: boolean;

  /**
   * @deprecated Older configuration files used this flag instead of
   * `bindingMode`. `true` maps to "declarative-reference".
   */
  useSerializedReferences?: boolean;
}

/* =============================================================================
 * DEFAULTS
 * ============================================================================= */

export const DEFAULT_CATALOG: CapabilityCatalog = {
  interactive: ["Button", "Toggle", "Slider", "InputField", "RichInputField"],
  display: ["RichLabel", "Label", "Image", "RawImage"],
  extended: ["ScrollView", "Scrollbar", "Dropdown"],
  containerType: "LayoutRect",
  nodeType: "Node",
  behaviorBase: "ViewBehaviour",
  extra: [],
};

export const DEFAULT_PREFIXES: readonly TypePrefix[] = [
  { typeName: "Button", prefix: "btn" },
  { typeName: "Toggle", prefix: "tog" },
  { typeName: "Slider", prefix: "sld" },
  { typeName: "InputField", prefix: "input" },
  { typeName: "Label", prefix: "txt" },
  { typeName: "Image", prefix: "img" },
  { typeName: "RawImage", prefix: "img" },
  { typeName: "RichInputField", prefix: "input" },
  { typeName: "RichLabel", prefix: "txt" },
  { typeName: "LayoutRect", prefix: "rt" },
  { typeName: "Node", prefix: "node" },
];

export const DEFAULT_INCLUDE: IncludeSettings = {
  autoIncludeCommon: true,
  autoIncludeExtended: false,
};

export const DEFAULT_NAMING: NamingSettings = {
  prefixes: DEFAULT_PREFIXES,
  useTypePrefix: true,
  underscoreCamelCase: true,
  generateProperties: false,
  stripPrefixInPropertyNames: true,
};

export const DEFAULT_OUTPUT: OutputSettings = {
  importSource: "@scene/ui",
  typeNamespace: "ui",
  indent: "  ",
  initMethod: "awake",
  outputDir: "src/views",
};

export const DEFAULT_SETTINGS: GenerationSettings = {
  include: DEFAULT_INCLUDE,
  naming: DEFAULT_NAMING,
  classRules: { requireUppercase: true },
  bindingMode: "explicit-init",
  namespace: "",
  baseType: qualifyTypeName(DEFAULT_CATALOG.behaviorBase, DEFAULT_OUTPUT.typeNamespace),
  catalog: DEFAULT_CATALOG,
  output: DEFAULT_OUTPUT,
  logMarkerRecovery: true,
};

/* =============================================================================
 * NORMALIZATION
 * ============================================================================= */

const BINDING_MODES: readonly BindingMode[] = ["explicit-init", "declarative-reference"];

/**
 * Expand partial options into complete settings.
 *
 * An empty prefix table is replaced by the defaults, and the legacy
 * `useSerializedReferences` flag is migrated when `bindingMode` is not given.
 */
export function normalizeSettings(options?: GenerationOptions): GenerationSettings {
  const opts = options ?? {};

  const bindingMode = opts.bindingMode ?? (opts.useSerializedReferences ? "declarative-reference" : "explicit-init");
  if (!BINDING_MODES.includes(bindingMode)) {
    throw new ViewBindError(`Unknown binding mode "${String(bindingMode)}"`, ViewBindErrorCode.INVALID_SETTINGS);
  }

  const naming: NamingSettings = { ...DEFAULT_NAMING, ...definedOnly(opts.naming) };
  if (naming.prefixes.length === 0) {
    naming.prefixes = DEFAULT_PREFIXES;
  }

  const output: OutputSettings = { ...DEFAULT_OUTPUT, ...definedOnly(opts.output) };
  if (output.indent.length === 0 || output.indent.trim().length > 0) {
    throw new ViewBindError("output.indent must be non-empty whitespace", ViewBindErrorCode.INVALID_SETTINGS);
  }

  const catalog: CapabilityCatalog = { ...DEFAULT_CATALOG, ...definedOnly(opts.catalog) };

  return {
    include: { ...DEFAULT_INCLUDE, ...definedOnly(opts.include) },
    naming,
    classRules: { ...DEFAULT_SETTINGS.classRules, ...definedOnly(opts.classRules) },
    bindingMode,
    namespace: opts.namespace?.trim() ?? "",
    baseType: opts.baseType?.trim() ?? qualifyTypeName(catalog.behaviorBase, output.typeNamespace),
    catalog,
    output,
    logMarkerRecovery: opts.logMarkerRecovery ?? DEFAULT_SETTINGS.logMarkerRecovery,
  };
}

/**
 * Copy of a partial group without its undefined members, so that spreading it
 * over the defaults keeps them.
 */
function definedOnly<T extends object>(group: T | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (!group) return result;
  for (const key of Object.keys(group)) {
    const value: unknown = Reflect.get(group, key);
    if (value !== undefined) Reflect.set(result, key, value);
  }
  return result;
}

/* =============================================================================
 * CATALOG QUERIES
 * ============================================================================= */

/**
 * Types scanned by the auto-include pass, in scan order.
 */
export function autoIncludeTypes(settings: GenerationSettings): string[] {
  const types: string[] = [];
  if (settings.include.autoIncludeCommon) {
    types.push(...settings.catalog.interactive, ...settings.catalog.display);
  }
  if (settings.include.autoIncludeExtended) {
    types.push(...settings.catalog.extended);
  }
  return [...new Set(types)];
}

/**
 * Whether a capability marker may name this type.
 */
export function isKnownCapabilityType(typeName: string, settings: GenerationSettings): boolean {
  const { catalog, naming } = settings;
  return (
    catalog.interactive.includes(typeName) ||
    catalog.display.includes(typeName) ||
    catalog.extended.includes(typeName) ||
    catalog.extra.includes(typeName) ||
    catalog.containerType === typeName ||
    naming.prefixes.some(p => p.typeName === typeName)
  );
}

/**
 * Qualify a bare type name with the generated file's namespace import.
 * Names that are already dotted are kept.
 */
export function qualifyTypeName(typeName: string, typeNamespace: string): string {
  if (typeNamespace.length === 0 || typeName.includes(".")) return typeName;
  return `${typeNamespace}.${typeName}`;
}

/**
 * Last segment of a possibly dotted type name (`ui.Button` → `Button`).
 */
export function shortTypeName(typeName: string): string {
  const dot = typeName.lastIndexOf(".");
  return dot >= 0 ? typeName.slice(dot + 1) : typeName;
}
