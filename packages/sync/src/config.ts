/**
 * Sync Package - Settings File
 *
 * Reads `viewbind.config.json` and turns it into normalized settings. Every
 * value is checked against the option shape; unknown keys are ignored.
 */

import fs from "node:fs";
import {
  errorMessage,
  normalizeSettings,
  ViewBindError,
  ViewBindErrorCode,
  type BindingMode,
  type CapabilityCatalog,
  type ClassRules,
  type GenerationOptions,
  type GenerationSettings,
  type IncludeSettings,
  type NamingSettings,
  type OutputSettings,
  type TypePrefix,
} from "@viewbind/model";

export const SETTINGS_FILE_NAME = "viewbind.config.json";

type JsonRecord = Record<string, unknown>;

/**
 * Load and normalize a settings file. A missing file yields the defaults.
 *
 * @throws ViewBindError INVALID_SETTINGS when the file is not valid JSON or a
 *   value has the wrong type
 */
export function loadSettingsFile(file: string): GenerationSettings {
  if (!fs.existsSync(file)) return normalizeSettings();

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (error) {
    throw new ViewBindError(
      `Cannot parse settings: ${errorMessage(error)}`,
      ViewBindErrorCode.INVALID_SETTINGS,
      undefined,
      file
    );
  }
  return normalizeSettings(parseGenerationOptions(raw, file));
}

/**
 * Check a parsed JSON value against the option shape.
 */
export function parseGenerationOptions(value: unknown, file?: string): GenerationOptions {
  return new OptionsReader(file).read(value);
}

/* =============================================================================
 * READER
 * ============================================================================= */

class OptionsReader {
  constructor(private readonly file: string | undefined) {}

  read(value: unknown): GenerationOptions {
    const root = this.record(value, "settings");
    return {
      include: this.group(root, "include", (g, at): Partial<IncludeSettings> => ({
        autoIncludeCommon: this.optional(g, "autoIncludeCommon", at, this.boolean),
        autoIncludeExtended: this.optional(g, "autoIncludeExtended", at, this.boolean),
      })),
      naming: this.group(root, "naming", (g, at): Partial<NamingSettings> => ({
        prefixes: this.optional(g, "prefixes", at, this.prefixes),
        useTypePrefix: this.optional(g, "useTypePrefix", at, this.boolean),
        underscoreCamelCase: this.optional(g, "underscoreCamelCase", at, this.boolean),
        generateProperties: this.optional(g, "generateProperties", at, this.boolean),
        stripPrefixInPropertyNames: this.optional(g, "stripPrefixInPropertyNames", at, this.boolean),
      })),
      classRules: this.group(root, "classRules", (g, at): Partial<ClassRules> => ({
        requireUppercase: this.optional(g, "requireUppercase", at, this.boolean),
      })),
      bindingMode: this.optional(root, "bindingMode", "settings", this.bindingMode),
      namespace: this.optional(root, "namespace", "settings", this.string),
      baseType: this.optional(root, "baseType", "settings", this.string),
      catalog: this.group(root, "catalog", (g, at): Partial<CapabilityCatalog> => ({
        interactive: this.optional(g, "interactive", at, this.strings),
        display: this.optional(g, "display", at, this.strings),
        extended: this.optional(g, "extended", at, this.strings),
        containerType: this.optional(g, "containerType", at, this.string),
        nodeType: this.optional(g, "nodeType", at, this.string),
        behaviorBase: this.optional(g, "behaviorBase", at, this.string),
        extra: this.optional(g, "extra", at, this.strings),
      })),
      output: this.group(root, "output", (g, at): Partial<OutputSettings> => ({
        importSource: this.optional(g, "importSource", at, this.string),
        typeNamespace: this.optional(g, "typeNamespace", at, this.string),
        indent: this.optional(g, "indent", at, this.string),
        initMethod: this.optional(g, "initMethod", at, this.string),
        outputDir: this.optional(g, "outputDir", at, this.string),
      })),
      logMarkerRecovery: this.optional(root, "logMarkerRecovery", "settings", this.boolean),
      useSerializedReferences: this.optional(root, "useSerializedReferences", "settings", this.boolean),
    };
  }

  group<T>(parent: JsonRecord, key: string, read: (group: JsonRecord, at: string) => T): T | undefined {
    const value = parent[key];
    return value === undefined ? undefined : read(this.record(value, key), key);
  }

  optional<T>(parent: JsonRecord, key: string, at: string, read: (value: unknown, at: string) => T): T | undefined {
    const value = parent[key];
    return value === undefined ? undefined : read(value, `${at}.${key}`);
  }

  record(value: unknown, at: string): JsonRecord {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      throw this.invalid(at, "an object");
    }
    return Object.fromEntries(Object.entries(value));
  }

  readonly boolean = (value: unknown, at: string): boolean => {
    if (typeof value !== "boolean") throw this.invalid(at, "a boolean");
    return value;
  };

  readonly string = (value: unknown, at: string): string => {
    if (typeof value !== "string") throw this.invalid(at, "a string");
    return value;
  };

  readonly strings = (value: unknown, at: string): string[] => {
    if (!Array.isArray(value)) throw this.invalid(at, "an array of strings");
    return value.map((item: unknown, index) => this.string(item, `${at}[${index}]`));
  };

  readonly prefixes = (value: unknown, at: string): TypePrefix[] => {
    if (!Array.isArray(value)) throw this.invalid(at, "an array of { typeName, prefix }");
    return value.map((item: unknown, index) => {
      const entry = this.record(item, `${at}[${index}]`);
      return {
        typeName: this.string(entry.typeName, `${at}[${index}].typeName`),
        prefix: this.string(entry.prefix, `${at}[${index}].prefix`),
      };
    });
  };

  readonly bindingMode = (value: unknown, at: string): BindingMode => {
    if (value === "explicit-init" || value === "declarative-reference") return value;
    throw this.invalid(at, '"explicit-init" or "declarative-reference"');
  };

  invalid(at: string, expected: string): ViewBindError {
    return new ViewBindError(`${at} must be ${expected}`, ViewBindErrorCode.INVALID_SETTINGS, undefined, this.file);
  }
}
