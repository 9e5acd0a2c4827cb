/**
 * Model Package - Settings Tests
 */

import { describe, it, expect } from "vitest";
import {
  autoIncludeTypes,
  DEFAULT_PREFIXES,
  isKnownCapabilityType,
  normalizeSettings,
  qualifyTypeName,
  shortTypeName,
  ViewBindError,
} from "@viewbind/model";

describe("normalizeSettings", () => {
  it("fills every group with defaults", () => {
    const settings = normalizeSettings();

    expect(settings.bindingMode).toBe("explicit-init");
    expect(settings.baseType).toBe("ui.ViewBehaviour");
    expect(settings.namespace).toBe("");
    expect(settings.naming.prefixes).toBe(DEFAULT_PREFIXES);
    expect(settings.include).toEqual({ autoIncludeCommon: true, autoIncludeExtended: false });
    expect(settings.classRules).toEqual({ requireUppercase: true });
  });

  it("keeps defaults for members given as undefined", () => {
    const settings = normalizeSettings({ naming: { useTypePrefix: undefined, generateProperties: true } });

    expect(settings.naming.useTypePrefix).toBe(true);
    expect(settings.naming.generateProperties).toBe(true);
  });

  it("replaces an empty prefix table with the defaults", () => {
    expect(normalizeSettings({ naming: { prefixes: [] } }).naming.prefixes).toBe(DEFAULT_PREFIXES);
  });

  it("migrates the legacy flag only when no mode is given", () => {
    expect(normalizeSettings({ useSerializedReferences: true }).bindingMode).toBe("declarative-reference");
    expect(normalizeSettings({ useSerializedReferences: true, bindingMode: "explicit-init" }).bindingMode).toBe(
      "explicit-init"
    );
  });

  it("derives the base type from the catalog and namespace import", () => {
    expect(normalizeSettings({ output: { typeNamespace: "" } }).baseType).toBe("ViewBehaviour");
    expect(normalizeSettings({ catalog: { behaviorBase: "Screen" } }).baseType).toBe("ui.Screen");
    expect(normalizeSettings({ baseType: " app.Base " }).baseType).toBe("app.Base");
  });

  it("rejects an indent that is not whitespace", () => {
    expect(() => normalizeSettings({ output: { indent: "" } })).toThrow("output.indent must be non-empty whitespace");
    expect(() => normalizeSettings({ output: { indent: "--" } })).toThrow(ViewBindError);
  });

  it("rejects unknown binding modes", () => {
    const options = JSON.parse('{ "bindingMode": "two-way" }');

    expect(() => normalizeSettings(options)).toThrow('Unknown binding mode "two-way"');
  });
});

describe("catalog queries", () => {
  it("lists auto-include types in scan order", () => {
    expect(autoIncludeTypes(normalizeSettings())).toEqual([
      "Button",
      "Toggle",
      "Slider",
      "InputField",
      "RichInputField",
      "RichLabel",
      "Label",
      "Image",
      "RawImage",
    ]);
    expect(autoIncludeTypes(normalizeSettings({ include: { autoIncludeCommon: false, autoIncludeExtended: true } }))).toEqual([
      "ScrollView",
      "Scrollbar",
      "Dropdown",
    ]);
  });

  it("knows marker-addressable types", () => {
    const settings = normalizeSettings({ catalog: { extra: ["Spinner"] } });

    expect(isKnownCapabilityType("Dropdown", settings)).toBe(true);
    expect(isKnownCapabilityType("LayoutRect", settings)).toBe(true);
    expect(isKnownCapabilityType("Spinner", settings)).toBe(true);
    expect(isKnownCapabilityType("Widget", settings)).toBe(false);
  });

  it("qualifies and shortens type names", () => {
    expect(qualifyTypeName("Button", "ui")).toBe("ui.Button");
    expect(qualifyTypeName("game.Button", "ui")).toBe("game.Button");
    expect(qualifyTypeName("Button", "")).toBe("Button");
    expect(shortTypeName("ui.Button")).toBe("Button");
    expect(shortTypeName("Button")).toBe("Button");
  });
});
