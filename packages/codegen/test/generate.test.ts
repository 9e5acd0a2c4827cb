/**
 * Codegen Package - Generation Tests
 */

import { describe, it, expect } from "vitest";
import { createNode, normalizeSettings, ViewBindError, ViewBindErrorCode } from "@viewbind/model";
import { collectFields, generateView } from "@viewbind/codegen";

const settings = normalizeSettings();

function mainView() {
  return createNode("MainView", ["LayoutRect"], [createNode("OkButton", ["LayoutRect", "Button"])]);
}

describe("generateView", () => {
  it("binds the OK button and writes nothing on the second run", () => {
    const first = generateView(mainView(), settings);

    expect(first.className).toBe("MainView");
    expect(first.created).toBe(true);
    expect(first.descriptors).toEqual([
      { typeName: "Button", fieldName: "_btnOkButton", path: ["OkButton"], isCapabilityReference: true, capabilityIndex: 0 },
    ]);
    expect(first.text).toContain("  private _btnOkButton!: ui.Button;\n");

    const second = generateView(mainView(), settings, { existing: first.text });

    expect(second.created).toBe(false);
    expect(second.changed).toBe(false);
    expect(second.text).toBe(first.text);
  });

  it("regenerates when the template gains a node", () => {
    const first = generateView(mainView(), settings);
    const root = mainView();
    root.children.push(createNode("Title", ["Label"]));

    const second = generateView(root, settings, { existing: first.text });

    expect(second.changed).toBe(true);
    expect(second.text).toContain("  private _txtTitle!: ui.Label;\n");
  });

  it("rejects invalid class names before producing text", () => {
    const root = createNode("mainView", [], [createNode("OkButton", ["Button"])]);
    let caught: unknown;
    try {
      generateView(root, settings, { rootIdentity: "templates/main" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ViewBindError);
    expect(caught).toMatchObject({
      code: ViewBindErrorCode.INVALID_NAME,
      rootIdentity: "templates/main",
      message: 'Invalid class name: "mainView" must start with an uppercase letter',
    });
  });

  it("accepts lowercase names when the rule is off", () => {
    const root = createNode("mainView");

    expect(generateView(root, normalizeSettings({ classRules: { requireUppercase: false } })).className).toBe("mainView");
  });
});

describe("collectFields", () => {
  it("matches the descriptors of a full generation", () => {
    const root = createNode("MainView", [], [
      createNode("Header", ["LayoutRect"], [createNode("Title", ["Label"])], { fieldName: "header" }),
      createNode("Row1", [], [createNode("Icon", ["Image"])]),
      createNode("Row2", [], [createNode("Icon", ["Image"])]),
    ]);

    expect(collectFields(root, settings)).toEqual(generateView(root, settings).descriptors);
    expect(collectFields(root, settings).map(d => d.fieldName)).toEqual([
      "_imgIcon",
      "_imgIcon_1",
      "_txtTitle",
      "_rtHeader",
    ]);
  });
});
