/**
 * Codegen Package - Class Location Tests
 */

import { describe, it, expect } from "vitest";
import { findClassBody, findClassDeclaration, findRegion } from "@viewbind/codegen";

describe("findClassDeclaration", () => {
  it("reads modifiers, type parameters and heritage", () => {
    const source = "export default abstract class Foo<T> extends ui.Base<T> {\n}\n";
    const declaration = findClassDeclaration(source);

    expect(declaration?.name).toBe("Foo");
    expect(declaration?.indent).toBe("");
    expect(declaration?.heritageInsertAt).toBe(source.indexOf(" extends"));
    expect(declaration?.baseTypeSpan).toEqual({ start: source.indexOf("ui.Base"), end: source.indexOf("<T> {") });
  });

  it("looks past braces inside type parameters and type arguments", () => {
    const source = "export class Foo<T extends { id: string }> extends Base<{ run: () => void }> {\n}\n";
    const declaration = findClassDeclaration(source);

    expect(declaration?.heritageInsertAt).toBe(source.indexOf(" extends Base"));
    expect(declaration?.baseTypeSpan).toEqual({ start: source.indexOf("Base<"), end: source.indexOf("<{ run") });
    expect(declaration?.headerEnd).toBe(source.lastIndexOf("{"));
    expect(findClassBody(source, declaration?.headerEnd ?? 0)).toEqual({
      open: source.lastIndexOf("{"),
      close: source.lastIndexOf("}"),
    });
  });

  it("reports the indentation of a namespaced class", () => {
    const source = "export namespace Views {\n  export class Menu {\n  }\n}\n";
    const declaration = findClassDeclaration(source);

    expect(declaration?.name).toBe("Menu");
    expect(declaration?.indent).toBe("  ");
    expect(declaration?.baseTypeSpan).toBeUndefined();
  });

  it("ignores the word class inside comments", () => {
    const source = "// class Hidden {\nclass Shown {}\n";

    expect(findClassDeclaration(source)?.name).toBe("Shown");
  });

  it("returns undefined without a class", () => {
    expect(findClassDeclaration("const x = 1;\n")).toBeUndefined();
  });
});

describe("findClassBody", () => {
  it("skips braces in strings and comments", () => {
    const source = "class A {\n  // }\n  /* { */\n  s = '}';\n  t = `{`;\n  m() { return \"}\"; }\n}\n";

    expect(findClassBody(source, 0)).toEqual({ open: source.indexOf("{"), close: source.lastIndexOf("}") });
  });

  it("returns undefined when braces never balance", () => {
    expect(findClassBody("class A {\n  m() {\n}\n", 0)).toBeUndefined();
  });
});

describe("findRegion", () => {
  it("pairs the end marker with the nearest start marker", () => {
    const source = [
      "class A {",
      "  // <auto-fields>",
      "  // <auto-fields>",
      "  private x!: number;",
      "  // </auto-fields>",
      "}",
      "",
    ].join("\n");
    const second = source.indexOf("  // <auto-fields>", source.indexOf("// <auto-fields>") + 1);

    expect(findRegion(source, { start: 9, end: source.lastIndexOf("}") }, "fields")).toEqual({
      start: second,
      end: source.lastIndexOf("}"),
    });
  });

  it("ignores markers outside the searched span", () => {
    const source = "// <auto-props>\n// </auto-props>\nclass A {\n}\n";
    const body = { start: source.indexOf("{") + 1, end: source.lastIndexOf("}") };

    expect(findRegion(source, body, "props")).toBeUndefined();
  });

  it("requires markers on their own lines", () => {
    const source = "class A {\n  x = 1; // <auto-fields>\n  // </auto-fields>\n}\n";
    const body = { start: source.indexOf("{") + 1, end: source.lastIndexOf("}") };

    expect(findRegion(source, body, "fields")).toBeUndefined();
  });
});
