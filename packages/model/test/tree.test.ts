/**
 * Model Package - Tree Helper Tests
 */

import { describe, it, expect } from "vitest";
import { cloneTree, createNode, findByPath, formatPath, walk } from "@viewbind/model";

const root = createNode("Root", ["LayoutRect"], [
  createNode("A", [], [createNode("Leaf", ["Label"])]),
  createNode("B", ["Button"]),
  createNode("A", ["Image"]),
]);

describe("walk", () => {
  it("visits in pre-order with paths", () => {
    const visited: string[] = [];
    walk(root, (_node, { path }) => {
      visited.push(formatPath(path));
    });

    expect(visited).toEqual(["<root>", "A", "A/Leaf", "B", "A"]);
  });

  it("skips descendants when the visitor returns false", () => {
    const visited: string[] = [];
    walk(root, (node, { ancestors }) => {
      visited.push(`${ancestors.length}:${node.name}`);
      return node.name !== "A";
    });

    expect(visited).toEqual(["0:Root", "1:A", "1:B", "1:A"]);
  });
});

describe("findByPath", () => {
  it("resolves the root, nested nodes and the first of equal siblings", () => {
    expect(findByPath(root, [])).toBe(root);
    expect(findByPath(root, ["A", "Leaf"])?.capabilities).toEqual([{ typeName: "Label" }]);
    expect(findByPath(root, ["A"])?.children).toHaveLength(1);
    expect(findByPath(root, ["A", "Missing"])).toBeUndefined();
  });
});

describe("cloneTree", () => {
  it("detaches the copy", () => {
    const copy = cloneTree(root);
    copy.children.pop();

    expect(root.children).toHaveLength(3);
    expect(copy).not.toBe(root);
  });
});
