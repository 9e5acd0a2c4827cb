/**
 * Attach Package - Reference Assigner Tests
 */

import { describe, it, expect } from "vitest";
import { createNode, type BindingDescriptor } from "@viewbind/model";
import {
  AssignmentStatsStore,
  CompiledUnitRegistry,
  MemoryTemplateStore,
  ReferenceAssigner,
} from "@viewbind/attach";

const SOURCE = `export class MainView extends ui.ViewBehaviour {
  @ui.serialized private _btnOkButton!: ui.Button;
  @ui.serialized private _txtTitle!: ui.Label;
  @ui.serialized private _rtHeader!: ui.LayoutRect;
  @ui.serialized private _nodeRoot!: ui.Node;
  private _transient!: ui.Button;
}
`;

const okButton: BindingDescriptor = {
  typeName: "Button",
  fieldName: "_btnOkButton",
  path: ["OkButton"],
  isCapabilityReference: true,
  capabilityIndex: 0,
};

function setup(attached = true) {
  const root = createNode("MainView", ["LayoutRect"], [
    createNode("OkButton", ["LayoutRect", "Button"]),
    createNode("Header", ["LayoutRect"], [createNode("Title", ["Label"])]),
  ]);
  if (attached) root.capabilities.push({ typeName: "MainView", fields: {} });

  const registry = new CompiledUnitRegistry();
  registry.stage("MainView.ts", SOURCE);
  registry.reload();

  const templates = new MemoryTemplateStore([["main", root]]);
  const stats = new AssignmentStatsStore();
  const assigner = new ReferenceAssigner(registry, templates, stats);
  return { templates, stats, assigner };
}

describe("ReferenceAssigner", () => {
  it("writes references for every kind of target", () => {
    const { assigner, templates, stats } = setup();
    const descriptors: BindingDescriptor[] = [
      okButton,
      { typeName: "Label", fieldName: "_txtTitle", path: ["Header", "Title"], isCapabilityReference: true, capabilityIndex: 0 },
      { typeName: "LayoutRect", fieldName: "_rtHeader", path: ["Header"], isCapabilityReference: false, capabilityIndex: 0 },
      { typeName: "Node", fieldName: "_nodeRoot", path: [], isCapabilityReference: false, capabilityIndex: 0 },
    ];

    const result = assigner.assign("main", "MainView", descriptors);

    expect(result).toEqual({ total: 4, success: 4, missingPath: 0, missingCapability: 0 });
    expect(stats.tryGetStats("main")).toEqual(result);
    expect(templates.load("main")?.capabilities[1]?.fields).toEqual({
      _btnOkButton: { kind: "capability", path: ["OkButton"], typeName: "Button", index: 0 },
      _txtTitle: { kind: "capability", path: ["Header", "Title"], typeName: "Label", index: 0 },
      _rtHeader: { kind: "capability", path: ["Header"], typeName: "LayoutRect", index: 0 },
      _nodeRoot: { kind: "node", path: [] },
    });
  });

  it("counts a missing child path as missingPath only", () => {
    const { assigner } = setup();

    expect(assigner.assign("main", "MainView", [{ ...okButton, path: ["Gone"] }])).toEqual({
      total: 1,
      success: 0,
      missingPath: 1,
      missingCapability: 0,
    });
  });

  it("counts an absent capability index as missingCapability", () => {
    const { assigner } = setup();

    expect(assigner.assign("main", "MainView", [{ ...okButton, capabilityIndex: 1 }])).toEqual({
      total: 1,
      success: 0,
      missingPath: 0,
      missingCapability: 1,
    });
  });

  it("skips descriptors without a persisted slot", () => {
    const { assigner, templates } = setup();

    expect(assigner.assign("main", "MainView", [{ ...okButton, fieldName: "_transient" }])).toEqual({
      total: 1,
      success: 0,
      missingPath: 0,
      missingCapability: 0,
    });
    expect(templates.load("main")?.capabilities[1]?.fields).toEqual({});
  });

  it("records nothing when the behaviour is not attached", () => {
    const { assigner, stats } = setup(false);

    expect(assigner.assign("main", "MainView", [okButton])).toEqual({
      total: 0,
      success: 0,
      missingPath: 0,
      missingCapability: 0,
    });
    expect(stats.tryGetStats("main")).toBeUndefined();
  });

  it("overwrites the stats of earlier passes", () => {
    const { assigner, stats } = setup();
    assigner.assign("main", "MainView", [okButton]);
    assigner.assign("main", "MainView", [{ ...okButton, path: ["Gone"] }]);

    expect(stats.tryGetStats("main")).toEqual({ total: 1, success: 0, missingPath: 1, missingCapability: 0 });
  });
});
