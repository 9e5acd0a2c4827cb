/**
 * Attach Package - Deferred Attacher Tests
 */

import { describe, it, expect } from "vitest";
import { createNode, type Logger } from "@viewbind/model";
import {
  CompiledUnitRegistry,
  DeferredAttacher,
  MemorySessionStore,
  MemoryTemplateStore,
  PendingAttachQueue,
  type AttachResult,
} from "@viewbind/attach";

const ARTIFACT = "src/views/MainView.ts";
const SOURCE = "export class MainView extends ui.ViewBehaviour {\n  @ui.serialized private _btnOkButton!: ui.Button;\n}\n";

class FailingTemplateStore extends MemoryTemplateStore {
  override load(rootIdentity: string) {
    if (rootIdentity === "a") throw new Error(`store offline for ${rootIdentity}`);
    return super.load(rootIdentity);
  }
}

function setup(options: { requeueUnresolved?: boolean } = {}) {
  const warnings: string[] = [];
  const logger: Logger = { log: () => {}, info: () => {}, warn: m => warnings.push(m), error: () => {} };
  const registry = new CompiledUnitRegistry();
  const templates = new MemoryTemplateStore([["main", createNode("MainView", ["LayoutRect"])]]);
  const queue = new PendingAttachQueue(new MemorySessionStore());
  const attacher = new DeferredAttacher(registry, templates, queue, { logger, ...options });
  return { registry, templates, queue, attacher, warnings };
}

describe("DeferredAttacher", () => {
  it("queues a type the host has not compiled yet", () => {
    const { attacher, templates, queue } = setup();

    expect(attacher.requestAttach("main", "MainView", ARTIFACT)).toEqual({
      request: { rootIdentity: "main", typeName: "MainView", artifactPath: ARTIFACT },
      outcome: "queued",
      attached: false,
    });
    expect(queue.list()).toEqual([{ rootIdentity: "main", typeName: "MainView", artifactPath: ARTIFACT }]);
    expect(templates.load("main")?.capabilities).toEqual([{ typeName: "LayoutRect" }]);
  });

  it("attaches queued requests when the host reloads", () => {
    const { attacher, registry, templates, queue } = setup();
    const results: AttachResult[] = [];
    registry.onDidReload(() => results.push(...attacher.processReload()));

    attacher.requestAttach("main", "MainView", ARTIFACT);
    registry.stage(ARTIFACT, SOURCE);
    registry.reload();

    expect(results.map(r => [r.outcome, r.attached])).toEqual([["applied", true]]);
    expect(queue.size).toBe(0);
    expect(templates.load("main")?.capabilities).toEqual([{ typeName: "LayoutRect" }, { typeName: "MainView", fields: {} }]);
  });

  it("applies right away once compiled and attaches only once", () => {
    const { attacher, registry, templates } = setup();
    registry.stage(ARTIFACT, SOURCE);
    registry.reload();

    expect(attacher.requestAttach("main", "MainView", ARTIFACT).attached).toBe(true);
    expect(attacher.requestAttach("main", "MainView", ARTIFACT)).toMatchObject({ outcome: "applied", attached: false });
    expect(templates.load("main")?.capabilities).toHaveLength(2);
  });

  it("reports non-behaviour types as applied without attaching", () => {
    const { attacher, registry, templates } = setup();
    registry.stage("src/Helper.ts", "export class Helper {}\n");
    registry.reload();

    expect(attacher.requestAttach("main", "Helper", "src/Helper.ts")).toMatchObject({ outcome: "applied", attached: false });
    expect(templates.load("main")?.capabilities).toEqual([{ typeName: "LayoutRect" }]);
  });

  it("queues when the root cannot be loaded", () => {
    const { attacher, registry } = setup();
    registry.stage(ARTIFACT, SOURCE);
    registry.reload();

    expect(attacher.requestAttach("missing", "MainView", ARTIFACT).outcome).toBe("queued");
  });

  it("drops requests still unresolved after a reload", () => {
    const { attacher, registry, queue, warnings } = setup();
    attacher.requestAttach("main", "Renamed", ARTIFACT);
    registry.stage(ARTIFACT, SOURCE);
    registry.reload();

    expect(attacher.processReload().map(r => r.outcome)).toEqual(["unresolved"]);
    expect(queue.size).toBe(0);
    expect(warnings).toEqual(["could not attach Renamed to main: type not found after reload"]);
  });

  it("keeps unresolved requests when asked to", () => {
    const { attacher, queue } = setup({ requeueUnresolved: true });
    attacher.requestAttach("main", "Renamed", ARTIFACT);

    expect(attacher.processReload().map(r => r.outcome)).toEqual(["queued"]);
    expect(queue.list()).toEqual([{ rootIdentity: "main", typeName: "Renamed", artifactPath: ARTIFACT }]);
  });

  describe("when a retry throws", () => {
    function failingSetup(options: { requeueUnresolved?: boolean } = {}) {
      const warnings: string[] = [];
      const logger: Logger = { log: () => {}, info: () => {}, warn: m => warnings.push(m), error: () => {} };
      const registry = new CompiledUnitRegistry();
      const templates = new FailingTemplateStore([
        ["a", createNode("A", ["LayoutRect"])],
        ["b", createNode("B", ["LayoutRect"])],
      ]);
      const queue = new PendingAttachQueue(new MemorySessionStore());
      const attacher = new DeferredAttacher(registry, templates, queue, { logger, ...options });
      attacher.requestAttach("a", "MainView", ARTIFACT);
      attacher.requestAttach("b", "MainView", ARTIFACT);
      registry.stage(ARTIFACT, SOURCE);
      registry.reload();
      return { attacher, templates, queue, warnings };
    }

    it("keeps processing the remaining requests", () => {
      const { attacher, templates, queue, warnings } = failingSetup();
      expect(attacher.pending.map(r => r.rootIdentity)).toEqual(["a", "b"]);

      const results = attacher.processReload();

      expect(results.map(r => [r.request.rootIdentity, r.outcome, r.attached])).toEqual([
        ["a", "unresolved", false],
        ["b", "applied", true],
      ]);
      expect(queue.size).toBe(0);
      expect(warnings).toEqual(["could not attach MainView to a: store offline for a"]);
      expect(templates.load("b")?.capabilities).toEqual([{ typeName: "LayoutRect" }, { typeName: "MainView", fields: {} }]);
    });

    it("requeues the failing request when asked to", () => {
      const { attacher } = failingSetup({ requeueUnresolved: true });

      expect(attacher.processReload().map(r => r.outcome)).toEqual(["queued", "applied"]);
      expect(attacher.pending).toEqual([{ rootIdentity: "a", typeName: "MainView", artifactPath: ARTIFACT }]);
    });
  });
});
