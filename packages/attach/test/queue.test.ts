/**
 * Attach Package - Pending Queue Tests
 */

import { describe, it, expect } from "vitest";
import { MemorySessionStore, PENDING_ATTACH_KEY, PendingAttachQueue, parseAttachRecords } from "@viewbind/attach";

describe("PendingAttachQueue", () => {
  it("stores deduplicated records in ordinal order", () => {
    const store = new MemorySessionStore();
    const queue = new PendingAttachQueue(store);

    expect(queue.add({ rootIdentity: "menu", typeName: "Menu", artifactPath: "src/views/Menu.ts" })).toBe(true);
    expect(queue.add({ rootIdentity: "Hud", typeName: "Hud", artifactPath: "src/views/Hud.ts" })).toBe(true);
    expect(queue.add({ rootIdentity: "menu", typeName: "Menu", artifactPath: "src/views/Menu.ts" })).toBe(false);

    expect(store.get(PENDING_ATTACH_KEY)).toBe("Hud|Hud|src/views/Hud.ts\nmenu|Menu|src/views/Menu.ts");
    expect(queue.size).toBe(2);
  });

  it("keeps its state in the session store", () => {
    const store = new MemorySessionStore();
    new PendingAttachQueue(store).add({ rootIdentity: "hud", typeName: "Hud", artifactPath: "" });

    expect(new PendingAttachQueue(store).list()).toEqual([{ rootIdentity: "hud", typeName: "Hud", artifactPath: "" }]);
  });

  it("clears the store when everything is taken", () => {
    const store = new MemorySessionStore();
    const queue = new PendingAttachQueue(store, "custom.key");
    queue.add({ rootIdentity: "hud", typeName: "Hud", artifactPath: "Hud.ts" });

    expect(queue.takeAll()).toEqual([{ rootIdentity: "hud", typeName: "Hud", artifactPath: "Hud.ts" }]);
    expect(store.get("custom.key")).toBeUndefined();
    expect(queue.list()).toEqual([]);
  });
});

describe("parseAttachRecords", () => {
  it("skips blank and short records", () => {
    expect(parseAttachRecords("a|A|a.ts\nbroken\n\nc|C\r\n")).toEqual([
      { rootIdentity: "a", typeName: "A", artifactPath: "a.ts" },
      { rootIdentity: "c", typeName: "C", artifactPath: "" },
    ]);
  });
});
