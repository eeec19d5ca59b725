// test/namespace/namespace.spec.ts

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Namespace } from "../../src/core/namespace/namespace";
import { NamespaceClosedError } from "../../src/core/errors";

describe("Namespace store", () => {
  let ns: Namespace;

  beforeEach(() => {
    ns = new Namespace();
  });

  afterEach(() => {
    ns.close();
  });

  it("reads back what was written under any spelling of the path", () => {
    ns.write("form//source.scm/", "(a)");
    expect(ns.read("/form/source.scm")).toBe("(a)");
    expect(ns.read("form/source.scm")).toBe("(a)");
  });

  it("returns undefined for absent paths", () => {
    expect(ns.read("/nope")).toBeUndefined();
    expect(ns.exists("/nope")).toBe(false);
  });

  it("distinguishes a stored null from an absent entry", () => {
    ns.write("/n", null);
    expect(ns.exists("/n")).toBe(true);
    expect(ns.read("/n")).toBeNull();
  });

  it("overwrites: last write wins", () => {
    ns.write("/x", 1);
    ns.write("/x", 2);
    expect(ns.read("/x")).toBe(2);
  });

  it("lists paths under a prefix in sorted order", () => {
    ns.write("/form/b.kernel", "b");
    ns.write("/form/a.kernel", "a");
    ns.write("/last/msg.path", "/x");
    expect(ns.list("/form")).toEqual(["/form/a.kernel", "/form/b.kernel"]);
    expect(ns.list()).toEqual(["/form/a.kernel", "/form/b.kernel", "/last/msg.path"]);
  });

  it("records mounts without redirecting reads", () => {
    ns.write("/form/a", 1);
    ns.mount("/form", "mnt/app/");
    expect(ns.mounts()).toEqual({ "/mnt/app": "/form" });
    expect(ns.read("/mnt/app/a")).toBeUndefined();
  });
});

describe("Namespace events", () => {
  it("appends events in order", () => {
    const ns = new Namespace();
    ns.log("emit", "a");
    ns.log("emit", "b");
    expect(ns.events()).toEqual([
      { kind: "emit", detail: "a" },
      { kind: "emit", detail: "b" },
    ]);
  });

  it("returns a snapshot unaffected by later appends or edits", () => {
    const ns = new Namespace();
    ns.log("k", "1");
    const snap = ns.events();
    ns.log("k", "2");
    const first = snap[0];
    if (first) first.detail = "changed";
    expect(snap).toHaveLength(1);
    expect(ns.events()).toEqual([
      { kind: "k", detail: "1" },
      { kind: "k", detail: "2" },
    ]);
  });
});

describe("Namespace messages", () => {
  it("delivers in FIFO order", async () => {
    const ns = new Namespace();
    ns.enqueue("m1");
    ns.enqueue("m2");
    expect(ns.pending()).toBe(2);
    expect(await ns.dequeue(10)).toBe("m1");
    expect(await ns.dequeue(10)).toBe("m2");
    expect(ns.pending()).toBe(0);
  });

  it("times out with undefined on an empty queue", async () => {
    const ns = new Namespace();
    expect(await ns.dequeue(5)).toBeUndefined();
  });

  it("wakes pending consumers on close and refuses new messages", async () => {
    const ns = new Namespace();
    const waiting = ns.dequeue();
    ns.close();
    expect(await waiting).toBeUndefined();
    expect(ns.isClosed()).toBe(true);
    expect(() => ns.enqueue("late")).toThrow(NamespaceClosedError);
  });

  it("keeps the store usable after close", () => {
    const ns = new Namespace();
    ns.close();
    ns.write("/x", "still works");
    expect(ns.read("/x")).toBe("still works");
  });
});
