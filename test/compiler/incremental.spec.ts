// test/compiler/incremental.spec.ts
// Kernel cache, self-healing re-emission, changed flags and manifest persistence

import { describe, it, expect, beforeEach, vi } from "vitest";
import { IncrementalCompiler } from "../../src/core/compiler/incremental";
import { Namespace } from "../../src/core/namespace/namespace";
import { MANIFEST_PATH, kernelPath } from "../../src/core/namespace/paths";
import { GoalResolver } from "../../src/core/solver/resolver";
import { createBuildKnowledgeBase } from "../../src/core/solver/knowledge";
import { parseSexp } from "../../src/core/sexp/sexp";

const FORM = "(widget (button ok) (textbox name))";

function emits(ns: Namespace): string[] {
  return ns.events().filter(e => e.kind === "emit").map(e => e.detail);
}

function storedManifest(ns: Namespace): unknown {
  const raw = ns.read(MANIFEST_PATH);
  return typeof raw === "string" ? JSON.parse(raw) : undefined;
}

describe("IncrementalCompiler", () => {
  let ns: Namespace;
  let resolver: GoalResolver;
  let compiler: IncrementalCompiler;

  beforeEach(() => {
    ns = new Namespace();
    resolver = new GoalResolver();
    compiler = new IncrementalCompiler(ns, resolver);
  });

  it("emits one kernel per distinct symbol on the first compile", () => {
    const kernels = compiler.compile(parseSexp(FORM));
    expect(kernels.map(k => k.symbol)).toEqual(["widget", "button", "ok", "textbox", "name"]);
    expect(kernels.every(k => k.changed)).toBe(true);
    expect(emits(ns)).toEqual(["widget", "button", "ok", "textbox", "name"]);
    const blob = ns.read(kernelPath("ok"));
    expect(blob).toBeInstanceOf(Uint8Array);
    if (blob instanceof Uint8Array) {
      expect(new TextDecoder().decode(blob)).toBe("BYTECODE(ok:2689367b205c16ce32ed4200942b8b8b)");
    }
    expect(compiler.cacheSize()).toBe(5);
    expect(compiler.cachedHash("ok")).toBe("2689367b205c16ce32ed4200942b8b8b");
    expect(compiler.cachedHash("missing")).toBeUndefined();
  });

  it("persists the manifest with kernels, proof tree and proof hash", () => {
    compiler.compile(parseSexp(FORM));
    expect(storedManifest(ns)).toEqual({
      kernels: [
        { symbol: "widget", kernel: "widget", hash: "8ac140ceb6ca8d6e51a987a9828b9f97", changed: true },
        { symbol: "button", kernel: "button", hash: expect.stringMatching(/^[0-9a-f]{32}$/), changed: true },
        { symbol: "ok", kernel: "ok", hash: "2689367b205c16ce32ed4200942b8b8b", changed: true },
        { symbol: "textbox", kernel: "textbox", hash: expect.stringMatching(/^[0-9a-f]{32}$/), changed: true },
        { symbol: "name", kernel: "name", hash: expect.stringMatching(/^[0-9a-f]{32}$/), changed: true },
      ],
      proof_tree: [
        { node: "widget", deps: ["button", "textbox"] },
        { node: "button", deps: ["ok"] },
        { node: "textbox", deps: ["name"] },
      ],
      proof_hash: "66ac0f95865585b30d83cd8f02091d46",
    });
  });

  it("marks nothing changed and emits nothing on an identical recompile", () => {
    const expr = parseSexp(FORM);
    compiler.compile(expr);
    const before = emits(ns).length;

    const second = compiler.compile(expr);
    expect(second.every(k => !k.changed)).toBe(true);
    expect(emits(ns)).toHaveLength(before);
    expect(ns.events().filter(e => e.kind === "emit-skip")).toHaveLength(5);
  });

  it("re-emits a kernel whose path no longer holds bytecode", () => {
    const expr = parseSexp(FORM);
    compiler.compile(expr);
    ns.write(kernelPath("button"), "stale");

    const result = compiler.compileDetailed(expr);
    expect(result.emitted).toEqual(["button"]);
    expect(result.skipped).toEqual(["widget", "ok", "textbox", "name"]);
    expect(result.kernels.every(k => !k.changed)).toBe(true);
    expect(ns.read(kernelPath("button"))).toBeInstanceOf(Uint8Array);
  });

  it("flags only symbols whose hash differs from the previous manifest", () => {
    compiler.compile(parseSexp("(form a b)"));
    const second = compiler.compile(parseSexp("(form a c)"));
    expect(second.map(k => [k.symbol, k.changed])).toEqual([
      ["form", false],
      ["a", false],
      ["c", true],
    ]);
    expect(emits(ns)).toEqual(["form", "a", "b", "c"]);
  });

  it("reads change state from a manifest persisted by an earlier compiler", () => {
    const expr = parseSexp(FORM);
    compiler.compile(expr);

    const restarted = new IncrementalCompiler(ns, resolver);
    const result = restarted.compileDetailed(expr);
    expect(result.kernels.every(k => !k.changed)).toBe(true);
    // its own cache starts cold, so everything is emitted once more
    expect(result.emitted).toEqual(["widget", "button", "ok", "textbox", "name"]);
  });

  it("tolerates a malformed manifest", () => {
    const log = vi.fn();
    const c = new IncrementalCompiler(ns, resolver, { log });
    ns.write(MANIFEST_PATH, "{broken");
    const kernels = c.compile(parseSexp(FORM));
    expect(kernels.every(k => k.changed)).toBe(true);
    expect(log).toHaveBeenCalledWith("ignoring unreadable manifest", expect.objectContaining({ path: MANIFEST_PATH }));
  });

  it("replaces the previous manifest wholesale", () => {
    compiler.compile(parseSexp(FORM));
    compiler.compile(parseSexp("(solo)"));
    expect(storedManifest(ns)).toEqual({
      kernels: [{ symbol: "solo", kernel: "solo", hash: expect.stringMatching(/^[0-9a-f]{32}$/), changed: true }],
      proof_tree: [{ node: "solo", deps: [] }],
      proof_hash: expect.stringMatching(/^[0-9a-f]{32}$/),
    });
  });

  it("poses a build goal for every proof edge without gating the result", () => {
    const kb = createBuildKnowledgeBase();
    const c = new IncrementalCompiler(ns, kb);
    const kernels = c.compile(parseSexp("(glib (libc x) (emacs y))"));

    expect(kb.isMemoized(["build", "glib"])).toBe(true);
    expect(kb.isMemoized(["build", "libc"])).toBe(true);
    expect(kb.isMemoized(["build", "emacs"])).toBe(true);
    expect(kb.prove(["build", "emacs"])).toBe(false);
    expect(kernels.map(k => k.symbol)).toEqual(["glib", "libc", "x", "emacs", "y"]);
  });
});
