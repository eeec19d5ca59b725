// src/core/compiler/incremental.ts
// Incremental compiler: content-addressed kernel cache over the namespace

import type { Hash } from "../artifacts/hash";
import { silentLog, type LogFn } from "../log";
import type { Namespace } from "../namespace";
import { MANIFEST_PATH, kernelPath } from "../namespace/paths";
import type { Sexp } from "../sexp";
import type { GoalResolver } from "../solver";
import { extractSymbols, kernelFor, type KernelMeta } from "./kernel";
import { buildManifest, encodeManifest, readManifestHashes, type Manifest } from "./manifest";
import { deriveProofTree } from "./proofTree";

export type IncrementalCompilerOptions = {
  log?: LogFn;
};

export type CompileResult = {
  kernels: KernelMeta[];
  manifest: Manifest;
  emitted: string[];
  skipped: string[];
};

/**
 * Turns a parsed expression into kernels, a proof tree and a manifest.
 *
 * The in-memory cache maps kernel name → hash and lives as long as this
 * instance. A cache hit only counts when the namespace still holds the
 * kernel's bytecode; otherwise the kernel is emitted again. The `changed`
 * flag compares against the manifest persisted by the previous compile and
 * never affects emission.
 *
 * Not safe for concurrent `compile` calls on the same instance.
 */
export class IncrementalCompiler {
  private readonly cache = new Map<string, Hash>();
  private readonly log: LogFn;

  constructor(
    private readonly ns: Namespace,
    private readonly resolver: GoalResolver,
    options: IncrementalCompilerOptions = {}
  ) {
    this.log = options.log ?? silentLog;
  }

  compile(expr: Sexp): KernelMeta[] {
    return this.compileDetailed(expr).kernels;
  }

  compileDetailed(expr: Sexp): CompileResult {
    const symbols = extractSymbols(expr);
    const previous = this.previousHashes();

    const kernels: KernelMeta[] = [];
    const emitted: string[] = [];
    const skipped: string[] = [];

    for (const symbol of symbols) {
      const base = kernelFor(symbol);
      const meta: KernelMeta = { ...base, changed: previous.get(symbol) !== base.hash };
      const path = kernelPath(meta.kernel);

      if (this.cache.get(meta.kernel) === meta.hash && this.ns.read(path) instanceof Uint8Array) {
        this.ns.log("emit-skip", meta.kernel);
        skipped.push(meta.kernel);
      } else {
        this.ns.write(path, meta.bytecode);
        this.ns.log("emit", meta.kernel);
        this.cache.set(meta.kernel, meta.hash);
        emitted.push(meta.kernel);
      }
      kernels.push(meta);
    }

    const proofTree = deriveProofTree(expr);
    // Provability is recorded in the resolver's memo only; it does not gate the build.
    for (const edge of proofTree) {
      this.resolver.prove(["build", edge.node]);
    }

    const manifest = buildManifest(kernels, proofTree);
    this.ns.write(MANIFEST_PATH, encodeManifest(manifest));
    this.log("compiled", { kernels: kernels.length, emitted: emitted.length, edges: proofTree.length });

    return { kernels, manifest, emitted, skipped };
  }

  cachedHash(kernel: string): Hash | undefined {
    return this.cache.get(kernel);
  }

  cacheSize(): number {
    return this.cache.size;
  }

  private previousHashes(): Map<string, Hash> {
    const read = readManifestHashes(this.ns.read(MANIFEST_PATH));
    if (!read.ok && read.reason !== "absent") {
      this.log("ignoring unreadable manifest", { path: MANIFEST_PATH, reason: read.reason });
    }
    return read.hashes;
  }
}
