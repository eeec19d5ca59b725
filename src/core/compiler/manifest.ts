// src/core/compiler/manifest.ts
// Build manifest: kernels, proof tree and proof hash, persisted as JSON

import type { Hash } from "../artifacts/hash";
import type { KernelMeta } from "./kernel";
import { proofHash, type ProofEdge } from "./proofTree";

export type ManifestKernel = {
  symbol: string;
  kernel: string;
  hash: Hash;
  changed: boolean;
};

export type Manifest = {
  kernels: ManifestKernel[];
  proof_tree: ProofEdge[];
  proof_hash: Hash;
};

export type ManifestRead =
  | { ok: true; hashes: Map<string, Hash> }
  | { ok: false; hashes: Map<string, Hash>; reason: string };

export function buildManifest(kernels: readonly KernelMeta[], proofTree: ProofEdge[]): Manifest {
  return {
    kernels: kernels.map(k => ({ symbol: k.symbol, kernel: k.kernel, hash: k.hash, changed: k.changed })),
    proof_tree: proofTree,
    proof_hash: proofHash(proofTree),
  };
}

export function encodeManifest(m: Manifest): string {
  return JSON.stringify(m, null, 2);
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

/**
 * Symbol → hash map from a previously stored manifest. Accepts the JSON text
 * or an already-decoded object. Anything unreadable yields an empty map with
 * a reason; kernel entries without a string symbol and hash are skipped.
 */
export function readManifestHashes(stored: unknown): ManifestRead {
  const hashes = new Map<string, Hash>();
  if (stored === undefined) return { ok: false, hashes, reason: "absent" };

  let parsed: unknown = stored;
  if (typeof stored === "string") {
    try {
      parsed = JSON.parse(stored);
    } catch (e) {
      return { ok: false, hashes, reason: `invalid JSON: ${e instanceof Error ? e.message : String(e)}` };
    }
  }

  if (!isRecord(parsed)) return { ok: false, hashes, reason: "not an object" };
  const { kernels } = parsed;
  if (!Array.isArray(kernels)) return { ok: false, hashes, reason: "kernels is not an array" };

  for (const k of kernels) {
    if (isRecord(k) && typeof k.symbol === "string" && typeof k.hash === "string") {
      hashes.set(k.symbol, k.hash);
    }
  }
  return { ok: true, hashes };
}
