// src/core/artifacts/hash.ts
// 128-bit content digests

import { createHash } from "node:crypto";

/** 32 lowercase hex characters. */
export type Hash = string;

/**
 * Deterministic 128-bit digest for text: the leading half of SHA-256 over
 * the UTF-8 bytes. Values are persisted in manifests, so the algorithm is fixed.
 */
export function digest128(s: string): Hash {
  return createHash("sha256").update(s, "utf8").digest("hex").slice(0, 32);
}

/** Digest of a JSON encoding (stable as long as key order is). */
export function digest128JSON(x: unknown): Hash {
  return digest128(JSON.stringify(x));
}
