// src/core/compiler/kernel.ts
// Symbol extraction and per-symbol kernel metadata

import type { Hash } from "../artifacts/hash";
import { contentHash, sym, type Sexp } from "../sexp";

export type KernelMeta = {
  symbol: string;
  /** Kernel name; always the symbol itself. */
  kernel: string;
  hash: Hash;
  bytecode: Uint8Array;
  /** False only when the previous manifest recorded the same hash. */
  changed: boolean;
};

/**
 * Distinct symbol leaves in first-occurrence order. Numbers and string
 * literals are data, not kernels, and are skipped.
 */
export function extractSymbols(expr: Sexp): string[] {
  const seen = new Set<string>();
  const walk = (e: Sexp): void => {
    if (e.tag === "List") e.items.forEach(walk);
    else if (e.tag === "Sym") seen.add(e.name);
  };
  walk(expr);
  return [...seen];
}

export function bytecodeText(symbol: string, hash: Hash): string {
  return `BYTECODE(${symbol}:${hash})`;
}

export function kernelToBytecode(symbol: string, hash: Hash): Uint8Array {
  return new TextEncoder().encode(bytecodeText(symbol, hash));
}

/** Metadata depends on the symbol alone, wherever it occurs. */
export function kernelFor(symbol: string, changed = true): KernelMeta {
  const hash = contentHash(sym(symbol));
  return {
    symbol,
    kernel: symbol,
    hash,
    bytecode: kernelToBytecode(symbol, hash),
    changed,
  };
}
