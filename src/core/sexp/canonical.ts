// src/core/sexp/canonical.ts
// Canonical form and content hashing for S-expressions

import { digest128, type Hash } from "../artifacts/hash";
import { isList, isSym, list, sexpToString, type Sexp } from "./sexp";

/** Head symbol marking a node whose arguments are order-insensitive. */
export const COMMUTATIVE = "#:commutative";

function byText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Canonical view used only for hashing: under a `#:commutative` head the
 * arguments are sorted by their canonical text. Shape is otherwise unchanged.
 */
export function canonicalize(expr: Sexp): Sexp {
  if (!isList(expr)) return expr;
  const items = expr.items.map(canonicalize);
  const [head, ...rest] = items;
  if (head && isSym(head, COMMUTATIVE)) {
    const keyed = rest.map(x => ({ x, key: sexpToString(x) }));
    keyed.sort((a, b) => byText(a.key, b.key));
    return list([head, ...keyed.map(k => k.x)]);
  }
  return list(items);
}

export function canonicalString(expr: Sexp): string {
  return sexpToString(canonicalize(expr));
}

export function contentHash(expr: Sexp): Hash {
  return digest128(canonicalString(expr));
}

/**
 * Namespace path for an expression: atoms become `/<text>`, lists join the
 * text of their top-level items. `(button ok click)` → `/button/ok/click`.
 */
export function sexpToPath(expr: Sexp): string {
  if (!isList(expr)) return `/${sexpToString(expr)}`;
  return "/" + expr.items.map(sexpToString).join("/");
}
