// src/core/compiler/proofTree.ts
// Structural dependency edges between a node's head and its children's heads

import { digest128, type Hash } from "../artifacts/hash";
import { atomValue, sexpToString, type Sexp } from "../sexp";

export type ProofDep = string | number;

export type ProofEdge = {
  node: ProofDep;
  deps: ProofDep[];
};

/**
 * Key that stands for a subtree in an edge: an atom's raw value, a list's
 * head key. An empty list, or a head that is itself a list, falls back to
 * its textual form.
 */
export function headKey(x: Sexp): ProofDep {
  if (x.tag !== "List") return atomValue(x);
  const [head] = x.items;
  if (!head) return sexpToString(x);
  return head.tag === "List" ? sexpToString(head) : atomValue(head);
}

function edgeKey(e: ProofEdge): string {
  return JSON.stringify([e.node, e.deps]);
}

/**
 * Pre-order walk over every non-empty list reachable through child
 * positions, one edge per list. A list in head position only names its
 * parent's node and is not walked. Duplicate edges keep their first position.
 */
export function deriveProofTree(expr: Sexp): ProofEdge[] {
  const edges: ProofEdge[] = [];
  const seen = new Set<string>();

  const walk = (node: Sexp): void => {
    if (node.tag !== "List" || node.items.length === 0) return;
    const [, ...children] = node.items;
    const edge: ProofEdge = { node: headKey(node), deps: children.map(headKey) };
    const key = edgeKey(edge);
    if (!seen.has(key)) {
      seen.add(key);
      edges.push(edge);
    }
    children.forEach(walk);
  };

  walk(expr);
  return edges;
}

export function serializeProofTree(edges: readonly ProofEdge[]): string {
  return JSON.stringify(edges);
}

export function proofHash(edges: readonly ProofEdge[]): Hash {
  return digest128(serializeProofTree(edges));
}
