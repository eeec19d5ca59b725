// src/core/solver/facts.ts
// Ground fact storage keyed by goal

import type { Goal } from "./types";

export type FactStore = {
  facts: Map<string, Goal>;
};

/** Stable key for a goal. Strings and numbers stay distinct: `["p","1"]` ≠ `["p",1]`. */
export function goalKey(goal: Goal): string {
  return JSON.stringify(goal);
}

export function createFactStore(): FactStore {
  return { facts: new Map() };
}

export function assertFact(store: FactStore, goal: Goal): FactStore {
  store.facts.set(goalKey(goal), goal);
  return store;
}

export function hasFact(store: FactStore, goal: Goal): boolean {
  return store.facts.has(goalKey(goal));
}

/** Facts whose predicate is `name`, in insertion order. */
export function factsFor(store: FactStore, name: string): Goal[] {
  return [...store.facts.values()].filter(g => g[0] === name);
}
