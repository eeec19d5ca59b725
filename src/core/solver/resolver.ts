// src/core/solver/resolver.ts
// Ground backward chaining with memoization

import { assertFact, createFactStore, goalKey, hasFact, type FactStore } from "./facts";
import type { Goal, ResolverStats, RuleFn } from "./types";

/**
 * Proves ground goals from facts and rules. No variables, no unification:
 * a goal either matches a fact exactly or some rule registered under its
 * predicate expands it into subgoals.
 *
 * Outcomes are memoized, so a goal that failed once stays failed until
 * `clearMemo()` even if facts are added later.
 */
export class GoalResolver {
  private readonly store: FactStore = createFactStore();
  private readonly rules = new Map<string, RuleFn[]>();
  private readonly memo = new Map<string, boolean>();
  private readonly inProgress = new Set<string>();
  private readonly counters: ResolverStats = { proofs: 0, memoHits: 0, cycleCuts: 0 };

  addFact(goal: Goal): void {
    assertFact(this.store, goal);
  }

  addRule(name: string, fn: RuleFn): void {
    const list = this.rules.get(name);
    if (list) list.push(fn);
    else this.rules.set(name, [fn]);
  }

  prove(goal: Goal): boolean {
    const key = goalKey(goal);
    const cached = this.memo.get(key);
    if (cached !== undefined) {
      this.counters.memoHits++;
      return cached;
    }

    // Re-entering an unresolved goal means a cyclic rule graph: fail this
    // branch instead of recursing forever. The cut itself is not memoized.
    if (this.inProgress.has(key)) {
      this.counters.cycleCuts++;
      return false;
    }

    this.counters.proofs++;
    if (hasFact(this.store, goal)) {
      this.memo.set(key, true);
      return true;
    }

    this.inProgress.add(key);
    let proved = false;
    try {
      proved = this.expand(goal);
    } finally {
      this.inProgress.delete(key);
    }
    this.memo.set(key, proved);
    return proved;
  }

  private expand(goal: Goal): boolean {
    for (const rule of this.rules.get(goal[0]) ?? []) {
      for (const conjunction of rule(goal)) {
        if (conjunction.every(sub => this.prove(sub))) return true;
      }
    }
    return false;
  }

  isMemoized(goal: Goal): boolean {
    return this.memo.has(goalKey(goal));
  }

  clearMemo(): void {
    this.memo.clear();
  }

  stats(): ResolverStats {
    return { ...this.counters };
  }
}
