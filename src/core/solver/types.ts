// src/core/solver/types.ts
// Ground goals, facts and rules

export type GoalTerm = string | number;

/** `[predicate, ...args]`, fully ground. */
export type Goal = readonly [string, ...GoalTerm[]];

/** One alternative: every subgoal must hold. */
export type Conjunction = readonly Goal[];

/**
 * Expands a goal into OR-alternatives of AND-conjunctions. Generators work:
 * alternatives are pulled lazily and iteration stops at the first success.
 */
export type RuleFn = (goal: Goal) => Iterable<Conjunction>;

export type ResolverStats = {
  proofs: number;
  memoHits: number;
  cycleCuts: number;
};
