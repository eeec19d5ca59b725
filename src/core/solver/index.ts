// src/core/solver/index.ts

export type { Goal, GoalTerm, Conjunction, RuleFn, ResolverStats } from "./types";
export { GoalResolver } from "./resolver";
export { createFactStore, assertFact, hasFact, factsFor, goalKey, type FactStore } from "./facts";
export { createBuildKnowledgeBase } from "./knowledge";
