// src/core/solver/knowledge.ts
// Package-build knowledge base: which builds follow from a bootstrapped compiler

import { GoalResolver } from "./resolver";
import type { Conjunction, Goal } from "./types";

const BUILD_DEPS = new Map<string, string[]>([
  ["emacs", ["gtk", "elisp"]],
  ["gtk", ["glib", "cairo"]],
  ["glib", ["libc"]],
]);

function* buildRule(goal: Goal): Generator<Conjunction> {
  const pkg = goal[1];
  if (pkg === "libc") {
    yield [["bootstrap", "gcc"]];
    return;
  }
  const deps = typeof pkg === "string" ? BUILD_DEPS.get(pkg) : undefined;
  if (deps) yield deps.map((d): Goal => ["build", d]);
}

/**
 * `bootstrap gcc` is a fact; `build libc` needs it, `build glib` needs libc,
 * `build gtk` needs glib and cairo, `build emacs` needs gtk and elisp.
 * cairo and elisp have no rule, so gtk and emacs stay unprovable.
 */
export function createBuildKnowledgeBase(): GoalResolver {
  const kb = new GoalResolver();
  kb.addFact(["bootstrap", "gcc"]);
  kb.addRule("build", buildRule);
  return kb;
}
