// src/core/bootstrap/seed.ts
// Staged bootstrap: seed form → pattern table → symbol ids → tiny evaluator
//
// Each stage carries a hash chained from the one before, so two chains built
// from equivalent seeds agree stage by stage.

import { digest128JSON, type Hash } from "../artifacts/hash";
import { SeedError } from "../errors";
import { int, isList, list, parseSexp, sexpToString, type Sexp } from "../sexp";

export type Stage0Seed = {
  selfRef: Sexp | undefined;
  structure: Sexp | undefined;
  computation: Sexp | undefined;
  hash: Hash;
};

export type Stage1Patterns = {
  seed: Stage0Seed;
  /** token → action name, insertion ordered */
  patterns: Map<string, string>;
  hash: Hash;
};

export type Stage2Symbols = {
  stage1: Stage1Patterns;
  /** pattern → id, assigned in sorted pattern order */
  symbols: Map<string, number>;
  hash: Hash;
};

export type EvalValue = Sexp | number | undefined;

export type Stage3Eval = {
  stage2: Stage2Symbols;
  evaluate: (expr: Sexp) => EvalValue;
  hash: Hash;
};

export type BootstrapChain = {
  stage0: Stage0Seed;
  stage1: Stage1Patterns;
  stage2: Stage2Symbols;
  stage3: Stage3Eval;
};

const MAX_PATTERNS = 8;

const textOf = (x: Sexp | undefined): string | null => (x === undefined ? null : sexpToString(x));

function byText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ─────────────────────────────────────────────────────────────────
// Stage 0
// ─────────────────────────────────────────────────────────────────

/**
 * Read a seed such as `((self vb) (*structure a b) (**computation eval))`.
 * Entries are `(key body...)`; a single body item is taken bare, several
 * become a list. Entries shorter than two items are ignored.
 */
export function parseSeed(src: string): Stage0Seed {
  const expr = parseSexp(src);
  if (!isList(expr)) throw new SeedError("seed must be a list of (key value...) entries");

  const entries = new Map<string, Sexp>();
  for (const entry of expr.items) {
    if (!isList(entry) || entry.items.length < 2) continue;
    const [head, ...body] = entry.items;
    if (!head) continue;
    const [only] = body;
    entries.set(sexpToString(head), body.length === 1 && only ? only : list(body));
  }

  const selfRef = entries.get("self");
  const structure = entries.get("*structure") ?? entries.get("*layers");
  const computation = entries.get("**computation") ?? entries.get("**heads");
  const hash = digest128JSON([textOf(selfRef), textOf(structure), textOf(computation)]);
  return { selfRef, structure, computation, hash };
}

// ─────────────────────────────────────────────────────────────────
// Stage 1
// ─────────────────────────────────────────────────────────────────

export function stage1FromSeed(seed: Stage0Seed): Stage1Patterns {
  const { structure } = seed;
  let tokens: string[] = [];
  if (structure && isList(structure)) tokens = structure.items.map(sexpToString);
  else if (structure) tokens = [sexpToString(structure)];

  const patterns = new Map<string, string>();
  for (const tok of tokens.slice(0, MAX_PATTERNS)) patterns.set(tok, `ACTION:${tok}`);

  const sorted = [...patterns.entries()].sort((a, b) => byText(a[0], b[0]));
  return { seed, patterns, hash: digest128JSON([seed.hash, sorted]) };
}

// ─────────────────────────────────────────────────────────────────
// Stage 2
// ─────────────────────────────────────────────────────────────────

export function stage2FromStage1(stage1: Stage1Patterns): Stage2Symbols {
  const symbols = new Map<string, number>();
  [...stage1.patterns.keys()].sort(byText).forEach((pat, i) => symbols.set(pat, i));
  return { stage1, symbols, hash: digest128JSON([stage1.hash, [...symbols.entries()]]) };
}

// ─────────────────────────────────────────────────────────────────
// Stage 3
// ─────────────────────────────────────────────────────────────────

/**
 * Evaluator for a two-form language: `(seq e...)` yields the value of its
 * last form (undefined when empty) and `(count-symbols)` the size of the
 * stage-2 table. Other lists evaluate element-wise; atoms are themselves.
 */
export function stage3FromStage2(stage2: Stage2Symbols): Stage3Eval {
  const countSymbols = () => stage2.symbols.size;

  const evaluate = (e: Sexp): EvalValue => {
    if (!isList(e) || e.items.length === 0) return e;
    const [op, ...args] = e.items;
    if (op?.tag === "Sym" && op.name === "seq") {
      let last: EvalValue = undefined;
      for (const sub of args) last = evaluate(sub);
      return last;
    }
    if (op?.tag === "Sym" && op.name === "count-symbols") return countSymbols();
    return list(e.items.map(x => toSexp(evaluate(x))));
  };

  return { stage2, evaluate, hash: digest128JSON([stage2.hash, "eval", stage2.symbols.size]) };
}

function toSexp(v: EvalValue): Sexp {
  if (v === undefined) return list([]);
  if (typeof v === "number") return int(v);
  return v;
}

export function bootstrapChain(seedSrc: string): BootstrapChain {
  const stage0 = parseSeed(seedSrc);
  const stage1 = stage1FromSeed(stage0);
  const stage2 = stage2FromStage1(stage1);
  const stage3 = stage3FromStage2(stage2);
  return { stage0, stage1, stage2, stage3 };
}
