// test/bootstrap/seed.spec.ts

import { describe, it, expect } from "vitest";
import {
  bootstrapChain,
  parseSeed,
  stage1FromSeed,
  stage2FromStage1,
  stage3FromStage2,
} from "../../src/core/bootstrap";
import { SeedError } from "../../src/core/errors";
import { int, list, parseSexp, sexpToString, sym } from "../../src/core/sexp";

const SEED = "((self vb) (*structure a b) (**computation eval))";

describe("parseSeed", () => {
  it("picks out the self, structure and computation entries", () => {
    const s = parseSeed(SEED);
    expect(s.selfRef).toEqual(sym("vb"));
    expect(s.structure).toEqual(list([sym("a"), sym("b")]));
    expect(s.computation).toEqual(sym("eval"));
    expect(s.hash).toMatch(/^[0-9a-f]{32}$/);
  });

  it("accepts the alternate entry names and ignores short entries", () => {
    const s = parseSeed("((self) (*layers c) (**heads h))");
    expect(s.selfRef).toBeUndefined();
    expect(s.structure).toEqual(sym("c"));
    expect(s.computation).toEqual(sym("h"));
  });

  it("rejects a seed that is not a list", () => {
    expect(() => parseSeed("vb")).toThrow(SeedError);
  });

  it("hashes by content, not spacing", () => {
    expect(parseSeed("((self vb)\n (*structure a   b))").hash).toBe(parseSeed("((self vb) (*structure a b))").hash);
    expect(parseSeed("((self vb) (*structure a c))").hash).not.toBe(parseSeed("((self vb) (*structure a b))").hash);
  });
});

describe("stages 1 and 2", () => {
  it("maps each structure token to an action", () => {
    const s1 = stage1FromSeed(parseSeed(SEED));
    expect([...s1.patterns.entries()]).toEqual([
      ["a", "ACTION:a"],
      ["b", "ACTION:b"],
    ]);
  });

  it("keeps at most eight patterns", () => {
    const s1 = stage1FromSeed(parseSeed("((*structure t1 t2 t3 t4 t5 t6 t7 t8 t9 t10))"));
    expect([...s1.patterns.keys()]).toEqual(["t1", "t2", "t3", "t4", "t5", "t6", "t7", "t8"]);
  });

  it("yields no patterns without a structure entry", () => {
    expect(stage1FromSeed(parseSeed("((self vb))")).patterns.size).toBe(0);
  });

  it("numbers patterns in sorted order", () => {
    const s2 = stage2FromStage1(stage1FromSeed(parseSeed("((*structure b a b))")));
    expect([...s2.symbols.entries()]).toEqual([
      ["a", 0],
      ["b", 1],
    ]);
  });
});

describe("stage 3 evaluator", () => {
  const { evaluate } = stage3FromStage2(stage2FromStage1(stage1FromSeed(parseSeed(SEED))));

  it("returns the last value of a seq", () => {
    expect(evaluate(parseSexp("(seq x (count-symbols))"))).toBe(2);
    expect(evaluate(parseSexp("(seq x y)"))).toEqual(sym("y"));
  });

  it("returns undefined for an empty seq", () => {
    expect(evaluate(parseSexp("(seq)"))).toBeUndefined();
  });

  it("evaluates other lists element-wise and atoms as themselves", () => {
    const v = evaluate(parseSexp("(f (count-symbols) (seq))"));
    expect(v).toEqual(list([sym("f"), int(2), list([])]));
    expect(v !== undefined && typeof v !== "number" ? sexpToString(v) : v).toBe("(f 2 ())");
    expect(evaluate(parseSexp('"s"'))).toEqual(parseSexp('"s"'));
  });
});

describe("bootstrapChain", () => {
  it("chains stage hashes so equal seeds agree at every stage", () => {
    const a = bootstrapChain(SEED);
    const b = bootstrapChain(SEED);
    expect([a.stage1.hash, a.stage2.hash, a.stage3.hash]).toEqual([b.stage1.hash, b.stage2.hash, b.stage3.hash]);
    expect(new Set([a.stage0.hash, a.stage1.hash, a.stage2.hash, a.stage3.hash]).size).toBe(4);
  });

  it("changes downstream hashes when the seed changes", () => {
    const a = bootstrapChain(SEED);
    const b = bootstrapChain("((self vb) (*structure a c) (**computation eval))");
    expect(b.stage3.hash).not.toBe(a.stage3.hash);
  });
});
