// test/sexp/canonical.spec.ts
// Canonical form, content hashing and path derivation

import { describe, it, expect } from "vitest";
import { canonicalize, canonicalString, contentHash, sexpToPath } from "../../src/core/sexp/canonical";
import { parseSexp, sexpToString, sym } from "../../src/core/sexp/sexp";

const canon = (src: string) => sexpToString(canonicalize(parseSexp(src)));

describe("canonicalize", () => {
  it("sorts the arguments of a commutative node", () => {
    expect(canon("(#:commutative b a c)")).toBe("(#:commutative a b c)");
  });

  it("sorts nested commutative nodes by their canonical text", () => {
    expect(canon("(f (#:commutative (z 1) (a 2)))")).toBe("(f (#:commutative (a 2) (z 1)))");
    expect(canon("(#:commutative (#:commutative y x) b)")).toBe("(#:commutative (#:commutative x y) b)");
  });

  it("leaves ordinary lists and atoms alone", () => {
    expect(canon("(f b a)")).toBe("(f b a)");
    expect(canon("atom")).toBe("atom");
  });

  it("is idempotent", () => {
    for (const src of ["(#:commutative c (#:commutative q p) a)", "(x (y z))", "42", "()"]) {
      const once = canonicalize(parseSexp(src));
      expect(canonicalize(once)).toEqual(once);
    }
  });

  it("does not modify the input tree", () => {
    const e = parseSexp("(#:commutative b a)");
    canonicalize(e);
    expect(sexpToString(e)).toBe("(#:commutative b a)");
  });
});

describe("contentHash", () => {
  it("is a 128-bit hex digest of the canonical text", () => {
    expect(contentHash(sym("ok"))).toBe("2689367b205c16ce32ed4200942b8b8b");
    expect(contentHash(parseSexp("(#:commutative c a b)"))).toBe("377d8d6e92dc598a7900069312ad0224");
  });

  it("is deterministic across calls and fresh parses", () => {
    const src = "(widget (button ok) (textbox name))";
    expect(contentHash(parseSexp(src))).toBe(contentHash(parseSexp(src)));
  });

  it("treats commutative argument order as equivalent", () => {
    expect(contentHash(parseSexp("(#:commutative x y)"))).toBe(contentHash(parseSexp("(#:commutative y x)")));
    expect(contentHash(parseSexp("(f x y)"))).not.toBe(contentHash(parseSexp("(f y x)")));
  });

  it("tells a symbol from a string of the same text", () => {
    expect(contentHash(parseSexp("ok"))).not.toBe(contentHash(parseSexp('"ok"')));
  });

  it("tells adjacent integers beyond 2^53 apart", () => {
    expect(contentHash(parseSexp("(n 9007199254740993)"))).not.toBe(contentHash(parseSexp("(n 9007199254740992)")));
  });

  it("matches canonicalString", () => {
    expect(canonicalString(parseSexp("(#:commutative b a)"))).toBe("(#:commutative a b)");
  });
});

describe("sexpToPath", () => {
  it("joins top-level items of a list", () => {
    expect(sexpToPath(parseSexp("(button ok click)"))).toBe("/button/ok/click");
  });

  it("uses the textual form of nested items", () => {
    expect(sexpToPath(parseSexp('(a 1 "s" (b c))'))).toBe('/a/1/"s"/(b c)');
  });

  it("maps an atom to a root-relative path", () => {
    expect(sexpToPath(parseSexp("hello"))).toBe("/hello");
    expect(sexpToPath(parseSexp("7"))).toBe("/7");
  });

  it("maps the empty list to the root", () => {
    expect(sexpToPath(parseSexp("()"))).toBe("/");
  });
});
