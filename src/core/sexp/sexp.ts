// src/core/sexp/sexp.ts
// S-expression reader, printer, and structural equality

import { ParseError } from "../errors";

export type Sexp =
  | { tag: "Sym"; name: string }
  | { tag: "Int"; n: bigint }
  | { tag: "Float"; n: number }
  | { tag: "Str"; s: string }
  | { tag: "List"; items: readonly Sexp[] };

export type Atom = Exclude<Sexp, { tag: "List" }>;

export function sym(name: string): Sexp { return { tag: "Sym", name }; }
export function int(n: number | bigint): Sexp { return { tag: "Int", n: BigInt(n) }; }
export function float(n: number): Sexp { return { tag: "Float", n }; }
export function str(s: string): Sexp { return { tag: "Str", s }; }
export function list(items: readonly Sexp[]): Sexp { return { tag: "List", items }; }

export function isList(x: Sexp): x is { tag: "List"; items: readonly Sexp[] } {
  return x.tag === "List";
}

export function isSym(x: Sexp, name?: string): x is { tag: "Sym"; name: string } {
  return x.tag === "Sym" && (name === undefined || x.name === name);
}

export function sexpEq(a: Sexp, b: Sexp): boolean {
  switch (a.tag) {
    case "Sym": return b.tag === "Sym" && a.name === b.name;
    case "Int": return b.tag === "Int" && a.n === b.n;
    case "Float": return b.tag === "Float" && a.n === b.n;
    case "Str": return b.tag === "Str" && a.s === b.s;
    case "List": {
      if (b.tag !== "List" || a.items.length !== b.items.length) return false;
      return a.items.every((x, i) => {
        const y = b.items[i];
        return y !== undefined && sexpEq(x, y);
      });
    }
  }
}

function floatToString(n: number): string {
  if (!Number.isFinite(n)) return Number.isNaN(n) ? "nan" : n > 0 ? "inf" : "-inf";
  return Number.isInteger(n) ? n.toFixed(1) : String(n);
}

/**
 * Deterministic textual form. Hashing is defined over this encoding, so it
 * must not change once manifests have been persisted.
 */
export function sexpToString(x: Sexp): string {
  switch (x.tag) {
    case "Sym": return x.name;
    case "Int": return String(x.n);
    case "Float": return floatToString(x.n);
    case "Str": return JSON.stringify(x.s);
    case "List": return `(${x.items.map(sexpToString).join(" ")})`;
  }
}

/**
 * Raw JS value of an atom: names and strings as strings, numbers as numbers.
 * An integer outside the safe range comes back as its decimal digits.
 */
export function atomValue(x: Atom): string | number {
  switch (x.tag) {
    case "Sym": return x.name;
    case "Str": return x.s;
    case "Int": {
      const n = Number(x.n);
      return Number.isSafeInteger(n) ? n : x.n.toString();
    }
    case "Float": return x.n;
  }
}

// ----- Reader -----

type Tok =
  | { tag: "LP"; at: number }
  | { tag: "RP"; at: number }
  | { tag: "STR"; s: string; at: number }
  | { tag: "ATOM"; s: string; at: number };

/**
 * Parse source text. A single top-level expression is returned as is; several
 * are wrapped into one list, so `"a b"` and `"(a b)"` read the same.
 */
export function parseSexp(src: string): Sexp {
  const toks = tokenize(src);
  if (toks.length === 0) throw new ParseError("empty input");
  let i = 0;

  function parseOne(): Sexp {
    const t = toks[i];
    if (!t) throw new ParseError("unexpected EOF");
    i++;
    if (t.tag === "LP") {
      const items: Sexp[] = [];
      while (true) {
        const p = toks[i];
        if (!p) throw new ParseError("unterminated list", t.at);
        if (p.tag === "RP") { i++; break; }
        items.push(parseOne());
      }
      return list(items);
    }
    if (t.tag === "RP") throw new ParseError("unexpected ')'", t.at);
    if (t.tag === "STR") return str(t.s);
    return atomToSexp(t.s);
  }

  const exprs: Sexp[] = [];
  while (i < toks.length) exprs.push(parseOne());
  const [first] = exprs;
  return exprs.length === 1 && first ? first : list(exprs);
}

const INT_RE = /^[+-]?\d+$/;
const HEX_RE = /^[0-9a-fA-F]+$/;
const FLOAT_RE = /^[+-]?(\d+\.\d*|\.\d+)([eE][+-]?\d+)?$/;

function atomToSexp(a: string): Sexp {
  if (INT_RE.test(a)) return int(BigInt(a));
  if (FLOAT_RE.test(a)) return float(Number(a));
  return sym(a);
}

function tokenize(src: string): Tok[] {
  const out: Tok[] = [];
  let i = 0;

  function isWS(c: string) { return c === " " || c === "\t" || c === "\n" || c === "\r" || c === "\f" || c === "\v"; }

  while (i < src.length) {
    const c = src.charAt(i);
    if (isWS(c)) { i++; continue; }

    // Comments ;... to end of line
    if (c === ";") {
      while (i < src.length && src.charAt(i) !== "\n") i++;
      continue;
    }

    if (c === "(") { out.push({ tag: "LP", at: i }); i++; continue; }
    if (c === ")") { out.push({ tag: "RP", at: i }); i++; continue; }

    if (c === "\"") {
      const at = i;
      i++;
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src.charAt(i);
        if (d === "\"") { i++; closed = true; break; }
        if (d === "\\") {
          i++;
          if (i >= src.length) break;
          const e = src.charAt(i);
          const width = e === "x" ? 2 : e === "u" ? 4 : e === "U" ? 8 : 0;
          if (width > 0) {
            const digits = src.slice(i + 1, i + 1 + width);
            const code = HEX_RE.test(digits) && digits.length === width ? parseInt(digits, 16) : NaN;
            if (Number.isNaN(code) || code > 0x10ffff) {
              throw new ParseError(`invalid \\${e} escape`, i - 1);
            }
            s += String.fromCodePoint(code);
            i += 1 + width;
            continue;
          }
          if (e === "n") s += "\n";
          else if (e === "t") s += "\t";
          else if (e === "r") s += "\r";
          else s += e;
          i++;
          continue;
        }
        s += d;
        i++;
      }
      if (!closed) throw new ParseError("unterminated string", at);
      out.push({ tag: "STR", s, at });
      continue;
    }

    const at = i;
    let a = "";
    while (i < src.length) {
      const d = src.charAt(i);
      if (isWS(d) || d === "(" || d === ")" || d === ";" || d === "\"") break;
      a += d;
      i++;
    }
    out.push({ tag: "ATOM", s: a, at });
  }

  return out;
}
