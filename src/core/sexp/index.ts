// src/core/sexp/index.ts
// S-expression utilities

export {
  type Sexp,
  type Atom,
  sym,
  int,
  float,
  str,
  list,
  isList,
  isSym,
  atomValue,
  sexpEq,
  sexpToString,
  parseSexp,
} from "./sexp";

export {
  COMMUTATIVE,
  canonicalize,
  canonicalString,
  contentHash,
  sexpToPath,
} from "./canonical";
