// src/core/sexp/index.ts
// S-expression utilities

export {
  type Sexpr,
  type SexprTag,
  type SexprOf,
  type Seq,
  type Wrapped,
  atom,
  num,
  str,
  bool,
  nil,
  list,
  vector,
  tuple,
  keyword,
  quote,
  quasiquote,
  unquote,
  unquoteSplicing,
  interpolate,
  isSeq,
  isWrapped,
  isAtom,
  isKeyword,
  headName,
  sexprEquals,
} from "./sexp";

export { type FormatOptions, format, formatAll } from "./format";
