// src/core/reader/parse.ts
// Token sequence → S-expression tree. Recursive descent, single pass.

import type { Tok } from "./tokenize";
import { describeTok } from "./tokenize";
import type { Sexpr } from "../sexp/sexp";
import { ParseError } from "../errors";
import type { Span } from "../../outcome/diagnostic";

const CLOSERS = {
  LParen: { close: "RParen", kind: "list", closer: "')'" },
  LBracket: { close: "RBracket", kind: "vector", closer: "']'" },
  LBrace: { close: "RBrace", kind: "tuple", closer: "'}'" },
} as const;

const SEQ_TAG = { LParen: "List", LBracket: "Vector", LBrace: "Tuple" } as const;

const PREFIX_NAME = {
  Quote: "quote",
  Quasiquote: "quasiquote",
  Unquote: "unquote",
  UnquoteSplicing: "unquote-splicing",
} as const;

const spanOf = (t: Tok): Span => ({ startLine: t.at.line, startCol: t.at.col });

/** Read every top-level form. Always returns a sequence, possibly empty. */
export function readAll(toks: Tok[]): Sexpr[] {
  const out: Sexpr[] = [];
  let i = 0;

  function parseOne(): Sexpr {
    const t = toks[i];
    i++;

    switch (t.tag) {
      case "LParen":
      case "LBracket":
      case "LBrace": {
        const { close, kind, closer } = CLOSERS[t.tag];
        const items: Sexpr[] = [];
        for (;;) {
          const u = toks[i];
          if (u === undefined) throw new ParseError("E0100", { kind, closer }, spanOf(t));
          if (u.tag === close) { i++; break; }
          items.push(parseOne());
        }
        return { tag: SEQ_TAG[t.tag], items };
      }

      case "Quote":
      case "Quasiquote":
      case "Unquote":
      case "UnquoteSplicing": {
        if (i >= toks.length) {
          throw new ParseError("E0101", { prefix: PREFIX_NAME[t.tag] }, spanOf(t));
        }
        return { tag: t.tag, expr: parseOne() };
      }

      case "Interpolate": return { tag: "Interpolate", name: t.name };
      case "Symbol": return { tag: "Atom", name: t.name };
      case "Number": return { tag: "Num", value: t.value, float: t.float };
      case "String": return { tag: "Str", value: t.value };
      case "Keyword": return { tag: "Keyword", name: t.name };
      case "Boolean": return { tag: "Bool", value: t.value };
      case "Nil": return { tag: "Nil" };

      case "RParen":
      case "RBracket":
      case "RBrace":
        throw new ParseError("E0102", { token: describeTok(t) }, spanOf(t));
    }
  }

  while (i < toks.length) {
    const t = toks[i];
    // a stray closer at top level means input the grammar cannot consume
    if (t.tag === "RParen" || t.tag === "RBracket" || t.tag === "RBrace") {
      throw new ParseError("E0103", { token: describeTok(t) }, spanOf(t));
    }
    out.push(parseOne());
  }
  return out;
}

/**
 * Reader entry point with the classic shape: no forms gives `[]`, one form
 * gives that form, several give the array of them.
 */
export function parse(toks: Tok[]): Sexpr | Sexpr[] {
  const forms = readAll(toks);
  return forms.length === 1 ? forms[0] : forms;
}
