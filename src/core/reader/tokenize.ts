// src/core/reader/tokenize.ts
// Source text → flat token sequence. Single pass, no state between calls.

import { LexError } from "../errors";

export interface Pos {
  line: number;
  col: number;
}

export type Tok =
  | { tag: "LParen"; at: Pos }
  | { tag: "RParen"; at: Pos }
  | { tag: "LBracket"; at: Pos }
  | { tag: "RBracket"; at: Pos }
  | { tag: "LBrace"; at: Pos }
  | { tag: "RBrace"; at: Pos }
  | { tag: "Quote"; at: Pos }
  | { tag: "Quasiquote"; at: Pos }
  | { tag: "Unquote"; at: Pos }
  | { tag: "UnquoteSplicing"; at: Pos }
  | { tag: "Interpolate"; name: string; at: Pos }
  | { tag: "Symbol"; name: string; at: Pos }
  | { tag: "Number"; value: number; float: boolean; at: Pos }
  | { tag: "String"; value: string; at: Pos }
  | { tag: "Keyword"; name: string; at: Pos }
  | { tag: "Boolean"; value: boolean; at: Pos }
  | { tag: "Nil"; at: Pos };

export type TokTag = Tok["tag"];

type Punct = Extract<Tok, { tag: "LParen" | "RParen" | "LBracket" | "RBracket" | "LBrace" | "RBrace" | "Quote" | "Quasiquote" }>["tag"];

const PUNCT: Partial<Record<string, Punct>> = {
  "(": "LParen",
  ")": "RParen",
  "[": "LBracket",
  "]": "RBracket",
  "{": "LBrace",
  "}": "RBrace",
  "'": "Quote",
  "`": "Quasiquote",
};

const ESCAPES: Partial<Record<string, string>> = { '"': '"', n: "\n", t: "\t", r: "\r", "\\": "\\" };

const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r";
const isDigit = (c: string | undefined) => c !== undefined && c >= "0" && c <= "9";
const SYMBOL_START = /[\p{L}_+\-*/<>=!.|]/u;
const SYMBOL_STOP = new Set([" ", "\t", "\n", "\r", "(", ")", "[", "]", "{", "}", '"', ";", "~"]);

export function tokenize(src: string): Tok[] {
  const toks: Tok[] = [];
  let i = 0;
  let line = 1;
  let col = 1;

  const here = (): Pos => ({ line, col });
  const span = (at: Pos) => ({ startLine: at.line, startCol: at.col });

  // Advance n code units, keeping line/col current.
  const advance = (n = 1) => {
    for (let k = 0; k < n && i < src.length; k++) {
      if (src[i] === "\n") {
        line++;
        col = 1;
      } else {
        col++;
      }
      i++;
    }
  };

  const readRun = (): string => {
    const start = i;
    while (i < src.length && !SYMBOL_STOP.has(src[i])) advance();
    return src.slice(start, i);
  };

  while (i < src.length) {
    const c = src[i];
    const at = here();

    if (isWS(c)) { advance(); continue; }

    // comments run up to (not including) the newline
    if (c === ";") {
      while (i < src.length && src[i] !== "\n") advance();
      continue;
    }

    const punct = PUNCT[c];
    if (punct) {
      toks.push({ tag: punct, at });
      advance();
      continue;
    }

    if (c === "~") {
      const next = src[i + 1];
      if (next === "@") {
        toks.push({ tag: "UnquoteSplicing", at });
        advance(2);
        continue;
      }
      if (next === "{") {
        const close = src.indexOf("}", i + 2);
        if (close < 0) throw new LexError("E0003", {}, span(at));
        const name = src.slice(i + 2, close).trim();
        if (name.length === 0) throw new LexError("E0004", { what: "interpolation ~{}" }, span(at));
        advance(close + 1 - i);
        toks.push({ tag: "Interpolate", name, at });
        continue;
      }
      toks.push({ tag: "Unquote", at });
      advance();
      continue;
    }

    if (c === '"') {
      advance();
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src[i];
        if (d === '"') { advance(); closed = true; break; }
        if (d === "\\" && i + 1 < src.length) {
          const e = src[i + 1];
          const mapped = ESCAPES[e];
          s += mapped ?? "\\" + e;
          advance(2);
          continue;
        }
        s += d;
        advance();
      }
      if (!closed) throw new LexError("E0002", {}, span(at));
      toks.push({ tag: "String", value: s, at });
      continue;
    }

    if (isDigit(c) || (c === "-" && isDigit(src[i + 1]))) {
      const start = i;
      if (c === "-") advance();
      let seenDot = false;
      while (i < src.length) {
        const d = src[i];
        if (isDigit(d)) { advance(); continue; }
        if (d === "." && !seenDot) { seenDot = true; advance(); continue; }
        break;
      }
      const text = src.slice(start, i);
      toks.push({ tag: "Number", value: Number(text), float: seenDot, at });
      continue;
    }

    if (c === ":") {
      advance();
      const name = readRun();
      if (name.length === 0) throw new LexError("E0004", { what: "keyword ':'" }, span(at));
      toks.push({ tag: "Keyword", name, at });
      continue;
    }

    // a lone '-' is always the minus symbol, even directly before a name
    if (c === "-") {
      toks.push({ tag: "Symbol", name: "-", at });
      advance();
      continue;
    }

    if (SYMBOL_START.test(c)) {
      const name = readRun();
      if (name === "true") toks.push({ tag: "Boolean", value: true, at });
      else if (name === "false") toks.push({ tag: "Boolean", value: false, at });
      else if (name === "nil") toks.push({ tag: "Nil", at });
      else toks.push({ tag: "Symbol", name, at });
      continue;
    }

    throw new LexError("E0001", { char: c }, span(at));
  }

  return toks;
}

/** Short human-readable rendering of a token, used in parse errors. */
export function describeTok(t: Tok): string {
  switch (t.tag) {
    case "LParen": return "'('";
    case "RParen": return "')'";
    case "LBracket": return "'['";
    case "RBracket": return "']'";
    case "LBrace": return "'{'";
    case "RBrace": return "'}'";
    case "Quote": return "quote (')";
    case "Quasiquote": return "quasiquote (`)";
    case "Unquote": return "unquote (~)";
    case "UnquoteSplicing": return "unquote-splicing (~@)";
    case "Interpolate": return `interpolation ~{${t.name}}`;
    case "Symbol": return `symbol '${t.name}'`;
    case "Number": return `number ${t.value}`;
    case "String": return `string ${JSON.stringify(t.value)}`;
    case "Keyword": return `keyword :${t.name}`;
    case "Boolean": return `boolean ${t.value}`;
    case "Nil": return "nil";
  }
}
