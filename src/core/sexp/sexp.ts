// src/core/sexp/sexp.ts
// S-expression data model, constructors, and structural equality

export type Sexpr =
  | { tag: "Atom"; name: string }
  | { tag: "Num"; value: number; float: boolean }
  | { tag: "Str"; value: string }
  | { tag: "Bool"; value: boolean }
  | { tag: "Nil" }
  | { tag: "List"; items: Sexpr[] }
  | { tag: "Vector"; items: Sexpr[] }
  | { tag: "Tuple"; items: Sexpr[] }
  | { tag: "Keyword"; name: string }
  | { tag: "Quote"; expr: Sexpr }
  | { tag: "Quasiquote"; expr: Sexpr }
  | { tag: "Unquote"; expr: Sexpr }
  | { tag: "UnquoteSplicing"; expr: Sexpr }
  | { tag: "Interpolate"; name: string };

export type SexprTag = Sexpr["tag"];
export type SexprOf<T extends SexprTag> = Extract<Sexpr, { tag: T }>;

/** Forms that hold an ordered sequence of children. */
export type Seq = SexprOf<"List" | "Vector" | "Tuple">;
/** Prefix forms wrapping exactly one child. */
export type Wrapped = SexprOf<"Quote" | "Quasiquote" | "Unquote" | "UnquoteSplicing">;

export const atom = (name: string): Sexpr => ({ tag: "Atom", name });
export const num = (value: number, float = !Number.isInteger(value)): Sexpr => ({ tag: "Num", value, float });
export const str = (value: string): Sexpr => ({ tag: "Str", value });
export const bool = (value: boolean): Sexpr => ({ tag: "Bool", value });
export const nil: Sexpr = { tag: "Nil" };
export const list = (items: Sexpr[]): Sexpr => ({ tag: "List", items });
export const vector = (items: Sexpr[]): Sexpr => ({ tag: "Vector", items });
export const tuple = (items: Sexpr[]): Sexpr => ({ tag: "Tuple", items });
export const keyword = (name: string): Sexpr => ({ tag: "Keyword", name });
export const quote = (expr: Sexpr): Sexpr => ({ tag: "Quote", expr });
export const quasiquote = (expr: Sexpr): Sexpr => ({ tag: "Quasiquote", expr });
export const unquote = (expr: Sexpr): Sexpr => ({ tag: "Unquote", expr });
export const unquoteSplicing = (expr: Sexpr): Sexpr => ({ tag: "UnquoteSplicing", expr });
export const interpolate = (name: string): Sexpr => ({ tag: "Interpolate", name });

export function isSeq(x: Sexpr): x is Seq {
  return x.tag === "List" || x.tag === "Vector" || x.tag === "Tuple";
}

export function isWrapped(x: Sexpr): x is Wrapped {
  return x.tag === "Quote" || x.tag === "Quasiquote" || x.tag === "Unquote" || x.tag === "UnquoteSplicing";
}

export function isAtom(x: Sexpr, name?: string): x is SexprOf<"Atom"> {
  return x.tag === "Atom" && (name === undefined || x.name === name);
}

export function isKeyword(x: Sexpr, name?: string): x is SexprOf<"Keyword"> {
  return x.tag === "Keyword" && (name === undefined || x.name === name);
}

/** Name of the head symbol of a non-empty list, or null. */
export function headName(x: Sexpr): string | null {
  if (x.tag !== "List" || x.items.length === 0) return null;
  const h = x.items[0];
  return h.tag === "Atom" ? h.name : null;
}

export function sexprEquals(a: Sexpr, b: Sexpr): boolean {
  switch (a.tag) {
    case "Nil":
      return b.tag === "Nil";
    case "Atom":
      return b.tag === "Atom" && b.name === a.name;
    case "Keyword":
      return b.tag === "Keyword" && b.name === a.name;
    case "Interpolate":
      return b.tag === "Interpolate" && b.name === a.name;
    case "Num":
      return b.tag === "Num" && b.value === a.value;
    case "Str":
      return b.tag === "Str" && b.value === a.value;
    case "Bool":
      return b.tag === "Bool" && b.value === a.value;
    case "Quote":
    case "Quasiquote":
    case "Unquote":
    case "UnquoteSplicing":
      return isWrapped(b) && b.tag === a.tag && sexprEquals(a.expr, b.expr);
    case "List":
    case "Vector":
    case "Tuple":
      return isSeq(b) && b.tag === a.tag && seqEquals(a.items, b.items);
  }
}

function seqEquals(as: Sexpr[], bs: Sexpr[]): boolean {
  if (as.length !== bs.length) return false;
  for (let i = 0; i < as.length; i++) {
    if (!sexprEquals(as[i], bs[i])) return false;
  }
  return true;
}
