// src/core/transform/forms.ts
// The closed set of special-form heads. Anything else in head position is a call.

export const SPECIAL_FORMS = [
  // definitions and binding
  "defn", "defp", "def", "defmodule", "let", "lambda", "fn",
  // control
  "if", "cond", "case", "do", "try",
  // quoting
  "quote", "quasiquote", "unquote",
  // arithmetic
  "+", "-", "*", "/", "rem", "mod",
  // comparison
  "<", ">", "<=", ">=", "==", "!=", "=",
  // boolean
  "and", "or", "not",
  // lists
  "car", "head", "first", "cdr", "tail", "rest", "cons", "list",
  // predicates
  "nil?", "empty?", "list?", "atom?", "number?", "string?",
  // strings / io
  "str", "print", "println",
] as const;

export type SpecialForm = (typeof SPECIAL_FORMS)[number];

const FORM_SET: ReadonlySet<string> = new Set(SPECIAL_FORMS);

export function isSpecialForm(name: string): name is SpecialForm {
  return FORM_SET.has(name);
}

/** Compile-time guard that a switch over `SpecialForm` covered every member. */
export function assertNever(x: never): never {
  throw new Error(`unhandled special form: ${String(x)}`);
}
