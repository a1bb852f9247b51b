// src/core/pipeline/compileText.ts
// Source text → tokens → S-expressions → host AST → printed or evaluated JavaScript.

import { tokenize } from "../reader/tokenize";
import { readAll, parse } from "../reader/parse";
import { headName, type Sexpr } from "../sexp/sexp";
import { transformProgram, lowerSequence } from "../transform/transform";
import { Env, NameSupply } from "../transform/env";
import { HOST_RESERVED, mangle } from "../transform/mangle";
import { exprStmt } from "../transform/host";
import { printNode, printStatements } from "../host/print";
import { createRuntime, type Runtime, type Writer } from "../host/runtime";
import { stdlib } from "../../stdlib/core";
import { LispenError } from "../errors";
import { logger as defaultLogger, type Logger } from "../logger";
import type { NewLine } from "../config/config";
import type { Outcome } from "../../outcome/outcome";
import { done, fail } from "../../outcome/constructors";
import { failure, type Failure, type FailureReason } from "../../outcome/failure";

export interface CompileOptions {
  /** Program mode: the output returns `{ value, exports }`. */
  exports?: boolean;
  newLine?: NewLine;
  logger?: Logger;
}

export interface EvaluateOptions {
  /** Host values visible to the program under their Lisp names. */
  bindings?: Readonly<Record<string, unknown>>;
  /** Intrinsics for `$rt`; built from `write` when omitted. */
  runtime?: Runtime;
  write?: Writer;
  logger?: Logger;
}

export interface RunResult {
  value: unknown;
  exports: Record<string, unknown>;
}

// ─────────────────────────────────────────────────────────────────
// Reading
// ─────────────────────────────────────────────────────────────────

/** Every top-level form of `source`. */
export function read(source: string, log: Logger = defaultLogger): Sexpr[] {
  const toks = tokenize(source);
  const forms = readAll(toks);
  log.debug(`read: ${toks.length} tokens, ${forms.length} forms`);
  return forms;
}

/**
 * Source as inspectable data without compiling it: the form itself when
 * there is exactly one, otherwise the list of forms.
 */
export function quote(source: string): Sexpr | Sexpr[] {
  return parse(tokenize(source));
}

// ─────────────────────────────────────────────────────────────────
// Compiling
// ─────────────────────────────────────────────────────────────────

// A program ending in a definition already printed it as a statement.
const DEFINITIONS = new Set(["def", "defn", "defp", "defmodule"]);

/**
 * Compile to JavaScript text. Definitions print as statements and the value
 * of the last form as a trailing expression statement; a single plain
 * expression prints on its own. With `exports` the text is a function body
 * returning `{ value, exports }`.
 */
export function compile(source: string, opts: CompileOptions = {}): string {
  const log = opts.logger ?? defaultLogger;
  const forms = read(source, log);
  const print = { newLine: opts.newLine };

  let text: string;
  if (opts.exports) {
    text = printStatements(transformProgram(forms, { exports: true }).statements, print);
  } else {
    const seq = lowerSequence(forms, Env.empty());
    if (seq.statements.length === 0 && forms.length === 1) {
      text = printNode(seq.result, print);
    } else {
      const last = forms[forms.length - 1];
      const tail = last !== undefined && !DEFINITIONS.has(headName(last) ?? "");
      text = printStatements(tail ? [...seq.statements, exprStmt(seq.result)] : seq.statements, print);
    }
  }

  log.debug(`compile: ${forms.length} forms → ${text.length} chars`);
  return text;
}

// ─────────────────────────────────────────────────────────────────
// Evaluating
// ─────────────────────────────────────────────────────────────────

type Scope = Array<[string, unknown]>;

function scopeFor(bindings: Readonly<Record<string, unknown>> = {}): Scope {
  // later entries win: bindings shadow stdlib entries of the same name
  const byHost = new Map<string, unknown>();
  for (const [name, fn] of Object.entries(stdlib)) byHost.set(mangle(name), fn);
  for (const [name, value] of Object.entries(bindings)) byHost.set(mangle(name), value);
  return [...byHost.entries()];
}

function execute(source: string, exports: boolean, opts: EvaluateOptions): unknown {
  const log = opts.logger ?? defaultLogger;
  const forms = read(source, log);
  const scope = scopeFor(opts.bindings);
  const names = scope.map(([host]) => host);

  // fresh names never collide with the identifiers passed in below
  const env = Env.empty(new NameSupply(names));
  const program = transformProgram(forms, { exports, env });
  const body = `"use strict";\n${printNode(program)}`;
  log.debug(`evaluate: ${forms.length} forms, ${names.length} names in scope`);

  const fn = new Function(HOST_RESERVED.runtime, ...names, body);
  const runtime = opts.runtime ?? createRuntime({ write: opts.write });
  const result: unknown = Reflect.apply(fn, undefined, [runtime, ...scope.map(([, value]) => value)]);
  return result;
}

/** Compile and run `source`; the value of its last form. */
export function evaluate(source: string, opts: EvaluateOptions = {}): unknown {
  return execute(source, false, opts);
}

/** Run `source` as a program: the last value plus every top-level defn function. */
export function run(source: string, opts: EvaluateOptions = {}): RunResult {
  const out = execute(source, true, opts);
  if (typeof out !== "object" || out === null) {
    throw new TypeError("program did not return { value, exports }");
  }
  const value: unknown = Reflect.get(out, "value");
  const exported: unknown = Reflect.get(out, "exports");
  const exports: Record<string, unknown> = {};
  if (typeof exported === "object" && exported !== null) {
    for (const [k, v] of Object.entries(exported)) exports[k] = v;
  }
  return { value, exports };
}

// ─────────────────────────────────────────────────────────────────
// Outcome wrappers
// ─────────────────────────────────────────────────────────────────

function toFailure(err: unknown, fallback: FailureReason): Failure {
  if (err instanceof LispenError) {
    return failure(err.reason, err.message, { diagnostics: [err.diagnostic], cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return failure(fallback, message, { cause: err });
}

function attempt<A>(fallback: FailureReason, fn: () => A): Outcome<A> {
  const start = Date.now();
  try {
    const value = fn();
    return done(value, { durationMs: Date.now() - start });
  } catch (err) {
    return fail(toFailure(err, fallback), { durationMs: Date.now() - start });
  }
}

/** `compile` that reports lex, parse and transform errors as a Fail outcome. */
export function tryCompile(source: string, opts: CompileOptions = {}): Outcome<string> {
  return attempt("internal-error", () => compile(source, opts));
}

/** `evaluate` that reports compile errors and anything thrown at run time as a Fail outcome. */
export function tryEvaluate(source: string, opts: EvaluateOptions = {}): Outcome<unknown> {
  return attempt("runtime-error", () => evaluate(source, opts));
}
