// src/core/host/print.ts
// Render transformer output as JavaScript source text.

import ts from "typescript";

export interface PrintOptions {
  newLine?: "lf" | "crlf";
}

const printers = new Map<string, ts.Printer>();

function printerFor(newLine: "lf" | "crlf"): ts.Printer {
  let p = printers.get(newLine);
  if (!p) {
    p = ts.createPrinter({
      newLine: newLine === "crlf" ? ts.NewLineKind.CarriageReturnLineFeed : ts.NewLineKind.LineFeed,
      removeComments: true,
    });
    printers.set(newLine, p);
  }
  return p;
}

// Synthesized nodes need a source file only as a printing context.
const scratch = ts.createSourceFile("lispen.js", "", ts.ScriptTarget.ES2022, false, ts.ScriptKind.JS);

export function printNode(node: ts.Node, opts: PrintOptions = {}): string {
  return printerFor(opts.newLine ?? "lf").printNode(ts.EmitHint.Unspecified, node, scratch);
}

/** Print statements one after another, as the body of a script or function. */
export function printStatements(statements: readonly ts.Statement[], opts: PrintOptions = {}): string {
  const file = ts.factory.updateSourceFile(scratch, [...statements]);
  return printerFor(opts.newLine ?? "lf").printFile(file);
}
