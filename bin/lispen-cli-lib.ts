// bin/lispen-cli-lib.ts
// Shared CLI utilities for the lispen command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import {
  compile,
  evaluate,
  read,
  formatAll,
  headName,
  show,
  LispenError,
  type LispenConfig,
  type Writer,
} from "../src";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** What to do with the source: run it, or show one of the front-end stages. */
export type OutputKind = "eval" | "compile" | "quote" | "format";

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  file?: string;
  verbose?: boolean;
  config?: string;
  output?: OutputKind;
  mode?: "repl" | "exec";
};

export type CliConfig = {
  mode: "repl" | "exec";
  output: OutputKind;
  verbose: boolean;
  code?: string;
  file?: string;
  configFile?: string;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = args[++i] ?? "";
      result.mode = "exec";
    } else if (arg === "--compile" || arg === "-c") {
      result.output = "compile";
    } else if (arg === "--quote" || arg === "-q") {
      result.output = "quote";
    } else if (arg === "--format" || arg === "-f") {
      result.output = "format";
    } else if (arg === "--config") {
      result.config = args[++i];
    } else if (!arg.startsWith("-")) {
      // First non-flag argument is the file
      if (!result.file) {
        result.file = arg;
        result.mode = "exec";
      }
    }
    // Ignore unknown flags
  }

  if (!result.mode) {
    result.mode = "repl";
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
lispen - Lisp front end for JavaScript

USAGE:
  lispen [options]                    Start interactive REPL
  lispen [options] <file>             Run a lispen file
  lispen --eval <code>                Evaluate code directly

OPTIONS:
  -h, --help                          Show this help message
  -v, --version                       Show version information
  -e, --eval <code>                   Evaluate code and exit
  -c, --compile                       Print the generated JavaScript instead of running
  -q, --quote                         Print the reader output as JSON
  -f, --format                        Pretty-print the source
  --config <file>                     Load configuration (JSON or YAML)
  --verbose                           Log pipeline stages

REPL COMMANDS:
  :help, :h                           Show REPL help
  :quit, :q                           Exit the REPL
  :compile <code>                     Show the JavaScript for <code>
  :quote <code>                       Show the reader output for <code>
  :format <code>                      Pretty-print <code>
  :defs                               List definitions kept by the session
  :reset                              Forget all definitions

EXAMPLES:
  lispen                              # Start REPL
  lispen --compile program.lisp       # Show generated code
  lispen --eval "(+ 1 2)"             # Evaluate expression
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const here = path.dirname(fileURLToPath(import.meta.url));
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(here, "..", "package.json"), "utf8"));
    const version = typeof pkg === "object" && pkg !== null ? Reflect.get(pkg, "version") : undefined;
    return `lispen v${typeof version === "string" ? version : "0.1.0"}`;
  } catch {
    return "lispen v0.1.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

export function detectMode(args: Partial<CliArgs>): "repl" | "exec" {
  if (args.mode) {
    return args.mode;
  }
  if (args.eval || args.file) {
    return "exec";
  }
  return "repl";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const config: CliConfig = {
    mode: detectMode(args),
    output: args.output ?? "eval",
    verbose: args.verbose ?? false,
    configFile: args.config,
  };

  if (args.eval !== undefined) {
    config.code = args.eval;
  }

  if (args.file) {
    config.file = args.file;
  }

  return config;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUNNING SOURCE
// ═══════════════════════════════════════════════════════════════════════════════

/** Text the CLI prints for `source` under the chosen output kind. */
export function runSource(source: string, output: OutputKind, config: LispenConfig, write?: Writer): string {
  switch (output) {
    case "compile":
      return compile(source, config.compiler);
    case "quote":
      return JSON.stringify(read(source), null, 2);
    case "format":
      return formatAll(read(source), config.format);
    case "eval":
      return show(evaluate(source, { write }), true);
  }
}

/** One line for an error: stage, code and message for lispen errors. */
export function formatError(err: unknown): string {
  if (err instanceof LispenError) return `${err.name} ${err.code}: ${err.message}`;
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return `Error: ${String(err)}`;
}

/**
 * Net count of unclosed brackets, ignoring strings and comments. The REPL
 * keeps reading lines while this is positive.
 */
export function openDepth(text: string): number {
  let depth = 0;
  let inString = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === ";") {
      while (i < text.length && text[i] !== "\n") i++;
    } else if (ch === "(" || ch === "[" || ch === "{") depth++;
    else if (ch === ")" || ch === "]" || ch === "}") depth--;
  }
  return depth;
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL SESSION
// ═══════════════════════════════════════════════════════════════════════════════

export type ReplReply = {
  output?: string;
  error?: string;
  exit?: boolean;
};

const DEFINITION_HEADS = new Set(["def", "defn", "defp", "defmodule"]);

const STAGE_COMMANDS: Partial<Record<string, OutputKind>> = {
  ":compile": "compile",
  ":quote": "quote",
  ":format": "format",
};

/**
 * REPL state between inputs. Definitions are kept as source and replayed
 * ahead of every later input, so names stay visible across lines.
 */
export class ReplSession {
  private defs: string[] = [];

  constructor(
    private readonly config: LispenConfig,
    private readonly write?: Writer
  ) {}

  get definitions(): readonly string[] {
    return this.defs;
  }

  handle(input: string): ReplReply {
    const trimmed = input.trim();
    if (trimmed === "" || trimmed.startsWith(";")) return {};
    if (trimmed.startsWith(":")) return this.command(trimmed);

    try {
      const forms = read(trimmed);
      const value = evaluate([...this.defs, trimmed].join("\n"), { write: this.write });
      for (const form of forms) {
        if (DEFINITION_HEADS.has(headName(form) ?? "")) this.defs.push(formatAll([form], this.config.format));
      }
      return { output: show(value, true) };
    } catch (err) {
      return { error: formatError(err) };
    }
  }

  private command(line: string): ReplReply {
    const space = line.indexOf(" ");
    const name = space < 0 ? line : line.slice(0, space);
    const arg = space < 0 ? "" : line.slice(space + 1).trim();

    switch (name) {
      case ":quit":
      case ":q":
        return { exit: true };
      case ":help":
      case ":h":
        return { output: getHelpText() };
      case ":defs":
        return { output: this.defs.length > 0 ? this.defs.join("\n") : "(no definitions)" };
      case ":reset":
        this.defs = [];
        return { output: "definitions cleared" };
      default: {
        const stage = STAGE_COMMANDS[name];
        if (!stage) return { error: `Unknown command: ${name}` };
        try {
          return { output: runSource(arg, stage, this.config) };
        } catch (err) {
          return { error: formatError(err) };
        }
      }
    }
  }
}
