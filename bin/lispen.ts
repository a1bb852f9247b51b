#!/usr/bin/env tsx
// bin/lispen.ts
// lispen CLI - REPL, file runner and front-end stage viewer
//
// Run:  npx tsx bin/lispen.ts [options] [file]

import * as readline from "readline";
import * as fs from "fs";
import ansis from "ansis";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  runSource,
  formatError,
  openDepth,
  ReplSession,
  type CliConfig,
} from "./lispen-cli-lib";
import { loadConfig, validateConfig, logger, LogLevel, parseLogLevel, type LispenConfig } from "../src";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return;
  }

  const cli = buildConfig(cliArgs);
  const config = loadConfig({ configFile: cli.configFile });
  logger.setLevel(cli.verbose ? LogLevel.DEBUG : parseLogLevel(config.log.level));

  const check = validateConfig(config);
  for (const w of check.warnings) logger.warn(w);
  if (!check.valid) {
    for (const e of check.errors) console.error(ansis.red(`Config error: ${e}`));
    process.exitCode = 1;
    return;
  }

  if (cli.mode === "exec") {
    executeMode(cli, config);
  } else {
    await replMode(config);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTE MODE (file or --eval)
// ═══════════════════════════════════════════════════════════════════════════════

function executeMode(cli: CliConfig, config: LispenConfig): void {
  const code = cli.file ? fs.readFileSync(cli.file, "utf8") : cli.code;
  if (code === undefined) {
    console.error(ansis.red("Error: No code or file specified"));
    process.exitCode = 1;
    return;
  }

  try {
    const text = runSource(code, cli.output, config);
    console.log(text);
  } catch (error) {
    console.error(ansis.red(formatError(error)));
    if (cli.verbose && error instanceof Error && error.stack) console.error(ansis.gray(error.stack));
    process.exitCode = 1;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL MODE
// ═══════════════════════════════════════════════════════════════════════════════

async function replMode(config: LispenConfig): Promise<void> {
  const session = new ReplSession(config);
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "λ> ",
  });

  console.log(ansis.gray(`${getVersion()} - :help for commands, :quit to exit`));
  rl.prompt();

  let buffer = "";
  for await (const line of rl) {
    buffer = buffer ? `${buffer}\n${line}` : line;
    if (openDepth(buffer) > 0) {
      rl.setPrompt(".. ");
      rl.prompt();
      continue;
    }

    const reply = session.handle(buffer);
    buffer = "";
    if (reply.exit) break;
    if (reply.output !== undefined) console.log(reply.output);
    if (reply.error !== undefined) console.error(ansis.red(reply.error));
    rl.setPrompt("λ> ");
    rl.prompt();
  }

  rl.close();
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main().catch((error: unknown) => {
  console.error(ansis.red(`Fatal error: ${formatError(error)}`));
  process.exit(1);
});
