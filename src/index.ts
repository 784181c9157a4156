#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

const QUIET_EXIT_CODES = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

function throwInsteadOfExit(command: Command): void {
  command.exitOverride();
  command.commands.forEach(throwInsteadOfExit);
}

// Scans raw argv so --debug applies even when parsing itself failed.
function debugRequested(argv: string[]): boolean {
  const end = argv.indexOf("--");
  return (end === -1 ? argv : argv.slice(0, end)).includes("--debug");
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  throwInsteadOfExit(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already written help, version or usage output
      process.exitCode = QUIET_EXIT_CODES.has(error.code) ? error.exitCode : error.exitCode || 1;
      return;
    }
    console.error(renderCliError(error, { debug: debugRequested(argv) }));
    process.exitCode = 1;
  }
}

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isDirectExecution()) {
  await main(process.argv);
}
