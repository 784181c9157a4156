import { Command } from "commander";

import { processCommand } from "./process.js";
import { renderCommand } from "./render.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("runwatch")
    .description("Execution reports for AWS Lambda runs from CloudWatch Logs subscriptions")
    .version("0.1.0")
    .option("--debug", "Show error names, causes and stacks");

  program
    .command("process")
    .description("Process a subscription payload (raw Lambda trigger or decoded batch JSON)")
    .argument("<file>", "Path to the payload JSON")
    .option("--dry-run", "Log notifications instead of publishing them")
    .option("--no-dry-run", "Publish notifications even if DRY_RUN is set")
    .action(async (file: string, opts: { dryRun?: boolean }) => {
      await processCommand(file, { dryRun: opts.dryRun });
    });

  program
    .command("render")
    .description("Print the report for a local JSON array of log events without calling AWS")
    .argument("<file>", "Path to the events JSON")
    .requiredOption("--function <name>", "Lambda function name")
    .option("--display-name <name>", "Display name used in the subject and header")
    .option("--request-id <id>", "Request id shown in the report", "local")
    .action(
      async (
        file: string,
        opts: { function: string; displayName?: string; requestId: string },
      ) => {
        await renderCommand(file, {
          functionName: opts.function,
          displayName: opts.displayName,
          requestId: opts.requestId,
        });
      },
    );

  return program;
}
