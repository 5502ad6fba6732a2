#!/usr/bin/env node

import { Command } from "commander";
import { runAutorunCommand, pathsFromOptions } from "./commands/run.js";
import type { RunOptions } from "./commands/run.js";
import { statusCommand } from "./commands/status.js";

const program = new Command();

program
  .name("rescue-autorun")
  .description("Run autorun scripts from boot media, a network share or an HTTP server")
  .version("1.0.0")
  .option("-c, --config <path>", "Path to the effective configuration document")
  .option("--cmdline <path>", "Path to the boot command line")
  .option("--base-dir <path>", "Base working directory for logs, staging and mounts")
  .option("--lock-file <path>", "Path to the single-instance lock file");

program
  .command("run", { isDefault: true })
  .description("Stage and execute autorun scripts")
  .action(async () => {
    const options = program.opts<RunOptions>();
    try {
      process.exitCode = await runAutorunCommand(options);
    } catch (error) {
      console.error(`[FATAL] ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  });

program
  .command("status")
  .description("Show exit codes of the scripts executed by the last run")
  .option("--json", "Output in JSON format")
  .action(async (options: { json?: boolean }) => {
    const paths = pathsFromOptions(program.opts<RunOptions>());
    try {
      await statusCommand(paths.logDir, { json: options.json });
    } catch (error) {
      console.error(`Failed to read execution records: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  });

export async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
