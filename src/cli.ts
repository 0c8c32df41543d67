#!/usr/bin/env node
import { Command } from "commander";
import { skillchatConfig } from "./config.js";
import { describeError } from "./errors.js";
import { startTuiApp } from "./index.js";
import { makeLogger } from "./logger.js";
import { runToolServer } from "./tools/server.js";

const program = new Command();

program
  .name(skillchatConfig.clientName)
  .description("Chat with a hosted model that can use local skills and tools")
  .version(skillchatConfig.clientVersion)
  .option("-p, --prompt <file>", "YAML file whose system_prompt key replaces the bundled prompt")
  .action(async (options: { prompt?: string }) => {
    await startTuiApp({ promptFile: options.prompt });
  });

program
  .command("tool-server")
  .description("Serve the skill and file tools over MCP on stdio")
  .requiredOption("--skills-dir <dir>", "directory holding one folder per skill")
  .option("--workdir <dir>", "directory that relative paths and commands resolve against")
  .action(async (options: { skillsDir: string; workdir?: string }) => {
    const logger = makeLogger({ mode: "tool-server" });
    await runToolServer({ skillsDir: options.skillsDir, workdir: options.workdir, logger });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${describeError(error)}\n`);
  process.exit(1);
});
