import path from "node:path";
import type { Settings } from "../config.js";
import { ConnectionFailureError } from "../errors.js";
import { expandHomePath } from "../persistence.js";
import type { ToolServerCommand } from "./tool-bridge.js";

export type ProcessLaunchInfo = {
  execPath: string;
  execArgv: string[];
  entryScript: string | undefined;
};

/**
 * Without a `tool_command` override the tool server is this same program
 * started again with the `tool-server` subcommand.
 */
export function resolveToolServerCommand(
  settings: Pick<Settings, "skills_dir" | "workdir" | "tool_command">,
  launch: ProcessLaunchInfo = {
    execPath: process.execPath,
    execArgv: process.execArgv,
    entryScript: process.argv[1],
  },
): ToolServerCommand {
  const toolArgs = ["--skills-dir", resolveDirectory(settings.skills_dir)];
  if (settings.workdir.trim()) {
    toolArgs.push("--workdir", resolveDirectory(settings.workdir));
  }

  const override = splitCommandLine(settings.tool_command ?? "");
  const [overrideCommand, ...overrideArgs] = override;
  if (overrideCommand) {
    return { command: overrideCommand, args: [...overrideArgs, ...toolArgs] };
  }

  if (!launch.entryScript) {
    throw new ConnectionFailureError("cannot locate the skillchat entry script to start the tool server");
  }
  return {
    command: launch.execPath,
    args: [...launch.execArgv, launch.entryScript, "tool-server", ...toolArgs],
  };
}

export function resolveDirectory(value: string): string {
  return path.resolve(expandHomePath(value.trim()));
}

/** Whitespace split that keeps single- or double-quoted runs together. */
export function splitCommandLine(commandLine: string): string[] {
  const parts: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  for (const match of commandLine.matchAll(pattern)) {
    parts.push(match[1] ?? match[2] ?? match[3] ?? "");
  }
  return parts;
}
