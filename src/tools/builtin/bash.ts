import { spawn, type ChildProcess } from "node:child_process";
import { z } from "zod";
import { describeError } from "../../errors.js";
import { defineTool } from "../registry.js";
import type { RegisteredTool } from "../types.js";

/** Fixed wall-clock limit for one command; there is no setting for it. */
export const BASH_TIMEOUT_SECONDS = 120;
const MAX_CAPTURE_CHARS = 300_000;
const KILL_GRACE_MS = 1_500;

export type ProcessRunResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  spawnError: Error | null;
  durationMs: number;
};

export function createBashTool(options: { timeoutSeconds?: number } = {}): RegisteredTool {
  const timeoutSeconds = options.timeoutSeconds ?? BASH_TIMEOUT_SECONDS;

  return defineTool({
    name: "bash_tool",
    title: "Run Bash Command",
    description: [
      "Run a bash command in the working directory and return its output.",
      "Use it to execute scripts bundled with skills, install dependencies, or perform shell operations.",
      `Commands are stopped after ${timeoutSeconds}s.`,
    ].join(" "),
    inputShape: {
      command: z.string().describe("Bash command to execute."),
    },
    run: async (input, context) => {
      const command = input.command;
      if (!command.trim()) {
        return "bash_tool ERR: empty command";
      }

      const result = await runCommand("bash", ["-c", command], {
        cwd: context.workdir,
        timeoutMs: timeoutSeconds * 1_000,
      });
      context.logger.debug(
        { exitCode: result.exitCode, timedOut: result.timedOut, durationMs: result.durationMs },
        "bash_tool finished",
      );
      return formatBashResult(command, result, timeoutSeconds);
    },
  });
}

export const bashTool = createBashTool();

export function formatBashResult(command: string, result: ProcessRunResult, timeoutSeconds: number): string {
  if (result.timedOut) {
    return `bash_tool TIMEOUT after ${timeoutSeconds}s: ${command}`;
  }
  if (result.spawnError) {
    return `bash_tool ERR: ${describeError(result.spawnError)}`;
  }

  const stdout = result.stdout.trim();
  const stderr = result.stderr.trim();
  if (result.exitCode !== 0) {
    const exitLabel = result.exitCode === null ? `signal ${result.signal ?? "unknown"}` : String(result.exitCode);
    return `bash_tool ERR (exit ${exitLabel}):\n${stderr || stdout}`;
  }
  return stdout || stderr || "OK";
}

export async function runCommand(
  command: string,
  args: string[],
  options: {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    timeoutMs: number;
  },
): Promise<ProcessRunResult> {
  const startedAt = Date.now();
  let stdout = "";
  let stderr = "";
  let timedOut = false;
  let spawnError: Error | null = null;

  const child = spawn(command, args, {
    cwd: options.cwd || process.cwd(),
    env: options.env ?? process.env,
    stdio: ["ignore", "pipe", "pipe"],
    detached: true,
    windowsHide: true,
  });

  child.stdout?.on("data", (chunk) => {
    stdout = `${stdout}${String(chunk)}`.slice(0, MAX_CAPTURE_CHARS);
  });

  child.stderr?.on("data", (chunk) => {
    stderr = `${stderr}${String(chunk)}`.slice(0, MAX_CAPTURE_CHARS);
  });

  // The shell leads its own process group, so a timeout also reaches
  // background jobs and pipelines it started.
  const timeoutHandle = setTimeout(() => {
    timedOut = true;
    signalProcessGroup(child, "SIGTERM");
    setTimeout(() => {
      signalProcessGroup(child, "SIGKILL");
    }, KILL_GRACE_MS).unref();
  }, options.timeoutMs);

  child.on("exit", () => {
    if (timedOut) {
      child.stdout?.destroy();
      child.stderr?.destroy();
    }
  });

  const result = await new Promise<{ exitCode: number | null; signal: NodeJS.Signals | null }>((resolve) => {
    child.on("close", (exitCode, signal) => {
      resolve({ exitCode, signal });
    });

    child.on("error", (error) => {
      spawnError = error;
      resolve({ exitCode: null, signal: null });
    });
  });

  clearTimeout(timeoutHandle);

  return {
    exitCode: result.exitCode,
    signal: result.signal,
    stdout,
    stderr,
    timedOut,
    spawnError,
    durationMs: Date.now() - startedAt,
  };
}

function signalProcessGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    process.kill(-child.pid, signal);
  } catch {
    // group already gone or not supported; fall back to the shell itself
    child.kill(signal);
  }
}
