import pino, { type Logger } from "pino";
import { getLogFilePath } from "./persistence.js";

export type { Logger } from "pino";

/**
 * JSON lines go to a file under the data directory. stdout belongs to the ink
 * UI in chat mode and to the MCP stdio channel in tool-server mode.
 */
export function makeLogger(bindings?: Record<string, unknown>, destinationPath = getLogFilePath()): Logger {
  const isVitest = process.env.VITEST === "true";
  const level = process.env.SKILLCHAT_LOG_LEVEL?.trim() || "info";

  return pino(
    {
      level,
      enabled: !isVitest && level !== "silent",
      base: { ...bindings, app: "skillchat", pid: process.pid },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: ["api_key", "*.api_key", "apiKey", "*.apiKey"], censor: "[REDACTED]" },
    },
    isVitest || level === "silent"
      ? undefined
      : pino.destination({
          dest: destinationPath,
          mkdir: true,
          sync: true,
        }),
  );
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
