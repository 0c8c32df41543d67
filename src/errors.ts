export type SkillchatErrorCode =
  | "CONNECTION_FAILURE"
  | "TOOL_INVOCATION_FAILURE"
  | "MALFORMED_ARGUMENTS"
  | "SESSION_NOT_FOUND"
  | "SETTINGS_INVALID";

export class SkillchatError extends Error {
  readonly code: SkillchatErrorCode;

  constructor(code: SkillchatErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SkillchatError";
    this.code = code;
  }
}

/** The tool server could not be reached, or the connection is gone. */
export class ConnectionFailureError extends SkillchatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONNECTION_FAILURE", message, options);
    this.name = "ConnectionFailureError";
  }
}

export class ToolInvocationError extends SkillchatError {
  readonly toolName: string;

  constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super("TOOL_INVOCATION_FAILURE", message, options);
    this.name = "ToolInvocationError";
    this.toolName = toolName;
  }
}

export class MalformedArgumentsError extends SkillchatError {
  readonly toolName: string;
  readonly rawArguments: string;

  constructor(toolName: string, rawArguments: string, reason: string) {
    super("MALFORMED_ARGUMENTS", `malformed arguments for ${toolName}: ${reason}`);
    this.name = "MalformedArgumentsError";
    this.toolName = toolName;
    this.rawArguments = rawArguments;
  }
}

export class SessionNotFoundError extends SkillchatError {
  readonly sessionId: string;

  constructor(sessionId: string, reason?: string) {
    super("SESSION_NOT_FOUND", reason ? `Session not found: ${sessionId} (${reason})` : `Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

export class SettingsInvalidError extends SkillchatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SETTINGS_INVALID", message, options);
    this.name = "SettingsInvalidError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
