import type { Logger } from "pino";
import {
  ChatSessionStore,
  generateSessionId,
  truncateTitle,
  type ChatSessionRecord,
  type ChatSessionSummary,
} from "../chat-history.js";
import type { ChatMessage } from "../chat-types.js";
import { formatHelpText, formatUnknownCommand, parseSlashCommand, type SlashCommandName } from "../commands.js";
import {
  readSettings,
  saveSettings,
  skillchatConfig,
  type Settings,
  type SettingsUpdate,
} from "../config.js";
import { SettingsInvalidError, describeError } from "../errors.js";
import { McpToolBridge, UnavailableToolBridge, type ToolBridge } from "../mcp/tool-bridge.js";
import { resolveToolServerCommand } from "../mcp/server-command.js";
import { OpenRouterCompletionClient, type CompletionClient } from "../openrouter.js";
import { runAgentTurn, type AgentTurnEvent } from "./agent-loop.js";

export type TranscriptKind = "user" | "assistant" | "tool" | "system" | "error";

export type TranscriptEntry = {
  id: number;
  kind: TranscriptKind;
  label: string;
  text: string;
};

export type SetupRequest = {
  /** "first_run" when nothing usable is on disk, "edit" for /settings. */
  mode: "first_run" | "edit";
  reason: string;
  current: SettingsUpdate;
};

export type RuntimeSnapshot = {
  pending: boolean;
  statusLabel: string;
  model: string;
  sessionId: string;
  sessionTitle: string;
  messageCount: number;
  totalTokens: number;
  toolNames: string[];
  toolsConnected: boolean;
  transcript: TranscriptEntry[];
  sessions: ChatSessionSummary[];
  setup: SetupRequest | null;
};

export type RuntimeEvent =
  | { type: "state.changed"; snapshot: RuntimeSnapshot }
  | { type: "exit.requested"; reason: string };

export type RuntimeAction =
  | { type: "input.submit"; text: string }
  | { type: "session.open"; sessionId: string }
  | { type: "session.new" }
  | { type: "settings.submit"; update: SettingsUpdate }
  | { type: "settings.cancel" }
  | { type: "shutdown"; reason?: string };

export type DispatchResult = { accepted: true } | { accepted: false; reason: "busy" | "empty" | "not_ready" };

export type RuntimeDependencies = {
  systemPrompt: string;
  store: ChatSessionStore;
  logger: Logger;
  loadSettings: () => Settings;
  persistSettings: (update: SettingsUpdate) => Settings;
  createCompletionClient: (settings: Settings) => CompletionClient;
  connectTools: (settings: Settings) => Promise<ToolBridge>;
};

const ARGUMENT_PREVIEW_LENGTH = 100;
const RESULT_PREVIEW_LENGTH = 200;
const SIDEBAR_SESSION_LIMIT = 20;
const STATUS_READY = "ready";
const STATUS_THINKING = "Thinking...";
const BUSY_NOTICE = "A turn is still running. Wait for it to finish.";

/** Commands that replace conversation state and so wait for the active turn. */
const STATEFUL_COMMANDS = new Set<SlashCommandName>(["clear", "load", "settings"]);

/**
 * Owns the conversation: message history, session identity, settings and
 * the tool connection. The UI only dispatches actions and renders snapshots.
 */
export class SkillchatRuntime {
  private readonly deps: RuntimeDependencies;
  private readonly logger: Logger;
  private readonly listeners = new Set<(event: RuntimeEvent) => void>();

  private settings: Settings | null = null;
  private completion: CompletionClient | null = null;
  private tools: ToolBridge = new UnavailableToolBridge("not started");
  private toolsConnected = false;

  private messages: ChatMessage[];
  private sessionId = generateSessionId();
  private sessionTitle = "";
  private totalTokens = 0;
  private pending = false;
  private statusLabel = STATUS_READY;
  private transcript: TranscriptEntry[] = [];
  private sessions: ChatSessionSummary[] = [];
  private setup: SetupRequest | null = null;
  private activeAbortController: AbortController | null = null;
  private nextEntryId = 1;
  private shuttingDown = false;

  private constructor(deps: RuntimeDependencies) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: "runtime" });
    this.messages = [this.systemMessage()];
  }

  static async create(deps: RuntimeDependencies): Promise<SkillchatRuntime> {
    const runtime = new SkillchatRuntime(deps);
    await runtime.initialize();
    return runtime;
  }

  onEvent(listener: (event: RuntimeEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getState(): RuntimeSnapshot {
    return {
      pending: this.pending,
      statusLabel: this.statusLabel,
      model: this.settings?.model ?? "",
      sessionId: this.sessionId,
      sessionTitle: this.sessionTitle,
      messageCount: this.messages.length,
      totalTokens: this.totalTokens,
      toolNames: [...this.tools.toolNames],
      toolsConnected: this.toolsConnected,
      transcript: [...this.transcript],
      sessions: [...this.sessions],
      setup: this.setup,
    };
  }

  /** History as the model sees it, system message first. */
  getMessages(): ChatMessage[] {
    return structuredClone(this.messages);
  }

  async dispatch(action: RuntimeAction): Promise<DispatchResult> {
    switch (action.type) {
      case "input.submit":
        return this.submitInput(action.text);
      case "session.open":
        if (this.pending) {
          return this.rejectBusy();
        }
        this.saveCurrentSession();
        this.openSession(action.sessionId, false);
        return { accepted: true };
      case "session.new":
        if (this.pending) {
          return this.rejectBusy();
        }
        this.startNewSession();
        return { accepted: true };
      case "settings.submit":
        return this.submitSettings(action.update);
      case "settings.cancel":
        return this.cancelSettings();
      case "shutdown":
        await this.shutdown(action.reason ?? "shutdown");
        return { accepted: true };
    }
  }

  async shutdown(reason: string): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    this.logger.info({ reason }, "shutting down");

    this.saveCurrentSession();
    this.activeAbortController?.abort();
    this.activeAbortController = null;
    try {
      await this.tools.close();
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, "tool bridge close failed");
    }
    this.emit({ type: "exit.requested", reason });
  }

  private async initialize(): Promise<void> {
    this.refreshSessions();
    let settings: Settings;
    try {
      settings = this.deps.loadSettings();
    } catch (error) {
      if (!(error instanceof SettingsInvalidError)) {
        throw error;
      }
      this.logger.info({ reason: error.message }, "settings unavailable, starting setup");
      this.setup = {
        mode: "first_run",
        reason: error.message,
        current: {
          api_key: skillchatConfig.fallbackApiKey,
          model: skillchatConfig.defaultModel,
          skills_dir: "",
          workdir: "",
        },
      };
      this.publishState();
      return;
    }
    await this.applySettings(settings, true);
  }

  private async applySettings(settings: Settings, reconnect: boolean): Promise<void> {
    this.settings = settings;
    this.completion = this.deps.createCompletionClient(settings);
    if (reconnect) {
      await this.connectTools(settings);
    }
    this.publishState();
  }

  private async connectTools(settings: Settings): Promise<void> {
    const previous = this.tools;
    this.statusLabel = "Connecting to tool server...";
    this.publishState();

    try {
      await previous.close();
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, "previous tool bridge close failed");
    }

    try {
      this.tools = await this.deps.connectTools(settings);
      this.toolsConnected = true;
      this.appendEntry(
        "system",
        "Welcome",
        [
          `Model: ${settings.model}`,
          `Tools: ${this.tools.toolNames.length} (${this.tools.toolNames.join(", ")})`,
          "Type a message to start, or /help for commands.",
        ].join("\n"),
      );
    } catch (error) {
      const reason = describeError(error);
      this.logger.error({ error: reason }, "tool server connection failed");
      this.tools = new UnavailableToolBridge(reason);
      this.toolsConnected = false;
      this.appendEntry("error", "Error", `Tool server unavailable: ${reason}. Tool calls will return errors.`);
    } finally {
      this.statusLabel = STATUS_READY;
    }
  }

  private async submitInput(rawText: string): Promise<DispatchResult> {
    const text = rawText.trim();
    if (!text) {
      return { accepted: false, reason: "empty" };
    }

    const command = parseSlashCommand(text);
    if (command) {
      if (command.kind === "unknown") {
        this.appendEntry("system", "System", formatUnknownCommand(command.raw));
        this.publishState();
        return { accepted: true };
      }
      if (this.pending && STATEFUL_COMMANDS.has(command.name)) {
        return this.rejectBusy();
      }
      await this.runCommand(command.name, command.arg);
      return { accepted: true };
    }

    if (this.pending) {
      return this.rejectBusy();
    }
    if (!this.settings || !this.completion) {
      this.appendEntry("error", "Error", "Finish setup before sending messages.");
      this.publishState();
      return { accepted: false, reason: "not_ready" };
    }
    await this.runTurn(text, this.settings, this.completion);
    return { accepted: true };
  }

  private async runTurn(userText: string, settings: Settings, completion: CompletionClient): Promise<void> {
    this.pending = true;
    this.statusLabel = STATUS_THINKING;
    if (!this.sessionTitle) {
      this.sessionTitle = truncateTitle(userText);
    }
    this.appendEntry("user", "You", userText);
    this.publishState();

    const abortController = new AbortController();
    this.activeAbortController = abortController;
    const startedAt = Date.now();
    this.logger.info({ sessionId: this.sessionId, model: settings.model }, "turn started");

    try {
      const result = await runAgentTurn({
        messages: this.messages,
        userText,
        completion,
        tools: this.tools,
        model: settings.model,
        onEvent: (event) => this.handleTurnEvent(event),
        signal: abortController.signal,
      });
      this.logger.info(
        { sessionId: this.sessionId, rounds: result.rounds, toolCalls: result.toolCalls, durationMs: Date.now() - startedAt },
        "turn completed",
      );
    } catch (error) {
      this.logger.error({ sessionId: this.sessionId, error: describeError(error) }, "turn failed");
      if (!this.shuttingDown) {
        this.appendEntry("error", "Error", `Error: ${describeError(error)}`);
      }
    } finally {
      if (this.activeAbortController === abortController) {
        this.activeAbortController = null;
      }
      this.pending = false;
      this.statusLabel = STATUS_READY;
      if (!this.shuttingDown) {
        this.saveCurrentSession();
      }
      this.publishState();
    }
  }

  private handleTurnEvent(event: AgentTurnEvent): void {
    switch (event.type) {
      case "model.request":
        this.statusLabel = STATUS_THINKING;
        break;
      case "usage":
        this.totalTokens += event.usage.totalTokens;
        break;
      case "assistant":
        this.appendEntry("assistant", "Assistant", event.text);
        break;
      case "tool.started":
        this.statusLabel = `Running ${event.name}...`;
        this.appendEntry("tool", "Tool", `${event.name}(${clipPreview(event.arguments || "{}", ARGUMENT_PREVIEW_LENGTH)})`);
        break;
      case "tool.completed":
        this.appendEntry("tool", "Result", clipPreview(event.result, RESULT_PREVIEW_LENGTH));
        break;
    }
    this.publishState();
  }

  private async runCommand(name: SlashCommandName, arg: string): Promise<void> {
    switch (name) {
      case "help":
        this.appendEntry("system", "Help", formatHelpText());
        break;
      case "skills":
        await this.runToolCommand("list_skills", {}, "Skills", "Fetching skills...");
        break;
      case "search":
        if (!arg) {
          this.appendEntry("system", "System", "Usage: /search <query>");
          break;
        }
        await this.runToolCommand("search_skills", { query: arg }, "Search Results", `Searching: ${arg}...`);
        break;
      case "clear":
        this.startNewSession();
        return;
      case "sessions":
        this.listSessionsCommand();
        break;
      case "load":
        this.loadCommand(arg);
        return;
      case "save":
        this.saveCommand();
        break;
      case "status":
        this.appendEntry("system", "Status", this.formatStatus());
        break;
      case "settings":
        this.setup = {
          mode: "edit",
          reason: "",
          current: {
            api_key: this.settings?.api_key ?? skillchatConfig.fallbackApiKey,
            model: this.settings?.model ?? skillchatConfig.defaultModel,
            skills_dir: this.settings?.skills_dir ?? "",
            workdir: this.settings?.workdir ?? "",
          },
        };
        break;
      case "quit":
        await this.shutdown("quit command");
        return;
    }
    this.publishState();
  }

  private async runToolCommand(
    toolName: string,
    args: Record<string, unknown>,
    label: string,
    statusLabel: string,
  ): Promise<void> {
    if (!this.toolsConnected) {
      this.appendEntry("error", "Error", "Tool server not connected.");
      return;
    }
    const previousStatus = this.statusLabel;
    this.statusLabel = statusLabel;
    this.publishState();
    try {
      this.appendEntry("system", label, await this.tools.invoke(toolName, args));
    } catch (error) {
      this.appendEntry("error", "Error", `Error: ${describeError(error)}`);
    } finally {
      this.statusLabel = this.pending ? previousStatus : STATUS_READY;
    }
  }

  private startNewSession(): void {
    this.saveCurrentSession();
    this.messages = [this.systemMessage()];
    this.sessionId = generateSessionId();
    this.sessionTitle = "";
    this.totalTokens = 0;
    this.transcript = [];
    this.appendEntry("system", "System", "New session started.");
    this.refreshSessions();
    this.publishState();
  }

  private listSessionsCommand(): void {
    const sessions = this.deps.store.list();
    if (sessions.length === 0) {
      this.appendEntry("system", "System", "No saved sessions.");
      return;
    }
    const lines = sessions.map(
      (session, index) => `  ${index + 1}. ${session.title}  (${session.updated_at.slice(0, 19).replace("T", " ")})`,
    );
    this.appendEntry("system", "Sessions", ["Saved sessions:", ...lines].join("\n"));
  }

  /** `N` picks the Nth most recent session; anything else is taken as an id. */
  private loadCommand(arg: string): void {
    if (!arg) {
      this.appendEntry("system", "System", "Usage: /load <N|id>");
      this.publishState();
      return;
    }

    let sessionId = arg;
    if (/^\d+$/.test(arg)) {
      const index = Number.parseInt(arg, 10) - 1;
      const target = this.deps.store.list()[index];
      if (index < 0 || !target) {
        this.appendEntry("system", "System", `Invalid session number: ${arg}`);
        this.publishState();
        return;
      }
      sessionId = target.id;
    }

    this.saveCurrentSession();
    this.openSession(sessionId, true);
  }

  private openSession(sessionId: string, announce: boolean): void {
    let record: ChatSessionRecord;
    try {
      record = this.deps.store.load(sessionId);
    } catch (error) {
      this.appendEntry("error", "Error", describeError(error));
      this.publishState();
      return;
    }

    this.messages = [this.systemMessage(), ...record.messages];
    this.sessionId = record.id;
    this.sessionTitle = record.title;
    this.transcript = [];
    if (announce) {
      this.appendEntry("system", "System", `Loaded: ${record.title}`);
    }
    this.replay(record.messages);
    this.refreshSessions();
    this.publishState();
    this.logger.info({ sessionId: record.id, messages: record.messages.length }, "session loaded");
  }

  private replay(messages: ChatMessage[]): void {
    for (const message of messages) {
      if (message.role === "user" && message.content) {
        this.appendEntry("user", "You", message.content);
      } else if (message.role === "assistant") {
        if (message.content) {
          this.appendEntry("assistant", "Assistant", message.content);
        }
        for (const call of message.tool_calls ?? []) {
          this.appendEntry(
            "tool",
            "Tool",
            `${call.function.name}(${clipPreview(call.function.arguments || "{}", ARGUMENT_PREVIEW_LENGTH)})`,
          );
        }
      } else if (message.role === "tool") {
        this.appendEntry("tool", "Result", clipPreview(message.content, RESULT_PREVIEW_LENGTH));
      }
    }
  }

  private saveCommand(): void {
    const savedPath = this.saveCurrentSession();
    if (savedPath) {
      this.appendEntry("system", "Saved", `Session saved (${this.sessionId}).`);
    } else {
      this.appendEntry("system", "System", "Nothing to save yet.");
    }
  }

  /** Best-effort: failures become an error entry rather than escaping. */
  private saveCurrentSession(): string | null {
    try {
      const savedPath = this.deps.store.save(
        this.sessionId,
        this.sessionTitle,
        this.settings?.model ?? skillchatConfig.defaultModel,
        this.messages,
      );
      if (savedPath) {
        this.logger.debug({ sessionId: this.sessionId, path: savedPath }, "session saved");
        this.refreshSessions();
      }
      return savedPath;
    } catch (error) {
      this.logger.error({ sessionId: this.sessionId, error: describeError(error) }, "session save failed");
      this.appendEntry("error", "Error", `History save failed: ${describeError(error)}`);
      return null;
    }
  }

  private async submitSettings(update: SettingsUpdate): Promise<DispatchResult> {
    if (this.pending) {
      return this.rejectBusy();
    }

    let saved: Settings;
    try {
      saved = this.deps.persistSettings(update);
    } catch (error) {
      if (this.setup) {
        this.setup = { ...this.setup, reason: describeError(error), current: update };
      }
      this.publishState();
      return { accepted: true };
    }

    const previous = this.settings;
    const firstRun = this.setup?.mode === "first_run" || previous === null;
    this.setup = null;
    const toolsChanged =
      firstRun ||
      !previous ||
      previous.skills_dir !== saved.skills_dir ||
      previous.workdir !== saved.workdir ||
      previous.tool_command !== saved.tool_command;

    await this.applySettings(saved, toolsChanged);
    if (!firstRun) {
      this.appendEntry("system", "Settings", `Settings updated. Model: ${saved.model}`);
      this.publishState();
    }
    return { accepted: true };
  }

  private async cancelSettings(): Promise<DispatchResult> {
    const mode = this.setup?.mode;
    this.setup = null;
    if (mode === "first_run" && !this.settings) {
      await this.shutdown("setup cancelled");
      return { accepted: true };
    }
    this.publishState();
    return { accepted: true };
  }

  private formatStatus(): string {
    const settings = this.settings;
    return [
      `Model:      ${settings?.model ?? "(not configured)"}`,
      `Base URL:   ${settings?.base_url ?? "(default)"}`,
      `Skills Dir: ${settings?.skills_dir ?? "(not configured)"}`,
      `Work Dir:   ${settings?.workdir || "not set"}`,
      `Tools:      ${this.tools.toolNames.length} (${this.tools.toolNames.join(", ")})`,
      `Session:    ${this.sessionId}`,
      `Messages:   ${this.messages.length}`,
      `Tokens:     ~${formatTokenCount(this.totalTokens)}`,
    ].join("\n");
  }

  private rejectBusy(): DispatchResult {
    this.appendEntry("system", "System", BUSY_NOTICE);
    this.publishState();
    return { accepted: false, reason: "busy" };
  }

  private refreshSessions(): void {
    this.sessions = this.deps.store.list(SIDEBAR_SESSION_LIMIT);
  }

  private systemMessage(): ChatMessage {
    return { role: "system", content: this.deps.systemPrompt };
  }

  private appendEntry(kind: TranscriptKind, label: string, text: string): void {
    this.transcript = [...this.transcript, { id: this.nextEntryId++, kind, label, text }];
  }

  private publishState(): void {
    this.emit({ type: "state.changed", snapshot: this.getState() });
  }

  private emit(event: RuntimeEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}

export function clipPreview(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

export function formatTokenCount(tokens: number): string {
  return tokens >= 1000 ? `${(tokens / 1000).toFixed(1)}K` : String(tokens);
}

/** Production wiring: settings from disk, OpenRouter completions, MCP tools over stdio. */
export function createDefaultRuntimeDependencies(params: {
  systemPrompt: string;
  logger: Logger;
  settingsPath?: string;
  store?: ChatSessionStore;
}): RuntimeDependencies {
  const { logger, settingsPath } = params;
  return {
    systemPrompt: params.systemPrompt,
    store: params.store ?? new ChatSessionStore(),
    logger,
    loadSettings: () => readSettings(settingsPath),
    persistSettings: (update) => saveSettings(update, settingsPath),
    createCompletionClient: (settings) =>
      new OpenRouterCompletionClient({
        apiKey: settings.api_key,
        baseUrl: settings.base_url,
        logger,
      }),
    connectTools: (settings) =>
      McpToolBridge.connect({
        server: resolveToolServerCommand(settings),
        clientName: skillchatConfig.clientName,
        clientVersion: skillchatConfig.clientVersion,
        logger,
      }),
  };
}
