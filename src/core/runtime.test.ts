import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ChatSessionStore } from "../chat-history.js";
import type { Settings, SettingsUpdate } from "../config.js";
import { ConnectionFailureError, SettingsInvalidError } from "../errors.js";
import { makeNoopLogger } from "../logger.js";
import type { ToolBridge } from "../mcp/tool-bridge.js";
import { FakeToolBridge, ScriptedCompletionClient, finalReply, toolReply } from "../testing/fakes.js";
import {
  SkillchatRuntime,
  clipPreview,
  formatTokenCount,
  type RuntimeDependencies,
  type RuntimeEvent,
} from "./runtime.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

const SETTINGS: Settings = {
  api_key: "test-secret",
  model: "test/model",
  base_url: "http://localhost:9/v1",
  skills_dir: "/srv/skills",
  workdir: "",
};

function makeStore(): ChatSessionStore {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "skillchat-runtime-"));
  tempDirs.push(dir);
  return new ChatSessionStore(dir);
}

function makeDeps(overrides: {
  completion?: ScriptedCompletionClient;
  tools?: ToolBridge | Error;
  settings?: Settings | null;
  store?: ChatSessionStore;
  onPersist?: (update: SettingsUpdate) => Settings;
}): RuntimeDependencies {
  const completion = overrides.completion ?? new ScriptedCompletionClient([]);
  const tools = overrides.tools ?? new FakeToolBridge({ list_skills: () => "Found 0 skill(s)" });
  const settings = overrides.settings === undefined ? SETTINGS : overrides.settings;
  return {
    systemPrompt: "system prompt for tests",
    store: overrides.store ?? makeStore(),
    logger: makeNoopLogger(),
    loadSettings: () => {
      if (!settings) {
        throw new SettingsInvalidError("settings file not found: /nowhere/settings.yaml");
      }
      return settings;
    },
    persistSettings: overrides.onPersist ?? ((update) => ({ ...SETTINGS, ...update })),
    createCompletionClient: () => completion,
    connectTools: async () => {
      if (tools instanceof Error) {
        throw tools;
      }
      return tools;
    },
  };
}

function writeSessionFile(store: ChatSessionStore, id: string, title: string, updatedAt: string): void {
  fs.mkdirSync(store.directory, { recursive: true });
  fs.writeFileSync(
    store.pathFor(id),
    JSON.stringify({
      id,
      title,
      created_at: updatedAt,
      updated_at: updatedAt,
      model: "test/model",
      messages: [
        { role: "user", content: `question for ${title}` },
        { role: "assistant", content: `answer for ${title}` },
      ],
    }),
    "utf8",
  );
}

describe("SkillchatRuntime", () => {
  it("greets with the connected tools on startup", async () => {
    const runtime = await SkillchatRuntime.create(makeDeps({}));
    const state = runtime.getState();

    expect(state.toolsConnected).toBe(true);
    expect(state.toolNames).toEqual(["list_skills"]);
    expect(state.transcript).toEqual([
      {
        id: 1,
        kind: "system",
        label: "Welcome",
        text: "Model: test/model\nTools: 1 (list_skills)\nType a message to start, or /help for commands.",
      },
    ]);
    expect(runtime.getMessages()).toEqual([{ role: "system", content: "system prompt for tests" }]);
  });

  it("runs a plain turn, renders it and autosaves the session", async () => {
    const store = makeStore();
    const completion = new ScriptedCompletionClient([finalReply("hi there", 1500)]);
    const runtime = await SkillchatRuntime.create(makeDeps({ completion, store }));

    const result = await runtime.dispatch({ type: "input.submit", text: "hello" });

    expect(result).toEqual({ accepted: true });
    const state = runtime.getState();
    expect(state.pending).toBe(false);
    expect(state.sessionTitle).toBe("hello");
    expect(state.totalTokens).toBe(1500);
    expect(state.transcript.slice(1).map((entry) => [entry.kind, entry.label, entry.text])).toEqual([
      ["user", "You", "hello"],
      ["assistant", "Assistant", "hi there"],
    ]);
    expect(runtime.getMessages().filter((message) => message.role !== "system")).toEqual([
      { role: "user", content: "hello" },
      { role: "assistant", content: "hi there" },
    ]);

    const saved = store.load(state.sessionId);
    expect(saved.title).toBe("hello");
    expect(saved.model).toBe("test/model");
    expect(saved.messages).toHaveLength(2);
    expect(state.sessions.map((session) => session.id)).toEqual([state.sessionId]);
  });

  it("shows clipped tool previews during a turn", async () => {
    const longResult = "x".repeat(250);
    const completion = new ScriptedCompletionClient([
      toolReply([{ id: "c1", name: "view", arguments: '{"path":"/tmp"}' }]),
      finalReply("Found it."),
    ]);
    const tools = new FakeToolBridge({ view: () => longResult });
    const runtime = await SkillchatRuntime.create(makeDeps({ completion, tools }));

    await runtime.dispatch({ type: "input.submit", text: "look in tmp" });

    const toolEntries = runtime.getState().transcript.filter((entry) => entry.kind === "tool");
    expect(toolEntries.map((entry) => [entry.label, entry.text])).toEqual([
      ["Tool", 'view({"path":"/tmp"})'],
      ["Result", `${"x".repeat(200)}...`],
    ]);
  });

  it("rejects a prompt submitted while a turn is pending", async () => {
    const completion = new ScriptedCompletionClient([finalReply("first answer")]);
    const release = completion.hold();
    const runtime = await SkillchatRuntime.create(makeDeps({ completion }));

    const firstTurn = runtime.dispatch({ type: "input.submit", text: "first" });
    expect(runtime.getState().pending).toBe(true);

    const second = await runtime.dispatch({ type: "input.submit", text: "second" });
    expect(second).toEqual({ accepted: false, reason: "busy" });

    const clear = await runtime.dispatch({ type: "input.submit", text: "/clear" });
    expect(clear).toEqual({ accepted: false, reason: "busy" });

    release();
    await expect(firstTurn).resolves.toEqual({ accepted: true });
    expect(completion.requests).toHaveLength(1);
    expect(runtime.getMessages().filter((message) => message.role === "user")).toEqual([
      { role: "user", content: "first" },
    ]);
  });

  it("reports unknown commands without failing", async () => {
    const runtime = await SkillchatRuntime.create(makeDeps({}));

    await runtime.dispatch({ type: "input.submit", text: "/bogus arg" });

    expect(runtime.getState().transcript.at(-1)).toMatchObject({
      kind: "system",
      text: "Unknown command: /bogus. Type /help for commands.",
    });
  });

  it("loads the second most recent session with /load 2", async () => {
    const store = makeStore();
    writeSessionFile(store, "aaaaaaaaaaaa", "oldest", "2026-01-01T00:00:00.000Z");
    writeSessionFile(store, "bbbbbbbbbbbb", "middle", "2026-02-01T00:00:00.000Z");
    writeSessionFile(store, "cccccccccccc", "newest", "2026-03-01T00:00:00.000Z");
    const runtime = await SkillchatRuntime.create(makeDeps({ store }));

    await runtime.dispatch({ type: "input.submit", text: "/load 2" });

    const state = runtime.getState();
    expect(state.sessionId).toBe("bbbbbbbbbbbb");
    expect(state.sessionTitle).toBe("middle");
    expect(state.transcript.map((entry) => entry.text)).toEqual([
      "Loaded: middle",
      "question for middle",
      "answer for middle",
    ]);
    expect(runtime.getMessages()).toEqual([
      { role: "system", content: "system prompt for tests" },
      { role: "user", content: "question for middle" },
      { role: "assistant", content: "answer for middle" },
    ]);
  });

  it("reports an out-of-range session number and a missing id", async () => {
    const runtime = await SkillchatRuntime.create(makeDeps({}));

    await runtime.dispatch({ type: "input.submit", text: "/load 3" });
    expect(runtime.getState().transcript.at(-1)?.text).toBe("Invalid session number: 3");

    await runtime.dispatch({ type: "input.submit", text: "/load deadbeef0000" });
    expect(runtime.getState().transcript.at(-1)).toMatchObject({
      kind: "error",
      text: "Session not found: deadbeef0000",
    });
  });

  it("saves the current conversation and starts fresh on /clear", async () => {
    const store = makeStore();
    const completion = new ScriptedCompletionClient([finalReply("ok")]);
    const runtime = await SkillchatRuntime.create(makeDeps({ completion, store }));
    await runtime.dispatch({ type: "input.submit", text: "remember this" });
    const firstId = runtime.getState().sessionId;

    await runtime.dispatch({ type: "input.submit", text: "/clear" });

    const state = runtime.getState();
    expect(state.sessionId).not.toBe(firstId);
    expect(state.sessionTitle).toBe("");
    expect(state.totalTokens).toBe(0);
    expect(state.transcript.map((entry) => entry.text)).toEqual(["New session started."]);
    expect(runtime.getMessages()).toHaveLength(1);
    expect(store.load(firstId).title).toBe("remember this");
  });

  it("keeps the conversation going when the tool server is unreachable", async () => {
    const completion = new ScriptedCompletionClient([
      toolReply([{ id: "c1", name: "list_skills", arguments: "{}" }]),
      finalReply("No tools right now."),
    ]);
    const runtime = await SkillchatRuntime.create(
      makeDeps({ completion, tools: new ConnectionFailureError("cannot reach tool server: spawn ENOENT") }),
    );

    expect(runtime.getState().transcript[0]).toMatchObject({
      kind: "error",
      text: "Tool server unavailable: cannot reach tool server: spawn ENOENT. Tool calls will return errors.",
    });

    await runtime.dispatch({ type: "input.submit", text: "what skills?" });
    const toolMessage = runtime.getMessages().find((message) => message.role === "tool");
    expect(toolMessage).toEqual({
      role: "tool",
      tool_call_id: "c1",
      content: "Error calling list_skills: tool server not connected: cannot reach tool server: spawn ENOENT",
    });
    expect(runtime.getState().transcript.at(-1)?.text).toBe("No tools right now.");

    await runtime.dispatch({ type: "input.submit", text: "/skills" });
    expect(runtime.getState().transcript.at(-1)).toMatchObject({ kind: "error", text: "Tool server not connected." });
  });

  it("renders completion failures as error entries", async () => {
    const completion = new ScriptedCompletionClient([new Error("401 invalid key")]);
    const runtime = await SkillchatRuntime.create(makeDeps({ completion }));

    const result = await runtime.dispatch({ type: "input.submit", text: "hi" });

    expect(result).toEqual({ accepted: true });
    expect(runtime.getState().transcript.at(-1)).toMatchObject({
      kind: "error",
      label: "Error",
      text: "Error: 401 invalid key",
    });
    expect(runtime.getState().pending).toBe(false);
  });

  it("prints skills through the tool bridge", async () => {
    const tools = new FakeToolBridge({
      list_skills: () => "Found 1 skill(s)",
      search_skills: (args) => `matches for ${String(args.query)}`,
    });
    const runtime = await SkillchatRuntime.create(makeDeps({ tools }));

    await runtime.dispatch({ type: "input.submit", text: "/skills" });
    await runtime.dispatch({ type: "input.submit", text: "/search pdf forms" });
    await runtime.dispatch({ type: "input.submit", text: "/search" });

    expect(tools.calls).toEqual([
      { name: "list_skills", args: {} },
      { name: "search_skills", args: { query: "pdf forms" } },
    ]);
    expect(runtime.getState().transcript.slice(-3).map((entry) => [entry.label, entry.text])).toEqual([
      ["Skills", "Found 1 skill(s)"],
      ["Search Results", "matches for pdf forms"],
      ["System", "Usage: /search <query>"],
    ]);
  });

  it("formats /status", async () => {
    const runtime = await SkillchatRuntime.create(makeDeps({}));

    await runtime.dispatch({ type: "input.submit", text: "/status" });

    const state = runtime.getState();
    expect(state.transcript.at(-1)?.text).toBe(
      [
        "Model:      test/model",
        "Base URL:   http://localhost:9/v1",
        "Skills Dir: /srv/skills",
        "Work Dir:   not set",
        "Tools:      1 (list_skills)",
        `Session:    ${state.sessionId}`,
        "Messages:   1",
        "Tokens:     ~0",
      ].join("\n"),
    );
  });

  it("asks for setup on first run and exits when it is cancelled", async () => {
    const runtime = await SkillchatRuntime.create(makeDeps({ settings: null }));
    const events: RuntimeEvent[] = [];
    runtime.onEvent((event) => events.push(event));

    expect(runtime.getState().setup).toMatchObject({
      mode: "first_run",
      reason: "settings file not found: /nowhere/settings.yaml",
    });
    expect(await runtime.dispatch({ type: "input.submit", text: "hello" })).toEqual({
      accepted: false,
      reason: "not_ready",
    });

    await runtime.dispatch({ type: "settings.cancel" });
    expect(events.at(-1)).toEqual({ type: "exit.requested", reason: "setup cancelled" });
  });

  it("applies settings from the setup flow and connects tools", async () => {
    const persisted: SettingsUpdate[] = [];
    const runtime = await SkillchatRuntime.create(
      makeDeps({
        settings: null,
        onPersist: (update) => {
          persisted.push(update);
          return { ...SETTINGS, ...update };
        },
      }),
    );

    await runtime.dispatch({
      type: "settings.submit",
      update: { api_key: "test-secret", model: "other/model", skills_dir: "/srv/skills", workdir: "" },
    });

    const state = runtime.getState();
    expect(persisted).toHaveLength(1);
    expect(state.setup).toBeNull();
    expect(state.model).toBe("other/model");
    expect(state.toolsConnected).toBe(true);
  });

  it("opens /settings prefilled and reports the new model on submit", async () => {
    const runtime = await SkillchatRuntime.create(makeDeps({}));

    await runtime.dispatch({ type: "input.submit", text: "/model" });
    expect(runtime.getState().setup).toEqual({
      mode: "edit",
      reason: "",
      current: { api_key: "test-secret", model: "test/model", skills_dir: "/srv/skills", workdir: "" },
    });

    await runtime.dispatch({
      type: "settings.submit",
      update: { api_key: "test-secret", model: "faster/model", skills_dir: "/srv/skills", workdir: "" },
    });
    expect(runtime.getState().transcript.at(-1)?.text).toBe("Settings updated. Model: faster/model");
  });

  it("saves and closes the tool bridge exactly once on shutdown", async () => {
    const store = makeStore();
    const tools = new FakeToolBridge({ list_skills: () => "" });
    const completion = new ScriptedCompletionClient([finalReply("bye")]);
    const runtime = await SkillchatRuntime.create(makeDeps({ completion, tools, store }));
    await runtime.dispatch({ type: "input.submit", text: "hello" });

    await runtime.dispatch({ type: "input.submit", text: "/quit" });
    await runtime.dispatch({ type: "shutdown" });

    expect(tools.closeCount).toBe(1);
    expect(store.list()).toHaveLength(1);
  });
});

describe("clipPreview", () => {
  it("leaves short text alone and marks clipped text", () => {
    expect(clipPreview("short", 10)).toBe("short");
    expect(clipPreview("abcdefghij", 10)).toBe("abcdefghij");
    expect(clipPreview("abcdefghijk", 10)).toBe("abcdefghij...");
  });
});

describe("formatTokenCount", () => {
  it("switches to thousands at 1000", () => {
    expect(formatTokenCount(999)).toBe("999");
    expect(formatTokenCount(1000)).toBe("1.0K");
    expect(formatTokenCount(12_345)).toBe("12.3K");
  });
});
