import { useEffect, useMemo, useState } from "react";
import { Box, render, Text, useApp, useInput } from "ink";
import TextInput from "ink-text-input";
import { suggestSlashCommands } from "./commands.js";
import { loadSystemPrompt } from "./config.js";
import {
  SkillchatRuntime,
  createDefaultRuntimeDependencies,
  type RuntimeAction,
  type RuntimeSnapshot,
} from "./core/runtime.js";
import { describeError } from "./errors.js";
import { makeLogger } from "./logger.js";
import { listOpenRouterModels, type OpenRouterModelCandidate } from "./openrouter.js";
import { cycleIndex } from "./ui/option-window.js";
import { SessionSidebar } from "./ui/session-sidebar.js";
import { SetupForm } from "./ui/setup-form.js";
import { StatusBar } from "./ui/status-bar.js";
import { GLYPH_SYSTEM, GLYPH_USER, MemoizedTranscriptRow } from "./ui/transcript-row.js";

const MAX_VISIBLE_ENTRIES = 40;

export function App({ runtime }: { runtime: SkillchatRuntime }) {
  const { exit } = useApp();
  const [snapshot, setSnapshot] = useState<RuntimeSnapshot>(() => runtime.getState());
  const [input, setInput] = useState("");
  const [inputResetKey, setInputResetKey] = useState(0);
  const [commandIndex, setCommandIndex] = useState(0);
  const [sidebarOpen, setSidebarOpen] = useState(false);
  const [sidebarIndex, setSidebarIndex] = useState(0);
  const [modelCandidates, setModelCandidates] = useState<OpenRouterModelCandidate[]>([]);
  const [uiError, setUiError] = useState("");

  useEffect(() => {
    return runtime.onEvent((event) => {
      if (event.type === "state.changed") {
        setSnapshot(event.snapshot);
        return;
      }
      exit();
    });
  }, [runtime, exit]);

  const setupOpen = snapshot.setup !== null;
  const setupApiKey = snapshot.setup?.current.api_key ?? "";
  useEffect(() => {
    if (!setupOpen) {
      return;
    }
    let cancelled = false;
    listOpenRouterModels({ apiKey: setupApiKey })
      .then((models) => {
        if (!cancelled) {
          setModelCandidates(models);
        }
      })
      .catch((error: unknown) => {
        if (!cancelled) {
          setUiError(`model list unavailable: ${describeError(error)}`);
        }
      });
    return () => {
      cancelled = true;
    };
  }, [setupOpen, setupApiKey]);

  const commandSuggestions = useMemo(() => suggestSlashCommands(input), [input]);
  const showCommandSuggestions = !setupOpen && !sidebarOpen && commandSuggestions.length > 0;
  const visibleEntries = snapshot.transcript.slice(-MAX_VISIBLE_ENTRIES);

  const dispatch = (action: RuntimeAction) => {
    runtime.dispatch(action).catch((error: unknown) => {
      setUiError(describeError(error));
    });
  };

  useInput((character, key) => {
    if (key.ctrl && character === "c") {
      dispatch({ type: "shutdown", reason: "ctrl+c" });
      return;
    }
    if (setupOpen) {
      return;
    }

    if (key.ctrl && character === "b") {
      setSidebarOpen((open) => !open);
      setSidebarIndex(0);
      return;
    }
    if (key.ctrl && character === "l") {
      dispatch({ type: "session.new" });
      return;
    }

    if (sidebarOpen) {
      if (key.escape) {
        setSidebarOpen(false);
        return;
      }
      if (key.upArrow || key.downArrow) {
        setSidebarIndex((index) => cycleIndex(index, key.upArrow ? -1 : 1, snapshot.sessions.length));
        return;
      }
      if (key.return) {
        const chosen = snapshot.sessions[sidebarIndex];
        if (chosen) {
          dispatch({ type: "session.open", sessionId: chosen.id });
          setSidebarOpen(false);
        }
      }
      return;
    }

    if (showCommandSuggestions) {
      if (key.upArrow || key.downArrow) {
        setCommandIndex((index) => cycleIndex(index, key.upArrow ? -1 : 1, commandSuggestions.length));
        return;
      }
      if (key.tab) {
        const chosen = commandSuggestions[commandIndex] ?? commandSuggestions[0];
        if (chosen) {
          setInput(chosen.usage.includes("<") ? `/${chosen.name} ` : `/${chosen.name}`);
          setInputResetKey((value) => value + 1);
          setCommandIndex(0);
        }
      }
    }
  });

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text color="cyanBright">skillchat</Text>
      <Text color="gray">
        model: {snapshot.model || "not set"} | tools: {snapshot.toolsConnected ? snapshot.toolNames.length : "offline"}
      </Text>
      <Box flexDirection="column" marginTop={1}>
        {visibleEntries.map((entry) => (
          <MemoizedTranscriptRow key={entry.id} entry={entry} />
        ))}
      </Box>
      {snapshot.pending && (
        <Text color="yellow">
          {GLYPH_SYSTEM}
          {snapshot.statusLabel}
        </Text>
      )}
      {uiError && <Text color="red">{uiError}</Text>}
      {sidebarOpen && (
        <SessionSidebar
          sessions={snapshot.sessions}
          selectedIndex={sidebarIndex}
          currentSessionId={snapshot.sessionId}
        />
      )}
      {snapshot.setup ? (
        <SetupForm
          key={`${snapshot.setup.mode}-${snapshot.sessionId}`}
          request={snapshot.setup}
          modelCandidates={modelCandidates}
          onSubmit={(update) => dispatch({ type: "settings.submit", update })}
          onCancel={() => dispatch({ type: "settings.cancel" })}
        />
      ) : (
        <>
          {showCommandSuggestions && (
            <Box flexDirection="column" marginTop={1}>
              {commandSuggestions.map((suggestion, index) => (
                <Text key={suggestion.name} color={index === commandIndex ? "magentaBright" : "gray"}>
                  {index === commandIndex ? ">" : " "} {suggestion.usage} - {suggestion.description}
                </Text>
              ))}
              <Text color="gray">tab autocomplete | up/down navigate suggestions</Text>
            </Box>
          )}
          <Box marginTop={1}>
            <Text color="magentaBright">{GLYPH_USER}</Text>
            <TextInput
              key={`prompt-input-${inputResetKey}`}
              value={input}
              focus={!sidebarOpen}
              onChange={(value) => {
                setInput(value);
                setCommandIndex(0);
              }}
              onSubmit={(submitted) => {
                if (!submitted.trim()) {
                  return;
                }
                setUiError("");
                setInput("");
                dispatch({ type: "input.submit", text: submitted });
              }}
              placeholder={snapshot.pending ? "wait for the reply..." : "type a message and press enter..."}
              showCursor
            />
          </Box>
        </>
      )}
      <StatusBar snapshot={snapshot} />
      <Text color="gray">ctrl+b sessions | ctrl+l new chat | ctrl+c exit | /help for commands</Text>
    </Box>
  );
}

export async function startTuiApp(options: { promptFile?: string } = {}): Promise<void> {
  const systemPrompt = loadSystemPrompt(options.promptFile);
  const logger = makeLogger({ mode: "chat" });
  const runtime = await SkillchatRuntime.create(createDefaultRuntimeDependencies({ systemPrompt, logger }));

  const instance = render(<App runtime={runtime} />, { exitOnCtrlC: false });
  await instance.waitUntilExit();
  await runtime.shutdown("ui closed");
}
