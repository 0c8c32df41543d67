import { useState } from "react";
import { Box, Text, useInput } from "ink";
import TextInput from "ink-text-input";
import type { SettingsUpdate } from "../config.js";
import type { SetupRequest } from "../core/runtime.js";
import type { OpenRouterModelCandidate } from "../openrouter.js";
import { cycleIndex } from "./option-window.js";

const MAX_MODEL_SUGGESTIONS = 6;

type SetupField = "api_key" | "model" | "skills_dir" | "workdir";

const SETUP_FIELDS: Array<{ field: SetupField; label: string; placeholder: string }> = [
  { field: "api_key", label: "OpenRouter API key", placeholder: "paste key..." },
  { field: "model", label: "Model", placeholder: "vendor/model" },
  { field: "skills_dir", label: "Skills directory", placeholder: "empty for the default" },
  { field: "workdir", label: "Working directory for tools", placeholder: "empty for the current directory" },
];

/** Substring match on id and label; an empty query keeps catalogue order. */
export function filterModelCandidates(
  candidates: OpenRouterModelCandidate[],
  query: string,
  limit = MAX_MODEL_SUGGESTIONS,
): OpenRouterModelCandidate[] {
  const needle = query.trim().toLowerCase();
  const matches = needle
    ? candidates.filter(
        (candidate) => candidate.id.toLowerCase().includes(needle) || candidate.label.toLowerCase().includes(needle),
      )
    : candidates;
  return matches.slice(0, limit);
}

export function SetupForm({
  request,
  modelCandidates,
  onSubmit,
  onCancel,
}: {
  request: SetupRequest;
  modelCandidates: OpenRouterModelCandidate[];
  onSubmit: (update: SettingsUpdate) => void;
  onCancel: () => void;
}) {
  const [step, setStep] = useState(0);
  const [values, setValues] = useState<Record<SetupField, string>>({
    api_key: request.current.api_key,
    model: request.current.model,
    skills_dir: request.current.skills_dir ?? "",
    workdir: request.current.workdir ?? "",
  });
  const [suggestionIndex, setSuggestionIndex] = useState(0);
  const [inputResetKey, setInputResetKey] = useState(0);
  const [problem, setProblem] = useState("");

  const current = SETUP_FIELDS[step] ?? SETUP_FIELDS[0];
  const field = current?.field ?? "api_key";
  const suggestions = field === "model" ? filterModelCandidates(modelCandidates, values.model) : [];

  useInput((_character, key) => {
    if (key.escape) {
      onCancel();
      return;
    }
    if (suggestions.length === 0) {
      return;
    }
    if (key.upArrow || key.downArrow) {
      setSuggestionIndex((index) => cycleIndex(index, key.upArrow ? -1 : 1, suggestions.length));
      return;
    }
    if (key.tab) {
      const chosen = suggestions[suggestionIndex];
      if (chosen) {
        setValues((previous) => ({ ...previous, model: chosen.id }));
        setInputResetKey((value) => value + 1);
      }
    }
  });

  const submitStep = () => {
    if (field === "api_key" && !values.api_key.trim()) {
      setProblem("an API key is required");
      return;
    }
    setProblem("");
    if (step < SETUP_FIELDS.length - 1) {
      setStep(step + 1);
      setSuggestionIndex(0);
      return;
    }
    onSubmit({
      api_key: values.api_key.trim(),
      model: values.model.trim(),
      skills_dir: values.skills_dir.trim(),
      workdir: values.workdir.trim(),
    });
  };

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color="cyanBright">{request.mode === "first_run" ? "setup" : "settings"}</Text>
      {request.mode === "first_run" && <Text color="gray">{request.reason}</Text>}
      {SETUP_FIELDS.slice(0, step).map((done) => (
        <Text key={done.field} color="gray">
          {done.label}: {done.field === "api_key" ? maskSecret(values.api_key) : values[done.field] || "(default)"}
        </Text>
      ))}
      <Box>
        <Text color="magentaBright">{current?.label ?? ""}: </Text>
        <TextInput
          key={`setup-${field}-${inputResetKey}`}
          value={values[field]}
          mask={field === "api_key" ? "*" : undefined}
          placeholder={current?.placeholder ?? ""}
          onChange={(value) => {
            setValues((previous) => ({ ...previous, [field]: value }));
            if (field === "model") {
              setSuggestionIndex(0);
            }
          }}
          onSubmit={submitStep}
        />
      </Box>
      {suggestions.map((candidate, index) => (
        <Text key={candidate.id} color={index === suggestionIndex ? "magentaBright" : "gray"}>
          {index === suggestionIndex ? ">" : " "} {candidate.id} - {candidate.description}
        </Text>
      ))}
      {problem && <Text color="red">{problem}</Text>}
      <Text color="gray">
        {field === "model" && suggestions.length > 0 ? "up/down select | tab fill | " : ""}enter next | esc cancel
      </Text>
    </Box>
  );
}

export function maskSecret(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    return "(empty)";
  }
  return trimmed.length <= 4 ? "*".repeat(trimmed.length) : `${"*".repeat(8)}${trimmed.slice(-4)}`;
}
