import fs from "node:fs";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { z } from "zod";
import { SettingsInvalidError } from "./errors.js";
import { getDefaultSkillsDirectory, getSettingsFilePath, writeFileAtomic } from "./persistence.js";

export const DEFAULT_BASE_URL = "https://openrouter.ai/api/v1";

export const skillchatConfig = {
  defaultModel: process.env.SKILLCHAT_MODEL?.trim() || "moonshotai/kimi-k2.5",
  defaultBaseUrl: process.env.SKILLCHAT_BASE_URL?.trim() || DEFAULT_BASE_URL,
  fallbackApiKey: process.env.OPENROUTER_API_KEY?.trim() ?? "",
  clientName: "skillchat",
  clientVersion: "0.1.0",
};

export type Settings = {
  api_key: string;
  model: string;
  base_url: string;
  skills_dir: string;
  workdir: string;
  /** Extra key: full command line for the tool server, overriding the bundled one. */
  tool_command?: string;
};

export type SettingsUpdate = {
  api_key: string;
  model: string;
  skills_dir?: string;
  workdir?: string;
  base_url?: string;
};

const optionalText = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => (value === null || value === undefined ? "" : String(value).trim()));

const settingsSchema = z
  .object({
    api_key: optionalText,
    model: optionalText,
    base_url: optionalText,
    skills_dir: optionalText,
    workdir: optionalText,
    tool_command: optionalText,
  })
  .passthrough();

/**
 * Reads the settings document. A missing file, unparsable YAML, or an empty
 * api_key all raise SettingsInvalidError so the caller can start the setup flow.
 */
export function readSettings(filePath = getSettingsFilePath()): Settings {
  if (!fs.existsSync(filePath)) {
    throw new SettingsInvalidError(`settings file not found: ${filePath}`);
  }

  let document: unknown;
  try {
    document = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SettingsInvalidError(`cannot read settings ${filePath}: ${message}`, { cause: error });
  }

  const parsed = settingsSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new SettingsInvalidError(`settings ${filePath} is not a key-value document`);
  }
  if (!parsed.data.api_key) {
    throw new SettingsInvalidError(`settings ${filePath} has no api_key`);
  }

  return {
    api_key: parsed.data.api_key,
    model: parsed.data.model || skillchatConfig.defaultModel,
    base_url: parsed.data.base_url || skillchatConfig.defaultBaseUrl,
    skills_dir: parsed.data.skills_dir || getDefaultSkillsDirectory(),
    workdir: parsed.data.workdir,
    tool_command: parsed.data.tool_command || undefined,
  };
}

/**
 * Merges the update into whatever document is already on disk, so keys the
 * user added by hand survive. `base_url` is only filled in when absent.
 */
export function saveSettings(update: SettingsUpdate, filePath = getSettingsFilePath()): Settings {
  const existing = readRawDocument(filePath);
  existing.api_key = update.api_key.trim();
  existing.model = update.model.trim();
  existing.skills_dir = (update.skills_dir ?? "").trim();
  existing.workdir = (update.workdir ?? "").trim();
  if (update.base_url?.trim()) {
    existing.base_url = update.base_url.trim();
  } else if (typeof existing.base_url !== "string" || !existing.base_url.trim()) {
    existing.base_url = skillchatConfig.defaultBaseUrl;
  }

  writeFileAtomic(filePath, YAML.stringify(existing));
  return readSettings(filePath);
}

function readRawDocument(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  try {
    const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
    if (isRecord(parsed)) {
      return { ...parsed };
    }
  } catch {
    // an unreadable document is replaced on save
  }
  return {};
}

const promptFileSchema = z.object({
  system_prompt: z.string().min(1),
});

/** The bundled prompt ships in prompts/ next to src/ and dist/. */
export function loadSystemPrompt(promptFile?: string): string {
  if (!promptFile) {
    const bundled = fileURLToPath(new URL("../prompts/system-prompt.md", import.meta.url));
    return fs.readFileSync(bundled, "utf8").trim();
  }

  if (!fs.existsSync(promptFile)) {
    throw new Error(`Prompt file not found: ${promptFile}`);
  }
  const parsed = promptFileSchema.safeParse(YAML.parse(fs.readFileSync(promptFile, "utf8")));
  if (!parsed.success) {
    throw new Error(`Prompt file ${promptFile} needs a non-empty system_prompt key`);
  }
  return parsed.data.system_prompt.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
