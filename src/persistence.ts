import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const DATA_DIR_NAME = ".skillchat";

export function getDataDir(): string {
  const override = process.env.SKILLCHAT_HOME?.trim();
  if (override) {
    return path.resolve(expandHomePath(override));
  }
  return path.join(os.homedir(), DATA_DIR_NAME);
}

export function getSessionsDirectory(): string {
  return path.join(getDataDir(), "sessions");
}

export function getSettingsFilePath(): string {
  return path.join(getDataDir(), "settings.yaml");
}

export function getLogFilePath(): string {
  return path.join(getDataDir(), "logs", "skillchat.log");
}

export function getDefaultSkillsDirectory(): string {
  return path.join(getDataDir(), "skills");
}

export function expandHomePath(value: string): string {
  if (value === "~") {
    return os.homedir();
  }
  if (value.startsWith("~/") || value.startsWith("~\\")) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

/**
 * Writes through a sibling `.tmp` file and renames it into place, so a reader
 * sees either the previous document or the new one.
 */
export function writeFileAtomic(filePath: string, payload: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  try {
    fs.writeFileSync(tmpPath, payload, "utf8");
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    try {
      if (fs.existsSync(tmpPath)) {
        fs.unlinkSync(tmpPath);
      }
    } catch {
      // cleanup is best-effort; the write error is rethrown below
    }
    throw error;
  }
}

export function writeJsonFileAtomic(filePath: string, value: unknown): void {
  writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
}
