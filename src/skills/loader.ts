import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { SkillCatalog, SkillDefinition } from "./types.js";

const SKILL_FILE_NAME = "SKILL.md";
const FRONTMATTER_PATTERN = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---/;
const NAME_LINE_PATTERN = /^name:[ \t]*(.+)$/m;
const DESCRIPTION_LINES_PATTERN = /^description:[ \t]*(.+(?:\r?\n[ \t]+.+)*)/m;

export type SkillFrontmatter = {
  name: string;
  description: string;
};

/**
 * Each immediate subdirectory holding a SKILL.md is one skill. Skills are
 * sorted by directory name, case-insensitively.
 */
export function loadSkillsCatalog(skillsDirectory: string): SkillCatalog {
  const directory = path.resolve(skillsDirectory);
  const errors: string[] = [];

  let isDirectory = false;
  try {
    isDirectory = fs.statSync(directory).isDirectory();
  } catch {
    isDirectory = false;
  }
  if (!isDirectory) {
    return { directory, exists: false, skills: [], errors };
  }

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(directory, { withFileTypes: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    errors.push(`failed reading skills directory ${directory}: ${message}`);
    return { directory, exists: true, skills: [], errors };
  }

  const skillDirectories = entries
    .filter((entry) => isDirectoryEntry(directory, entry))
    .map((entry) => entry.name)
    .sort((left, right) => compareLower(left, right));

  const skills: SkillDefinition[] = [];
  for (const directoryName of skillDirectories) {
    const directoryPath = path.join(directory, directoryName);
    const sourcePath = path.join(directoryPath, SKILL_FILE_NAME);
    if (!fs.existsSync(sourcePath)) {
      continue;
    }

    let frontmatter: SkillFrontmatter = { name: "", description: "" };
    let body = "";
    try {
      const rawContent = fs.readFileSync(sourcePath, "utf8");
      frontmatter = parseSkillFrontmatter(rawContent);
      body = stripFrontmatter(rawContent);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      errors.push(`failed reading ${sourcePath}: ${message}`);
      continue;
    }

    const name = frontmatter.name || directoryName;
    const description = frontmatter.description || extractSkillDescription(body);
    skills.push({
      name,
      nameLower: name.toLowerCase(),
      description,
      sourcePath,
    });
  }

  return { directory, exists: true, skills, errors };
}

/**
 * Reads `name` and `description` from a leading YAML block; both default to "".
 * Blocks that are not valid YAML, such as an unquoted description holding
 * `: `, are read key by key from their lines instead.
 */
export function parseSkillFrontmatter(content: string): SkillFrontmatter {
  const match = FRONTMATTER_PATTERN.exec(content);
  if (!match) {
    return { name: "", description: "" };
  }
  const block = match[1] ?? "";

  let document: unknown;
  try {
    document = YAML.parse(block);
  } catch {
    return readFrontmatterLines(block);
  }
  if (typeof document !== "object" || document === null || Array.isArray(document)) {
    return readFrontmatterLines(block);
  }

  const name = "name" in document ? document.name : undefined;
  const description = "description" in document ? document.description : undefined;
  return {
    name: typeof name === "string" ? name.trim() : "",
    description: typeof description === "string" ? description.replace(/\s+/g, " ").trim() : "",
  };
}

function readFrontmatterLines(block: string): SkillFrontmatter {
  const nameMatch = NAME_LINE_PATTERN.exec(block);
  const descriptionMatch = DESCRIPTION_LINES_PATTERN.exec(block);
  return {
    name: unquote(nameMatch?.[1] ?? ""),
    description: unquote((descriptionMatch?.[1] ?? "").replace(/\s+/g, " ")),
  };
}

function unquote(value: string): string {
  return value.trim().replace(/^['"]+|['"]+$/g, "");
}

export function stripFrontmatter(content: string): string {
  return content.replace(FRONTMATTER_PATTERN, "").trim();
}

/** First prose paragraph of the body, with headings and markdown markers removed. */
export function extractSkillDescription(content: string): string {
  const normalized = content.replace(/\r\n/g, "\n");
  const paragraphs = normalized
    .split(/\n\s*\n/g)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean);

  for (const paragraph of paragraphs) {
    const cleaned = cleanMarkdownParagraph(paragraph);
    if (cleaned) {
      return cleaned;
    }
  }

  return "";
}

function cleanMarkdownParagraph(paragraph: string): string {
  const lines = paragraph
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .filter((line) => !line.startsWith("#"))
    .filter((line) => !line.startsWith("```"));

  if (lines.length === 0) {
    return "";
  }

  return lines
    .join(" ")
    .replace(/\s+/g, " ")
    .replace(/^[*-]\s+/, "")
    .replace(/\*\*([^*]+)\*\*/g, "$1")
    .replace(/`([^`]+)`/g, "$1")
    .trim();
}

function isDirectoryEntry(parent: string, entry: fs.Dirent): boolean {
  if (entry.isDirectory()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  try {
    return fs.statSync(path.join(parent, entry.name)).isDirectory();
  } catch {
    return false;
  }
}

function compareLower(left: string, right: string): number {
  const a = left.toLowerCase();
  const b = right.toLowerCase();
  return a < b ? -1 : a > b ? 1 : 0;
}
