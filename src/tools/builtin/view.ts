import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { describeError } from "../../errors.js";
import { defineTool } from "../registry.js";
import { resolveToolPath } from "../types.js";

const IMAGE_EXTENSIONS = new Set([".jpg", ".jpeg", ".png", ".gif", ".webp"]);
const MAX_TREE_DEPTH = 2;
const HIDDEN_DIRECTORY_NAMES = new Set(["node_modules"]);

export const viewTool = defineTool({
  name: "view",
  title: "View File or Directory",
  description: [
    "Read a file's contents with line numbers, or list a directory's structure up to 2 levels deep.",
    "Use it to read SKILL.md files returned by list_skills and to explore skill directories.",
    "Image files (.jpg, .png, .gif, .webp) are reported by size.",
  ].join(" "),
  inputShape: {
    path: z.string().describe("Absolute path to a file or directory."),
    view_range: z
      .array(z.number().int())
      .nullish()
      .describe("Optional [start_line, end_line] range (1-indexed). Use [start, -1] to read to the end of the file."),
  },
  run: async (input, context) => {
    const target = resolveToolPath(input.path, context);

    let stats: fs.Stats;
    try {
      stats = fs.statSync(target);
    } catch {
      return `view ERR: not found: ${target}`;
    }

    if (stats.isDirectory()) {
      return renderDirectoryTree(target);
    }

    if (IMAGE_EXTENSIONS.has(path.extname(target).toLowerCase())) {
      return `[Image file: ${target} (${stats.size} bytes)]`;
    }

    let content: string;
    try {
      content = fs.readFileSync(target, "utf8");
    } catch (error) {
      return `view ERR: cannot read ${target}: ${describeError(error)}`;
    }

    return numberLines(content, input.view_range ?? undefined);
  },
});

/**
 * `range` is 1-indexed and inclusive; an end of -1 means the last line. Line
 * numbers are right-aligned to six columns and separated by a tab.
 */
export function numberLines(content: string, range?: number[]): string {
  let lines = splitLines(content);
  let offset = 1;

  if (range && range.length === 2) {
    const start = Math.max(1, range[0] ?? 1);
    const requestedEnd = range[1] ?? -1;
    const end = Math.min(requestedEnd === -1 ? lines.length : requestedEnd, lines.length);
    lines = lines.slice(start - 1, Math.max(start - 1, end));
    offset = start;
  }

  return lines.map((line, index) => `${String(offset + index).padStart(6)}\t${line}`).join("\n");
}

/** Directories first, then files, each case-insensitively; hidden entries are skipped. */
export function renderDirectoryTree(root: string): string {
  return [`${root}/`, ...renderTreeLevel(root, 0, "")].join("\n");
}

function renderTreeLevel(directory: string, depth: number, prefix: string): string[] {
  let entries: Array<{ name: string; isDirectory: boolean }>;
  try {
    entries = fs
      .readdirSync(directory, { withFileTypes: true })
      .filter((entry) => !entry.name.startsWith(".") && !HIDDEN_DIRECTORY_NAMES.has(entry.name))
      .map((entry) => ({ name: entry.name, isDirectory: isDirectoryEntry(directory, entry) }))
      .sort((left, right) => {
        if (left.isDirectory !== right.isDirectory) {
          return left.isDirectory ? -1 : 1;
        }
        const a = left.name.toLowerCase();
        const b = right.name.toLowerCase();
        return a < b ? -1 : a > b ? 1 : 0;
      });
  } catch {
    return [`${prefix}[permission denied]`];
  }

  const lines: string[] = [];
  entries.forEach((entry, index) => {
    const isLast = index === entries.length - 1;
    lines.push(`${prefix}${isLast ? "└── " : "├── "}${entry.name}${entry.isDirectory ? "/" : ""}`);
    if (entry.isDirectory && depth < MAX_TREE_DEPTH) {
      lines.push(...renderTreeLevel(path.join(directory, entry.name), depth + 1, `${prefix}${isLast ? "    " : "│   "}`));
    }
  });
  return lines;
}

function splitLines(content: string): string[] {
  const lines = content.split(/\r\n|\r|\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
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
