import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { describeError } from "../../errors.js";
import { defineTool } from "../registry.js";
import { resolveToolPath } from "../types.js";

export const fileCreateTool = defineTool({
  name: "file_create",
  title: "Create File",
  description: "Create a file with the given content. Parent directories are created; an existing file is overwritten.",
  inputShape: {
    path: z.string().describe("Path to the file to create."),
    file_text: z.string().describe("Content to write to the file."),
  },
  run: async (input, context) => {
    const target = resolveToolPath(input.path, context);
    try {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, input.file_text, "utf8");
    } catch (error) {
      return `file_create ERR: ${describeError(error)}`;
    }
    return `file_create OK: ${target}`;
  },
});

export const strReplaceTool = defineTool({
  name: "str_replace",
  title: "Replace String in File",
  description: "Replace a string in a file. old_str must appear exactly once so the edit is unambiguous.",
  inputShape: {
    path: z.string().describe("Path to the file to edit."),
    old_str: z.string().describe("String to find and replace (must appear exactly once)."),
    new_str: z.string().default("").describe("Replacement string (empty to delete)."),
  },
  run: async (input, context) => {
    const target = resolveToolPath(input.path, context);

    let stats: fs.Stats;
    try {
      stats = fs.statSync(target);
    } catch {
      return `str_replace ERR: file not found: ${target}`;
    }
    if (!stats.isFile()) {
      return `str_replace ERR: not a file: ${target}`;
    }

    let content: string;
    try {
      content = fs.readFileSync(target, "utf8");
    } catch (error) {
      return `str_replace ERR: ${describeError(error)}`;
    }

    const count = countOccurrences(content, input.old_str);
    if (count === 0) {
      return `str_replace ERR: old_str not found in ${target}`;
    }
    if (count > 1) {
      return `str_replace ERR: old_str appears ${count} times in ${target} (must be unique)`;
    }

    const index = content.indexOf(input.old_str);
    const updated = `${content.slice(0, index)}${input.new_str}${content.slice(index + input.old_str.length)}`;
    try {
      fs.writeFileSync(target, updated, "utf8");
    } catch (error) {
      return `str_replace ERR: ${describeError(error)}`;
    }
    return `str_replace OK: ${target}`;
  },
});

/** Non-overlapping occurrences. An empty needle counts as a match at every position. */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) {
    return haystack.length + 1;
  }
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count += 1;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}
