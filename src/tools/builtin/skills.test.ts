import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { makeNoopLogger } from "../../logger.js";
import type { ToolContext } from "../types.js";
import { listSkillsTool, searchSkillsTool } from "./skills.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function makeContext(skillsDir: string): ToolContext {
  return { skillsDir, workdir: skillsDir, logger: makeNoopLogger() };
}

function makeSkillsDir(): string {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "skillchat-skill-tools-"));
  tempDirs.push(rootDir);
  fs.mkdirSync(path.join(rootDir, "pdf-forms"));
  fs.writeFileSync(
    path.join(rootDir, "pdf-forms", "SKILL.md"),
    "---\nname: pdf-forms\ndescription: Fill PDF forms.\n---\n# PDF\n",
    "utf8",
  );
  fs.mkdirSync(path.join(rootDir, "scratch"));
  fs.writeFileSync(path.join(rootDir, "scratch", "SKILL.md"), "# Scratch\n", "utf8");
  return rootDir;
}

const VIEW_HINT = "To use a skill: call view(path=<skill path>) to read its SKILL.md before starting the task.";

describe("listSkillsTool", () => {
  it("lists every skill with its description and path", async () => {
    const rootDir = makeSkillsDir();

    const output = await listSkillsTool.invoke({}, makeContext(rootDir));

    expect(output).toBe(
      [
        `Found 2 skill(s) in ${rootDir}:`,
        "",
        "- pdf-forms",
        "  description: Fill PDF forms.",
        `  path: ${path.join(rootDir, "pdf-forms", "SKILL.md")}`,
        "- scratch",
        `  path: ${path.join(rootDir, "scratch", "SKILL.md")}`,
        "",
        VIEW_HINT,
      ].join("\n"),
    );
  });

  it("reports a missing directory and an empty one", async () => {
    const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "skillchat-skill-tools-empty-"));
    tempDirs.push(rootDir);
    const missing = path.join(rootDir, "absent");

    expect(await listSkillsTool.invoke({}, makeContext(missing))).toBe(
      `list_skills ERR: skills directory not found: ${missing}`,
    );
    expect(await listSkillsTool.invoke({}, makeContext(rootDir))).toBe(`(no skills found in ${rootDir})`);
  });
});

describe("searchSkillsTool", () => {
  it("returns matching skills in the list format", async () => {
    const rootDir = makeSkillsDir();

    const output = await searchSkillsTool.invoke({ query: "pdf" }, makeContext(rootDir));

    expect(output).toBe(
      [
        'Found 1 skill(s) matching "pdf":',
        "",
        "- pdf-forms",
        "  description: Fill PDF forms.",
        `  path: ${path.join(rootDir, "pdf-forms", "SKILL.md")}`,
        "",
        VIEW_HINT,
      ].join("\n"),
    );
  });

  it("rejects blank queries and reports no matches", async () => {
    const rootDir = makeSkillsDir();

    expect(await searchSkillsTool.invoke({ query: "  " }, makeContext(rootDir))).toBe("search_skills ERR: empty query");
    expect(await searchSkillsTool.invoke({ query: "spreadsheet" }, makeContext(rootDir))).toBe(
      `(no skills matching "spreadsheet" in ${rootDir})`,
    );
  });
});
