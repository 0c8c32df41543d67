import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  extractSkillDescription,
  loadSkillsCatalog,
  parseSkillFrontmatter,
  stripFrontmatter,
} from "./loader.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function makeSkillsRoot(): string {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "skillchat-skills-"));
  tempDirs.push(rootDir);
  return rootDir;
}

function writeSkill(rootDir: string, directoryName: string, content: string): void {
  const skillDir = path.join(rootDir, directoryName);
  fs.mkdirSync(skillDir, { recursive: true });
  fs.writeFileSync(path.join(skillDir, "SKILL.md"), content, "utf8");
}

describe("loadSkillsCatalog", () => {
  it("marks a missing directory without reporting errors", () => {
    const missingDir = path.join(os.tmpdir(), `skillchat-missing-${Date.now()}`);
    const catalog = loadSkillsCatalog(missingDir);

    expect(catalog).toEqual({ directory: missingDir, exists: false, skills: [], errors: [] });
  });

  it("reads frontmatter, falls back to the body and sorts by directory name", () => {
    const rootDir = makeSkillsRoot();
    writeSkill(rootDir, "gamma-docs", "---\nname: pdf-forms\ndescription: Fill PDF\n  forms quickly.\n---\n# PDF\n\nBody text.");
    writeSkill(rootDir, "Beta", "# Beta\n\n**Convert** `csv` files to charts.\n");
    fs.mkdirSync(path.join(rootDir, "alpha-empty"));
    fs.writeFileSync(path.join(rootDir, "README.txt"), "not a skill folder", "utf8");

    const catalog = loadSkillsCatalog(rootDir);

    expect(catalog.exists).toBe(true);
    expect(catalog.errors).toEqual([]);
    expect(catalog.skills.map((skill) => skill.name)).toEqual(["Beta", "pdf-forms"]);
    expect(catalog.skills[0]).toEqual({
      name: "Beta",
      nameLower: "beta",
      description: "Convert csv files to charts.",
      sourcePath: path.join(rootDir, "Beta", "SKILL.md"),
    });
    expect(catalog.skills[1]?.description).toBe("Fill PDF forms quickly.");
  });

  it("skips skills whose SKILL.md cannot be read", () => {
    const rootDir = makeSkillsRoot();
    fs.mkdirSync(path.join(rootDir, "broken", "SKILL.md"), { recursive: true });

    const catalog = loadSkillsCatalog(rootDir);

    expect(catalog.skills).toEqual([]);
    expect(catalog.errors).toHaveLength(1);
    expect(catalog.errors[0]).toContain(`failed reading ${path.join(rootDir, "broken", "SKILL.md")}`);
  });

  it("treats a file path as a missing directory", () => {
    const rootDir = makeSkillsRoot();
    const filePath = path.join(rootDir, "skills.txt");
    fs.writeFileSync(filePath, "not a directory", "utf8");

    expect(loadSkillsCatalog(filePath).exists).toBe(false);
  });
});

describe("parseSkillFrontmatter", () => {
  it("reads keys line by line when the block is not valid YAML", () => {
    expect(
      parseSkillFrontmatter("---\nname: pdf-tools\ndescription: Handle PDFs: merge, split and fill forms\n---\nBody"),
    ).toEqual({ name: "pdf-tools", description: "Handle PDFs: merge, split and fill forms" });
    expect(
      parseSkillFrontmatter('---\nname: "csv-kit"\ndescription: Convert: CSV to charts\n  and tables\nversion: 2\n---'),
    ).toEqual({ name: "csv-kit", description: "Convert: CSV to charts and tables" });
  });

  it("returns empty fields when no keys can be found", () => {
    expect(parseSkillFrontmatter("---\njust text\n---\nbody")).toEqual({ name: "", description: "" });
    expect(parseSkillFrontmatter("no frontmatter")).toEqual({ name: "", description: "" });
  });

  it("ignores non-string values", () => {
    expect(parseSkillFrontmatter("---\nname: 42\ndescription: ok\n---")).toEqual({ name: "", description: "ok" });
  });
});

describe("stripFrontmatter", () => {
  it("removes the leading block", () => {
    expect(stripFrontmatter("---\nname: x\n---\n\nBody")).toBe("Body");
  });
});

describe("extractSkillDescription", () => {
  it("returns the first prose paragraph without markdown decorators", () => {
    expect(extractSkillDescription("# Skill\n\n**Build** reliable `tools` quickly.\n\n## Next\n\nOther.")).toBe(
      "Build reliable tools quickly.",
    );
  });

  it("returns an empty string when only headings are present", () => {
    expect(extractSkillDescription("# Title\n\n## Subtitle")).toBe("");
    expect(extractSkillDescription("** **")).toBe("");
  });
});
