import { z } from "zod";
import { loadSkillsCatalog } from "../../skills/loader.js";
import { searchSkills } from "../../skills/search.js";
import type { SkillDefinition } from "../../skills/types.js";
import { defineTool } from "../registry.js";
import type { ToolContext } from "../types.js";

const VIEW_HINT = "To use a skill: call view(path=<skill path>) to read its SKILL.md before starting the task.";

export const listSkillsTool = defineTool({
  name: "list_skills",
  title: "List Skills",
  description: [
    "List all available skills with their name, description, and SKILL.md path.",
    "To use a skill, call view with the skill's path and read its SKILL.md before starting the task.",
  ].join(" "),
  inputShape: {},
  run: async (_input, context) => {
    const catalog = loadSkillsCatalog(context.skillsDir);
    logCatalogErrors(catalog.errors, context);
    if (!catalog.exists) {
      return `list_skills ERR: skills directory not found: ${catalog.directory}`;
    }
    if (catalog.skills.length === 0) {
      return `(no skills found in ${catalog.directory})`;
    }

    return [
      `Found ${catalog.skills.length} skill(s) in ${catalog.directory}:\n`,
      ...catalog.skills.flatMap(formatSkillLines),
      `\n${VIEW_HINT}`,
    ].join("\n");
  },
});

export const searchSkillsTool = defineTool({
  name: "search_skills",
  title: "Search Skills",
  description: "Search the available skills by keyword. Matches skill names first, then descriptions.",
  inputShape: {
    query: z.string().describe("Keywords describing the task, e.g. 'pdf form filling'."),
  },
  run: async (input, context) => {
    const query = input.query.trim();
    if (!query) {
      return "search_skills ERR: empty query";
    }

    const catalog = loadSkillsCatalog(context.skillsDir);
    logCatalogErrors(catalog.errors, context);
    if (!catalog.exists) {
      return `search_skills ERR: skills directory not found: ${catalog.directory}`;
    }

    const matches = searchSkills(query, catalog.skills);
    if (matches.length === 0) {
      return `(no skills matching "${query}" in ${catalog.directory})`;
    }

    return [
      `Found ${matches.length} skill(s) matching "${query}":\n`,
      ...matches.flatMap((match) => formatSkillLines(match.skill)),
      `\n${VIEW_HINT}`,
    ].join("\n");
  },
});

function formatSkillLines(skill: SkillDefinition): string[] {
  const lines = [`- ${skill.name}`];
  if (skill.description) {
    lines.push(`  description: ${skill.description}`);
  }
  lines.push(`  path: ${skill.sourcePath}`);
  return lines;
}

function logCatalogErrors(errors: string[], context: ToolContext): void {
  for (const error of errors) {
    context.logger.warn({ error }, "skill catalog problem");
  }
}
