import { createBashTool } from "./builtin/bash.js";
import { fileCreateTool, strReplaceTool } from "./builtin/files.js";
import { listSkillsTool, searchSkillsTool } from "./builtin/skills.js";
import { viewTool } from "./builtin/view.js";
import { createToolRegistry, type ToolRegistry } from "./registry.js";

export { ToolRegistry, createToolRegistry, defineTool } from "./registry.js";
export type { RegisteredTool, ToolContext } from "./types.js";

export function createBuiltinToolRegistry(options: { bashTimeoutSeconds?: number } = {}): ToolRegistry {
  return createToolRegistry().registerMany([
    listSkillsTool,
    searchSkillsTool,
    viewTool,
    createBashTool({ timeoutSeconds: options.bashTimeoutSeconds }),
    fileCreateTool,
    strReplaceTool,
  ]);
}
