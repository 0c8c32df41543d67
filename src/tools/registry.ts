import { z } from "zod";
import type { RegisteredTool, ToolDefinition } from "./types.js";

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register(tool: RegisteredTool): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  registerMany(tools: RegisteredTool[]): this {
    for (const tool of tools) {
      this.register(tool);
    }
    return this;
  }

  /** Registration order is kept so tools are advertised the way they were added. */
  list(): RegisteredTool[] {
    return [...this.tools.values()];
  }
}

export function createToolRegistry(): ToolRegistry {
  return new ToolRegistry();
}

/** Validates input against the tool's shape before `run` sees it. */
export function defineTool<Shape extends z.ZodRawShape>(definition: ToolDefinition<Shape>): RegisteredTool {
  const schema = z.object(definition.inputShape);
  return {
    name: definition.name,
    title: definition.title,
    description: definition.description,
    inputShape: definition.inputShape,
    invoke: async (rawInput, context) => {
      const parsed = schema.safeParse(rawInput ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
          .join("; ");
        return `${definition.name} ERR: invalid input: ${issues}`;
      }
      return definition.run(parsed.data, context);
    },
  };
}
