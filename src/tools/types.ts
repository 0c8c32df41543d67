import path from "node:path";
import type { Logger } from "pino";
import type { z } from "zod";

export type ToolContext = {
  skillsDir: string;
  /** Relative paths and shell commands resolve against this directory. */
  workdir: string;
  logger: Logger;
};

export type ToolDefinition<Shape extends z.ZodRawShape> = {
  name: string;
  title: string;
  description: string;
  inputShape: Shape;
  run: (input: z.infer<z.ZodObject<Shape>>, context: ToolContext) => Promise<string>;
};

/** A tool with its input type erased, as the registry and server hold it. */
export type RegisteredTool = {
  name: string;
  title: string;
  description: string;
  inputShape: z.ZodRawShape;
  invoke: (rawInput: unknown, context: ToolContext) => Promise<string>;
};

export function resolveToolPath(target: string, context: ToolContext): string {
  return path.resolve(context.workdir, target);
}
