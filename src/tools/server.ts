import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Logger } from "pino";
import { skillchatConfig } from "../config.js";
import { describeError } from "../errors.js";
import { resolveDirectory } from "../mcp/server-command.js";
import { createBuiltinToolRegistry } from "./index.js";
import type { ToolRegistry } from "./registry.js";
import type { ToolContext } from "./types.js";

export type ToolServerOptions = {
  skillsDir: string;
  workdir?: string;
  logger: Logger;
  registry?: ToolRegistry;
};

export function loadToolServerInstructions(): string {
  const instructionsPath = fileURLToPath(new URL("../../prompts/tool-server-instructions.md", import.meta.url));
  return fs.readFileSync(instructionsPath, "utf8").trim();
}

/** Registers every tool in the registry on a fresh MCP server. */
export function createToolServer(options: ToolServerOptions): McpServer {
  const registry = options.registry ?? createBuiltinToolRegistry();
  const logger = options.logger.child({ component: "tool-server" });
  const context: ToolContext = {
    skillsDir: resolveDirectory(options.skillsDir),
    workdir: options.workdir?.trim() ? resolveDirectory(options.workdir) : process.cwd(),
    logger,
  };

  const server = new McpServer(
    { name: `${skillchatConfig.clientName}-tools`, version: skillchatConfig.clientVersion },
    { instructions: loadToolServerInstructions() },
  );

  for (const tool of registry.list()) {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: tool.inputShape,
      },
      async (args) => {
        const startedAt = Date.now();
        try {
          const text = await tool.invoke(args, context);
          logger.info({ tool: tool.name, durationMs: Date.now() - startedAt }, "tool call handled");
          return { content: [{ type: "text" as const, text }] };
        } catch (error) {
          logger.error({ tool: tool.name, error: describeError(error) }, "tool call failed");
          return {
            content: [{ type: "text" as const, text: `${tool.name} ERR: ${describeError(error)}` }],
            isError: true,
          };
        }
      },
    );
  }

  return server;
}

export async function runToolServer(options: ToolServerOptions): Promise<void> {
  const server = createToolServer(options);
  const transport = new StdioServerTransport();
  options.logger.info({ skillsDir: options.skillsDir, workdir: options.workdir }, "tool server starting on stdio");
  await server.connect(transport);
}
