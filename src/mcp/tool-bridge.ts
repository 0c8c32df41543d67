import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { getDefaultEnvironment, StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Logger } from "pino";
import type { FunctionDeclaration } from "../chat-types.js";
import { ConnectionFailureError, ToolInvocationError, describeError } from "../errors.js";

export interface ToolBridge {
  readonly toolNames: string[];
  describeTools(): FunctionDeclaration[];
  invoke(name: string, args: Record<string, unknown>): Promise<string>;
  close(): Promise<void>;
}

export type McpToolInfo = {
  name: string;
  description?: string;
  inputSchema?: Record<string, unknown>;
};

/** The slice of the MCP SDK client the bridge talks to. */
export interface McpToolClient {
  listTools(): Promise<{ tools: McpToolInfo[] }>;
  callTool(params: { name: string; arguments: Record<string, unknown> }): Promise<Record<string, unknown>>;
  close(): Promise<void>;
}

export type ToolServerCommand = {
  command: string;
  args: string[];
  cwd?: string;
};

const EMPTY_OBJECT_SCHEMA: Record<string, unknown> = {
  type: "object",
  properties: {},
};

export class McpToolBridge implements ToolBridge {
  private readonly client: McpToolClient;
  private readonly declarations: FunctionDeclaration[];
  private readonly logger: Logger;
  private closed = false;

  private constructor(client: McpToolClient, declarations: FunctionDeclaration[], logger: Logger) {
    this.client = client;
    this.declarations = declarations;
    this.logger = logger;
  }

  /**
   * Lists tools exactly once; the converted declarations are served from cache
   * for the lifetime of the connection.
   */
  static async fromClient(client: McpToolClient, logger: Logger): Promise<McpToolBridge> {
    let listed: { tools: McpToolInfo[] };
    try {
      listed = await client.listTools();
    } catch (error) {
      await client.close().catch((closeError: unknown) => {
        logger.debug({ error: describeError(closeError) }, "close after failed tool listing");
      });
      throw new ConnectionFailureError(`failed to list tools: ${describeError(error)}`, { cause: error });
    }
    return new McpToolBridge(client, mcpToolsToFunctionDeclarations(listed.tools), logger);
  }

  static async connect(params: {
    server: ToolServerCommand;
    clientName: string;
    clientVersion: string;
    logger: Logger;
  }): Promise<McpToolBridge> {
    const logger = params.logger.child({ component: "tool-bridge" });
    const transport = new StdioClientTransport({
      command: params.server.command,
      args: [...params.server.args],
      cwd: params.server.cwd,
      env: getDefaultEnvironment(),
      stderr: "ignore",
    });
    const client = new Client({ name: params.clientName, version: params.clientVersion });

    logger.info({ command: params.server.command, args: params.server.args }, "connecting to tool server");
    try {
      await client.connect(transport);
    } catch (error) {
      await transport.close().catch((closeError: unknown) => {
        logger.debug({ error: describeError(closeError) }, "close after failed connect");
      });
      throw new ConnectionFailureError(`cannot reach tool server: ${describeError(error)}`, { cause: error });
    }

    const bridge = await McpToolBridge.fromClient(adaptSdkClient(client), logger);
    logger.info({ tools: bridge.toolNames }, "tool server connected");
    return bridge;
  }

  get toolNames(): string[] {
    return this.declarations.map((declaration) => declaration.function.name);
  }

  describeTools(): FunctionDeclaration[] {
    return this.declarations;
  }

  async invoke(name: string, args: Record<string, unknown>): Promise<string> {
    if (this.closed) {
      throw new ConnectionFailureError("tool server connection is closed");
    }

    const startedAt = Date.now();
    let result: Record<string, unknown>;
    try {
      result = await this.client.callTool({ name, arguments: args });
    } catch (error) {
      this.logger.warn({ tool: name, error: describeError(error) }, "tool call failed");
      throw new ToolInvocationError(name, describeError(error), { cause: error });
    }

    const text = collectTextContent(result.content);
    this.logger.debug({ tool: name, durationMs: Date.now() - startedAt, length: text.length }, "tool call completed");
    return text;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.client.close();
  }
}

/** Stands in when the tool server could not be reached. */
export class UnavailableToolBridge implements ToolBridge {
  readonly toolNames: string[] = [];
  private readonly reason: string;

  constructor(reason: string) {
    this.reason = reason;
  }

  describeTools(): FunctionDeclaration[] {
    return [];
  }

  async invoke(): Promise<string> {
    throw new ConnectionFailureError(`tool server not connected: ${this.reason}`);
  }

  async close(): Promise<void> {}
}

export function adaptSdkClient(client: Client): McpToolClient {
  return {
    listTools: async () => {
      const result = await client.listTools();
      return { tools: result.tools };
    },
    callTool: (request) => client.callTool(request),
    close: () => client.close(),
  };
}

export function mcpToolsToFunctionDeclarations(tools: McpToolInfo[]): FunctionDeclaration[] {
  return tools.map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description ?? "",
      parameters: tool.inputSchema ?? EMPTY_OBJECT_SCHEMA,
    },
  }));
}

/** Joins the text of every block that carries one; other blocks are skipped. */
export function collectTextContent(content: unknown): string {
  if (!Array.isArray(content)) {
    return "";
  }
  const parts: string[] = [];
  for (const block of content) {
    if (typeof block === "object" && block !== null && "text" in block && typeof block.text === "string") {
      parts.push(block.text);
    }
  }
  return parts.join("\n");
}
