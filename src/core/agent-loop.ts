import type { ChatMessage, ToolCallRequest, TokenUsage } from "../chat-types.js";
import { MalformedArgumentsError, describeError } from "../errors.js";
import type { ToolBridge } from "../mcp/tool-bridge.js";
import type { CompletionClient } from "../openrouter.js";

export type AgentTurnEvent =
  | { type: "model.request"; round: number }
  | { type: "tool.started"; callId: string; name: string; arguments: string }
  | { type: "tool.completed"; callId: string; name: string; result: string; ok: boolean }
  | { type: "assistant"; text: string }
  | { type: "usage"; usage: TokenUsage };

export type AgentTurnParams = {
  /** Mutated in place: the user message, assistant messages and tool results are appended. */
  messages: ChatMessage[];
  userText: string;
  completion: CompletionClient;
  tools: ToolBridge;
  model: string;
  onEvent?: (event: AgentTurnEvent) => void;
  signal?: AbortSignal;
};

export type AgentTurnResult = {
  finalText: string;
  rounds: number;
  toolCalls: number;
  totalTokens: number;
};

/**
 * Runs one user turn to completion. The model is called with the full
 * history until it answers without tool calls; every requested call gets
 * exactly one tool message, in the order the model listed them.
 */
export async function runAgentTurn(params: AgentTurnParams): Promise<AgentTurnResult> {
  const { messages, completion, tools, model, onEvent, signal } = params;
  messages.push({ role: "user", content: params.userText });

  const declarations = tools.describeTools();
  let rounds = 0;
  let toolCalls = 0;
  let totalTokens = 0;

  while (true) {
    rounds += 1;
    onEvent?.({ type: "model.request", round: rounds });
    const reply = await completion.complete({
      model,
      messages,
      tools: declarations,
      signal,
    });
    totalTokens += reply.usage.totalTokens;
    onEvent?.({ type: "usage", usage: reply.usage });
    messages.push(reply.message);

    if (reply.kind === "final") {
      if (reply.text) {
        onEvent?.({ type: "assistant", text: reply.text });
      }
      return { finalText: reply.text, rounds, toolCalls, totalTokens };
    }

    for (const call of reply.calls) {
      toolCalls += 1;
      const result = await executeToolCall(call, tools, onEvent);
      messages.push({ role: "tool", tool_call_id: call.id, content: result });
    }
  }
}

async function executeToolCall(
  call: ToolCallRequest,
  tools: ToolBridge,
  onEvent?: (event: AgentTurnEvent) => void,
): Promise<string> {
  const name = call.function.name;
  onEvent?.({ type: "tool.started", callId: call.id, name, arguments: call.function.arguments });

  let result: string;
  let ok = true;
  try {
    const args = parseToolArguments(name, call.function.arguments);
    result = await tools.invoke(name, args);
  } catch (error) {
    ok = false;
    result = `Error calling ${name}: ${describeError(error)}`;
  }

  onEvent?.({ type: "tool.completed", callId: call.id, name, result, ok });
  return result;
}

/** An empty argument string is treated as `{}`. */
export function parseToolArguments(toolName: string, rawArguments: string): Record<string, unknown> {
  if (!rawArguments.trim()) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawArguments);
  } catch (error) {
    throw new MalformedArgumentsError(toolName, rawArguments, describeError(error));
  }

  if (!isRecord(parsed)) {
    throw new MalformedArgumentsError(toolName, rawArguments, "expected a JSON object");
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
