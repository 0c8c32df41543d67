import OpenAI from "openai";
import type { Logger } from "pino";
import type {
  AssistantMessage,
  ChatMessage,
  FunctionDeclaration,
  ModelReply,
  ToolCallRequest,
} from "./chat-types.js";
import { skillchatConfig } from "./config.js";
import { describeError } from "./errors.js";

export type CompletionRequest = {
  model: string;
  messages: ChatMessage[];
  tools: FunctionDeclaration[];
  signal?: AbortSignal;
};

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<ModelReply>;
}

export type OpenRouterModelCandidate = {
  id: string;
  label: string;
  description: string;
};

const OPENROUTER_X_TITLE = "skillchat";
const MAX_429_RETRY_ATTEMPTS = 8;
const RETRY_BASE_DELAY_MS = 1_250;
const RETRY_MAX_DELAY_MS = 20_000;
const MODELS_FETCH_TIMEOUT_MS = 10_000;

export class OpenRouterCompletionClient implements CompletionClient {
  private readonly client: OpenAI;
  private readonly logger: Logger;

  constructor(params: {
    apiKey: string;
    baseUrl: string;
    logger: Logger;
  }) {
    const apiKey = params.apiKey.trim();
    if (!apiKey) {
      throw new Error("Missing API key. Run /settings to add one.");
    }
    this.client = new OpenAI({
      apiKey,
      baseURL: params.baseUrl,
      defaultHeaders: {
        "X-Title": OPENROUTER_X_TITLE,
      },
    });
    this.logger = params.logger.child({ component: "completion" });
  }

  async complete(request: CompletionRequest): Promise<ModelReply> {
    let attempt = 0;
    while (true) {
      assertNotAborted(request.signal);
      attempt += 1;
      try {
        const startedAt = Date.now();
        const response = await this.client.chat.completions.create(
          {
            model: request.model,
            messages: request.messages,
            tools: request.tools.length > 0 ? request.tools : undefined,
          },
          request.signal ? { signal: request.signal } : undefined,
        );
        const message = response.choices[0]?.message;
        if (!message) {
          throw new Error("completion response contained no choices");
        }
        const reply = toModelReply(message, response.usage?.total_tokens ?? 0);
        this.logger.debug(
          {
            model: request.model,
            kind: reply.kind,
            toolCalls: reply.kind === "tool_request" ? reply.calls.length : 0,
            durationMs: Date.now() - startedAt,
          },
          "completion received",
        );
        return reply;
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        if (!isRetryable429Error(error) || attempt >= MAX_429_RETRY_ATTEMPTS) {
          throw error;
        }

        const delayMs = computeRetryDelayMs(attempt);
        this.logger.warn({ attempt, delayMs, error: describeError(error) }, "rate limited, retrying");
        await sleep(delayMs, request.signal);
      }
    }
  }
}

type RawCompletionMessage = {
  content?: string | null;
  tool_calls?: ReadonlyArray<{
    id: string;
    type: string;
    function?: { name: string; arguments: string };
  }> | null;
};

/** Absent or empty `tool_calls` both mean the model is done. */
export function toModelReply(message: RawCompletionMessage, totalTokens = 0): ModelReply {
  const calls: ToolCallRequest[] = [];
  for (const call of message.tool_calls ?? []) {
    if (call.type !== "function" || !call.function) {
      continue;
    }
    calls.push({
      id: call.id,
      type: "function",
      function: {
        name: call.function.name,
        arguments: call.function.arguments,
      },
    });
  }

  const content = typeof message.content === "string" ? message.content : null;
  const usage = { totalTokens };

  if (calls.length === 0) {
    const assistant: AssistantMessage = { role: "assistant", content: content ?? "" };
    return { kind: "final", message: assistant, text: content ?? "", usage };
  }

  const assistant: AssistantMessage = { role: "assistant", content: content ?? "", tool_calls: calls };
  return { kind: "tool_request", message: assistant, calls, usage };
}

export async function listOpenRouterModels(params: {
  baseUrl?: string;
  apiKey?: string;
}): Promise<OpenRouterModelCandidate[]> {
  const baseUrl = (params.baseUrl?.trim() || skillchatConfig.defaultBaseUrl).replace(/\/+$/, "");
  const headers: Record<string, string> = {
    Accept: "application/json",
    "X-Title": OPENROUTER_X_TITLE,
  };
  if (params.apiKey?.trim()) {
    headers.Authorization = `Bearer ${params.apiKey.trim()}`;
  }

  try {
    const response = await fetch(`${baseUrl}/models`, {
      method: "GET",
      headers,
      signal: AbortSignal.timeout(MODELS_FETCH_TIMEOUT_MS),
    });
    if (!response.ok) {
      return [];
    }
    const payload: unknown = await response.json();
    return parseOpenRouterModels(payload);
  } catch {
    return [];
  }
}

export function parseOpenRouterModels(payload: unknown): OpenRouterModelCandidate[] {
  const data = isRecord(payload) ? payload.data : undefined;
  if (!Array.isArray(data)) {
    return [];
  }

  const models: OpenRouterModelCandidate[] = [];
  for (const rawItem of data) {
    const item = isRecord(rawItem) ? rawItem : {};
    const id = readTrimmedString(item.id);
    if (!id) {
      continue;
    }
    const label = readTrimmedString(item.name) || id;
    const pricing = isRecord(item.pricing) ? item.pricing : {};
    const promptPrice = readNumber(pricing.prompt) * 1_000_000;
    const completionPrice = readNumber(pricing.completion) * 1_000_000;
    const contextLength = Math.max(0, Math.floor(readNumber(item.context_length)));

    const priceText =
      promptPrice === 0 && completionPrice === 0
        ? "free"
        : `$${promptPrice.toFixed(2)}/M in · $${completionPrice.toFixed(2)}/M out`;
    models.push({
      id,
      label,
      description: `${priceText} · ${formatContextLength(contextLength)} ctx`,
    });
  }
  return models;
}

export function formatContextLength(tokens: number): string {
  if (tokens >= 1_000_000) {
    return `${Math.floor(tokens / 1_000_000)}M`;
  }
  return `${Math.floor(tokens / 1000)}K`;
}

function readNumber(value: unknown): number {
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number(value) : 0;
  return Number.isFinite(parsed) ? parsed : 0;
}

function readTrimmedString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRetryable429Error(error: unknown): boolean {
  if (error instanceof OpenAI.APIError && error.status === 429) {
    return true;
  }
  const text = describeError(error).toLowerCase();
  return text.includes("too many requests") || text.includes("rate limit");
}

function computeRetryDelayMs(attempt: number): number {
  const exponential = RETRY_BASE_DELAY_MS * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(RETRY_MAX_DELAY_MS, exponential);
  const jitter = Math.floor(Math.random() * 500);
  return Math.max(250, Math.floor(capped + jitter));
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  assertNotAborted(signal);
  return new Promise((resolve, reject) => {
    const handle = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(handle);
      cleanup();
      reject(createAbortError());
    };
    const cleanup = () => {
      signal?.removeEventListener("abort", onAbort);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function assertNotAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw createAbortError();
  }
}

function createAbortError(): Error {
  const error = new Error("Request interrupted.");
  error.name = "AbortError";
  return error;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}
