export type MessageRole = "system" | "user" | "assistant" | "tool";

export type ToolCallRequest = {
  id: string;
  type: "function";
  function: {
    name: string;
    arguments: string;
  };
};

export type SystemMessage = {
  role: "system";
  content: string;
};

export type UserMessage = {
  role: "user";
  content: string;
};

export type AssistantMessage = {
  role: "assistant";
  content: string | null;
  tool_calls?: ToolCallRequest[];
};

export type ToolMessage = {
  role: "tool";
  content: string;
  tool_call_id: string;
};

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type TokenUsage = {
  totalTokens: number;
};

export type ModelReply =
  | {
      kind: "final";
      message: AssistantMessage;
      text: string;
      usage: TokenUsage;
    }
  | {
      kind: "tool_request";
      message: AssistantMessage;
      calls: ToolCallRequest[];
      usage: TokenUsage;
    };

export type FunctionDeclaration = {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
};
