export type ChatRole = "system" | "user" | "assistant" | "tool";

export type ToolCall = {
  id: string;
  name: string;
  /** Raw JSON argument string as streamed by the model. */
  arguments: string;
};

export type ChatMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string; toolCalls?: ToolCall[] }
  | { role: "tool"; content: string; toolCallId: string };

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

/**
 * Increments produced by a streaming chat model adapter.
 */
export type ChatStreamEvent =
  | { type: "content"; text: string }
  | { type: "tool_calls"; calls: ToolCall[] }
  | { type: "error"; message: string };

/**
 * Events surfaced to the client for one conversational turn.
 */
export type AssistantEvent =
  | { type: "status"; message: string }
  | { type: "token"; text: string }
  | { type: "error"; message: string }
  | { type: "done" };
