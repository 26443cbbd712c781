import { z } from "zod";
import type {
  ChatMessage,
  ChatStreamEvent,
  ToolCall,
  ToolDefinition,
} from "../../core/entities/chat";
import type {
  ChatModelPort,
  ChatRequest,
} from "../../core/ports/outboundPorts";
import { HttpJsonClient } from "../http/httpJsonClient";
import { readLines } from "../http/lineStream";

const streamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number().int(),
                  id: z.string().nullish(),
                  function: z
                    .object({
                      name: z.string().nullish(),
                      arguments: z.string().nullish(),
                    })
                    .nullish(),
                }),
              )
              .nullish(),
          })
          .nullish(),
      }),
    )
    .default([]),
});

type PendingToolCall = { id: string; name: string; arguments: string };

export const toOpenAiMessages = (messages: ChatMessage[]) =>
  messages.map((message) => {
    if (message.role === "tool") {
      return {
        role: "tool",
        tool_call_id: message.toolCallId,
        content: message.content,
      };
    }

    if (message.role === "assistant" && message.toolCalls?.length) {
      return {
        role: "assistant",
        content: message.content || null,
        tool_calls: message.toolCalls.map((call) => ({
          id: call.id,
          type: "function",
          function: { name: call.name, arguments: call.arguments },
        })),
      };
    }

    return { role: message.role, content: message.content };
  });

const toOpenAiTools = (tools: ToolDefinition[]) =>
  tools.map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  }));

/**
 * Streams chat completions from an OpenAI-compatible endpoint over SSE and
 * reassembles tool-call fragments, which arrive split across deltas by index.
 */
export class OpenAiChatModel implements ChatModelPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly model: string,
    private readonly timeoutMs = 180_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async *streamChat(request: ChatRequest): AsyncGenerator<ChatStreamEvent> {
    const opened = await this.httpClient.openStream({
      url: `${this.baseUrl}/chat/completions`,
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.apiKey}`,
      },
      body: {
        model: this.model,
        stream: true,
        messages: toOpenAiMessages(request.messages),
        ...(request.maxTokens ? { max_tokens: request.maxTokens } : {}),
        ...(request.tools?.length ? { tools: toOpenAiTools(request.tools) } : {}),
      },
      timeoutMs: this.timeoutMs,
      retries: 1,
      retryDelayMs: 500,
      signal: request.signal,
    });

    if (opened.isErr()) {
      if (opened.error.code !== "aborted") {
        yield { type: "error", message: `Chat model request failed: ${opened.error.message}` };
      }
      return;
    }

    const body = opened.value.body;
    if (!body) {
      yield { type: "error", message: "Chat model returned an empty stream." };
      return;
    }

    const pending = new Map<number, PendingToolCall>();

    try {
      for await (const line of readLines(body)) {
        if (!line.startsWith("data:")) {
          continue;
        }

        const data = line.slice(5).trim();
        if (data === "[DONE]") {
          break;
        }

        const chunk = this.parseChunk(data);
        for (const choice of chunk?.choices ?? []) {
          const content = choice.delta?.content;
          if (content) {
            yield { type: "content", text: content };
          }

          for (const fragment of choice.delta?.tool_calls ?? []) {
            const call = pending.get(fragment.index) ?? {
              id: "",
              name: "",
              arguments: "",
            };
            if (fragment.id) {
              call.id = fragment.id;
            }
            call.name += fragment.function?.name ?? "";
            call.arguments += fragment.function?.arguments ?? "";
            pending.set(fragment.index, call);
          }
        }
      }
    } catch (error) {
      if (request.signal?.aborted) {
        return;
      }
      yield {
        type: "error",
        message: `Chat stream interrupted: ${error instanceof Error ? error.message : String(error)}`,
      };
      return;
    }

    if (pending.size > 0) {
      const calls: ToolCall[] = [...pending.entries()]
        .sort(([left], [right]) => left - right)
        .map(([index, call]) => ({
          ...call,
          id: call.id || `call_${index}`,
        }));
      yield { type: "tool_calls", calls };
    }
  }

  private parseChunk(data: string) {
    try {
      const parsed = streamChunkSchema.safeParse(JSON.parse(data));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }
}
