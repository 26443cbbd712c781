import { z } from "zod";
import type {
  ChatMessage,
  ChatStreamEvent,
  ToolCall,
} from "../../core/entities/chat";
import type {
  ChatModelPort,
  ChatRequest,
} from "../../core/ports/outboundPorts";
import { HttpJsonClient } from "../http/httpJsonClient";
import { readLines } from "../http/lineStream";

const streamLineSchema = z.object({
  message: z
    .object({
      content: z.string().nullish(),
      tool_calls: z
        .array(
          z.object({
            function: z.object({
              name: z.string(),
              arguments: z.unknown(),
            }),
          }),
        )
        .nullish(),
    })
    .nullish(),
  done: z.boolean().optional(),
  error: z.string().optional(),
});

const parseArguments = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return {};
  }
};

const toOllamaMessages = (messages: ChatMessage[]) =>
  messages.map((message) => {
    if (message.role === "assistant" && message.toolCalls?.length) {
      return {
        role: "assistant",
        content: message.content,
        tool_calls: message.toolCalls.map((call) => ({
          function: { name: call.name, arguments: parseArguments(call.arguments) },
        })),
      };
    }

    return { role: message.role, content: message.content };
  });

/**
 * Streams chat from a local Ollama server (NDJSON). Ollama sends tool calls
 * whole, with object arguments, so they are re-serialized for the loop.
 */
export class OllamaChatModel implements ChatModelPort {
  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly timeoutMs = 180_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async *streamChat(request: ChatRequest): AsyncGenerator<ChatStreamEvent> {
    const opened = await this.httpClient.openStream({
      url: `${this.baseUrl}/api/chat`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: {
        model: this.model,
        stream: true,
        messages: toOllamaMessages(request.messages),
        ...(request.maxTokens ? { options: { num_predict: request.maxTokens } } : {}),
        ...(request.tools?.length
          ? {
              tools: request.tools.map((tool) => ({
                type: "function",
                function: {
                  name: tool.name,
                  description: tool.description,
                  parameters: tool.parameters,
                },
              })),
            }
          : {}),
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

    const calls: ToolCall[] = [];

    try {
      for await (const line of readLines(body)) {
        if (!line.trim()) {
          continue;
        }

        const parsed = streamLineSchema.safeParse(parseArguments(line));
        if (!parsed.success) {
          continue;
        }

        if (parsed.data.error) {
          yield { type: "error", message: `Ollama error: ${parsed.data.error}` };
          return;
        }

        const content = parsed.data.message?.content;
        if (content) {
          yield { type: "content", text: content };
        }

        for (const call of parsed.data.message?.tool_calls ?? []) {
          calls.push({
            id: `call_${calls.length}`,
            name: call.function.name,
            arguments: JSON.stringify(call.function.arguments ?? {}),
          });
        }

        if (parsed.data.done) {
          break;
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

    if (calls.length > 0) {
      yield { type: "tool_calls", calls };
    }
  }
}
