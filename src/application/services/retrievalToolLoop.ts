import { z } from "zod";
import { describeBoundaryError } from "../../core/entities/appError";
import type {
  AssistantEvent,
  ChatMessage,
  ToolCall,
  ToolDefinition,
} from "../../core/entities/chat";
import {
  isFilingCategory,
  isFilingType,
  type FilingCategory,
  type FilingType,
} from "../../core/entities/filing";
import type { FilingSearchUseCase } from "../../core/ports/inboundPorts";
import type { ChatModelPort } from "../../core/ports/outboundPorts";
import {
  logger,
  toErrorDetails,
  type Logger,
} from "../../shared/logger/logger";
import {
  formatSearchResults,
  SEARCH_FILINGS_TOOL_NAME,
  searchFilingsTool,
} from "./assistantPrompts";

export type RetrievalLoopOptions = {
  maxRounds: number;
  /** Retrieved-context budget shared by every search in one turn. */
  maxContextTokens: number;
  maxTokens?: number;
};

export const defaultRetrievalLoopOptions: RetrievalLoopOptions = {
  maxRounds: 3,
  maxContextTokens: 8000,
};

export type RetrievalTurn = {
  ticker: string;
  /** Full conversation including the system prompt. */
  messages: ChatMessage[];
  signal?: AbortSignal;
};

export type SearchArguments = {
  query: string;
  filingTypes: FilingType[];
  categories: FilingCategory[];
};

const searchArgumentsSchema = z.object({
  query: z.string().default(""),
  filing_types: z.array(z.string()).optional(),
  categories: z.array(z.string()).optional(),
});

/**
 * Reads model-produced tool arguments. Malformed JSON yields an empty query
 * and values outside the closed vocabularies are dropped.
 */
export const parseSearchArguments = (raw: string): SearchArguments => {
  let parsed: unknown = {};
  try {
    parsed = raw.trim() ? JSON.parse(raw) : {};
  } catch {
    parsed = {};
  }

  const result = searchArgumentsSchema.safeParse(parsed);
  if (!result.success) {
    return { query: "", filingTypes: [], categories: [] };
  }

  return {
    query: result.data.query.trim(),
    filingTypes: (result.data.filing_types ?? []).filter(isFilingType),
    categories: (result.data.categories ?? []).filter(isFilingCategory),
  };
};

type ModelTurn = {
  content: string;
  toolCalls: ToolCall[];
  failed: boolean;
};

type ToolOutcome = {
  content: string;
  tokensUsed: number;
};

/**
 * Bounded tool-use loop for one conversational turn. The model may search at
 * most `maxRounds` times; after that it is asked to answer without tools.
 * Search failures are reported to the model as text, never to the client.
 */
export class RetrievalToolLoop {
  constructor(
    private readonly chatModel: ChatModelPort,
    private readonly search: FilingSearchUseCase,
    private readonly options: RetrievalLoopOptions = defaultRetrievalLoopOptions,
    private readonly log: Logger = logger.child({ component: "retrieval-loop" }),
  ) {}

  async *run(turn: RetrievalTurn): AsyncGenerator<AssistantEvent, void> {
    const conversation = [...turn.messages];
    const tools: ToolDefinition[] = [searchFilingsTool];
    let remainingBudget = this.options.maxContextTokens;

    for (let round = 1; round <= this.options.maxRounds; round += 1) {
      if (turn.signal?.aborted) {
        this.log.info({ ticker: turn.ticker, round }, "Turn cancelled");
        return;
      }

      const reply = yield* this.streamModel(conversation, tools, turn.signal);
      if (reply.failed) {
        return;
      }

      if (reply.toolCalls.length === 0) {
        yield { type: "done" };
        return;
      }

      conversation.push({
        role: "assistant",
        content: reply.content,
        toolCalls: reply.toolCalls,
      });

      for (const call of reply.toolCalls) {
        if (turn.signal?.aborted) {
          this.log.info({ ticker: turn.ticker, round }, "Turn cancelled");
          return;
        }

        const args = parseSearchArguments(call.arguments);
        yield {
          type: "status",
          message: `Searching filings: ${args.query || call.name}...`,
        };

        const outcome = await this.executeCall(
          turn.ticker,
          call,
          args,
          remainingBudget,
        );
        remainingBudget -= outcome.tokensUsed;
        conversation.push({
          role: "tool",
          toolCallId: call.id,
          content: outcome.content,
        });
      }

      this.log.debug(
        { ticker: turn.ticker, round, remainingBudget },
        "Tool round complete",
      );
    }

    if (turn.signal?.aborted) {
      return;
    }

    this.log.warn(
      { ticker: turn.ticker, maxRounds: this.options.maxRounds },
      "Tool round limit reached, requesting final answer",
    );

    const final = yield* this.streamModel(conversation, undefined, turn.signal);
    if (!final.failed) {
      yield { type: "done" };
    }
  }

  private async *streamModel(
    messages: ChatMessage[],
    tools: ToolDefinition[] | undefined,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<AssistantEvent, ModelTurn> {
    const parts: string[] = [];
    let toolCalls: ToolCall[] = [];

    for await (const event of this.chatModel.streamChat({
      messages,
      tools,
      maxTokens: this.options.maxTokens,
      signal,
    })) {
      if (event.type === "content") {
        parts.push(event.text);
        yield { type: "token", text: event.text };
      } else if (event.type === "tool_calls") {
        toolCalls = tools ? event.calls : [];
      } else {
        yield { type: "error", message: event.message };
        return { content: parts.join(""), toolCalls: [], failed: true };
      }
    }

    return { content: parts.join(""), toolCalls, failed: false };
  }

  private async executeCall(
    ticker: string,
    call: ToolCall,
    args: SearchArguments,
    remainingBudget: number,
  ): Promise<ToolOutcome> {
    if (call.name !== SEARCH_FILINGS_TOOL_NAME) {
      return { content: `Unknown tool: ${call.name}`, tokensUsed: 0 };
    }

    if (!args.query) {
      return {
        content: `The ${SEARCH_FILINGS_TOOL_NAME} tool requires a non-empty query.`,
        tokensUsed: 0,
      };
    }

    if (remainingBudget <= 0) {
      return {
        content:
          "The filing context budget for this answer is used up. Answer with the excerpts already retrieved.",
        tokensUsed: 0,
      };
    }

    try {
      const result = await this.search.search({
        ticker,
        query: args.query,
        filingTypes: args.filingTypes,
        categories: args.categories,
        tokenBudget: remainingBudget,
      });

      if (result.isErr()) {
        this.log.warn(
          { ticker, query: args.query, error: describeBoundaryError(result.error) },
          "Filing search failed",
        );
        return {
          content: `Filing search is unavailable right now (${result.error.message}). Answer without filing excerpts.`,
          tokensUsed: 0,
        };
      }

      return {
        content: formatSearchResults(result.value.hits),
        tokensUsed: result.value.tokensUsed,
      };
    } catch (error) {
      this.log.error(
        { ticker, query: args.query, error: toErrorDetails(error) },
        "Filing search threw",
      );
      return {
        content: "Filing search is unavailable right now. Answer without filing excerpts.",
        tokensUsed: 0,
      };
    }
  }
}
