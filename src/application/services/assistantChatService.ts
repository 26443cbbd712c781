import type { AssistantEvent, ChatMessage } from "../../core/entities/chat";
import { normalizeTicker } from "../../core/entities/filing";
import type { FilingIndexStatusView } from "../../core/entities/indexStatus";
import type {
  AssistantChatUseCase,
  AssistantTurnRequest,
  FilingIndexUseCase,
} from "../../core/ports/inboundPorts";
import type { ChatModelPort } from "../../core/ports/outboundPorts";
import {
  logger,
  toErrorDetails,
  type Logger,
} from "../../shared/logger/logger";
import { buildSystemPrompt } from "./assistantPrompts";
import type { RetrievalToolLoop } from "./retrievalToolLoop";

export type AssistantChatOptions = {
  maxTokens?: number;
};

/**
 * Chooses between tool-assisted and plain streaming per turn, depending on
 * whether the ticker has a ready filing index.
 */
export class AssistantChatService implements AssistantChatUseCase {
  constructor(
    private readonly chatModel: ChatModelPort,
    private readonly index: Pick<FilingIndexUseCase, "getStatus">,
    private readonly loop: RetrievalToolLoop,
    private readonly options: AssistantChatOptions = {},
    private readonly log: Logger = logger.child({ component: "assistant-chat" }),
  ) {}

  async *streamTurn(
    request: AssistantTurnRequest,
  ): AsyncGenerator<AssistantEvent, void> {
    const ticker = normalizeTicker(request.ticker);
    const status = await this.loadStatus(ticker);
    const messages: ChatMessage[] = [
      { role: "system", content: buildSystemPrompt(ticker, status) },
      ...request.messages,
    ];

    if (status?.status === "ready") {
      yield* this.loop.run({ ticker, messages, signal: request.signal });
      return;
    }

    for await (const event of this.chatModel.streamChat({
      messages,
      maxTokens: this.options.maxTokens,
      signal: request.signal,
    })) {
      if (event.type === "content") {
        yield { type: "token", text: event.text };
      } else if (event.type === "error") {
        yield { type: "error", message: event.message };
        return;
      }
    }

    if (!request.signal?.aborted) {
      yield { type: "done" };
    }
  }

  /**
   * Status lookup failures downgrade the turn to plain chat instead of failing it.
   */
  private async loadStatus(
    ticker: string,
  ): Promise<FilingIndexStatusView | undefined> {
    try {
      return await this.index.getStatus(ticker);
    } catch (error) {
      this.log.warn(
        { ticker, error: toErrorDetails(error) },
        "Could not read filing index status, answering without filing search",
      );
      return undefined;
    }
  }
}
