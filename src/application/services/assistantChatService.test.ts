import { ok } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { FilingIndexStatusView } from "../../core/entities/indexStatus";
import type { FilingIndexUseCase } from "../../core/ports/inboundPorts";
import { collect, ScriptedChatModel } from "../../__tests__/support/fakes";
import { AssistantChatService } from "./assistantChatService";
import { buildSystemPrompt, SEARCH_FILINGS_TOOL_NAME } from "./assistantPrompts";
import { RetrievalToolLoop } from "./retrievalToolLoop";

const readyStatus: FilingIndexStatusView = {
  ticker: "ACME",
  status: "ready",
  filingsIndexed: 3,
  chunksTotal: 40,
  lastFilingDate: "2025-11-04",
};

const statusSource = (
  status: FilingIndexStatusView | Error,
): Pick<FilingIndexUseCase, "getStatus"> => ({
  getStatus: async () => {
    if (status instanceof Error) {
      throw status;
    }
    return status;
  },
});

const createService = (
  model: ScriptedChatModel,
  status: FilingIndexStatusView | Error,
) =>
  new AssistantChatService(
    model,
    statusSource(status),
    new RetrievalToolLoop(model, {
      search: async () => ok({ hits: [], tokensUsed: 0, candidatesConsidered: 0 }),
    }),
    { maxTokens: 256 },
  );

describe("AssistantChatService", () => {
  it("streams a plain answer when the ticker has no ready index", async () => {
    const model = new ScriptedChatModel([
      [
        { type: "content", text: "Hello" },
        { type: "content", text: " there" },
      ],
    ]);
    const service = createService(model, {
      ticker: "ACME",
      status: "pending",
      filingsIndexed: 0,
      chunksTotal: 0,
    });

    const events = await collect(
      service.streamTurn({
        ticker: "acme",
        messages: [{ role: "user", content: "Hi" }],
      }),
    );

    expect(events).toEqual([
      { type: "token", text: "Hello" },
      { type: "token", text: " there" },
      { type: "done" },
    ]);
    expect(model.requests[0]?.tools).toBeUndefined();
    expect(model.requests[0]?.maxTokens).toBe(256);
    expect(model.requests[0]?.messages).toEqual([
      { role: "system", content: buildSystemPrompt("ACME") },
      { role: "user", content: "Hi" },
    ]);
  });

  it("offers filing search when the index is ready", async () => {
    const model = new ScriptedChatModel([[{ type: "content", text: "Answer" }]]);
    const service = createService(model, readyStatus);

    const events = await collect(
      service.streamTurn({
        ticker: "ACME",
        messages: [{ role: "user", content: "Risks?" }],
      }),
    );

    expect(events).toEqual([{ type: "token", text: "Answer" }, { type: "done" }]);
    expect(model.requests[0]?.tools?.map((tool) => tool.name)).toEqual([
      SEARCH_FILINGS_TOOL_NAME,
    ]);
    expect(model.requests[0]?.messages[0]?.content).toContain(
      "Indexed filings: 3 filings indexed, 40 searchable chunks, most recent filing: 2025-11-04",
    );
  });

  it("falls back to plain chat when the status cannot be read", async () => {
    const model = new ScriptedChatModel([[{ type: "content", text: "Plain" }]]);
    const service = createService(model, new Error("database unavailable"));

    const events = await collect(
      service.streamTurn({ ticker: "ACME", messages: [{ role: "user", content: "Hi" }] }),
    );

    expect(events).toEqual([{ type: "token", text: "Plain" }, { type: "done" }]);
    expect(model.requests[0]?.tools).toBeUndefined();
  });

  it("ends the turn on a model error", async () => {
    const model = new ScriptedChatModel([
      [{ type: "error", message: "Chat model request failed: HTTP request timed out." }],
    ]);
    const service = createService(model, new Error("database unavailable"));

    const events = await collect(
      service.streamTurn({ ticker: "ACME", messages: [{ role: "user", content: "Hi" }] }),
    );

    expect(events).toEqual([
      { type: "error", message: "Chat model request failed: HTTP request timed out." },
    ]);
  });
});
