import { afterEach, describe, expect, it, vi } from "vitest";
import { collect } from "../../__tests__/support/fakes";
import { OllamaChatModel } from "./ollamaChatModel";

const ndjson = (...lines: unknown[]): string =>
  lines.map((line) => JSON.stringify(line)).join("\n");

const stubFetch = (body: string) => {
  const mock = vi.fn(
    async (_input: Parameters<typeof fetch>[0], _init?: Parameters<typeof fetch>[1]) =>
      new Response(body),
  );
  vi.stubGlobal("fetch", mock);
  return mock;
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OllamaChatModel", () => {
  const model = new OllamaChatModel("http://ollama.test:11434", "llama-test");

  it("streams content and serializes whole tool calls", async () => {
    const fetchMock = stubFetch(
      ndjson(
        { message: { content: "Let me " }, done: false },
        { message: { content: "look." }, done: false },
        {
          message: {
            content: "",
            tool_calls: [{ function: { name: "search_filings", arguments: { query: "debt" } } }],
          },
          done: false,
        },
        { message: { content: "" }, done: true },
      ),
    );

    const events = await collect(
      model.streamChat({
        messages: [
          { role: "system", content: "sys" },
          {
            role: "assistant",
            content: "",
            toolCalls: [{ id: "call_0", name: "search_filings", arguments: '{"query":"cash"}' }],
          },
        ],
        maxTokens: 64,
      }),
    );

    expect(events).toEqual([
      { type: "content", text: "Let me " },
      { type: "content", text: "look." },
      {
        type: "tool_calls",
        calls: [{ id: "call_0", name: "search_filings", arguments: '{"query":"debt"}' }],
      },
    ]);

    const url = fetchMock.mock.calls[0]?.[0];
    const init = fetchMock.mock.calls[0]?.[1];
    expect(url).toBe("http://ollama.test:11434/api/chat");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "llama-test",
      stream: true,
      messages: [
        { role: "system", content: "sys" },
        {
          role: "assistant",
          content: "",
          tool_calls: [{ function: { name: "search_filings", arguments: { query: "cash" } } }],
        },
      ],
      options: { num_predict: 64 },
    });
  });

  it("surfaces an error line from the server", async () => {
    stubFetch(ndjson({ message: { content: "par" } }, { error: "model not found" }));

    const events = await collect(model.streamChat({ messages: [{ role: "user", content: "Hi" }] }));

    expect(events).toEqual([
      { type: "content", text: "par" },
      { type: "error", message: "Ollama error: model not found" },
    ]);
  });
});
