import { describe, expect, it, vi } from "vitest";
import { collect } from "../../__tests__/support/fakes";
import { readLines } from "./lineStream";

const streamOf = (parts: Array<string | Uint8Array>) => {
  const encoder = new TextEncoder();
  return new Response(
    new ReadableStream<Uint8Array>({
      start(controller) {
        for (const part of parts) {
          controller.enqueue(typeof part === "string" ? encoder.encode(part) : part);
        }
        controller.close();
      },
    }),
  ).body;
};

describe("readLines", () => {
  it("joins lines split across chunks and strips carriage returns", async () => {
    const body = streamOf(["data: one\r\nda", "ta: two\n\n", "tail"]);
    if (!body) {
      throw new Error("expected a body");
    }

    expect(await collect(readLines(body))).toEqual([
      "data: one",
      "data: two",
      "",
      "tail",
    ]);
  });

  it("decodes multi-byte characters split between chunks", async () => {
    const euro = new TextEncoder().encode("€5\n");
    const body = streamOf([euro.slice(0, 2), euro.slice(2)]);
    if (!body) {
      throw new Error("expected a body");
    }

    expect(await collect(readLines(body))).toEqual(["€5"]);
  });

  it("cancels the rest of the body when the consumer stops early", async () => {
    const cancel = vi.fn();
    const body = new Response(
      new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode("data: one\ndata: [DONE]\n"));
        },
        cancel,
      }),
    ).body;
    if (!body) {
      throw new Error("expected a body");
    }

    const lines: string[] = [];
    for await (const line of readLines(body)) {
      lines.push(line);
      if (line === "data: [DONE]") {
        break;
      }
    }

    expect(lines).toEqual(["data: one", "data: [DONE]"]);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("leaves a fully read body alone", async () => {
    const cancel = vi.fn();
    const body = new Response(
      new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode("only\n"));
          controller.close();
        },
        cancel,
      }),
    ).body;
    if (!body) {
      throw new Error("expected a body");
    }

    expect(await collect(readLines(body))).toEqual(["only"]);
    expect(cancel).not.toHaveBeenCalled();
  });
});
