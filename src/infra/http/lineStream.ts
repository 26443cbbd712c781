import type { ReadableStream } from "node:stream/web";

/**
 * Yields newline-delimited lines from a streamed body, decoding UTF-8 across
 * chunk boundaries. A trailing line without a newline is yielded at the end.
 * A consumer that stops early cancels the rest of the body.
 */
export async function* readLines(
  body: ReadableStream<Uint8Array>,
): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let settled = false;

  try {
    for (;;) {
      let chunk: Awaited<ReturnType<typeof reader.read>>;
      try {
        chunk = await reader.read();
      } catch (error) {
        settled = true;
        throw error;
      }

      const { done, value } = chunk;
      if (done) {
        settled = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      let newline = buffer.indexOf("\n");
      while (newline !== -1) {
        yield buffer.slice(0, newline).replace(/\r$/, "");
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf("\n");
      }
    }

    buffer += decoder.decode();
    if (buffer.length > 0) {
      yield buffer.replace(/\r$/, "");
    }
  } finally {
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
