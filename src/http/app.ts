import { serve, type ServerType } from "@hono/node-server";
import { Hono, type Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { streamSSE } from "hono/streaming";
import { z } from "zod";
import { describeBoundaryError } from "../core/entities/appError";
import type { AssistantEvent, ChatMessage } from "../core/entities/chat";
import {
  filingCategories,
  filingTypes,
  isValidTicker,
  normalizeTicker,
} from "../core/entities/filing";
import type {
  AssistantChatUseCase,
  FilingIndexUseCase,
  FilingSearchUseCase,
} from "../core/ports/inboundPorts";
import {
  logger,
  toErrorDetails,
  type Logger,
} from "../shared/logger/logger";

export type AppDeps = {
  indexService: FilingIndexUseCase;
  searchService: FilingSearchUseCase;
  assistant: AssistantChatUseCase;
};

const tickerSchema = z
  .string()
  .transform(normalizeTicker)
  .refine(isValidTicker, { message: "Invalid ticker symbol." });

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD.");

const searchBodySchema = z.object({
  query: z.string().trim().min(1),
  filingTypes: z.array(z.enum(filingTypes)).optional(),
  categories: z.array(z.enum(filingCategories)).optional(),
  minFilingDate: isoDate.optional(),
  topK: z.number().int().min(1).max(50).optional(),
});

const chatBodySchema = z.object({
  ticker: tickerSchema,
  messages: z
    .array(
      z.object({
        role: z.enum(["user", "assistant"]),
        content: z.string(),
      }),
    )
    .min(1),
});

const toWireEvent = (event: AssistantEvent) => {
  switch (event.type) {
    case "status":
      return { status: event.message };
    case "token":
      return { token: event.text };
    case "error":
      return { error: event.message };
    case "done":
      return { done: true };
  }
};

const parseTicker = (raw: string): string => {
  const parsed = tickerSchema.safeParse(raw);
  if (!parsed.success) {
    throw new HTTPException(400, { message: `Invalid ticker symbol: ${raw}` });
  }
  return parsed.data;
};

const readJson = async (c: Context): Promise<unknown> => {
  try {
    return await c.req.json();
  } catch {
    throw new HTTPException(400, { message: "Request body must be valid JSON." });
  }
};

/**
 * Indexing, search and chat routes over the application use cases.
 */
export const createApp = (
  deps: AppDeps,
  log: Logger = logger.child({ component: "http" }),
) => {
  const app = new Hono();

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return c.json({ error: error.message }, error.status);
    }

    log.error(
      { method: c.req.method, path: c.req.path, error: toErrorDetails(error) },
      "Unhandled request error",
    );
    return c.json({ error: "Internal server error" }, 500);
  });

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.post("/api/filings/:ticker/index", async (c) => {
    const ticker = parseTicker(c.req.param("ticker"));
    const outcome = await deps.indexService.requestIndexing(ticker);

    return c.json(
      {
        message: outcome.accepted
          ? "Indexing started"
          : "Indexing already in progress",
        ...outcome,
      },
      202,
    );
  });

  app.get("/api/filings/:ticker/status", async (c) => {
    const ticker = parseTicker(c.req.param("ticker"));
    return c.json(await deps.indexService.getStatus(ticker));
  });

  app.delete("/api/filings/:ticker/index", async (c) => {
    const ticker = parseTicker(c.req.param("ticker"));
    await deps.indexService.deleteIndex(ticker);
    return c.json({ message: "Index deleted", ticker });
  });

  app.post("/api/filings/:ticker/search", async (c) => {
    const ticker = parseTicker(c.req.param("ticker"));
    const body = searchBodySchema.safeParse(await readJson(c));
    if (!body.success) {
      return c.json({ error: "Invalid request", issues: body.error.issues }, 400);
    }

    const result = await deps.searchService.search({ ticker, ...body.data });
    if (result.isErr()) {
      log.warn({ ticker, error: describeBoundaryError(result.error) }, "Search failed");
      return c.json({ error: describeBoundaryError(result.error) }, 502);
    }

    return c.json({
      ticker,
      query: body.data.query,
      tokensUsed: result.value.tokensUsed,
      candidatesConsidered: result.value.candidatesConsidered,
      hits: result.value.hits.map((hit) => ({
        ...hit.chunk,
        similarity: hit.similarity,
      })),
    });
  });

  app.post("/api/chat", async (c) => {
    const body = chatBodySchema.safeParse(await readJson(c));
    if (!body.success) {
      return c.json({ error: "Invalid request", issues: body.error.issues }, 400);
    }

    const { ticker } = body.data;
    const messages = body.data.messages.map(
      (message): ChatMessage =>
        message.role === "user"
          ? { role: "user", content: message.content }
          : { role: "assistant", content: message.content },
    );

    return streamSSE(c, async (stream) => {
      const controller = new AbortController();
      stream.onAbort(() => {
        controller.abort();
      });

      for await (const event of deps.assistant.streamTurn({
        ticker,
        messages,
        signal: controller.signal,
      })) {
        await stream.writeSSE({ data: JSON.stringify(toWireEvent(event)) });
      }
    }, async (error, stream) => {
      log.error({ ticker, error: toErrorDetails(error) }, "Chat stream failed");
      await stream.writeSSE({
        data: JSON.stringify({ error: "The assistant failed to respond." }),
      });
    });
  });

  return app;
};

export const startServer = (
  deps: AppDeps,
  port: number,
  log: Logger = logger.child({ component: "http" }),
): ServerType => {
  const app = createApp(deps, log);
  return serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, "HTTP server listening");
  });
};
