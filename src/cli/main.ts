import { Command } from "commander";
import {
  createRuntime,
  type Runtime,
} from "../application/bootstrap/runtimeFactory";
import {
  filingCategories,
  isFilingCategory,
  isFilingType,
  filingTypes,
} from "../core/entities/filing";
import type { ChatMessage } from "../core/entities/chat";
import { describeBoundaryError } from "../core/entities/appError";
import { startServer } from "../http/app";
import { env } from "../shared/config/env";
import { logger, toErrorDetails } from "../shared/logger/logger";

const printJson = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};

/**
 * Runs one command against a fresh runtime and always releases its connections.
 */
const withRuntime = async (
  action: (runtime: Runtime) => Promise<void>,
): Promise<void> => {
  const runtime = await createRuntime();
  try {
    await action(runtime);
  } finally {
    await runtime.close();
  }
};

const waitForShutdown = (runtime: Runtime, onStop?: () => void): void => {
  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    onStop?.();
    runtime
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error: toErrorDetails(error) }, "Shutdown failed");
        process.exit(1);
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
};

export const buildCli = () => {
  const cli = new Command();
  cli
    .name("filing-index")
    .description("Index SEC filings and answer questions over them");

  cli
    .command("serve")
    .description("Start the HTTP API with an in-process index worker")
    .option("--port <port>", "HTTP port", String(env.HTTP_PORT))
    .action(async (opts: { port: string }) => {
      const runtime = await createRuntime();
      runtime.startWorker();
      const server = startServer(runtime, Number(opts.port));
      waitForShutdown(runtime, () => server.close());
    });

  cli
    .command("worker")
    .description("Consume indexing jobs from the queue")
    .action(async () => {
      const runtime = await createRuntime();
      runtime.startWorker();
      logger.info(
        { scheduler: env.INDEX_SCHEDULER, documentSource: env.DOCUMENT_SOURCE },
        "Index worker online",
      );
      waitForShutdown(runtime);
    });

  cli
    .command("index")
    .description("Request (re)indexing of a ticker's filings")
    .argument("<ticker>", "Ticker symbol")
    .action(async (ticker: string) => {
      await withRuntime(async (runtime) => {
        const outcome = await runtime.indexService.requestIndexing(ticker);
        await runtime.drain();
        printJson({
          ...outcome,
          status: await runtime.indexService.getStatus(ticker),
        });
      });
    });

  cli
    .command("status")
    .description("Show a ticker's index status")
    .argument("<ticker>", "Ticker symbol")
    .action(async (ticker: string) => {
      await withRuntime(async (runtime) => {
        printJson(await runtime.indexService.getStatus(ticker));
      });
    });

  cli
    .command("delete")
    .description("Delete a ticker's chunks and status")
    .argument("<ticker>", "Ticker symbol")
    .action(async (ticker: string) => {
      await withRuntime(async (runtime) => {
        await runtime.indexService.deleteIndex(ticker);
        logger.info({ ticker }, "Index deleted");
      });
    });

  cli
    .command("search")
    .description("Run a budgeted similarity search over a ticker's filings")
    .argument("<ticker>", "Ticker symbol")
    .argument("<query>", "Search text")
    .option("--type <types...>", `Filing types (${filingTypes.join(", ")})`)
    .option(
      "--category <categories...>",
      `Categories (${filingCategories.join(", ")})`,
    )
    .option("--since <date>", "Minimum filing date (YYYY-MM-DD)")
    .option("--top-k <n>", "Maximum results")
    .action(
      async (
        ticker: string,
        query: string,
        opts: { type?: string[]; category?: string[]; since?: string; topK?: string },
      ) => {
        await withRuntime(async (runtime) => {
          const result = await runtime.searchService.search({
            ticker,
            query,
            filingTypes: opts.type?.filter(isFilingType),
            categories: opts.category?.filter(isFilingCategory),
            minFilingDate: opts.since,
            topK: opts.topK ? Number(opts.topK) : undefined,
          });

          if (result.isErr()) {
            throw new Error(describeBoundaryError(result.error));
          }

          for (const { chunk, similarity } of result.value.hits) {
            console.log(
              `[${similarity.toFixed(3)}] ${chunk.filingType} ${chunk.filingDate} | ${chunk.sectionName}${chunk.isTable ? " [Table]" : ""}`,
            );
            console.log(chunk.text);
            console.log("");
          }
          logger.info(
            {
              ticker,
              hits: result.value.hits.length,
              tokensUsed: result.value.tokensUsed,
            },
            "Search complete",
          );
        });
      },
    );

  cli
    .command("ask")
    .description("Ask the filing assistant one question")
    .argument("<ticker>", "Ticker symbol")
    .argument("<question>", "Question")
    .action(async (ticker: string, question: string) => {
      await withRuntime(async (runtime) => {
        const messages: ChatMessage[] = [{ role: "user", content: question }];

        for await (const event of runtime.assistant.streamTurn({
          ticker,
          messages,
        })) {
          if (event.type === "token") {
            process.stdout.write(event.text);
          } else if (event.type === "status") {
            process.stderr.write(`\n[${event.message}]\n`);
          } else if (event.type === "error") {
            process.stderr.write(`\nError: ${event.message}\n`);
          } else {
            process.stdout.write("\n");
          }
        }
      });
    });

  return cli;
};

export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
