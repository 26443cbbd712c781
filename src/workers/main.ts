import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { env } from "../shared/config/env";
import { logger, toErrorDetails } from "../shared/logger/logger";

const run = async (): Promise<void> => {
  const runtime = await createRuntime();

  logger.info(
    {
      scheduler: env.INDEX_SCHEDULER,
      vectorStore: env.VECTOR_STORE,
      documentSource: env.DOCUMENT_SOURCE,
      llmProvider: env.LLM_PROVIDER,
      concurrency: env.QUEUE_CONCURRENCY_INDEX,
      redisUrl: env.REDIS_URL,
      postgresUrl: env.POSTGRES_URL,
    },
    "Worker runtime configuration",
  );

  runtime.startWorker();
  logger.info("Index worker online");

  const shutdown = () => {
    runtime
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
