import type { Worker } from "bullmq";
import { AssistantChatService } from "../services/assistantChatService";
import { FilingChunker } from "../services/chunker";
import { EmbeddingService } from "../services/embeddingService";
import { FilingIndexService } from "../services/filingIndexService";
import { FilingSearchService } from "../services/filingSearchService";
import { IndexingPipelineService } from "../services/indexingPipelineService";
import { ProgressTracker } from "../services/progressTracker";
import { RetrievalToolLoop } from "../services/retrievalToolLoop";
import { SectionParser } from "../services/sectionParser";
import { TiktokenEstimator } from "../services/tokenEstimator";
import { TopicTagger } from "../services/topicTagger";
import { env, filingLimits, type AppEnv } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { createDb } from "../../infra/db/client";
import { InMemoryIndexStatusRepository } from "../../infra/db/inMemoryIndexStatusRepository";
import { InMemoryVectorStore } from "../../infra/db/inMemoryVectorStore";
import {
  PgVectorStore,
  PostgresIndexStatusRepository,
} from "../../infra/db/repositories";
import { OllamaChatModel } from "../../infra/llm/ollamaChatModel";
import { OllamaEmbedding } from "../../infra/llm/ollamaEmbedding";
import { OllamaLlm } from "../../infra/llm/ollamaLlm";
import { OpenAiChatModel } from "../../infra/llm/openAiChatModel";
import { OpenAiEmbedding } from "../../infra/llm/openAiEmbedding";
import { OpenAiLlm } from "../../infra/llm/openAiLlm";
import { MockDocumentSource } from "../../infra/providers/mocks/mockDocumentSource";
import { SecEdgarDocumentSource } from "../../infra/providers/sec/secEdgarDocumentSource";
import {
  BullMqIndexScheduler,
  createIndexWorker,
} from "../../infra/queue/bullMqIndexScheduler";
import { InProcessIndexScheduler } from "../../infra/queue/inProcessIndexScheduler";
import { redisConfigFromUrl } from "../../infra/queue/queues";
import { SystemClock, UuidIdGenerator } from "../../infra/system/systemPorts";
import type {
  ChatModelPort,
  ClockPort,
  DocumentSourcePort,
  EmbeddingPort,
  IndexSchedulerPort,
  IndexStatusRepositoryPort,
  LlmPort,
  VectorStorePort,
} from "../../core/ports/outboundPorts";
import type { IndexingJob } from "../../core/entities/indexStatus";

type ModelAdapters = {
  chatModel: ChatModelPort;
  topicLlm: LlmPort;
  embedder: EmbeddingPort;
};

type Storage = {
  vectorStore: VectorStorePort;
  statusRepo: IndexStatusRepositoryPort;
  close: () => Promise<void>;
};

type Scheduling = {
  scheduler: IndexSchedulerPort;
  /** Starts consuming scheduled jobs in this process. */
  startWorker: () => void;
  /** Waits for in-process jobs; a no-op for the queue-backed scheduler. */
  drain: () => Promise<void>;
  close: () => Promise<void>;
};

const createModels = (appEnv: AppEnv): ModelAdapters => {
  if (appEnv.LLM_PROVIDER === "ollama") {
    return {
      chatModel: new OllamaChatModel(
        appEnv.OLLAMA_BASE_URL,
        appEnv.OLLAMA_CHAT_MODEL,
        appEnv.CHAT_TIMEOUT_MS,
      ),
      topicLlm: new OllamaLlm(
        appEnv.OLLAMA_BASE_URL,
        appEnv.OLLAMA_CHAT_MODEL,
        appEnv.CHAT_TIMEOUT_MS,
      ),
      embedder: new OllamaEmbedding(
        appEnv.OLLAMA_BASE_URL,
        appEnv.OLLAMA_EMBED_MODEL,
        appEnv.EMBEDDING_DIMENSIONS,
        appEnv.EMBED_TIMEOUT_MS,
      ),
    };
  }

  return {
    chatModel: new OpenAiChatModel(
      appEnv.OPENAI_BASE_URL,
      appEnv.OPENAI_API_KEY,
      appEnv.OPENAI_CHAT_MODEL,
      appEnv.CHAT_TIMEOUT_MS,
    ),
    topicLlm: new OpenAiLlm(
      appEnv.OPENAI_BASE_URL,
      appEnv.OPENAI_API_KEY,
      appEnv.OPENAI_TOPIC_MODEL,
      appEnv.CHAT_TIMEOUT_MS,
    ),
    embedder: new OpenAiEmbedding(
      appEnv.OPENAI_BASE_URL,
      appEnv.OPENAI_API_KEY,
      appEnv.OPENAI_EMBED_MODEL,
      appEnv.EMBEDDING_DIMENSIONS,
      appEnv.EMBED_TIMEOUT_MS,
    ),
  };
};

const createDocumentSource = (appEnv: AppEnv): DocumentSourcePort => {
  if (appEnv.DOCUMENT_SOURCE === "sec-edgar") {
    return new SecEdgarDocumentSource(
      appEnv.SEC_EDGAR_BASE_URL,
      appEnv.SEC_EDGAR_ARCHIVES_BASE_URL,
      appEnv.SEC_EDGAR_TICKERS_URL,
      appEnv.SEC_EDGAR_USER_AGENT,
      appEnv.SEC_EDGAR_TIMEOUT_MS,
    );
  }

  return new MockDocumentSource();
};

const createStorage = async (
  appEnv: AppEnv,
  clock: ClockPort,
): Promise<Storage> => {
  if (appEnv.VECTOR_STORE === "memory") {
    return {
      vectorStore: new InMemoryVectorStore(),
      statusRepo: new InMemoryIndexStatusRepository(clock),
      close: async () => {},
    };
  }

  const { db, sql, close } = await createDb(appEnv.POSTGRES_URL);
  return {
    vectorStore: new PgVectorStore(sql),
    statusRepo: new PostgresIndexStatusRepository(db),
    close,
  };
};

const createScheduling = (
  appEnv: AppEnv,
  runJob: (job: IndexingJob) => Promise<void>,
): Scheduling => {
  if (appEnv.INDEX_SCHEDULER === "in-process") {
    const scheduler = new InProcessIndexScheduler(runJob);
    return {
      scheduler,
      startWorker: () => {},
      drain: () => scheduler.drain(),
      close: () => scheduler.drain(),
    };
  }

  const redis = redisConfigFromUrl(appEnv.REDIS_URL);
  const scheduler = new BullMqIndexScheduler(redis);
  let worker: Worker<IndexingJob> | null = null;

  return {
    scheduler,
    startWorker: () => {
      if (worker) {
        return;
      }
      worker = createIndexWorker(redis, appEnv.QUEUE_CONCURRENCY_INDEX, runJob);
      worker.on("failed", (job, error) => {
        logger.error(
          { ticker: job?.data.ticker, runId: job?.data.runId, error: error.message },
          "Index job failed",
        );
      });
    },
    drain: async () => {},
    close: async () => {
      await worker?.close();
      await scheduler.close();
    },
  };
};

/**
 * Single composition root for the HTTP server, the CLI and the worker.
 */
export const createRuntime = async (appEnv: AppEnv = env) => {
  const clock = new SystemClock();
  const ids = new UuidIdGenerator();
  const estimator = new TiktokenEstimator();
  const progress = new ProgressTracker();

  const storage = await createStorage(appEnv, clock);
  const { chatModel, topicLlm, embedder } = createModels(appEnv);

  const embeddings = new EmbeddingService(embedder, estimator, {
    batchSize: appEnv.EMBEDDING_BATCH_SIZE,
    maxInputTokens: appEnv.EMBEDDING_MAX_INPUT_TOKENS,
    dimensions: appEnv.EMBEDDING_DIMENSIONS,
  });

  const pipeline = new IndexingPipelineService(
    {
      documentSource: createDocumentSource(appEnv),
      parser: new SectionParser({
        minSectionCount: appEnv.SECTION_MIN_COUNT,
        minSectionChars: appEnv.SECTION_MIN_CHARS,
      }),
      chunker: new FilingChunker(estimator, {
        maxTokens: appEnv.CHUNK_MAX_TOKENS,
        overlapTokens: appEnv.CHUNK_OVERLAP_TOKENS,
        hardCeilingTokens: appEnv.CHUNK_HARD_CEILING_TOKENS,
      }),
      tagger: new TopicTagger(topicLlm, estimator, {
        enabled: appEnv.TOPIC_EXTRACTION_ENABLED,
        maxInputTokens: appEnv.TOPIC_MAX_INPUT_TOKENS,
        maxTopics: 8,
      }),
      embeddings,
      vectorStore: storage.vectorStore,
      statusRepo: storage.statusRepo,
      progress,
      clock,
    },
    {
      limits: filingLimits(appEnv),
      maxAttemptsPerFiling: appEnv.FILING_MAX_ATTEMPTS,
    },
  );

  const scheduling = createScheduling(appEnv, async (job) => {
    await pipeline.run(job);
  });

  const indexService = new FilingIndexService(
    storage.statusRepo,
    storage.vectorStore,
    scheduling.scheduler,
    progress,
    clock,
    ids,
  );

  const searchService = new FilingSearchService(
    embeddings,
    storage.vectorStore,
    estimator,
    {
      topK: appEnv.RAG_TOP_K,
      maxContextTokens: appEnv.RAG_MAX_CONTEXT_TOKENS,
      candidateMultiplier: 2,
    },
  );

  const loop = new RetrievalToolLoop(chatModel, searchService, {
    maxRounds: appEnv.RAG_MAX_TOOL_ROUNDS,
    maxContextTokens: appEnv.RAG_MAX_CONTEXT_TOKENS,
    maxTokens: appEnv.CHAT_MAX_TOKENS,
  });

  const assistant = new AssistantChatService(chatModel, indexService, loop, {
    maxTokens: appEnv.CHAT_MAX_TOKENS,
  });

  return {
    indexService,
    searchService,
    assistant,
    pipeline,
    startWorker: scheduling.startWorker,
    drain: scheduling.drain,
    close: async () => {
      await scheduling.close();
      await storage.close();
    },
  };
};

export type Runtime = Awaited<ReturnType<typeof createRuntime>>;
