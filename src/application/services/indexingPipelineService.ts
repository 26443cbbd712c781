import { err, ok, type Result } from "neverthrow";
import {
  describeBoundaryError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type { ChunkDraft, FilingChunk } from "../../core/entities/chunk";
import {
  filingTypes,
  normalizeTicker,
  type FilingReference,
  type FilingType,
} from "../../core/entities/filing";
import type {
  ClockPort,
  DocumentSourcePort,
  IndexStatusRepositoryPort,
  VectorStorePort,
} from "../../core/ports/outboundPorts";
import {
  logger,
  toErrorDetails,
  type Logger,
} from "../../shared/logger/logger";
import type { FilingChunker } from "./chunker";
import type { EmbeddingService } from "./embeddingService";
import type { ProgressTracker } from "./progressTracker";
import type { SectionParser } from "./sectionParser";
import type { TopicTagger } from "./topicTagger";

export type FilingLimits = Readonly<Record<FilingType, number>>;

export type IndexingPipelineOptions = {
  limits: FilingLimits;
  /** Attempts per filing for retryable boundary failures. */
  maxAttemptsPerFiling: number;
};

export const defaultIndexingPipelineOptions: IndexingPipelineOptions = {
  limits: { "10-K": 2, "10-Q": 4, "8-K": 8 },
  maxAttemptsPerFiling: 2,
};

export type IndexingRunOutcome = "ready" | "error" | "superseded";

export type IndexingRunSummary = {
  ticker: string;
  runId: string;
  outcome: IndexingRunOutcome;
  filingsIndexed: number;
  chunksTotal: number;
  failures: string[];
};

export type IndexingPipelineDeps = {
  documentSource: DocumentSourcePort;
  parser: SectionParser;
  chunker: FilingChunker;
  tagger: TopicTagger;
  embeddings: EmbeddingService;
  vectorStore: VectorStorePort;
  statusRepo: IndexStatusRepositoryPort;
  progress: ProgressTracker;
  clock: ClockPort;
};

/**
 * Keeps the newest `limit` filings of each type, newest first within a type.
 */
export const selectFilings = (
  references: FilingReference[],
  limits: FilingLimits,
): FilingReference[] =>
  filingTypes.flatMap((filingType) =>
    references
      .filter((reference) => reference.filingType === filingType)
      .sort((left, right) => right.filingDate.localeCompare(left.filingDate))
      .slice(0, limits[filingType]),
  );

/**
 * Runs one indexing job end to end: list, then per filing fetch, parse,
 * chunk, tag, embed and stage; finally commit or discard the staged run.
 * Boundary failures skip a filing. Store failures abort the run and leave
 * the previously committed chunks untouched.
 */
export class IndexingPipelineService {
  private readonly running = new Map<string, Promise<unknown>>();

  constructor(
    private readonly deps: IndexingPipelineDeps,
    private readonly options: IndexingPipelineOptions = defaultIndexingPipelineOptions,
    private readonly log: Logger = logger.child({ component: "indexing-pipeline" }),
  ) {}

  isRunning(ticker: string): boolean {
    return this.running.has(normalizeTicker(ticker));
  }

  /**
   * Runs for one ticker execute one after another; a later run waits for the
   * earlier one instead of being dropped.
   */
  async run(job: { ticker: string; runId: string }): Promise<IndexingRunSummary> {
    const ticker = normalizeTicker(job.ticker);
    const previous: Promise<unknown> = this.running.get(ticker) ?? Promise.resolve();
    if (this.running.has(ticker)) {
      this.log.info(
        { ticker, runId: job.runId },
        "Waiting for the ticker's current run to finish",
      );
    }

    const current = previous.then(() => this.runExclusive(ticker, job.runId));
    this.running.set(ticker, current);

    try {
      return await current;
    } finally {
      if (this.running.get(ticker) === current) {
        this.running.delete(ticker);
      }
    }
  }

  private async runExclusive(
    ticker: string,
    runId: string,
  ): Promise<IndexingRunSummary> {
    const summary: IndexingRunSummary = {
      ticker,
      runId,
      outcome: "error",
      filingsIndexed: 0,
      chunksTotal: 0,
      failures: [],
    };
    const { progress } = this.deps;

    try {
      await this.execute(ticker, runId, summary);
    } catch (error) {
      summary.outcome = "error";
      this.log.error(
        { ticker, runId, error: toErrorDetails(error) },
        "Indexing run aborted",
      );
      await this.discardQuietly(ticker, runId);
      await this.markErrorQuietly(
        ticker,
        runId,
        `Indexing failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    } finally {
      progress.clear(ticker);
    }

    return summary;
  }

  private async execute(
    ticker: string,
    runId: string,
    summary: IndexingRunSummary,
  ): Promise<void> {
    const { documentSource, statusRepo, vectorStore, progress, clock } =
      this.deps;

    progress.set(ticker, "Fetching filing list...");
    const listed = await documentSource.listFilings(ticker, filingTypes);
    if (listed.isErr()) {
      summary.outcome = "error";
      await statusRepo.markError(
        ticker,
        runId,
        `Failed to list filings: ${describeBoundaryError(listed.error)}`,
      );
      return;
    }

    const selected = selectFilings(
      listed.value.map((reference) => ({ ...reference, ticker })),
      this.options.limits,
    );
    if (selected.length === 0) {
      summary.outcome = "error";
      await statusRepo.markError(ticker, runId, "No filings found to index.");
      return;
    }

    this.log.info(
      { ticker, runId, filings: selected.length },
      "Indexing selected filings",
    );

    let lastFilingDate: string | null = null;

    for (const [position, reference] of selected.entries()) {
      progress.set(
        ticker,
        `Indexing ${reference.filingType} filed ${reference.filingDate} (${position + 1}/${selected.length})`,
      );

      const indexed = await this.indexWithRetry(runId, reference);
      if (indexed.isErr()) {
        const reason = `${reference.filingType} ${reference.filingDate}: ${describeBoundaryError(indexed.error)}`;
        summary.failures.push(reason);
        this.log.warn({ ticker, runId, reason }, "Skipping filing");
        continue;
      }

      summary.filingsIndexed += 1;
      summary.chunksTotal += indexed.value;
      if (!lastFilingDate || reference.filingDate > lastFilingDate) {
        lastFilingDate = reference.filingDate;
      }

      await statusRepo.updateCounts(ticker, runId, {
        filingsIndexed: summary.filingsIndexed,
        chunksTotal: summary.chunksTotal,
      });
    }

    if (summary.filingsIndexed === 0) {
      summary.outcome = "error";
      await vectorStore.discardRun(ticker, runId);
      await statusRepo.markError(
        ticker,
        runId,
        `All filings failed: ${summary.failures.join("; ")}`,
      );
      return;
    }

    const current = await statusRepo.get(ticker);
    if (current?.currentRunId !== runId) {
      summary.outcome = "superseded";
      this.log.warn(
        { ticker, runId, currentRunId: current?.currentRunId ?? null },
        "Run no longer owns the status row, discarding its chunks",
      );
      await vectorStore.discardRun(ticker, runId);
      return;
    }

    progress.set(ticker, "Finalizing index...");
    await vectorStore.commitRun(ticker, runId);
    await statusRepo.markReady(ticker, runId, {
      filingsIndexed: summary.filingsIndexed,
      chunksTotal: summary.chunksTotal,
      lastIndexedAt: clock.now(),
      lastFilingDate,
      errorMessage:
        summary.failures.length > 0
          ? `Skipped ${summary.failures.length} filing(s): ${summary.failures.join("; ")}`
          : null,
    });
    summary.outcome = "ready";

    this.log.info(
      {
        ticker,
        runId,
        filingsIndexed: summary.filingsIndexed,
        chunksTotal: summary.chunksTotal,
        skipped: summary.failures.length,
      },
      "Indexing completed",
    );
  }

  private async indexWithRetry(
    runId: string,
    reference: FilingReference,
  ): Promise<Result<number, AppBoundaryError>> {
    // Topics survive retries so each section reaches the model once per run.
    const topicsBySection = new Map<string, string[]>();
    let attempt = 1;

    for (;;) {
      const result = await this.indexFiling(runId, reference, topicsBySection);
      if (
        result.isOk() ||
        !result.error.retryable ||
        attempt >= this.options.maxAttemptsPerFiling
      ) {
        return result;
      }

      this.log.warn(
        {
          ticker: reference.ticker,
          filingType: reference.filingType,
          filingDate: reference.filingDate,
          attempt,
          error: describeBoundaryError(result.error),
        },
        "Retrying filing after transient failure",
      );
      attempt += 1;
    }
  }

  /**
   * Stages one filing's chunks under the run id and returns how many were stored.
   */
  private async indexFiling(
    runId: string,
    reference: FilingReference,
    topicsBySection: Map<string, string[]>,
  ): Promise<Result<number, AppBoundaryError>> {
    const { documentSource, parser, chunker, tagger, embeddings, vectorStore } =
      this.deps;

    const document = await documentSource.fetchDocument(reference);
    if (document.isErr()) {
      return err(document.error);
    }

    const sections = parser.parse(document.value.markup, reference.filingType);
    const drafts: Array<ChunkDraft & { topics: string[] }> = [];

    for (const [position, section] of sections.entries()) {
      const sectionChunks = chunker.chunkSection(section, drafts.length);
      if (sectionChunks.length === 0) {
        continue;
      }

      const key = `${position}:${section.itemCode}`;
      let topics = topicsBySection.get(key);
      if (!topics) {
        topics = await tagger.extractTopics({
          ticker: reference.ticker,
          filingType: reference.filingType,
          section,
        });
        topicsBySection.set(key, topics);
      }
      drafts.push(...sectionChunks.map((draft) => ({ ...draft, topics })));
    }

    if (drafts.length === 0) {
      return err({
        source: "filings",
        code: "unsupported_document",
        provider: "section-parser",
        message: "Filing produced no indexable text.",
        retryable: false,
      });
    }

    const vectors = await embeddings.embedTexts(drafts.map((draft) => draft.text));
    if (vectors.isErr()) {
      return err(vectors.error);
    }

    const chunks: FilingChunk[] = [];
    for (const [index, draft] of drafts.entries()) {
      const embedding = vectors.value[index];
      if (!embedding) {
        return err({
          source: "embedding",
          code: "malformed_response",
          provider: "embedding-service",
          message: `Missing embedding for chunk ${index}.`,
          retryable: false,
        });
      }

      chunks.push({
        ...draft,
        ticker: reference.ticker,
        filingType: reference.filingType,
        filingDate: reference.filingDate,
        accessionNo: reference.accessionNo,
        embedding,
      });
    }

    await vectorStore.insertChunks(runId, chunks);

    this.log.debug(
      {
        ticker: reference.ticker,
        runId,
        filingType: reference.filingType,
        filingDate: reference.filingDate,
        sections: sections.length,
        chunks: chunks.length,
      },
      "Filing staged",
    );

    return ok(chunks.length);
  }

  private async discardQuietly(ticker: string, runId: string): Promise<void> {
    try {
      await this.deps.vectorStore.discardRun(ticker, runId);
    } catch (error) {
      this.log.error(
        { ticker, runId, error: toErrorDetails(error) },
        "Failed to discard staged chunks",
      );
    }
  }

  private async markErrorQuietly(
    ticker: string,
    runId: string,
    message: string,
  ): Promise<void> {
    try {
      await this.deps.statusRepo.markError(ticker, runId, message);
    } catch (error) {
      this.log.error(
        { ticker, runId, error: toErrorDetails(error) },
        "Failed to record indexing error",
      );
    }
  }
}
