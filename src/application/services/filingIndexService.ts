import { normalizeTicker } from "../../core/entities/filing";
import type { FilingIndexStatusView } from "../../core/entities/indexStatus";
import type {
  FilingIndexUseCase,
  IndexRequestOutcome,
} from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  IdGeneratorPort,
  IndexSchedulerPort,
  IndexStatusRepositoryPort,
  VectorStorePort,
} from "../../core/ports/outboundPorts";
import {
  logger,
  toErrorDetails,
  type Logger,
} from "../../shared/logger/logger";
import type { ProgressTracker } from "./progressTracker";

/**
 * Public face of indexing: trigger, status and deletion. The trigger writes
 * `indexing` durably before any background work is scheduled, so a status
 * read issued after it returns never sees the previous state.
 */
export class FilingIndexService implements FilingIndexUseCase {
  private readonly triggers = new Map<string, Promise<IndexRequestOutcome>>();

  constructor(
    private readonly statusRepo: IndexStatusRepositoryPort,
    private readonly vectorStore: VectorStorePort,
    private readonly scheduler: IndexSchedulerPort,
    private readonly progress: ProgressTracker,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
    private readonly log: Logger = logger.child({ component: "filing-index" }),
  ) {}

  /**
   * Commit-then-schedule. A ticker whose owning run is still queued or
   * running is left alone; a stale `indexing` row with no live job is
   * restarted. Concurrent triggers for one ticker share the first one's run.
   */
  async requestIndexing(rawTicker: string): Promise<IndexRequestOutcome> {
    const ticker = normalizeTicker(rawTicker);
    const inFlight = this.triggers.get(ticker);
    if (inFlight) {
      const outcome = await inFlight;
      return { ...outcome, accepted: false };
    }

    const trigger = this.trigger(ticker).finally(() => {
      this.triggers.delete(ticker);
    });
    this.triggers.set(ticker, trigger);
    return trigger;
  }

  private async trigger(ticker: string): Promise<IndexRequestOutcome> {
    const current = await this.statusRepo.get(ticker);

    if (
      current?.status === "indexing" &&
      current.currentRunId &&
      (await this.scheduler.isActive(ticker, current.currentRunId))
    ) {
      this.log.info(
        { ticker, runId: current.currentRunId },
        "Indexing already in progress",
      );
      return { ticker, accepted: false, runId: current.currentRunId };
    }

    const runId = this.ids.next();
    await this.statusRepo.markIndexing(ticker, runId);
    this.progress.set(ticker, "Queued for indexing");

    let scheduled: boolean;
    try {
      scheduled = await this.scheduler.schedule({
        ticker,
        runId,
        requestedAt: this.clock.now().toISOString(),
      });
    } catch (error) {
      this.progress.clear(ticker);
      await this.statusRepo.markError(
        ticker,
        runId,
        `Failed to schedule indexing: ${error instanceof Error ? error.message : String(error)}`,
      );
      this.log.error(
        { ticker, runId, error: toErrorDetails(error) },
        "Failed to schedule indexing",
      );
      throw error;
    }

    if (!scheduled) {
      this.progress.clear(ticker);
      await this.statusRepo.markError(
        ticker,
        runId,
        "Indexing job was not accepted by the scheduler.",
      );
      this.log.warn({ ticker, runId }, "Scheduler did not accept indexing job");
      return { ticker, accepted: false };
    }

    this.log.info({ ticker, runId }, "Indexing scheduled");
    return { ticker, accepted: true, runId };
  }

  async getStatus(rawTicker: string): Promise<FilingIndexStatusView> {
    const ticker = normalizeTicker(rawTicker);
    const record = await this.statusRepo.get(ticker);

    if (!record) {
      return { ticker, status: "pending", filingsIndexed: 0, chunksTotal: 0 };
    }

    const view: FilingIndexStatusView = {
      ticker,
      status: record.status,
      filingsIndexed: record.filingsIndexed,
      chunksTotal: record.chunksTotal,
    };

    if (record.lastIndexedAt) {
      view.lastIndexedAt = record.lastIndexedAt.toISOString();
    }
    if (record.lastFilingDate) {
      view.lastFilingDate = record.lastFilingDate;
    }
    if (record.errorMessage) {
      view.errorMessage = record.errorMessage;
    }

    if (record.status === "indexing") {
      const progressMessage = this.progress.get(ticker);
      if (progressMessage) {
        view.progressMessage = progressMessage;
      }
    }

    if (record.status === "ready") {
      view.filingTypeBreakdown =
        await this.vectorStore.filingTypeBreakdown(ticker);
    }

    return view;
  }

  /**
   * Returns the ticker to the unindexed state. A run still in flight for it
   * notices the missing row before committing and discards its own chunks.
   */
  async deleteIndex(rawTicker: string): Promise<void> {
    const ticker = normalizeTicker(rawTicker);
    await this.vectorStore.deleteTicker(ticker);
    await this.statusRepo.delete(ticker);
    this.progress.clear(ticker);
    this.log.info({ ticker }, "Filing index deleted");
  }
}
