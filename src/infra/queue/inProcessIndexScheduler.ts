import type { IndexingJob } from "../../core/entities/indexStatus";
import { normalizeTicker } from "../../core/entities/filing";
import type { IndexSchedulerPort } from "../../core/ports/outboundPorts";
import {
  logger,
  toErrorDetails,
  type Logger,
} from "../../shared/logger/logger";

const runKey = (ticker: string, runId: string): string => `${ticker}/${runId}`;

/**
 * Runs indexing jobs detached inside the current process. Used when no Redis
 * is available; jobs do not survive a restart. Jobs for one ticker run one
 * after another in scheduling order.
 */
export class InProcessIndexScheduler implements IndexSchedulerPort {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly pending = new Set<string>();

  constructor(
    private readonly processor: (job: IndexingJob) => Promise<unknown>,
    private readonly log: Logger = logger.child({ component: "in-process-scheduler" }),
  ) {}

  async schedule(job: IndexingJob): Promise<boolean> {
    const ticker = normalizeTicker(job.ticker);
    const key = runKey(ticker, job.runId);
    if (this.pending.has(key)) {
      return false;
    }

    this.pending.add(key);
    const previous = this.tails.get(ticker) ?? Promise.resolve();
    const running: Promise<void> = previous
      .then(() => this.processor({ ...job, ticker }))
      .then(() => undefined)
      .catch((error: unknown) => {
        this.log.error(
          { ticker, runId: job.runId, error: toErrorDetails(error) },
          "Indexing job failed",
        );
      })
      .finally(() => {
        this.pending.delete(key);
        if (this.tails.get(ticker) === running) {
          this.tails.delete(ticker);
        }
      });

    this.tails.set(ticker, running);
    return true;
  }

  async isActive(ticker: string, runId: string): Promise<boolean> {
    return this.pending.has(runKey(normalizeTicker(ticker), runId));
  }

  /** Resolves once every scheduled job has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.tails.values()]);
  }
}
