import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type { IndexingJob } from "../../core/entities/indexStatus";
import type { IndexSchedulerPort } from "../../core/ports/outboundPorts";
import { indexJobId, queueNames } from "./queues";

const PENDING_STATES = new Set([
  "waiting",
  "active",
  "delayed",
  "prioritized",
  "waiting-children",
]);

/**
 * Pipeline runs do their own per-filing retries; a failed job is removed so
 * the next request can schedule a fresh one under the same id.
 */
export const defaultJobOptions = {
  attempts: 1,
  removeOnComplete: true,
  removeOnFail: true,
} as const;

/**
 * Schedules indexing runs on the `filing-index` queue, one job per run.
 */
export class BullMqIndexScheduler implements IndexSchedulerPort {
  private readonly queue: Queue<IndexingJob>;

  constructor(connection: RedisOptions) {
    this.queue = new Queue<IndexingJob>(queueNames.filingIndex, {
      connection,
      defaultJobOptions,
    });
  }

  async schedule(job: IndexingJob): Promise<boolean> {
    const jobId = indexJobId(job.ticker, job.runId);
    if (await this.queue.getJob(jobId)) {
      return false;
    }

    await this.queue.add("index", job, { jobId });
    return true;
  }

  async isActive(ticker: string, runId: string): Promise<boolean> {
    const job = await this.queue.getJob(indexJobId(ticker, runId));
    if (!job) {
      return false;
    }

    return PENDING_STATES.has(await job.getState());
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

export const createIndexWorker = (
  connection: RedisOptions,
  concurrency: number,
  processor: (job: IndexingJob) => Promise<void>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency,
  };

  return new Worker<IndexingJob>(
    queueNames.filingIndex,
    async (job) => {
      await processor(job.data);
    },
    options,
  );
};
