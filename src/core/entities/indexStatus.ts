import type { FilingType } from "./filing";

export type IndexState = "pending" | "indexing" | "ready" | "error";

/**
 * Durable per-ticker row. A ticker without a row is `pending`.
 */
export type FilingIndexStatusRecord = {
  ticker: string;
  status: Exclude<IndexState, "pending">;
  filingsIndexed: number;
  chunksTotal: number;
  lastIndexedAt: Date | null;
  lastFilingDate: string | null;
  errorMessage: string | null;
  currentRunId: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type FilingIndexStatusView = {
  ticker: string;
  status: IndexState;
  filingsIndexed: number;
  chunksTotal: number;
  lastIndexedAt?: string;
  lastFilingDate?: string;
  errorMessage?: string;
  progressMessage?: string;
  filingTypeBreakdown?: Partial<Record<FilingType, number>>;
};

export type IndexingJob = {
  ticker: string;
  runId: string;
  requestedAt: string;
};
