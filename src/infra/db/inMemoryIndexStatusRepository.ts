import type { FilingIndexStatusRecord } from "../../core/entities/indexStatus";
import type {
  ClockPort,
  IndexCompletion,
  IndexCounts,
  IndexStatusRepositoryPort,
} from "../../core/ports/outboundPorts";

export class InMemoryIndexStatusRepository implements IndexStatusRepositoryPort {
  private readonly rows = new Map<string, FilingIndexStatusRecord>();

  constructor(private readonly clock: ClockPort) {}

  async get(ticker: string): Promise<FilingIndexStatusRecord | null> {
    const row = this.rows.get(ticker);
    return row ? { ...row } : null;
  }

  async markIndexing(ticker: string, runId: string): Promise<void> {
    const now = this.clock.now();
    const existing = this.rows.get(ticker);

    this.rows.set(ticker, {
      ticker,
      status: "indexing",
      filingsIndexed: 0,
      chunksTotal: 0,
      lastIndexedAt: existing?.lastIndexedAt ?? null,
      lastFilingDate: existing?.lastFilingDate ?? null,
      errorMessage: null,
      currentRunId: runId,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    });
  }

  async updateCounts(
    ticker: string,
    runId: string,
    counts: IndexCounts,
  ): Promise<void> {
    this.patch(ticker, runId, { ...counts });
  }

  async markReady(
    ticker: string,
    runId: string,
    completion: IndexCompletion,
  ): Promise<void> {
    this.patch(ticker, runId, { status: "ready", ...completion });
  }

  async markError(ticker: string, runId: string, message: string): Promise<void> {
    this.patch(ticker, runId, { status: "error", errorMessage: message });
  }

  async delete(ticker: string): Promise<void> {
    this.rows.delete(ticker);
  }

  private patch(
    ticker: string,
    runId: string,
    changes: Partial<FilingIndexStatusRecord>,
  ): void {
    const row = this.rows.get(ticker);
    if (!row || row.currentRunId !== runId) {
      return;
    }

    this.rows.set(ticker, { ...row, ...changes, updatedAt: this.clock.now() });
  }
}
