import { normalizeTicker } from "../../core/entities/filing";

/**
 * Process-local, ticker-keyed progress strings for runs in flight. Entries
 * are dropped when a run ends and are not expected to survive a restart.
 */
export class ProgressTracker {
  private readonly messages = new Map<string, string>();

  set(ticker: string, message: string): void {
    this.messages.set(normalizeTicker(ticker), message);
  }

  get(ticker: string): string | undefined {
    return this.messages.get(normalizeTicker(ticker));
  }

  clear(ticker: string): void {
    this.messages.delete(normalizeTicker(ticker));
  }

  size(): number {
    return this.messages.size;
  }
}
