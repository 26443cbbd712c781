import { normalizeTicker } from "../../core/entities/filing";

/**
 * Hyphen-only names: BullMQ uses colon as its Redis key separator and
 * rejects custom job ids containing one.
 */
export const queueNames = {
  filingIndex: "filing-index",
} as const;

/**
 * One job id per run. A new run for a ticker whose previous job is still
 * active is queued behind it instead of being deduplicated away.
 */
export const indexJobId = (ticker: string, runId: string): string =>
  `index-${normalizeTicker(ticker)}-${runId}`;

export const redisConfigFromUrl = (url: string) => {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
    // Required by BullMQ workers' blocking commands.
    maxRetriesPerRequest: null,
  };
};
