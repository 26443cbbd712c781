import { describe, expect, it } from "vitest";
import { fixedClock } from "../../__tests__/support/fakes";
import { InMemoryIndexStatusRepository } from "./inMemoryIndexStatusRepository";

describe("InMemoryIndexStatusRepository", () => {
  it("ignores updates from a run that no longer owns the row", async () => {
    const repo = new InMemoryIndexStatusRepository(fixedClock());
    await repo.markIndexing("ACME", "run-1");
    await repo.markIndexing("ACME", "run-2");

    await repo.updateCounts("ACME", "run-1", { filingsIndexed: 5, chunksTotal: 50 });
    await repo.markError("ACME", "run-1", "stale failure");

    expect(await repo.get("ACME")).toMatchObject({
      status: "indexing",
      currentRunId: "run-2",
      filingsIndexed: 0,
      errorMessage: null,
    });
  });

  it("keeps the last completion details when a new run starts", async () => {
    const repo = new InMemoryIndexStatusRepository(fixedClock());
    await repo.markIndexing("ACME", "run-1");
    await repo.markReady("ACME", "run-1", {
      filingsIndexed: 3,
      chunksTotal: 30,
      lastIndexedAt: new Date("2026-01-05T00:00:00.000Z"),
      lastFilingDate: "2025-11-04",
      errorMessage: "Skipped 1 filing(s): 8-K 2025-05-06: gone",
    });

    await repo.markIndexing("ACME", "run-2");

    expect(await repo.get("ACME")).toMatchObject({
      status: "indexing",
      filingsIndexed: 0,
      chunksTotal: 0,
      lastIndexedAt: new Date("2026-01-05T00:00:00.000Z"),
      lastFilingDate: "2025-11-04",
      errorMessage: null,
    });
  });

  it("returns null once deleted", async () => {
    const repo = new InMemoryIndexStatusRepository(fixedClock());
    await repo.markIndexing("ACME", "run-1");

    await repo.delete("ACME");

    expect(await repo.get("ACME")).toBeNull();
  });
});
