import { describe, expect, it } from "vitest";
import { makeChunk } from "../../__tests__/support/fakes";
import { cosineSimilarity, InMemoryVectorStore } from "./inMemoryVectorStore";

describe("cosineSimilarity", () => {
  it("scores identical directions 1 and orthogonal ones 0", () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});

describe("InMemoryVectorStore", () => {
  it("hides staged chunks until their run is committed", async () => {
    const store = new InMemoryVectorStore();
    await store.insertChunks("run-1", [makeChunk()]);

    expect(await store.countChunks("ACME")).toBe(0);

    await store.commitRun("ACME", "run-1");
    expect(await store.countChunks("ACME")).toBe(1);
  });

  it("replaces the previous run on commit and keeps it on discard", async () => {
    const store = new InMemoryVectorStore();
    await store.insertChunks("run-1", [makeChunk({ text: "old" })]);
    await store.commitRun("ACME", "run-1");

    await store.insertChunks("run-2", [makeChunk({ text: "discarded" })]);
    await store.discardRun("ACME", "run-2");
    await store.insertChunks("run-3", [makeChunk({ text: "new" }), makeChunk({ text: "newer" })]);

    const beforeCommit = await store.search({ queryVector: [1, 0, 0], ticker: "ACME", limit: 10 });
    expect(beforeCommit.map((hit) => hit.chunk.text)).toEqual(["old"]);

    await store.commitRun("ACME", "run-3");

    const afterCommit = await store.search({ queryVector: [1, 0, 0], ticker: "ACME", limit: 10 });
    expect(afterCommit.map((hit) => hit.chunk.text)).toEqual(["new", "newer"]);
  });

  it("leaves other tickers alone", async () => {
    const store = new InMemoryVectorStore();
    await store.insertChunks("run-1", [makeChunk(), makeChunk({ ticker: "BETA" })]);
    await store.commitRun("ACME", "run-1");
    await store.commitRun("BETA", "run-1");

    await store.deleteTicker("ACME");

    expect(await store.countChunks("ACME")).toBe(0);
    expect(await store.countChunks("BETA")).toBe(1);
  });

  it("orders ties by newer filing date, then insertion order", async () => {
    const store = new InMemoryVectorStore();
    await store.insertChunks("run-1", [
      makeChunk({ text: "older", filingDate: "2024-02-16" }),
      makeChunk({ text: "newer-a", filingDate: "2025-02-14" }),
      makeChunk({ text: "newer-b", filingDate: "2025-02-14" }),
      makeChunk({ text: "best", filingDate: "2023-02-17", embedding: [1, 0.0001, 0] }),
      makeChunk({ text: "unrelated", embedding: [0, 1, 0] }),
    ]);
    await store.commitRun("ACME", "run-1");

    const hits = await store.search({ queryVector: [1, 0.0001, 0], ticker: "ACME", limit: 4 });

    expect(hits.map((hit) => hit.chunk.text)).toEqual(["best", "newer-a", "newer-b", "older"]);
    expect(hits.map((hit) => hit.chunk.id)).toEqual([4, 2, 3, 1]);
  });

  it("filters by type, category and minimum filing date", async () => {
    const store = new InMemoryVectorStore();
    await store.insertChunks("run-1", [
      makeChunk({ text: "annual risk" }),
      makeChunk({ text: "old annual risk", filingDate: "2023-02-17" }),
      makeChunk({ text: "earnings", filingType: "8-K", category: "financial_discussion" }),
    ]);
    await store.commitRun("ACME", "run-1");

    const hits = await store.search({
      queryVector: [1, 0, 0],
      ticker: "ACME",
      filingTypes: ["10-K"],
      categories: ["risk_factors"],
      minFilingDate: "2024-01-01",
      limit: 10,
    });

    expect(hits.map((hit) => hit.chunk.text)).toEqual(["annual risk"]);
  });

  it("counts distinct filings per type", async () => {
    const store = new InMemoryVectorStore();
    await store.insertChunks("run-1", [
      makeChunk(),
      makeChunk({ chunkIndex: 1 }),
      makeChunk({ filingDate: "2024-02-16", accessionNo: "0000000000-24-000002" }),
      makeChunk({ filingType: "8-K", filingDate: "2025-11-04", accessionNo: undefined }),
    ]);
    await store.commitRun("ACME", "run-1");

    expect(await store.filingTypeBreakdown("ACME")).toEqual({ "10-K": 2, "8-K": 1 });
  });
});
