import { describe, expect, it } from "vitest";
import type { IndexingJob } from "../../core/entities/indexStatus";
import { InProcessIndexScheduler } from "./inProcessIndexScheduler";

const job = (runId: string): IndexingJob => ({
  ticker: "acme",
  runId,
  requestedAt: "2026-03-02T12:00:00.000Z",
});

describe("InProcessIndexScheduler", () => {
  it("queues a second run for a ticker behind the active one", async () => {
    const started: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const scheduler = new InProcessIndexScheduler(async (scheduled) => {
      started.push(scheduled.runId);
      await gate;
    });

    expect(await scheduler.schedule(job("run-1"))).toBe(true);
    expect(await scheduler.schedule(job("run-2"))).toBe(true);

    expect(started).toEqual(["run-1"]);
    expect(await scheduler.isActive("ACME", "run-1")).toBe(true);
    expect(await scheduler.isActive("ACME", "run-2")).toBe(true);

    release();
    await scheduler.drain();

    expect(started).toEqual(["run-1", "run-2"]);
    expect(await scheduler.isActive("ACME", "run-1")).toBe(false);
    expect(await scheduler.isActive("ACME", "run-2")).toBe(false);
  });

  it("does not schedule the same run twice", async () => {
    const started: string[] = [];
    const scheduler = new InProcessIndexScheduler(async (scheduled) => {
      started.push(scheduled.runId);
    });

    expect(await scheduler.schedule(job("run-1"))).toBe(true);
    expect(await scheduler.schedule(job("run-1"))).toBe(false);
    await scheduler.drain();

    expect(started).toEqual(["run-1"]);
  });

  it("hands the processor a normalized ticker", async () => {
    const tickers: string[] = [];
    const scheduler = new InProcessIndexScheduler(async (scheduled) => {
      tickers.push(scheduled.ticker);
    });

    await scheduler.schedule(job("run-1"));
    await scheduler.drain();

    expect(tickers).toEqual(["ACME"]);
  });

  it("settles a failing job and frees the ticker", async () => {
    const scheduler = new InProcessIndexScheduler(async () => {
      throw new Error("boom");
    });

    await scheduler.schedule(job("run-1"));
    await scheduler.drain();

    expect(await scheduler.isActive("ACME", "run-1")).toBe(false);
  });
});
