import { describe, expect, it } from "vitest";
import { ProgressTracker } from "./progressTracker";

describe("ProgressTracker", () => {
  it("keys messages by normalized ticker and forgets cleared runs", () => {
    const progress = new ProgressTracker();

    progress.set(" acme ", "Fetching filing list...");
    progress.set("ACME", "Indexing 10-K filed 2025-02-14 (1/3)");

    expect(progress.get("acme")).toBe("Indexing 10-K filed 2025-02-14 (1/3)");
    expect(progress.size()).toBe(1);

    progress.clear("Acme");
    expect(progress.get("ACME")).toBeUndefined();
    expect(progress.size()).toBe(0);
  });
});
