import { describe, expect, it } from "vitest";
import { makeChunk } from "../../__tests__/support/fakes";
import {
  buildSystemPrompt,
  formatSearchResults,
  NO_RESULTS_MESSAGE,
  searchableCategories,
  SEARCH_FILINGS_TOOL_NAME,
} from "./assistantPrompts";

const stored = (overrides: Parameters<typeof makeChunk>[0] = {}) => {
  const { embedding: _embedding, ...chunk } = makeChunk(overrides);
  return { chunk: { ...chunk, id: 1, runId: "run-1" }, similarity: 0.8 };
};

describe("buildSystemPrompt", () => {
  it("names the ticker and leaves out filing search until the index is ready", () => {
    const prompt = buildSystemPrompt("acme", {
      ticker: "ACME",
      status: "indexing",
      filingsIndexed: 1,
      chunksTotal: 10,
    });

    expect(prompt.startsWith("You are a financial research analyst helping a user study ACME.")).toBe(true);
    expect(prompt).not.toContain(SEARCH_FILINGS_TOOL_NAME);
  });

  it("summarizes a ready index", () => {
    const prompt = buildSystemPrompt("ACME", {
      ticker: "ACME",
      status: "ready",
      filingsIndexed: 2,
      chunksTotal: 14,
    });

    expect(prompt).toContain(
      "Indexed filings: 2 filings indexed, 14 searchable chunks, most recent filing: unknown",
    );
    expect(prompt).toContain("indexed 10-K, 10-Q and 8-K filings for ACME.");
  });
});

describe("formatSearchResults", () => {
  it("cites each excerpt and flags tables", () => {
    expect(
      formatSearchResults([
        stored(),
        stored({
          filingType: "10-Q",
          filingDate: "2025-07-31",
          sectionName: "Part I Item 1 - Financial Statements",
          text: "| Revenue | 10 |",
          isTable: true,
        }),
      ]),
    ).toBe(
      "--- From 10-K (2025-02-14) | Item 1A - Risk Factors ---\nsupply risk\n\n" +
        "--- From 10-Q (2025-07-31) | Part I Item 1 - Financial Statements --- [Table]\n| Revenue | 10 |",
    );
  });

  it("returns the no-results notice for no hits", () => {
    expect(formatSearchResults([])).toBe(NO_RESULTS_MESSAGE);
  });
});

describe("searchableCategories", () => {
  it("excludes the general fallback", () => {
    expect(searchableCategories).not.toContain("general");
    expect(searchableCategories).toContain("risk_factors");
  });
});
