import type { SearchHit } from "../../core/entities/chunk";
import type { ToolDefinition } from "../../core/entities/chat";
import { filingCategories, filingTypes } from "../../core/entities/filing";
import type { FilingIndexStatusView } from "../../core/entities/indexStatus";

export const SEARCH_FILINGS_TOOL_NAME = "search_filings";

export const NO_RESULTS_MESSAGE =
  "No relevant filing excerpts found for this query. The indexed filings may not cover this specific topic.";

/**
 * Categories the model may filter on. `general` is the fallback bucket and is not offered.
 */
export const searchableCategories = filingCategories.filter(
  (category) => category !== "general",
);

export const searchFilingsTool: ToolDefinition = {
  name: SEARCH_FILINGS_TOOL_NAME,
  description:
    "Search indexed SEC filings (10-K, 10-Q, 8-K) for specific information. Returns relevant excerpts from filing sections ranked by semantic similarity.",
  parameters: {
    type: "object",
    properties: {
      query: {
        type: "string",
        description:
          "Semantic search query. Be specific, e.g. 'china supply chain risk' rather than 'risk'.",
      },
      filing_types: {
        type: "array",
        items: { type: "string", enum: [...filingTypes] },
        description: "Optional filter to specific filing types.",
      },
      categories: {
        type: "array",
        items: { type: "string", enum: searchableCategories },
        description: "Optional filter to specific section categories.",
      },
    },
    required: ["query"],
  },
};

const BASE_PROMPT = `You are a financial research analyst helping a user study {ticker}.

Work step by step and cite where each number comes from. Label assumptions as assumptions.
Be direct about missing data and uncertainty. Use markdown for readability.

Do not recommend buying or selling securities, predict prices with certainty,
invent data points, or give tax or legal advice.`;

const FILING_SEARCH_ADDENDUM = `

## SEC filing search

You can call the ${SEARCH_FILINGS_TOOL_NAME} tool to semantically search indexed 10-K, 10-Q and 8-K filings for {ticker}.
Use it for risks, legal or regulatory matters, MD&A, strategy, acquisitions and other material events,
or whenever a filing excerpt would support your answer. Do not use it for market prices or general knowledge.

Indexed filings: {summary}

Write specific queries, narrow with \`categories\` (for example ["risk_factors"]) or \`filing_types\`
(for example ["10-K"]), and search more than once when a question has several parts.`;

/**
 * Builds the system prompt; the search addendum is present only for a ready index.
 */
export const buildSystemPrompt = (
  ticker: string,
  status?: FilingIndexStatusView,
): string => {
  const symbol = ticker.toUpperCase();
  const prompt = BASE_PROMPT.replaceAll("{ticker}", symbol);

  if (status?.status !== "ready") {
    return prompt;
  }

  const summary = `${status.filingsIndexed} filings indexed, ${status.chunksTotal} searchable chunks, most recent filing: ${status.lastFilingDate ?? "unknown"}`;

  return (
    prompt +
    FILING_SEARCH_ADDENDUM.replaceAll("{ticker}", symbol).replace(
      "{summary}",
      summary,
    )
  );
};

/**
 * Renders hits as cited excerpts for the tool message.
 */
export const formatSearchResults = (hits: SearchHit[]): string => {
  if (hits.length === 0) {
    return NO_RESULTS_MESSAGE;
  }

  return hits
    .map(({ chunk }) => {
      const header = `--- From ${chunk.filingType} (${chunk.filingDate}) | ${chunk.sectionName} ---${chunk.isTable ? " [Table]" : ""}`;
      return `${header}\n${chunk.text}`;
    })
    .join("\n\n");
};
