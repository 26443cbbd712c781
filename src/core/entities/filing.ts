export const filingTypes = ["10-K", "10-Q", "8-K"] as const;

export type FilingType = (typeof filingTypes)[number];

/**
 * Report families that share one item taxonomy and one section-boundary rule set.
 */
export type FilingVariant = "annual" | "quarterly" | "current";

export const filingCategories = [
  "risk_factors",
  "financial_discussion",
  "business_overview",
  "financial_statements",
  "legal",
  "regulatory",
  "market_info",
  "events_transactions",
  "corporate_governance",
  "guidance_outlook",
  "general",
] as const;

export type FilingCategory = (typeof filingCategories)[number];

export const isFilingType = (value: string): value is FilingType =>
  filingTypes.some((type) => type === value);

export const isFilingCategory = (value: string): value is FilingCategory =>
  filingCategories.some((category) => category === value);

/**
 * Listing entry returned by a document source before the markup is fetched.
 */
export type FilingReference = {
  ticker: string;
  filingType: FilingType;
  /** ISO calendar date, YYYY-MM-DD. */
  filingDate: string;
  accessionNo?: string;
  sourceUrl: string;
};

export type FilingDocument = FilingReference & {
  markup: string;
};

export type ContentBlock =
  | { kind: "text"; text: string }
  | { kind: "table"; text: string };

export type Section = {
  sectionName: string;
  itemCode: string;
  category: FilingCategory;
  blocks: ContentBlock[];
};

const TICKER_PATTERN = /^[A-Z][A-Z0-9.\-]{0,9}$/;

export const isValidTicker = (value: string): boolean =>
  TICKER_PATTERN.test(value.trim().toUpperCase());

/**
 * Canonical ticker form used for storage keys, job ids and progress entries.
 */
export const normalizeTicker = (value: string): string =>
  value.trim().toUpperCase();
