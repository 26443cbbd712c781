import type {
  FilingCategory,
  FilingType,
  FilingVariant,
} from "../../core/entities/filing";

export type ItemDefinition = {
  name: string;
  category: FilingCategory;
};

export type FilingTaxonomy = {
  variant: FilingVariant;
  /** Quarterly reports restart item numbering per part, so codes carry a `P1-`/`P2-` prefix. */
  partQualified: boolean;
  items: Readonly<Record<string, ItemDefinition>>;
};

export const filingVariants: Readonly<Record<FilingType, FilingVariant>> = {
  "10-K": "annual",
  "10-Q": "quarterly",
  "8-K": "current",
};

const annualItems: Record<string, ItemDefinition> = {
  "1": { name: "Item 1 - Business", category: "business_overview" },
  "1A": { name: "Item 1A - Risk Factors", category: "risk_factors" },
  "1B": { name: "Item 1B - Unresolved Staff Comments", category: "regulatory" },
  "1C": { name: "Item 1C - Cybersecurity", category: "risk_factors" },
  "2": { name: "Item 2 - Properties", category: "business_overview" },
  "3": { name: "Item 3 - Legal Proceedings", category: "legal" },
  "5": { name: "Item 5 - Market Information", category: "market_info" },
  "6": {
    name: "Item 6 - Selected Financial Data",
    category: "financial_statements",
  },
  "7": { name: "Item 7 - MD&A", category: "financial_discussion" },
  "7A": { name: "Item 7A - Market Risk Disclosures", category: "risk_factors" },
  "8": {
    name: "Item 8 - Financial Statements",
    category: "financial_statements",
  },
  "9": { name: "Item 9 - Accountant Disagreements", category: "regulatory" },
  "9A": { name: "Item 9A - Controls and Procedures", category: "regulatory" },
  "9B": { name: "Item 9B - Other Information", category: "regulatory" },
};

const quarterlyItems: Record<string, ItemDefinition> = {
  "P1-1": {
    name: "Part I Item 1 - Financial Statements",
    category: "financial_statements",
  },
  "P1-2": { name: "Part I Item 2 - MD&A", category: "financial_discussion" },
  "P1-3": { name: "Part I Item 3 - Market Risk", category: "risk_factors" },
  "P1-4": { name: "Part I Item 4 - Controls", category: "regulatory" },
  "P2-1": { name: "Part II Item 1 - Legal Proceedings", category: "legal" },
  "P2-1A": {
    name: "Part II Item 1A - Risk Factors",
    category: "risk_factors",
  },
  "P2-2": {
    name: "Part II Item 2 - Equity Repurchases",
    category: "market_info",
  },
  "P2-6": { name: "Part II Item 6 - Exhibits", category: "regulatory" },
};

const currentItems: Record<string, ItemDefinition> = {
  "1.01": {
    name: "Item 1.01 - Material Agreement",
    category: "events_transactions",
  },
  "1.02": {
    name: "Item 1.02 - Termination of Agreement",
    category: "events_transactions",
  },
  "1.05": {
    name: "Item 1.05 - Cybersecurity Incident",
    category: "risk_factors",
  },
  "2.01": {
    name: "Item 2.01 - Acquisition/Disposition",
    category: "events_transactions",
  },
  "2.02": {
    name: "Item 2.02 - Earnings Results",
    category: "financial_discussion",
  },
  "2.05": {
    name: "Item 2.05 - Exit/Disposal Activities",
    category: "events_transactions",
  },
  "5.02": {
    name: "Item 5.02 - Officer/Director Changes",
    category: "corporate_governance",
  },
  "5.03": {
    name: "Item 5.03 - Bylaws Amendment",
    category: "corporate_governance",
  },
  "7.01": {
    name: "Item 7.01 - Reg FD Disclosure",
    category: "guidance_outlook",
  },
  "8.01": { name: "Item 8.01 - Other Events", category: "guidance_outlook" },
  "9.01": { name: "Item 9.01 - Exhibits", category: "regulatory" },
};

export const taxonomies: Readonly<Record<FilingVariant, FilingTaxonomy>> = {
  annual: { variant: "annual", partQualified: false, items: annualItems },
  quarterly: {
    variant: "quarterly",
    partQualified: true,
    items: quarterlyItems,
  },
  current: { variant: "current", partQualified: false, items: currentItems },
};

export const taxonomyFor = (filingType: FilingType): FilingTaxonomy =>
  taxonomies[filingVariants[filingType]];

/**
 * Pure category lookup; item codes outside the taxonomy fall back to `general`.
 */
export const categoryFor = (
  filingType: FilingType,
  itemCode: string,
): FilingCategory =>
  taxonomyFor(filingType).items[itemCode.toUpperCase()]?.category ?? "general";
