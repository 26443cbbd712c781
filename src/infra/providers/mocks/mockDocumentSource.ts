import type { DocumentSourcePort } from "../../../core/ports/outboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  FilingDocument,
  FilingReference,
  FilingType,
} from "../../../core/entities/filing";
import { ok, type Result } from "neverthrow";

type MockItem = { header: string; body: string; table?: string[][] };

const mockFilingDates: Readonly<Record<FilingType, string[]>> = {
  "10-K": ["2025-02-14", "2024-02-16", "2023-02-17"],
  "10-Q": ["2025-10-31", "2025-07-31", "2025-05-01", "2024-10-31", "2024-08-01"],
  "8-K": ["2025-11-04", "2025-08-05", "2025-05-06"],
};

const incomeTable = (ticker: string): string[][] => [
  ["(in millions)", "2025", "2024"],
  [`${ticker} net revenue`, "$ 12,480", "$ 11,020"],
  ["Cost of revenue", "(7,310)", "(6,640)"],
  ["Operating income", "2,915", "2,402"],
  ["Net income", "2,104", "1,731"],
];

const paragraph = (ticker: string, subject: string, date: string): string =>
  `${ticker} describes ${subject} for the period reported on ${date}. ` +
  `Management notes that ${subject} remained a focus across its operating segments, ` +
  `with commentary on demand trends, supplier concentration and pricing discipline.`;

const itemsFor = (
  ticker: string,
  filingType: FilingType,
  date: string,
): Array<{ part?: string; items: MockItem[] }> => {
  if (filingType === "10-K") {
    return [
      {
        items: [
          { header: "Item 1. Business", body: paragraph(ticker, "its business model and products", date) },
          { header: "Item 1A. Risk Factors", body: paragraph(ticker, "supply chain and regulatory risk", date) },
          { header: "Item 3. Legal Proceedings", body: paragraph(ticker, "pending litigation", date) },
          { header: "Item 7. Management's Discussion and Analysis", body: paragraph(ticker, "revenue growth and operating margin", date) },
          {
            header: "Item 8. Financial Statements and Supplementary Data",
            body: paragraph(ticker, "its consolidated statements of operations", date),
            table: incomeTable(ticker),
          },
        ],
      },
    ];
  }

  if (filingType === "10-Q") {
    return [
      {
        part: "PART I - FINANCIAL INFORMATION",
        items: [
          {
            header: "Item 1. Financial Statements",
            body: paragraph(ticker, "its condensed quarterly statements", date),
            table: incomeTable(ticker),
          },
          { header: "Item 2. Management's Discussion and Analysis", body: paragraph(ticker, "quarterly revenue and margin trends", date) },
        ],
      },
      {
        part: "PART II - OTHER INFORMATION",
        items: [
          { header: "Item 1A. Risk Factors", body: paragraph(ticker, "changes to previously disclosed risks", date) },
        ],
      },
    ];
  }

  return [
    {
      items: [
        { header: "Item 2.02 Results of Operations and Financial Condition", body: paragraph(ticker, "its quarterly earnings release", date) },
        { header: "Item 9.01 Financial Statements and Exhibits", body: paragraph(ticker, "the exhibits furnished with this report", date) },
      ],
    },
  ];
};

const renderTableHtml = (rows: string[][]): string =>
  `<table>${rows
    .map((row) => `<tr>${row.map((cell) => `<td>${cell}</td>`).join("")}</tr>`)
    .join("")}</table>`;

export const renderMockFiling = (
  ticker: string,
  filingType: FilingType,
  date: string,
): string => {
  const parts = itemsFor(ticker, filingType, date)
    .map(({ part, items }) =>
      [
        part ? `<p><b>${part}</b></p>` : "",
        ...items.map(
          (item) =>
            `<p><b>${item.header}</b></p><p>${item.body}</p>${item.table ? renderTableHtml(item.table) : ""}`,
        ),
      ].join(""),
    )
    .join("");

  return `<html><head><title>${ticker} ${filingType}</title></head><body><p>${ticker} Form ${filingType}</p>${parts}</body></html>`;
};

/**
 * Deterministic filings for local runs without EDGAR access.
 */
export class MockDocumentSource implements DocumentSourcePort {
  async listFilings(
    ticker: string,
    filingTypes: readonly FilingType[],
  ): Promise<Result<FilingReference[], AppBoundaryError>> {
    const symbol = ticker.toUpperCase();

    return ok(
      filingTypes.flatMap((filingType) =>
        mockFilingDates[filingType].map((filingDate, index) => ({
          ticker: symbol,
          filingType,
          filingDate,
          accessionNo: `0000000000-${filingDate.slice(2, 4)}-${String(index + 1).padStart(6, "0")}`,
          sourceUrl: `mock://filings/${symbol}/${filingType}/${filingDate}`,
        })),
      ),
    );
  }

  async fetchDocument(
    reference: FilingReference,
  ): Promise<Result<FilingDocument, AppBoundaryError>> {
    return ok({
      ...reference,
      markup: renderMockFiling(
        reference.ticker,
        reference.filingType,
        reference.filingDate,
      ),
    });
  }
}
