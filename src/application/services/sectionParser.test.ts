import { describe, expect, it } from "vitest";
import { renderMockFiling } from "../../infra/providers/mocks/mockDocumentSource";
import { FULL_DOCUMENT_SECTION, SectionParser } from "./sectionParser";

const filler =
  "The company discussed this topic at length, including several material considerations for investors.";

describe("SectionParser", () => {
  const parser = new SectionParser();

  it("splits an annual report into taxonomy items", () => {
    const sections = parser.parse(
      renderMockFiling("ACME", "10-K", "2025-02-14"),
      "10-K",
    );

    expect(sections.map((section) => section.itemCode)).toEqual([
      "1",
      "1A",
      "3",
      "7",
      "8",
    ]);
    expect(sections.map((section) => section.category)).toEqual([
      "business_overview",
      "risk_factors",
      "legal",
      "financial_discussion",
      "financial_statements",
    ]);
    expect(sections[1]?.sectionName).toBe("Item 1A - Risk Factors");
  });

  it("keeps a data table as its own block after the text before it", () => {
    const sections = parser.parse(
      renderMockFiling("ACME", "10-K", "2025-02-14"),
      "10-K",
    );
    const statements = sections.find((section) => section.itemCode === "8");

    expect(statements?.blocks.map((block) => block.kind)).toEqual([
      "text",
      "table",
    ]);
    expect(statements?.blocks[1]?.text.split("\n")[0]).toBe(
      "| (in millions)    | 2025     | 2024     |",
    );
  });

  it("qualifies quarterly items with their part", () => {
    const sections = parser.parse(
      renderMockFiling("ACME", "10-Q", "2025-10-31"),
      "10-Q",
    );

    expect(sections.map((section) => section.itemCode)).toEqual([
      "P1-1",
      "P1-2",
      "P2-1A",
    ]);
    expect(sections[2]?.category).toBe("risk_factors");
    expect(
      sections[1]?.blocks.some((block) => block.text.includes("PART II")),
    ).toBe(false);
  });

  it("recognizes dotted current report items", () => {
    const sections = parser.parse(
      renderMockFiling("ACME", "8-K", "2025-11-04"),
      "8-K",
    );

    expect(
      sections.map((section) => [section.itemCode, section.category]),
    ).toEqual([
      ["2.02", "financial_discussion"],
      ["9.01", "regulatory"],
    ]);
  });

  it("uses the last occurrence of a header so the table of contents is skipped", () => {
    const markup = `
      <p>Table of Contents</p>
      <p>Item 1A. Risk Factors</p>
      <p>Item 7. Management's Discussion and Analysis</p>
      <p>Item 1A. Risk Factors</p>
      <p>Risk body. ${filler}</p>
      <p>Item 7. Management's Discussion and Analysis</p>
      <p>Discussion body. ${filler}</p>`;

    const sections = parser.parse(markup, "10-K");

    expect(sections.map((section) => section.itemCode)).toEqual(["1A", "7"]);
    expect(sections[0]?.blocks).toEqual([
      { kind: "text", text: `Risk body. ${filler}` },
    ]);
  });

  it("drops bare headers that carry no content", () => {
    const markup = `
      <p>Item 1. Business</p><p>${filler}</p>
      <p>Item 2. Properties</p><p>None.</p>
      <p>Item 3. Legal Proceedings</p><p>${filler}</p>`;

    expect(
      parser.parse(markup, "10-K").map((section) => section.itemCode),
    ).toEqual(["1", "3"]);
  });

  it("falls back to one general section below the detection threshold", () => {
    const markup = `<p>Item 1. Business</p><p>${filler}</p><p>Closing remarks.</p>`;

    expect(parser.parse(markup, "10-K")).toEqual([
      {
        ...FULL_DOCUMENT_SECTION,
        blocks: [
          {
            kind: "text",
            text: `Item 1. Business\n${filler}\nClosing remarks.`,
          },
        ],
      },
    ]);
  });

  it("unwraps layout tables into the surrounding text", () => {
    const markup = `<p>Intro line.</p><table><tr><td>Page</td><td>12</td></tr></table>`;

    expect(parser.parse(markup, "8-K")[0]?.blocks).toEqual([
      { kind: "text", text: "Intro line.\nPage 12" },
    ]);
  });

  it("honours a custom section threshold", () => {
    const strict = new SectionParser({ minSectionCount: 1, minSectionChars: 50 });
    const markup = `<p>Item 1A. Risk Factors</p><p>${filler}</p>`;

    expect(strict.parse(markup, "10-K").map((section) => section.itemCode)).toEqual([
      "1A",
    ]);
  });
});
