import * as cheerio from "cheerio";
import type {
  ContentBlock,
  FilingType,
  Section,
} from "../../core/entities/filing";
import { logger, type Logger } from "../../shared/logger/logger";
import { taxonomyFor, type FilingTaxonomy } from "./filingTypes";
import {
  extractTableRows,
  flattenTable,
  LAYOUT_TABLE_MAX_CHARS,
  normalizeTableRows,
  renderTable,
} from "./tableRenderer";

export type SectionParserOptions = {
  /** Fewer detected sections than this collapses the document into one `general` section. */
  minSectionCount: number;
  /** Sections without tables and with less text than this are treated as bare headers. */
  minSectionChars: number;
};

export const defaultSectionParserOptions: SectionParserOptions = {
  minSectionCount: 2,
  minSectionChars: 50,
};

export const FULL_DOCUMENT_SECTION = {
  sectionName: "Full Document",
  itemCode: "full_document",
  category: "general",
} as const;

/** Longest line still considered a header rather than a paragraph that starts with "Item". */
const MAX_HEADER_LINE_CHARS = 150;

const ITEM_HEADER = /^(?:ITEM|Item)\s+(\d+(?:[A-Ca-c])?(?:\.\d{2})?)(?=\s*[.:\-—–]|\s|$)/;
const PART_HEADER = /^PART\s+(IV|III|II|I)\b/i;
const PART_NUMBERS: Readonly<Record<string, string>> = {
  I: "1",
  II: "2",
  III: "3",
  IV: "4",
};
const TABLE_PLACEHOLDER = /\[\[TABLE_(\d+)\]\]/g;
const TABLE_OF_CONTENTS = /^table of contents?$/i;

const BLOCK_ELEMENTS =
  "p, div, tr, li, h1, h2, h3, h4, h5, h6, section, article, blockquote, center, pre, ul, ol, dt, dd";

type ItemMatch = {
  itemCode: string;
  line: number;
  bodyStartsOnSameLine: string | null;
};

const placeholderFor = (index: number): string => `[[TABLE_${index}]]`;

/**
 * Splits filing markup into item sections. Tables are lifted out of the text
 * flow first, so each survives as one rendered block inside its section.
 */
export class SectionParser {
  constructor(
    private readonly options: SectionParserOptions = defaultSectionParserOptions,
    private readonly log: Logger = logger.child({ component: "section-parser" }),
  ) {}

  parse(markup: string, filingType: FilingType): Section[] {
    const { lines, tables } = this.toLines(markup);
    const taxonomy = taxonomyFor(filingType);
    const sections = this.detectSections(lines, tables, taxonomy);

    if (sections.length >= this.options.minSectionCount) {
      this.log.debug(
        {
          filingType,
          sections: sections.map((section) => section.itemCode),
        },
        "Parsed filing sections",
      );
      return sections;
    }

    this.log.warn(
      { filingType, detected: sections.length },
      "Section detection below threshold, using full document",
    );

    return [
      {
        ...FULL_DOCUMENT_SECTION,
        blocks: this.toBlocks(lines, tables),
      },
    ];
  }

  /**
   * Flattens markup into trimmed, non-empty lines. Data tables are replaced by
   * placeholder lines and returned rendered; layout tables are unwrapped into text.
   */
  private toLines(markup: string): { lines: string[]; tables: string[] } {
    const $ = cheerio.load(markup);
    $("script, style, head, noscript, meta, link").remove();

    const tables: string[] = [];
    $("table")
      .filter((_, element) => $(element).parents("table").length === 0)
      .each((_, element) => {
        const rows = normalizeTableRows(extractTableRows($, element));
        const flat = flattenTable(rows);

        if (flat.length < LAYOUT_TABLE_MAX_CHARS) {
          $(element).replaceWith($("<div></div>").text(flat));
          return;
        }

        tables.push(renderTable(rows));
        $(element).replaceWith(
          `<div>${placeholderFor(tables.length - 1)}</div>`,
        );
      });

    $("br").replaceWith("\n");
    $(BLOCK_ELEMENTS).each((_, element) => {
      $(element).prepend("\n").append("\n");
    });

    const lines = $.root()
      .text()
      .split("\n")
      .map((line) => line.replace(/[\s\u200b]+/g, " ").trim())
      .filter((line) => line.length > 0 && !TABLE_OF_CONTENTS.test(line));

    return { lines, tables };
  }

  private findItemHeaders(
    lines: string[],
    taxonomy: FilingTaxonomy,
  ): ItemMatch[] {
    const lastByCode = new Map<string, ItemMatch>();
    let part: string | null = null;

    lines.forEach((line, index) => {
      const partMatch = PART_HEADER.exec(line);
      if (partMatch?.[1] && line.length <= MAX_HEADER_LINE_CHARS) {
        part = PART_NUMBERS[partMatch[1].toUpperCase()] ?? null;
        return;
      }

      const itemMatch = ITEM_HEADER.exec(line);
      if (!itemMatch?.[1]) {
        return;
      }

      const rawCode = itemMatch[1].toUpperCase();
      const itemCode =
        taxonomy.partQualified && part ? `P${part}-${rawCode}` : rawCode;
      const remainder = line.slice(itemMatch[0].length);

      // First occurrences are usually the table of contents.
      lastByCode.set(itemCode, {
        itemCode,
        line: index,
        bodyStartsOnSameLine:
          line.length > MAX_HEADER_LINE_CHARS
            ? remainder.replace(/^\s*[.:\-—–]?\s*/, "")
            : null,
      });
    });

    return [...lastByCode.values()].sort((left, right) => left.line - right.line);
  }

  private detectSections(
    lines: string[],
    tables: string[],
    taxonomy: FilingTaxonomy,
  ): Section[] {
    const headers = this.findItemHeaders(lines, taxonomy);
    const sections: Section[] = [];

    headers.forEach((header, index) => {
      const definition = taxonomy.items[header.itemCode];
      if (!definition) {
        return;
      }

      const end = headers[index + 1]?.line ?? lines.length;
      const body = lines
        .slice(header.line + 1, end)
        .filter(
          (line) =>
            !(PART_HEADER.test(line) && line.length <= MAX_HEADER_LINE_CHARS),
        );
      if (header.bodyStartsOnSameLine) {
        body.unshift(header.bodyStartsOnSameLine);
      }

      const blocks = this.toBlocks(body, tables);
      const hasTable = blocks.some((block) => block.kind === "table");
      const textLength = blocks
        .filter((block) => block.kind === "text")
        .reduce((total, block) => total + block.text.length, 0);

      if (!hasTable && textLength < this.options.minSectionChars) {
        return;
      }

      sections.push({
        sectionName: definition.name,
        itemCode: header.itemCode,
        category: definition.category,
        blocks,
      });
    });

    return sections;
  }

  /**
   * Groups lines into text blocks separated by the tables that sat between them.
   */
  private toBlocks(lines: string[], tables: string[]): ContentBlock[] {
    const blocks: ContentBlock[] = [];
    let buffer: string[] = [];

    const flush = () => {
      const text = buffer.join("\n").trim();
      if (text) {
        blocks.push({ kind: "text", text });
      }
      buffer = [];
    };

    for (const line of lines) {
      let cursor = 0;
      for (const match of line.matchAll(TABLE_PLACEHOLDER)) {
        const start = match.index ?? 0;
        const before = line.slice(cursor, start).trim();
        if (before) {
          buffer.push(before);
        }

        const table = tables[Number(match[1])];
        if (table) {
          flush();
          blocks.push({ kind: "table", text: table });
        }
        cursor = start + match[0].length;
      }

      const rest = line.slice(cursor).trim();
      if (rest) {
        buffer.push(rest);
      }
    }

    flush();
    return blocks;
  }
}
