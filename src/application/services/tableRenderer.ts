import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

/** Tables whose whole text is shorter than this are page layout, not data. */
export const LAYOUT_TABLE_MAX_CHARS = 30;

const collapse = (value: string): string =>
  value.replace(/[\s\u200b]+/g, " ").trim();

const parseSpan = (raw: string | undefined): number => {
  const parsed = Number.parseInt(raw ?? "1", 10);
  return Number.isFinite(parsed) && parsed > 1 ? Math.min(parsed, 50) : 1;
};

/**
 * Reads a table into a cell grid. A cell spanning several columns keeps its
 * text in the first slot and leaves the rest empty, so later rows stay aligned.
 */
export const extractTableRows = ($: CheerioAPI, table: Element): string[][] => {
  const rows: string[][] = [];

  $(table)
    .find("tr")
    .each((_, row) => {
      const cells: string[] = [];
      $(row)
        .children("th, td")
        .each((__, cell) => {
          cells.push(collapse($(cell).text()));
          const span = parseSpan($(cell).attr("colspan"));
          for (let extra = 1; extra < span; extra += 1) {
            cells.push("");
          }
        });
      rows.push(cells);
    });

  return rows;
};

const isPrefixCell = (cell: string): boolean => /^[$€£¥]$/.test(cell);

const isSuffixCell = (cell: string): boolean => /^(?:\)|%|\)%|%\))$/.test(cell);

/**
 * Filings put currency signs and closing parentheses of negatives in their own
 * cells. Folds them into the neighbouring value before columns are pruned.
 */
const foldAffixCells = (row: string[]): string[] => {
  const folded = [...row];

  for (let index = 0; index < folded.length; index += 1) {
    const cell = folded[index] ?? "";

    if (isPrefixCell(cell)) {
      const next = folded.findIndex(
        (candidate, position) => position > index && candidate !== "",
      );
      if (next !== -1) {
        folded[next] = `${cell}${folded[next] ?? ""}`;
        folded[index] = "";
      }
      continue;
    }

    if (isSuffixCell(cell)) {
      for (let previous = index - 1; previous >= 0; previous -= 1) {
        const candidate = folded[previous] ?? "";
        if (candidate !== "") {
          folded[previous] = `${candidate}${cell}`;
          folded[index] = "";
          break;
        }
      }
    }
  }

  return folded;
};

/**
 * Normalizes a raw cell grid: folds affix cells, then drops empty rows and
 * columns that are empty in every remaining row.
 */
export const normalizeTableRows = (rows: string[][]): string[][] => {
  const width = Math.max(0, ...rows.map((row) => row.length));
  const padded = rows
    .map((row) => foldAffixCells(row))
    .map((row) => [...row, ...Array<string>(width - row.length).fill("")])
    .filter((row) => row.some((cell) => cell !== ""));

  const keptColumns: number[] = [];
  for (let column = 0; column < width; column += 1) {
    if (padded.some((row) => (row[column] ?? "") !== "")) {
      keptColumns.push(column);
    }
  }

  return padded.map((row) => keptColumns.map((column) => row[column] ?? ""));
};

/**
 * Renders a normalized grid as an aligned pipe table with the first row as header.
 */
export const renderTable = (rows: string[][]): string => {
  const first = rows[0];
  if (!first || first.length === 0) {
    return "";
  }

  const widths = first.map((_, column) =>
    Math.max(3, ...rows.map((row) => (row[column] ?? "").length)),
  );

  const renderRow = (row: string[]): string =>
    `| ${widths.map((width, column) => (row[column] ?? "").padEnd(width)).join(" | ")} |`;

  const separator = `|${widths.map((width) => "-".repeat(width + 2)).join("|")}|`;

  return [
    renderRow(first),
    separator,
    ...rows.slice(1).map((row) => renderRow(row)),
  ].join("\n");
};

/**
 * Plain text of a grid, used when a layout table is unwrapped into the text flow.
 */
export const flattenTable = (rows: string[][]): string =>
  rows
    .map((row) => row.filter((cell) => cell !== "").join(" "))
    .filter(Boolean)
    .join("\n");
