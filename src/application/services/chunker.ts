import type { ChunkDraft } from "../../core/entities/chunk";
import type { Section } from "../../core/entities/filing";
import type { TokenEstimatorPort } from "../../core/ports/outboundPorts";
import { logger, type Logger } from "../../shared/logger/logger";

export type ChunkerOptions = {
  maxTokens: number;
  overlapTokens: number;
  /** Blocks above this size are still emitted whole, only logged. */
  hardCeilingTokens: number;
};

export const defaultChunkerOptions: ChunkerOptions = {
  maxTokens: 512,
  overlapTokens: 50,
  hardCeilingTokens: 8191,
};

const REPLACEMENT_CHARACTER = "\uFFFD";
/** A UTF-8 character spans at most four bytes, so at most three cut points. */
const MAX_CHARACTER_SPLIT = 3;

/**
 * Splits sections into token windows. Works one section at a time, so no
 * chunk can carry text from two sections; tables are never split or merged.
 */
export class FilingChunker {
  constructor(
    private readonly estimator: TokenEstimatorPort,
    private readonly options: ChunkerOptions = defaultChunkerOptions,
    private readonly log: Logger = logger.child({ component: "chunker" }),
  ) {
    if (options.overlapTokens >= options.maxTokens) {
      throw new Error(
        `Chunk overlap (${options.overlapTokens}) must be smaller than chunk size (${options.maxTokens}).`,
      );
    }
  }

  /**
   * Chunks every section of one filing with a filing-wide running `chunkIndex`.
   */
  chunkSections(sections: Section[]): ChunkDraft[] {
    const chunks: ChunkDraft[] = [];
    for (const section of sections) {
      chunks.push(...this.chunkSection(section, chunks.length));
    }
    return chunks;
  }

  /**
   * Text windows come first, then the section's tables in source order.
   */
  chunkSection(section: Section, firstIndex = 0): ChunkDraft[] {
    const text = section.blocks
      .filter((block) => block.kind === "text")
      .map((block) => block.text)
      .join("\n\n");

    const pieces: Array<{ text: string; tokenCount: number; isTable: boolean }> =
      this.splitText(text).map((window) => ({ ...window, isTable: false }));

    for (const block of section.blocks) {
      if (block.kind !== "table") {
        continue;
      }

      const tokenCount = this.estimator.count(block.text);
      if (tokenCount > this.options.hardCeilingTokens) {
        this.log.warn(
          {
            section: section.sectionName,
            tokenCount,
            ceiling: this.options.hardCeilingTokens,
          },
          "Table exceeds hard token ceiling, keeping it whole",
        );
      }
      pieces.push({ text: block.text, tokenCount, isTable: true });
    }

    return pieces.map((piece, offset) => ({
      sectionName: section.sectionName,
      itemCode: section.itemCode,
      category: section.category,
      text: piece.text,
      tokenCount: piece.tokenCount,
      isTable: piece.isTable,
      chunkIndex: firstIndex + offset,
    }));
  }

  /**
   * Slides a `maxTokens` window forward, keeping `overlapTokens` of the
   * previous window, until the window reaches the end of the text. Window
   * edges are pulled back off token boundaries that split a character.
   */
  splitText(text: string): Array<{ text: string; tokenCount: number }> {
    const trimmed = text.trim();
    if (!trimmed) {
      return [];
    }

    const tokens = this.estimator.encode(trimmed);
    const { maxTokens, overlapTokens } = this.options;
    if (tokens.length <= maxTokens) {
      return [{ text: trimmed, tokenCount: tokens.length }];
    }

    const windows: Array<{ text: string; tokenCount: number }> = [];
    let start = 0;

    for (;;) {
      const end = this.alignEnd(
        tokens,
        start,
        Math.min(start + maxTokens, tokens.length),
      );
      const windowText = this.estimator.decode(tokens.slice(start, end));
      windows.push({
        text: windowText,
        tokenCount: this.estimator.count(windowText),
      });

      if (end >= tokens.length) {
        break;
      }

      start = this.alignStart(
        tokens,
        Math.max(end - overlapTokens, start + 1),
        start,
        end,
      );
    }

    return windows;
  }

  private alignEnd(tokens: number[], start: number, end: number): number {
    let aligned = end;
    for (
      let step = 0;
      step < MAX_CHARACTER_SPLIT &&
      aligned < tokens.length &&
      aligned - start > 1 &&
      this.estimator.decode(tokens.slice(start, aligned)).endsWith(REPLACEMENT_CHARACTER);
      step += 1
    ) {
      aligned -= 1;
    }
    return aligned;
  }

  private alignStart(
    tokens: number[],
    candidate: number,
    previousStart: number,
    end: number,
  ): number {
    let aligned = candidate;
    for (
      let step = 0;
      step < MAX_CHARACTER_SPLIT &&
      aligned - 1 > previousStart &&
      this.estimator.decode(tokens.slice(aligned, end)).startsWith(REPLACEMENT_CHARACTER);
      step += 1
    ) {
      aligned -= 1;
    }
    return aligned;
  }
}
