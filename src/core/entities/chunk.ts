import type { FilingCategory, FilingType } from "./filing";

/**
 * Chunk as produced by the chunker, before tagging and embedding.
 */
export type ChunkDraft = {
  sectionName: string;
  itemCode: string;
  category: FilingCategory;
  text: string;
  tokenCount: number;
  isTable: boolean;
  chunkIndex: number;
};

export type FilingChunk = ChunkDraft & {
  ticker: string;
  filingType: FilingType;
  filingDate: string;
  accessionNo?: string;
  topics: string[];
  embedding: number[];
};

export type StoredChunk = Omit<FilingChunk, "embedding"> & {
  id: number;
  runId: string;
};

export type SearchHit = {
  chunk: StoredChunk;
  similarity: number;
};

export type ChunkSearchQuery = {
  queryVector: number[];
  ticker: string;
  filingTypes?: FilingType[];
  categories?: FilingCategory[];
  minFilingDate?: string;
  limit: number;
};
