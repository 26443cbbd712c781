import {
  boolean,
  date,
  index,
  integer,
  jsonb,
  pgTable,
  serial,
  text,
  timestamp,
  vector,
} from "drizzle-orm/pg-core";
import type { FilingCategory, FilingType } from "../../core/entities/filing";
import type { FilingIndexStatusRecord } from "../../core/entities/indexStatus";

export const EMBEDDING_COLUMN_DIMENSIONS = 1536;

export const filingChunksTable = pgTable(
  "filing_chunks",
  {
    id: serial("id").primaryKey(),
    runId: text("run_id").notNull(),
    /** False while the run is staged; search only sees committed rows. */
    committed: boolean("committed").notNull().default(false),
    ticker: text("ticker").notNull(),
    filingType: text("filing_type").$type<FilingType>().notNull(),
    filingDate: date("filing_date", { mode: "string" }).notNull(),
    accessionNo: text("accession_no"),
    sectionName: text("section_name").notNull(),
    itemCode: text("item_code").notNull(),
    category: text("category").$type<FilingCategory>().notNull(),
    topics: jsonb("topics").$type<string[]>().notNull(),
    text: text("text").notNull(),
    tokenCount: integer("token_count").notNull(),
    isTable: boolean("is_table").notNull(),
    chunkIndex: integer("chunk_index").notNull(),
    embedding: vector("embedding", {
      dimensions: EMBEDDING_COLUMN_DIMENSIONS,
    }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    tickerRunIdx: index("filing_chunks_ticker_run_idx").on(
      table.ticker,
      table.runId,
    ),
    tickerTypeIdx: index("filing_chunks_ticker_type_idx").on(
      table.ticker,
      table.filingType,
    ),
    embeddingIdx: index("filing_chunks_embedding_hnsw_idx").using(
      "hnsw",
      table.embedding.op("vector_cosine_ops"),
    ),
  }),
);

export const filingIndexStatusTable = pgTable("filing_index_status", {
  ticker: text("ticker").primaryKey(),
  status: text("status").$type<FilingIndexStatusRecord["status"]>().notNull(),
  filingsIndexed: integer("filings_indexed").notNull().default(0),
  chunksTotal: integer("chunks_total").notNull().default(0),
  lastIndexedAt: timestamp("last_indexed_at", { withTimezone: true }),
  lastFilingDate: date("last_filing_date", { mode: "string" }),
  errorMessage: text("error_message"),
  currentRunId: text("current_run_id"),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});
