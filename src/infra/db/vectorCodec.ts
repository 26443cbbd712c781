import postgres from "postgres";

/**
 * pgvector text form: `[0.1,0.2,...]`.
 */
export const serializeVector = (value: number[]): string =>
  `[${value.join(",")}]`;

export const parseVector = (raw: string): number[] => {
  const body = raw.trim().replace(/^\[/, "").replace(/\]$/, "");
  return body ? body.split(",").map(Number) : [];
};

/**
 * Custom type registration for the `vector` column. postgres.js installs it
 * on every connection the pool opens, so values bound with
 * `sql.typed.vector(...)` go out as the extension type and `vector` columns
 * come back as number arrays.
 */
export const vectorType = (oid: number) => ({
  to: oid,
  from: [oid],
  serialize: serializeVector,
  parse: parseVector,
});

export type VectorSql = postgres.Sql<{ vector: number[] }>;

/**
 * Ensures the extension exists and returns the oid of its `vector` type.
 * The oid differs per database, so it is read once before the pool is built.
 */
export const resolveVectorOid = async (
  connectionString: string,
): Promise<number> => {
  const bootstrap = postgres(connectionString, { max: 1 });

  try {
    await bootstrap`CREATE EXTENSION IF NOT EXISTS vector`;
    const [row] = await bootstrap<Array<{ oid: number }>>`
      SELECT oid::int AS oid FROM pg_type WHERE typname = 'vector'
    `;
    if (!row) {
      throw new Error("pgvector type 'vector' is not installed in this database.");
    }
    return row.oid;
  } finally {
    await bootstrap.end();
  }
};

export const createVectorSql = (
  connectionString: string,
  oid: number,
  max = 10,
): VectorSql =>
  postgres(connectionString, {
    max,
    types: { vector: vectorType(oid) },
  });
