import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import { createVectorSql, resolveVectorOid, type VectorSql } from "./vectorCodec";

export type DbClients = {
  db: PostgresJsDatabase<Record<string, never>>;
  sql: VectorSql;
  close: () => Promise<void>;
};

/**
 * Builds the ORM client for status rows and the raw SQL pool, with the vector
 * codec registered, for chunk storage and similarity search.
 */
export const createDb = async (connectionString: string): Promise<DbClients> => {
  const oid = await resolveVectorOid(connectionString);
  const sql = createVectorSql(connectionString, oid);
  const ormClient = postgres(connectionString, { max: 5 });
  const db = drizzle(ormClient);

  return {
    db,
    sql,
    close: async () => {
      await Promise.all([sql.end(), ormClient.end()]);
    },
  };
};
