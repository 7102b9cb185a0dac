import { Kysely, PostgresDialect } from "kysely";
import pg from "pg";
import type { CartDatabase } from "./db-schema.js";

export type DatabaseExecutor = Kysely<CartDatabase>;

export function createDb(connectionString: string): DatabaseExecutor {
  return new Kysely<CartDatabase>({
    dialect: new PostgresDialect({
      pool: new pg.Pool({ connectionString }),
    }),
  });
}

/**
 * Durable store failures are fatal to the call that hit them, but the caller
 * may retry the whole operation once the transaction has rolled back.
 */
export class DatabaseError extends Error {
  readonly retryable = true;

  constructor({ message, cause }: { message: string; cause: unknown }) {
    super(message, { cause });
    this.name = "DatabaseError";
  }
}

export async function dbQuery<A>(run: () => Promise<A>, errorMessage: string) {
  try {
    return await run();
  } catch (error) {
    if (error instanceof DatabaseError) throw error;
    throw new DatabaseError({ message: errorMessage, cause: error });
  }
}

/**
 * Runs `fn` in a transaction, or directly on `db` when it already is one.
 */
export async function withTransaction<A>(
  db: DatabaseExecutor,
  fn: (trx: DatabaseExecutor) => Promise<A>,
): Promise<A> {
  if (db.isTransaction) return fn(db);
  return db.transaction().execute((trx) => fn(trx));
}
