/**
 * Store factory: resolves the database connection and hands a CommentStore
 * to one command. The pool lives for a single invocation and is always closed.
 */
import { resolveDatabaseConfig, type DatabaseConfig } from "../lib/config.ts";
import type { CommentStore } from "./interface.ts";
import { createPool, poolExecutor } from "./mysql/pool.ts";
import { MysqlCommentStore } from "./mysql/store.ts";

export type StoreRunner = <T>(fn: (store: CommentStore) => Promise<T>) => Promise<T>;

export async function withStore<T>(
  fn: (store: CommentStore) => Promise<T>,
  config: DatabaseConfig = resolveDatabaseConfig(),
): Promise<T> {
  const pool = createPool(config);
  const store = new MysqlCommentStore(poolExecutor(pool), {
    tablePrefix: config.tablePrefix,
  });
  try {
    return await fn(store);
  } finally {
    await pool.end();
  }
}
