import mysql from "mysql2/promise";
import type { Pool, ResultSetHeader, RowDataPacket } from "mysql2/promise";
import type { DatabaseConfig } from "../../lib/config.ts";
import { debug } from "../../lib/log.ts";

export type Row = Record<string, unknown>;

export type WriteResult = {
  insertId: number;
  affectedRows: number;
  changedRows: number;
};

/** The two query shapes the comment store issues. */
export interface SqlExecutor {
  rows(sql: string, params?: unknown[]): Promise<Row[]>;
  run(sql: string, params?: unknown[]): Promise<WriteResult>;
}

export function createPool(config: DatabaseConfig): Pool {
  debug(
    config.socketPath
      ? `connecting to ${config.database} via ${config.socketPath} as ${config.user}`
      : `connecting to ${config.database} at ${config.host}:${config.port} as ${config.user}`,
  );
  return mysql.createPool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    socketPath: config.socketPath,
    connectionLimit: 1,
    waitForConnections: true,
    queueLimit: 0,
    // Keep DATETIME columns as the strings stored by the CMS
    dateStrings: true,
    charset: "utf8mb4",
  });
}

export function poolExecutor(pool: Pool): SqlExecutor {
  return {
    async rows(sql, params = []) {
      debug(`${sql} ${JSON.stringify(params)}`);
      const [rows] = await pool.query<RowDataPacket[]>(sql, params);
      return rows;
    },
    async run(sql, params = []) {
      debug(`${sql} ${JSON.stringify(params)}`);
      const [result] = await pool.query<ResultSetHeader>(sql, params);
      return {
        insertId: result.insertId,
        affectedRows: result.affectedRows,
        changedRows: result.changedRows,
      };
    },
  };
}
