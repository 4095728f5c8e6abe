/**
 * mysql2-backed admin handle.
 *
 * ProxySQL's admin interface speaks the MySQL protocol. One connection is
 * shared by all scrapers of an exporter; mysql2 queues concurrent queries
 * on it.
 */

import { createConnection, type Connection, type RowDataPacket } from "mysql2/promise";
import type { BaseLogger } from "pino";
import type { AdminRow } from "@proxysql-exporter/shared";
import type { AdminDb } from "./admin-db.js";
import type { AdminDsn } from "./dsn.js";
import { withTimeout } from "./timeout.js";
import { TimeoutError } from "../errors.js";

export interface MysqlAdminDbOptions {
  dsn: AdminDsn;
  /** Connect and per-query timeout in ms */
  timeoutMs: number;
  logger: BaseLogger;
}

export class MysqlAdminDb implements AdminDb {
  private connection: Connection;
  private timeoutMs: number;
  private broken: Error | null = null;

  constructor(connection: Connection, timeoutMs: number, logger: BaseLogger) {
    this.connection = connection;
    this.timeoutMs = timeoutMs;
    // Without a listener a fatal protocol error would crash the process
    connection.on("error", (err: Error) => {
      this.broken = err;
      logger.warn({ err }, "admin connection error");
    });
  }

  static async connect(options: MysqlAdminDbOptions): Promise<MysqlAdminDb> {
    const { dsn } = options;
    const connection = await createConnection({
      host: dsn.host,
      port: dsn.port,
      socketPath: dsn.socketPath,
      user: dsn.user,
      password: dsn.password,
      database: dsn.database,
      connectTimeout: options.timeoutMs,
    });
    return new MysqlAdminDb(connection, options.timeoutMs, options.logger);
  }

  async query(sql: string): Promise<AdminRow[]> {
    const [rows, fields] = await this.connection.query<RowDataPacket[]>({
      sql,
      timeout: this.timeoutMs,
    });
    return rows.map((row) =>
      fields.map((field): readonly [string, string | null] => [field.name, toText(row[field.name])]),
    );
  }

  /** mysql2 puts no timeout on COM_PING; a stalled socket is destroyed */
  async ping(): Promise<void> {
    if (this.broken) throw this.broken;
    try {
      await withTimeout(this.connection.ping(), this.timeoutMs, "admin ping");
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.broken = err;
        this.connection.destroy();
      }
      throw err;
    }
  }

  async close(): Promise<void> {
    if (this.broken) {
      this.connection.destroy();
      return;
    }
    await this.connection.end();
  }
}

/** Admin tables are loosely typed; everything becomes text or NULL */
export function toText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value;
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  if (value instanceof Date) return value.toISOString();
  return String(value);
}
