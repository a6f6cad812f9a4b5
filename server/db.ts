/**
 * Database Connection
 *
 * Purpose:
 * Shared Drizzle connection over the Neon HTTP driver, plus the read-only
 * DataStore the SQL agent executes validated queries through.
 *
 * Every query runs in its own transaction that is marked READ ONLY and carries
 * a statement timeout, so a query that slipped past validation still cannot
 * write or run unbounded.
 *
 * Layer: Infrastructure
 */

import { drizzle, type NeonHttpDatabase } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";
import { sql } from "drizzle-orm";
import type { QueryRow } from "@shared/schema";
import { DataStoreError, type DataStoreErrorKind } from "./utils/errorHandler";
import { TimeoutError, withTimeout } from "./utils/retry";
import { DATA_STORE_CONSTANTS } from "./config/constants";

let _db: NeonHttpDatabase | null = null;

export function getDb(databaseUrl = process.env.DATABASE_URL): NeonHttpDatabase {
  if (!_db) {
    if (!databaseUrl) {
      throw new Error("DATABASE_URL is not set");
    }
    _db = drizzle(neon(databaseUrl));
  }
  return _db;
}

export type RunOptions = {
  statementTimeoutMs: number;
};

export interface DataStore {
  runReadOnly(query: string, options: RunOptions): Promise<QueryRow[]>;
}

function readSqlState(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  if (error instanceof Error && error.cause !== undefined) {
    return readSqlState(error.cause);
  }
  return undefined;
}

export function classifySqlState(code: string | undefined): DataStoreErrorKind {
  if (!code) return "unknown";
  if (code === "42601" || code === "42703" || code === "42P01" || code === "42883" || code === "22P02") {
    return "syntax";
  }
  if (code === "42501" || code === "25006") return "permission";
  if (code === "57014") return "timeout";
  if (code.startsWith("08")) return "connection";
  return "unknown";
}

export function toDataStoreError(error: unknown): DataStoreError {
  if (error instanceof DataStoreError) return error;
  if (error instanceof TimeoutError) {
    return new DataStoreError("timeout", error.message);
  }
  const code = readSqlState(error);
  const message = error instanceof Error ? error.message : String(error);
  return new DataStoreError(classifySqlState(code), message, code);
}

export class NeonDataStore implements DataStore {
  constructor(private readonly getDatabase: () => NeonHttpDatabase = () => getDb()) {}

  async runReadOnly(query: string, options: RunOptions): Promise<QueryRow[]> {
    const timeoutMs = Math.max(1, Math.floor(options.statementTimeoutMs));
    try {
      const db = this.getDatabase();
      const [, , result] = await withTimeout(
        db.batch([
          db.execute(sql.raw("SET TRANSACTION READ ONLY")),
          db.execute(sql.raw(`SET LOCAL statement_timeout = ${timeoutMs}`)),
          db.execute(sql.raw(query)),
        ]),
        timeoutMs + DATA_STORE_CONSTANTS.CLIENT_GUARD_GRACE_MS,
        "Query execution timed out",
      );
      return result.rows;
    } catch (error) {
      throw toDataStoreError(error);
    }
  }
}
