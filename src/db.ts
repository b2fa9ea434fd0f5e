import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import { getEnv } from "./config/rawEnv.js";
import { log } from "./utils/logger.js";

const dbLog = log.withScope("db");

export const IN_MEMORY_DB = ":memory:";

const dbByPath = new Map<string, Database.Database>();
let schemaSqlCache: string | null = null;

function assertTestDbPathSafety(dbPath: string): void {
  if (getEnv("NODE_ENV") !== "test") return;

  const resolvedDbPath = path.resolve(dbPath);
  const resolvedTmpRoot = path.resolve(os.tmpdir());
  const normalize = (value: string) => path.normalize(value).toLowerCase();

  if (!normalize(resolvedDbPath).startsWith(normalize(resolvedTmpRoot + path.sep))) {
    throw new Error(
      `[db-test-safety] Refusing non-temp DB path in test mode: ${resolvedDbPath}. Expected under ${resolvedTmpRoot}`,
    );
  }
}

function ensureDirFor(dbPath: string) {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

function getSchemaSql(): string {
  if (schemaSqlCache) return schemaSqlCache;
  const schemaPath = path.join(process.cwd(), "src", "db", "schema.sql");
  schemaSqlCache = fs.readFileSync(schemaPath, "utf8");
  return schemaSqlCache;
}

function hasColumn(db: Database.Database, table: string, column: string): boolean {
  const columns: unknown = db.pragma(`table_info(${table})`);
  if (!Array.isArray(columns)) return false;
  return columns.some(
    (col: unknown) => typeof col === "object" && col !== null && "name" in col && col.name === column
  );
}

function applyMigrations(db: Database.Database): void {
  // guild_config rows written before audit mirroring existed have no webhook flag
  if (!hasColumn(db, "guild_config", "webhook_enabled")) {
    dbLog.info("Migrating: Adding webhook_enabled to guild_config");
    db.exec("ALTER TABLE guild_config ADD COLUMN webhook_enabled INTEGER NOT NULL DEFAULT 1");
  }
}

function bootstrapDb(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY_DB) {
    assertTestDbPathSafety(dbPath);
    ensureDirFor(dbPath);
  }
  const db = new Database(dbPath);
  if (dbPath !== IN_MEMORY_DB) {
    db.pragma("journal_mode = WAL");
  }
  db.exec(getSchemaSql());
  applyMigrations(db);
  return db;
}

export function resolveStateDbPath(dataRoot: string, filename: string): string {
  return path.resolve(dataRoot, filename);
}

/**
 * Open (or reuse) the state database at `dbPath`. `:memory:` always opens a fresh,
 * uncached database.
 */
export function openStateDb(dbPath: string): Database.Database {
  if (dbPath === IN_MEMORY_DB) {
    return bootstrapDb(dbPath);
  }

  const resolved = path.resolve(dbPath);
  const existing = dbByPath.get(resolved);
  if (existing?.open) {
    dbLog.debug("db-route", { dbPath: resolved, status: "cache-hit" });
    return existing;
  }

  const db = bootstrapDb(resolved);
  dbByPath.set(resolved, db);
  dbLog.debug("db-route", { dbPath: resolved, status: "opened-new" });
  return db;
}

export function closeStateDb(dbPath: string): void {
  const resolved = path.resolve(dbPath);
  const db = dbByPath.get(resolved);
  if (!db) return;
  dbByPath.delete(resolved);
  if (db.open) db.close();
}
