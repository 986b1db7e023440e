import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import { getEnv } from "./config/rawEnv.js";
import { log } from "./utils/logger.js";

const dbLog = log.withScope("db");

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

function bootstrapDbAtPath(dbPath: string): Database.Database {
  assertTestDbPathSafety(dbPath);
  ensureDirFor(dbPath);
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  db.exec(getSchemaSql());
  return db;
}

/**
 * Open (or reuse) the single connection for a database file.
 * All writes go through this one handle, which serializes them.
 */
export function openDatabase(dbPath: string): Database.Database {
  const resolved = path.resolve(dbPath);
  const existing = dbByPath.get(resolved);
  if (existing?.open) {
    dbLog.debug("Reusing open database", { dbPath: resolved });
    return existing;
  }

  const db = bootstrapDbAtPath(resolved);
  dbByPath.set(resolved, db);
  dbLog.info("Opened database", { dbPath: resolved });
  return db;
}

export function closeDatabase(dbPath: string): void {
  const resolved = path.resolve(dbPath);
  const db = dbByPath.get(resolved);
  if (!db) return;
  dbByPath.delete(resolved);
  if (db.open) db.close();
}
