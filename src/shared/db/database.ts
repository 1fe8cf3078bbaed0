import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";

import Database from "better-sqlite3";

import { logger } from "../../config/logger.js";

export type SqliteDatabase = InstanceType<typeof Database>;

const IN_MEMORY_PATH = ":memory:";

const runMigrations = (db: SqliteDatabase): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS creators (
      id TEXT PRIMARY KEY,
      platform TEXT NOT NULL,
      platform_creator_id TEXT NOT NULL,
      platform_creator_username TEXT NOT NULL,
      platform_creator_display_name TEXT NOT NULL,
      email TEXT,
      whatsapp TEXT,
      creation_time TEXT NOT NULL,
      last_modification_time TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_creators_platform_username
      ON creators(platform, platform_creator_username);

    CREATE TABLE IF NOT EXISTS samples (
      id TEXT PRIMARY KEY,
      platform_product_id TEXT NOT NULL,
      platform_campaign_id TEXT,
      platform_creator_username TEXT,
      platform_creator_display_name TEXT,
      status TEXT,
      creation_time TEXT NOT NULL,
      last_modification_time TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_samples_creator_username ON samples(platform_creator_username);
  `);
};

export const openDatabase = (databasePath: string): SqliteDatabase => {
  const isInMemory = databasePath === IN_MEMORY_PATH;
  const dbPath = isInMemory ? IN_MEMORY_PATH : resolve(process.cwd(), databasePath);

  if (!isInMemory) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  if (!isInMemory) {
    db.pragma("journal_mode = WAL");
  }

  runMigrations(db);

  logger.info(`SQLite database initialized at ${dbPath}`);
  return db;
};
