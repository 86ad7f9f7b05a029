import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { NORMALIZATION_STEPS } from './normalization/normalizer.js';
import { DEFAULT_REDACTION_OPTIONS, type JsonValue } from './types.js';

export type SqliteDatabase = InstanceType<typeof Database>;

export const DEFAULT_SETTINGS: Record<string, JsonValue> = {
  enableDictionary: true,
  enableRegex: true,
  enableNames: true,
  enableFinancial: true,
  enableHealthcare: true,
  enableCustomRules: true,
  enableKnowledgeBase: false,
  // Transformer model loads lazily on first NER call; off until the host opts in
  enableNER: false,
  nerModel: 'Xenova/bert-base-NER',
  nerMinConfidence: 0.6,
  confidenceThreshold: 0.5,
  mergeThreshold: 0.7,
  contextWindow: 50,
  detectorTimeoutMs: 10_000,
  locale: null,
  normalizationSteps: [...NORMALIZATION_STEPS],
  defaultStrategy: DEFAULT_REDACTION_OPTIONS.defaultStrategy,
  maskChar: DEFAULT_REDACTION_OPTIONS.maskChar,
  preserveFormat: DEFAULT_REDACTION_OPTIONS.preserveFormat,
  preserveLength: DEFAULT_REDACTION_OPTIONS.preserveLength,
};

/** Opens (creating directories as needed) and migrates the settings database. */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
  initializeSchema(db);

  return db;
}

export function initializeSchema(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS settings (
      key         TEXT PRIMARY KEY,
      value       TEXT NOT NULL,
      updated_at  TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS dictionary (
      id              TEXT PRIMARY KEY,
      term            TEXT NOT NULL,
      entity_type     TEXT NOT NULL DEFAULT 'custom',
      case_sensitive  INTEGER NOT NULL DEFAULT 0,
      whole_word      INTEGER NOT NULL DEFAULT 0,
      enabled         INTEGER NOT NULL DEFAULT 1,
      created_at      TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS entity_definitions (
      entity_type        TEXT NOT NULL,
      name               TEXT NOT NULL,
      description        TEXT NOT NULL DEFAULT '',
      patterns           TEXT NOT NULL DEFAULT '[]',
      context_keywords   TEXT NOT NULL DEFAULT '[]',
      sensitivity_level  TEXT NOT NULL DEFAULT 'medium',
      examples           TEXT NOT NULL DEFAULT '[]',
      created_at         TEXT NOT NULL,
      updated_at         TEXT NOT NULL,
      PRIMARY KEY (entity_type, name)
    );
  `);

  const insert = db.prepare(
    'INSERT OR IGNORE INTO settings (key, value, updated_at) VALUES (?, ?, ?)'
  );
  const now = new Date().toISOString();
  const seed = db.transaction(() => {
    for (const [key, value] of Object.entries(DEFAULT_SETTINGS)) {
      insert.run(key, JSON.stringify(value), now);
    }
  });
  seed();
}

function parseStored(raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || !('value' in raw) || typeof raw.value !== 'string') {
    return undefined;
  }
  return JSON.parse(raw.value);
}

export function getSetting(db: SqliteDatabase, key: string): unknown {
  const row: unknown = db.prepare('SELECT value FROM settings WHERE key = ?').get(key);
  return parseStored(row);
}

export function setSetting(db: SqliteDatabase, key: string, value: JsonValue): void {
  db.prepare(
    'INSERT INTO settings (key, value, updated_at) VALUES (?, ?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at'
  ).run(key, JSON.stringify(value), new Date().toISOString());
}

export function getAllSettings(db: SqliteDatabase): Record<string, unknown> {
  const rows: unknown[] = db.prepare('SELECT key, value FROM settings').all();
  const settings: Record<string, unknown> = {};
  for (const row of rows) {
    if (typeof row === 'object' && row !== null && 'key' in row && typeof row.key === 'string') {
      settings[row.key] = parseStored(row);
    }
  }
  return settings;
}
