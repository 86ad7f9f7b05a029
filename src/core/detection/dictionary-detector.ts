import { z } from 'zod';
import type { SqliteDatabase } from '../database.js';
import { ENTITY_TYPES, type Candidate, type DictionaryEntry, type EntityType } from '../types.js';
import { createCandidate, wantsType, type DetectionOptions, type Detector } from './detector.js';

const dictionaryRowSchema = z.object({
  id: z.string(),
  term: z.string().min(1),
  entity_type: z.enum(ENTITY_TYPES).catch('custom'),
  case_sensitive: z.number(),
  whole_word: z.number(),
  enabled: z.number(),
  created_at: z.string(),
});

interface DictionaryMatch {
  start: number;
  end: number;
  entry: DictionaryEntry;
}

/**
 * Caller-managed terms (project names, client names, internal codes) that
 * are always reported. Backed by the `dictionary` table when a database is
 * given.
 */
export class DictionaryDetector implements Detector {
  readonly name = 'dictionary';
  readonly method = 'dictionary' as const;

  private entries: Map<string, DictionaryEntry> = new Map();
  private termIndex: Map<string, string> = new Map(); // lowercase term -> id (for dedup)
  private dirty = true;
  private db: SqliteDatabase | null;

  // Hash-map index keyed by term length, then by lowercased term
  private buckets: Map<number, Map<string, DictionaryEntry>> = new Map();
  private sortedLengths: number[] = [];

  constructor(db?: SqliteDatabase) {
    this.db = db ?? null;

    if (this.db) {
      this.loadFromDb();
    }
  }

  private loadFromDb(): void {
    if (!this.db) return;
    const rows: unknown[] = this.db.prepare('SELECT * FROM dictionary WHERE enabled = 1').all();
    for (const raw of rows) {
      const parsed = dictionaryRowSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn('Skipping malformed dictionary row:', parsed.error.message);
        continue;
      }
      const row = parsed.data;
      const entry: DictionaryEntry = {
        id: row.id,
        term: row.term,
        entityType: row.entity_type,
        caseSensitive: row.case_sensitive === 1,
        wholeWord: row.whole_word === 1,
        enabled: row.enabled === 1,
        createdAt: new Date(row.created_at),
      };
      this.entries.set(row.id, entry);
      this.termIndex.set(row.term.toLowerCase(), row.id);
    }
    this.dirty = true;
  }

  supportedTypes(): EntityType[] {
    const types = new Set<EntityType>(['custom']);
    for (const entry of this.entries.values()) types.add(entry.entityType);
    return [...types];
  }

  hasTerm(term: string): boolean {
    return this.termIndex.has(term.toLowerCase());
  }

  async add(entries: DictionaryEntry[]): Promise<void> {
    if (this.db) {
      const stmt = this.db.prepare(
        `INSERT INTO dictionary (id, term, entity_type, case_sensitive, whole_word, enabled, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           term = excluded.term,
           entity_type = excluded.entity_type,
           case_sensitive = excluded.case_sensitive,
           whole_word = excluded.whole_word,
           enabled = excluded.enabled`
      );
      const insertAll = this.db.transaction(() => {
        for (const entry of entries) {
          stmt.run(
            entry.id,
            entry.term,
            entry.entityType,
            entry.caseSensitive ? 1 : 0,
            entry.wholeWord ? 1 : 0,
            entry.enabled ? 1 : 0,
            entry.createdAt.toISOString()
          );
        }
      });
      insertAll();
    }

    for (const entry of entries) {
      const existing = this.entries.get(entry.id);
      if (existing) this.termIndex.delete(existing.term.toLowerCase());

      if (entry.enabled) {
        this.entries.set(entry.id, entry);
        this.termIndex.set(entry.term.toLowerCase(), entry.id);
      } else {
        this.entries.delete(entry.id);
      }
    }
    this.dirty = true;
  }

  async removeByTerms(terms: string[]): Promise<string[]> {
    const ids: string[] = [];
    for (const term of terms) {
      const id = this.termIndex.get(term.toLowerCase());
      if (id) ids.push(id);
    }
    if (ids.length > 0) await this.remove(ids);
    return ids;
  }

  async remove(ids: string[]): Promise<void> {
    if (this.db && ids.length > 0) {
      const placeholders = ids.map(() => '?').join(',');
      this.db.prepare(`DELETE FROM dictionary WHERE id IN (${placeholders})`).run(...ids);
    }

    for (const id of ids) {
      const existing = this.entries.get(id);
      if (existing) this.termIndex.delete(existing.term.toLowerCase());
      this.entries.delete(id);
    }
    this.dirty = true;
  }

  async clear(): Promise<void> {
    if (this.db) {
      this.db.prepare('DELETE FROM dictionary').run();
    }
    this.entries.clear();
    this.termIndex.clear();
    this.dirty = true;
  }

  list(): DictionaryEntry[] {
    return Array.from(this.entries.values());
  }

  size(): number {
    return this.entries.size;
  }

  async detect(text: string, options: DetectionOptions): Promise<Candidate[]> {
    if (this.entries.size === 0) return [];

    try {
      return this.findMatches(text)
        .filter(m => wantsType(options, m.entry.entityType))
        .map(m =>
          createCandidate({
            type: m.entry.entityType,
            text: text.slice(m.start, m.end),
            start: m.start,
            end: m.end,
            confidence: 1.0,
            source: this.name,
            method: this.method,
            metadata: { entryId: m.entry.id },
          })
        );
    } catch (err) {
      console.warn('Dictionary detection failed:', err);
      return [];
    }
  }

  private buildIndex(): void {
    if (!this.dirty) return;

    this.buckets.clear();

    for (const entry of this.entries.values()) {
      const key = entry.term.toLowerCase();
      const len = key.length;

      let bucket = this.buckets.get(len);
      if (!bucket) {
        bucket = new Map();
        this.buckets.set(len, bucket);
      }
      bucket.set(key, entry);
    }

    // Sort lengths descending so longest match wins
    this.sortedLengths = [...this.buckets.keys()].sort((a, b) => b - a);
    this.dirty = false;
  }

  private isWordBoundary(text: string, index: number): boolean {
    if (index <= 0 || index >= text.length) return true;
    const isWord = /\w/.test(text[index]);
    const prevIsWord = /\w/.test(text[index - 1]);
    return isWord !== prevIsWord;
  }

  /** Left-to-right scan; at each position the longest term wins and matching resumes after it. */
  private findMatches(text: string): DictionaryMatch[] {
    this.buildIndex();

    const matches: DictionaryMatch[] = [];
    const textLower = text.toLowerCase();
    let skipUntil = 0;

    for (let i = 0; i < text.length; i++) {
      if (i < skipUntil) continue;

      for (const len of this.sortedLengths) {
        if (i + len > text.length) continue;

        const entry = this.buckets.get(len)?.get(textLower.slice(i, i + len));
        if (!entry) continue;

        // Case-sensitive check: verify original text matches exactly
        if (entry.caseSensitive && text.slice(i, i + len) !== entry.term) continue;

        if (entry.wholeWord) {
          if (!this.isWordBoundary(text, i) || !this.isWordBoundary(text, i + len)) continue;
        }

        matches.push({ start: i, end: i + len, entry });
        skipUntil = i + len;
        break;
      }
    }

    return matches;
  }
}
