import { z } from 'zod';
import type { SqliteDatabase } from '../database.js';
import { ENTITY_TYPES, RISK_LEVELS, type EntityType, type RiskLevel } from '../types.js';

/** A described entity kind: how to find it, what words travel with it, how sensitive it is. */
export interface EntityDefinition {
  entityType: EntityType;
  name: string;
  description: string;
  /** Regular expression sources, matched case-sensitively. */
  patterns: string[];
  contextKeywords: string[];
  sensitivityLevel: RiskLevel;
  examples: string[];
  createdAt: Date;
  updatedAt: Date;
}

export type DefinitionInput = Omit<EntityDefinition, 'createdAt' | 'updatedAt'>;

export type DefinitionUpdate = Partial<
  Pick<EntityDefinition, 'description' | 'patterns' | 'contextKeywords' | 'sensitivityLevel' | 'examples'>
>;

export const DEFAULT_DEFINITIONS: readonly DefinitionInput[] = [
  {
    entityType: 'person',
    name: 'Person Name',
    description: 'Names of individuals, including first names, last names and full names',
    patterns: ['\\b[A-Z][a-z]+\\s+[A-Z][a-z]+\\b'],
    contextKeywords: ['name', 'person', 'individual', 'mr', 'mrs', 'ms', 'dr', 'prof'],
    sensitivityLevel: 'high',
    examples: ['John Smith', 'Dr. Sarah Johnson', 'Mr. Robert Brown'],
  },
  {
    entityType: 'email',
    name: 'Email Address',
    description: 'Electronic mail addresses, personal or business',
    patterns: ['\\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\\.[A-Za-z]{2,}\\b'],
    contextKeywords: ['email', 'e-mail', 'contact', 'address'],
    sensitivityLevel: 'high',
    examples: ['john@corp.io', 'sarah.johnson@company.org'],
  },
  {
    entityType: 'phone',
    name: 'Phone Number',
    description: 'Telephone numbers including mobile, landline and international numbers',
    patterns: [
      '\\b\\d{3}-\\d{3}-\\d{4}\\b',
      '\\(\\d{3}\\)\\s?\\d{3}-\\d{4}\\b',
      '\\+1[-.\\s]?\\d{3}[-.\\s]?\\d{3}[-.\\s]?\\d{4}\\b',
    ],
    contextKeywords: ['phone', 'telephone', 'mobile', 'cell', 'contact', 'number'],
    sensitivityLevel: 'medium',
    examples: ['555-123-4567', '(555) 123-4567', '+1 555 123 4567'],
  },
  {
    entityType: 'ssn',
    name: 'Social Security Number',
    description: 'US Social Security Numbers used for identification and benefits',
    patterns: ['\\b\\d{3}-\\d{2}-\\d{4}\\b', '\\b\\d{3}\\s\\d{2}\\s\\d{4}\\b'],
    contextKeywords: ['ssn', 'social security', 'social security number'],
    sensitivityLevel: 'critical',
    examples: ['123-45-6789', '123 45 6789'],
  },
  {
    entityType: 'credit_card',
    name: 'Credit Card Number',
    description: 'Credit and debit card numbers from the major issuers',
    patterns: [
      '\\b4\\d{3}[-\\s]?\\d{4}[-\\s]?\\d{4}[-\\s]?\\d{4}\\b',
      '\\b5[1-5]\\d{2}[-\\s]?\\d{4}[-\\s]?\\d{4}[-\\s]?\\d{4}\\b',
      '\\b3[47]\\d{2}[-\\s]?\\d{6}[-\\s]?\\d{5}\\b',
    ],
    contextKeywords: ['credit card', 'debit card', 'card number', 'payment'],
    sensitivityLevel: 'critical',
    examples: ['4532 0151 1283 0366', '5555 5555 5555 4444'],
  },
  {
    entityType: 'organization',
    name: 'Organization Name',
    description: 'Names of companies, institutions and other organizations',
    patterns: ['\\b[A-Z][A-Za-z&.-]*(?:\\s+[A-Z][A-Za-z&.-]*)*\\s+(?:Inc|LLC|Corp|Company|Ltd|University|College)\\b'],
    contextKeywords: ['company', 'organization', 'corporation', 'institute', 'university'],
    sensitivityLevel: 'low',
    examples: ['Acme Corporation', 'State University', 'ABC Company Inc.'],
  },
  {
    entityType: 'address',
    name: 'Physical Address',
    description: 'Street and postal addresses',
    patterns: ['\\b\\d+\\s+[A-Za-z]+(?:\\s+[A-Za-z]+)*\\s+(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd)\\b'],
    contextKeywords: ['address', 'street', 'avenue', 'road', 'location'],
    sensitivityLevel: 'medium',
    examples: ['123 Main Street', '456 Oak Avenue'],
  },
  {
    entityType: 'date',
    name: 'Date Information',
    description: 'Dates that might reveal sensitive timing',
    patterns: [
      '\\b\\d{1,2}/\\d{1,2}/\\d{4}\\b',
      '\\b\\d{4}-\\d{2}-\\d{2}\\b',
      '\\b(?:January|February|March|April|May|June|July|August|September|October|November|December)\\s+\\d{1,2},?\\s+\\d{4}\\b',
    ],
    contextKeywords: ['date', 'birth', 'birthday', 'born', 'created', 'expires'],
    sensitivityLevel: 'medium',
    examples: ['01/15/1990', '2023-12-25', 'January 1, 2023'],
  },
  {
    entityType: 'ip_address',
    name: 'IP Address',
    description: 'Internet Protocol addresses that may reveal location or system details',
    patterns: ['\\b(?:\\d{1,3}\\.){3}\\d{1,3}\\b'],
    contextKeywords: ['ip', 'address', 'server', 'network'],
    sensitivityLevel: 'medium',
    examples: ['192.168.1.1', '10.0.0.1'],
  },
  {
    entityType: 'url',
    name: 'URL',
    description: 'Website links that may carry identifying paths',
    patterns: ['https?://[\\w.-]+(?::\\d+)?(?:/[\\w/.-]*)?'],
    contextKeywords: ['url', 'website', 'link', 'http', 'https'],
    sensitivityLevel: 'low',
    examples: ['https://corp.io', 'http://intranet.corp.io'],
  },
];

function parseJson(raw: unknown): unknown {
  if (typeof raw !== 'string') return raw;
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

const jsonStrings = z.preprocess(parseJson, z.array(z.string()));

const definitionRowSchema = z.object({
  entity_type: z.enum(ENTITY_TYPES).catch('custom'),
  name: z.string().min(1),
  description: z.string(),
  patterns: jsonStrings,
  context_keywords: jsonStrings,
  sensitivity_level: z.enum(RISK_LEVELS).catch('medium'),
  examples: jsonStrings,
  created_at: z.string(),
  updated_at: z.string(),
});

const keyOf = (entityType: EntityType, name: string): string => `${entityType}\u0000${name}`;

const wordsOf = (text: string): string[] => text.toLowerCase().match(/\w+/g) ?? [];

/**
 * Entity definitions the knowledge-base detector works from. Backed by the
 * `entity_definitions` table when a database is given; `seed` fills an empty
 * table, or the in-memory store when there is none.
 */
export class KnowledgeBase {
  private definitions: Map<string, EntityDefinition> = new Map();
  private db: SqliteDatabase | null;

  constructor(db?: SqliteDatabase, seed: readonly DefinitionInput[] = DEFAULT_DEFINITIONS) {
    this.db = db ?? null;

    if (this.db) {
      const row: unknown = this.db.prepare('SELECT COUNT(*) AS n FROM entity_definitions').get();
      const count = typeof row === 'object' && row !== null && 'n' in row ? row.n : 0;
      if (count === 0) this.db.transaction(() => seed.forEach(d => this.persist(stamp(d))))();
      this.loadFromDb(this.db);
    } else {
      for (const input of seed) this.add(input);
    }
  }

  private loadFromDb(db: SqliteDatabase): void {
    const rows: unknown[] = db.prepare('SELECT * FROM entity_definitions').all();
    for (const raw of rows) {
      const parsed = definitionRowSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn('Skipping malformed entity definition row:', parsed.error.message);
        continue;
      }
      const row = parsed.data;
      this.definitions.set(keyOf(row.entity_type, row.name), {
        entityType: row.entity_type,
        name: row.name,
        description: row.description,
        patterns: row.patterns,
        contextKeywords: row.context_keywords,
        sensitivityLevel: row.sensitivity_level,
        examples: row.examples,
        createdAt: new Date(row.created_at),
        updatedAt: new Date(row.updated_at),
      });
    }
  }

  private persist(definition: EntityDefinition): void {
    if (!this.db) return;
    this.db
      .prepare(
        `INSERT INTO entity_definitions
           (entity_type, name, description, patterns, context_keywords, sensitivity_level, examples, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(entity_type, name) DO UPDATE SET
           description = excluded.description,
           patterns = excluded.patterns,
           context_keywords = excluded.context_keywords,
           sensitivity_level = excluded.sensitivity_level,
           examples = excluded.examples,
           updated_at = excluded.updated_at`
      )
      .run(
        definition.entityType,
        definition.name,
        definition.description,
        JSON.stringify(definition.patterns),
        JSON.stringify(definition.contextKeywords),
        definition.sensitivityLevel,
        JSON.stringify(definition.examples),
        definition.createdAt.toISOString(),
        definition.updatedAt.toISOString()
      );
  }

  list(): EntityDefinition[] {
    return Array.from(this.definitions.values());
  }

  size(): number {
    return this.definitions.size;
  }

  get(entityType: EntityType, name?: string): EntityDefinition | undefined {
    if (name !== undefined) return this.definitions.get(keyOf(entityType, name));
    return this.list().find(d => d.entityType === entityType);
  }

  /** Returns false when a definition with the same type and name already exists. */
  add(input: DefinitionInput): boolean {
    const key = keyOf(input.entityType, input.name);
    if (this.definitions.has(key)) return false;

    const definition = stamp(input);
    this.persist(definition);
    this.definitions.set(key, definition);
    return true;
  }

  /** Returns false when no definition has that type and name. */
  update(entityType: EntityType, name: string, updates: DefinitionUpdate): boolean {
    const key = keyOf(entityType, name);
    const existing = this.definitions.get(key);
    if (!existing) return false;

    const updated: EntityDefinition = { ...existing, ...updates, updatedAt: new Date() };
    this.persist(updated);
    this.definitions.set(key, updated);
    return true;
  }

  /**
   * Definitions whose name, description or keywords share a word with
   * `query`, best match first. A blank query returns every definition.
   */
  search(query: string, entityTypes?: readonly EntityType[]): EntityDefinition[] {
    const candidates = this.list().filter(
      d => !entityTypes || entityTypes.length === 0 || entityTypes.includes(d.entityType)
    );
    const terms = new Set(wordsOf(query));
    if (terms.size === 0) return candidates;

    return candidates
      .map(definition => {
        const vocabulary = new Set(
          wordsOf([definition.name, definition.description, ...definition.contextKeywords].join(' '))
        );
        let score = 0;
        for (const term of terms) if (vocabulary.has(term)) score++;
        return { definition, score };
      })
      .filter(s => s.score > 0)
      .sort((a, b) => b.score - a.score)
      .map(s => s.definition);
  }
}

function stamp(input: DefinitionInput): EntityDefinition {
  const now = new Date();
  return {
    ...input,
    patterns: [...input.patterns],
    contextKeywords: [...input.contextKeywords],
    examples: [...input.examples],
    createdAt: now,
    updatedAt: now,
  };
}
