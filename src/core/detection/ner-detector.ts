import { pipeline, env, type TokenClassificationPipeline } from '@huggingface/transformers';
import type { Candidate, EntityType } from '../types.js';
import { createCandidate, wantsType, type DetectionOptions, type Detector } from './detector.js';

// Must be set before any pipeline calls
env.allowRemoteModels = true;
if (process.env.NER_MODEL_CACHE) {
  env.cacheDir = process.env.NER_MODEL_CACHE;
}

/** Point model downloads at `dir`; only affects models not loaded yet. */
export function setModelCacheDir(dir: string): void {
  env.cacheDir = dir;
}

export interface NerConfig {
  model: string;
  minConfidence: number;
  entityTypes: EntityType[];
}

export interface RawEntity {
  entity: string;
  score: number;
  index: number;
  word: string;
}

export interface MergedEntity {
  type: EntityType | null;
  word: string;
  score: number;
}

/** Token classifier call; the transformers pipeline satisfies it. */
export type TokenClassifier = (text: string, options: { ignore_labels: string[] }) => Promise<unknown>;
export type ClassifierLoader = (model: string) => Promise<TokenClassifier>;

const BIO_TYPE_MAP: Record<string, EntityType | null> = {
  PER: 'person',
  ORG: 'organization',
  LOC: 'location',
  MISC: null,
};

export const DEFAULT_NER_CONFIG: NerConfig = {
  model: 'Xenova/bert-base-NER',
  minConfidence: 0.6,
  entityTypes: ['person', 'organization', 'location'],
};

const RETRY_INTERVAL_MS = 60_000;
const CHUNK_SIZE = 1_000;
const CHUNK_OVERLAP = 200;

function isRawEntity(value: unknown): value is RawEntity {
  return (
    typeof value === 'object' &&
    value !== null &&
    'entity' in value &&
    'score' in value &&
    'word' in value &&
    typeof value.entity === 'string' &&
    typeof value.score === 'number' &&
    typeof value.word === 'string'
  );
}

export const loadTransformersClassifier: ClassifierLoader = async model => {
  const ner = await pipeline('token-classification', model, { dtype: 'q8' }) as TokenClassificationPipeline;
  return (text, options) => ner(text, options);
};

/**
 * Statistical person/organization/location recognizer. The model is loaded
 * once per detector instance; a failed load is retried after an interval.
 */
export class NerDetector implements Detector {
  readonly name = 'ner';
  readonly method = 'statistical' as const;
  private readonly config: NerConfig;
  private classifier: TokenClassifier | null = null;
  private loading: Promise<TokenClassifier | null> | null = null;
  private lastFailedAttempt = 0;

  constructor(
    config: Partial<NerConfig> = {},
    private readonly loadClassifier: ClassifierLoader = loadTransformersClassifier
  ) {
    this.config = { ...DEFAULT_NER_CONFIG, ...config };
  }

  supportedTypes(): EntityType[] {
    return [...this.config.entityTypes];
  }

  async warmUp(): Promise<void> {
    await this.getClassifier();
  }

  private async getClassifier(): Promise<TokenClassifier | null> {
    if (this.classifier) return this.classifier;
    if (this.loading) return this.loading;
    if (this.lastFailedAttempt && Date.now() - this.lastFailedAttempt < RETRY_INTERVAL_MS) {
      return null;
    }

    this.loading = this.loadClassifier(this.config.model)
      .then(classifier => {
        this.classifier = classifier;
        this.lastFailedAttempt = 0;
        return classifier;
      })
      .catch((err: unknown) => {
        console.error('NER model load failed:', err);
        this.lastFailedAttempt = Date.now();
        return null;
      })
      .finally(() => {
        this.loading = null;
      });

    return this.loading;
  }

  async detect(text: string, options: DetectionOptions): Promise<Candidate[]> {
    const types = this.config.entityTypes.filter(t => wantsType(options, t));
    if (types.length === 0 || text.trim().length === 0) return [];

    const ner = await this.getClassifier();
    if (!ner) return [];

    try {
      return await this.classify(ner, text, types);
    } catch (err) {
      console.warn('NER detection failed:', err);
      return [];
    }
  }

  private async classify(ner: TokenClassifier, text: string, types: EntityType[]): Promise<Candidate[]> {
    const found = new Map<string, Candidate>();

    // Chunk text to stay within BERT's ~512 token context window
    for (const { chunk, offset } of NerDetector.chunkText(text, CHUNK_SIZE, CHUNK_OVERLAP)) {
      const output = await ner(chunk, { ignore_labels: [] });
      const rawEntities = (Array.isArray(output) ? output : []).filter(isRawEntity);

      // Filter to B-/I- tags only (skip 'O' labels)
      const bioEntities = rawEntities.filter(
        e => e.entity.startsWith('B-') || e.entity.startsWith('I-')
      );

      for (const entity of NerDetector.mergeEntities(bioEntities)) {
        if (!entity.type || !types.includes(entity.type)) continue;
        if (entity.score < this.config.minConfidence || entity.word.length < 2) continue;

        for (const [start, end] of NerDetector.locate(chunk, entity.word)) {
          const absoluteStart = offset + start;
          const key = `${absoluteStart}:${offset + end}`;
          // Overlap zone between chunks may report the same entity twice
          if (found.has(key)) continue;
          found.set(
            key,
            createCandidate({
              type: entity.type,
              text: text.slice(absoluteStart, offset + end),
              start: absoluteStart,
              end: offset + end,
              confidence: Math.min(1, entity.score),
              source: this.name,
              method: this.method,
              metadata: { model: this.config.model },
            })
          );
        }
      }
    }

    return [...found.values()];
  }

  /** Case-insensitive, word-bounded occurrences of `word` in `text`. */
  static locate(text: string, word: string): [number, number][] {
    const escaped = word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const regex = new RegExp(`(?<![\\p{L}\\p{N}])${escaped}(?![\\p{L}\\p{N}])`, 'giu');
    return [...text.matchAll(regex)].map(m => {
      const start = m.index ?? 0;
      return [start, start + m[0].length];
    });
  }

  /** @internal Split text into overlapping chunks for NER processing */
  static chunkText(text: string, chunkSize: number, overlap: number): { chunk: string; offset: number }[] {
    if (text.length <= chunkSize) {
      return [{ chunk: text, offset: 0 }];
    }

    const chunks: { chunk: string; offset: number }[] = [];
    let start = 0;

    while (start < text.length) {
      const end = Math.min(start + chunkSize, text.length);
      chunks.push({ chunk: text.slice(start, end), offset: start });

      if (end >= text.length) break;
      start += chunkSize - overlap;
    }

    return chunks;
  }

  /** @internal Exposed as static for testing */
  static mergeEntities(entities: RawEntity[]): MergedEntity[] {
    const merged: MergedEntity[] = [];
    let lastLabel: string | null = null;

    for (const entity of entities) {
      const tag = entity.entity.slice(0, 2); // 'B-' or 'I-'
      const label = entity.entity.slice(2);  // 'PER', 'ORG', 'LOC', 'MISC'
      const type = BIO_TYPE_MAP[label] ?? null;
      const last = merged[merged.length - 1];

      if (tag === 'I-' && last && lastLabel === label) {
        // Handle WordPiece subword tokens (## prefix)
        if (entity.word.startsWith('##')) {
          last.word += entity.word.slice(2);
        } else {
          last.word += ' ' + entity.word;
        }
        // Average the confidence scores
        last.score = (last.score + entity.score) / 2;
        continue;
      }

      // B- tag, or an I- tag without a matching entity to continue
      merged.push({ type, word: entity.word, score: entity.score });
      lastLabel = label;
    }

    return merged;
  }
}
