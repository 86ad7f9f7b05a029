import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_SETTINGS, getAllSettings, type SqliteDatabase } from './database.js';
import { InvalidOptionsError } from './errors.js';
import { REDACTION_STRATEGIES } from './types.js';

const unit = z.number().min(0).max(1);

export const pipelineConfigSchema = z.object({
  enableDictionary: z.boolean(),
  enableRegex: z.boolean(),
  enableNames: z.boolean(),
  enableFinancial: z.boolean(),
  enableHealthcare: z.boolean(),
  enableCustomRules: z.boolean(),
  enableKnowledgeBase: z.boolean(),
  enableNER: z.boolean(),
  nerModel: z.string().min(1),
  nerMinConfidence: unit,
  confidenceThreshold: unit,
  mergeThreshold: z.number().gt(0).max(1),
  contextWindow: z.number().int().min(0),
  detectorTimeoutMs: z.number().int().positive(),
  locale: z.string().min(2).nullable(),
  normalizationSteps: z.array(z.string()),
  defaultStrategy: z.enum(REDACTION_STRATEGIES),
  maskChar: z.string().length(1),
  preserveFormat: z.boolean(),
  preserveLength: z.boolean(),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = Object.freeze(
  pipelineConfigSchema.parse(DEFAULT_SETTINGS)
);

/**
 * Applies `layer` over `base` one key at a time. A value that would make the
 * config invalid is dropped with a warning and the base value kept.
 */
export function applyConfigLayer(
  base: Readonly<PipelineConfig>,
  layer: Record<string, unknown>,
  origin: string
): PipelineConfig {
  const merged: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(layer)) {
    if (!(key in pipelineConfigSchema.shape) || value === undefined) continue;
    const attempt = pipelineConfigSchema.safeParse({ ...merged, [key]: value });
    if (attempt.success) {
      merged[key] = value;
    } else {
      console.warn(`Ignoring invalid ${origin} setting "${key}":`, attempt.error.issues[0]?.message);
    }
  }

  return pipelineConfigSchema.parse(merged);
}

/** Defaults overlaid with whatever the settings table holds. */
export function loadPipelineConfig(db: SqliteDatabase): PipelineConfig {
  return applyConfigLayer(DEFAULT_PIPELINE_CONFIG, getAllSettings(db), 'persisted');
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envSchema = z.object({
  PII_DB_PATH: z.preprocess(blankToUndefined, z.string().default('./data/pii-engine.db')),
  PII_TOKEN_SECRET: z.preprocess(blankToUndefined, z.string().optional()),
  PII_CONFIDENCE_THRESHOLD: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).optional()),
  PII_MERGE_THRESHOLD: z.preprocess(blankToUndefined, z.coerce.number().gt(0).max(1).optional()),
  PII_LOCALE: z.preprocess(blankToUndefined, z.string().min(2).optional()),
  NER_MODEL_CACHE: z.preprocess(blankToUndefined, z.string().optional()),
});

export interface EnvConfig {
  dbPath: string;
  tokenSecret?: string;
  modelCacheDir?: string;
  overrides: Partial<PipelineConfig>;
}

export function loadEnvConfig(env: Record<string, string | undefined>): EnvConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidOptionsError(`Invalid environment: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  const overrides: Partial<PipelineConfig> = {};
  if (vars.PII_CONFIDENCE_THRESHOLD !== undefined) overrides.confidenceThreshold = vars.PII_CONFIDENCE_THRESHOLD;
  if (vars.PII_MERGE_THRESHOLD !== undefined) overrides.mergeThreshold = vars.PII_MERGE_THRESHOLD;
  if (vars.PII_LOCALE !== undefined) overrides.locale = vars.PII_LOCALE.toUpperCase();

  return {
    dbPath: vars.PII_DB_PATH,
    tokenSecret: vars.PII_TOKEN_SECRET,
    modelCacheDir: vars.NER_MODEL_CACHE,
    overrides,
  };
}

/** Reads `.env` into `process.env`, then parses the variables the engine uses. */
export function loadEnvironment(): EnvConfig {
  dotenv.config();
  return loadEnvConfig(process.env);
}
