import { applyConfigLayer, loadEnvironment, loadPipelineConfig } from './core/config.js';
import { openDatabase } from './core/database.js';
import { setModelCacheDir } from './core/detection/ner-detector.js';
import { createPipeline, type CreatePipelineOptions, type RedactionPipeline } from './core/redaction/pipeline.js';

export * from './core/types.js';
export * from './core/errors.js';
export {
  DEFAULT_PIPELINE_CONFIG,
  applyConfigLayer,
  loadEnvConfig,
  loadEnvironment,
  loadPipelineConfig,
  pipelineConfigSchema,
  type EnvConfig,
  type PipelineConfig,
} from './core/config.js';
export {
  DEFAULT_SETTINGS,
  getAllSettings,
  getSetting,
  initializeSchema,
  openDatabase,
  setSetting,
  type SqliteDatabase,
} from './core/database.js';
export { Lexicon, type LexiconSource } from './core/lexicon.js';
export { ProcessedDocument, UNMAPPABLE, type TextSegment } from './core/normalization/document.js';
export { NORMALIZATION_STEPS, TextNormalizer, guessLanguage } from './core/normalization/normalizer.js';
export { createCandidate, type DetectionOptions, type Detector } from './core/detection/detector.js';
export { DictionaryDetector } from './core/detection/dictionary-detector.js';
export {
  DEFAULT_DEFINITIONS,
  KnowledgeBase,
  type DefinitionInput,
  type DefinitionUpdate,
  type EntityDefinition,
} from './core/detection/knowledge-base.js';
export { KnowledgeBaseDetector } from './core/detection/knowledge-base-detector.js';
export { NameDetector } from './core/detection/name-detector.js';
export { NerDetector, setModelCacheDir, type ClassifierLoader, type TokenClassifier } from './core/detection/ner-detector.js';
export {
  PatternDetector,
  createCustomRulesDetector,
  createFinancialDetector,
  createHealthcareDetector,
  createRegexDetector,
} from './core/detection/pattern-detector.js';
export type { PatternRule } from './core/detection/patterns.js';
export {
  AggregationEngine,
  type AggregationResult,
  type AggregationRunOptions,
  type AggregationSettings,
} from './core/aggregation/engine.js';
export { mergeCandidates, mergePair, overlapRatio } from './core/aggregation/merge.js';
export { assessRisk, enrichCandidate, enrichCandidates } from './core/enrichment/enricher.js';
export { Tokenizer, type TokenRecord } from './core/redaction/tokenizer.js';
export { Pseudonymizer } from './core/redaction/pseudonymizer.js';
export { RedactionEngine, parseRedactionOptions } from './core/redaction/redactor.js';
export {
  RedactionPipeline,
  createDetectors,
  createPipeline,
  type CreatePipelineOptions,
  type DetectAndRedactResult,
  type DetectOptions,
} from './core/redaction/pipeline.js';
export {
  buildDetectionReport,
  buildFailureReport,
  buildRedactionReport,
  type DetectionReport,
  type EntityDto,
  type RedactionReport,
} from './core/report/report-builder.js';
export { DetectionStats, type StatsSnapshot } from './core/report/stats.js';

/**
 * Wire a pipeline from `.env`, the settings database at `PII_DB_PATH` and
 * the stock detectors. Environment values take precedence over stored ones.
 */
export function createPipelineFromEnvironment(options: CreatePipelineOptions = {}): RedactionPipeline {
  const env = loadEnvironment();
  const db = options.db ?? openDatabase(env.dbPath);
  const config = applyConfigLayer(loadPipelineConfig(db), env.overrides, 'environment');

  if (env.modelCacheDir) setModelCacheDir(env.modelCacheDir);

  return createPipeline(config, {
    ...options,
    db,
    tokenizationSecret: options.tokenizationSecret ?? env.tokenSecret,
  });
}
