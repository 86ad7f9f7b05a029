import { AggregationEngine } from '../aggregation/engine.js';
import { orderByConfidence } from '../aggregation/merge.js';
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from '../config.js';
import type { SqliteDatabase } from '../database.js';
import type { Detector } from '../detection/detector.js';
import { DictionaryDetector } from '../detection/dictionary-detector.js';
import { KnowledgeBaseDetector } from '../detection/knowledge-base-detector.js';
import { KnowledgeBase } from '../detection/knowledge-base.js';
import { NameDetector } from '../detection/name-detector.js';
import { NerDetector, type ClassifierLoader } from '../detection/ner-detector.js';
import {
  createCustomRulesDetector,
  createFinancialDetector,
  createHealthcareDetector,
  createRegexDetector,
} from '../detection/pattern-detector.js';
import type { PatternRule } from '../detection/patterns.js';
import { enrichCandidates } from '../enrichment/enricher.js';
import { describeError, InvalidInputError } from '../errors.js';
import { Lexicon } from '../lexicon.js';
import { TextNormalizer } from '../normalization/normalizer.js';
import {
  buildDetectionReport,
  buildFailureReport,
  buildRedactionReport,
  type DetectionReport,
  type RedactionReport,
} from '../report/report-builder.js';
import { DetectionStats, type StatsSnapshot } from '../report/stats.js';
import type {
  Candidate,
  DetectedEntity,
  DetectionOutcome,
  DetectionRun,
  EntityType,
  JsonObject,
  RedactionOptions,
  RedactionResult,
} from '../types.js';
import { Pseudonymizer } from './pseudonymizer.js';
import { RedactionEngine } from './redactor.js';

export interface DetectOptions {
  entityTypes?: EntityType[];
  /** Overrides the configured locale; `null` turns locale rules off. */
  locale?: string | null;
  enabledDetectors?: string[];
  disabledDetectors?: string[];
  /** `false` runs detectors on the raw text. */
  preprocess?: boolean;
  normalizationSteps?: string[];
  metadata?: JsonObject;
}

export interface PipelineOptions {
  normalizer?: TextNormalizer;
  /** Engine-level secret for reversible tokens; fixed for the pipeline's lifetime. */
  tokenizationSecret?: string;
  pseudonymizer?: Pseudonymizer;
}

export interface DetectAndRedactResult {
  detection: DetectionReport;
  redaction: RedactionReport;
}

/**
 * Normalize, detect, aggregate, enrich and redact. Public entry points
 * report failures through a success flag instead of throwing.
 */
export class RedactionPipeline {
  private readonly config: Readonly<PipelineConfig>;
  private readonly engine: AggregationEngine;
  private readonly normalizer: TextNormalizer;
  private readonly redactor: RedactionEngine;
  private readonly stats = new DetectionStats();

  constructor(detectors: Detector[], config: Partial<PipelineConfig> = {}, options: PipelineOptions = {}) {
    this.config = Object.freeze({ ...DEFAULT_PIPELINE_CONFIG, ...config });
    this.engine = new AggregationEngine(detectors, {
      confidenceThreshold: this.config.confidenceThreshold,
      mergeThreshold: this.config.mergeThreshold,
      detectorTimeoutMs: this.config.detectorTimeoutMs,
    });
    this.normalizer = options.normalizer ?? new TextNormalizer();
    this.redactor = new RedactionEngine(options.tokenizationSecret, options.pseudonymizer);
  }

  getConfig(): Readonly<PipelineConfig> {
    return this.config;
  }

  /** Load heavy detector resources ahead of the first request. */
  async initialize(): Promise<void> {
    const detectors = this.engine.list();
    const results = await Promise.allSettled(detectors.map(d => (d.warmUp ? d.warmUp() : Promise.resolve())));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        console.warn(`Warm-up failed for detector "${detectors[i].name}":`, describeError(result.reason));
      }
    });
  }

  register(detector: Detector): void {
    this.engine.register(detector);
  }

  unregister(name: string): boolean {
    return this.engine.unregister(name);
  }

  listDetectors(): string[] {
    return this.engine.list().map(d => d.name);
  }

  async detectCandidates(text: string, options: DetectOptions = {}): Promise<DetectionOutcome> {
    const started = performance.now();
    const run = this.emptyRun(typeof text === 'string' ? text.length : 0);

    if (typeof text !== 'string' || text.trim().length === 0) {
      return { success: false, reason: new InvalidInputError().message, entities: [], run };
    }

    try {
      const steps = options.preprocess === false ? [] : options.normalizationSteps ?? this.config.normalizationSteps;
      const doc = this.normalizer.normalize(text, steps, options.metadata ?? {});
      run.preprocessing = {
        appliedSteps: [...doc.appliedSteps],
        skippedSteps: [...doc.skippedSteps],
        language: doc.language,
        languageConfidence: doc.languageConfidence,
        approximate: doc.approximate,
      };

      const aggregated = await this.engine.process(doc.processedText, {
        entityTypes: options.entityTypes,
        locale: options.locale !== undefined ? options.locale : this.config.locale,
        language: doc.language,
        segments: doc.segments,
        metadata: options.metadata,
        enabledDetectors: options.enabledDetectors,
        disabledDetectors: options.disabledDetectors,
      });
      run.detectorsUsed = aggregated.detectorsUsed;
      run.failedDetectors = aggregated.failedDetectors;
      run.rawCandidateCount = aggregated.rawCandidateCount;

      const located: Candidate[] = [];
      for (const candidate of aggregated.candidates) {
        const [start, end] = doc.mapRange(candidate.start, candidate.end);
        if (start < 0 || end <= start) {
          run.unmappableDropped++;
          continue;
        }
        const metadata: JsonObject = { ...candidate.metadata };
        if (start !== candidate.start || end !== candidate.end) {
          metadata.processedStart = candidate.start;
          metadata.processedEnd = candidate.end;
        }
        located.push({ ...candidate, start, end, text: text.slice(start, end), metadata });
      }

      const entities = orderByConfidence(
        enrichCandidates(located, text, { contextWindow: this.config.contextWindow })
      );
      this.stats.record(entities);

      run.processingTimeMs = performance.now() - started;
      return { success: true, entities, run };
    } catch (err) {
      console.error('Detection pipeline failed:', err);
      run.processingTimeMs = performance.now() - started;
      return { success: false, reason: describeError(err), entities: [], run };
    }
  }

  async detect(text: string, options: DetectOptions = {}): Promise<DetectionReport> {
    const outcome = await this.detectCandidates(text, options);
    return outcome.success
      ? buildDetectionReport(outcome.entities, outcome.run)
      : buildFailureReport(outcome.reason ?? 'Detection failed', outcome.run);
  }

  /** Never throws; invalid options or input come back as `success: false`. */
  redact(
    text: string,
    entities: readonly DetectedEntity[],
    options: Partial<RedactionOptions> = {}
  ): RedactionResult {
    const started = performance.now();
    try {
      if (typeof text !== 'string') throw new InvalidInputError('Text must be a string');
      return this.redactor.redact(text, entities, {
        defaultStrategy: this.config.defaultStrategy,
        maskChar: this.config.maskChar,
        preserveFormat: this.config.preserveFormat,
        preserveLength: this.config.preserveLength,
        ...options,
      });
    } catch (err) {
      console.error('Redaction failed:', describeError(err));
      return {
        success: false,
        error: describeError(err),
        originalText: typeof text === 'string' ? text : '',
        redactedText: '',
        redactionCount: {},
        entities: [],
        processingTimeMs: performance.now() - started,
        timestamp: new Date().toISOString(),
      };
    }
  }

  async detectAndRedact(
    text: string,
    detectOptions: DetectOptions = {},
    redactOptions: Partial<RedactionOptions> = {}
  ): Promise<DetectAndRedactResult> {
    const outcome = await this.detectCandidates(text, detectOptions);
    if (!outcome.success) {
      const reason = outcome.reason ?? 'Detection failed';
      return {
        detection: buildFailureReport(reason, outcome.run),
        redaction: {
          success: false,
          error: reason,
          redactedText: '',
          redactionCount: {},
          entities: [],
          processingTimeMs: 0,
          timestamp: new Date().toISOString(),
        },
      };
    }
    return {
      detection: buildDetectionReport(outcome.entities, outcome.run),
      redaction: buildRedactionReport(this.redact(text, outcome.entities, redactOptions)),
    };
  }

  getStats(): StatsSnapshot {
    return this.stats.snapshot();
  }

  resetStats(): void {
    this.stats.reset();
  }

  /** Throws `TokenizationKeyMismatchError` or `IrreversibleTokenError`. */
  reverseToken(payload: string, secret?: string): string {
    return this.redactor.reverseToken(payload, secret);
  }

  private emptyRun(textLength: number): DetectionRun {
    return {
      textLength,
      detectorsUsed: [],
      failedDetectors: [],
      settings: {
        confidenceThreshold: this.config.confidenceThreshold,
        mergeThreshold: this.config.mergeThreshold,
        contextWindow: this.config.contextWindow,
      },
      preprocessing: { appliedSteps: [], skippedSteps: [], language: null, languageConfidence: 0, approximate: false },
      rawCandidateCount: 0,
      unmappableDropped: 0,
      processingTimeMs: 0,
    };
  }
}

export interface CreatePipelineOptions extends PipelineOptions {
  db?: SqliteDatabase;
  lexicon?: Lexicon;
  customRules?: PatternRule[];
  nerLoader?: ClassifierLoader;
  knowledgeBase?: KnowledgeBase;
}

/** The stock detector set, limited to what the config enables. */
export function createDetectors(config: Readonly<PipelineConfig>, options: CreatePipelineOptions = {}): Detector[] {
  const lexicon = options.lexicon ?? new Lexicon();
  const detectors: Detector[] = [];

  if (config.enableDictionary) detectors.push(new DictionaryDetector(options.db));
  if (config.enableRegex) detectors.push(createRegexDetector());
  if (config.enableNames) detectors.push(new NameDetector(lexicon));
  if (config.enableFinancial) detectors.push(createFinancialDetector());
  if (config.enableHealthcare) detectors.push(createHealthcareDetector());
  if (config.enableCustomRules) detectors.push(createCustomRulesDetector(options.customRules));
  if (config.enableKnowledgeBase) {
    detectors.push(
      new KnowledgeBaseDetector(options.knowledgeBase ?? new KnowledgeBase(options.db), config.contextWindow)
    );
  }
  if (config.enableNER) {
    detectors.push(
      new NerDetector({ model: config.nerModel, minConfidence: config.nerMinConfidence }, options.nerLoader)
    );
  }

  return detectors;
}

export function createPipeline(
  config: Partial<PipelineConfig> = {},
  options: CreatePipelineOptions = {}
): RedactionPipeline {
  const resolved: PipelineConfig = { ...DEFAULT_PIPELINE_CONFIG, ...config };
  const lexicon = options.lexicon ?? new Lexicon();
  return new RedactionPipeline(createDetectors(resolved, { ...options, lexicon }), resolved, {
    normalizer: options.normalizer ?? new TextNormalizer(lexicon),
    tokenizationSecret: options.tokenizationSecret,
    pseudonymizer: options.pseudonymizer,
  });
}
