import type {
  DetectedEntity,
  DetectionRun,
  EntityType,
  JsonObject,
  ProvenanceContributor,
  RedactedEntity,
  RedactionAudit,
  RedactionResult,
  RiskLevel,
  Span,
  ValidationReport,
} from '../types.js';

export const HIGH_CONFIDENCE = 0.8;

export interface EntityDto {
  id: string;
  type: EntityType;
  text: string;
  start: number;
  end: number;
  confidence: number;
  source: string;
  method: string;
  riskLevel: RiskLevel;
  validation: ValidationReport;
  context: { before: string; after: string };
  contributors: ProvenanceContributor[];
  bbox: { page: number; x: number; y: number; width: number; height: number } | null;
  metadata: JsonObject;
}

export interface RedactedEntityDto extends EntityDto {
  redactedText: string;
  redaction: RedactionAudit;
}

export interface DetectionSummary {
  totalEntities: number;
  highConfidenceEntities: number;
  entityTypes: EntityType[];
  entitiesByType: Partial<Record<EntityType, number>>;
  riskDistribution: Record<RiskLevel, number>;
  textLength: number;
  detectionCoverage: number;
}

export interface DetectionReport {
  success: boolean;
  reason?: string;
  candidates: EntityDto[];
  summary: DetectionSummary;
  metadata: {
    detectorsUsed: string[];
    failedDetectors: { detector: string; reason: string }[];
    pipelineSettings: DetectionRun['settings'];
    preprocessing: DetectionRun['preprocessing'];
    rawCandidateCount: number;
    unmappableDropped: number;
    processingTimeMs: number;
  };
}

export interface RedactionReport {
  success: boolean;
  error?: string;
  redactedText: string;
  redactionCount: Partial<Record<EntityType, number>>;
  entities: RedactedEntityDto[];
  processingTimeMs: number;
  timestamp: string;
}

export function toEntityDto(entity: DetectedEntity): EntityDto {
  return {
    id: entity.id,
    type: entity.type,
    text: entity.text,
    start: entity.start,
    end: entity.end,
    confidence: entity.confidence,
    source: entity.source,
    method: entity.method,
    riskLevel: entity.riskLevel,
    validation: { ...entity.validation },
    context: { before: entity.context.before, after: entity.context.after },
    contributors: (entity.provenance?.contributors ?? []).map(c => ({ ...c })),
    bbox: entity.bbox ? { ...entity.bbox } : null,
    metadata: { ...entity.metadata },
  };
}

export function toRedactedEntityDto(entity: RedactedEntity): RedactedEntityDto {
  return { ...toEntityDto(entity), redactedText: entity.redactedText, redaction: { ...entity.redaction } };
}

/** Fraction of the text covered by at least one span, to 4 decimals. */
export function detectionCoverage(spans: readonly Span[], textLength: number): number {
  if (textLength <= 0) return 0;
  const sorted = [...spans].sort((a, b) => a.start - b.start);
  let covered = 0;
  let reach = 0;
  for (const { start, end } of sorted) {
    const from = Math.max(start, reach);
    if (end > from) covered += end - from;
    reach = Math.max(reach, end);
  }
  return Math.round((covered / textLength) * 10_000) / 10_000;
}

function emptyRiskDistribution(): Record<RiskLevel, number> {
  return { low: 0, medium: 0, high: 0, critical: 0 };
}

export function summarize(entities: readonly DetectedEntity[], textLength: number): DetectionSummary {
  const entitiesByType: Partial<Record<EntityType, number>> = {};
  const riskDistribution = emptyRiskDistribution();

  for (const entity of entities) {
    entitiesByType[entity.type] = (entitiesByType[entity.type] ?? 0) + 1;
    riskDistribution[entity.riskLevel]++;
  }

  return {
    totalEntities: entities.length,
    highConfidenceEntities: entities.filter(e => e.confidence >= HIGH_CONFIDENCE).length,
    entityTypes: [...new Set(entities.map(e => e.type))].sort(),
    entitiesByType,
    riskDistribution,
    textLength,
    detectionCoverage: detectionCoverage(entities, textLength),
  };
}

export function buildDetectionReport(entities: readonly DetectedEntity[], run: DetectionRun): DetectionReport {
  return {
    success: true,
    candidates: entities.map(toEntityDto),
    summary: summarize(entities, run.textLength),
    metadata: {
      detectorsUsed: [...run.detectorsUsed],
      failedDetectors: run.failedDetectors.map(f => ({ ...f })),
      pipelineSettings: { ...run.settings },
      preprocessing: {
        ...run.preprocessing,
        appliedSteps: [...run.preprocessing.appliedSteps],
        skippedSteps: [...run.preprocessing.skippedSteps],
      },
      rawCandidateCount: run.rawCandidateCount,
      unmappableDropped: run.unmappableDropped,
      processingTimeMs: run.processingTimeMs,
    },
  };
}

export function buildFailureReport(reason: string, run?: DetectionRun): DetectionReport {
  return {
    success: false,
    reason,
    candidates: [],
    summary: {
      totalEntities: 0,
      highConfidenceEntities: 0,
      entityTypes: [],
      entitiesByType: {},
      riskDistribution: emptyRiskDistribution(),
      textLength: run?.textLength ?? 0,
      detectionCoverage: 0,
    },
    metadata: {
      detectorsUsed: run ? [...run.detectorsUsed] : [],
      failedDetectors: run ? run.failedDetectors.map(f => ({ ...f })) : [],
      pipelineSettings: run ? { ...run.settings } : { confidenceThreshold: 0, mergeThreshold: 0, contextWindow: 0 },
      preprocessing: run
        ? { ...run.preprocessing }
        : { appliedSteps: [], skippedSteps: [], language: null, languageConfidence: 0, approximate: false },
      rawCandidateCount: run?.rawCandidateCount ?? 0,
      unmappableDropped: run?.unmappableDropped ?? 0,
      processingTimeMs: run?.processingTimeMs ?? 0,
    },
  };
}

/** The original text stays out of the report. */
export function buildRedactionReport(result: RedactionResult): RedactionReport {
  const report: RedactionReport = {
    success: result.success,
    redactedText: result.redactedText,
    redactionCount: { ...result.redactionCount },
    entities: result.entities.map(toRedactedEntityDto),
    processingTimeMs: result.processingTimeMs,
    timestamp: result.timestamp,
  };
  if (result.error !== undefined) report.error = result.error;
  return report;
}
