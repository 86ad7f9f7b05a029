import {
  RISK_LEVELS,
  type Candidate,
  type DetectedEntity,
  type EntityContext,
  type EntityType,
  type RiskLevel,
  type ValidationCheck,
  type ValidationReport,
} from '../types.js';
import { checkChecksum, checkFormat } from './validators.js';

export interface EnrichmentSettings {
  contextWindow: number;
}

export const DEFAULT_ENRICHMENT_SETTINGS: EnrichmentSettings = {
  contextWindow: 50,
};

export const BASE_RISK: Record<EntityType, RiskLevel> = {
  ssn: 'critical',
  credit_card: 'critical',
  iban: 'critical',
  bank_account: 'critical',
  passport: 'critical',
  national_id: 'critical',
  tax_id: 'critical',
  routing_number: 'critical',
  medical_record_number: 'critical',
  health_insurance_id: 'critical',
  crypto_address: 'critical',
  person: 'high',
  email: 'high',
  phone: 'high',
  date_of_birth: 'high',
  drivers_license: 'high',
  patient_id: 'high',
  swift_code: 'high',
  address: 'medium',
  date: 'medium',
  ip_address: 'medium',
  mac_address: 'medium',
  postal_code: 'medium',
  custom: 'medium',
  organization: 'low',
  location: 'low',
  url: 'low',
};

const NEGATION_KEYWORDS = ['not', 'fake', 'example', 'test', 'dummy', 'sample'];
const NEGATION_PATTERN = new RegExp(`\\b(?:${NEGATION_KEYWORDS.join('|')})\\b`, 'i');
const STOP_WORDS = new Set(['the', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for']);
const MAX_ENTITY_LENGTH = 100;

const PENALTIES: Record<ValidationCheck, number> = {
  format: 0.7,
  checksum: 0.6,
  context: 0.5,
  commonWord: 0.6,
  length: 0.8,
};
const VALIDATION_CHECKS: ValidationCheck[] = ['format', 'checksum', 'context', 'commonWord', 'length'];
const PATTERN_BONUS = 1.1;
const PATTERN_BONUS_MIN_CONFIDENCE = 0.9;

export function extractContext(text: string, start: number, end: number, window: number): EntityContext {
  const before = text.slice(Math.max(0, start - window), start);
  const after = text.slice(end, Math.min(text.length, end + window));
  return { before, after, snippet: before + text.slice(start, end) + after };
}

/** Base level for the type, stepped down one level below 0.9 and two below 0.7. */
export function assessRisk(type: EntityType, confidence: number): RiskLevel {
  const base = RISK_LEVELS.indexOf(BASE_RISK[type]);
  const steps = confidence >= 0.9 ? 0 : confidence >= 0.7 ? 1 : 2;
  return RISK_LEVELS[Math.max(0, base - steps)];
}

export function validate(candidate: Candidate, context: EntityContext): ValidationReport {
  const value = candidate.text;
  return {
    format: checkFormat(candidate.type, value),
    checksum: checkChecksum(candidate.type, value),
    context: NEGATION_PATTERN.test(context.snippet) ? 'invalid' : 'valid',
    commonWord: candidate.type === 'person'
      ? (STOP_WORDS.has(value.trim().toLowerCase()) ? 'invalid' : 'valid')
      : 'unknown',
    length: value.length >= 1 && value.length <= MAX_ENTITY_LENGTH ? 'valid' : 'invalid',
  };
}

export function adjustConfidence(candidate: Candidate, validation: ValidationReport): number {
  let confidence = candidate.confidence;
  let failed = false;

  for (const check of VALIDATION_CHECKS) {
    if (validation[check] === 'invalid') {
      confidence *= PENALTIES[check];
      failed = true;
    }
  }

  if (!failed && candidate.method === 'pattern' && candidate.confidence >= PATTERN_BONUS_MIN_CONFIDENCE) {
    confidence = Math.min(confidence * PATTERN_BONUS, 1.0);
  }

  return Math.min(1, Math.max(0, Math.round(confidence * 1000) / 1000));
}

/** Context, risk, validation and rescoring for one candidate located in `text`. */
export function enrichCandidate(
  candidate: Candidate,
  text: string,
  settings: EnrichmentSettings = DEFAULT_ENRICHMENT_SETTINGS
): DetectedEntity {
  const context = extractContext(text, candidate.start, candidate.end, settings.contextWindow);
  const riskLevel = assessRisk(candidate.type, candidate.confidence);
  const validation = validate(candidate, context);

  return Object.freeze({
    ...candidate,
    confidence: adjustConfidence(candidate, validation),
    riskLevel,
    validation: Object.freeze(validation),
    context: Object.freeze(context),
  });
}

export function enrichCandidates(
  candidates: readonly Candidate[],
  text: string,
  settings: EnrichmentSettings = DEFAULT_ENRICHMENT_SETTINGS
): DetectedEntity[] {
  return candidates.map(c => enrichCandidate(c, text, settings));
}
