export const ENTITY_TYPES = [
  'person',
  'organization',
  'location',
  'email',
  'phone',
  'address',
  'postal_code',
  'date',
  'date_of_birth',
  'ssn',
  'national_id',
  'tax_id',
  'passport',
  'drivers_license',
  'credit_card',
  'bank_account',
  'iban',
  'routing_number',
  'swift_code',
  'crypto_address',
  'ip_address',
  'mac_address',
  'url',
  'medical_record_number',
  'health_insurance_id',
  'patient_id',
  'custom',
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some(type => type === value);
}

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type DetectionMethod = 'pattern' | 'lexicon' | 'dictionary' | 'statistical';

export interface BoundingBox {
  page: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Span {
  start: number;
  end: number;
}

export interface ProvenanceContributor {
  id: string;
  source: string;
  confidence: number;
}

export interface Provenance {
  contributors: ProvenanceContributor[];
}

/** A single detector's claim that `[start, end)` holds a PII value. */
export interface Candidate extends Span {
  id: string;
  type: EntityType;
  text: string;
  confidence: number;
  source: string;
  method: DetectionMethod;
  bbox?: BoundingBox;
  provenance?: Provenance;
  metadata: JsonObject;
}

export interface MergedCandidate extends Candidate {
  provenance: Provenance;
}

export const RISK_LEVELS = ['low', 'medium', 'high', 'critical'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export type ValidationOutcome = 'valid' | 'invalid' | 'unknown';
export type ValidationCheck = 'format' | 'checksum' | 'context' | 'commonWord' | 'length';
export type ValidationReport = Record<ValidationCheck, ValidationOutcome>;

export interface EntityContext {
  before: string;
  after: string;
  snippet: string;
}

export type DetectedEntity = Readonly<Candidate> & {
  readonly riskLevel: RiskLevel;
  readonly validation: Readonly<ValidationReport>;
  readonly context: Readonly<EntityContext>;
};

export const REDACTION_STRATEGIES = [
  'full_removal',
  'full_mask',
  'partial_mask',
  'tokenization',
  'pseudonymization',
  'generalization',
  'none',
] as const;

export type RedactionStrategy = (typeof REDACTION_STRATEGIES)[number];

export interface RedactionOptions {
  defaultStrategy: RedactionStrategy;
  perTypeStrategy: Partial<Record<EntityType, RedactionStrategy>>;
  maskChar: string;
  preserveFormat: boolean;
  preserveLength: boolean;
  tokenizationSecret?: string;
  customReplacements: Partial<Record<EntityType, string>>;
}

export const DEFAULT_REDACTION_OPTIONS: RedactionOptions = {
  defaultStrategy: 'partial_mask',
  perTypeStrategy: {},
  maskChar: 'X',
  preserveFormat: true,
  preserveLength: true,
  customReplacements: {},
};

export type RedactionMethod =
  | 'removal'
  | 'mask'
  | 'partial_mask'
  | 'encrypted_token'
  | 'hashed_token'
  | 'synthetic'
  | 'category_placeholder'
  | 'passthrough'
  | 'custom_replacement'
  | 'absorbed';

export interface RedactionAudit {
  strategy: RedactionStrategy;
  method: RedactionMethod;
  reversible: boolean;
  maskChar?: string;
  tokenPayload?: string;
  absorbedBy?: string;
}

export type RedactedEntity = DetectedEntity & {
  readonly redactedText: string;
  readonly redaction: Readonly<RedactionAudit>;
};

export interface RedactionResult {
  success: boolean;
  error?: string;
  originalText: string;
  redactedText: string;
  redactionCount: Partial<Record<EntityType, number>>;
  entities: RedactedEntity[];
  processingTimeMs: number;
  timestamp: string;
}

export interface DictionaryEntry {
  id: string;
  term: string;
  entityType: EntityType;
  caseSensitive: boolean;
  wholeWord: boolean;
  enabled: boolean;
  createdAt: Date;
}

export interface DetectorFailureInfo {
  detector: string;
  reason: string;
}

/** What happened during one detection run, independent of the entities found. */
export interface DetectionRun {
  textLength: number;
  detectorsUsed: string[];
  failedDetectors: DetectorFailureInfo[];
  settings: {
    confidenceThreshold: number;
    mergeThreshold: number;
    contextWindow: number;
  };
  preprocessing: {
    appliedSteps: string[];
    skippedSteps: string[];
    language: string | null;
    languageConfidence: number;
    approximate: boolean;
  };
  rawCandidateCount: number;
  unmappableDropped: number;
  processingTimeMs: number;
}

export interface DetectionOutcome {
  success: boolean;
  reason?: string;
  entities: DetectedEntity[];
  run: DetectionRun;
}
