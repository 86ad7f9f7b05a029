import { v4 as uuidv4 } from 'uuid';
import type { TextSegment } from '../normalization/document.js';
import type { BoundingBox, Candidate, DetectionMethod, EntityType, JsonObject } from '../types.js';

/** Read-only per-call input handed to every detector. */
export interface DetectionOptions {
  readonly entityTypes?: readonly EntityType[];
  readonly locale?: string | null;
  readonly language?: string | null;
  readonly segments?: readonly TextSegment[];
  /** Source-document metadata passed through from the caller. */
  readonly metadata?: Readonly<JsonObject>;
}

/**
 * Contract for every recognizer. `detect` resolves with a fresh list and
 * resolves with `[]` on internal failure instead of rejecting.
 */
export interface Detector {
  readonly name: string;
  readonly method: DetectionMethod;
  supportedTypes(): readonly EntityType[];
  detect(text: string, options: DetectionOptions): Promise<Candidate[]>;
  /** Optional eager load of heavy resources, called by the host once at startup. */
  warmUp?(): Promise<void>;
}

export interface CandidateFields {
  type: EntityType;
  text: string;
  start: number;
  end: number;
  confidence: number;
  source: string;
  method: DetectionMethod;
  bbox?: BoundingBox;
  metadata?: JsonObject;
}

export function createCandidate(fields: CandidateFields): Candidate {
  const candidate: Candidate = {
    id: uuidv4(),
    type: fields.type,
    text: fields.text,
    start: fields.start,
    end: fields.end,
    confidence: fields.confidence,
    source: fields.source,
    method: fields.method,
    metadata: { ...fields.metadata },
  };
  if (fields.bbox) candidate.bbox = { ...fields.bbox };
  return candidate;
}

export function wantsType(options: DetectionOptions, type: EntityType): boolean {
  return !options.entityTypes || options.entityTypes.length === 0 || options.entityTypes.includes(type);
}
