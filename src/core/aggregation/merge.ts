import { v4 as uuidv4 } from 'uuid';
import type { Candidate, MergedCandidate, ProvenanceContributor, Span } from '../types.js';

const spanLength = (s: Span): number => Math.max(0, s.end - s.start);

/** `|intersection| / |union|` of two spans; 0 when they do not intersect. */
export function overlapRatio(a: Span, b: Span): number {
  const intersection = Math.min(a.end, b.end) - Math.max(a.start, b.start);
  if (intersection <= 0) return 0;
  const union = Math.max(a.end, b.end) - Math.min(a.start, b.start);
  return union > 0 ? intersection / union : 0;
}

function contributorsOf(c: Candidate): ProvenanceContributor[] {
  return c.provenance?.contributors ?? [{ id: c.id, source: c.source, confidence: c.confidence }];
}

/**
 * Fuse two candidates. The more confident one is the base (ties go to `a`)
 * and keeps its type and text; the span is the union and confidence the
 * length-weighted average.
 */
export function mergePair(a: Candidate, b: Candidate): MergedCandidate {
  const [base, other] = a.confidence >= b.confidence ? [a, b] : [b, a];

  const lenA = spanLength(a);
  const lenB = spanLength(b);
  const total = lenA + lenB;
  const weighted = total > 0
    ? (a.confidence * lenA + b.confidence * lenB) / total
    : (a.confidence + b.confidence) / 2;

  const contributors = [...contributorsOf(base), ...contributorsOf(other)];
  const sources = [...new Set(contributors.map(c => c.source))];

  const merged: MergedCandidate = {
    id: uuidv4(),
    type: base.type,
    text: base.text,
    start: Math.min(a.start, b.start),
    end: Math.max(a.end, b.end),
    confidence: Math.min(weighted, 1.0),
    source: sources.join('+'),
    method: base.method,
    provenance: { contributors },
    metadata: { ...other.metadata, ...base.metadata },
  };
  const bbox = base.bbox ?? other.bbox;
  if (bbox) merged.bbox = { ...bbox };
  return merged;
}

/**
 * Walk candidates by start offset, folding each into the first accepted
 * candidate it overlaps by at least `threshold`.
 */
export function mergeCandidates(candidates: readonly Candidate[], threshold: number): Candidate[] {
  const sorted = [...candidates].sort((x, y) => x.start - y.start);
  const accepted: Candidate[] = [];

  for (const candidate of sorted) {
    const index = accepted.findIndex(existing => overlapRatio(existing, candidate) >= threshold);
    if (index === -1) {
      accepted.push(candidate);
    } else {
      accepted[index] = mergePair(accepted[index], candidate);
    }
  }

  return accepted;
}

export function filterByConfidence(candidates: readonly Candidate[], threshold: number): Candidate[] {
  return candidates.filter(c => c.confidence >= threshold);
}

/** Confidence descending, then start ascending. */
export function compareByConfidence(a: Span & { confidence: number }, b: Span & { confidence: number }): number {
  return b.confidence - a.confidence || a.start - b.start;
}

export function orderByConfidence<T extends Span & { confidence: number }>(candidates: readonly T[]): T[] {
  return [...candidates].sort(compareByConfidence);
}
