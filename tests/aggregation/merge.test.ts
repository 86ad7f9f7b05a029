import { describe, it, expect } from 'vitest';
import {
  compareByConfidence,
  filterByConfidence,
  mergeCandidates,
  mergePair,
  orderByConfidence,
  overlapRatio,
} from '../../src/core/aggregation/merge.js';
import { createCandidate } from '../../src/core/detection/detector.js';
import type { Candidate, EntityType } from '../../src/core/types.js';

const candidate = (
  start: number,
  end: number,
  confidence: number,
  source = 'regex',
  type: EntityType = 'person'
): Candidate =>
  createCandidate({
    type,
    text: 'x'.repeat(end - start),
    start,
    end,
    confidence,
    source,
    method: source === 'regex' ? 'pattern' : 'lexicon',
  });

describe('overlapRatio', () => {
  it('should be intersection over union', () => {
    expect(overlapRatio({ start: 0, end: 10 }, { start: 1, end: 11 })).toBeCloseTo(9 / 11);
  });

  it('should be symmetric', () => {
    const a = { start: 0, end: 10 };
    const b = { start: 4, end: 20 };
    expect(overlapRatio(a, b)).toBe(overlapRatio(b, a));
  });

  it('should be 0 for disjoint or touching spans', () => {
    expect(overlapRatio({ start: 0, end: 5 }, { start: 6, end: 9 })).toBe(0);
    expect(overlapRatio({ start: 0, end: 5 }, { start: 5, end: 9 })).toBe(0);
  });

  it('should be 1 for identical spans', () => {
    expect(overlapRatio({ start: 3, end: 8 }, { start: 3, end: 8 })).toBe(1);
  });
});

describe('mergePair', () => {
  it('should take the union span and a length-weighted confidence', () => {
    const merged = mergePair(candidate(0, 10, 0.9), candidate(2, 14, 0.6, 'names'));
    expect(merged.start).toBe(0);
    expect(merged.end).toBe(14);
    expect(merged.confidence).toBeCloseTo(0.736, 3);
  });

  it('should give the same span and confidence in either order', () => {
    const a = candidate(0, 10, 0.9);
    const b = candidate(2, 14, 0.6, 'names');
    const ab = mergePair(a, b);
    const ba = mergePair(b, a);
    expect([ba.start, ba.end, ba.confidence]).toEqual([ab.start, ab.end, ab.confidence]);
  });

  it('should keep the type and text of the more confident candidate', () => {
    const low = candidate(0, 4, 0.5, 'names', 'person');
    const high = { ...candidate(0, 5, 0.9, 'regex', 'organization'), text: 'Acme.' };
    const merged = mergePair(low, high);
    expect(merged.type).toBe('organization');
    expect(merged.text).toBe('Acme.');
    expect(merged.method).toBe('pattern');
  });

  it('should record both contributors and join distinct sources', () => {
    const a = candidate(0, 10, 0.9, 'regex');
    const b = candidate(1, 11, 0.6, 'names');
    const merged = mergePair(a, b);
    expect(merged.source).toBe('regex+names');
    expect(merged.provenance.contributors).toEqual([
      { id: a.id, source: 'regex', confidence: 0.9 },
      { id: b.id, source: 'names', confidence: 0.6 },
    ]);
  });

  it('should list a repeated source once', () => {
    const merged = mergePair(candidate(0, 10, 0.9), candidate(1, 11, 0.8));
    expect(merged.source).toBe('regex');
    expect(merged.provenance.contributors).toHaveLength(2);
  });

  it('should flatten the contributors of an already merged candidate', () => {
    const first = mergePair(candidate(0, 10, 0.9), candidate(1, 11, 0.6, 'names'));
    const second = mergePair(first, candidate(0, 11, 0.7, 'dictionary'));
    expect(second.provenance.contributors.map(c => c.source)).toEqual(['regex', 'names', 'dictionary']);
    expect(second.source).toBe('regex+names+dictionary');
  });

  it('should let the base candidate win on metadata keys', () => {
    const a = { ...candidate(0, 10, 0.9), metadata: { rule: 'a', only: 1 } };
    const b = { ...candidate(0, 10, 0.5), metadata: { rule: 'b', other: 2 } };
    expect(mergePair(a, b).metadata).toEqual({ rule: 'a', only: 1, other: 2 });
  });

  it('should average confidences of empty spans', () => {
    expect(mergePair(candidate(4, 4, 0.8), candidate(4, 4, 0.6)).confidence).toBeCloseTo(0.7);
  });
});

describe('mergeCandidates', () => {
  it('should fuse spans that overlap at or above the threshold', () => {
    const merged = mergeCandidates([candidate(0, 10, 0.9), candidate(1, 11, 0.6, 'names')], 0.7);
    expect(merged).toHaveLength(1);
    expect(merged[0].confidence).toBeCloseTo(0.75);
  });

  it('should keep spans below the threshold apart', () => {
    const merged = mergeCandidates([candidate(0, 10, 0.9), candidate(2, 14, 0.6)], 0.7);
    expect(merged.map(c => [c.start, c.end])).toEqual([
      [0, 10],
      [2, 14],
    ]);
  });

  it('should give the same spans regardless of input order', () => {
    const items = [candidate(20, 30, 0.8), candidate(0, 10, 0.9), candidate(1, 11, 0.6, 'names')];
    const spans = (list: Candidate[]) => list.map(c => [c.start, c.end, c.source]);
    expect(spans(mergeCandidates(items, 0.7))).toEqual(spans(mergeCandidates([...items].reverse(), 0.7)));
  });

  it('should be idempotent', () => {
    const once = mergeCandidates([candidate(0, 10, 0.9), candidate(1, 11, 0.6, 'names'), candidate(40, 45, 0.7)], 0.7);
    const twice = mergeCandidates(once, 0.7);
    expect(twice.map(c => [c.start, c.end, c.confidence])).toEqual(once.map(c => [c.start, c.end, c.confidence]));
  });

  it('should not mutate its input', () => {
    const items = [candidate(5, 10, 0.9), candidate(0, 3, 0.6)];
    mergeCandidates(items, 0.7);
    expect(items.map(c => c.start)).toEqual([5, 0]);
  });
});

describe('filtering and ordering', () => {
  it('should keep candidates at or above the confidence threshold', () => {
    const kept = filterByConfidence([candidate(0, 1, 0.5), candidate(2, 3, 0.49)], 0.5);
    expect(kept.map(c => c.start)).toEqual([0]);
  });

  it('should order by confidence, then by start', () => {
    const ordered = orderByConfidence([candidate(9, 10, 0.7), candidate(5, 6, 0.9), candidate(1, 2, 0.7)]);
    expect(ordered.map(c => c.start)).toEqual([5, 1, 9]);
  });

  it('should compare equal confidence by position', () => {
    expect(compareByConfidence({ start: 1, end: 2, confidence: 0.5 }, { start: 3, end: 4, confidence: 0.5 })).toBeLessThan(0);
  });
});
