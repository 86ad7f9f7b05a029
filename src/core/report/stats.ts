import type { Candidate } from '../types.js';

export const CONFIDENCE_BANDS = [
  '0%-9%',
  '10%-19%',
  '20%-29%',
  '30%-39%',
  '40%-49%',
  '50%-59%',
  '60%-69%',
  '70%-79%',
  '80%-89%',
  '90%-100%',
] as const;

export type ConfidenceBand = (typeof CONFIDENCE_BANDS)[number];

export interface StatsSnapshot {
  totalDetections: number;
  byDetector: Record<string, number>;
  byEntityType: Record<string, number>;
  confidenceDistribution: Record<ConfidenceBand, number>;
}

export function confidenceBand(confidence: number): ConfidenceBand {
  const permille = Math.round(Math.min(1, Math.max(0, confidence)) * 1000);
  return CONFIDENCE_BANDS[Math.min(9, Math.floor(permille / 100))];
}

function emptyDistribution(): Record<ConfidenceBand, number> {
  return {
    '0%-9%': 0,
    '10%-19%': 0,
    '20%-29%': 0,
    '30%-39%': 0,
    '40%-49%': 0,
    '50%-59%': 0,
    '60%-69%': 0,
    '70%-79%': 0,
    '80%-89%': 0,
    '90%-100%': 0,
  };
}

/** Running counters over every entity a pipeline has reported. */
export class DetectionStats {
  private total = 0;
  private byDetector = new Map<string, number>();
  private byEntityType = new Map<string, number>();
  private distribution = emptyDistribution();

  record(entities: readonly Pick<Candidate, 'type' | 'source' | 'confidence'>[]): void {
    for (const entity of entities) {
      this.total++;
      // A merged source ("regex+names") counts once per contributing detector
      for (const detector of new Set(entity.source.split('+'))) {
        this.byDetector.set(detector, (this.byDetector.get(detector) ?? 0) + 1);
      }
      this.byEntityType.set(entity.type, (this.byEntityType.get(entity.type) ?? 0) + 1);
      this.distribution[confidenceBand(entity.confidence)]++;
    }
  }

  snapshot(): StatsSnapshot {
    return {
      totalDetections: this.total,
      byDetector: Object.fromEntries(this.byDetector),
      byEntityType: Object.fromEntries(this.byEntityType),
      confidenceDistribution: { ...this.distribution },
    };
  }

  reset(): void {
    this.total = 0;
    this.byDetector.clear();
    this.byEntityType.clear();
    this.distribution = emptyDistribution();
  }
}
