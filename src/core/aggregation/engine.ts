import type { DetectionOptions, Detector } from '../detection/detector.js';
import { describeError } from '../errors.js';
import type { Candidate, DetectorFailureInfo } from '../types.js';
import { filterByConfidence, mergeCandidates, orderByConfidence } from './merge.js';

export interface AggregationSettings {
  confidenceThreshold: number;
  mergeThreshold: number;
  detectorTimeoutMs: number;
}

export const DEFAULT_AGGREGATION_SETTINGS: AggregationSettings = {
  confidenceThreshold: 0.5,
  mergeThreshold: 0.7,
  detectorTimeoutMs: 10_000,
};

export interface AggregationRunOptions extends DetectionOptions {
  /** Run only these detectors (by name). */
  enabledDetectors?: readonly string[];
  disabledDetectors?: readonly string[];
}

export type DetectorFailure = DetectorFailureInfo;

export interface AggregationResult {
  candidates: Candidate[];
  detectorsUsed: string[];
  failedDetectors: DetectorFailure[];
  rawCandidateCount: number;
}

class DetectorTimeoutError extends Error {
  constructor(detector: string, ms: number) {
    super(`Detector "${detector}" timed out after ${ms}ms`);
    this.name = 'DetectorTimeoutError';
  }
}

function withTimeout<T>(work: Promise<T>, ms: number, detector: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DetectorTimeoutError(detector, ms)), ms);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

function isWellFormed(c: Candidate, textLength: number): boolean {
  return (
    Number.isInteger(c.start) &&
    Number.isInteger(c.end) &&
    c.start >= 0 &&
    c.start <= c.end &&
    c.end <= textLength &&
    Number.isFinite(c.confidence)
  );
}

/**
 * Runs detectors concurrently over one text and reduces their output to a
 * single merged, filtered and ordered candidate list.
 */
export class AggregationEngine {
  private readonly detectors = new Map<string, Detector>();
  private readonly settings: AggregationSettings;

  constructor(detectors: Detector[] = [], settings: Partial<AggregationSettings> = {}) {
    this.settings = { ...DEFAULT_AGGREGATION_SETTINGS, ...settings };
    for (const detector of detectors) this.register(detector);
  }

  register(detector: Detector): void {
    this.detectors.set(detector.name, detector);
  }

  unregister(name: string): boolean {
    return this.detectors.delete(name);
  }

  list(): Detector[] {
    return [...this.detectors.values()];
  }

  getSettings(): Readonly<AggregationSettings> {
    return this.settings;
  }

  selectDetectors(options: AggregationRunOptions): Detector[] {
    const enabled = options.enabledDetectors ? new Set(options.enabledDetectors) : null;
    const disabled = new Set(options.disabledDetectors ?? []);
    return this.list().filter(d => (!enabled || enabled.has(d.name)) && !disabled.has(d.name));
  }

  async process(text: string, options: AggregationRunOptions = {}): Promise<AggregationResult> {
    const selected = this.selectDetectors(options);
    const detectionOptions: DetectionOptions = Object.freeze({
      entityTypes: options.entityTypes ? [...options.entityTypes] : undefined,
      locale: options.locale ?? null,
      language: options.language ?? null,
      segments: options.segments ? [...options.segments] : undefined,
      metadata: options.metadata ? { ...options.metadata } : undefined,
    });

    const settled = await Promise.allSettled(
      selected.map(detector =>
        withTimeout(
          Promise.resolve().then(() => detector.detect(text, detectionOptions)),
          this.settings.detectorTimeoutMs,
          detector.name
        )
      )
    );

    const collected: Candidate[] = [];
    const failedDetectors: DetectorFailure[] = [];

    settled.forEach((outcome, i) => {
      const detector = selected[i];
      if (outcome.status === 'rejected') {
        const reason = describeError(outcome.reason);
        console.warn(`Detector "${detector.name}" failed:`, reason);
        failedDetectors.push({ detector: detector.name, reason });
        return;
      }
      if (!Array.isArray(outcome.value)) {
        failedDetectors.push({ detector: detector.name, reason: 'Detector returned a non-list result' });
        return;
      }
      for (const candidate of outcome.value) {
        if (!isWellFormed(candidate, text.length)) {
          console.warn(`Discarding malformed candidate from "${detector.name}"`);
          continue;
        }
        if (options.entityTypes?.length && !options.entityTypes.includes(candidate.type)) continue;
        collected.push({ ...candidate, confidence: Math.min(1, Math.max(0, candidate.confidence)) });
      }
    });

    const merged = mergeCandidates(collected, this.settings.mergeThreshold);
    const filtered = filterByConfidence(merged, this.settings.confidenceThreshold);

    return {
      candidates: orderByConfidence(filtered),
      detectorsUsed: selected.map(d => d.name),
      failedDetectors,
      rawCandidateCount: collected.length,
    };
  }
}
