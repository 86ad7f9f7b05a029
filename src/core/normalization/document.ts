import type { JsonObject } from '../types.js';

export const UNMAPPABLE: readonly [number, number] = [-1, -1];

export interface TextSegment {
  kind: 'paragraph';
  text: string;
  start: number;
  end: number;
}

/**
 * Where each output character of a step came from in the step's input:
 * `[first, last]` input indices, or -1 on either side when that edge of the
 * character cannot be traced.
 */
export type SourceRange = readonly [number, number];

/**
 * Text threaded through the normalization steps. For every character of the
 * processed text it keeps the original offset the character starts at and
 * the original offset its contribution ends at (exclusive); -1 marks an edge
 * that cannot be traced back.
 */
export class ProcessedDocument {
  readonly originalText: string;
  readonly metadata: JsonObject;
  readonly appliedSteps: string[] = [];
  readonly skippedSteps: string[] = [];
  segments: TextSegment[] = [];
  language: string | null = null;
  languageConfidence = 0;
  approximate = false;

  private text: string;
  private startMap: number[];
  private endMap: number[];

  constructor(originalText: string, metadata: JsonObject = {}) {
    this.originalText = originalText;
    this.metadata = metadata;
    this.text = originalText;
    this.startMap = Array.from({ length: originalText.length }, (_, i) => i);
    this.endMap = Array.from({ length: originalText.length }, (_, i) => i + 1);
  }

  get processedText(): string {
    return this.text;
  }

  get positionMap(): readonly number[] {
    return this.startMap;
  }

  /**
   * Replace the processed text. `sources[i]` locates output character `i` in
   * the current processed text; the maps are composed so they keep pointing
   * at the original.
   */
  rewrite(text: string, sources: readonly SourceRange[], approximate = false): void {
    if (sources.length !== text.length) {
      throw new Error(`Source map covers ${sources.length} characters, text has ${text.length}`);
    }
    const startMap: number[] = new Array<number>(text.length);
    const endMap: number[] = new Array<number>(text.length);
    for (let i = 0; i < sources.length; i++) {
      const [first, last] = sources[i];
      startMap[i] = first >= 0 ? this.startMap[first] : -1;
      endMap[i] = last >= 0 ? this.endMap[last] : -1;
    }
    this.text = text;
    this.startMap = startMap;
    this.endMap = endMap;
    if (approximate) this.approximate = true;
  }

  mapPosition(position: number): number {
    if (!Number.isInteger(position) || position < 0 || position > this.text.length) return -1;
    if (position === this.text.length) return this.originalText.length;
    return this.startMap[position];
  }

  /** Original range for processed `[start, end)`, or `(-1, -1)`. */
  mapRange(start: number, end: number): [number, number] {
    if (!Number.isInteger(start) || !Number.isInteger(end)) return [...UNMAPPABLE];
    if (start < 0 || end > this.text.length || start > end) return [...UNMAPPABLE];

    if (start === end) {
      const position = this.mapPosition(start);
      return position < 0 ? [...UNMAPPABLE] : [position, position];
    }

    const originalStart = this.startMap[start];
    const originalEnd = this.endMap[end - 1];
    if (originalStart < 0 || originalEnd < 0 || originalEnd < originalStart) {
      return [...UNMAPPABLE];
    }
    return [originalStart, originalEnd];
  }
}
