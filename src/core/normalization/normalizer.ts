import { Lexicon } from '../lexicon.js';
import type { JsonObject } from '../types.js';
import { ProcessedDocument, type SourceRange, type TextSegment } from './document.js';

export const NORMALIZATION_STEPS = [
  'removeControlChars',
  'normalizeWhitespace',
  'normalizeUnicode',
  'detectLanguage',
  'segmentText',
] as const;

export type NormalizationStep = (typeof NORMALIZATION_STEPS)[number];

export function isNormalizationStep(step: string): step is NormalizationStep {
  return NORMALIZATION_STEPS.some(known => known === step);
}

const CONTROL_CHAR = /^\p{C}$/u;
const KEPT_CONTROLS = new Set(['\t', '\n', '\r']);
const HORIZONTAL_SPACE = /[^\S\r\n]/;
const CLUSTER = /\P{M}\p{M}*|\p{M}+/gsu;
const PARAGRAPH_BREAK = /\n\s*\n/g;
const WORD = /[A-Za-z]{2,}/g;

const LANGUAGE_MIN_LENGTH = 10;
const LANGUAGE_SAMPLE_LENGTH = 4000;
const LANGUAGE_MIN_WORDS = 3;
const ENGLISH_RATIO_THRESHOLD = 0.5;

type StepHandler = (doc: ProcessedDocument) => void;

export class TextNormalizer {
  private readonly handlers: Record<NormalizationStep, StepHandler>;

  constructor(private readonly lexicon: Lexicon = new Lexicon()) {
    this.handlers = {
      removeControlChars: removeControlChars,
      normalizeWhitespace: normalizeWhitespace,
      normalizeUnicode: normalizeUnicode,
      detectLanguage: doc => this.detectLanguage(doc),
      segmentText: segmentText,
    };
  }

  /**
   * Run `steps` in order over `text`. A step that throws is skipped and the
   * document keeps its state from before that step.
   */
  normalize(
    text: string,
    steps: readonly string[] = NORMALIZATION_STEPS,
    metadata: JsonObject = {}
  ): ProcessedDocument {
    const doc = new ProcessedDocument(text, metadata);

    for (const step of steps) {
      if (!isNormalizationStep(step)) {
        console.warn(`Unknown normalization step "${step}", skipping`);
        doc.skippedSteps.push(step);
        continue;
      }
      try {
        this.handlers[step](doc);
        doc.appliedSteps.push(step);
      } catch (err) {
        console.warn(`Normalization step "${step}" failed, skipping:`, err);
        doc.skippedSteps.push(step);
      }
    }

    return doc;
  }

  private detectLanguage(doc: ProcessedDocument): void {
    const guess = guessLanguage(doc.processedText, this.lexicon);
    doc.language = guess.language;
    doc.languageConfidence = guess.confidence;
  }
}

export interface LanguageGuess {
  language: string;
  confidence: number;
}

/** `en` when enough of the sampled words are English, otherwise `und`. */
export function guessLanguage(text: string, lexicon: Lexicon): LanguageGuess {
  if (text.trim().length < LANGUAGE_MIN_LENGTH) return { language: 'und', confidence: 0 };

  const words = text.slice(0, LANGUAGE_SAMPLE_LENGTH).match(WORD) ?? [];
  if (words.length < LANGUAGE_MIN_WORDS) return { language: 'und', confidence: 0 };

  const english = words.filter(w => lexicon.isEnglishWord(w)).length;
  const ratio = Math.round((english / words.length) * 1000) / 1000;
  return ratio >= ENGLISH_RATIO_THRESHOLD
    ? { language: 'en', confidence: ratio }
    : { language: 'und', confidence: 0 };
}

function removeControlChars(doc: ProcessedDocument): void {
  const text = doc.processedText;
  let out = '';
  const sources: SourceRange[] = [];

  for (let i = 0; i < text.length; ) {
    const char = String.fromCodePoint(text.codePointAt(i) ?? 0);
    if (!CONTROL_CHAR.test(char) || KEPT_CONTROLS.has(char)) {
      for (let k = 0; k < char.length; k++) sources.push([i + k, i + k]);
      out += char;
    }
    i += char.length;
  }

  if (out.length !== text.length) doc.rewrite(out, sources);
}

function isLineBreak(char: string): boolean {
  return char === '\n' || char === '\r';
}

function normalizeWhitespace(doc: ProcessedDocument): void {
  const text = doc.processedText;
  let out = '';
  const sources: SourceRange[] = [];

  let i = 0;
  while (i < text.length) {
    const char = text[i];
    if (!isLineBreak(char) && !HORIZONTAL_SPACE.test(char)) {
      out += char;
      sources.push([i, i]);
      i++;
      continue;
    }

    const runStart = i;
    const breaks: number[] = [];
    while (i < text.length && (isLineBreak(text[i]) || HORIZONTAL_SPACE.test(text[i]))) {
      if (text[i] === '\r' && text[i + 1] === '\n') {
        breaks.push(i);
        i += 2;
      } else {
        if (isLineBreak(text[i])) breaks.push(i);
        i++;
      }
    }
    const runLast = i - 1;

    if (breaks.length === 0) {
      out += ' ';
      sources.push([runStart, runLast]);
    } else if (breaks.length === 1) {
      out += '\n';
      sources.push([runStart, runLast]);
    } else {
      const lastBreak = breaks[breaks.length - 1];
      out += '\n\n';
      sources.push([runStart, lastBreak - 1]);
      sources.push([lastBreak, runLast]);
    }
  }

  if (out !== text) doc.rewrite(out, sources);
}

/**
 * NFKC per starter+marks cluster. When a cluster expands to several
 * characters only its outer edges stay traceable; when cluster-wise output
 * disagrees with whole-text normalization the map falls back to a
 * proportional estimate and the document is flagged approximate.
 */
function normalizeUnicode(doc: ProcessedDocument): void {
  const text = doc.processedText;
  const whole = text.normalize('NFKC');
  if (whole === text) return;

  let out = '';
  const sources: SourceRange[] = [];
  for (const match of text.matchAll(CLUSTER)) {
    const start = match.index ?? 0;
    const cluster = match[0];
    const last = start + cluster.length - 1;
    const normalized = cluster.normalize('NFKC');
    out += normalized;

    if (normalized.length === cluster.length) {
      for (let k = 0; k < normalized.length; k++) sources.push([start + k, start + k]);
    } else if (normalized.length === 1) {
      sources.push([start, last]);
    } else {
      for (let k = 0; k < normalized.length; k++) {
        if (k === 0) sources.push([start, -1]);
        else if (k === normalized.length - 1) sources.push([-1, last]);
        else sources.push([-1, -1]);
      }
    }
  }

  if (out === whole) {
    doc.rewrite(out, sources);
    return;
  }

  const proportional: SourceRange[] = [];
  for (let i = 0; i < whole.length; i++) {
    const estimate = Math.min(text.length - 1, Math.floor((i * text.length) / whole.length));
    proportional.push([estimate, estimate]);
  }
  doc.rewrite(whole, proportional, true);
}

function segmentText(doc: ProcessedDocument): void {
  const text = doc.processedText;
  const segments: TextSegment[] = [];
  let cursor = 0;

  const push = (start: number, end: number) => {
    const slice = text.slice(start, end);
    if (slice.trim().length > 0) segments.push({ kind: 'paragraph', text: slice, start, end });
  };

  for (const match of text.matchAll(PARAGRAPH_BREAK)) {
    const index = match.index ?? 0;
    push(cursor, index);
    cursor = index + match[0].length;
  }
  push(cursor, text.length);

  doc.segments = segments;
}
