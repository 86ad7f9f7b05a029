import { Lexicon } from '../lexicon.js';
import type { Candidate, EntityType } from '../types.js';
import { createCandidate, wantsType, type DetectionOptions, type Detector } from './detector.js';

// Words with frequency below this threshold in the SUBTLEXus corpus (51M words)
// are rare enough as English words that they're more likely names in context.
// e.g. "nick" (3062), "ben" (4994) → likely names
// vs.  "will" (108306), "may" (26080) → likely English words
const RARE_WORD_FREQ_THRESHOLD = 10000;

const MIN_WORD_LENGTH = 3;
const WORD_PATTERN = /\b([A-Za-z][a-zA-Z']+)\b/g;
const SURNAME = /^ ([A-Z][a-z]+(?:[-'][A-Z][a-z]+)?)\b/;
const SENTENCE_END = /[.?!]\s*$/;
const SENTENCE_START_PENALTY = { capitalized: 0.15, lowercase: 0.2 };
const ADDRESS_PUNCTUATION = new Set(['@', '.', '_', '/', '\\', ':']);

// Common proper nouns that aren't names; the English words dataset omits these
const COMMON_PROPER_NOUNS = new Set([
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
  'january', 'february', 'march', 'april', 'may', 'june', 'july', 'august',
  'september', 'october', 'november', 'december',
  'american', 'european', 'african', 'asian', 'australian',
  'english', 'french', 'german', 'spanish', 'chinese', 'japanese', 'italian',
  'christian', 'muslim', 'jewish', 'buddhist', 'hindu',
  'street', 'road', 'avenue', 'lane', 'drive',
]);

type NameRule = 'full_name' | 'known_name' | 'ambiguous_name' | 'rare_word' | 'capitalized_word';

function isLikelySentenceStart(text: string, matchIndex: number): boolean {
  if (matchIndex === 0) return true;
  const before = text.slice(0, matchIndex).trimEnd();
  if (before.length === 0) return true;
  return SENTENCE_END.test(before);
}

/** Word is part of an email, URL, path or dotted identifier. */
function isEmbedded(text: string, start: number, end: number): boolean {
  const prev = text[start - 1];
  const next = text[end];
  if (prev !== undefined && ADDRESS_PUNCTUATION.has(prev)) return true;
  if (next === '@' || next === '_') return true;
  return next === '.' && /\w/.test(text[end + 1] ?? '');
}

function isAcronym(word: string): boolean {
  return word === word.toUpperCase();
}

const round2 = (n: number): number => Math.round(n * 100) / 100;

/**
 * Person names from first-name datasets, weighed against English word lists
 * and corpus frequency.
 */
export class NameDetector implements Detector {
  readonly name = 'names';
  readonly method = 'lexicon' as const;

  constructor(private readonly lexicon: Lexicon = new Lexicon()) {}

  supportedTypes(): EntityType[] {
    return ['person'];
  }

  async warmUp(): Promise<void> {
    this.lexicon.isFirstName('warm');
    this.lexicon.isEnglishWord('warm');
    this.lexicon.frequency('warm');
  }

  async detect(text: string, options: DetectionOptions): Promise<Candidate[]> {
    if (!wantsType(options, 'person')) return [];
    try {
      return this.scan(text);
    } catch (err) {
      console.warn('Name detection failed:', err);
      return [];
    }
  }

  private scan(text: string): Candidate[] {
    const found: Candidate[] = [];
    let skipUntil = 0;

    for (const match of text.matchAll(WORD_PATTERN)) {
      const index = match.index ?? 0;
      if (index < skipUntil) continue;

      const word = match[1];
      const end = index + word.length;
      if (word.length < MIN_WORD_LENGTH) continue;
      if (isAcronym(word) || isEmbedded(text, index, end)) continue;

      const lower = word.toLowerCase();
      if (COMMON_PROPER_NOUNS.has(lower)) continue;

      const isCapitalized = /^[A-Z]/.test(word);
      const isName = this.lexicon.isFirstName(lower);
      const sentenceStart = isLikelySentenceStart(text, index);

      // Known first name followed by a capitalized surname
      if (isName && isCapitalized) {
        const surname = SURNAME.exec(text.slice(end));
        if (surname && !COMMON_PROPER_NOUNS.has(surname[1].toLowerCase()) && !isAcronym(surname[1])) {
          const fullEnd = end + surname[0].length;
          const confidence = sentenceStart ? 0.85 - SENTENCE_START_PENALTY.capitalized : 0.85;
          found.push(this.candidate(text, index, fullEnd, confidence, 'full_name'));
          skipUntil = fullEnd;
          continue;
        }
      }

      const scored = this.scoreWord(lower, isName, isCapitalized);
      if (!scored) continue;
      let { confidence } = scored;

      if (sentenceStart) {
        // Unknown word at sentence start is too ambiguous
        if (!isName) continue;
        confidence -= isCapitalized ? SENTENCE_START_PENALTY.capitalized : SENTENCE_START_PENALTY.lowercase;
      }

      if (confidence > 0) {
        found.push(this.candidate(text, index, end, confidence, scored.rule));
      }
    }

    return found;
  }

  private scoreWord(
    lower: string,
    isName: boolean,
    isCapitalized: boolean
  ): { confidence: number; rule: NameRule } | null {
    const isEnglish = this.lexicon.isEnglishWord(lower);

    if (isName && !isEnglish) {
      // Known name, not an English word (e.g. "Jessica" or "jessica")
      return { confidence: isCapitalized ? 0.85 : 0.65, rule: 'known_name' };
    }

    if (isName && isEnglish) {
      const isRareWord = this.lexicon.frequency(lower) < RARE_WORD_FREQ_THRESHOLD;
      // Capitalized ambiguous: "Rose", "Nick", "Will"
      if (isCapitalized) return { confidence: isRareWord ? 0.7 : 0.5, rule: 'ambiguous_name' };
      // Lowercase but rare English word: "nick", "ben"
      if (isRareWord) return { confidence: 0.45, rule: 'rare_word' };
      return null;
    }

    if (!isName && !isEnglish && isCapitalized) {
      return { confidence: 0.7, rule: 'capitalized_word' };
    }

    return null;
  }

  private candidate(text: string, start: number, end: number, confidence: number, rule: NameRule): Candidate {
    return createCandidate({
      type: 'person',
      text: text.slice(start, end),
      start,
      end,
      confidence: round2(confidence),
      source: this.name,
      method: this.method,
      metadata: { rule },
    });
  }
}
