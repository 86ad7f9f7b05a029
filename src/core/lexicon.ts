import { createRequire } from 'module';

const require = createRequire(import.meta.url);

export interface LexiconSource {
  firstNames?: Iterable<string>;
  englishWords?: Iterable<string>;
  frequencies?: Iterable<readonly [string, number]>;
}

interface FrequencyRow {
  word: string;
  count: number;
}

function isFrequencyRow(value: unknown): value is FrequencyRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    'word' in value &&
    'count' in value &&
    typeof value.word === 'string' &&
    typeof value.count === 'number'
  );
}

function requireList(id: string): unknown[] {
  const data: unknown = require(id);
  if (!Array.isArray(data)) {
    throw new Error(`Dataset "${id}" did not export a list`);
  }
  return data;
}

function requireStrings(id: string): string[] {
  return requireList(id).filter((v): v is string => typeof v === 'string');
}

/**
 * Word lists backing the name detector and the language guess. Datasets are
 * loaded on first use unless supplied up front.
 */
export class Lexicon {
  private firstNames: Set<string> | null = null;
  private englishWords: Set<string> | null = null;
  private frequencies: Map<string, number> | null = null;

  constructor(source: LexiconSource = {}) {
    if (source.firstNames) this.firstNames = lowerSet(source.firstNames);
    if (source.englishWords) this.englishWords = lowerSet(source.englishWords);
    if (source.frequencies) {
      this.frequencies = new Map([...source.frequencies].map(([w, c]) => [w.toLowerCase(), c]));
    }
  }

  isFirstName(word: string): boolean {
    return this.getFirstNames().has(word.toLowerCase());
  }

  isEnglishWord(word: string): boolean {
    return this.getEnglishWords().has(word.toLowerCase());
  }

  /** Occurrences in the SUBTLEXus corpus, 0 when unlisted. */
  frequency(word: string): number {
    return this.getFrequencies().get(word.toLowerCase()) ?? 0;
  }

  private getFirstNames(): Set<string> {
    if (!this.firstNames) {
      this.firstNames = lowerSet([
        ...requireStrings('datasets-male-first-names-en'),
        ...requireStrings('datasets-female-first-names-en'),
      ]);
    }
    return this.firstNames;
  }

  private getEnglishWords(): Set<string> {
    if (!this.englishWords) {
      this.englishWords = lowerSet(requireStrings('an-array-of-english-words'));
    }
    return this.englishWords;
  }

  private getFrequencies(): Map<string, number> {
    if (!this.frequencies) {
      const rows = requireList('subtlex-word-frequencies').filter(isFrequencyRow);
      this.frequencies = new Map(rows.map(r => [r.word.toLowerCase(), r.count]));
    }
    return this.frequencies;
  }
}

function lowerSet(words: Iterable<string>): Set<string> {
  const set = new Set<string>();
  for (const w of words) set.add(w.toLowerCase());
  return set;
}
