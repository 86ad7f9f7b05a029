import { describe, it, expect, vi, afterEach } from 'vitest';
import { NerDetector } from '../../src/core/detection/ner-detector.js';
import type { ClassifierLoader, RawEntity, TokenClassifier } from '../../src/core/detection/ner-detector.js';

const tag = (entity: string, word: string, score = 0.9, index = 0): RawEntity => ({ entity, word, score, index });

/** Classifier that reports the given entities for any chunk containing their first word. */
const fakeClassifier = (entities: RawEntity[]): TokenClassifier =>
  async text => entities.filter(e => text.includes(e.word.replace(/^##/, '')));

const loaderFor = (classifier: TokenClassifier): ClassifierLoader => async () => classifier;

describe('NER detector', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should detect a person name from merged BIO tags', async () => {
    const detector = new NerDetector(
      {},
      loaderFor(fakeClassifier([tag('B-PER', 'Sarah', 0.95), tag('I-PER', 'Johnson', 0.9)]))
    );
    const result = await detector.detect('My name is Sarah Johnson', {});

    expect(result).toHaveLength(1);
    expect(result[0].text).toBe('Sarah Johnson');
    expect(result[0].start).toBe(11);
    expect(result[0].end).toBe(24);
    expect(result[0].type).toBe('person');
    expect(result[0].source).toBe('ner');
    expect(result[0].method).toBe('statistical');
    expect(result[0].confidence).toBeCloseTo(0.925);
    expect(result[0].metadata).toEqual({ model: 'Xenova/bert-base-NER' });
  });

  it('should map organizations and locations', async () => {
    const detector = new NerDetector(
      {},
      loaderFor(fakeClassifier([tag('B-ORG', 'Microsoft'), tag('B-LOC', 'Seattle')]))
    );
    const result = await detector.detect('She works at Microsoft in Seattle', {});
    expect(result.map(c => [c.type, c.text])).toEqual([
      ['organization', 'Microsoft'],
      ['location', 'Seattle'],
    ]);
  });

  it('should drop MISC entities', async () => {
    const detector = new NerDetector({}, loaderFor(fakeClassifier([tag('B-MISC', 'French')])));
    expect(await detector.detect('They speak French', {})).toEqual([]);
  });

  it('should filter entities below the minimum confidence', async () => {
    const detector = new NerDetector(
      { minConfidence: 0.7 },
      loaderFor(fakeClassifier([tag('B-PER', 'Alice', 0.65), tag('B-LOC', 'Paris', 0.8)]))
    );
    const result = await detector.detect('Alice visited Paris', {});
    expect(result.map(c => c.text)).toEqual(['Paris']);
  });

  it('should skip single-character words', async () => {
    const detector = new NerDetector({}, loaderFor(fakeClassifier([tag('B-PER', 'J')])));
    expect(await detector.detect('Ask J about it', {})).toEqual([]);
  });

  it('should report every occurrence of a recognised word', async () => {
    const detector = new NerDetector({}, loaderFor(fakeClassifier([tag('B-ORG', 'Acme')])));
    const result = await detector.detect('Acme sued ACME', {});
    expect(result.map(c => [c.start, c.text])).toEqual([
      [0, 'Acme'],
      [10, 'ACME'],
    ]);
  });

  it('should honour requested entity types', async () => {
    const classify = vi.fn(fakeClassifier([tag('B-PER', 'Alice')]));
    const detector = new NerDetector({}, loaderFor(classify));

    expect(await detector.detect('Alice', { entityTypes: ['email'] })).toEqual([]);
    expect(classify).not.toHaveBeenCalled();
    expect(await detector.detect('Alice left', { entityTypes: ['location'] })).toEqual([]);
  });

  it('should report an entity in the chunk overlap once', async () => {
    const text = 'a '.repeat(450) + 'Sarah' + ' b'.repeat(300);
    const classify = vi.fn(fakeClassifier([tag('B-PER', 'Sarah')]));
    const detector = new NerDetector({}, loaderFor(classify));

    const result = await detector.detect(text, {});
    expect(classify).toHaveBeenCalledTimes(2);
    expect(result).toHaveLength(1);
    expect(result[0].start).toBe(900);
    expect(result[0].end).toBe(905);
  });

  it('should return nothing for blank text', async () => {
    const loader = vi.fn(loaderFor(fakeClassifier([])));
    const detector = new NerDetector({}, loader);
    expect(await detector.detect('   ', {})).toEqual([]);
    expect(loader).not.toHaveBeenCalled();
  });

  it('should load the model once across calls', async () => {
    const loader = vi.fn(loaderFor(fakeClassifier([tag('B-PER', 'Alice')])));
    const detector = new NerDetector({ model: 'test-model' }, loader);

    await detector.warmUp();
    await detector.detect('Alice', {});
    expect(loader).toHaveBeenCalledOnce();
    expect(loader).toHaveBeenCalledWith('test-model');
  });

  it('should return nothing and hold off retrying when the model fails to load', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const loader = vi.fn<ClassifierLoader>(async () => {
      throw new Error('offline');
    });
    const detector = new NerDetector({}, loader);

    expect(await detector.detect('Alice went home', {})).toEqual([]);
    expect(await detector.detect('Alice went home', {})).toEqual([]);
    expect(loader).toHaveBeenCalledOnce();
    expect(error).toHaveBeenCalledOnce();
  });

  it('should return nothing when classification throws', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const detector = new NerDetector(
      {},
      loaderFor(async () => {
        throw new Error('bad tensor');
      })
    );
    expect(await detector.detect('Alice went home', {})).toEqual([]);
    expect(warn).toHaveBeenCalledOnce();
  });

  it('should ignore malformed classifier output', async () => {
    const detector = new NerDetector({}, loaderFor(async () => [{ label: 'PER' }, 'Alice', null]));
    expect(await detector.detect('Alice went home', {})).toEqual([]);
  });
});

describe('NER chunkText (unit)', () => {
  it('should return single chunk for short text', () => {
    const chunks = NerDetector.chunkText('Hello world', 1000, 200);
    expect(chunks).toEqual([{ chunk: 'Hello world', offset: 0 }]);
  });

  it('should split long text into overlapping chunks', () => {
    const chunks = NerDetector.chunkText('A'.repeat(2000), 1000, 200);
    expect(chunks.map(c => [c.offset, c.chunk.length])).toEqual([
      [0, 1000],
      [800, 1000],
      [1600, 400],
    ]);
  });

  it('should cover the entire text with no gaps', () => {
    const chunks = NerDetector.chunkText('X'.repeat(3500), 1000, 200);
    const covered = new Set<number>();
    for (const { offset, chunk } of chunks) {
      for (let i = 0; i < chunk.length; i++) covered.add(offset + i);
    }
    expect(covered.size).toBe(3500);
  });

  it('should handle text exactly at chunk size boundary', () => {
    const text = 'C'.repeat(1000);
    expect(NerDetector.chunkText(text, 1000, 200)).toEqual([{ chunk: text, offset: 0 }]);
  });
});

describe('NER mergeEntities (unit)', () => {
  it('should merge B- followed by same-category I- tokens', () => {
    const merged = NerDetector.mergeEntities([tag('B-PER', 'Sarah', 0.95), tag('I-PER', 'Johnson', 0.9)]);
    expect(merged).toHaveLength(1);
    expect(merged[0].word).toBe('Sarah Johnson');
    expect(merged[0].type).toBe('person');
    expect(merged[0].score).toBeCloseTo(0.925);
  });

  it('should merge WordPiece subword tokens (## prefix)', () => {
    const merged = NerDetector.mergeEntities([tag('B-PER', 'Wolf'), tag('I-PER', '##gang')]);
    expect(merged.map(m => m.word)).toEqual(['Wolfgang']);
  });

  it('should start new entity on category mismatch I- tag', () => {
    const merged = NerDetector.mergeEntities([tag('B-PER', 'John'), tag('I-ORG', 'Corp')]);
    expect(merged.map(m => [m.type, m.word])).toEqual([
      ['person', 'John'],
      ['organization', 'Corp'],
    ]);
  });

  it('should keep an orphan I- tag as its own entity', () => {
    const merged = NerDetector.mergeEntities([tag('I-PER', 'Smith')]);
    expect(merged.map(m => [m.type, m.word])).toEqual([['person', 'Smith']]);
  });

  it('should map BIO labels to entity types', () => {
    const merged = NerDetector.mergeEntities([
      tag('B-PER', 'Alice'),
      tag('B-ORG', 'Acme'),
      tag('B-LOC', 'Paris'),
      tag('B-MISC', 'French'),
    ]);
    expect(merged.map(m => m.type)).toEqual(['person', 'organization', 'location', null]);
  });

  it('should handle empty input', () => {
    expect(NerDetector.mergeEntities([])).toEqual([]);
  });
});

describe('NER locate (unit)', () => {
  it('should find word-bounded matches only', () => {
    expect(NerDetector.locate('Ann and Annabel met ann', 'Ann')).toEqual([
      [0, 3],
      [20, 23],
    ]);
  });

  it('should escape regex characters in the word', () => {
    expect(NerDetector.locate('see A.B. Corp', 'A.B')).toEqual([[4, 7]]);
  });
});
