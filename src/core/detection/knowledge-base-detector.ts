import { describeError } from '../errors.js';
import type { Candidate, EntityType, RiskLevel } from '../types.js';
import { createCandidate, wantsType, type DetectionOptions, type Detector } from './detector.js';
import { KnowledgeBase, type EntityDefinition } from './knowledge-base.js';

const BASE_CONFIDENCE = 0.7;
const CONTEXT_BONUS = 0.15;
const EXAMPLE_BONUS = 0.1;
const CONTEXT_CANDIDATE_CONFIDENCE = 0.6;
const QUERY_WORD_LIMIT = 10;

const SENSITIVITY_BONUS: Record<RiskLevel, number> = {
  low: 0,
  medium: 0.1,
  high: 0.15,
  critical: 0.2,
};

// Title-case runs looked for around a definition's context keywords
const CONTEXT_SHAPES: Partial<Record<EntityType, RegExp>> = {
  person: /\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+)*\b/g,
  organization: /\b[A-Z][A-Za-z&-]*(?:\s+[A-Z][A-Za-z&-]*)*/g,
  location: /\b[A-Z][A-Za-z-]*(?:\s+[A-Z][A-Za-z-]*)*/g,
};

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Finds entities from knowledge-base definitions: each definition's patterns,
 * scored by sensitivity, nearby keywords and known examples, plus title-case
 * phrases near the keywords of person, organization and location definitions.
 */
export class KnowledgeBaseDetector implements Detector {
  readonly name = 'knowledge_base';
  readonly method = 'pattern' as const;

  constructor(
    readonly knowledgeBase: KnowledgeBase = new KnowledgeBase(),
    private readonly contextWindow = 50
  ) {}

  supportedTypes(): EntityType[] {
    return [...new Set(this.knowledgeBase.list().map(d => d.entityType))];
  }

  async detect(text: string, options: DetectionOptions): Promise<Candidate[]> {
    try {
      const found = new Map<string, Candidate>();
      for (const definition of this.relevantDefinitions(text)) {
        if (!wantsType(options, definition.entityType)) continue;
        for (const candidate of [...this.matchPatterns(text, definition), ...this.matchContext(text, definition)]) {
          const key = `${candidate.type}:${candidate.start}:${candidate.end}`;
          const existing = found.get(key);
          if (!existing || existing.confidence < candidate.confidence) found.set(key, candidate);
        }
      }
      return [...found.values()].sort((a, b) => a.start - b.start || a.end - b.end);
    } catch (err) {
      console.warn('Knowledge base detection failed:', err);
      return [];
    }
  }

  /** Definitions the text's longer words point to, plus every definition with a matching pattern. */
  relevantDefinitions(text: string): EntityDefinition[] {
    const words = text.toLowerCase().match(/\w+/g) ?? [];
    const query = words.filter(w => w.length > 3).slice(0, QUERY_WORD_LIMIT).join(' ');

    const relevant = this.knowledgeBase.search(query);
    for (const definition of this.knowledgeBase.list()) {
      if (relevant.includes(definition)) continue;
      if (definition.patterns.some(source => compile(source, '', definition)?.test(text))) {
        relevant.push(definition);
      }
    }
    return relevant;
  }

  private matchPatterns(text: string, definition: EntityDefinition): Candidate[] {
    const found: Candidate[] = [];

    for (const source of definition.patterns) {
      const pattern = compile(source, 'g', definition);
      if (!pattern) continue;

      for (const match of text.matchAll(pattern)) {
        const value = match[0];
        const start = match.index ?? 0;
        if (value.length === 0) continue;

        const contextMatch = this.hasContextKeyword(text, start, start + value.length, definition);
        found.push(
          createCandidate({
            type: definition.entityType,
            text: value,
            start,
            end: start + value.length,
            confidence: scoreMatch(value, contextMatch, definition),
            source: this.name,
            method: this.method,
            metadata: {
              definition: definition.name,
              pattern: source,
              sensitivityLevel: definition.sensitivityLevel,
              contextMatch,
            },
          })
        );
      }
    }

    return found;
  }

  private matchContext(text: string, definition: EntityDefinition): Candidate[] {
    const shape = CONTEXT_SHAPES[definition.entityType];
    if (!shape) return [];

    const keywords = new Set(definition.contextKeywords.map(k => k.toLowerCase()));
    const found: Candidate[] = [];

    for (const keyword of definition.contextKeywords) {
      if (keyword.trim() === '') continue;
      const keywordPattern = new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'gi');
      for (const hit of text.matchAll(keywordPattern)) {
        const hitStart = hit.index ?? 0;
        const windowStart = Math.max(0, hitStart - this.contextWindow);
        const windowEnd = Math.min(text.length, hitStart + hit[0].length + this.contextWindow);
        const nearby = text.slice(windowStart, windowEnd);

        for (const match of nearby.matchAll(new RegExp(shape.source, shape.flags))) {
          if (keywords.has(match[0].toLowerCase())) continue;
          const start = windowStart + (match.index ?? 0);
          found.push(
            createCandidate({
              type: definition.entityType,
              text: match[0],
              start,
              end: start + match[0].length,
              confidence: CONTEXT_CANDIDATE_CONFIDENCE,
              source: `${this.name}_context`,
              method: this.method,
              metadata: { definition: definition.name, contextBased: true },
            })
          );
        }
      }
    }

    return found;
  }

  private hasContextKeyword(text: string, start: number, end: number, definition: EntityDefinition): boolean {
    const around = text
      .slice(Math.max(0, start - this.contextWindow), Math.min(text.length, end + this.contextWindow))
      .toLowerCase();
    return definition.contextKeywords.some(keyword => keyword.trim() !== '' && around.includes(keyword.toLowerCase()));
  }
}

export function scoreMatch(value: string, contextMatch: boolean, definition: EntityDefinition): number {
  let confidence = BASE_CONFIDENCE + SENSITIVITY_BONUS[definition.sensitivityLevel];
  if (contextMatch) confidence += CONTEXT_BONUS;
  const lowered = value.toLowerCase();
  if (definition.examples.some(example => example.toLowerCase() === lowered)) confidence += EXAMPLE_BONUS;
  return Math.min(confidence, 1);
}

function compile(source: string, flags: string, definition: EntityDefinition): RegExp | null {
  try {
    return new RegExp(source, flags);
  } catch (err) {
    console.warn(`Invalid pattern in definition "${definition.name}":`, describeError(err));
    return null;
  }
}
