import type { Candidate, EntityType } from '../types.js';
import { createCandidate, wantsType, type DetectionOptions, type Detector } from './detector.js';
import {
  FINANCIAL_PATTERNS,
  GENERAL_PATTERNS,
  HEALTHCARE_PATTERNS,
  LOCALE_PATTERNS,
  type PatternRule,
} from './patterns.js';

/** Regex-table detector; the table decides what it finds. */
export class PatternDetector implements Detector {
  readonly method = 'pattern' as const;
  private rules: PatternRule[];

  constructor(
    readonly name: string,
    rules: PatternRule[] = []
  ) {
    this.rules = rules.map(normalizeRule);
  }

  supportedTypes(): EntityType[] {
    return [...new Set(this.rules.map(r => r.type))];
  }

  listPatterns(): readonly PatternRule[] {
    return this.rules;
  }

  /** Add or replace (by id) a rule. */
  addPattern(rule: PatternRule): void {
    if (rule.confidence < 0 || rule.confidence > 1) {
      throw new RangeError(`Pattern "${rule.id}" confidence must be within [0, 1]`);
    }
    const normalized = normalizeRule(rule);
    this.rules = [...this.rules.filter(r => r.id !== rule.id), normalized];
  }

  removePattern(id: string): boolean {
    const before = this.rules.length;
    this.rules = this.rules.filter(r => r.id !== id);
    return this.rules.length !== before;
  }

  async detect(text: string, options: DetectionOptions): Promise<Candidate[]> {
    const candidates: Candidate[] = [];
    const locale = options.locale?.toUpperCase() ?? null;

    for (const rule of this.rules) {
      if (rule.locales && (!locale || !rule.locales.includes(locale))) continue;
      if (!wantsType(options, rule.type)) continue;

      try {
        candidates.push(...this.matchRule(rule, text));
      } catch (err) {
        console.warn(`Pattern "${rule.id}" failed in detector "${this.name}":`, err);
      }
    }

    return candidates;
  }

  private matchRule(rule: PatternRule, text: string): Candidate[] {
    const found: Candidate[] = [];

    // matchAll starts from the pattern's lastIndex; shared table entries may have been exec'd
    const pattern = new RegExp(rule.pattern.source, rule.pattern.flags);
    for (const match of text.matchAll(pattern)) {
      let value = match[0];
      let start = match.index ?? 0;

      if (rule.group !== undefined) {
        const indices = match.indices?.[rule.group];
        const groupValue = match[rule.group];
        if (!indices || groupValue === undefined) continue;
        value = groupValue;
        start = indices[0];
      }

      if (value.length === 0) continue;
      if (rule.validator && !rule.validator(value)) continue;

      found.push(
        createCandidate({
          type: rule.type,
          text: value,
          start,
          end: start + value.length,
          confidence: rule.confidence,
          source: this.name,
          method: this.method,
          metadata: rule.label ? { patternId: rule.id, label: rule.label } : { patternId: rule.id },
        })
      );
    }

    return found;
  }
}

function normalizeRule(rule: PatternRule): PatternRule {
  let flags = rule.pattern.flags;
  if (!flags.includes('g')) flags += 'g';
  if (rule.group !== undefined && !flags.includes('d')) flags += 'd';
  const pattern = flags === rule.pattern.flags ? rule.pattern : new RegExp(rule.pattern.source, flags);
  return { ...rule, pattern };
}

export function createRegexDetector(): PatternDetector {
  return new PatternDetector('regex', [...GENERAL_PATTERNS, ...LOCALE_PATTERNS]);
}

export function createFinancialDetector(): PatternDetector {
  return new PatternDetector('financial', FINANCIAL_PATTERNS);
}

export function createHealthcareDetector(): PatternDetector {
  return new PatternDetector('healthcare', HEALTHCARE_PATTERNS);
}

/** Starts empty; rules are added at runtime with `addPattern`. */
export function createCustomRulesDetector(rules: PatternRule[] = []): PatternDetector {
  return new PatternDetector('custom_rules', rules);
}
