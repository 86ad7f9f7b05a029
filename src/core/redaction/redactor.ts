import { z } from 'zod';
import { InvalidOptionsError } from '../errors.js';
import {
  DEFAULT_REDACTION_OPTIONS,
  ENTITY_TYPES,
  REDACTION_STRATEGIES,
  type DetectedEntity,
  type EntityType,
  type JsonObject,
  type RedactedEntity,
  type RedactionAudit,
  type RedactionOptions,
  type RedactionResult,
  type RedactionStrategy,
} from '../types.js';
import { fullMask, partialMask } from './masking.js';
import { Pseudonymizer } from './pseudonymizer.js';
import { Tokenizer } from './tokenizer.js';

const entityTypeSchema = z.enum(ENTITY_TYPES);
const strategySchema = z.enum(REDACTION_STRATEGIES);

export const redactionOptionsSchema = z
  .object({
    defaultStrategy: strategySchema.default(DEFAULT_REDACTION_OPTIONS.defaultStrategy),
    perTypeStrategy: z.record(entityTypeSchema, strategySchema).default({}),
    maskChar: z.string().length(1).default(DEFAULT_REDACTION_OPTIONS.maskChar),
    preserveFormat: z.boolean().default(DEFAULT_REDACTION_OPTIONS.preserveFormat),
    preserveLength: z.boolean().default(DEFAULT_REDACTION_OPTIONS.preserveLength),
    tokenizationSecret: z.string().min(1).optional(),
    customReplacements: z.record(entityTypeSchema, z.string()).default({}),
  })
  .strict();

export function parseRedactionOptions(input: unknown = {}): RedactionOptions {
  const parsed = redactionOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'options'}: ${i.message}`);
    throw new InvalidOptionsError(`Invalid redaction options: ${issues.join('; ')}`);
  }
  return parsed.data;
}

const GENERALIZATIONS: Partial<Record<EntityType, string>> = {
  person: '[PERSON]',
  email: '[EMAIL]',
  phone: '[PHONE NUMBER]',
  address: '[ADDRESS]',
  credit_card: '[PAYMENT CARD]',
  ssn: '[SSN]',
  passport: '[PASSPORT]',
  drivers_license: "[DRIVER'S LICENSE]",
  date_of_birth: '[DOB]',
  bank_account: '[BANK ACCOUNT]',
};

export function generalize(type: EntityType): string {
  return GENERALIZATIONS[type] ?? `[${type.toUpperCase()}]`;
}

/** Overlapping entities fused into one disjoint span, owned by the most confident. */
interface RedactionSpan {
  start: number;
  end: number;
  owner: DetectedEntity;
  absorbed: DetectedEntity[];
}

function coalesce(entities: readonly DetectedEntity[]): RedactionSpan[] {
  const sorted = [...entities].sort((a, b) => a.start - b.start || b.end - a.end);
  const spans: RedactionSpan[] = [];

  for (const entity of sorted) {
    const current = spans[spans.length - 1];
    if (current && entity.start < current.end) {
      current.end = Math.max(current.end, entity.end);
      if (entity.confidence > current.owner.confidence) {
        current.absorbed.push(current.owner);
        current.owner = entity;
      } else {
        current.absorbed.push(entity);
      }
      continue;
    }
    spans.push({ start: entity.start, end: entity.end, owner: entity, absorbed: [] });
  }

  return spans;
}

interface Replacement {
  text: string;
  audit: RedactionAudit;
}

/**
 * Rewrites a text so the given entity spans no longer reveal their values.
 * Spans are rewritten from the end of the text towards the start so earlier
 * offsets stay valid.
 */
export class RedactionEngine {
  private readonly tokenizer: Tokenizer;

  constructor(
    tokenizationSecret?: string,
    private readonly pseudonymizer: Pseudonymizer = new Pseudonymizer()
  ) {
    this.tokenizer = new Tokenizer(tokenizationSecret);
  }

  get reversibleTokens(): boolean {
    return this.tokenizer.reversible;
  }

  /** Recover a value from a token payload, with the engine's secret unless `secret` is given. */
  reverseToken(payload: string, secret?: string): string {
    return (secret ? new Tokenizer(secret) : this.tokenizer).reverse(payload);
  }

  redact(text: string, entities: readonly DetectedEntity[], input: unknown = {}): RedactionResult {
    const started = performance.now();
    const options = parseRedactionOptions(input);

    const inBounds = entities.filter(e => {
      const ok = Number.isInteger(e.start) && Number.isInteger(e.end) && e.start >= 0 && e.start < e.end && e.end <= text.length;
      if (!ok) console.warn(`Skipping ${e.type} entity with out-of-bounds span [${e.start}, ${e.end})`);
      return ok;
    });

    let tokenizer = this.tokenizer;
    const tokenizerFor = (): Tokenizer => {
      if (options.tokenizationSecret && tokenizer === this.tokenizer) {
        tokenizer = new Tokenizer(options.tokenizationSecret);
      }
      return tokenizer;
    };

    const spans = coalesce(inBounds).sort((a, b) => b.start - a.start);
    const redacted: RedactedEntity[] = [];
    const redactionCount: Partial<Record<EntityType, number>> = {};
    let output = text;

    for (const span of spans) {
      const value = text.slice(span.start, span.end);
      const replacement = this.replace(span.owner.type, value, options, tokenizerFor);

      output = output.slice(0, span.start) + replacement.text + output.slice(span.end);

      if (replacement.audit.method !== 'passthrough') {
        redactionCount[span.owner.type] = (redactionCount[span.owner.type] ?? 0) + 1;
      }

      const metadata: JsonObject = { ...span.owner.metadata, reversible: replacement.audit.reversible };
      if (replacement.audit.tokenPayload) metadata.tokenPayload = replacement.audit.tokenPayload;
      redacted.push(Object.freeze({
        ...span.owner,
        metadata,
        redactedText: replacement.text,
        redaction: Object.freeze(replacement.audit),
      }));

      const absorbed: RedactionAudit = {
        strategy: replacement.audit.strategy,
        method: 'absorbed',
        reversible: false,
        absorbedBy: span.owner.id,
      };
      for (const entity of span.absorbed) {
        redacted.push(Object.freeze({ ...entity, redactedText: '', redaction: Object.freeze({ ...absorbed }) }));
      }
    }

    return {
      success: true,
      originalText: text,
      redactedText: output,
      redactionCount,
      entities: redacted.sort((a, b) => a.start - b.start || b.confidence - a.confidence),
      processingTimeMs: performance.now() - started,
      timestamp: new Date().toISOString(),
    };
  }

  private replace(
    type: EntityType,
    value: string,
    options: RedactionOptions,
    tokenizerFor: () => Tokenizer
  ): Replacement {
    const strategy: RedactionStrategy = options.perTypeStrategy[type] ?? options.defaultStrategy;

    const custom = options.customReplacements[type];
    if (custom !== undefined) {
      return { text: custom, audit: { strategy, method: 'custom_replacement', reversible: false } };
    }

    switch (strategy) {
      case 'full_removal':
        return { text: '', audit: { strategy, method: 'removal', reversible: false } };
      case 'full_mask':
        return {
          text: fullMask(value, options),
          audit: { strategy, method: 'mask', reversible: false, maskChar: options.maskChar },
        };
      case 'partial_mask':
        return {
          text: partialMask(type, value, options),
          audit: { strategy, method: 'partial_mask', reversible: false, maskChar: options.maskChar },
        };
      case 'tokenization': {
        const record = tokenizerFor().tokenize(value);
        const audit: RedactionAudit = record.payload
          ? { strategy, method: 'encrypted_token', reversible: true, tokenPayload: record.payload }
          : { strategy, method: 'hashed_token', reversible: false };
        return { text: record.token, audit };
      }
      case 'pseudonymization':
        return {
          text: this.pseudonymizer.pseudonymize(type, value),
          audit: { strategy, method: 'synthetic', reversible: false },
        };
      case 'generalization':
        return { text: generalize(type), audit: { strategy, method: 'category_placeholder', reversible: false } };
      case 'none':
        return { text: value, audit: { strategy, method: 'passthrough', reversible: false } };
    }
  }
}
