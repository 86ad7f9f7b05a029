import { describe, it, expect, vi, afterEach } from 'vitest';
import { RedactionEngine, generalize, parseRedactionOptions } from '../../src/core/redaction/redactor.js';
import { Pseudonymizer } from '../../src/core/redaction/pseudonymizer.js';
import { InvalidOptionsError, IrreversibleTokenError, TokenizationKeyMismatchError } from '../../src/core/errors.js';
import { detectedEntity } from '../helpers/entities.js';
import { DEFAULT_REDACTION_OPTIONS, type DetectedEntity, type EntityType } from '../../src/core/types.js';

const TEXT = 'Call Alice Smith at 555-123-4567 or alice@corp.io';

let nextId = 0;

function entity(type: EntityType, value: string, confidence = 0.9, from = 0): DetectedEntity {
  const start = TEXT.indexOf(value, from);
  return {
    id: `e${nextId++}`,
    type,
    text: value,
    start,
    end: start + value.length,
    confidence,
    source: 'test',
    method: 'pattern',
    metadata: { rule: type },
    riskLevel: 'high',
    validation: { format: 'unknown', checksum: 'unknown', context: 'valid', commonWord: 'unknown', length: 'valid' },
    context: { before: '', after: '', snippet: value },
  };
}

const allThree = () => [
  entity('email', 'alice@corp.io', 0.95),
  entity('person', 'Alice Smith', 0.85),
  entity('phone', '555-123-4567', 0.85),
];

describe('RedactionEngine', () => {
  const engine = new RedactionEngine(undefined, new Pseudonymizer(() => 0));

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should partially mask by default', () => {
    const result = engine.redact(TEXT, allThree());

    expect(result.success).toBe(true);
    expect(result.originalText).toBe(TEXT);
    expect(result.redactedText).toBe('Call AXXXX SXXXX at XXX-XXX-4567 or aXXXX@corp.io');
    expect(result.redactionCount).toEqual({ person: 1, phone: 1, email: 1 });
  });

  it('should mask an email whose local part is a single character', () => {
    const text = 'Mail a@corp.com now';
    const result = engine.redact(text, [detectedEntity(text, 'a@corp.com', 'email')]);

    expect(result.redactedText).toBe('Mail aXXXXXXXXm now');
    expect(result.entities[0].redactedText).toBe('aXXXXXXXXm');
  });

  it('should report entities in text order with their replacement', () => {
    const result = engine.redact(TEXT, allThree());

    expect(result.entities.map(e => [e.type, e.redactedText, e.redaction.method])).toEqual([
      ['person', 'AXXXX SXXXX', 'partial_mask'],
      ['phone', 'XXX-XXX-4567', 'partial_mask'],
      ['email', 'aXXXX@corp.io', 'partial_mask'],
    ]);
    expect(result.entities[0].redaction).toEqual({
      strategy: 'partial_mask',
      method: 'partial_mask',
      reversible: false,
      maskChar: 'X',
    });
    expect(result.entities[0].metadata).toEqual({ rule: 'person', reversible: false });
  });

  it('should leave text outside the spans untouched', () => {
    const result = engine.redact(TEXT, [entity('phone', '555-123-4567')], { defaultStrategy: 'full_removal' });
    expect(result.redactedText).toBe('Call Alice Smith at  or alice@corp.io');
  });

  it('should remove values', () => {
    const result = engine.redact(TEXT, allThree(), { defaultStrategy: 'full_removal' });
    expect(result.redactedText).toBe('Call  at  or ');
    expect(result.entities.every(e => e.redaction.method === 'removal')).toBe(true);
  });

  it('should fully mask preserving length', () => {
    const result = engine.redact(TEXT, [entity('person', 'Alice Smith')], { defaultStrategy: 'full_mask' });
    expect(result.redactedText).toBe('Call XXXXXXXXXXX at 555-123-4567 or alice@corp.io');
  });

  it('should keep the text length only under length-preserving strategies', () => {
    expect(engine.redact(TEXT, allThree(), { defaultStrategy: 'full_mask' }).redactedText).toHaveLength(TEXT.length);
    expect(engine.redact(TEXT, allThree(), { defaultStrategy: 'generalization' }).redactedText).not.toHaveLength(
      TEXT.length
    );
  });

  it('should fully mask with a fixed width and custom mask character', () => {
    const result = engine.redact(TEXT, [entity('person', 'Alice Smith')], {
      defaultStrategy: 'full_mask',
      preserveLength: false,
      maskChar: '#',
    });
    expect(result.redactedText).toBe('Call ##### at 555-123-4567 or alice@corp.io');
    expect(result.entities[0].redaction.maskChar).toBe('#');
  });

  it('should generalize to category placeholders', () => {
    const result = engine.redact(TEXT, allThree(), { defaultStrategy: 'generalization' });
    expect(result.redactedText).toBe('Call [PERSON] at [PHONE NUMBER] or [EMAIL]');
  });

  it('should pseudonymize with synthetic values', () => {
    const result = engine.redact(TEXT, allThree(), { defaultStrategy: 'pseudonymization' });
    expect(result.redactedText).toBe('Call John Smith at (555) 000-0000 or user00000000@example.com');
    expect(result.entities[0].redaction.method).toBe('synthetic');
  });

  it('should apply per-type strategies over the default', () => {
    const result = engine.redact(TEXT, allThree(), {
      defaultStrategy: 'full_mask',
      perTypeStrategy: { phone: 'none' },
    });
    expect(result.redactedText).toBe('Call XXXXXXXXXXX at 555-123-4567 or XXXXXXXXXXXXX');
    expect(result.redactionCount).toEqual({ person: 1, email: 1 });
    expect(result.entities[1].redaction.method).toBe('passthrough');
  });

  it('should let custom replacements win over any strategy', () => {
    const result = engine.redact(TEXT, allThree(), {
      defaultStrategy: 'generalization',
      customReplacements: { email: '<email>' },
    });
    expect(result.redactedText).toBe('Call [PERSON] at [PHONE NUMBER] or <email>');
    expect(result.entities[2].redaction).toEqual({
      strategy: 'generalization',
      method: 'custom_replacement',
      reversible: false,
    });
  });

  describe('overlapping entities', () => {
    it('should redact the union once under the most confident entity', () => {
      const name = entity('person', 'Alice Smith', 0.7);
      const surname = entity('custom', 'Smith', 0.9);
      const result = engine.redact(TEXT, [name, surname]);

      expect(result.redactedText).toBe('Call AXXXXXXXXXh at 555-123-4567 or alice@corp.io');
      expect(result.redactionCount).toEqual({ custom: 1 });
      expect(result.entities.map(e => [e.id, e.redactedText])).toEqual([
        [name.id, ''],
        [surname.id, 'AXXXXXXXXXh'],
      ]);
      expect(result.entities[0].redaction).toEqual({
        strategy: 'partial_mask',
        method: 'absorbed',
        reversible: false,
        absorbedBy: surname.id,
      });
    });

    it('should extend the span over partially overlapping entities', () => {
      const first = { ...entity('custom', 'Alice Smith', 0.9), end: 13 };
      const second = { ...entity('custom', 'Smith at', 0.8) };
      const result = engine.redact(TEXT, [first, second], { defaultStrategy: 'full_removal' });
      expect(result.redactedText).toBe('Call  555-123-4567 or alice@corp.io');
    });
  });

  it('should skip entities outside the text with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const stray = { ...entity('person', 'Alice Smith'), start: 40, end: 60 };
    const empty = { ...entity('person', 'Alice Smith'), end: 5 };
    const result = engine.redact(TEXT, [stray, empty]);

    expect(result.redactedText).toBe(TEXT);
    expect(result.entities).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('should return the text unchanged with no entities', () => {
    const result = engine.redact(TEXT, []);
    expect(result.redactedText).toBe(TEXT);
    expect(result.redactionCount).toEqual({});
    expect(Number.isNaN(Date.parse(result.timestamp))).toBe(false);
    expect(result.processingTimeMs).toBeGreaterThanOrEqual(0);
  });

  describe('tokenization', () => {
    it('should hash values when no secret is configured', () => {
      const result = engine.redact(TEXT, [entity('person', 'Alice Smith')], { defaultStrategy: 'tokenization' });
      expect(result.redactedText).toBe('Call TOK_8ae10dfc9a69f97 at 555-123-4567 or alice@corp.io');
      expect(result.entities[0].redaction.method).toBe('hashed_token');
      expect(result.entities[0].metadata.reversible).toBe(false);
      expect(engine.reversibleTokens).toBe(false);
    });

    it('should seal values that can be reversed with the engine secret', () => {
      const sealed = new RedactionEngine('test-secret');
      const result = sealed.redact(TEXT, allThree(), { defaultStrategy: 'tokenization' });
      const [person] = result.entities;
      const payload = person.redaction.tokenPayload ?? '';

      expect(person.redaction.method).toBe('encrypted_token');
      expect(person.redaction.reversible).toBe(true);
      expect(person.metadata.tokenPayload).toBe(payload);
      expect(person.redactedText).toBe('TOK_' + payload.slice(0, 15));
      expect(sealed.reverseToken(payload)).toBe('Alice Smith');
      expect(result.redactedText).not.toContain('alice@corp.io');
    });

    it('should use a per-call secret when one is given', () => {
      const result = engine.redact(TEXT, [entity('phone', '555-123-4567')], {
        defaultStrategy: 'tokenization',
        tokenizationSecret: 'test-secret',
      });
      const payload = result.entities[0].redaction.tokenPayload ?? '';

      expect(engine.reverseToken(payload, 'test-secret')).toBe('555-123-4567');
      expect(() => engine.reverseToken(payload)).toThrow(IrreversibleTokenError);
      expect(() => engine.reverseToken(payload, 'other-secret')).toThrow(TokenizationKeyMismatchError);
    });
  });

  describe('options', () => {
    it('should reject a mask character that is not a single character', () => {
      expect(() => engine.redact(TEXT, [], { maskChar: 'XX' })).toThrow(InvalidOptionsError);
    });

    it('should reject unknown strategies and option keys', () => {
      expect(() => parseRedactionOptions({ defaultStrategy: 'shred' })).toThrow(InvalidOptionsError);
      expect(() => parseRedactionOptions({ perTypeStrategy: { person: 'shred' } })).toThrow(InvalidOptionsError);
      expect(() => parseRedactionOptions({ colour: 'red' })).toThrow(InvalidOptionsError);
    });

    it('should fill defaults', () => {
      expect(parseRedactionOptions(undefined)).toEqual(DEFAULT_REDACTION_OPTIONS);
      expect(parseRedactionOptions(null)).toEqual(DEFAULT_REDACTION_OPTIONS);
    });

    it('should name the offending option', () => {
      expect(() => parseRedactionOptions({ maskChar: '' })).toThrow(/maskChar/);
    });
  });
});

describe('generalize', () => {
  it('should fall back to the upper-cased type', () => {
    expect(generalize('iban')).toBe('[IBAN]');
    expect(generalize('drivers_license')).toBe("[DRIVER'S LICENSE]");
  });
});
