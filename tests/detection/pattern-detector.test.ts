import { describe, it, expect, vi, afterEach } from 'vitest';
import type { DetectionOptions } from '../../src/core/detection/detector.js';
import {
  PatternDetector,
  createCustomRulesDetector,
  createFinancialDetector,
  createHealthcareDetector,
  createRegexDetector,
} from '../../src/core/detection/pattern-detector.js';
import { GENERAL_PATTERNS } from '../../src/core/detection/patterns.js';
import type { EntityType } from '../../src/core/types.js';

const found = async (detector: PatternDetector, text: string, options: DetectionOptions = {}) =>
  (await detector.detect(text, options)).map(c => ({ type: c.type, text: c.text }));

const only = (...entityTypes: EntityType[]): DetectionOptions => ({ entityTypes });

describe('Pattern detector', () => {
  const regex = createRegexDetector();

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Contact details', () => {
    it('should find emails in context', async () => {
      expect(await found(regex, 'Please email j.smith@example.com or call us', only('email'))).toEqual([
        { type: 'email', text: 'j.smith@example.com' },
      ]);
    });

    it('should find North American phone numbers', async () => {
      expect(await found(regex, 'Call (555) 123-4567 today', only('phone'))).toEqual([
        { type: 'phone', text: '(555) 123-4567' },
      ]);
      expect(await found(regex, 'or 555.123.4567', only('phone'))).toEqual([
        { type: 'phone', text: '555.123.4567' },
      ]);
    });

    it('should find international numbers with a country code', async () => {
      const result = await found(regex, 'Office: +44 20 7946 0000', only('phone'));
      expect(result).toEqual([{ type: 'phone', text: '+44 20 7946 0000' }]);
    });

    it('should carry offsets, source and method', async () => {
      const [email] = await regex.detect('mail a.b@test.org now', only('email'));
      expect(email.start).toBe(5);
      expect(email.end).toBe(17);
      expect(email.source).toBe('regex');
      expect(email.method).toBe('pattern');
      expect(email.confidence).toBe(0.95);
      expect(email.metadata).toEqual({ patternId: 'email' });
    });
  });

  describe('Government identifiers', () => {
    it('should find SSNs with consistent separators', async () => {
      expect(await found(regex, 'SSN 123-45-6789', only('ssn'))).toEqual([{ type: 'ssn', text: '123-45-6789' }]);
      expect(await found(regex, 'SSN 123 45 6789', only('ssn'))).toEqual([{ type: 'ssn', text: '123 45 6789' }]);
      expect(await found(regex, 'SSN 123-45 6789', only('ssn'))).toEqual([]);
    });

    it('should find passport numbers after the keyword', async () => {
      expect(await found(regex, 'Passport No: X1234567', only('passport'))).toEqual([
        { type: 'passport', text: 'X1234567' },
      ]);
      expect(await found(regex, 'Passport: ABCDEFGH', only('passport'))).toEqual([]);
    });

    it("should find driver's licence numbers", async () => {
      expect(await found(regex, "Driver's License: D1234567", only('drivers_license'))).toEqual([
        { type: 'drivers_license', text: 'D1234567' },
      ]);
    });

    it('should label certificate numbers as custom', async () => {
      const [match] = await regex.detect('Licence No: LIC-20931', only('custom'));
      expect(match.text).toBe('LIC-20931');
      expect(match.metadata).toEqual({ patternId: 'certificate-licence-number', label: 'certificate_number' });
    });
  });

  describe('Financial identifiers', () => {
    it('should keep only Luhn-valid card numbers', async () => {
      expect(await found(regex, 'Card 4532015112830366 on file', only('credit_card'))).toEqual([
        { type: 'credit_card', text: '4532015112830366' },
      ]);
      expect(await found(regex, 'Card 4532015112830367 on file', only('credit_card'))).toEqual([]);
      expect(await found(regex, 'Card 4111-1111-1111-1111', only('credit_card'))).toEqual([
        { type: 'credit_card', text: '4111-1111-1111-1111' },
      ]);
    });

    it('should keep only mod-97 valid IBANs', async () => {
      expect(await found(regex, 'IBAN DE64 1002 0030 0400 5006 00', only('iban'))).toEqual([
        { type: 'iban', text: 'DE64 1002 0030 0400 5006 00' },
      ]);
      expect(await found(regex, 'IBAN DE65 1002 0030 0400 5006 00', only('iban'))).toEqual([]);
    });
  });

  describe('Network and time', () => {
    it('should validate IPv4 octets', async () => {
      expect(await found(regex, 'Server 192.168.1.20 is up', only('ip_address'))).toEqual([
        { type: 'ip_address', text: '192.168.1.20' },
      ]);
      expect(await found(regex, 'Version 999.1.1.1 shipped', only('ip_address'))).toEqual([]);
    });

    it('should find IPv6 and MAC addresses', async () => {
      expect(await found(regex, 'host fe80::1 replied', only('ip_address'))).toEqual([
        { type: 'ip_address', text: 'fe80::1' },
      ]);
      expect(await found(regex, 'nic 00:1A:2B:3C:4D:5E', only('mac_address'))).toEqual([
        { type: 'mac_address', text: '00:1A:2B:3C:4D:5E' },
      ]);
    });

    it('should find URLs', async () => {
      expect(await found(regex, 'see https://example.com/path?q=1 now', only('url'))).toEqual([
        { type: 'url', text: 'https://example.com/path?q=1' },
      ]);
    });

    it('should find dates and dates of birth', async () => {
      expect(await found(regex, 'Meeting on 03/15/2024 and 2024-03-16', only('date'))).toEqual([
        { type: 'date', text: '03/15/2024' },
        { type: 'date', text: '2024-03-16' },
      ]);
      const [dob] = await regex.detect('DOB: 04/12/1985', only('date_of_birth'));
      expect(dob.text).toBe('04/12/1985');
      expect(dob.start).toBe(5);
    });

    it('should find street addresses', async () => {
      expect(await found(regex, 'Lives at 42 Wallaby Way, Sydney', only('address'))).toEqual([
        { type: 'address', text: '42 Wallaby Way' },
      ]);
    });
  });

  describe('Locale rules', () => {
    it('should only run locale rules for the requested locale', async () => {
      const text = 'Call 0412 345 678 tomorrow';
      expect(await found(regex, text, only('phone'))).toEqual([]);
      expect(await found(regex, text, { entityTypes: ['phone'], locale: 'au' })).toEqual([
        { type: 'phone', text: '0412 345 678' },
      ]);
      expect(await found(regex, text, { entityTypes: ['phone'], locale: 'NZ' })).toEqual([]);
    });

    it('should validate AU tax file and Medicare numbers', async () => {
      const au = { locale: 'AU' };
      expect(await found(regex, 'TFN 123 456 782', { ...au, entityTypes: ['tax_id'] })).toEqual([
        { type: 'tax_id', text: '123 456 782' },
      ]);
      expect(await found(regex, 'TFN 123 456 783', { ...au, entityTypes: ['tax_id'] })).toEqual([]);
      expect(await found(regex, 'Medicare 2123 45670 1', { ...au, entityTypes: ['health_insurance_id'] })).toEqual([
        { type: 'health_insurance_id', text: '2123 45670 1' },
      ]);
    });

    it('should validate NZ IRD and UK NHS numbers', async () => {
      expect(await found(regex, 'IRD 12-345-674', { locale: 'NZ', entityTypes: ['tax_id'] })).toEqual([
        { type: 'tax_id', text: '12-345-674' },
      ]);
      expect(await found(regex, 'NHS 401 023 2137', { locale: 'UK', entityTypes: ['health_insurance_id'] })).toEqual([
        { type: 'health_insurance_id', text: '401 023 2137' },
      ]);
      expect(await found(regex, 'NHS 401 023 2138', { locale: 'UK', entityTypes: ['health_insurance_id'] })).toEqual([]);
    });

    it('should find UK National Insurance numbers', async () => {
      expect(await found(regex, 'NI number AB 12 34 56 C', { locale: 'UK', entityTypes: ['national_id'] })).toEqual([
        { type: 'national_id', text: 'AB 12 34 56 C' },
      ]);
    });
  });

  describe('Financial detector', () => {
    const financial = createFinancialDetector();

    it('should find keyword-anchored account numbers', async () => {
      expect(await found(financial, 'Account No: 12345678', only('bank_account'))).toEqual([
        { type: 'bank_account', text: '12345678' },
      ]);
    });

    it('should check ABA routing numbers', async () => {
      expect(await found(financial, 'Routing: 123456780', only('routing_number'))).toEqual([
        { type: 'routing_number', text: '123456780' },
      ]);
      expect(await found(financial, 'Routing: 123456781', only('routing_number'))).toEqual([]);
    });

    it('should find SWIFT codes, EINs and wallet addresses', async () => {
      expect(await found(financial, 'SWIFT: ABCDUS33XXX', only('swift_code'))).toEqual([
        { type: 'swift_code', text: 'ABCDUS33XXX' },
      ]);
      expect(await found(financial, 'EIN: 12-3456789', only('tax_id'))).toEqual([
        { type: 'tax_id', text: '12-3456789' },
      ]);
      const wallet = '0x' + 'ab'.repeat(20);
      expect(await found(financial, `send to ${wallet} today`, only('crypto_address'))).toEqual([
        { type: 'crypto_address', text: wallet },
      ]);
    });
  });

  describe('Healthcare detector', () => {
    const healthcare = createHealthcareDetector();

    it('should find record, patient and member identifiers', async () => {
      expect(await found(healthcare, 'MRN: 00123456', only('medical_record_number'))).toEqual([
        { type: 'medical_record_number', text: '00123456' },
      ]);
      expect(await found(healthcare, 'Patient ID: P-998877', only('patient_id'))).toEqual([
        { type: 'patient_id', text: 'P-998877' },
      ]);
      expect(await found(healthcare, 'Member ID: M12345', only('health_insurance_id'))).toEqual([
        { type: 'health_insurance_id', text: 'M12345' },
      ]);
    });

    it('should not fire on the keyword alone', async () => {
      expect(await found(healthcare, 'The patient was discharged', only('patient_id'))).toEqual([]);
    });
  });

  describe('Custom rules', () => {
    it('should start empty and accept rules at runtime', async () => {
      const custom = createCustomRulesDetector();
      expect(await custom.detect('Badge EMP-12345', {})).toEqual([]);

      custom.addPattern({
        id: 'employee',
        type: 'custom',
        pattern: /\bEMP-\d{5}\b/,
        confidence: 0.9,
        label: 'employee_id',
      });

      const [match] = await custom.detect('Badge EMP-12345', {});
      expect(match.text).toBe('EMP-12345');
      expect(match.source).toBe('custom_rules');
      expect(match.metadata).toEqual({ patternId: 'employee', label: 'employee_id' });
    });

    it('should replace a rule with the same id and remove by id', () => {
      const custom = createCustomRulesDetector();
      custom.addPattern({ id: 'r', type: 'custom', pattern: /a/g, confidence: 0.5 });
      custom.addPattern({ id: 'r', type: 'custom', pattern: /b/g, confidence: 0.5 });
      expect(custom.listPatterns()).toHaveLength(1);
      expect(custom.removePattern('r')).toBe(true);
      expect(custom.removePattern('r')).toBe(false);
    });

    it('should reject confidence outside [0, 1]', () => {
      const custom = createCustomRulesDetector();
      expect(() => custom.addPattern({ id: 'bad', type: 'custom', pattern: /x/g, confidence: 1.5 })).toThrow(RangeError);
    });

    it('should keep other rules running when one throws', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const detector = new PatternDetector('mixed', [
        {
          id: 'broken',
          type: 'custom',
          pattern: /\d+/g,
          confidence: 0.9,
          validator: () => {
            throw new Error('boom');
          },
        },
        { id: 'word', type: 'custom', pattern: /\bhello\b/g, confidence: 0.9 },
      ]);

      expect(await found(detector, 'hello 42', {})).toEqual([{ type: 'custom', text: 'hello' }]);
      expect(warn).toHaveBeenCalledOnce();
    });
  });

  it('should list the types its table covers', () => {
    const types = new Set(GENERAL_PATTERNS.map(r => r.type));
    for (const type of types) {
      expect(regex.supportedTypes()).toContain(type);
    }
  });
});
