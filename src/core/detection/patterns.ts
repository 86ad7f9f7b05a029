import type { EntityType } from '../types.js';
import {
  abaRoutingCheck,
  auMedicareCheck,
  auTfnCheck,
  ibanCheck,
  ipV4Check,
  luhnCheck,
  nzIrdCheck,
  ukNhsCheck,
} from '../validation/checksums.js';

export interface PatternRule {
  id: string;
  type: EntityType;
  /** Matched with `matchAll`; the `g` flag is added when missing. */
  pattern: RegExp;
  /** Capture group holding the value, for keyword-anchored rules. */
  group?: number;
  validator?: (match: string) => boolean;
  confidence: number;
  /** Only run when one of these locales is requested. */
  locales?: string[];
  /** Free-form label carried on `custom` candidates. */
  label?: string;
}

// Keyword prefix shared by the keyword-anchored identifier rules
const NUMBER_SUFFIX = String.raw`(?:\s*(?:No\.?|Number|Num|#|ID))?\s*[:#\-.]*\s*`;
// Identifier containing at least one digit
const IDENTIFIER = String.raw`((?=[-A-Z]*\d)[A-Z0-9][-A-Z0-9]{2,})`;

const keyword = (words: string, value = IDENTIFIER): RegExp =>
  new RegExp(String.raw`\b(?:${words})${NUMBER_SUFFIX}${value}\b`, 'gi');

export const GENERAL_PATTERNS: PatternRule[] = [
  {
    id: 'email',
    type: 'email',
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
    confidence: 0.95,
  },
  // North American numbering plan: 555-123-4567, (555) 123-4567, +1 555.123.4567
  {
    id: 'phone-nanp',
    type: 'phone',
    pattern: /(?<![\w+])(?:\+?1[-.\s]?)?(?:\(\d{3}\)\s?|\d{3}[-.\s])\d{3}[-.\s]\d{4}(?!\d)/g,
    confidence: 0.85,
  },
  {
    id: 'phone-international',
    type: 'phone',
    pattern: /(?<![\w+])\+\d{1,3}[-.\s]?\(?\d{1,4}\)?(?:[-.\s]?\d{2,4}){2,4}(?!\d)/g,
    confidence: 0.8,
  },
  {
    id: 'ssn',
    type: 'ssn',
    pattern: /\b\d{3}([- ])\d{2}\1\d{4}\b/g,
    confidence: 0.9,
  },
  {
    id: 'credit-card',
    type: 'credit_card',
    pattern: /\b(?:\d{4}[ -]?){3}\d{4}\b|\b3[47]\d{2}[ -]?\d{6}[ -]?\d{5}\b/g,
    validator: luhnCheck,
    confidence: 0.95,
  },
  {
    id: 'iban',
    type: 'iban',
    pattern: /\b[A-Z]{2}\d{2}(?: ?[A-Z0-9]{4}){2,7}(?: ?[A-Z0-9]{1,3})?\b/g,
    validator: ibanCheck,
    confidence: 0.95,
  },
  {
    id: 'ip-address',
    type: 'ip_address',
    pattern: /\b(?:\d{1,3}\.){3}\d{1,3}\b/g,
    validator: ipV4Check,
    confidence: 0.9,
  },
  // IPv6: full and :: abbreviated forms
  {
    id: 'ipv6-address',
    type: 'ip_address',
    pattern: /(?<![\w:])(?:(?:[0-9a-fA-F]{1,4}:){7}[0-9a-fA-F]{1,4}|(?:[0-9a-fA-F]{1,4}:){1,6}:[0-9a-fA-F]{1,4}|(?:[0-9a-fA-F]{1,4}:){1,5}(?::[0-9a-fA-F]{1,4}){1,2}|(?:[0-9a-fA-F]{1,4}:){1,4}(?::[0-9a-fA-F]{1,4}){1,3}|(?:[0-9a-fA-F]{1,4}:){1,3}(?::[0-9a-fA-F]{1,4}){1,4}|(?:[0-9a-fA-F]{1,4}:){1,2}(?::[0-9a-fA-F]{1,4}){1,5}|[0-9a-fA-F]{1,4}:(?::[0-9a-fA-F]{1,4}){1,6}|::(?:[0-9a-fA-F]{1,4}:){0,5}[0-9a-fA-F]{1,4})(?![\w:])/g,
    confidence: 0.9,
  },
  {
    id: 'mac-address',
    type: 'mac_address',
    pattern: /\b[0-9A-Fa-f]{2}(?:([:-])[0-9A-Fa-f]{2})(?:\1[0-9A-Fa-f]{2}){4}\b/g,
    confidence: 0.92,
  },
  {
    id: 'url',
    type: 'url',
    pattern: /https?:\/\/[^\s<>"')\]},]+/gi,
    confidence: 0.95,
  },
  // MM/DD/YYYY (any of / - .) and ISO YYYY-MM-DD
  {
    id: 'date',
    type: 'date',
    pattern: /\b(?:0?[1-9]|1[0-2])[/.-](?:0?[1-9]|[12]\d|3[01])[/.-](?:19|20)\d{2}\b|\b(?:19|20)\d{2}-(?:0[1-9]|1[0-2])-(?:0[1-9]|[12]\d|3[01])\b/g,
    confidence: 0.75,
  },
  {
    id: 'date-of-birth',
    type: 'date_of_birth',
    pattern: /\b(?:DOB|D\.O\.B\.|Date of Birth|Birth ?Date|Born(?: on)?)\s*[:-]?\s*(\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4}|\d{4}-\d{2}-\d{2}|(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\.? \d{1,2},? \d{4})/gi,
    group: 1,
    confidence: 0.95,
  },
  {
    id: 'passport',
    type: 'passport',
    pattern: keyword('Passport', '((?=[A-Z]*\\d)[A-Z0-9]{6,9})'),
    group: 1,
    confidence: 0.85,
  },
  {
    id: 'drivers-license',
    type: 'drivers_license',
    pattern: keyword(String.raw`Driver'?s?\s*Licen[cs]e|Driving\s*Licen[cs]e|DL`),
    group: 1,
    confidence: 0.85,
  },
  {
    id: 'street-address',
    type: 'address',
    pattern: /\b\d{1,6}\s+(?:[A-Z][A-Za-z]+\s+){1,4}(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Lane|Ln|Drive|Dr|Court|Ct|Place|Pl|Way|Terrace|Tce|Crescent|Cres|Close|Circuit|Cct)\b\.?/g,
    confidence: 0.75,
  },
  {
    id: 'certificate-licence-number',
    type: 'custom',
    label: 'certificate_number',
    pattern: keyword(String.raw`(?:Licen[cs]e|Certificate|Registration|Accreditation|Permit)\s*(?:No|Number|Num|#|ID)`),
    group: 1,
    confidence: 0.8,
  },
];

export const LOCALE_PATTERNS: PatternRule[] = [
  {
    id: 'phone-au',
    type: 'phone',
    pattern: /(?<!\d)(?:\+?61|0)[2378][ -]?\d{4}[ -]?\d{4}(?!\d)/g,
    confidence: 0.9,
    locales: ['AU'],
  },
  {
    id: 'phone-au-mobile',
    type: 'phone',
    pattern: /(?<!\d)(?:\+?61|0)4\d{2}[ -]?\d{3}[ -]?\d{3}(?!\d)/g,
    confidence: 0.92,
    locales: ['AU'],
  },
  {
    id: 'au-tfn',
    type: 'tax_id',
    pattern: /\b\d{3}[ -]?\d{3}[ -]?\d{3}\b/g,
    validator: auTfnCheck,
    confidence: 0.95,
    locales: ['AU'],
  },
  {
    id: 'au-medicare',
    type: 'health_insurance_id',
    pattern: /\b\d{4}[ -]?\d{5}[ -]?\d\b/g,
    validator: auMedicareCheck,
    confidence: 0.95,
    locales: ['AU'],
  },
  {
    id: 'au-passport',
    type: 'passport',
    pattern: /\b[A-Z]{1,2}\d{7}\b/g,
    confidence: 0.8,
    locales: ['AU'],
  },
  {
    id: 'phone-nz',
    type: 'phone',
    pattern: /(?<!\d)(?:\+?64|0)[3679][ -]?\d{3}[ -]?\d{4}(?!\d)/g,
    confidence: 0.9,
    locales: ['NZ'],
  },
  {
    id: 'phone-nz-mobile',
    type: 'phone',
    pattern: /(?<!\d)(?:\+?64|0)2\d{1,2}[ -]?\d{3}[ -]?\d{3,4}(?!\d)/g,
    confidence: 0.92,
    locales: ['NZ'],
  },
  {
    id: 'nz-ird',
    type: 'tax_id',
    pattern: /\b\d{2,3}[ -]?\d{3}[ -]?\d{3}\b/g,
    validator: nzIrdCheck,
    confidence: 0.95,
    locales: ['NZ'],
  },
  // National Health Index: 3 letters (no I or O) + 4 digits
  {
    id: 'nz-nhi',
    type: 'health_insurance_id',
    pattern: /\b[A-HJ-NP-Z]{3}\d{4}\b/g,
    confidence: 0.92,
    locales: ['NZ'],
  },
  {
    id: 'nz-bank-account',
    type: 'bank_account',
    pattern: /\b\d{2}[ -]\d{4}[ -]\d{7}[ -]\d{2,3}\b/g,
    confidence: 0.88,
    locales: ['NZ'],
  },
  {
    id: 'phone-uk',
    type: 'phone',
    pattern: /(?<!\d)(?:\+44\s?|0)(?:1\d{3}|2\d)\s?\d{3,4}\s?\d{4}(?!\d)/g,
    confidence: 0.88,
    locales: ['UK'],
  },
  {
    id: 'phone-uk-mobile',
    type: 'phone',
    pattern: /(?<!\d)(?:\+44\s?|0)7\d{3}\s?\d{3}\s?\d{3}(?!\d)/g,
    confidence: 0.92,
    locales: ['UK'],
  },
  {
    id: 'uk-nino',
    type: 'national_id',
    pattern: /\b[A-CEGHJ-PR-TW-Z][A-CEGHJ-NPR-TW-Z] ?\d{2} ?\d{2} ?\d{2} ?[A-D]\b/g,
    confidence: 0.98,
    locales: ['UK'],
  },
  {
    id: 'uk-nhs',
    type: 'health_insurance_id',
    pattern: /\b\d{3}[ -]?\d{3}[ -]?\d{4}\b/g,
    validator: ukNhsCheck,
    confidence: 0.92,
    locales: ['UK'],
  },
  {
    id: 'uk-postcode',
    type: 'postal_code',
    pattern: /\b[A-Z]{1,2}\d[A-Z\d]? ?\d[A-Z]{2}\b/g,
    confidence: 0.9,
    locales: ['UK'],
  },
  {
    id: 'uk-driving-licence',
    type: 'drivers_license',
    pattern: /\b[A-Z9]{5}\d{6}[A-Z9]{2}\d[A-Z]{2}\b/g,
    confidence: 0.85,
    locales: ['UK'],
  },
];

export const FINANCIAL_PATTERNS: PatternRule[] = [
  {
    id: 'bank-account',
    type: 'bank_account',
    pattern: keyword(String.raw`Account|Acct|A\/C|Bank Account`, String.raw`(\d{6,17})`),
    group: 1,
    confidence: 0.85,
  },
  {
    id: 'routing-number',
    type: 'routing_number',
    pattern: keyword('Routing|ABA|RTN', String.raw`(\d{9})`),
    group: 1,
    validator: abaRoutingCheck,
    confidence: 0.9,
  },
  {
    id: 'swift-code',
    type: 'swift_code',
    pattern: /\b(?:SWIFT|BIC)(?:\s*Code)?\s*[:#]?\s*([A-Z]{6}[A-Z0-9]{2}(?:[A-Z0-9]{3})?)\b/g,
    group: 1,
    confidence: 0.9,
  },
  {
    id: 'tax-id',
    type: 'tax_id',
    pattern: keyword('EIN|TIN|Tax ID|Employer Identification', String.raw`(\d{2}-\d{7})`),
    group: 1,
    confidence: 0.9,
  },
  {
    id: 'bitcoin-address',
    type: 'crypto_address',
    pattern: /\b(?:bc1[a-z0-9]{25,39}|[13][a-km-zA-HJ-NP-Z1-9]{25,34})\b/g,
    confidence: 0.8,
  },
  {
    id: 'ethereum-address',
    type: 'crypto_address',
    pattern: /\b0x[a-fA-F0-9]{40}\b/g,
    confidence: 0.85,
  },
];

export const HEALTHCARE_PATTERNS: PatternRule[] = [
  {
    id: 'medical-record-number',
    type: 'medical_record_number',
    pattern: keyword(String.raw`MRN|Medical Record|Health Record|URN|Unit Record`),
    group: 1,
    confidence: 0.9,
  },
  {
    id: 'patient-id',
    type: 'patient_id',
    pattern: keyword(String.raw`Patient\s*(?:ID|No\.?|Number|#)`),
    group: 1,
    confidence: 0.88,
  },
  {
    id: 'health-insurance-id',
    type: 'health_insurance_id',
    pattern: keyword(String.raw`(?:Member|Policy|Insurance|Subscriber|Medicaid|Medicare)\s*(?:ID|No\.?|Number|#)`),
    group: 1,
    confidence: 0.85,
  },
];
