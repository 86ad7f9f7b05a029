import type { EntityType, ValidationOutcome } from '../types.js';
import { ibanCheck, ipV4Check, luhnCheck } from '../validation/checksums.js';

const outcome = (ok: boolean): ValidationOutcome => (ok ? 'valid' : 'invalid');
const digitsOf = (value: string): string => value.replace(/\D/g, '');

const EMAIL_SHAPE = /^[^\s@]+@([^\s@]+)$/;
const IPV6_SHAPE = /^[0-9a-f:]+$/i;

export function isValidEmail(value: string): boolean {
  const match = EMAIL_SHAPE.exec(value.trim());
  if (!match) return false;
  const labels = match[1].split('.');
  if (labels.length < 2 || labels.some(l => l.length === 0)) return false;
  return /^[a-z]{2,}$/i.test(labels[labels.length - 1]);
}

export function isValidPhone(value: string): boolean {
  const digits = digitsOf(value);
  return digits.length >= 7 && digits.length <= 15;
}

/** Nine digits outside the never-issued ranges. */
export function isValidSsn(value: string): boolean {
  const digits = digitsOf(value);
  if (digits.length !== 9) return false;
  const area = digits.slice(0, 3);
  const group = digits.slice(3, 5);
  const serial = digits.slice(5);
  if (area === '000' || area === '666' || area.startsWith('9')) return false;
  return group !== '00' && serial !== '0000';
}

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

interface DateFormat {
  pattern: RegExp;
  /** Positions of year, month and day in the capture groups. */
  order: readonly ['y' | 'm' | 'd', 'y' | 'm' | 'd', 'y' | 'm' | 'd'];
}

const DATE_FORMATS: DateFormat[] = [
  { pattern: /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/, order: ['m', 'd', 'y'] },
  { pattern: /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/, order: ['d', 'm', 'y'] },
  { pattern: /^(\d{4})[/.-](\d{1,2})[/.-](\d{1,2})$/, order: ['y', 'm', 'd'] },
  { pattern: /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{2})$/, order: ['m', 'd', 'y'] },
];

const NAMED_MONTH = /^([a-z]{3})[a-z]*\.? (\d{1,2}),? (\d{4})$/i;
const DAY_FIRST_NAMED_MONTH = /^(\d{1,2}) ([a-z]{3})[a-z]*\.? (\d{4})$/i;

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

/** Parses against a fixed list of numeric and month-name formats. */
export function isParseableDate(value: string): boolean {
  const text = value.trim();

  for (const format of DATE_FORMATS) {
    const match = format.pattern.exec(text);
    if (!match) continue;
    const parts: Record<'y' | 'm' | 'd', number> = { y: 0, m: 0, d: 0 };
    format.order.forEach((key, i) => {
      parts[key] = Number(match[i + 1]);
    });
    if (parts.y < 100) parts.y += parts.y >= 50 ? 1900 : 2000;
    if (isCalendarDate(parts.y, parts.m, parts.d)) return true;
  }

  const named = NAMED_MONTH.exec(text);
  if (named) {
    return isCalendarDate(Number(named[3]), MONTHS.indexOf(named[1].toLowerCase()) + 1, Number(named[2]));
  }
  const dayFirst = DAY_FIRST_NAMED_MONTH.exec(text);
  if (dayFirst) {
    return isCalendarDate(Number(dayFirst[3]), MONTHS.indexOf(dayFirst[2].toLowerCase()) + 1, Number(dayFirst[1]));
  }
  return false;
}

type FormatCheck = (value: string) => boolean;

const FORMAT_CHECKS: Partial<Record<EntityType, FormatCheck>> = {
  email: isValidEmail,
  phone: isValidPhone,
  ssn: isValidSsn,
  credit_card: value => {
    const length = digitsOf(value).length;
    return length >= 13 && length <= 19;
  },
  date: isParseableDate,
  date_of_birth: isParseableDate,
  ip_address: value => ipV4Check(value) || (value.includes(':') && IPV6_SHAPE.test(value)),
};

const CHECKSUMS: Partial<Record<EntityType, FormatCheck>> = {
  credit_card: luhnCheck,
  iban: ibanCheck,
};

export function checkFormat(type: EntityType, value: string): ValidationOutcome {
  const check = FORMAT_CHECKS[type];
  return check ? outcome(check(value)) : 'unknown';
}

export function checkChecksum(type: EntityType, value: string): ValidationOutcome {
  const check = CHECKSUMS[type];
  return check ? outcome(check(value)) : 'unknown';
}
