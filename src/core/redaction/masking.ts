import type { EntityType } from '../types.js';

export interface MaskOptions {
  maskChar: string;
  preserveFormat: boolean;
  preserveLength: boolean;
}

/** Returns the masked value, or null when the rule does not apply to it. */
type PartialMaskRule = (value: string, options: MaskOptions) => string | null;

const FULL_MASK_LENGTH = 5;
const SHORT_VALUE_LENGTH = 4;

const isDigit = (ch: string): boolean => ch >= '0' && ch <= '9';

export function fullMask(value: string, options: MaskOptions): string {
  return options.maskChar.repeat(options.preserveLength ? value.length : FULL_MASK_LENGTH);
}

/** Masks all but the last four digits once the value has at least `minDigits`. */
const lastFourDigits =
  (minDigits: number): PartialMaskRule =>
  (value, { maskChar, preserveFormat }) => {
    const digitCount = [...value].filter(isDigit).length;
    if (digitCount < minDigits) return null;

    let seen = 0;
    let out = '';
    for (const ch of value) {
      if (!isDigit(ch)) {
        if (preserveFormat) out += ch;
        continue;
      }
      seen++;
      out += seen > digitCount - 4 ? ch : maskChar;
    }
    return out;
  };

const digitGroups: PartialMaskRule = (value, { maskChar, preserveFormat }) => {
  const groups = value.match(/\d+/g) ?? [];

  if (groups.length === 1) {
    if (!/^\d{9}$/.test(value)) return null;
    return maskChar.repeat(5) + value.slice(5);
  }
  if (groups.length < 2) return null;

  const last = groups[groups.length - 1];
  const lastStart = value.lastIndexOf(last);

  if (!preserveFormat) {
    const masked = groups.slice(0, -1).reduce((n, g) => n + g.length, 0);
    return maskChar.repeat(masked) + last;
  }
  const head = value.slice(0, lastStart).replace(/\d/g, maskChar);
  return head + value.slice(lastStart);
};

// Indexes by code point.
const keepFirst = (value: string, maskChar: string): string => {
  const [first = '', ...rest] = value;
  return first + maskChar.repeat(rest.length);
};

const emailLocalPart: PartialMaskRule = (value, { maskChar }) => {
  const at = value.indexOf('@');
  if (at < 1) return null;
  const local = value.slice(0, at);
  if ([...local].length < 2) return null;
  return keepFirst(local, maskChar) + value.slice(at);
};

const nameInitials: PartialMaskRule = (value, { maskChar }) =>
  value.replace(/\S+/g, token => keepFirst(token, maskChar));

const PARTIAL_MASK_RULES: Partial<Record<EntityType, PartialMaskRule>> = {
  credit_card: lastFourDigits(8),
  bank_account: lastFourDigits(8),
  phone: lastFourDigits(7),
  ssn: digitGroups,
  national_id: digitGroups,
  tax_id: digitGroups,
  email: emailLocalPart,
  person: nameInitials,
};

function keepEnds(value: string, maskChar: string): string {
  const chars = [...value];
  if (chars.length <= SHORT_VALUE_LENGTH) return maskChar.repeat(chars.length);
  return chars[0] + maskChar.repeat(chars.length - 2) + chars[chars.length - 1];
}

export function partialMask(type: EntityType, value: string, options: MaskOptions): string {
  const rule = PARTIAL_MASK_RULES[type];
  return rule?.(value, options) ?? keepEnds(value, options.maskChar);
}
