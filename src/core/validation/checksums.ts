const digitsOf = (value: string): string => value.replace(/\D/g, '');

export const luhnCheck = (card: string): boolean => {
  const digits = digitsOf(card);
  if (digits.length < 13 || digits.length > 19) return false;

  let sum = 0;
  let isEven = false;

  for (let i = digits.length - 1; i >= 0; i--) {
    let digit = parseInt(digits[i], 10);

    if (isEven) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }

    sum += digit;
    isEven = !isEven;
  }

  return sum % 10 === 0;
};

/** ISO 13616 mod-97 check over the rearranged IBAN. */
export const ibanCheck = (iban: string): boolean => {
  const compact = iban.replace(/\s/g, '').toUpperCase();
  if (!/^[A-Z]{2}\d{2}[A-Z0-9]{11,30}$/.test(compact)) return false;

  const rearranged = compact.slice(4) + compact.slice(0, 4);
  let remainder = 0;
  for (const char of rearranged) {
    const value = /\d/.test(char) ? char : String(char.charCodeAt(0) - 55);
    for (const digit of value) {
      remainder = (remainder * 10 + Number(digit)) % 97;
    }
  }
  return remainder === 1;
};

export const abaRoutingCheck = (num: string): boolean => {
  const digits = digitsOf(num);
  if (digits.length !== 9) return false;

  const weights = [3, 7, 1, 3, 7, 1, 3, 7, 1];
  let sum = 0;
  for (let i = 0; i < 9; i++) {
    sum += parseInt(digits[i], 10) * weights[i];
  }
  return sum % 10 === 0 && sum > 0;
};

export const auMedicareCheck = (num: string): boolean => {
  const digits = digitsOf(num);
  if (digits.length !== 10) return false;
  if (!/[2-6]/.test(digits[0])) return false;

  // Check digit is the 9th digit: weighted sum of the first eight, mod 10
  const weights = [1, 3, 7, 9, 1, 3, 7, 9];
  let sum = 0;

  for (let i = 0; i < 8; i++) {
    sum += parseInt(digits[i], 10) * weights[i];
  }

  return sum % 10 === parseInt(digits[8], 10);
};

export const auTfnCheck = (num: string): boolean => {
  const digits = digitsOf(num);
  if (digits.length !== 9) return false;

  // TFN uses modulus 11 algorithm
  const weights = [1, 4, 3, 7, 5, 8, 6, 9, 10];
  let sum = 0;

  for (let i = 0; i < 9; i++) {
    sum += parseInt(digits[i], 10) * weights[i];
  }

  return sum % 11 === 0;
};

export const nzIrdCheck = (num: string): boolean => {
  const digits = digitsOf(num);
  if (digits.length !== 8 && digits.length !== 9) return false;

  const weights = [3, 2, 7, 6, 5, 4, 3, 2];
  let sum = 0;

  const paddedDigits = digits.padStart(9, '0');
  for (let i = 0; i < 8; i++) {
    sum += parseInt(paddedDigits[i], 10) * weights[i];
  }

  const remainder = sum % 11;
  const expectedCheck = remainder === 0 ? 0 : 11 - remainder;

  return parseInt(paddedDigits[8], 10) === expectedCheck;
};

export const ukNhsCheck = (num: string): boolean => {
  const digits = digitsOf(num);
  if (digits.length !== 10) return false;

  const weights = [10, 9, 8, 7, 6, 5, 4, 3, 2];
  let sum = 0;

  for (let i = 0; i < 9; i++) {
    sum += parseInt(digits[i], 10) * weights[i];
  }

  const checkDigit = 11 - (sum % 11);
  if (checkDigit === 11) return parseInt(digits[9], 10) === 0;
  if (checkDigit === 10) return false;
  return parseInt(digits[9], 10) === checkDigit;
};

export const ipV4Check = (ip: string): boolean => {
  const parts = ip.split('.');
  if (parts.length !== 4) return false;
  return parts.every(p => /^\d{1,3}$/.test(p) && parseInt(p, 10) <= 255);
};
