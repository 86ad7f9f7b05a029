import { createCipheriv, createDecipheriv, createHash, pbkdf2Sync, randomBytes } from 'crypto';
import { IrreversibleTokenError, TokenizationKeyMismatchError } from '../errors.js';

export const TOKEN_PREFIX = 'TOK_';
export const TOKEN_DISPLAY_LENGTH = 15;

const KEY_ITERATIONS = 100_000;
const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const DEFAULT_SALT = 'pii-redaction-engine/token-key';

// A display token is shorter than any payload (iv + tag alone encode to 38 chars).
const DISPLAY_TOKEN = new RegExp(`^${TOKEN_PREFIX}[A-Za-z0-9_-]{${TOKEN_DISPLAY_LENGTH}}$`);

export interface TokenRecord {
  token: string;
  reversible: boolean;
  /** base64url(iv | tag | ciphertext); present only for reversible tokens. */
  payload?: string;
}

/**
 * Produces display tokens for redacted values. With a secret the value is
 * sealed with AES-256-GCM and can be recovered from the payload; without one
 * the token is a truncated SHA-256 digest.
 */
export class Tokenizer {
  private readonly key: Buffer | null;

  constructor(secret?: string, salt: string = DEFAULT_SALT) {
    this.key = secret ? pbkdf2Sync(secret, salt, KEY_ITERATIONS, KEY_LENGTH, 'sha256') : null;
  }

  get reversible(): boolean {
    return this.key !== null;
  }

  tokenize(value: string): TokenRecord {
    if (!this.key) {
      const digest = createHash('sha256').update(value, 'utf8').digest('hex');
      return { token: TOKEN_PREFIX + digest.slice(0, TOKEN_DISPLAY_LENGTH), reversible: false };
    }

    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv('aes-256-gcm', this.key, iv);
    const ciphertext = Buffer.concat([cipher.update(value, 'utf8'), cipher.final()]);
    const payload = Buffer.concat([iv, cipher.getAuthTag(), ciphertext]).toString('base64url');

    return {
      token: TOKEN_PREFIX + payload.slice(0, TOKEN_DISPLAY_LENGTH),
      reversible: true,
      payload,
    };
  }

  /** Recover the original value from a reversible token's payload. */
  reverse(record: TokenRecord | string): string {
    const payload = typeof record === 'string' ? record : record.payload;
    if (payload === undefined || (typeof record !== 'string' && !record.reversible)) {
      throw new IrreversibleTokenError();
    }
    if (DISPLAY_TOKEN.test(payload)) {
      throw new IrreversibleTokenError('Display tokens cannot be reversed; pass the token payload');
    }
    if (!this.key) {
      throw new IrreversibleTokenError('No tokenization secret is configured');
    }

    const raw = Buffer.from(payload, 'base64url');
    if (raw.length < IV_LENGTH + TAG_LENGTH) {
      throw new TokenizationKeyMismatchError();
    }

    const iv = raw.subarray(0, IV_LENGTH);
    const tag = raw.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
    const ciphertext = raw.subarray(IV_LENGTH + TAG_LENGTH);

    try {
      const decipher = createDecipheriv('aes-256-gcm', this.key, iv);
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
    } catch (err) {
      throw new TokenizationKeyMismatchError({ cause: err });
    }
  }
}
