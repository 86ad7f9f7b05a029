import type { EntityType } from '../types.js';

export type RandomSource = () => number;

const FIRST_NAMES = ['John', 'Jane', 'Alex', 'Sam', 'Taylor', 'Morgan', 'Jordan', 'Casey'];
const LAST_NAMES = ['Smith', 'Johnson', 'Williams', 'Brown', 'Jones', 'Miller', 'Davis'];

/**
 * Synthetic stand-ins of the same kind as the value they replace. Randomness
 * is injectable so tests can pin the output.
 */
export class Pseudonymizer {
  constructor(private readonly random: RandomSource = Math.random) {}

  pseudonymize(type: EntityType, value: string): string {
    switch (type) {
      case 'person': {
        const first = this.pick(FIRST_NAMES);
        return value.trim().split(/\s+/).length > 1 ? `${first} ${this.pick(LAST_NAMES)}` : first;
      }
      case 'email':
        return `user${this.hex(8)}@example.com`;
      case 'phone':
        return `(555) 000-${String(this.int(10_000)).padStart(4, '0')}`;
      case 'address':
        return `${this.int(1000)} Main Street, Anytown, USA`;
      default:
        return `PSEUDONYM_${type}_${this.hex(8)}`;
    }
  }

  private int(below: number): number {
    return Math.min(below - 1, Math.floor(this.random() * below));
  }

  private pick(values: readonly string[]): string {
    return values[this.int(values.length)];
  }

  private hex(length: number): string {
    let out = '';
    for (let i = 0; i < length; i++) out += this.int(16).toString(16);
    return out;
  }
}
