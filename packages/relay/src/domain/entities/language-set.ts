/**
 * @file language-set.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { LanguageLimitReachedError } from '../errors/domain-errors.js';

export type AddLanguageOutcome = 'added' | 'already_active';

/**
 * The room-wide, ordered set of target languages every chat message is rendered into.
 * Codes must already be canonical; the normalizer runs before anything reaches here.
 */
export class GlobalLanguageSet {
  private readonly codes: string[] = [];
  private readonly _maxSize: number;

  constructor(maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error('GlobalLanguageSet size limit must be a positive integer');
    }
    this._maxSize = maxSize;
  }

  get maxSize(): number {
    return this._maxSize;
  }

  get size(): number {
    return this.codes.length;
  }

  get isEmpty(): boolean {
    return this.codes.length === 0;
  }

  has(code: string): boolean {
    return this.codes.includes(code);
  }

  /**
   * Appends a code. A code already in the set is left where it is.
   * @throws LanguageLimitReachedError when a new code would exceed the limit
   */
  add(code: string): AddLanguageOutcome {
    if (this.has(code)) {
      return 'already_active';
    }
    if (this.codes.length >= this._maxSize) {
      throw new LanguageLimitReachedError(this._maxSize);
    }
    this.codes.push(code);
    return 'added';
  }

  /**
   * Removes a code, keeping the order of the rest. Returns false if it was absent.
   */
  remove(code: string): boolean {
    const index = this.codes.indexOf(code);
    if (index === -1) {
      return false;
    }
    this.codes.splice(index, 1);
    return true;
  }

  /**
   * Point-in-time copy in insertion order.
   */
  list(): string[] {
    return [...this.codes];
  }
}
