/**
 * @file language-normalizer.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { LanguageCatalog } from '../domain/ports/translation-provider.js';
import { FALLBACK_LANGUAGE_CODES } from '../config/constants.js';

/**
 * Lookup tables derived from a provider's name → code table.
 * Keys are lowercase; values keep the provider's spelling (e.g. `zh-CN`).
 */
export interface LanguageLookup {
  codes: ReadonlyMap<string, string>;
  names: ReadonlyMap<string, string>;
}

export function buildLanguageLookup(table: Readonly<Record<string, string>>): LanguageLookup {
  const codes = new Map<string, string>();
  const names = new Map<string, string>();
  for (const [name, code] of Object.entries(table)) {
    names.set(name.toLowerCase(), code);
    codes.set(code.toLowerCase(), code);
  }
  return { codes, names };
}

export const FALLBACK_LOOKUP: LanguageLookup = {
  codes: new Map(FALLBACK_LANGUAGE_CODES.map((code) => [code, code])),
  names: new Map(),
};

/**
 * Maps a language code or name to its canonical code.
 * Returns undefined for empty or unknown input.
 */
export function normalizeLanguage(
  input: string | undefined,
  lookup: LanguageLookup
): string | undefined {
  const text = input?.trim().toLowerCase();
  if (!text) {
    return undefined;
  }
  return lookup.codes.get(text) ?? lookup.names.get(text);
}

export interface LanguageNormalizerDeps {
  catalog: LanguageCatalog;
  logger: Logger;
}

/**
 * Normalizes against the provider's table, loaded once. While the table cannot be
 * loaded the built-in codes are used and the next call tries the catalog again.
 */
export class LanguageNormalizer {
  private readonly catalog: LanguageCatalog;
  private readonly logger: Logger;
  private lookup: LanguageLookup | null = null;

  constructor(deps: LanguageNormalizerDeps) {
    this.catalog = deps.catalog;
    this.logger = deps.logger.child({ component: 'LanguageNormalizer' });
  }

  normalize(input: string | undefined): string | undefined {
    return normalizeLanguage(input, this.currentLookup());
  }

  private currentLookup(): LanguageLookup {
    if (this.lookup) {
      return this.lookup;
    }
    try {
      this.lookup = buildLanguageLookup(this.catalog.getLanguageTable());
      return this.lookup;
    } catch (error) {
      this.logger.warn({ error }, 'Language table unavailable, using built-in codes');
      return FALLBACK_LOOKUP;
    }
  }
}
