/**
 * @file translator-adapter.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { TranslationProvider, Translator } from '../domain/ports/translation-provider.js';
import { CHAT_DEFAULTS } from '../config/constants.js';

export type TranslationOutcome =
  | { ok: true; text: string }
  | { ok: false; error: unknown };

export interface TranslatorAdapterDeps {
  provider: TranslationProvider;
  logger: Logger;
}

/**
 * Wraps the translation provider for the broadcast path.
 * Keeps one translator per language for the lifetime of the process and never throws:
 * a failing language becomes a failed outcome so the other languages still go out.
 */
export class TranslatorAdapter {
  private readonly provider: TranslationProvider;
  private readonly logger: Logger;
  private readonly cache = new Map<string, Translator>();

  constructor(deps: TranslatorAdapterDeps) {
    this.provider = deps.provider;
    this.logger = deps.logger.child({ component: 'TranslatorAdapter' });
  }

  /**
   * Number of cached translators.
   */
  get cachedCount(): number {
    return this.cache.size;
  }

  /**
   * Returns the cached translator for a code, creating it on first use.
   */
  translator(code: string): Translator {
    const key = code.toLowerCase();
    let translator = this.cache.get(key);
    if (!translator) {
      translator = this.provider.createTranslator(code);
      this.cache.set(key, translator);
    }
    return translator;
  }

  async translate(code: string, text: string): Promise<TranslationOutcome> {
    try {
      const translated = await this.translator(code).translate(text);
      return { ok: true, text: translated };
    } catch (error) {
      this.logger.warn({ error, language: code }, 'Translation failed');
      return { ok: false, error };
    }
  }

  /**
   * Translates into every code concurrently and waits for all of them.
   * Keys are upper-cased codes in the given order.
   */
  async translateAll(codes: readonly string[], text: string): Promise<Record<string, string>> {
    const outcomes = await Promise.all(
      codes.map(async (code) => [code, await this.translate(code, text)] as const)
    );

    const translations: Record<string, string> = {};
    for (const [code, outcome] of outcomes) {
      translations[code.toUpperCase()] = outcome.ok
        ? outcome.text
        : CHAT_DEFAULTS.TRANSLATION_ERROR_MARKER;
    }
    return translations;
  }
}
