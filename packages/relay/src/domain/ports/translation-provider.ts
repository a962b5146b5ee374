/**
 * @file translation-provider.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

/**
 * Translator bound to one target language.
 */
export interface Translator {
  readonly target: string;

  /**
   * Translates text into the bound target language, detecting the source.
   */
  translate(text: string): Promise<string>;
}

/**
 * Port for the language name table used by the normalizer.
 */
export interface LanguageCatalog {
  /**
   * Lowercase language name to canonical code, e.g. `{ french: 'fr' }`.
   * Throws if the table cannot be loaded.
   */
  getLanguageTable(): Readonly<Record<string, string>>;
}

/**
 * Port for the machine-translation capability.
 */
export interface TranslationProvider extends LanguageCatalog {
  /**
   * Creates a reusable translator for a canonical target code.
   */
  createTranslator(target: string): Translator;

  /**
   * One-off translation with an explicit source (`auto` to detect).
   */
  translateText(text: string, target: string, source?: string): Promise<string>;
}
