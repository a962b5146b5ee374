/**
 * @file google-translation-provider.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { Logger } from 'pino';
import type {
  TranslationProvider,
  Translator,
} from '../../domain/ports/translation-provider.js';

/**
 * `[[["Bonjour","Hello",null,null,10]],null,"en",...]`: only the sentence
 * segments are read; their first element is the translated text.
 */
const TranslateResponseSchema = z
  .tuple([z.array(z.tuple([z.string().nullable()]).rest(z.unknown())).nullable()])
  .rest(z.unknown());

const LanguageTableSchema = z.record(z.string().min(1));

export class TranslationRequestError extends Error {
  constructor(
    message: string,
    readonly target: string
  ) {
    super(message);
    this.name = 'TranslationRequestError';
  }
}

export interface GoogleTranslationProviderConfig {
  apiUrl: string;
  timeoutMs: number;
  /** Defaults to data/languages.json of this package */
  languageTablePath?: string;
  fetch?: typeof fetch;
}

function defaultLanguageTablePath(): string {
  // src/infrastructure/translation and dist/infrastructure/translation sit at the same depth
  return join(dirname(fileURLToPath(import.meta.url)), '../../../data/languages.json');
}

/**
 * Translation provider backed by Google's public translate endpoint.
 * The language name table ships with the package as JSON.
 */
export class GoogleTranslationProvider implements TranslationProvider {
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly languageTablePath: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private languageTable: Readonly<Record<string, string>> | null = null;

  constructor(config: GoogleTranslationProviderConfig, logger: Logger) {
    this.apiUrl = config.apiUrl;
    this.timeoutMs = config.timeoutMs;
    this.languageTablePath = config.languageTablePath ?? defaultLanguageTablePath();
    this.fetchImpl = config.fetch ?? fetch;
    this.logger = logger.child({ component: 'GoogleTranslationProvider' });
  }

  getLanguageTable(): Readonly<Record<string, string>> {
    if (!this.languageTable) {
      const raw: unknown = JSON.parse(readFileSync(this.languageTablePath, 'utf8'));
      this.languageTable = LanguageTableSchema.parse(raw);
      this.logger.info(
        { languages: Object.keys(this.languageTable).length },
        'Language table loaded'
      );
    }
    return this.languageTable;
  }

  createTranslator(target: string): Translator {
    return {
      target,
      translate: (text: string) => this.translateText(text, target),
    };
  }

  async translateText(text: string, target: string, source = 'auto'): Promise<string> {
    if (text.trim().length === 0) {
      return text;
    }

    const url = new URL(this.apiUrl);
    url.searchParams.set('client', 'gtx');
    url.searchParams.set('sl', source);
    url.searchParams.set('tl', target);
    url.searchParams.set('dt', 't');
    url.searchParams.set('q', text);

    const response = await this.fetchImpl(url, {
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new TranslationRequestError(`Translation HTTP ${response.status}`, target);
    }

    const parsed = TranslateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TranslationRequestError('Unexpected translation response', target);
    }

    const translated = (parsed.data[0] ?? [])
      .map((segment) => segment[0])
      .filter((segment): segment is string => typeof segment === 'string')
      .join('');

    if (!translated) {
      throw new TranslationRequestError('Empty translation', target);
    }
    return translated;
  }
}
