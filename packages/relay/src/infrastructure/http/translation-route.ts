/**
 * @file translation-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { Logger } from 'pino';
import type { TranslationProvider } from '../../domain/ports/translation-provider.js';
import type { LanguageNormalizer } from '../../application/language-normalizer.js';
import { TranslateQuerySchema } from '../../protocol/schemas.js';
import { createErrorMessage } from '../../protocol/errors.js';
import type { AppWithGet } from './health-route.js';

export interface TranslationRouteDeps {
  provider: TranslationProvider;
  normalizer: LanguageNormalizer;
  logger: Logger;
}

/**
 * Registers the language table and one-off translation routes.
 */
export function registerTranslationRoutes(app: AppWithGet, deps: TranslationRouteDeps): void {
  const logger = deps.logger.child({ route: 'translation' });

  app.get('/languages', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ supported_languages: deps.provider.getLanguageTable() });
  });

  app.get('/translate', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = TranslateQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply
        .status(400)
        .send(createErrorMessage('INVALID_COMMAND', 'Query parameter "text" is required'));
    }

    const { text, target: targetInput, source: sourceInput } = parsed.data;
    const target = deps.normalizer.normalize(targetInput);
    if (!target) {
      return reply
        .status(400)
        .send(createErrorMessage('UNRECOGNIZED_LANGUAGE', `Unrecognized language: '${targetInput}'`));
    }

    let source = 'auto';
    if (sourceInput && sourceInput.trim().toLowerCase() !== 'auto') {
      const normalized = deps.normalizer.normalize(sourceInput);
      if (!normalized) {
        return reply
          .status(400)
          .send(createErrorMessage('UNRECOGNIZED_LANGUAGE', `Unrecognized language: '${sourceInput}'`));
      }
      source = normalized;
    }

    try {
      const translated = await deps.provider.translateText(text, target, source);
      return reply.status(200).send({ source, target, original: text, translated });
    } catch (error) {
      logger.warn({ error, target }, 'Translation request failed');
      return reply.status(502).send(createErrorMessage('INTERNAL_ERROR', 'Translation failed'));
    }
  });
}
