/**
 * @file schemas.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';

// ============================================================================
// HTTP Query Schemas
// ============================================================================

export const TranslateQuerySchema = z.object({
  text: z.string().min(1, 'Text is required'),
  target: z.string().min(1).default('fr'),
  source: z.string().min(1).optional(),
});

// ============================================================================
// Token Claims
// ============================================================================

export const TokenClaimsSchema = z.object({
  sub: z.string().min(1, 'Subject (username) is required'),
  user_id: z.string().min(1, 'User ID is required'),
  exp: z.number().optional(),
});

// ============================================================================
// Type Exports
// ============================================================================

export type TranslateQuery = z.infer<typeof TranslateQuerySchema>;
export type TokenClaims = z.infer<typeof TokenClaimsSchema>;
