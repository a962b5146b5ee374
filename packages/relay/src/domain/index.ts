/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export * from './entities/index.js';
export * from './value-objects/index.js';
export * from './errors/index.js';
export * from './ports/index.js';

