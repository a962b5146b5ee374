/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

export * from './messages.js';
export * from './commands.js';
export * from './schemas.js';
export * from './errors.js';
