/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export { ConnectionId } from './connection-id.js';
export {
  PastelColor,
  hslToHex,
  PASTEL_RANGES,
  type RandomSource,
} from './pastel-color.js';
export type { Identity } from './identity.js';
