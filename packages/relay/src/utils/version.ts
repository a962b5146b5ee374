/**
 * @file version.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const PACKAGE_NAME = '@polyglot-chat/relay';

const PackageJsonSchema = z.object({
  name: z.literal(PACKAGE_NAME),
  version: z.string().min(1),
});

/**
 * Reads the relay server version from package.json.
 */
export function getRelayVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // "../package.json" from dist/, "../../package.json" from src/utils/
  const candidates = [join(here, '../package.json'), join(here, '../../package.json')];

  for (const packageJsonPath of candidates) {
    let parsed;
    try {
      parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf8')));
    } catch {
      // Missing or unreadable; try the next location
      continue;
    }
    if (parsed.success) {
      return parsed.data.version;
    }
  }
  return 'unknown';
}
