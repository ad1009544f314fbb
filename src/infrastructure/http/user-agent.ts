import { readFileSync } from 'node:fs';
import { z } from 'zod';

const manifestSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
});

const MANIFEST_URL = new URL('../../../package.json', import.meta.url);

let cached: string | undefined;

/**
 * `<name>/<version>` from the package manifest.
 *
 * Read once on first use and cached for the life of the process.
 */
export function userAgent(): string {
  if (cached === undefined) {
    const manifest = manifestSchema.parse(JSON.parse(readFileSync(MANIFEST_URL, 'utf-8')));
    cached = `${manifest.name}/${manifest.version}`;
  }
  return cached;
}
