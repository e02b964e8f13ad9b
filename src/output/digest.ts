import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import crypto from 'node:crypto';

import type { OutputFiles } from '../dx/config.js';
import type { OutputStream } from './sinks.js';

export function digestText(text: string): string {
  const hash = crypto.createHash('sha256');
  hash.update(text);
  return hash.digest('hex');
}

export type StaleOutput = {
  stream: OutputStream;
  path: string;
  reason: 'missing' | 'changed';
};

/**
 * Compares freshly generated text with the files on disk.
 *
 * Returns the outputs that a `generate` run would rewrite.
 */
export function checkOutputs(
  outDir: string,
  files: OutputFiles,
  generated: Readonly<Record<OutputStream, string>>,
): StaleOutput[] {
  const stale: StaleOutput[] = [];
  const streams: OutputStream[] = ['declarations', 'valueMethods', 'instanceMethods'];
  for (const stream of streams) {
    const path = join(outDir, files[stream]);
    if (!existsSync(path)) {
      stale.push({ stream, path, reason: 'missing' });
      continue;
    }
    if (digestText(readFileSync(path, 'utf8')) !== digestText(generated[stream])) {
      stale.push({ stream, path, reason: 'changed' });
    }
  }
  return stale;
}
