import { readFileSync } from 'node:fs';

import { MalformedRecordError } from '../errors.js';
import type { DescriptorFields } from './catalogTypes.js';

function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/-/g, '');
}

/**
 * Parses the `pari.desc` catalog format.
 *
 * Records are separated by blank lines. Each record is a list of `Key: value`
 * lines; a line starting with a space continues the previous value.
 */
export function parseDescriptorText(
  text: string,
  source = '<catalog>',
): Map<string, DescriptorFields> {
  const lines = text.split(/\r?\n/);
  const functions = new Map<string, DescriptorFields>();

  let current: DescriptorFields = {};
  let currentStart = 1;
  let lastKey: string | undefined;

  const flush = () => {
    if (Object.keys(current).length === 0) return;
    const name = current.function;
    if (name === undefined || name === '') {
      throw new MalformedRecordError(
        `${source}:${currentStart}: record has no Function field`,
        { source, line: currentStart },
      );
    }
    functions.set(name, current);
    current = {};
    lastKey = undefined;
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const lineNo = i + 1;

    if (line.trim() === '') {
      flush();
      continue;
    }

    if (line.startsWith(' ')) {
      if (lastKey === undefined) {
        throw new MalformedRecordError(
          `${source}:${lineNo}: continuation line without a field`,
          { source, line: lineNo },
        );
      }
      current[lastKey] = `${current[lastKey] ?? ''}\n${line.slice(1)}`.trim();
      continue;
    }

    const colon = line.indexOf(':');
    if (colon === -1) {
      throw new MalformedRecordError(
        `${source}:${lineNo}: expected "Key: value"`,
        { source, line: lineNo },
      );
    }
    if (Object.keys(current).length === 0) currentStart = lineNo;
    lastKey = normalizeKey(line.slice(0, colon));
    current[lastKey] = line.slice(colon + 1).trim();
  }
  flush();

  return functions;
}

export function readDescriptorFile(
  filePath: string,
): Map<string, DescriptorFields> {
  return parseDescriptorText(readFileSync(filePath, 'utf8'), filePath);
}
