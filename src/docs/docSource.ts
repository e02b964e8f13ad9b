import { readFileSync } from 'node:fs';

import type { DescriptorFields } from '../catalog/catalogTypes.js';

/** Formatted documentation for a function; '' when there is none. */
export type DocSource = {
  getDoc(functionName: string): string;
};

export const emptyDocSource: DocSource = {
  getDoc: () => '',
};

export function createMapDocSource(entries: Record<string, string>): DocSource {
  const docs = new Map(Object.entries(entries));
  return {
    getDoc: (name) => docs.get(name) ?? '',
  };
}

/** Loads a JSON object mapping function names to documentation. */
export function loadDocFile(filePath: string): DocSource {
  const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Invalid documentation file ${filePath}: expected a JSON object`);
  }
  const entries: Record<string, string> = {};
  for (const [name, doc] of Object.entries(parsed)) {
    if (typeof doc !== 'string') {
      throw new Error(`Invalid documentation for ${name} in ${filePath}: expected a string`);
    }
    entries[name] = doc;
  }
  return createMapDocSource(entries);
}

/**
 * Turns `name(args): description` into `Description`.
 */
export function helpSentence(help: string): string {
  const sep = help.indexOf('):');
  const text = (sep === -1 ? help : help.slice(sep + 2)).trim();
  if (!text) return '';
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/** Documentation derived from the catalog's help strings. */
export function createHelpDocSource(
  records: Iterable<DescriptorFields>,
): DocSource {
  const docs: Record<string, string> = {};
  for (const r of records) {
    if (r.function !== undefined) docs[r.function] = helpSentence(r.help ?? '');
  }
  return createMapDocSource(docs);
}
