import type { NativeDeclaration, NativeFunction, NativeLibrary } from './ffiTypes.js';

const DECLARATION_RE = /^\s*(.+?)\s*\b([A-Za-z_][A-Za-z0-9_]*)\s*\((.*)\)\s*;?\s*$/;

export function parseDeclaration(line: string): NativeDeclaration {
  const m = DECLARATION_RE.exec(line);
  const returns = m?.[1];
  const name = m?.[2];
  const argList = m?.[3];
  if (returns === undefined || name === undefined || argList === undefined) {
    throw new Error(`Invalid native declaration: ${JSON.stringify(line)}`);
  }
  const args = argList.trim() === '' ? [] : argList.split(',').map((a) => a.trim());
  return { name, returns, args };
}

/**
 * Binds every declaration of the generated listing, keyed by C name.
 *
 * koffi parses the same `<ret> <name>(<args>)` syntax the listing uses, so
 * each line goes to `lib.func` unchanged.
 */
export function bindDeclarations(
  lib: NativeLibrary,
  declarations: readonly string[],
): Record<string, NativeFunction> {
  const bound: Record<string, NativeFunction> = {};
  for (const line of declarations) {
    const { name } = parseDeclaration(line);
    // Several catalog functions may share one C symbol.
    if (Object.hasOwn(bound, name)) continue;
    bound[name] = lib.func(line);
  }
  return bound;
}
