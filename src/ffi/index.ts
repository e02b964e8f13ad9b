import type { NativeFunction } from './ffiTypes.js';

import { bindDeclarations } from './bindDeclarations.js';
import { loadLibrary } from './createLibrary.js';

export type * from './ffiTypes.js';
export { bindDeclarations, parseDeclaration } from './bindDeclarations.js';
export { loadLibrary, registerNativeTypes } from './createLibrary.js';

/** Loads the library and binds a generated declaration listing. */
export function loadDeclarations(
  libPath: string,
  declarations: readonly string[],
): Record<string, NativeFunction> {
  const lib = loadLibrary(libPath);
  return bindDeclarations(lib, declarations);
}
