import koffi from 'koffi';

let typesRegistered = false;

/** Declares `GEN` as an opaque pointer type; koffi rejects duplicate names. */
export function registerNativeTypes() {
  if (typesRegistered) return;
  koffi.pointer('GEN', koffi.opaque());
  typesRegistered = true;
}

export function loadLibrary(libPath: string) {
  registerNativeTypes();
  try {
    return koffi.load(libPath);
  } catch (err) {
    throw new Error(`Failed to load native library: ${libPath}`, { cause: err });
  }
}
