export type NativeFunction = (...args: unknown[]) => unknown;

/** The part of a koffi library handle the binder needs. */
export type NativeLibrary = {
  func(definition: string): NativeFunction;
};

/** One parsed `<returnCType> <cname>(<argCTypes>)` line. */
export type NativeDeclaration = {
  name: string;
  returns: string;
  args: string[];
};
