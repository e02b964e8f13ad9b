/** Raw key/value mapping of one catalog entry, keys already normalized. */
export type DescriptorFields = Record<string, string>;

export type FunctionRecord = {
  /** Name exposed to callers (also the generated method name). */
  function: string;
  /** Native symbol called by the generated code. */
  cname: string;
  prototype: string;
  help: string;
  /** Documentation override; wins over the configured doc source. */
  doc?: string;
  /** Obsolescence date, e.g. `2007-03-30`. */
  obsolete?: string;
  class: string;
  section: string;
};
