export type * from './prototypeTypes.js';
export { tokenizePrototype, isArgumentCode } from './tokenizePrototype.js';
export { helpParameterNames, safeParameterName } from './helpNames.js';
export { parsePrototype, instanceContextArg } from './parsePrototype.js';
