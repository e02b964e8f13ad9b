export type * from './modelTypes.js';
export {
  callFragment,
  conversionStatements,
  declaredType,
  deprecationFragment,
  parameterDefault,
  parameterFragment,
  tmpName,
} from './arguments.js';
export {
  assignFragment,
  hostReturnType,
  returnDeclaredType,
  returnForCode,
  returnStatements,
} from './returns.js';
export { quote } from './quote.js';
