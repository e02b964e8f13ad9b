export type { DescriptorFields, FunctionRecord } from './catalog/catalogTypes.js';
export { recordName, toFunctionRecord } from './catalog/functionRecord.js';
export { parseDescriptorText, readDescriptorFile } from './catalog/readDescriptorFile.js';

export {
  DEFAULT_DENY_LIST,
  defaultGeneratorConfig,
  loadOptionalConfig,
  readUserConfig,
  resolveGeneratorConfig,
  type GeneratorConfig,
  type OutputFiles,
  type ParibindConfig,
} from './dx/config.js';
export { isDebugEnabled, setDebugEnabled } from './dx/logger.js';

export {
  createHelpDocSource,
  createMapDocSource,
  emptyDocSource,
  helpSentence,
  loadDocFile,
  type DocSource,
} from './docs/docSource.js';

export {
  GeneratorError,
  MalformedRecordError,
  UnsupportedPrototypeError,
  type GeneratorErrorCode,
} from './errors.js';

export * from './model/index.js';
export * from './prototype/index.js';

export { accepts, type EligibilityPolicy } from './generator/eligibility.js';
export { declarationLine, methodText, type MethodSpec } from './generator/emit.js';
export {
  FunctionGenerator,
  type GenerationReport,
  type HandleResult,
  type ProgressEvent,
  type SkippedFunction,
} from './generator/functionGenerator.js';
export { formatProgress, generateFiles, generateText, type GenerateOptions } from './generator/run.js';

export { checkOutputs, digestText, type StaleOutput } from './output/digest.js';
export {
  MemorySink,
  memoryStreams,
  type GeneratorStreams,
  type OutputStream,
  type TextSink,
} from './output/sinks.js';
export { StagedOutputs } from './output/stagedOutputs.js';

export * from './ffi/index.js';
