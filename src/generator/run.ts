import type { DescriptorFields } from '../catalog/catalogTypes.js';
import type { GeneratorConfig } from '../dx/config.js';
import { logDebug } from '../dx/logger.js';
import type { DocSource } from '../docs/docSource.js';
import { memoryStreams, type OutputStream } from '../output/sinks.js';
import { StagedOutputs } from '../output/stagedOutputs.js';
import {
  FunctionGenerator,
  type GenerationReport,
  type ProgressEvent,
} from './functionGenerator.js';

export type GenerateOptions = {
  config: GeneratorConfig;
  docs?: DocSource;
  onProgress?: (event: ProgressEvent) => void;
};

/**
 * Generates the three output files under `config.outDir`.
 *
 * Nothing replaces the previous outputs unless all three were written.
 */
export function generateFiles(
  records: Iterable<DescriptorFields>,
  options: GenerateOptions,
): GenerationReport {
  const { config } = options;
  const generator = new FunctionGenerator(config, options.docs);
  const staged = new StagedOutputs(config.outDir, config.files);

  let report: GenerationReport;
  try {
    report = generator.generate(records, staged.streams, options.onProgress);
  } catch (err) {
    staged.abort();
    throw err;
  }
  staged.commit();
  logDebug('generation done', {
    outDir: config.outDir,
    emitted: report.emitted.length,
    skipped: report.skipped.length,
  });
  return report;
}

/** Same as `generateFiles`, returning the text instead of writing it. */
export function generateText(
  records: Iterable<DescriptorFields>,
  options: GenerateOptions,
): { report: GenerationReport; text: Record<OutputStream, string> } {
  const generator = new FunctionGenerator(options.config, options.docs);
  const streams = memoryStreams();
  const report = generator.generate(records, streams, options.onProgress);
  return {
    report,
    text: {
      declarations: streams.declarations.text,
      valueMethods: streams.valueMethods.text,
      instanceMethods: streams.instanceMethods.text,
    },
  };
}

/** `Generating PARI functions: a (b) c` */
export function formatProgress(events: readonly ProgressEvent[]): string {
  const parts = events.map((e) => (e.type === 'accepted' ? ` ${e.name}` : ` (${e.name})`));
  return `Generating PARI functions:${parts.join('')}`;
}
