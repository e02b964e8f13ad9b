import type { DescriptorFields, FunctionRecord } from '../catalog/catalogTypes.js';
import { recordName, toFunctionRecord } from '../catalog/functionRecord.js';
import type { GeneratorConfig } from '../dx/config.js';
import { logDebug } from '../dx/logger.js';
import { warn } from '../dx/warnings.js';
import { emptyDocSource, type DocSource } from '../docs/docSource.js';
import { UnsupportedPrototypeError } from '../errors.js';
import type { CallSignature } from '../model/modelTypes.js';
import type { GeneratorStreams } from '../output/sinks.js';
import { instanceContextArg, parsePrototype } from '../prototype/parsePrototype.js';
import { accepts } from './eligibility.js';
import {
  classFooter,
  declarationEntry,
  declarationLine,
  declarationsFooter,
  declarationsHeader,
  featureFlagLines,
  instanceClassHeader,
  methodText,
  valueClassHeader,
} from './emit.js';

export type ProgressEvent = {
  type: 'accepted' | 'rejected';
  name: string;
};

export type HandleResult =
  | { status: 'emitted'; valueMethod: boolean }
  | { status: 'skipped'; reason: string };

export type SkippedFunction = {
  name: string;
  reason: string;
};

export type GenerationReport = {
  accepted: string[];
  rejected: string[];
  skipped: SkippedFunction[];
  /** Functions with a declaration and an instance method. */
  emitted: string[];
  featureFlags: Map<string, boolean>;
};

function byName(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Writes the declaration and wrapper methods for catalog functions.
 *
 * Per function: parse (skip on an unsupported prototype), declare once,
 * value method when the first argument is a native value, instance method
 * always.
 */
export class FunctionGenerator {
  constructor(
    private readonly config: GeneratorConfig,
    private readonly docs: DocSource = emptyDocSource,
  ) {}

  canHandleFunction(fields: DescriptorFields): boolean {
    return accepts(
      fields.function ?? '',
      fields.class ?? 'unknown',
      fields.section ?? 'unknown',
      this.config,
    );
  }

  handleFunction(record: FunctionRecord, streams: GeneratorStreams): HandleResult {
    const { function: name, cname, prototype, help } = record;

    // Both parses happen before anything is written, so a skipped function
    // leaves no trace in any stream.
    let plain: CallSignature;
    let instance: CallSignature;
    try {
      plain = parsePrototype(prototype, help);
      instance = parsePrototype(prototype, help, [instanceContextArg()]);
    } catch (err) {
      if (!(err instanceof UnsupportedPrototypeError)) throw err;
      warn({
        code: 'UNSUPPORTED_PROTOTYPE',
        message: `skipping ${name}: ${err.message}`,
      });
      return { status: 'skipped', reason: err.message };
    }

    for (const a of plain.args) {
      if (a.kind !== 'instance-context' && a.undocumented) {
        warn({
          code: 'UNDOCUMENTED_PARAMETER',
          message: `${name}: argument ${a.position} is not named in the help text`,
        });
      }
    }

    const doc = record.doc ?? this.docs.getDoc(name);
    const base = { functionName: name, cname, doc, obsolete: record.obsolete };

    streams.declarations.write(declarationEntry(declarationLine(cname, plain)));

    const valueMethod = plain.args[0]?.kind === 'native-value';
    if (valueMethod) {
      streams.valueMethods.write(methodText({ ...base, signature: plain }));
    }
    streams.instanceMethods.write(methodText({ ...base, signature: instance }));

    logDebug('generated', { name, cname, valueMethod });
    return { status: 'emitted', valueMethod };
  }

  /**
   * Generates every eligible function, in name order, into `streams`.
   *
   * A record without a function name, or an eligible record without a C
   * name, throws `MalformedRecordError`; the caller must discard the streams.
   */
  generate(
    records: Iterable<DescriptorFields>,
    streams: GeneratorStreams,
    onProgress?: (event: ProgressEvent) => void,
  ): GenerationReport {
    const sorted = [...records]
      .map((fields) => ({ name: recordName(fields), fields }))
      .sort((a, b) => byName(a.name, b.name));

    const report: GenerationReport = {
      accepted: [],
      rejected: [],
      skipped: [],
      emitted: [],
      featureFlags: new Map(),
    };

    streams.declarations.write(declarationsHeader());
    streams.valueMethods.write(valueClassHeader(this.config));
    streams.instanceMethods.write(instanceClassHeader(this.config));

    for (const { name, fields } of sorted) {
      if (!this.canHandleFunction(fields)) {
        report.rejected.push(name);
        onProgress?.({ type: 'rejected', name });
        continue;
      }
      report.accepted.push(name);
      onProgress?.({ type: 'accepted', name });

      const result = this.handleFunction(toFunctionRecord(fields), streams);
      if (result.status === 'skipped') {
        report.skipped.push({ name, reason: result.reason });
      } else {
        report.emitted.push(name);
      }
    }

    // Keyed on eligibility: a skipped prototype still sets its flag.
    const accepted = new Set(report.accepted);
    for (const [flag, fn] of Object.entries(this.config.featureFlags)) {
      report.featureFlags.set(flag, accepted.has(fn));
    }

    streams.declarations.write(declarationsFooter());
    streams.valueMethods.write(classFooter());
    streams.instanceMethods.write(classFooter() + featureFlagLines(report.featureFlags));

    return report;
  }
}
