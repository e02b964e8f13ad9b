import { mkdirSync, renameSync, rmSync } from 'node:fs';
import { join } from 'node:path';

import type { OutputFiles } from '../dx/config.js';
import { logDebug } from '../dx/logger.js';
import { FileSink, type GeneratorStreams, type OutputStream } from './sinks.js';

const STREAMS: readonly OutputStream[] = [
  'declarations',
  'valueMethods',
  'instanceMethods',
];

function openSinks(
  targets: Record<OutputStream, string>,
): Record<OutputStream, FileSink> {
  const opened: FileSink[] = [];
  const open = (path: string) => {
    const sink = new FileSink(`${path}.tmp`);
    opened.push(sink);
    return sink;
  };
  try {
    return {
      declarations: open(targets.declarations),
      valueMethods: open(targets.valueMethods),
      instanceMethods: open(targets.instanceMethods),
    };
  } catch (err) {
    for (const sink of opened) {
      sink.close();
      rmSync(sink.path, { force: true });
    }
    throw err;
  }
}

/**
 * The three output files, written to `<file>.tmp` and renamed into place
 * together by `commit()`.
 */
export class StagedOutputs {
  readonly streams: GeneratorStreams;
  private readonly sinks: Record<OutputStream, FileSink>;
  private readonly targets: Record<OutputStream, string>;
  private done = false;

  constructor(outDir: string, files: OutputFiles) {
    mkdirSync(outDir, { recursive: true });
    this.targets = {
      declarations: join(outDir, files.declarations),
      valueMethods: join(outDir, files.valueMethods),
      instanceMethods: join(outDir, files.instanceMethods),
    };

    this.sinks = openSinks(this.targets);
    this.streams = this.sinks;
  }

  commit(): void {
    if (this.done) throw new Error('outputs already committed or aborted');
    for (const s of STREAMS) this.sinks[s].close();
    for (const s of STREAMS) {
      renameSync(this.sinks[s].path, this.targets[s]);
      logDebug('wrote', this.targets[s]);
    }
    this.done = true;
  }

  /** Removes the temporaries; the previous outputs stay untouched. */
  abort(): void {
    if (this.done) return;
    for (const s of STREAMS) {
      this.sinks[s].close();
      rmSync(this.sinks[s].path, { force: true });
    }
    this.done = true;
  }
}
