import { closeSync, openSync, writeSync } from 'node:fs';

export type TextSink = {
  write(text: string): void;
};

export type OutputStream = 'declarations' | 'valueMethods' | 'instanceMethods';

export type GeneratorStreams = Record<OutputStream, TextSink>;

export class MemorySink implements TextSink {
  private chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  get text(): string {
    return this.chunks.join('');
  }
}

export function memoryStreams(): Record<OutputStream, MemorySink> {
  return {
    declarations: new MemorySink(),
    valueMethods: new MemorySink(),
    instanceMethods: new MemorySink(),
  };
}

export class FileSink implements TextSink {
  private fd: number | null;

  constructor(readonly path: string) {
    this.fd = openSync(path, 'w');
  }

  write(text: string): void {
    if (this.fd === null) throw new Error(`write after close: ${this.path}`);
    writeSync(this.fd, text, null, 'utf8');
  }

  close(): void {
    if (this.fd === null) return;
    closeSync(this.fd);
    this.fd = null;
  }
}
