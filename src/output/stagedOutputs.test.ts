import { describe, it, expect, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { DescriptorFields } from '../catalog/catalogTypes.js';
import { resolveGeneratorConfig } from '../dx/config.js';
import { MalformedRecordError } from '../errors.js';
import { generateFiles, generateText } from '../generator/run.js';
import { checkOutputs, digestText } from './digest.js';
import { StagedOutputs } from './stagedOutputs.js';

const RECORDS: DescriptorFields[] = [
  {
    function: 'gcd',
    cname: 'ggcd0',
    prototype: 'GDG',
    help: 'gcd(x,{y}): greatest common divisor of x and y.',
    class: 'basic',
    section: 'number_theoretical',
  },
  {
    function: 'getrand',
    cname: 'getrand',
    prototype: '',
    help: 'getrand(): current value of the seed.',
    class: 'basic',
    section: 'programming/specific',
  },
];

const dirs: string[] = [];

function tempDir() {
  const dir = mkdtempSync(join(tmpdir(), 'paribind-out-'));
  dirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const d of dirs.splice(0)) rmSync(d, { recursive: true, force: true });
});

describe('StagedOutputs', () => {
  it('renames all temporaries into place on commit', () => {
    const dir = tempDir();
    const staged = new StagedOutputs(dir, {
      declarations: 'a.ts',
      valueMethods: 'b.ts',
      instanceMethods: 'c.ts',
    });
    staged.streams.declarations.write('one\n');
    staged.streams.valueMethods.write('two\n');
    staged.streams.instanceMethods.write('three\n');

    expect(readdirSync(dir).sort()).toEqual(['a.ts.tmp', 'b.ts.tmp', 'c.ts.tmp']);
    staged.commit();

    expect(readdirSync(dir).sort()).toEqual(['a.ts', 'b.ts', 'c.ts']);
    expect(readFileSync(join(dir, 'c.ts'), 'utf8')).toBe('three\n');
  });

  it('keeps previous outputs when aborted', () => {
    const dir = tempDir();
    writeFileSync(join(dir, 'a.ts'), 'old\n');
    const staged = new StagedOutputs(dir, {
      declarations: 'a.ts',
      valueMethods: 'b.ts',
      instanceMethods: 'c.ts',
    });
    staged.streams.declarations.write('new\n');
    staged.abort();

    expect(readdirSync(dir)).toEqual(['a.ts']);
    expect(readFileSync(join(dir, 'a.ts'), 'utf8')).toBe('old\n');
    expect(() => staged.commit()).toThrow(/already committed or aborted/);
  });
});

describe('generateFiles', () => {
  it('writes the three outputs', () => {
    const outDir = join(tempDir(), 'generated');
    const config = resolveGeneratorConfig({ outDir });
    const report = generateFiles(RECORDS, { config });

    expect(report.emitted).toEqual(['gcd', 'getrand']);
    expect(readdirSync(outDir).sort()).toEqual(['auto_decl.ts', 'auto_gen.ts', 'auto_instance.ts']);
    expect(readFileSync(join(outDir, 'auto_decl.ts'), 'utf8')).toContain(
      "  'GEN ggcd0(GEN, GEN)',\n  'GEN getrand()',\n",
    );
    expect(readFileSync(join(outDir, 'auto_instance.ts'), 'utf8')).toContain(
      '  getrand(): Gen {\n    sigOn();\n    const _ret = native.getrand();\n    return newGen(_ret);\n  }\n',
    );
  });

  it('is byte-identical across runs', () => {
    const outDir = tempDir();
    const config = resolveGeneratorConfig({ outDir });
    generateFiles(RECORDS, { config });
    const first = readFileSync(join(outDir, 'auto_gen.ts'));
    generateFiles(RECORDS, { config });
    const second = readFileSync(join(outDir, 'auto_gen.ts'));
    expect(second.equals(first)).toBe(true);
  });

  it('leaves no partial output behind a malformed record', () => {
    const outDir = tempDir();
    const config = resolveGeneratorConfig({ outDir });
    generateFiles(RECORDS, { config });
    const before = readFileSync(join(outDir, 'auto_decl.ts'), 'utf8');

    const broken: DescriptorFields = { function: 'zeta', prototype: 'Gp', class: 'basic', section: 'transcendental' };
    expect(() => generateFiles([...RECORDS, broken], { config })).toThrow(MalformedRecordError);

    expect(readdirSync(outDir).sort()).toEqual(['auto_decl.ts', 'auto_gen.ts', 'auto_instance.ts']);
    expect(readFileSync(join(outDir, 'auto_decl.ts'), 'utf8')).toBe(before);
  });
});

describe('checkOutputs', () => {
  it('reports missing, changed and fresh outputs', () => {
    const outDir = tempDir();
    const config = resolveGeneratorConfig({ outDir });
    const { text } = generateText(RECORDS, { config });

    expect(checkOutputs(outDir, config.files, text).map((s) => s.reason)).toEqual([
      'missing',
      'missing',
      'missing',
    ]);

    generateFiles(RECORDS, { config });
    expect(checkOutputs(outDir, config.files, text)).toEqual([]);

    writeFileSync(join(outDir, 'auto_gen.ts'), '// edited\n');
    expect(checkOutputs(outDir, config.files, text)).toEqual([
      { stream: 'valueMethods', path: join(outDir, 'auto_gen.ts'), reason: 'changed' },
    ]);
    expect(existsSync(join(outDir, 'auto_gen.ts.tmp'))).toBe(false);
  });

  it('hashes text with sha256', () => {
    expect(digestText('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});
