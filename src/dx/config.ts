import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { logDebug } from './logger.js';

export type OutputFiles = {
  /** Native declaration listing. */
  declarations: string;
  /** Methods of the value class. */
  valueMethods: string;
  /** Methods of the instance class. */
  instanceMethods: string;
};

export type GeneratorConfig = {
  outDir: string;
  files: OutputFiles;
  /** Functions never translated, whatever their class. */
  denyList: readonly string[];
  identifierPattern: RegExp;
  /** Only functions of this class are translated. */
  basicClass: string;
  /** Section holding language constructs (if, while, ...). */
  controlSection: string;
  /** Module the generated files import runtime capabilities from. */
  runtimeModule: string;
  valueClassName: string;
  instanceClassName: string;
  /**
   * Constant name -> function name. The instance file exports each constant
   * as `true` when that function was generated.
   */
  featureFlags: Readonly<Record<string, string>>;
};

/** Shape of `paribind.config.js`. Every field is optional. */
export type ParibindConfig = {
  /** Enable debug logs without env var */
  debug?: boolean;
  /** JSON file mapping function names to documentation */
  docsFile?: string;
  outDir?: string;
  files?: Partial<OutputFiles>;
  denyList?: string[];
  identifierPattern?: string | RegExp;
  basicClass?: string;
  controlSection?: string;
  runtimeModule?: string;
  valueClassName?: string;
  instanceClassName?: string;
  featureFlags?: Record<string, string>;
};

export const DEFAULT_DENY_LIST: readonly string[] = [
  'O', // O(p^e) needs special parser support
  'alias',
  'listcreate', // redundant and obsolete
  'allocatemem', // hand-written on the instance class
  'global',
  'inline',
  'uninline',
  'local',
  'my',
];

export function defaultGeneratorConfig(): GeneratorConfig {
  return {
    outDir: 'generated',
    files: {
      declarations: 'auto_decl.ts',
      valueMethods: 'auto_gen.ts',
      instanceMethods: 'auto_instance.ts',
    },
    denyList: DEFAULT_DENY_LIST,
    identifierPattern: /^[A-Za-z][A-Za-z0-9_]*$/,
    basicClass: 'basic',
    controlSection: 'programming/control',
    runtimeModule: '../runtime.js',
    valueClassName: 'GenAuto',
    instanceClassName: 'PariAuto',
    featureFlags: { HAVE_PLOT_SVG: 'plothraw' },
  };
}

export function resolveGeneratorConfig(
  user: ParibindConfig | null = null,
): GeneratorConfig {
  const base = defaultGeneratorConfig();
  if (!user) return base;

  const pattern = user.identifierPattern;
  return {
    outDir: user.outDir ?? base.outDir,
    files: { ...base.files, ...user.files },
    denyList: user.denyList ?? base.denyList,
    identifierPattern:
      pattern === undefined
        ? base.identifierPattern
        : typeof pattern === 'string'
          ? new RegExp(pattern)
          : pattern,
    basicClass: user.basicClass ?? base.basicClass,
    controlSection: user.controlSection ?? base.controlSection,
    runtimeModule: user.runtimeModule ?? base.runtimeModule,
    valueClassName: user.valueClassName ?? base.valueClassName,
    instanceClassName: user.instanceClassName ?? base.instanceClassName,
    featureFlags: user.featureFlags ?? base.featureFlags,
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function stringRecord(v: unknown, key: string): Record<string, string> {
  if (!isRecord(v)) throw new Error(`paribind config: ${key} must be an object`);
  const out: Record<string, string> = {};
  for (const [k, value] of Object.entries(v)) {
    if (typeof value !== 'string') {
      throw new Error(`paribind config: ${key}.${k} must be a string`);
    }
    out[k] = value;
  }
  return out;
}

/** Checks the value exported by `paribind.config.js`. */
export function readUserConfig(value: unknown): ParibindConfig {
  if (!isRecord(value)) throw new Error('paribind config: expected an object');

  const cfg: ParibindConfig = {};
  for (const [key, v] of Object.entries(value)) {
    switch (key) {
      case 'debug':
        if (typeof v !== 'boolean') throw new Error('paribind config: debug must be a boolean');
        cfg.debug = v;
        break;
      case 'identifierPattern':
        if (typeof v !== 'string' && !(v instanceof RegExp)) {
          throw new Error('paribind config: identifierPattern must be a string or RegExp');
        }
        cfg.identifierPattern = v;
        break;
      case 'denyList':
        if (!Array.isArray(v) || !v.every((x): x is string => typeof x === 'string')) {
          throw new Error('paribind config: denyList must be an array of strings');
        }
        cfg.denyList = v;
        break;
      case 'files':
        cfg.files = readFiles(stringRecord(v, key));
        break;
      case 'featureFlags':
        cfg.featureFlags = stringRecord(v, key);
        break;
      case 'docsFile':
      case 'outDir':
      case 'basicClass':
      case 'controlSection':
      case 'runtimeModule':
      case 'valueClassName':
      case 'instanceClassName':
        if (typeof v !== 'string') throw new Error(`paribind config: ${key} must be a string`);
        cfg[key] = v;
        break;
      default:
        throw new Error(`paribind config: unknown option ${JSON.stringify(key)}`);
    }
  }
  return cfg;
}

function readFiles(files: Record<string, string>): Partial<OutputFiles> {
  const out: Partial<OutputFiles> = {};
  for (const [k, v] of Object.entries(files)) {
    if (k === 'declarations' || k === 'valueMethods' || k === 'instanceMethods') {
      out[k] = v;
    } else {
      throw new Error(`paribind config: unknown output file ${JSON.stringify(k)}`);
    }
  }
  return out;
}

let cached:
  | { loaded: true; config: ParibindConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, 'paribind.config.js');
}

/**
 * Loads optional `paribind.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<ParibindConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const exported = isRecord(mod) && 'default' in mod ? mod.default : mod;
  const cfg = readUserConfig(exported);
  cached = { loaded: true, config: cfg };
  logDebug('loaded config', { path: p });
  return cfg;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
