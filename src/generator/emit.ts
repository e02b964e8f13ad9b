import type { GeneratorConfig } from '../dx/config.js';
import {
  callFragment,
  conversionStatements,
  declaredType,
  deprecationFragment,
  parameterFragment,
} from '../model/arguments.js';
import type { CallSignature } from '../model/modelTypes.js';
import { quote } from '../model/quote.js';
import {
  assignFragment,
  hostReturnType,
  returnDeclaredType,
  returnStatements,
} from '../model/returns.js';

export const BANNER = '// This file is auto-generated by paribind. Do not edit.\n';

const RUNTIME_VALUES = [
  'clearStack',
  'defaultBitprec',
  'defaultSeriesPrecision',
  'gcopy',
  'getVar',
  'native',
  'newGen',
  'objtogen',
  'precBitsToWords',
  'sigOff',
  'sigOn',
];

const RUNTIME_TYPES = ['Gen', 'GenLike', 'NativeHandle'];

const METHOD_INDENT = '  ';
const BODY_INDENT = '    ';

export type MethodSpec = {
  functionName: string;
  cname: string;
  signature: CallSignature;
  /** Already formatted; '' for no doc comment. */
  doc: string;
  obsolete?: string;
};

/** `<returnCType> <cname>(<argCTypes>)` */
export function declarationLine(cname: string, signature: CallSignature): string {
  const args = signature.args
    .map(declaredType)
    .filter((t): t is string => t !== null)
    .join(', ');
  return `${returnDeclaredType(signature.ret)} ${cname}(${args})`;
}

export function declarationEntry(line: string): string {
  return `  ${quote(line)},\n`;
}

export function declarationsHeader(): string {
  return `${BANNER}\nexport const declarations: readonly string[] = [\n`;
}

export function declarationsFooter(): string {
  return '];\n';
}

function runtimeImports(config: GeneratorConfig): string {
  const values = RUNTIME_VALUES.map((n) => `  ${n},\n`).join('');
  const specifier = quote(config.runtimeModule);
  return (
    `import {\n${values}} from ${specifier};\n` +
    `import type { ${RUNTIME_TYPES.join(', ')} } from ${specifier};\n`
  );
}

export function valueClassHeader(config: GeneratorConfig): string {
  return (
    `${BANNER}\n${runtimeImports(config)}\n` +
    '/**\n' +
    ' * Part of the `Gen` class containing auto-generated methods.\n' +
    ' *\n' +
    ' * This class is not meant to be used directly, use the derived class\n' +
    ' * `Gen` instead.\n' +
    ' */\n' +
    `export abstract class ${config.valueClassName} {\n` +
    '  abstract readonly g: NativeHandle;\n'
  );
}

export function instanceClassHeader(config: GeneratorConfig): string {
  return (
    `${BANNER}\n${runtimeImports(config)}\n` +
    '/**\n' +
    ' * Part of the `Pari` class containing auto-generated methods.\n' +
    ' *\n' +
    ' * You must never use this class directly, use the derived class\n' +
    ' * `Pari` instead.\n' +
    ' */\n' +
    `export abstract class ${config.instanceClassName} {\n`
  );
}

export function classFooter(): string {
  return '}\n';
}

export function featureFlagLines(flags: ReadonlyMap<string, boolean>): string {
  let s = '';
  for (const [name, value] of flags) s += `export const ${name} = ${value};\n`;
  return s === '' ? '' : `\n${s}`;
}

function docComment(doc: string): string[] {
  if (!doc) return [];
  const lines = doc
    .replace(/\*\//g, '*\\/')
    .split('\n')
    .map((l) => (l.trim() === '' ? ' *' : ` * ${l.trimEnd()}`));
  return ['/**', ...lines, ' */'];
}

/**
 * Full text of one generated method, with a leading blank line.
 *
 * Body order: obsolescence warning, undocumented-parameter warnings,
 * conversions, `sigOn()`, the call, then the return or stack clear.
 */
export function methodText(spec: MethodSpec): string {
  const { functionName, cname, signature } = spec;
  const { args, ret } = signature;

  const params = args
    .map(parameterFragment)
    .filter((p): p is string => p !== null)
    .join(', ');
  const callArgs = args
    .map(callFragment)
    .filter((c): c is string => c !== null)
    .join(', ');

  const body: string[] = [];
  if (spec.obsolete) {
    const message = quote(
      `the PARI/GP function ${functionName} is obsolete (${spec.obsolete})`,
    );
    body.push(`process.emitWarning(${message}, 'DeprecationWarning');`);
  }
  for (const a of args) body.push(...deprecationFragment(a, functionName));
  for (const a of args) body.push(...conversionStatements(a));
  body.push('sigOn();');
  body.push(...assignFragment(ret, `native.${cname}(${callArgs})`));
  body.push(...returnStatements(ret));

  const lines = [
    ...docComment(spec.doc).map((l) => METHOD_INDENT + l),
    `${METHOD_INDENT}${functionName}(${params}): ${hostReturnType(ret)} {`,
    ...body.map((l) => BODY_INDENT + l),
    `${METHOD_INDENT}}`,
  ];
  return `\n${lines.join('\n')}\n`;
}
