import type { Argument, PrecisionArg } from './modelTypes.js';
import { quote } from './quote.js';

/** Name of the temporary holding the converted value. */
export function tmpName(name: string): string {
  return `_${name}`;
}

/**
 * Default literal of the generated parameter, or undefined when the
 * parameter is required.
 */
export function parameterDefault(arg: Argument): string | undefined {
  switch (arg.kind) {
    case 'native-value':
      return arg.receiver ? undefined : arg.default;
    case 'small-int':
    case 'unsigned-int':
    case 'string':
      return arg.default;
    case 'variable':
      return arg.optional ? 'null' : undefined;
    case 'precision':
      return arg.unit === 'series' ? '-1' : '0';
    case 'instance-context':
      return undefined;
  }
}

/** C type of the argument in the declaration listing. */
export function declaredType(arg: Argument): string | null {
  switch (arg.kind) {
    case 'native-value':
      return 'GEN';
    case 'small-int':
    case 'variable':
    case 'precision':
      return 'long';
    case 'unsigned-int':
      return 'unsigned long';
    case 'string':
      return 'const char *';
    case 'instance-context':
      return null;
  }
}

function hostType(arg: Argument): string | null {
  switch (arg.kind) {
    case 'native-value':
    case 'variable':
      return nullable('GenLike', arg);
    case 'string':
      return nullable('string', arg);
    case 'small-int':
    case 'unsigned-int':
    case 'precision':
      return 'number';
    case 'instance-context':
      return null;
  }
}

function nullable(type: string, arg: Argument): string {
  return parameterDefault(arg) === 'null' ? `${type} | null` : type;
}

/**
 * Fragment of the generated parameter list, or null when the argument is
 * implicit (`this`).
 */
export function parameterFragment(arg: Argument): string | null {
  if (arg.kind === 'instance-context') return null;
  if (arg.kind === 'native-value' && arg.receiver) return null;

  const type = hostType(arg);
  const def = parameterDefault(arg);
  const head = type === null ? arg.name : `${arg.name}: ${type}`;
  return def === undefined ? head : `${head} = ${def}`;
}

/**
 * Statements turning the parameter into a value the native call accepts.
 *
 * They only ever read the argument's own parameter and write its own
 * temporary.
 */
export function conversionStatements(arg: Argument): string[] {
  switch (arg.kind) {
    case 'native-value': {
      const tmp = tmpName(arg.name);
      if (arg.receiver) return [`const ${tmp} = this.g;`];
      if (arg.default === 'null') {
        return [
          `let ${tmp}: NativeHandle | null = null;`,
          `if (${arg.name} !== null) {`,
          `  ${tmp} = objtogen(${arg.name}).g;`,
          '}',
        ];
      }
      return [`const ${tmp} = objtogen(${arg.name}).g;`];
    }
    case 'string': {
      const tmp = tmpName(arg.name);
      if (arg.default === 'null') {
        return [
          `let ${tmp}: string | null = null;`,
          `if (${arg.name} !== null) {`,
          `  ${tmp} = String(${arg.name});`,
          '}',
        ];
      }
      return [`const ${tmp} = String(${arg.name});`];
    }
    case 'variable': {
      const tmp = tmpName(arg.name);
      if (arg.optional) {
        return [
          `let ${tmp} = -1;`,
          `if (${arg.name} !== null) {`,
          `  ${tmp} = getVar(${arg.name});`,
          '}',
        ];
      }
      return [`const ${tmp} = getVar(${arg.name});`];
    }
    case 'unsigned-int':
      return [
        `if (!Number.isInteger(${arg.name}) || ${arg.name} < 0) {`,
        `  throw new RangeError(${quote(`${arg.name} must be a non-negative integer`)});`,
        '}',
      ];
    case 'precision':
      return precisionConversion(arg);
    case 'small-int':
    case 'instance-context':
      return [];
  }
}

function precisionConversion(arg: PrecisionArg): string[] {
  switch (arg.unit) {
    case 'words':
      return [`${arg.name} = precBitsToWords(${arg.name});`];
    case 'bits':
      return [`if (${arg.name} === 0) {`, `  ${arg.name} = defaultBitprec();`, '}'];
    case 'series':
      return [
        `if (${arg.name} < 0) {`,
        `  ${arg.name} = defaultSeriesPrecision();`,
        '}',
      ];
  }
}

/** Expression passed to the native call, or null when not passed at all. */
export function callFragment(arg: Argument): string | null {
  switch (arg.kind) {
    case 'native-value':
    case 'string':
    case 'variable':
      return tmpName(arg.name);
    case 'small-int':
    case 'unsigned-int':
    case 'precision':
      return arg.name;
    case 'instance-context':
      return null;
  }
}

/** Runtime warning for a parameter the help text does not name. */
export function deprecationFragment(
  arg: Argument,
  functionName: string,
): string[] {
  if (arg.kind === 'instance-context' || !arg.undocumented) return [];
  if (arg.kind === 'native-value' && arg.receiver) return [];

  const message = quote(
    `argument ${arg.position} of the PARI/GP function ${functionName} is undocumented and deprecated`,
  );
  const statement = `process.emitWarning(${message}, 'DeprecationWarning');`;
  const def = parameterDefault(arg);
  if (def === undefined) return [statement];
  return [`if (${arg.name} !== ${def}) {`, `  ${statement}`, '}'];
}
