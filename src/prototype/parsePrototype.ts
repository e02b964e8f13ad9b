import { UnsupportedPrototypeError } from '../errors.js';
import type {
  Argument,
  CallSignature,
  InstanceContextArg,
  PrecisionUnit,
} from '../model/modelTypes.js';
import { returnForCode } from '../model/returns.js';
import { helpParameterNames } from './helpNames.js';
import type { PrototypeToken, TokenKind } from './prototypeTypes.js';
import { tokenizePrototype } from './tokenizePrototype.js';

const INTEGER_RE = /^-?\d+$/;
const UNSIGNED_RE = /^\d+$/;
const STRING_LITERAL_RE = /^"(?:[^"\\]|\\.)*"$/;

export function instanceContextArg(): InstanceContextArg {
  return { kind: 'instance-context', index: 0 };
}

function unsupported(
  proto: string,
  token: PrototypeToken,
  reason: string,
): UnsupportedPrototypeError {
  return new UnsupportedPrototypeError(
    `${reason} (code ${JSON.stringify(token.code)} at offset ${token.offset} of ${JSON.stringify(proto)})`,
    { prototype: proto, offset: token.offset, code: token.code },
  );
}

function checkDefault(
  proto: string,
  token: PrototypeToken,
  literal: string,
  re: RegExp,
): string {
  if (!re.test(literal)) {
    throw unsupported(proto, token, `unsupported default ${JSON.stringify(literal)}`);
  }
  return literal;
}

function precisionUnit(kind: TokenKind): PrecisionUnit {
  if (kind === 'bit-precision') return 'bits';
  if (kind === 'series-precision') return 'series';
  return 'words';
}

/**
 * Parses a prototype string into the argument list and return kind of one
 * native function.
 *
 * `leadingArgs` are prepended unchanged; they shift `index` but not
 * `position`, so parameter names and warnings do not depend on them.
 *
 * An optional argument may precede a required one (`DGG`); callers pass
 * `null` in that position.
 */
export function parsePrototype(
  proto: string,
  help: string,
  leadingArgs: readonly InstanceContextArg[] = [],
): CallSignature {
  const { returnCode, tokens } = tokenizePrototype(proto);
  const ret = returnForCode(returnCode);

  const args: Argument[] = [...leadingArgs];
  const names = helpParameterNames(help);
  let nextName = 0;

  for (const token of tokens) {
    if (token.type === 'varargs') {
      throw unsupported(proto, token, 'varargs are not supported');
    }

    const index = args.length;
    const position = index - leadingArgs.length + 1;
    const takeName = () => {
      const name = names[nextName++];
      return name === undefined
        ? { name: `arg${position}`, undocumented: true }
        : { name, undocumented: false };
    };

    let arg: Argument;
    switch (token.kind) {
      case 'native-value': {
        const base = { kind: 'native-value' as const, index, position, ...takeName() };
        const receiver = index === 0;
        if (token.default === undefined) {
          arg = { ...base, receiver };
        } else if (token.default === '') {
          arg = { ...base, receiver, default: 'null' };
        } else {
          const def = checkDefault(proto, token, token.default, INTEGER_RE);
          arg = { ...base, receiver, default: def };
        }
        break;
      }
      case 'small-int':
      case 'unsigned-int': {
        const base = { kind: token.kind, index, position, ...takeName() };
        if (token.default === undefined) {
          arg = base;
        } else if (token.default === '') {
          arg = { ...base, default: '0' };
        } else {
          const re = token.kind === 'small-int' ? INTEGER_RE : UNSIGNED_RE;
          arg = { ...base, default: checkDefault(proto, token, token.default, re) };
        }
        break;
      }
      case 'string': {
        const base = { kind: 'string' as const, index, position, ...takeName() };
        if (token.default === undefined) {
          arg = base;
        } else if (token.default === '') {
          arg = { ...base, default: 'null' };
        } else {
          const def = checkDefault(proto, token, token.default, STRING_LITERAL_RE);
          arg = { ...base, default: def };
        }
        break;
      }
      case 'variable': {
        if (token.default !== undefined && token.default !== '') {
          throw unsupported(proto, token, 'variable arguments take no default value');
        }
        arg = {
          kind: 'variable',
          index,
          position,
          ...takeName(),
          optional: token.default !== undefined,
        };
        break;
      }
      case 'precision':
      case 'bit-precision':
      case 'series-precision': {
        if (token.default !== undefined && token.default !== '') {
          throw unsupported(proto, token, 'precision arguments take no default value');
        }
        const unit = precisionUnit(token.kind);
        arg = {
          kind: 'precision',
          index,
          position,
          name: unit === 'series' ? 'serprec' : 'precision',
          undocumented: false,
          unit,
        };
        break;
      }
      case 'unsupported':
        throw unsupported(proto, token, 'prototype code not supported');
    }

    args.push(arg);
  }

  return { args, ret };
}
