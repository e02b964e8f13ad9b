import { UnsupportedPrototypeError } from '../errors.js';
import type {
  PrototypeToken,
  ReturnCode,
  TokenKind,
  TokenizedPrototype,
} from './prototypeTypes.js';

const RETURN_CODES: ReadonlySet<string> = new Set(['m', 'i', 'l', 'u', 'v']);

const ARGUMENT_CODES: Readonly<Record<string, TokenKind>> = {
  G: 'native-value',
  W: 'native-value',
  L: 'small-int',
  U: 'unsigned-int',
  r: 'string',
  s: 'string',
  n: 'variable',
  p: 'precision',
  b: 'bit-precision',
  P: 'series-precision',

  // Known to the catalog grammar, not translated yet.
  '&': 'unsupported',
  V: 'unsupported',
  I: 'unsupported',
  E: 'unsupported',
  J: 'unsupported',
  C: 'unsupported',
  M: 'unsupported',
  '=': 'unsupported',
};

const OPTIONAL_MARKER = 'D';
const VARARGS_MARKER = '*';

function isReturnCode(c: string): c is Exclude<ReturnCode, ''> {
  return RETURN_CODES.has(c);
}

export function isArgumentCode(c: string): boolean {
  return Object.prototype.hasOwnProperty.call(ARGUMENT_CODES, c);
}

/**
 * Splits a prototype string into its return code and argument tokens.
 *
 * The return code is the first character when it is one of `m i l u v`;
 * otherwise the function returns a native handle.
 */
export function tokenizePrototype(proto: string): TokenizedPrototype {
  let n = 0;
  let returnCode: ReturnCode = '';
  const first = proto.charAt(0);
  if (isReturnCode(first)) {
    returnCode = first;
    n = 1;
  }

  const tokens: PrototypeToken[] = [];
  while (n < proto.length) {
    let c = proto.charAt(n);
    let offset = n;
    n++;

    if (c === ',') continue;

    let defaultLiteral: string | undefined;
    if (c === OPTIONAL_MARKER) {
      if (n >= proto.length) {
        throw new UnsupportedPrototypeError(
          `optional marker at end of prototype ${JSON.stringify(proto)}`,
          { prototype: proto, offset },
        );
      }
      defaultLiteral = '';
      if (!isArgumentCode(proto.charAt(n))) {
        const end = proto.indexOf(',', n);
        if (end === -1) {
          throw new UnsupportedPrototypeError(
            `unterminated default value in prototype ${JSON.stringify(proto)}`,
            { prototype: proto, offset },
          );
        }
        defaultLiteral = proto.slice(n, end);
        n = end + 1;
      }
      if (n >= proto.length) {
        throw new UnsupportedPrototypeError(
          `default value without argument code in prototype ${JSON.stringify(proto)}`,
          { prototype: proto, offset },
        );
      }
      c = proto.charAt(n);
      offset = n;
      n++;
    }

    const kind = ARGUMENT_CODES[c];
    if (kind === undefined) {
      throw new UnsupportedPrototypeError(
        `unknown prototype code ${JSON.stringify(c)} in ${JSON.stringify(proto)}`,
        { prototype: proto, offset, code: c },
      );
    }

    if (proto.charAt(n) === VARARGS_MARKER) {
      tokens.push({ type: 'varargs', code: c, offset, rest: proto.slice(n + 1) });
      break;
    }

    tokens.push(
      defaultLiteral === undefined
        ? { type: 'argument', kind, code: c, offset }
        : { type: 'argument', kind, code: c, offset, default: defaultLiteral },
    );
  }

  return { returnCode, tokens };
}
