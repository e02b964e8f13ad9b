export type ReturnCode = '' | 'm' | 'i' | 'l' | 'u' | 'v';

export type TokenKind =
  | 'native-value'
  | 'small-int'
  | 'unsigned-int'
  | 'string'
  | 'variable'
  | 'precision'
  | 'bit-precision'
  | 'series-precision'
  | 'unsupported';

export type PrototypeToken =
  | {
      type: 'argument';
      kind: TokenKind;
      code: string;
      /** Offset of the code character in the prototype string. */
      offset: number;
      /** Present iff the token was preceded by the optional marker `D`. */
      default?: string;
    }
  | {
      type: 'varargs';
      code: string;
      offset: number;
      /** Everything after the `*`, unparsed. */
      rest: string;
    };

export type TokenizedPrototype = {
  returnCode: ReturnCode;
  tokens: PrototypeToken[];
};
