type ArgumentBase = {
  /** Position in the full argument list, leading arguments included. */
  index: number;
  /** 1-based position among the function's own parameters. */
  position: number;
  /** Parameter name in the generated method. */
  name: string;
  /** No name for this argument in the help text. */
  undocumented: boolean;
};

/**
 * An opaque library value (`G`, `W`).
 *
 * `receiver` is set for the first argument of a plain parse: in the value
 * family that argument is `this`.
 */
export type NativeValueArg = ArgumentBase & {
  kind: 'native-value';
  receiver: boolean;
  /** `null` (absent handle) or a numeric literal. */
  default?: string;
};

export type SmallIntArg = ArgumentBase & {
  kind: 'small-int';
  default?: string;
};

export type UnsignedIntArg = ArgumentBase & {
  kind: 'unsigned-int';
  default?: string;
};

export type StringArg = ArgumentBase & {
  kind: 'string';
  /** `null` or a double-quoted literal. */
  default?: string;
};

export type VariableArg = ArgumentBase & {
  kind: 'variable';
  optional: boolean;
};

/** The implicit context object of the instance family. */
export type InstanceContextArg = {
  kind: 'instance-context';
  index: number;
};

export type PrecisionUnit = 'words' | 'bits' | 'series';

export type PrecisionArg = ArgumentBase & {
  kind: 'precision';
  unit: PrecisionUnit;
};

export type Argument =
  | NativeValueArg
  | SmallIntArg
  | UnsignedIntArg
  | StringArg
  | VariableArg
  | InstanceContextArg
  | PrecisionArg;

export type Return =
  | { kind: 'native-handle'; copy: boolean }
  | { kind: 'native-small-int'; ctype: 'int' | 'long' | 'unsigned long' }
  | { kind: 'native-void' };

export type CallSignature = {
  args: Argument[];
  ret: Return;
};
