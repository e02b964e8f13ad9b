import { logWarn } from './logger.js';

export type ParibindWarningCode =
  | 'UNSUPPORTED_PROTOTYPE'
  | 'UNDOCUMENTED_PARAMETER';

export type ParibindWarning = {
  code: ParibindWarningCode;
  message: string;
  hint?: string;
};

/**
 * Emit a non-fatal generation warning.
 *
 * Only printed when debug logging is enabled.
 */
export function warn(w: ParibindWarning) {
  const hint = w.hint ? ` Hint: ${w.hint}` : '';
  logWarn(`warning(${w.code}): ${w.message}${hint}`);
}
