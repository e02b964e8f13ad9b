import type { Return } from './modelTypes.js';
import type { ReturnCode } from '../prototype/prototypeTypes.js';

export function returnForCode(code: ReturnCode): Return {
  switch (code) {
    case '':
      return { kind: 'native-handle', copy: false };
    case 'm':
      return { kind: 'native-handle', copy: true };
    case 'i':
      return { kind: 'native-small-int', ctype: 'int' };
    case 'l':
      return { kind: 'native-small-int', ctype: 'long' };
    case 'u':
      return { kind: 'native-small-int', ctype: 'unsigned long' };
    case 'v':
      return { kind: 'native-void' };
  }
}

export function returnDeclaredType(ret: Return): string {
  switch (ret.kind) {
    case 'native-handle':
      return 'GEN';
    case 'native-small-int':
      return ret.ctype;
    case 'native-void':
      return 'void';
  }
}

export function hostReturnType(ret: Return): string {
  switch (ret.kind) {
    case 'native-handle':
      return 'Gen';
    case 'native-small-int':
      return 'number';
    case 'native-void':
      return 'void';
  }
}

/**
 * Statement capturing the result of `callExpr`.
 *
 * Emitted right after `sigOn()`; nothing may come between the two.
 */
export function assignFragment(ret: Return, callExpr: string): string[] {
  switch (ret.kind) {
    case 'native-handle':
    case 'native-small-int':
      return [`const _ret = ${callExpr};`];
    case 'native-void':
      return [`${callExpr};`];
  }
}

/**
 * Statements ending the method: wrap a handle (which also leaves the
 * critical section), close the section for plain integers, or clear the
 * stack after a void call.
 */
export function returnStatements(ret: Return): string[] {
  switch (ret.kind) {
    case 'native-handle':
      return [ret.copy ? 'return newGen(gcopy(_ret));' : 'return newGen(_ret);'];
    case 'native-small-int':
      return ['sigOff();', 'return _ret;'];
    case 'native-void':
      return ['clearStack();'];
  }
}
