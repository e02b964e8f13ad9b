import { describe, it, expect } from 'vitest';

import { instanceContextArg, parsePrototype } from '../prototype/parsePrototype.js';
import {
  callFragment,
  conversionStatements,
  declaredType,
  deprecationFragment,
  parameterFragment,
  tmpName,
} from './arguments.js';
import type { Argument } from './modelTypes.js';
import { quote } from './quote.js';
import {
  assignFragment,
  hostReturnType,
  returnDeclaredType,
  returnStatements,
} from './returns.js';

function argsOf(proto: string, help: string): Argument[] {
  return parsePrototype(proto, help).args;
}

describe('argument fragments', () => {
  it('uses this.g for the value-family receiver', () => {
    const [p] = argsOf('G', 'f(P): ...');
    if (!p) throw new Error('missing argument');
    expect(parameterFragment(p)).toBe(null);
    expect(conversionStatements(p)).toEqual(['const _P = this.g;']);
    expect(callFragment(p)).toBe('_P');
    expect(declaredType(p)).toBe('GEN');
  });

  it('coerces required and optional native values', () => {
    const [, x, y, z] = argsOf('GGDGD0,G,', 'f(a,x,{y},{z=0}): ...');
    if (!x || !y || !z) throw new Error('missing argument');

    expect(parameterFragment(x)).toBe('x: GenLike');
    expect(conversionStatements(x)).toEqual(['const _x = objtogen(x).g;']);

    expect(parameterFragment(y)).toBe('y: GenLike | null = null');
    expect(conversionStatements(y)).toEqual([
      'let _y: NativeHandle | null = null;',
      'if (y !== null) {',
      '  _y = objtogen(y).g;',
      '}',
    ]);

    expect(parameterFragment(z)).toBe('z: GenLike = 0');
    expect(conversionStatements(z)).toEqual(['const _z = objtogen(z).g;']);
  });

  it('passes small integers through', () => {
    const [, flag] = argsOf('GD0,L,', 'f(x,{flag=0}): ...');
    if (!flag) throw new Error('missing argument');
    expect(parameterFragment(flag)).toBe('flag: number = 0');
    expect(conversionStatements(flag)).toEqual([]);
    expect(callFragment(flag)).toBe('flag');
    expect(declaredType(flag)).toBe('long');
  });

  it('checks unsigned integers are non-negative', () => {
    const [n] = argsOf('U', 'f(n): ...');
    if (!n) throw new Error('missing argument');
    expect(parameterFragment(n)).toBe('n: number');
    expect(declaredType(n)).toBe('unsigned long');
    expect(conversionStatements(n)).toEqual([
      'if (!Number.isInteger(n) || n < 0) {',
      "  throw new RangeError('n must be a non-negative integer');",
      '}',
    ]);
    expect(callFragment(n)).toBe('n');
  });

  it('converts strings', () => {
    const [s, t] = argsOf('sDs', 'f(s,{t}): ...');
    if (!s || !t) throw new Error('missing argument');
    expect(declaredType(s)).toBe('const char *');
    expect(parameterFragment(s)).toBe('s: string');
    expect(conversionStatements(s)).toEqual(['const _s = String(s);']);
    expect(parameterFragment(t)).toBe('t: string | null = null');
    expect(conversionStatements(t)).toEqual([
      'let _t: string | null = null;',
      'if (t !== null) {',
      '  _t = String(t);',
      '}',
    ]);
    expect(callFragment(t)).toBe('_t');
  });

  it('resolves variables with a -1 sentinel', () => {
    const [v, w] = argsOf('nDn', 'f(v,{w}): ...');
    if (!v || !w) throw new Error('missing argument');
    expect(parameterFragment(v)).toBe('v: GenLike');
    expect(conversionStatements(v)).toEqual(['const _v = getVar(v);']);
    expect(parameterFragment(w)).toBe('w: GenLike | null = null');
    expect(conversionStatements(w)).toEqual([
      'let _w = -1;',
      'if (w !== null) {',
      '  _w = getVar(w);',
      '}',
    ]);
  });

  it('converts each precision unit', () => {
    const [p] = argsOf('p', '');
    const [b] = argsOf('b', '');
    const [s] = argsOf('P', '');
    if (!p || !b || !s) throw new Error('missing argument');

    expect(parameterFragment(p)).toBe('precision: number = 0');
    expect(conversionStatements(p)).toEqual(['precision = precBitsToWords(precision);']);
    expect(conversionStatements(b)).toEqual([
      'if (precision === 0) {',
      '  precision = defaultBitprec();',
      '}',
    ]);
    expect(parameterFragment(s)).toBe('serprec: number = -1');
    expect(conversionStatements(s)).toEqual([
      'if (serprec < 0) {',
      '  serprec = defaultSeriesPrecision();',
      '}',
    ]);
    expect(callFragment(s)).toBe('serprec');
  });

  it('leaves the instance context out of every fragment', () => {
    const ctx = instanceContextArg();
    expect(declaredType(ctx)).toBe(null);
    expect(parameterFragment(ctx)).toBe(null);
    expect(conversionStatements(ctx)).toEqual([]);
    expect(callFragment(ctx)).toBe(null);
    expect(deprecationFragment(ctx, 'f')).toEqual([]);
  });

  it('keeps every conversion local to its own argument', () => {
    const { args } = parsePrototype('GGUDGD0,L,DnDsp', 'f(pol,mat,count,{tech},{flag=0},{vx},{fmt}): ...', [
      instanceContextArg(),
    ]);
    const own = new Set(
      args.flatMap((a) => (a.kind === 'instance-context' ? [] : [a.name, tmpName(a.name)])),
    );

    for (const a of args) {
      if (a.kind === 'instance-context') continue;
      const text = conversionStatements(a).join('\n');
      const identifiers = new Set(text.match(/\b_?[A-Za-z]\w*\b/g) ?? []);
      for (const id of identifiers) {
        if (!own.has(id)) continue;
        expect([a.name, tmpName(a.name)]).toContain(id);
      }
      const fragment = parameterFragment(a);
      if (text !== '' && fragment !== null) {
        expect(fragment.startsWith(`${a.name}:`)).toBe(true);
        expect(text).toContain(a.name);
      }
    }

    const forward = args.flatMap(conversionStatements);
    const reversed = [...args].reverse().flatMap(conversionStatements);
    expect([...reversed].sort()).toEqual([...forward].sort());
  });
});

describe('deprecationFragment', () => {
  it('warns only for undocumented parameters', () => {
    const [x, arg2] = argsOf('GDG', 'f(x): ...');
    if (!x || !arg2) throw new Error('missing argument');
    expect(deprecationFragment(x, 'f')).toEqual([]);
    expect(deprecationFragment(arg2, 'f')).toEqual([
      'if (arg2 !== null) {',
      "  process.emitWarning('argument 2 of the PARI/GP function f is undocumented and deprecated', 'DeprecationWarning');",
      '}',
    ]);
  });

  it('warns unconditionally for a required undocumented parameter', () => {
    const [, arg2] = argsOf('GL', 'f(x): ...');
    if (!arg2) throw new Error('missing argument');
    expect(deprecationFragment(arg2, 'f')).toEqual([
      "process.emitWarning('argument 2 of the PARI/GP function f is undocumented and deprecated', 'DeprecationWarning');",
    ]);
  });

  it('numbers parameters the same way in both families', () => {
    const plain = parsePrototype('GDG', 'f(x): ...').args[1];
    const instance = parsePrototype('GDG', 'f(x): ...', [instanceContextArg()]).args[2];
    if (!plain || !instance) throw new Error('missing argument');
    expect(deprecationFragment(instance, 'f')).toEqual(deprecationFragment(plain, 'f'));
  });
});

describe('return fragments', () => {
  it('wraps handles', () => {
    const { ret } = parsePrototype('G', '');
    expect(returnDeclaredType(ret)).toBe('GEN');
    expect(hostReturnType(ret)).toBe('Gen');
    expect(assignFragment(ret, 'native.f(_x)')).toEqual(['const _ret = native.f(_x);']);
    expect(returnStatements(ret)).toEqual(['return newGen(_ret);']);
  });

  it('copies handles that point into their arguments', () => {
    const { ret } = parsePrototype('mG', '');
    expect(returnDeclaredType(ret)).toBe('GEN');
    expect(returnStatements(ret)).toEqual(['return newGen(gcopy(_ret));']);
  });

  it('returns small integers without touching the stack', () => {
    const { ret } = parsePrototype('lG', '');
    expect(returnDeclaredType(ret)).toBe('long');
    expect(hostReturnType(ret)).toBe('number');
    expect(assignFragment(ret, 'native.f(_x)')).toEqual(['const _ret = native.f(_x);']);
    expect(returnStatements(ret)).toEqual(['sigOff();', 'return _ret;']);
  });

  it('clears the stack after void calls', () => {
    const { ret } = parsePrototype('vG', '');
    expect(returnDeclaredType(ret)).toBe('void');
    expect(hostReturnType(ret)).toBe('void');
    expect(assignFragment(ret, 'native.f(_x)')).toEqual(['native.f(_x);']);
    expect(returnStatements(ret)).toEqual(['clearStack();']);
  });
});

describe('quote', () => {
  it('escapes quotes, backslashes and newlines', () => {
    expect(quote("it's")).toBe("'it\\'s'");
    expect(quote('a\\b')).toBe("'a\\\\b'");
    expect(quote('a\nb')).toBe("'a\\nb'");
  });
});
