const PAREN_RE = /[(](.*)[)]/;
const ARGNAME_RE = /^[ {]*&?([A-Za-z_][A-Za-z0-9_]*)/;

// Identifiers that cannot name a parameter in the generated TypeScript.
const RESERVED = new Set([
  'arguments', 'await', 'break', 'case', 'catch', 'class', 'const',
  'continue', 'debugger', 'default', 'delete', 'do', 'else', 'enum', 'eval',
  'export', 'extends', 'false', 'finally', 'for', 'function', 'if',
  'implements', 'import', 'in', 'instanceof', 'interface', 'let', 'new',
  'null', 'package', 'private', 'protected', 'public', 'return', 'static',
  'super', 'switch', 'this', 'throw', 'true', 'try', 'typeof', 'var', 'void',
  'while', 'with', 'yield',
]);

export function safeParameterName(name: string): string {
  return RESERVED.has(name) ? `${name}_` : name;
}

/**
 * Parameter names declared by a help string such as
 * `bnfinit(P,{flag=0},{tech=[]}): ...`.
 */
export function helpParameterNames(help: string): string[] {
  const m = PAREN_RE.exec(help);
  if (!m) return [];
  const names: string[] = [];
  for (const piece of (m[1] ?? '').split(',')) {
    const name = ARGNAME_RE.exec(piece)?.[1];
    if (name !== undefined) names.push(safeParameterName(name));
  }
  return names;
}
