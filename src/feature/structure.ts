import {flatten} from '../lib/base';
import {Node, Parser} from '../lib/combinators';
import {Expr} from '../semantics/expr';

// A feature structure value. Structs map feature names to values, and paths
// through nested structs are written with dots: SEM.CORE. Sets collapse
// duplicates and ignore order. A union {?a+?b} is a set whose parts are
// not yet known; once every part is resolved, it flattens into a set.

type Value =
  | {type: 'atom'; value: string}
  | {type: 'set'; items: Value[]}
  | {type: 'struct'; features: Map<string, Value>}
  | {type: 'term'; expr: Expr}
  | {type: 'union'; items: Value[]}
  | {type: 'variable'; name: string};

type Bindings = Map<string, Value>;

interface Unified {
  bindings: Bindings;
  value: Value;
}

// Constructors.

const atom = (value: string): Value => ({type: 'atom', value});

const set = (items: Value[]): Value => ({type: 'set', items: dedupe(items)});

const struct = (features: {[name: string]: Value}): Value => {
  const keys = Object.keys(features).sort();
  return {type: 'struct', features: new Map(keys.map(x => [x, features[x]]))};
};

const term = (expr: Expr | string): Value => ({
  type: 'term',
  expr: typeof expr === 'string' ? Expr.parse(expr) : expr,
});

const union = (items: Value[]): Value => ({type: 'union', items});

const variable = (name: string): Value => ({type: 'variable', name});

// Equality and printing. Terms compare up to renaming of bound variables.

const equals = (a: Value, b: Value): boolean => {
  switch (a.type) {
    case 'atom':
      return b.type === 'atom' && a.value === b.value;
    case 'set':
    case 'union': {
      if (b.type !== a.type) return false;
      const contains = (xs: Value[], y: Value) => xs.some(x => equals(x, y));
      return a.items.every(x => contains(b.items, x)) && b.items.every(x => contains(a.items, x));
    }
    case 'struct': {
      if (b.type !== 'struct' || a.features.size !== b.features.size) return false;
      for (const [key, x] of a.features) {
        const y = b.features.get(key);
        if (!y || !equals(x, y)) return false;
      }
      return true;
    }
    case 'term':
      return b.type === 'term' && Expr.equals(a.expr, b.expr);
    case 'variable':
      return b.type === 'variable' && a.name === b.name;
  }
};

const dedupe = (items: Value[]): Value[] => {
  const result: Value[] = [];
  items.forEach(x => result.some(y => equals(x, y)) || result.push(x));
  return result;
};

const print = (value: Value, sorted: boolean): string => {
  const recurse = (x: Value) => print(x, sorted);
  switch (value.type) {
    case 'atom':
      return value.value;
    case 'set': {
      if (value.items.length === 0) return '{/}';
      const items = value.items.map(recurse);
      return `{${(sorted ? items.sort() : items).join(', ')}}`;
    }
    case 'struct': {
      const pairs = Array.from(value.features).map(([k, x]) => `${k}=${recurse(x)}`);
      return `[${pairs.sort().join(', ')}]`;
    }
    case 'term':
      return `<${Expr.stringify(value.expr)}>`;
    case 'union':
      return `{${value.items.map(recurse).join('+')}}`;
    case 'variable':
      return `?${value.name}`;
  }
};

const stringify = (value: Value): string => print(value, false);

// Path access, for reading SEM.CORE and friends.

const get = (value: Value, path: string): Value | null => {
  let current: Value | null = value;
  for (const name of path.split('.')) {
    if (!current || current.type !== 'struct') return null;
    current = current.features.get(name) || null;
  }
  return current;
};

// Variables, including feature variables that appear inside terms.

const collect = (value: Value, result: Set<string>): void => {
  switch (value.type) {
    case 'atom':
      return;
    case 'set':
    case 'union':
      return value.items.forEach(x => collect(x, result));
    case 'struct':
      return value.features.forEach(x => collect(x, result));
    case 'term':
      Expr.free_variables(value.expr).forEach(x => x.kind === 'feature' && result.add(x.name));
      return;
    case 'variable':
      result.add(value.name);
      return;
  }
};

const variables = (value: Value): Set<string> => {
  const result = new Set<string>();
  collect(value, result);
  return result;
};

// Substitution replaces bound variables with their values everywhere, and
// flattens any union whose parts are all resolved.

const substitute_expr = (expr: Expr, bindings: Bindings): Expr => {
  const mapping = new Map<string, Expr>();
  for (const v of Expr.free_variables(expr)) {
    if (v.kind !== 'feature' || !bindings.has(v.name)) continue;
    const value = substitute(variable(v.name), bindings);
    if (value.type === 'term') mapping.set(Expr.show(v), value.expr);
    if (value.type === 'atom') mapping.set(Expr.show(v), Expr.constant(value.value));
    if (value.type === 'variable') mapping.set(Expr.show(v), Expr.variable(value.name, 'feature'));
  }
  return Expr.substitute_all(expr, mapping);
};

const substitute = (value: Value, bindings: Bindings): Value => {
  switch (value.type) {
    case 'atom':
      return value;
    case 'set':
      return set(value.items.map(x => substitute(x, bindings)));
    case 'struct': {
      const features = new Map<string, Value>();
      value.features.forEach((x, k) => features.set(k, substitute(x, bindings)));
      return {type: 'struct', features};
    }
    case 'term':
      return {type: 'term', expr: substitute_expr(value.expr, bindings)};
    case 'union': {
      const items = value.items.map(x => substitute(x, bindings));
      if (items.some(x => x.type === 'variable' || x.type === 'union')) return union(items);
      return set(flatten(items.map(x => (x.type === 'set' ? x.items : [x]))));
    }
    case 'variable': {
      const bound = bindings.get(value.name);
      return bound ? substitute(bound, bindings) : value;
    }
  }
};

// Unification. On failure we return null and leave the caller's bindings
// untouched: all work happens on a copy.

const resolve = (value: Value, bindings: Bindings): Value => {
  while (value.type === 'variable') {
    const bound = bindings.get(value.name);
    if (!bound) break;
    value = bound;
  }
  return value;
};

const occurs = (name: string, value: Value, bindings: Bindings): boolean => {
  const resolved = resolve(value, bindings);
  if (resolved.type === 'variable') return resolved.name === name;
  const names = variables(resolved);
  if (names.has(name)) return true;
  return Array.from(names).some(x => bindings.has(x) && occurs(name, variable(x), bindings));
};

const bind = (name: string, value: Value, bindings: Bindings): Value | null => {
  if (occurs(name, value, bindings)) return null;
  bindings.set(name, value);
  return value;
};

// Term pairs are compared only once every other feature has been unified,
// since a later feature may bind a variable that occurs inside a term.
type Deferred = [Expr, Expr][];

const unify_values = (a: Value, b: Value, bindings: Bindings, deferred: Deferred): Value | null => {
  a = resolve(a, bindings);
  b = resolve(b, bindings);
  if (a.type === 'variable' && b.type === 'variable') {
    if (a.name === b.name) return a;
    // Bind in a canonical direction, so that unification commutes.
    const [x, y] = a.name < b.name ? [a, b] : [b, a];
    bindings.set(y.name, x);
    return x;
  }
  if (a.type === 'variable') return bind(a.name, b, bindings);
  if (b.type === 'variable') return bind(b.name, a, bindings);
  if (a.type === 'union' || b.type === 'union') {
    const [x, y] = [substitute(a, bindings), substitute(b, bindings)];
    if (x.type === 'union' || y.type === 'union') return equals(x, y) ? x : null;
    return unify_values(x, y, bindings, deferred);
  }
  switch (a.type) {
    case 'atom':
      return b.type === 'atom' && a.value === b.value ? a : null;
    case 'set':
      return b.type === 'set' ? set([...a.items, ...b.items]) : null;
    case 'struct': {
      if (b.type !== 'struct') return null;
      const keys = new Set([...a.features.keys(), ...b.features.keys()]);
      const features = new Map<string, Value>();
      for (const key of Array.from(keys).sort()) {
        const [x, y] = [a.features.get(key), b.features.get(key)];
        const value = x && y ? unify_values(x, y, bindings, deferred) : x || y;
        if (!value) return null;
        features.set(key, value);
      }
      return {type: 'struct', features};
    }
    case 'term': {
      if (b.type !== 'term') return null;
      deferred.push([a.expr, b.expr]);
      return a;
    }
  }
};

const unify = (a: Value, b: Value, bindings?: Bindings): Unified | null => {
  const copy: Bindings = new Map(bindings || []);
  const deferred: Deferred = [];
  const value = unify_values(a, b, copy, deferred);
  if (!value) return null;
  for (const [x, y] of deferred) {
    if (!Expr.equals(substitute_expr(x, copy), substitute_expr(y, copy))) return null;
  }
  return {bindings: copy, value: substitute(value, copy)};
};

// Renames variables that appear in `used` apart, to ?name1, ?name2, ...

const rename = (value: Value, used: Set<string>): Value => {
  const own = variables(value);
  const taken = new Set([...used, ...own]);
  const bindings: Bindings = new Map();
  for (const name of own) {
    if (!used.has(name)) continue;
    const base = name.replace(/[0-9]+$/, '') || name;
    let i = 1;
    while (taken.has(`${base}${i}`)) i++;
    taken.add(`${base}${i}`);
    bindings.set(name, variable(`${base}${i}`));
  }
  return bindings.size === 0 ? value : substitute(value, bindings);
};

// A rendering that is equal for values that differ only in the names of
// their variables or the order of their set members. Variables become ?#0,
// ?#1, ... in order of first appearance; source names never contain '#'.
const canonical = (value: Value): string => {
  const bindings: Bindings = new Map();
  for (const match of print(value, true).match(/\?[A-Za-z0-9_]+/g) || []) {
    const name = match.slice(1);
    if (!bindings.has(name)) bindings.set(name, variable(`#${bindings.size}`));
  }
  return print(substitute(value, bindings), true);
};

// Parsers for the bracketed feature notation:
//
//   [SEM=[CORE=<\x.bark(x)>, BO={/}], NUM=?n, +AUX]

// prettier-ignore
const syntax = (() => {
  const ws = Parser.regexp(/\s*/);
  const w = (x: string) => Parser.string(x).skip(ws);
  const name = Parser.regexp(/[A-Za-z_][A-Za-z0-9_]*/, 'feature name').skip(ws);
  const value: Node<Value> = Parser.lazy(() => any);

  const atomic = Parser.any(
    Parser.regexp(/[A-Za-z0-9_][A-Za-z0-9_.'-]*/, 'atom'),
    Parser.regexp(/'[^']*'/, 'string').map(x => x.slice(1, -1)),
    Parser.regexp(/"[^"]*"/, 'string').map(x => x.slice(1, -1)),
    Parser.regexp(/[+-](?![A-Za-z_])/, 'atom'),
  ).skip(ws).map(atom);
  const expr = Parser.regexp(/<(?:<->|->|[^<>])*>/, 'term').skip(ws).map(x => {
    try {
      return term(x.slice(1, -1));
    } catch (error) {
      throw Error(`Invalid term ${x}: ${error instanceof Error ? error.message : error}`);
    }
  });
  const unbound = Parser.regexp(/\?[A-Za-z_][A-Za-z0-9_]*/, 'variable').skip(ws).map(
    x => variable(x.slice(1)));

  const separator = w(',').or(w('+'));
  const members = value.and(separator.and(value).repeat()).map(([first, rest]) => {
    const items = [first, ...rest.map(x => x[1])];
    const kinds = new Set(rest.map(x => x[0]));
    if (kinds.size > 1) throw Error(`Set mixes ',' and '+': ${items.map(stringify)}`);
    return kinds.has('+') ? union(items) : set(items);
  });
  const collection = w('{').then(w('/').map(() => set([])).or(members)).skip(w('}'));

  const feature = Parser.any(
    name.skip(w('=')).and(value),
    w('+').then(name).map((x): [string, Value] => [x, atom('+')]),
    w('-').then(name).map((x): [string, Value] => [x, atom('-')]),
  );
  const features = w('[').then(feature.repeat(0, w(','))).skip(w(']')).map(xs => {
    const result: {[name: string]: Value} = {};
    for (const [key, x] of xs) {
      if (key in result) throw Error(`Duplicate feature: ${key}`);
      result[key] = x;
    }
    return struct(result);
  });

  const any: Node<Value> = Parser.any(features, collection, expr, unbound, atomic);
  return {features, value};
})();

const parse = (input: string): Value => syntax.value.parse(input.trim());

const Feature = {
  atom,
  canonical,
  equals,
  get,
  parse,
  rename,
  set,
  stringify,
  struct,
  substitute,
  syntax,
  term,
  unify,
  union,
  variable,
  variables,
};

export {Bindings, Feature, Unified, Value};
