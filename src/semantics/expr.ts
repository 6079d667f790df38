import {Node, Parser} from '../lib/combinators';
import {NonTerminatingReduction} from '../lib/errors';

// Variables come in three kinds. Ordinary variables are bound by lambdas and
// quantifiers. Placeholders (@x) stand for a binding site that the chart
// instantiates with a fresh ordinary variable. Feature variables (?vp) refer
// to unification variables of the surrounding feature structure.

type Kind = 'feature' | 'ordinary' | 'placeholder';

interface Variable {
  kind: Kind;
  name: string;
}

type Binary = '&' | '|' | '->' | '<->' | '=' | '!=';

type Quantifier = 'all' | 'exists';

// Terms are immutable. An n-ary predicate application like feed(y,x) is a
// chain of unary applications: ((feed y) x).

type Expr =
  | {type: 'application'; fn: Expr; arg: Expr}
  | {type: 'binary'; op: Binary; left: Expr; right: Expr}
  | {type: 'constant'; name: string}
  | {type: 'lambda'; variable: Variable; body: Expr}
  | {type: 'negation'; base: Expr}
  | {type: 'quantifier'; quantifier: Quantifier; variable: Variable; body: Expr}
  | {type: 'variable'; variable: Variable};

interface Options {
  max_steps?: number;
  strategy?: 'applicative' | 'normal';
}

const kMaxSteps = 1000;

const kSigils: {[K in Kind]: string} = {feature: '?', ordinary: '', placeholder: '@'};

// Bare names that look like x, P, or z12 are variables; others are constants.
const kVariableName = /^[A-Za-z][0-9]*$/;

// Constructors.

const variable = (name: string, kind: Kind = 'ordinary'): Expr => ({
  type: 'variable',
  variable: {kind, name},
});

const constant = (name: string): Expr => ({type: 'constant', name});

const apply = (fn: Expr, ...args: Expr[]): Expr =>
  args.reduce<Expr>((acc, arg) => ({type: 'application', fn: acc, arg}), fn);

const lambda = (v: Variable, body: Expr): Expr => ({type: 'lambda', variable: v, body});

const show = (v: Variable): string => `${kSigils[v.kind]}${v.name}`;

// Free variables, in order of first occurrence.

const collect = (e: Expr, bound: string[], result: Map<string, Variable>): void => {
  switch (e.type) {
    case 'application':
      collect(e.fn, bound, result);
      return collect(e.arg, bound, result);
    case 'binary':
      collect(e.left, bound, result);
      return collect(e.right, bound, result);
    case 'constant':
      return;
    case 'lambda':
    case 'quantifier':
      return collect(e.body, bound.concat(show(e.variable)), result);
    case 'negation':
      return collect(e.base, bound, result);
    case 'variable': {
      const key = show(e.variable);
      if (!bound.includes(key) && !result.has(key)) result.set(key, e.variable);
      return;
    }
  }
};

const free_variables = (e: Expr): Variable[] => {
  const result = new Map<string, Variable>();
  collect(e, [], result);
  return Array.from(result.values());
};

const free_keys = (e: Expr): Set<string> => {
  const result = new Map<string, Variable>();
  collect(e, [], result);
  return new Set(result.keys());
};

// Every ordinary variable name used in the term, bound or free.
const names = (e: Expr, result: Set<string> = new Set()): Set<string> => {
  switch (e.type) {
    case 'application':
      names(e.fn, result);
      return names(e.arg, result);
    case 'binary':
      names(e.left, result);
      return names(e.right, result);
    case 'constant':
      return result;
    case 'lambda':
    case 'quantifier':
      if (e.variable.kind === 'ordinary') result.add(e.variable.name);
      return names(e.body, result);
    case 'negation':
      return names(e.base, result);
    case 'variable':
      if (e.variable.kind === 'ordinary') result.add(e.variable.name);
      return result;
  }
};

// Capture-avoiding substitution. All replacements happen simultaneously, and
// a binder that would capture a free variable of some replacement is renamed
// to the first of x1, x2, ... that is free in neither the body nor any
// replacement.

const fresh = (v: Variable, avoid: Set<string>): Variable => {
  const base = v.name.replace(/[0-9]+$/, '') || v.name;
  for (let i = 1; ; i++) {
    const candidate = {kind: v.kind, name: `${base}${i}`};
    if (!avoid.has(show(candidate))) return candidate;
  }
};

const substitute_all = (e: Expr, mapping: Map<string, Expr>): Expr => {
  if (mapping.size === 0) return e;
  switch (e.type) {
    case 'application': {
      const fn = substitute_all(e.fn, mapping);
      const arg = substitute_all(e.arg, mapping);
      return fn === e.fn && arg === e.arg ? e : {type: 'application', fn, arg};
    }
    case 'binary': {
      const left = substitute_all(e.left, mapping);
      const right = substitute_all(e.right, mapping);
      return left === e.left && right === e.right ? e : {...e, left, right};
    }
    case 'constant':
      return e;
    case 'lambda':
    case 'quantifier': {
      const name = show(e.variable);
      const body_free = free_keys(e.body);
      const active = new Map<string, Expr>();
      mapping.forEach((x, k) => k !== name && body_free.has(k) && active.set(k, x));
      if (active.size === 0) return e;
      const incoming = new Set<string>();
      active.forEach(x => free_keys(x).forEach(y => incoming.add(y)));
      if (!incoming.has(name)) return {...e, body: substitute_all(e.body, active)};
      const avoid = new Set([...incoming, ...body_free, ...active.keys()]);
      const renamed = fresh(e.variable, avoid);
      active.set(name, {type: 'variable', variable: renamed});
      return {...e, variable: renamed, body: substitute_all(e.body, active)};
    }
    case 'negation': {
      const base = substitute_all(e.base, mapping);
      return base === e.base ? e : {type: 'negation', base};
    }
    case 'variable':
      return mapping.get(show(e.variable)) || e;
  }
};

const substitute = (e: Expr, v: Variable, replacement: Expr): Expr =>
  substitute_all(e, new Map([[show(v), replacement]]));

// Beta reduction to normal form. Normal order reduces the head of each
// application before substituting its unreduced argument; applicative order
// normalizes the argument first. Both agree on every term that has a normal
// form and whose reduction is bounded, which includes everything built by
// non-recursive grammars.

interface State {
  max_steps: number;
  steps: number;
  strategy: 'applicative' | 'normal';
}

const normalize = (e: Expr, state: State): Expr => {
  switch (e.type) {
    case 'application': {
      const fn = normalize(e.fn, state);
      const arg = state.strategy === 'applicative' ? normalize(e.arg, state) : e.arg;
      if (fn.type !== 'lambda') {
        const result = state.strategy === 'applicative' ? arg : normalize(arg, state);
        return {type: 'application', fn, arg: result};
      }
      if (++state.steps > state.max_steps) {
        const message = `Beta reduction exceeded ${state.max_steps} steps`;
        throw new NonTerminatingReduction(message);
      }
      return normalize(substitute(fn.body, fn.variable, arg), state);
    }
    case 'binary':
      return {...e, left: normalize(e.left, state), right: normalize(e.right, state)};
    case 'constant':
      return e;
    case 'lambda':
    case 'quantifier':
      return {...e, body: normalize(e.body, state)};
    case 'negation':
      return {type: 'negation', base: normalize(e.base, state)};
    case 'variable':
      return e;
  }
};

const reduce = (e: Expr, options?: Options): Expr => {
  const max_steps = options && options.max_steps !== undefined ? options.max_steps : kMaxSteps;
  const strategy = (options && options.strategy) || 'normal';
  return normalize(e, {max_steps, steps: 0, strategy});
};

// Alpha-equivalence: bound variables are compared by binding position.

const alpha = (a: Expr, b: Expr, xs: string[], ys: string[]): boolean => {
  switch (a.type) {
    case 'application':
      if (b.type !== 'application') return false;
      return alpha(a.fn, b.fn, xs, ys) && alpha(a.arg, b.arg, xs, ys);
    case 'binary':
      if (b.type !== 'binary' || a.op !== b.op) return false;
      return alpha(a.left, b.left, xs, ys) && alpha(a.right, b.right, xs, ys);
    case 'constant':
      return b.type === 'constant' && a.name === b.name;
    case 'lambda':
      if (b.type !== 'lambda') return false;
      return alpha(a.body, b.body, [...xs, show(a.variable)], [...ys, show(b.variable)]);
    case 'negation':
      return b.type === 'negation' && alpha(a.base, b.base, xs, ys);
    case 'quantifier':
      if (b.type !== 'quantifier' || a.quantifier !== b.quantifier) return false;
      return alpha(a.body, b.body, [...xs, show(a.variable)], [...ys, show(b.variable)]);
    case 'variable': {
      if (b.type !== 'variable') return false;
      const [x, y] = [show(a.variable), show(b.variable)];
      const [i, j] = [xs.lastIndexOf(x), ys.lastIndexOf(y)];
      return i === j && (i >= 0 || x === y);
    }
  }
};

const equals = (a: Expr, b: Expr): boolean => alpha(a, b, [], []);

// Printing. Binary connectives are always parenthesized, and a binder on the
// left of a connective is wrapped so that its body doesn't swallow the rest.

const is_binder = (e: Expr): boolean =>
  e.type === 'lambda' ||
  e.type === 'quantifier' ||
  (e.type === 'negation' && is_binder(e.base));

const stringify = (e: Expr): string => {
  switch (e.type) {
    case 'application': {
      const args: Expr[] = [];
      let head: Expr = e;
      while (head.type === 'application') {
        args.unshift(head.arg);
        head = head.fn;
      }
      const atomic = head.type === 'constant' || head.type === 'variable';
      const fn = atomic ? stringify(head) : `(${stringify(head)})`;
      return `${fn}(${args.map(stringify).join(',')})`;
    }
    case 'binary': {
      const left = stringify(e.left);
      const guarded = is_binder(e.left) ? `(${left})` : left;
      return `(${guarded} ${e.op} ${stringify(e.right)})`;
    }
    case 'constant':
      return e.name;
    case 'lambda': {
      const vs = [e.variable];
      let body = e.body;
      while (body.type === 'lambda') {
        vs.push(body.variable);
        body = body.body;
      }
      return `\\${vs.map(show).join(' ')}.${stringify(body)}`;
    }
    case 'negation':
      return `-${stringify(e.base)}`;
    case 'quantifier':
      return `${e.quantifier} ${show(e.variable)}.${stringify(e.body)}`;
    case 'variable':
      return show(e.variable);
  }
};

// Parsing, from the notation produced by stringify. Lambdas and quantifiers
// extend as far to the right as possible. Precedence, tightest first:
// application, negation, = and !=, &, |, -> (right-associative), <->.

const to_variable = (x: string): Variable =>
  x[0] === '?'
    ? {kind: 'feature', name: x.slice(1)}
    : x[0] === '@'
    ? {kind: 'placeholder', name: x.slice(1)}
    : {kind: 'ordinary', name: x};

const binder = (kind: 'lambda' | Quantifier, v: Variable, body: Expr): Expr =>
  kind === 'lambda' ? lambda(v, body) : {type: 'quantifier', quantifier: kind, variable: v, body};

// prettier-ignore
const parser: Node<Expr> = (() => {
  const ws = Parser.regexp(/\s*/);
  const w = (x: string) => Parser.string(x).skip(ws);
  const name = Parser.regexp(/[A-Za-z0-9_]+/, 'name').skip(ws);
  const sigiled = Parser.regexp(/[?@][A-Za-z0-9_]+/, 'variable').skip(ws);
  const expr: Node<Expr> = Parser.lazy(() => iff);

  const bound = sigiled.or(name).map(to_variable);
  const keyword = Parser.regexp(/(?:exists|all)\b/, 'quantifier').skip(ws);
  const kind = w('\\').map((): 'lambda' | Quantifier => 'lambda').or(
    keyword.map((x): 'lambda' | Quantifier => (x === 'all' ? 'all' : 'exists')));
  const scope = kind.and(bound.repeat(1)).skip(w('.')).and(expr).map(
    ([[k, vs], body]) => vs.reduceRight((acc, v) => binder(k, v, acc), body));

  const atom = Parser.any(
    w('(').then(expr).skip(w(')')),
    sigiled.map((x): Expr => ({type: 'variable', variable: to_variable(x)})),
    name.map((x): Expr => (kVariableName.test(x) ? variable(x) : constant(x))),
  );
  const args = w('(').then(expr.repeat(1, w(','))).skip(w(')'));
  const application = atom.and(args.repeat()).map(
    ([head, calls]) => calls.reduce((acc, xs) => apply(acc, ...xs), head));

  const unary: Node<Expr> = Parser.any(
    w('-').then(Parser.lazy(() => unary)).map((base): Expr => ({type: 'negation', base})),
    scope,
    application,
  );

  const op = (ops: Binary[]) => Parser.any(...ops.map(x => w(x).map(() => x)));
  const left = (ops: Binary[], next: Node<Expr>) =>
    next.and(op(ops).and(next).repeat()).map(([first, rest]) => rest.reduce<Expr>(
      (acc, [x, right]) => ({type: 'binary', op: x, left: acc, right}), first));
  const right = (ops: Binary[], next: Node<Expr>) =>
    next.and(op(ops).and(next).repeat()).map(([first, rest]) => {
      const operands = [first, ...rest.map(x => x[1])];
      return rest.reduceRight<Expr>((acc, [x], i) =>
        ({type: 'binary', op: x, left: operands[i], right: acc}), operands[rest.length]);
    });

  const equality = left(['!=', '='], unary);
  const conjunction = left(['&'], equality);
  const disjunction = left(['|'], conjunction);
  const implication = right(['->'], disjunction);
  const iff: Node<Expr> = left(['<->'], implication);
  return ws.then(expr);
})();

const parse = (input: string): Expr => parser.parse(input);

const Expr = {
  apply,
  constant,
  equals,
  free_variables,
  lambda,
  names,
  parse,
  reduce,
  show,
  stringify,
  substitute,
  substitute_all,
  variable,
};

export {Binary, Expr, Kind, Options, Quantifier, Variable};
