import {Feature, Value} from '../feature/structure';
import {permutations, range} from '../lib/base';
import {MalformedGrammar} from '../lib/errors';
import {Expr, Variable} from './expr';

// Turns the SEM feature of a complete parse into logical forms. The CORE
// term is the meaning with every quantified noun phrase replaced by a
// variable; each member of the BO store is a binding operator bo(expr, x)
// that scopes expr over that variable. Applying one gives expr(\x.core).

interface Options {
  all?: boolean;
  max_steps?: number;
}

interface Operator {
  expr: Expr;
  variable: Variable;
}

interface Reading {
  expr: Expr;
  order: number[];
}

interface Semantics {
  core: Expr;
  store: Operator[];
}

const kOperator = 'bo';

const operator = (value: Value): Operator => {
  const fail = (): never => {
    throw new MalformedGrammar(`Invalid binding operator: ${Feature.stringify(value)}`);
  };
  if (value.type !== 'term') return fail();
  const e = value.expr;
  if (e.type !== 'application' || e.arg.type !== 'variable') return fail();
  const head = e.fn;
  if (head.type !== 'application' || head.fn.type !== 'constant' || head.fn.name !== kOperator) {
    return fail();
  }
  return {expr: head.arg, variable: e.arg.variable};
};

const extract = (features: Value): Semantics => {
  const core = Feature.get(features, 'SEM.CORE');
  if (!core || core.type !== 'term') {
    const actual = core ? Feature.stringify(core) : 'nothing';
    throw new MalformedGrammar(`SEM.CORE must be a term, got ${actual}`);
  }
  const store = Feature.get(features, 'SEM.BO');
  if (store && store.type !== 'set') {
    throw new MalformedGrammar(`SEM.BO must be a set, got ${Feature.stringify(store)}`);
  }
  return {core: core.expr, store: store ? store.items.map(operator) : []};
};

// Applies the operators in the given order: the first one applied ends up
// innermost, with the narrowest scope.
const retrieve = (core: Expr, store: Operator[], order: number[], options?: Options): Expr => {
  const reduce = (x: Expr) => Expr.reduce(x, {max_steps: options && options.max_steps});
  return order.reduce((acc, i) => {
    const {expr, variable} = store[i];
    return reduce(Expr.apply(expr, Expr.lambda(variable, acc)));
  }, reduce(core));
};

const readings = (features: Value, options?: Options): Reading[] => {
  const {core, store} = extract(features);
  const all = !!(options && options.all);
  const orders = all ? permutations(store.length) : [range(store.length)];
  return orders.map(order => ({expr: retrieve(core, store, order, options), order}));
};

const Composer = {extract, readings, retrieve};

export {Composer, Operator, Options, Reading, Semantics};
