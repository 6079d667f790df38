import {Value} from '../feature/structure';
import {CaptureHazard} from '../lib/errors';
import {Expr, Variable} from '../semantics/expr';

// Mints fresh ordinary variables for placeholders. One counter is shared by
// every name, so x1, y2, x3 may be issued in that order. Names that the
// grammar itself uses are never issued.

class VariableFactory {
  private counter = 0;
  private issued = new Set<string>();
  constructor(private reserved: Set<string> = new Set()) {}

  fresh(base: string): Variable {
    let name = `${base}${++this.counter}`;
    while (this.reserved.has(name)) name = `${base}${++this.counter}`;
    if (this.issued.has(name)) {
      throw new CaptureHazard(`Variable ${name} was issued twice`);
    }
    this.issued.add(name);
    return {kind: 'ordinary', name};
  }

  size(): number {
    return this.issued.size;
  }
}

// Placeholders in terms, collected in order of first occurrence.

const placeholders = (value: Value, result: Set<string>): void => {
  switch (value.type) {
    case 'set':
    case 'union':
      return value.items.forEach(x => placeholders(x, result));
    case 'struct':
      return value.features.forEach(x => placeholders(x, result));
    case 'term':
      for (const v of Expr.free_variables(value.expr)) {
        if (v.kind === 'placeholder') result.add(v.name);
      }
      return;
    default:
      return;
  }
};

const replace = (value: Value, mapping: Map<string, Expr>): Value => {
  switch (value.type) {
    case 'set':
    case 'union':
      return {type: value.type, items: value.items.map(x => replace(x, mapping))};
    case 'struct': {
      const features = new Map<string, Value>();
      value.features.forEach((x, k) => features.set(k, replace(x, mapping)));
      return {type: 'struct', features};
    }
    case 'term':
      return {type: 'term', expr: Expr.substitute_all(value.expr, mapping)};
    default:
      return value;
  }
};

// Replaces every placeholder @name in the structure with one fresh variable,
// the same variable for every occurrence of that placeholder.
const instantiate = (value: Value, factory: VariableFactory): Value => {
  const names = new Set<string>();
  placeholders(value, names);
  if (names.size === 0) return value;
  const mapping = new Map<string, Expr>();
  for (const name of names) {
    const base = name.replace(/[0-9]+$/, '') || name;
    const v = factory.fresh(base);
    mapping.set(Expr.show({kind: 'placeholder', name}), Expr.variable(v.name));
  }
  return replace(value, mapping);
};

export {VariableFactory, instantiate};
