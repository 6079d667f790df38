import {Bindings, Feature, Value} from '../feature/structure';
import {assert, nonnull} from '../lib/base';
import {Chart, Edge, kMaxEdges} from './chart';
import {Grammar, PhrasalRule} from './grammar';
import {VariableFactory, instantiate} from './instantiate';

// A bottom-up chart parser over feature-annotated rules. Spans are filled in
// order of increasing length, so every child of an edge is complete before
// the edge is attempted. Within a span, unary rules are closed over with a
// worklist.

interface Options {
  factory?: VariableFactory;
  max_edges?: number;
  trace?: boolean;
}

// Unifies the rule's right-hand templates with the children's features and
// returns the left-hand features, or null if any unification fails. Each
// child's variables are renamed apart from the rule's and from its earlier
// siblings', since distinct edges never share unification variables.
const combine = (rule: PhrasalRule, children: Edge[]): Value | null => {
  assert(children.length === rule.rhs.length, () => `Rule ${rule.index} takes ${rule.rhs.length} children`);
  const used = new Set<string>();
  [rule.lhs, ...rule.rhs].forEach(x => Feature.variables(x.features).forEach(y => used.add(y)));
  let bindings: Bindings = new Map();
  for (let i = 0; i < children.length; i++) {
    const child = Feature.rename(children[i].features, used);
    Feature.variables(child).forEach(x => used.add(x));
    const unified = Feature.unify(rule.rhs[i].features, child, bindings);
    if (!unified) return null;
    bindings = unified.bindings;
  }
  return Feature.substitute(rule.lhs.features, bindings);
};

// Every sequence of adjacent edges from `start` to `end` whose categories
// match rhs[i:]. Each edge is strictly shorter than the span.
const sequences = (chart: Chart, rhs: string[], i: number, start: number, end: number): Edge[][] => {
  const remaining = rhs.length - i;
  if (remaining === 0) return start === end ? [[]] : [];
  const result: Edge[][] = [];
  for (const edge of chart.starting(start)) {
    if (edge.category !== rhs[i] || edge.end > end - remaining + 1) continue;
    if (remaining === 1 && edge.end !== end) continue;
    for (const rest of sequences(chart, rhs, i + 1, edge.end, end)) {
      result.push([edge, ...rest]);
    }
  }
  return result;
};

const fill = (chart: Chart, grammar: Grammar, factory: VariableFactory, start: number, end: number): void => {
  const fresh = (x: Value) => instantiate(x, factory);
  const agenda: Edge[] = [];
  const push = (edge: Edge | null) => edge && agenda.push(edge);

  if (end - start === 1) {
    const token = chart.tokens[start];
    for (const rule of Grammar.lexical(grammar, token)) {
      const category = rule.lhs.name;
      push(chart.add({category, children: [], end, key: rule.lhs.features, rule, start, token}, fresh));
    }
  }
  for (const rule of grammar.phrasal) {
    if (rule.rhs.length < 2 || rule.rhs.length > end - start) continue;
    const rhs = rule.rhs.map(x => x.name);
    for (const children of sequences(chart, rhs, 0, start, end)) {
      const key = combine(rule, children);
      if (key) push(chart.add({category: rule.lhs.name, children, end, key, rule, start}, fresh));
    }
  }
  while (agenda.length > 0) {
    const child = nonnull(agenda.shift());
    for (const rule of grammar.phrasal) {
      if (rule.rhs.length !== 1 || rule.rhs[0].name !== child.category) continue;
      const key = combine(rule, [child]);
      if (key) push(chart.add({category: rule.lhs.name, children: [child], end, key, rule, start}, fresh));
    }
  }
};

const chart = (grammar: Grammar, tokens: string[], options?: Options): Chart => {
  const opts = options || {};
  const factory = opts.factory || new VariableFactory(grammar.reserved);
  const result = new Chart(tokens, opts.max_edges === undefined ? kMaxEdges : opts.max_edges, !!opts.trace);
  for (let length = 1; length <= tokens.length; length++) {
    for (let start = 0; start + length <= tokens.length; start++) {
      fill(result, grammar, factory, start, start + length);
    }
  }
  return result;
};

// Returns every complete parse of the start category, in chart order. An
// empty result means the tokens are ungrammatical.
const parse = (grammar: Grammar, tokens: string[], options?: Options): Edge[] =>
  chart(grammar, tokens, options).complete(grammar.start);

const Parser = {chart, parse};

export {Options, Parser};
