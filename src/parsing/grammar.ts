import {Feature, Value} from '../feature/structure';
import {MalformedGrammar} from '../lib/errors';
import {Expr} from '../semantics/expr';

// A category is a symbol plus a feature structure, which is always a struct.

interface Category {
  features: Value;
  name: string;
}

// The right-hand side of a rule, before loading, is a list of terms: either
// categories or literal token text. A loaded rule is either phrasal (all
// categories) or lexical (exactly one token).

type Term = {type: 'category'; category: Category} | {type: 'text'; value: string};

interface RawRule {
  lhs: Category;
  rhs: Term[];
}

interface LexicalRule {
  index: number;
  lhs: Category;
  token: string;
  type: 'lexical';
}

interface PhrasalRule {
  index: number;
  lhs: Category;
  rhs: Category[];
  type: 'phrasal';
}

type Rule = LexicalRule | PhrasalRule;

interface Grammar {
  by_lhs: Map<string, Rule[]>;
  lexicon: Map<string, LexicalRule[]>;
  phrasal: PhrasalRule[];
  reserved: Set<string>;
  rules: Rule[];
  start: string;
}

// Semantic features live under a fixed set of paths. Everything else in a
// category's struct is treated as an ordinary syntactic feature.

const kSemantics = 'SEM';
const kCore = 'CORE';
const kStore = 'BO';

// Helpers for building rules by hand.

const category = (name: string, features?: Value | string): Category => ({
  features:
    features === undefined
      ? Feature.struct({})
      : typeof features === 'string'
      ? Feature.parse(features)
      : features,
  name,
});

const text = (value: string): Term => ({type: 'text', value});

const print_category = (x: Category): string => {
  const empty = x.features.type === 'struct' && x.features.features.size === 0;
  return empty ? x.name : `${x.name}${Feature.stringify(x.features)}`;
};

const print_rule = (rule: Rule): string => {
  const rhs =
    rule.type === 'lexical'
      ? JSON.stringify(rule.token)
      : rule.rhs.map(print_category).join(' ');
  return `${print_category(rule.lhs)} -> ${rhs}`;
};

// Validation of a single rule's shape and semantic feature paths.

const check_semantics = (x: Category, where: string): void => {
  const fail = (message: string) => {
    throw new MalformedGrammar(`${where}: ${message}`);
  };
  if (x.features.type !== 'struct') fail(`${x.name} must carry a feature struct`);
  const sem = Feature.get(x.features, kSemantics);
  if (!sem || sem.type === 'variable') return;
  if (sem.type !== 'struct') return fail(`${kSemantics} must be a struct or a variable`);
  for (const key of sem.features.keys()) {
    if (key !== kCore && key !== kStore) fail(`Unknown feature path: ${kSemantics}.${key}`);
  }
  const core = sem.features.get(kCore);
  if (core && core.type !== 'term' && core.type !== 'variable') {
    fail(`${kSemantics}.${kCore} must be a term or a variable`);
  }
  const store = sem.features.get(kStore);
  if (!store || store.type === 'variable') return;
  if (store.type !== 'set' && store.type !== 'union') {
    return fail(`${kSemantics}.${kStore} must be a set or a variable`);
  }
  for (const item of store.items) {
    if (store.type === 'union' && item.type === 'set') continue;
    if (item.type !== 'term' && item.type !== 'variable') {
      fail(`${kSemantics}.${kStore} members must be terms or variables`);
    }
  }
};

const check_rule = (raw: RawRule, index: number): Rule => {
  const where = `Rule ${index + 1} (${raw.lhs.name})`;
  const categories: Category[] = [];
  const tokens: string[] = [];
  raw.rhs.forEach(x => (x.type === 'category' ? categories.push(x.category) : tokens.push(x.value)));
  if (raw.rhs.length === 0) {
    throw new MalformedGrammar(`${where}: Empty right-hand side`);
  } else if (tokens.length > 0 && (categories.length > 0 || tokens.length > 1)) {
    throw new MalformedGrammar(`${where}: A lexical rule must have exactly one token`);
  }
  [raw.lhs, ...categories].forEach(x => check_semantics(x, where));
  if (tokens.length > 0) {
    return {index, lhs: raw.lhs, token: tokens[0], type: 'lexical'};
  }
  return {index, lhs: raw.lhs, rhs: categories, type: 'phrasal'};
};

// Checks reachability. If a category is LHS- or RHS-only, it's a typo.
const check_categories = (rules: Rule[], start: string): void => {
  const lhs = new Set<string>(rules.map(x => x.lhs.name));
  if (!lhs.has(start)) {
    throw new MalformedGrammar(`No rules for start category: ${start}`);
  }
  const dead_end = new Set<string>();
  rules.forEach(x => x.type === 'phrasal' && x.rhs.forEach(
    y => lhs.has(y.name) || dead_end.add(y.name)));
  if (dead_end.size > 0) {
    const names = Array.from(dead_end).sort().join(', ');
    throw new MalformedGrammar(`Found dead-end categories: ${names}`);
  }
  const reachable = new Set([start]);
  let last_size = -1;
  while (reachable.size > last_size) {
    last_size = reachable.size;
    rules.forEach(x => {
      if (x.type === 'phrasal' && reachable.has(x.lhs.name)) {
        x.rhs.forEach(y => reachable.add(y.name));
      }
    });
  }
  const unreachable = Array.from(lhs).filter(x => !reachable.has(x));
  if (unreachable.length > 0) {
    const names = unreachable.sort().join(', ');
    throw new MalformedGrammar(`Found unreachable categories: ${names}`);
  }
};

// Names of every ordinary variable that the grammar's terms mention. Fresh
// variables minted during a parse avoid these.
const collect_names = (value: Value, result: Set<string>): void => {
  switch (value.type) {
    case 'set':
    case 'union':
      return value.items.forEach(x => collect_names(x, result));
    case 'struct':
      return value.features.forEach(x => collect_names(x, result));
    case 'term':
      Expr.names(value.expr, result);
      return;
    default:
      return;
  }
};

// Our public interface.

const load = (raws: RawRule[], start?: string): Grammar => {
  if (raws.length === 0) throw new MalformedGrammar('Grammar has no rules');
  const rules = raws.map(check_rule);
  const root = start || rules[0].lhs.name;
  check_categories(rules, root);

  const by_lhs = new Map<string, Rule[]>();
  const lexicon = new Map<string, LexicalRule[]>();
  const phrasal: PhrasalRule[] = [];
  const reserved = new Set<string>();
  for (const rule of rules) {
    by_lhs.set(rule.lhs.name, (by_lhs.get(rule.lhs.name) || []).concat([rule]));
    if (rule.type === 'lexical') {
      lexicon.set(rule.token, (lexicon.get(rule.token) || []).concat([rule]));
    } else {
      phrasal.push(rule);
    }
    const categories = rule.type === 'lexical' ? [rule.lhs] : [rule.lhs, ...rule.rhs];
    categories.forEach(x => collect_names(x.features, reserved));
  }
  return {by_lhs, lexicon, phrasal, reserved, rules, start: root};
};

const lexical = (grammar: Grammar, token: string): LexicalRule[] =>
  grammar.lexicon.get(token) || [];

const rules_for = (grammar: Grammar, name: string): Rule[] =>
  grammar.by_lhs.get(name) || [];

const uncovered = (grammar: Grammar, tokens: string[]): string[] =>
  Array.from(new Set(tokens.filter(x => !grammar.lexicon.has(x))));

const Grammar = {
  category,
  lexical,
  load,
  print_category,
  print_rule,
  rules_for,
  text,
  uncovered,
};

export {Category, Grammar, LexicalRule, PhrasalRule, Rule, RawRule, Term};
