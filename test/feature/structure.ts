import {Feature, Value} from '../../src/feature/structure';
import {nonnull} from '../../src/lib/base';
import {Test} from '../test';

const f = Feature.parse;

const show = (x: Value | null): string | null => (x ? Feature.stringify(x) : null);

const unified = (a: string, b: string): string | null => {
  const result = Feature.unify(f(a), f(b));
  return result && Feature.stringify(result.value);
};

const kSamples = [
  '[NUM=sg, PER=3]',
  '[A=?x, B=?x]',
  '[SEM=[BO={?b1+?b2}, CORE=<?vp(?subj)>]]',
  '[SEM=[BO={<bo(\\P.P(John),x1)>}, CORE=<x1>]]',
  '{a, b}',
  '?x',
  '<\\x.bark(x)>',
];

const structure: Test = {
  parsing_and_printing_agree: () => {
    Test.assert_eq(show(f('[SEM=[CORE=<\\x.bark(x)>, BO={/}], NUM=sg]')),
                   '[NUM=sg, SEM=[BO={/}, CORE=<\\x.bark(x)>]]');
    Test.assert_eq(show(f('[+AUX, -INV]')), '[AUX=+, INV=-]');
    Test.assert_eq(show(f('{?b1+?b2+<dog>}')), '{?b1+?b2+<dog>}');
    Test.assert_eq(show(f("[NAME='New York']")), '[NAME=New York]');
    Test.assert_eq(show(f('{a, b, a}')), '{a, b}');
  },
  invalid_structures_fail_to_parse: () => {
    Test.assert_error(() => f('[A=1, A=2]'), 'Duplicate feature: A');
    Test.assert_error(() => f('{a, b+c}'), "Set mixes ',' and '+'");
    Test.assert_error(() => f('[A=<\\x.>]'), 'Invalid term <\\x.>');
    Test.assert_error(() => f('[A=1'), 'Expected');
  },
  paths_are_dotted: () => {
    const value = f('[SEM=[BO={/}, CORE=<dog>]]');
    Test.assert_eq(show(Feature.get(value, 'SEM.CORE')), '<dog>');
    Test.assert_eq(show(Feature.get(value, 'SEM.BO')), '{/}');
    Test.assert_eq(Feature.get(value, 'SEM.CORE.X'), null);
    Test.assert_eq(Feature.get(value, 'NUM'), null);
  },
  variables_include_those_inside_terms: () => {
    const value = f('[SEM=[BO={?b1+?b2}, CORE=<?vp(?subj, @x, y)>]]');
    Test.assert_eq(Feature.variables(value), new Set(['b1', 'b2', 'subj', 'vp']));
  },
  atoms_unify_when_equal: () => {
    Test.assert_eq(unified('[NUM=sg]', '[NUM=sg]'), '[NUM=sg]');
    Test.assert_eq(unified('[NUM=sg]', '[NUM=pl]'), null);
    Test.assert_eq(unified('[NUM=sg]', '[PER=3]'), '[NUM=sg, PER=3]');
  },
  variables_bind_to_values: () => {
    const result = nonnull(Feature.unify(f('[NUM=?n, PER=3]'), f('[NUM=sg]')));
    Test.assert_eq(show(result.value), '[NUM=sg, PER=3]');
    Test.assert_eq(show(result.bindings.get('n') || null), 'sg');
    Test.assert_eq(unified('[A=?x, B=?x]', '[A=sg, B=pl]'), null);
    Test.assert_eq(unified('[A=?x, B=?x]', '[A=sg]'), '[A=sg, B=sg]');
  },
  unification_leaves_bindings_untouched_on_failure: () => {
    const bindings = new Map<string, Value>([['n', f('sg')]]);
    Test.assert_eq(Feature.unify(f('[A=?m, B=?n]'), f('[A=pl, B=pl]'), bindings), null);
    Test.assert_eq(Array.from(bindings.keys()), ['n']);
  },
  occurs_check_rejects_cycles: () => {
    Test.assert_eq(unified('?x', '[A=?x]'), null);
    Test.assert_eq(unified('[A=?x, B=?y]', '[A=[C=?y], B=[D=?x]]'), null);
  },
  sets_unify_by_merging: () => {
    Test.assert_eq(unified('{a, b}', '{b, c}'), '{a, b, c}');
    Test.assert_eq(unified('{/}', '{a}'), '{a}');
  },
  unions_flatten_once_resolved: () => {
    const a = '[B={?p+?q}, P=?p, Q=?q]';
    Test.assert_eq(unified(a, '[P={a}, Q={b, c}]'), '[B={a, b, c}, P={a}, Q={b, c}]');
    Test.assert_eq(unified(a, '[P={a}]'), '[B={{a}+?q}, P={a}, Q=?q]');
  },
  terms_unify_up_to_renaming: () => {
    Test.assert_eq(unified('<\\x.bark(x)>', '<\\y.bark(y)>'), '<\\x.bark(x)>');
    Test.assert_eq(unified('<\\x.bark(x)>', '<\\x.walk(x)>'), null);
  },
  feature_variables_in_terms_are_substituted: () => {
    Test.assert_eq(unified('[C=<?v(j)>, V=?v]', '[V=<\\x.run(x)>]'), '[C=<(\\x.run(x))(j)>, V=<\\x.run(x)>]');
    Test.assert_eq(unified('[C=<f(?a)>, A=?a]', '[A=sg]'), '[A=sg, C=<f(sg)>]');
  },
  terms_are_compared_after_every_binding: () => {
    Test.assert_eq(unified('[A=<?v(j)>, V=?v]', '[A=<run(j)>, V=<run>]'), '[A=<run(j)>, V=<run>]');
    Test.assert_eq(unified('[Z=<?v(j)>, V=?v]', '[Z=<run(j)>, V=<run>]'), '[V=<run>, Z=<run(j)>]');
    Test.assert_eq(unified('[A=<?v(j)>, V=?v]', '[A=<run(k)>, V=<run>]'), null);
  },
  unification_is_associative: () => {
    const [a, b, c] = ['[A=<?v(j)>]', '[V=?v, A=?t]', '[V=<run>]'].map(f);
    const ab = nonnull(Feature.unify(a, b));
    const left = nonnull(Feature.unify(ab.value, c, ab.bindings));
    const bc = nonnull(Feature.unify(b, c));
    const right = nonnull(Feature.unify(a, bc.value, bc.bindings));
    Test.assert_eq(show(left.value), '[A=<run(j)>, V=<run>]');
    Test.assert_eq(show(right.value), '[A=<run(j)>, V=<run>]');
  },
  canonical_form_ignores_names_and_order: () => {
    Test.assert_eq(Feature.canonical(f('{b, a}')), '{a, b}');
    Test.assert_eq(Feature.canonical(f('[A=?x, B=?y, C=?x]')), '[A=?#0, B=?#1, C=?#0]');
    Test.assert_eq(Feature.canonical(f('[A=?q, B=?p, C=?q]')), '[A=?#0, B=?#1, C=?#0]');
    Test.assert_eq(Feature.canonical(f('[A=<?v(j)>]')), '[A=<?#0(j)>]');
  },
  unification_is_idempotent: () => {
    for (const sample of kSamples) {
      const value = f(sample);
      const result = nonnull(Feature.unify(value, value));
      Test.assert_eq(Feature.equals(result.value, value), true);
    }
  },
  unification_is_commutative: () => {
    const pairs: [string, string][] = [
      ['[A=?x, B=sg]', '[A=?y, C=?y]'],
      ['[A=?x]', '[A=[B=?y, C=pl]]'],
      ['[NUM=sg]', '[NUM=pl]'],
      ['{a}', '{b}'],
      ['[S={?b1+?b2}, B1={a}]', '[B2={/}, B1=?b1, S=?s]'],
    ];
    for (const [a, b] of pairs) {
      const [x, y] = [Feature.unify(f(a), f(b)), Feature.unify(f(b), f(a))];
      Test.assert_eq(!!x, !!y);
      if (x && y) Test.assert_eq(Feature.equals(x.value, y.value), true);
    }
  },
  renaming_apart_avoids_used_names: () => {
    Test.assert_eq(show(Feature.rename(f('[A=?x, B=?y]'), new Set(['x']))), '[A=?x1, B=?y]');
    Test.assert_eq(show(Feature.rename(f('[A=?x, B=?x1]'), new Set(['x']))), '[A=?x2, B=?x1]');
    Test.assert_eq(show(Feature.rename(f('[A=<?v(j)>]'), new Set(['v']))), '[A=<?v1(j)>]');
  },
};

export {structure};
