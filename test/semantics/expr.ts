import {NonTerminatingReduction} from '../../src/lib/errors';
import {Expr, Variable} from '../../src/semantics/expr';
import {Test} from '../test';

const e = Expr.parse;

const show = (x: Expr): string => Expr.stringify(x);

const ordinary = (name: string): Variable => ({kind: 'ordinary', name});

const expr: Test = {
  parsing_and_printing_agree: () => {
    const cases = [
      '\\x y.feed(y,x)',
      'exists x.(dog(x) & bark(x))',
      'all x.(man(x) -> mortal(x))',
      '-(p & q)',
      '(\\x.f(x))(a)',
      'bo(\\P.P(John),@x)',
      '?vp(?subj)',
      '((exists x.p(x)) & q)',
      '(x = y)',
    ];
    cases.forEach(x => Test.assert_eq(show(Expr.parse(x)), x));
  },
  predicates_are_curried: () => {
    const curried = Expr.apply(Expr.apply(Expr.constant('feed'), Expr.variable('y')), Expr.variable('x'));
    Test.assert_eq(e('feed(y,x)'), curried);
    Test.assert_eq(e('feed(y)(x)'), curried);
  },
  names_distinguish_variables_from_constants: () => {
    Test.assert_eq(e('x'), Expr.variable('x'));
    Test.assert_eq(e('z12'), Expr.variable('z12'));
    Test.assert_eq(e('John'), Expr.constant('John'));
    Test.assert_eq(e('@x'), Expr.variable('x', 'placeholder'));
    Test.assert_eq(e('?subj'), Expr.variable('subj', 'feature'));
  },
  implication_is_right_associative: () => {
    Test.assert_eq(show(e('p -> q -> r')), '(p -> (q -> r))');
    Test.assert_eq(show(e('p & q | r')), '((p & q) | r)');
  },
  binders_extend_to_the_right: () => {
    Test.assert_eq(show(e('\\x.p(x) & q(x)')), '\\x.(p(x) & q(x))');
  },
  invalid_terms_fail_to_parse: () => {
    Test.assert_error(() => Expr.parse('exists .p'), 'Expected');
    Test.assert_error(() => Expr.parse('f(x'), 'Expected');
  },
  free_variables_are_listed_in_order: () => {
    Test.assert_eq(Expr.free_variables(e('\\x.love(x,y,?z,@w)')), [
      {kind: 'ordinary', name: 'y'},
      {kind: 'feature', name: 'z'},
      {kind: 'placeholder', name: 'w'},
    ]);
  },
  names_include_bound_variables: () => {
    Test.assert_eq(Expr.names(e('\\Q P.exists x.(Q(x) & P(y, @z))')), new Set(['P', 'Q', 'x', 'y']));
  },
  alpha_equivalent_terms_are_equal: () => {
    Test.assert_eq(Expr.equals(e('\\x.love(x,z)'), e('\\y.love(y,z)')), true);
    Test.assert_eq(Expr.equals(e('\\x.love(x,z)'), e('\\z.love(z,z)')), false);
    Test.assert_eq(Expr.equals(e('exists x.p(x)'), e('all x.p(x)')), false);
  },
  substitution_renames_capturing_binders: () => {
    const y = ordinary('y');
    Test.assert_eq(show(Expr.substitute(e('exists x.love(x,y)'), y, e('x'))), 'exists x1.love(x1,x)');
    Test.assert_eq(show(Expr.substitute(e('exists x.love(x,y,x1)'), y, e('x'))), 'exists x2.love(x2,x,x1)');
    Test.assert_eq(show(Expr.substitute(e('exists x.love(x,y)'), y, e('z'))), 'exists x.love(x,z)');
  },
  substitution_skips_shadowed_variables: () => {
    const x = ordinary('x');
    Test.assert_eq(show(Expr.substitute(e('p(x) & \\x.q(x)'), x, e('John'))), '(p(John) & \\x.q(x))');
  },
  substitution_is_simultaneous: () => {
    const mapping = new Map([['x', e('y')], ['y', e('x')]]);
    Test.assert_eq(show(Expr.substitute_all(e('love(x,y)'), mapping)), 'love(y,x)');
  },
  reduction_applies_lambdas: () => {
    Test.assert_eq(show(Expr.reduce(e('(\\x.bark(x))(John)'))), 'bark(John)');
    Test.assert_eq(show(Expr.reduce(e('(\\x y.feed(y,x))(Rex,John)'))), 'feed(John,Rex)');
  },
  reduction_avoids_capture: () => {
    Test.assert_eq(show(Expr.reduce(e('(\\y.\\x.feed(x,y))(x)'))), '\\x1.feed(x1,x)');
  },
  reduction_order_does_not_change_the_normal_form: () => {
    const cases = [
      e('(\\Q P.exists x.(Q(x) & P(x)))(dog)(\\x1.(\\x y.feed(y,x))(x2)(x1))'),
      e('(\\P.P(John))(\\x.(\\y.chase(y,x))(x))'),
      e('(\\f.f(f(a)))(\\z.g(z))'),
    ];
    for (const x of cases) {
      const normal = Expr.reduce(x, {strategy: 'normal'});
      const applicative = Expr.reduce(x, {strategy: 'applicative'});
      Test.assert_eq(Expr.equals(normal, applicative), true);
    }
    Test.assert_eq(show(Expr.reduce(cases[0])), 'exists x.(dog(x) & feed(x,x2))');
    Test.assert_eq(show(Expr.reduce(cases[1])), 'chase(John,John)');
    Test.assert_eq(show(Expr.reduce(cases[2])), 'g(g(a))');
  },
  reduction_is_bounded: () => {
    const omega = e('(\\x.x(x))(\\x.x(x))');
    Test.assert_error(() => Expr.reduce(omega, {max_steps: 50}), 'Beta reduction exceeded 50 steps');
    Test.assert_error(() => Expr.reduce(e('(\\x.x)(a)'), {max_steps: 0}), 'Beta reduction exceeded 0 steps');
    Test.assert_eq(show(Expr.reduce(e('f(a)'), {max_steps: 0})), 'f(a)');
    try {
      Expr.reduce(omega, {max_steps: 10});
    } catch (error) {
      Test.assert_eq(error instanceof NonTerminatingReduction, true);
    }
  },
};

export {expr};
