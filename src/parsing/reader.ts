import {Feature} from '../feature/structure';
import {Node, Parser} from '../lib/combinators';
import {MalformedGrammar} from '../lib/errors';
import {Category, Grammar, RawRule, Term} from './grammar';

// The textual grammar format is line-oriented. Each non-blank line is either
// a comment, a directive, or a rule with one or more alternatives:
//
//   % start S
//   # Determiners.
//   Det[SEM=[CORE=<\Q P.exists x.(Q(x) & P(x))>, BO={/}]] -> 'a'
//   N[SEM=[CORE=<dog>, BO={/}]] -> 'dog' | 'hound'

interface Options {
  start?: string;
}

type Line =
  | {type: 'blank'}
  | {type: 'directive'; name: string; value: string}
  | {type: 'rule'; lhs: Category; alternatives: Term[][]};

// prettier-ignore
const line: Node<Line> = (() => {
  const ws = Parser.regexp(/[ \t]*/);
  const w = (x: string) => Parser.string(x).skip(ws);
  const comment = Parser.regexp(/(?:#.*)?/);
  const name = Parser.regexp(/[A-Za-z_][A-Za-z0-9_]*/, 'category').skip(ws);

  const category = name.and(Feature.syntax.features.maybe()).skip(ws).map(
    ([x, features]) => Grammar.category(x, features ? features.some : undefined));
  const literal = Parser.any(
    Parser.regexp(/'[^']*'/, 'literal'),
    Parser.regexp(/"[^"]*"/, 'literal'),
  ).skip(ws).map(x => [Grammar.text(x.slice(1, -1))]);
  const categories = category.repeat(1).map(
    xs => xs.map((x): Term => ({type: 'category', category: x})));
  const alternative = literal.or(categories);

  const rule = category.skip(w('->')).and(alternative.repeat(1, w('|'))).map(
    ([lhs, alternatives]): Line => ({type: 'rule', lhs, alternatives}));
  const directive = w('%').then(name).and(Parser.regexp(/[^\s#]+/, 'value')).skip(ws).map(
    ([x, value]): Line => ({type: 'directive', name: x, value}));
  const blank = Parser.succeed<Line>({type: 'blank'});

  return ws.then(Parser.any(directive, rule, blank)).skip(comment);
})();

const parse_line = (text: string, index: number): Line => {
  try {
    return line.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : `${error}`;
    throw new MalformedGrammar(`Line ${index + 1}: ${message}`);
  }
};

const read = (text: string, options?: Options): Grammar => {
  const raws: RawRule[] = [];
  let start = options && options.start;
  text.split(/\r?\n/).forEach((x, i) => {
    const parsed = parse_line(x, i);
    if (parsed.type === 'directive') {
      if (parsed.name !== 'start') {
        throw new MalformedGrammar(`Line ${i + 1}: Unknown directive: %${parsed.name}`);
      }
      start = start || parsed.value;
    } else if (parsed.type === 'rule') {
      parsed.alternatives.forEach(rhs => raws.push({lhs: parsed.lhs, rhs}));
    }
  });
  return Grammar.load(raws, start);
};

const Reader = {read};

export {Options, Reader};
