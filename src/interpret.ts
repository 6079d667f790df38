import {Edge} from './parsing/chart';
import {Derivation} from './parsing/derivation';
import {Grammar} from './parsing/grammar';
import {VariableFactory} from './parsing/instantiate';
import {Lexer} from './parsing/lexer';
import {Parser} from './parsing/parser';
import {Composer, Reading} from './semantics/composer';
import {Expr} from './semantics/expr';

// The full pipeline: tokenize a sentence, parse it, and compose the
// semantics of every complete parse.

interface Options {
  all?: boolean;
  max_edges?: number;
  max_steps?: number;
  trace?: boolean;
  tree?: boolean;
}

interface Parse {
  edge: Edge;
  readings: Reading[];
}

interface Interpretation {
  parses: Parse[];
  sentence: string;
  tokens: string[];
  uncovered: string[];
}

const interpret = (grammar: Grammar, sentence: string, options?: Options): Interpretation => {
  const opts = options || {};
  const tokens = Lexer.tokenize(sentence);
  const uncovered = Grammar.uncovered(grammar, tokens);
  if (uncovered.length > 0) return {parses: [], sentence, tokens, uncovered};
  const factory = new VariableFactory(grammar.reserved);
  const {max_edges, trace} = opts;
  const edges = Parser.parse(grammar, tokens, {factory, max_edges, trace});
  const parses = edges.map(edge => {
    const readings = Composer.readings(edge.features, {all: opts.all, max_steps: opts.max_steps});
    return {edge, readings};
  });
  return {parses, sentence, tokens, uncovered};
};

const format = (interpretation: Interpretation, options?: Options): string => {
  const {parses, sentence, uncovered} = interpretation;
  const lines = [`${sentence}`];
  if (uncovered.length > 0) {
    lines.push(`  Unknown words: ${uncovered.join(', ')}`);
  } else if (parses.length === 0) {
    lines.push('  No parse.');
  }
  parses.forEach((x, i) => {
    lines.push(`  Parse ${i + 1}:`);
    if (options && options.tree) {
      Derivation.print(x.edge, {}, 2)
        .split('\n')
        .forEach(y => lines.push(y));
    }
    x.readings.forEach(y => lines.push(`    ${Expr.stringify(y.expr)}`));
  });
  return lines.join('\n');
};

export {Interpretation, Options, Parse, format, interpret};
