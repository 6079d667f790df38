import * as moo from 'moo';

// Splits a raw sentence into word tokens. Whitespace separates words, and
// each punctuation mark is a token of its own. Words keep their case, since
// grammar literals are matched exactly.

interface Token {
  range: [number, number];
  text: string;
  type: 'punctuation' | 'word';
}

const kLexer = moo.compile({
  space: {match: /\s+/, lineBreaks: true},
  punctuation: /[.,;:!?()"]/,
  word: /[^\s.,;:!?()"]+/,
});

const lex = (input: string): Token[] => {
  const result: Token[] = [];
  kLexer.reset(input);
  for (let token = kLexer.next(); token; token = kLexer.next()) {
    const type = token.type === 'word' ? 'word' : token.type === 'punctuation' ? 'punctuation' : null;
    if (!type) continue;
    const range: [number, number] = [token.offset, token.offset + token.text.length];
    result.push({range, text: token.text, type});
  }
  return result;
};

const tokenize = (input: string): string[] =>
  lex(input)
    .filter(x => x.type === 'word')
    .map(x => x.text);

const Lexer = {lex, tokenize};

export {Lexer, Token};
