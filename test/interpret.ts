import {format, interpret} from '../src/interpret';
import {Fixtures} from './fixtures';
import {Test} from './test';

const interpretation: Test = {
  interpreting_a_sentence: () => {
    const result = interpret(Fixtures.bindop(), 'a dog barks.');
    Test.assert_eq(result.tokens, ['a', 'dog', 'barks']);
    Test.assert_eq(result.uncovered, []);
    Test.assert_eq(result.parses.length, 1);
    Test.assert_eq(format(result), 'a dog barks.\n  Parse 1:\n    exists x.(dog(x) & bark(x))');
  },
  unknown_words_are_reported: () => {
    const result = interpret(Fixtures.bindop(), 'A dog barks loudly');
    Test.assert_eq(result.uncovered, ['A', 'loudly']);
    Test.assert_eq(format(result), 'A dog barks loudly\n  Unknown words: A, loudly');
  },
  ungrammatical_sentences_are_reported: () => {
    const result = interpret(Fixtures.bindop(), 'dog a barks');
    Test.assert_eq(result.parses, []);
    Test.assert_eq(format(result), 'dog a barks\n  No parse.');
  },
  all_readings_are_formatted: () => {
    const options = {all: true, tree: true};
    const result = interpret(Fixtures.bindop(), 'a dog feeds a cat', options);
    Test.assert_eq(format(result, options).split('\n'), [
      'a dog feeds a cat',
      '  Parse 1:',
      '    S:',
      '      NP:',
      '        Det -> "a"',
      '        N -> "dog"',
      '      VP:',
      '        TV -> "feeds"',
      '        NP:',
      '          Det -> "a"',
      '          N -> "cat"',
      '    exists x.(dog(x) & exists x1.(dog(x1) & feed(x1,x)))',
      '    exists x.(dog(x) & exists x2.(dog(x2) & feed(x,x2)))',
    ]);
  },
};

export {interpretation};
