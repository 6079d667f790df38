import {Option} from './base';

// A tiny PEG-style parser combinator library. Each parser consumes a prefix
// of the input starting at an index and reports the furthest point at which
// it failed, so that errors can point at the offending column.

type Output<T> =
  | {stop: Stop; i: number; success: true; result: T}
  | {stop: Stop; i: number; success: false};

type Parse<T> = (input: string, index: number) => Output<T>;

type Stop = {expected: string[]; i: number};

// Parsing primitives, for matching by regex or by string.

const fail = <T>(stop: Stop): Output<T> => ({stop, i: stop.i, success: false});

const succeed = <T>(i: number, result: T, stop?: Stop): Output<T> => ({
  stop: stop || {expected: [], i},
  i,
  success: true,
  result,
});

const regexp = (re: RegExp, label?: string): Parse<string> => {
  const expected = [label || `${re}`];
  const sticky = new RegExp(re.source, `${re.flags.replace(/[gy]/g, '')}y`);
  return (input, i) => {
    sticky.lastIndex = i;
    const m = sticky.exec(input);
    return m ? succeed(i + m[0].length, m[0]) : fail({expected, i});
  };
};

const string = (st: string): Parse<string> => {
  const expected = [JSON.stringify(st)];
  return (input, i) => {
    const m = input.startsWith(st, i);
    return m ? succeed(i + st.length, st) : fail({expected, i});
  };
};

// Keeps the expectations of whichever branch got furthest into the input.
const update = (source: Stop, target: Stop | null): Stop => {
  if (!target || source.i > target.i) {
    return {expected: source.expected.slice(), i: source.i};
  }
  if (source.i < target.i) return target;
  return {expected: target.expected.concat(source.expected), i: target.i};
};

// Parser combinators, for combining primitives.

const pair = <A, B>(a: Parse<A>, b: Parse<B>): Parse<[A, B]> => (x, i) => {
  const first = a(x, i);
  if (!first.success) return fail(first.stop);
  const second = b(x, first.i);
  const stop = update(second.stop, first.stop);
  if (!second.success) return fail(stop);
  return succeed(second.i, [first.result, second.result], stop);
};

const choice = <T>(parsers: Parse<T>[]): Parse<T> => (x, i) => {
  let stop: Stop = {expected: [], i};
  for (const parser of parsers) {
    const output = parser(x, i);
    stop = update(output.stop, stop);
    if (output.success) return succeed(output.i, output.result, stop);
  }
  return fail(stop);
};

const map = <S, T>(parser: Parse<S>, fn: (s: S) => T): Parse<T> => (x, i) => {
  const output = parser(x, i);
  if (!output.success) return output;
  return succeed(output.i, fn(output.result), output.stop);
};

const repeat = <T>(parser: Parse<T>, min = 0): Parse<T[]> => (x, i) => {
  const result: T[] = [];
  while (true) {
    const output = parser(x, i);
    if (!output.success || output.i === i) {
      if (result.length < min) return fail(output.stop);
      return succeed(i, result, output.stop);
    }
    result.push(output.result);
    i = output.i;
  }
};

const sep = <S, T>(term: Parse<S>, sep: Parse<T>, min = 0): Parse<S[]> => {
  const tail = repeat(map(pair(sep, term), x => x[1]));
  const list: Parse<S[]> = (x, i) => {
    const head = term(x, i);
    if (!head.success) return min > 0 ? fail(head.stop) : succeed(i, [], head.stop);
    const rest = tail(x, head.i);
    if (!rest.success) return fail(rest.stop);
    const result = [head.result].concat(rest.result);
    if (result.length < min) return fail(rest.stop);
    return succeed(rest.i, result, update(rest.stop, head.stop));
  };
  return list;
};

// Error handling utilities.

const error = (input: string, index: number, expected: string[]): Error => {
  index = Math.max(Math.min(index, input.length), 0);
  const start = input.lastIndexOf('\n', index - 1) + 1;
  const maybe_end = input.indexOf('\n', start);
  const end = maybe_end < 0 ? input.length : maybe_end;
  const line = input.slice(0, index).split('\n').length;
  const column = index - start + 1;
  const highlight = input.substring(start, end);
  const terms = Array.from(new Set(expected)).sort();
  const where = input.includes('\n') ? `line ${line}, column ${column}` : `column ${column}`;
  const message = `
At ${where}: Expected: ${terms.join(' | ')}

  ${highlight}
  ${Array(column).join(' ')}^
  `.trim();
  return Error(message);
};

// Our public API. We create a Node class for ease of auto-completion.

class Node<T> {
  constructor(public _: Parse<T>) {}
  and<U>(next: Node<U>): Node<[T, U]> {
    return new Node(pair(this._, next._));
  }
  map<U>(fn: (t: T) => U): Node<U> {
    return new Node(map(this._, fn));
  }
  maybe(): Node<Option<T>> {
    const some = map(this._, (x): Option<T> => ({some: x}));
    const none: Parse<Option<T>> = (x, i) => succeed(i, null);
    return new Node(choice([some, none]));
  }
  or(alternate: Node<T>): Node<T> {
    return new Node(choice([this._, alternate._]));
  }
  parse(input: string): T {
    const output = this._(input, 0);
    if (output.success && output.i === input.length) return output.result;
    const {expected, i} = output.stop;
    const eof = output.success && output.i >= i ? ['end of input'] : [];
    const index = output.success ? Math.max(output.i, i) : i;
    throw error(input, index, (index === i ? expected : []).concat(eof));
  }
  repeat<U>(min = 0, separator?: Node<U>): Node<T[]> {
    if (separator) return new Node(sep(this._, separator._, min));
    return new Node(repeat(this._, min));
  }
  skip<U>(next: Node<U>): Node<T> {
    return new Node(map(pair(this._, next._), x => x[0]));
  }
  then<U>(next: Node<U>): Node<U> {
    return new Node(map(pair(this._, next._), x => x[1]));
  }
}

const Parser = {
  any: <T>(...parsers: Node<T>[]) => new Node(choice(parsers.map(x => x._))),
  lazy: <T>(fn: () => Node<T>) => new Node<T>((x, i) => fn()._(x, i)),
  regexp: (re: RegExp, label?: string) => new Node(regexp(re, label)),
  string: (st: string) => new Node(string(st)),
  succeed: <T>(result: T) => new Node<T>((x, i) => succeed(i, result)),
};

export {Node, Parser};
