import {inspect} from 'util';

type Option<T> = Some<T> | null;

interface Some<T> {
  some: T;
}

const assert = (condition: boolean, message?: () => string): void => {
  if (!condition) throw Error(message ? message() : undefined);
};

const debug = <T>(value: T): string =>
  inspect(value, {breakLength: Infinity, colors: false, depth: null});

const flatten = <T>(xss: T[][]): T[] => {
  const result: T[] = [];
  xss.forEach(xs => xs.forEach(x => result.push(x)));
  return result;
};

const nonnull = <T>(x: T | null | undefined, message?: () => string): T => {
  if (x === null || x === undefined) {
    throw Error(message ? message() : 'Unexpected null value!');
  }
  return x;
};

// Returns all orderings of the indices [0, n), in lexicographic order.
const permutations = (n: number): number[][] => {
  if (n === 0) return [[]];
  const result: number[][] = [];
  for (const rest of permutations(n - 1)) {
    for (let i = rest.length; i >= 0; i--) {
      result.push([...rest.slice(0, i), n - 1, ...rest.slice(i)]);
    }
  }
  return result.sort((a, b) => {
    for (let i = 0; i < a.length; i++) {
      if (a[i] !== b[i]) return a[i] - b[i];
    }
    return 0;
  });
};

const range = (n: number): number[] =>
  Array(n)
    .fill(false)
    .map((_, i) => i);

export {Option, assert, debug, flatten, nonnull, permutations, range};
