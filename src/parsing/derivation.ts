import {Feature} from '../feature/structure';
import {flatten} from '../lib/base';
import {Edge} from './chart';

// Renders a complete edge as the tree of rules that built it. With `features`
// set, each category is printed with its instantiated feature structure.

interface Options {
  features?: boolean;
}

const leaves = (x: Edge): string[] =>
  x.token !== undefined ? [x.token] : flatten(x.children.map(leaves));

const print = (x: Edge, options?: Options, depth?: number): string => {
  const padding = Array(depth || 0)
    .fill('  ')
    .join('');
  const features = options && options.features ? Feature.stringify(x.features) : '';
  const lhs = `${padding}${x.category}${features}`;
  if (x.token !== undefined) return `${lhs} -> ${JSON.stringify(x.token)}`;
  const lines = [`${lhs}:`];
  x.children.forEach(y => lines.push(print(y, options, (depth || 0) + 1)));
  return lines.join('\n');
};

const Derivation = {leaves, print};

export {Derivation, Options};
