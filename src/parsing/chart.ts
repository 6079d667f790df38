import {Feature, Value} from '../feature/structure';
import {assert, range} from '../lib/base';
import {ChartOverflow} from '../lib/errors';
import {Rule} from './grammar';

// A complete edge: a category spanning tokens [start, end) with its unified,
// instantiated features. Lexical edges carry their token; phrasal edges
// carry their children in order. Edges are never mutated once added.

interface Edge {
  category: string;
  children: Edge[];
  end: number;
  features: Value;
  id: number;
  rule: Rule;
  start: number;
  token?: string;
}

// An edge that has not been added yet. `key` holds its features before
// instantiation. Edges with the same span, category and canonical key are
// one edge, whatever their children.
interface Candidate {
  category: string;
  children: Edge[];
  end: number;
  key: Value;
  rule: Rule;
  start: number;
  token?: string;
}

const kMaxEdges = 10000;

class Chart {
  edges: Edge[] = [];
  private keys = new Set<string>();
  private starts: Edge[][];
  constructor(public tokens: string[], private max_edges = kMaxEdges, private trace = false) {
    this.starts = range(tokens.length).map(() => []);
  }

  // Returns null if an equal edge is already in the chart. `instantiate` is
  // only called for edges that are new.
  add(candidate: Candidate, instantiate: (x: Value) => Value): Edge | null {
    const {category, children, end, start} = candidate;
    assert(0 <= start && start < end && end <= this.tokens.length, () => `Bad span: [${start}, ${end})`);
    const key = `${start}:${end}:${category}:${Feature.canonical(candidate.key)}`;
    if (this.keys.has(key)) return null;
    if (this.edges.length >= this.max_edges) {
      throw new ChartOverflow(`Chart exceeded ${this.max_edges} edges`);
    }
    this.keys.add(key);
    const features = instantiate(candidate.key);
    const edge: Edge = {category, children, end, features, id: this.edges.length, rule: candidate.rule, start};
    if (candidate.token !== undefined) edge.token = candidate.token;
    this.edges.push(edge);
    this.starts[start].push(edge);
    // tslint:disable-next-line:no-console
    if (this.trace) console.log(this.print(edge));
    return edge;
  }

  complete(category: string): Edge[] {
    const n = this.tokens.length;
    return this.edges.filter(x => x.start === 0 && x.end === n && x.category === category);
  }

  span(start: number, end: number): Edge[] {
    return (this.starts[start] || []).filter(x => x.end === end);
  }

  starting(start: number): Edge[] {
    return this.starts[start] || [];
  }

  // One line per edge: a bar showing the span, then the category.
  print(edge: Edge): string {
    const cells = range(this.tokens.length).map(i =>
      i >= edge.start && i < edge.end ? '===' : ' . ');
    const label = `${edge.category}${Feature.stringify(edge.features)}`;
    const source = edge.token !== undefined ? ` <- ${JSON.stringify(edge.token)}` : '';
    return `|${cells.join('')}| ${label}${source}`;
  }
}

export {Candidate, Chart, Edge, kMaxEdges};
