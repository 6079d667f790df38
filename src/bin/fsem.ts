#!/usr/bin/env node
import {Command} from 'commander';
import * as fs from 'fs';

import {format, interpret} from '../interpret';
import {Reader} from '../parsing/reader';

type Flags = {
  all?: boolean;
  grammar: string;
  input?: string;
  maxEdges?: number;
  maxSteps?: number;
  start?: string;
  trace?: boolean;
  tree?: boolean;
};

const integer = (x: string): number => {
  const result = parseInt(x, 10);
  if (!(result > 0)) throw Error(`Expected a positive integer, got: ${x}`);
  return result;
};

const readEntireStream = (stream: NodeJS.ReadableStream): Promise<string> => {
  const data: string[] = [];
  stream.setEncoding('utf8');
  stream.on('data', (x: string) => data.push(x));
  return new Promise((resolve, reject) => {
    stream.on('end', () => resolve(data.join('')));
    stream.on('error', reject);
  });
};

const program = new Command()
  .name('fsem')
  .version('0.1.0')
  .description('Parse sentences with a feature grammar and print their logical forms')
  .requiredOption('-g, --grammar <filename>', 'Read the grammar from <filename>')
  .option('-i, --input <filename>', 'Read sentences, one per line, from <filename>')
  .option('-s, --start <category>', 'Override the start category')
  .option('-a, --all', 'Print every binding operator ordering')
  .option('-t, --tree', 'Print the derivation tree of each parse')
  .option('--trace', 'Log every edge added to the chart')
  .option('--max-steps <n>', 'Bound on beta reduction steps', integer)
  .option('--max-edges <n>', 'Bound on chart size', integer)
  .arguments('[sentence...]')
  .parse(process.argv);

const main = async (flags: Flags, args: string[]): Promise<void> => {
  const grammar = Reader.read(fs.readFileSync(flags.grammar, 'utf8'), {start: flags.start});
  const source =
    args.length > 0
      ? args.join('\n')
      : await readEntireStream(flags.input ? fs.createReadStream(flags.input) : process.stdin);
  const sentences = source.split('\n').map(x => x.trim()).filter(x => x.length > 0);
  const options = {
    all: flags.all,
    max_edges: flags.maxEdges,
    max_steps: flags.maxSteps,
    trace: flags.trace,
    tree: flags.tree,
  };
  // tslint:disable-next-line:no-console
  sentences.forEach(x => console.log(format(interpret(grammar, x, options), options)));
};

main(program.opts<Flags>(), program.args).catch((error: unknown) => {
  // tslint:disable-next-line:no-console
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
