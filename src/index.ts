export {Feature} from './feature/structure';
export type {Bindings, Unified, Value} from './feature/structure';
export {format, interpret} from './interpret';
export type {Interpretation, Options as InterpretOptions, Parse} from './interpret';
export {CaptureHazard, ChartOverflow, EngineError, MalformedGrammar, NonTerminatingReduction} from './lib/errors';
export {Chart} from './parsing/chart';
export type {Edge} from './parsing/chart';
export {Derivation} from './parsing/derivation';
export {Grammar} from './parsing/grammar';
export type {Category, LexicalRule, PhrasalRule, Rule, RawRule, Term} from './parsing/grammar';
export {VariableFactory, instantiate} from './parsing/instantiate';
export {Lexer} from './parsing/lexer';
export type {Token} from './parsing/lexer';
export {Parser} from './parsing/parser';
export type {Options as ParserOptions} from './parsing/parser';
export {Reader} from './parsing/reader';
export {Composer} from './semantics/composer';
export type {Operator, Reading, Semantics} from './semantics/composer';
export {Expr} from './semantics/expr';
export type {Variable} from './semantics/expr';
