// Fatal conditions raised by the engine. Expected outcomes - a failed
// unification or an empty parse forest - are plain return values instead.

class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// The grammar can't be loaded: a syntax error, a bad rule shape, a category
// that can never combine, or an unrecognized semantic feature path.
class MalformedGrammar extends EngineError {}

// Beta reduction ran past its step bound.
class NonTerminatingReduction extends EngineError {}

// A fresh variable was issued twice. Signals an engine bug, not bad input.
class CaptureHazard extends EngineError {}

// The chart grew past its edge bound.
class ChartOverflow extends EngineError {}

export {CaptureHazard, ChartOverflow, EngineError, MalformedGrammar, NonTerminatingReduction};
