/**
 * Lambda calculus reduction: parsing, capture-avoiding substitution,
 * normal-order and call-by-name evaluation, arithmetic folding and printing.
 *
 * @example
 * ```ts
 * import { interpret } from "lambda-reducer";
 * const result = interpret("(\\x.x * x + 1) 3");
 * // result.ok && result.output === "10.0"
 * ```
 *
 * @module
 */

// Terms
export {
  type ArithOp,
  type ArithOperator,
  createApplication,
  type LambdaAbs,
  type LambdaApplication,
  type LambdaVar,
  mkArith,
  mkNeg,
  mkNum,
  mkUntypedAbs,
  mkVar,
  type Negation,
  type NumLiteral,
  /** Fully parenthesized debug rendering of a term. */
  prettyPrintUntypedLambda,
  type Term,
  typelessApp,
} from "./terms/lambda.js";
export {
  type GeneratorOptions,
  randTerm,
  type RandomSource,
} from "./terms/generator.js";

// Substitution
export { freeVars } from "./reduction/freeVariables.js";
export { freshVar } from "./reduction/fresh.js";
export { substitute } from "./reduction/substitution.js";

// Evaluation
export { type Strategy, STRATEGIES } from "./evaluator/strategy.js";
export {
  isRedex,
  type Redex,
  type StepResult,
  stepOnce,
} from "./evaluator/reducer.js";
export { foldArithmetic } from "./evaluator/arithmetic.js";
export {
  createEvaluator,
  evaluate,
  type EvaluateOptions,
  type Evaluator,
  lazyEvaluator,
  normalOrderEvaluator,
  NonTerminationError,
} from "./evaluator/evaluator.js";

// Printing
export {
  formatNumber,
  linearize,
  type PrintStyle,
  render,
} from "./printer/linearize.js";

// Parsing
/** Parses the plain lambda calculus grammar. */
export { parseLambda } from "./parser/lambda.js";
/** Parses the lambda calculus grammar with arithmetic. */
export { parseArithmeticLambda } from "./parser/arithmetic.js";
export { ParseError } from "./parser/parseError.js";

// Pipeline
export {
  type Dialect,
  type FailureKind,
  interpret,
  type InterpretOptions,
  type InterpretResult,
} from "./interpreter.js";
export { VERSION } from "./shared/version.js";
