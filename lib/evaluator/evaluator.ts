/**
 * Evaluation to normal form.
 *
 * This module drives the reducer to a fixpoint, alternating exhaustive
 * beta-reduction with full arithmetic folding passes, and exposes the
 * {@link Evaluator} interface with one instance per strategy.
 *
 * @module
 */
import type { Term } from "../terms/lambda.js";
import { foldArithmetic } from "./arithmetic.js";
import { type StepResult, stepOnce } from "./reducer.js";
import type { Strategy } from "./strategy.js";

export interface Evaluator {
  readonly strategy: Strategy;

  /** Apply exactly one β-step (or return unchanged). */
  stepOnce(expr: Term): StepResult;

  /** Keep stepping and folding until fix-point or maxIterations. */
  reduce(expr: Term, maxIterations?: number): Term;
}

export interface EvaluateOptions {
  /**
   * Upper bound on the number of beta-steps plus folding passes. Without it
   * a term with no normal form is evaluated forever.
   */
  maxSteps?: number;
  /** Called with each intermediate term and its 1-based step number. */
  onStep?: (expr: Term, step: number) => void;
}

/**
 * Raised when a step budget runs out before a normal form is reached.
 */
export class NonTerminationError extends Error {
  constructor(
    public readonly term: Term,
    public readonly steps: number,
  ) {
    super(`no normal form reached within ${steps} steps`);
    this.name = "NonTerminationError";
  }
}

/**
 * Reduces `t` until neither a beta-step nor a folding pass changes it.
 *
 * Folding only runs once beta-reduction is stuck; if it changes the term,
 * beta-reduction resumes.
 */
export function evaluate(
  t: Term,
  strategy: Strategy,
  options: EvaluateOptions = {},
): Term {
  const { maxSteps, onStep } = options;
  let expr = t;
  let steps = 0;

  for (;;) {
    let result = stepOnce(expr, strategy);
    if (!result.altered) {
      result = foldArithmetic(expr, strategy);
      if (!result.altered) return expr;
    }
    if (maxSteps !== undefined && steps >= maxSteps) {
      throw new NonTerminationError(expr, steps);
    }
    steps++;
    expr = result.expr;
    onStep?.(expr, steps);
  }
}

export const createEvaluator = (strategy: Strategy): Evaluator => ({
  strategy,
  stepOnce: (expr) => stepOnce(expr, strategy),
  reduce: (expr, maxIterations) =>
    evaluate(expr, strategy, { maxSteps: maxIterations }),
});

/** Full normal-order reduction, under binders included. */
export const normalOrderEvaluator: Evaluator = createEvaluator("eager");

/** Call-by-name reduction that stops at abstractions. */
export const lazyEvaluator: Evaluator = createEvaluator("lazy-no-binder");
