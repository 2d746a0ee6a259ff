/**
 * Source-to-output pipeline: parse, evaluate, render.
 *
 * Failures come back as a typed result rather than an exception, so callers
 * can tell malformed input apart from an exhausted step budget.
 *
 * @module
 */
import type { Term } from "./terms/lambda.js";
import { parseLambda } from "./parser/lambda.js";
import { parseArithmeticLambda } from "./parser/arithmetic.js";
import { ParseError } from "./parser/parseError.js";
import {
  evaluate,
  type EvaluateOptions,
  NonTerminationError,
} from "./evaluator/evaluator.js";
import type { Strategy } from "./evaluator/strategy.js";
import { type PrintStyle, render } from "./printer/linearize.js";

export type Dialect = "lambda" | "arithmetic";

export const DIALECTS: readonly Dialect[] = ["lambda", "arithmetic"];

interface DialectProfile {
  parse: (source: string) => [string, Term];
  strategy: Strategy;
  style: PrintStyle;
}

const profiles: Record<Dialect, DialectProfile> = {
  // Pure lambda calculus, normalized fully.
  lambda: { parse: parseLambda, strategy: "eager", style: "plain" },
  // Lambda calculus with arithmetic, call-by-name.
  arithmetic: {
    parse: parseArithmeticLambda,
    strategy: "lazy-no-binder",
    style: "extended",
  },
};

export const defaultStrategy = (dialect: Dialect): Strategy =>
  profiles[dialect].strategy;

export const dialectStyle = (dialect: Dialect): PrintStyle =>
  profiles[dialect].style;

export interface InterpretOptions extends EvaluateOptions {
  dialect?: Dialect;
  /** Overrides the dialect's default strategy. */
  strategy?: Strategy;
}

export type FailureKind = "parse-failure" | "non-termination" | "internal";

export type InterpretResult =
  | { ok: true; term: Term; output: string }
  | { ok: false; kind: FailureKind; message: string };

const failure = (kind: FailureKind, message: string): InterpretResult => ({
  ok: false,
  kind,
  message,
});

export function interpret(
  source: string,
  options: InterpretOptions = {},
): InterpretResult {
  const profile = profiles[options.dialect ?? "arithmetic"];
  const strategy = options.strategy ?? profile.strategy;

  try {
    const [, parsed] = profile.parse(source);
    const term = evaluate(parsed, strategy, {
      maxSteps: options.maxSteps,
      onStep: options.onStep,
    });
    return { ok: true, term, output: render(term, profile.style) };
  } catch (e) {
    if (e instanceof ParseError) return failure("parse-failure", e.message);
    if (e instanceof NonTerminationError) {
      return failure("non-termination", e.message);
    }
    return failure("internal", e instanceof Error ? e.message : String(e));
  }
}
