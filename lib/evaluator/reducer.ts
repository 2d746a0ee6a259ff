/**
 * Single-step beta reduction.
 *
 * @module
 */
import {
  createApplication,
  type LambdaAbs,
  type LambdaApplication,
  mkArith,
  mkNeg,
  mkUntypedAbs,
  type Term,
} from "../terms/lambda.js";
import { substitute } from "../reduction/substitution.js";
import { reducesUnderBinders, type Strategy } from "./strategy.js";

export interface StepResult {
  altered: boolean;
  expr: Term;
}

/** `(λx.body) arg` */
export interface Redex extends LambdaApplication {
  readonly lft: LambdaAbs;
}

export const isRedex = (t: Term): t is Redex =>
  t.kind === "non-terminal" && t.lft.kind === "lambda-abs";

const unchanged = (expr: Term): StepResult => ({ altered: false, expr });

/**
 * Contracts the leftmost-outermost redex reachable under `strategy`.
 * Returns `altered: false` with the input term when there is none.
 * Arithmetic is never folded here; see arithmetic.ts.
 */
export function stepOnce(t: Term, strategy: Strategy): StepResult {
  if (isRedex(t)) {
    return {
      altered: true,
      expr: substitute(t.lft.body, t.lft.name, t.rgt),
    };
  }

  switch (t.kind) {
    case "non-terminal": {
      const lft = stepOnce(t.lft, strategy);
      if (lft.altered) {
        return { altered: true, expr: createApplication(lft.expr, t.rgt) };
      }
      // Call-by-name stops at a stuck head; the argument stays unevaluated.
      if (!reducesUnderBinders(strategy)) return unchanged(t);
      const rgt = stepOnce(t.rgt, strategy);
      if (rgt.altered) {
        return { altered: true, expr: createApplication(t.lft, rgt.expr) };
      }
      return unchanged(t);
    }
    case "lambda-abs": {
      if (!reducesUnderBinders(strategy)) return unchanged(t);
      const body = stepOnce(t.body, strategy);
      return body.altered
        ? { altered: true, expr: mkUntypedAbs(t.name, body.expr) }
        : unchanged(t);
    }
    case "arith-op": {
      const lft = stepOnce(t.lft, strategy);
      if (lft.altered) {
        return { altered: true, expr: mkArith(t.op, lft.expr, t.rgt) };
      }
      const rgt = stepOnce(t.rgt, strategy);
      if (rgt.altered) {
        return { altered: true, expr: mkArith(t.op, t.lft, rgt.expr) };
      }
      return unchanged(t);
    }
    case "negation": {
      const operand = stepOnce(t.operand, strategy);
      return operand.altered
        ? { altered: true, expr: mkNeg(operand.expr) }
        : unchanged(t);
    }
    case "lambda-var":
    case "num-literal":
      return unchanged(t);
  }
}
