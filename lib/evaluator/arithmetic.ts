/**
 * Arithmetic folding for the arithmetic dialect.
 *
 * @module
 */
import {
  type ArithOperator,
  createApplication,
  mkArith,
  mkNeg,
  mkNum,
  mkUntypedAbs,
  type Term,
} from "../terms/lambda.js";
import type { StepResult } from "./reducer.js";
import { reducesUnderBinders, type Strategy } from "./strategy.js";

/** IEEE double semantics: `1 / 0` is `Infinity`, `0 / 0` is `NaN`. */
export function applyOperator(op: ArithOperator, a: number, b: number): number {
  switch (op) {
    case "plus":
      return a + b;
    case "minus":
      return a - b;
    case "times":
      return a * b;
    case "div":
      return a / b;
  }
}

const unchanged = (expr: Term): StepResult => ({ altered: false, expr });

/**
 * One full folding pass: every operator node whose operands are (or fold
 * to) numeric literals collapses into a literal, bottom-up.
 *
 * Under `lazy-no-binder` the pass does not enter abstractions or
 * applications, mirroring the reducer. Under `eager` it reaches every node.
 */
export function foldArithmetic(t: Term, strategy: Strategy): StepResult {
  switch (t.kind) {
    case "arith-op": {
      const lft = foldArithmetic(t.lft, strategy);
      const rgt = foldArithmetic(t.rgt, strategy);
      if (lft.expr.kind === "num-literal" && rgt.expr.kind === "num-literal") {
        return {
          altered: true,
          expr: mkNum(applyOperator(t.op, lft.expr.value, rgt.expr.value)),
        };
      }
      if (!lft.altered && !rgt.altered) return unchanged(t);
      return { altered: true, expr: mkArith(t.op, lft.expr, rgt.expr) };
    }
    case "negation": {
      const operand = foldArithmetic(t.operand, strategy);
      if (operand.expr.kind === "num-literal") {
        return { altered: true, expr: mkNum(-operand.expr.value) };
      }
      return operand.altered
        ? { altered: true, expr: mkNeg(operand.expr) }
        : unchanged(t);
    }
    case "lambda-abs": {
      if (!reducesUnderBinders(strategy)) return unchanged(t);
      const body = foldArithmetic(t.body, strategy);
      return body.altered
        ? { altered: true, expr: mkUntypedAbs(t.name, body.expr) }
        : unchanged(t);
    }
    case "non-terminal": {
      if (!reducesUnderBinders(strategy)) return unchanged(t);
      const lft = foldArithmetic(t.lft, strategy);
      const rgt = foldArithmetic(t.rgt, strategy);
      if (!lft.altered && !rgt.altered) return unchanged(t);
      return { altered: true, expr: createApplication(lft.expr, rgt.expr) };
    }
    case "lambda-var":
    case "num-literal":
      return unchanged(t);
  }
}
