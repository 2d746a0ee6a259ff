/**
 * Surface-syntax printing of terms.
 *
 * Two styles exist. `plain` is the pure lambda-calculus convention: an
 * abstraction body is never parenthesized. `extended` is the arithmetic
 * dialect's convention: an application body is parenthesized, and
 * {@link render} wraps a top-level abstraction or application once more.
 *
 * The operator table is not minimal: a nested `+` or `-` operand is wrapped
 * on either side, even where associativity would allow otherwise.
 *
 * @module
 */
import {
  type ArithOperator,
  operatorSymbol,
  type Term,
} from "../terms/lambda.js";
import { BACKSLASH, LEFT_PAREN, RIGHT_PAREN } from "../parser/consts.js";

export type PrintStyle = "plain" | "extended";

type Kind = Term["kind"];

const parens = (s: string): string => `${LEFT_PAREN}${s}${RIGHT_PAREN}`;

const isOperator = (t: Term, ...ops: ArithOperator[]): boolean =>
  t.kind === "arith-op" && ops.includes(t.op);

const nonAtomic: readonly Kind[] = [
  "negation",
  "non-terminal",
  "lambda-abs",
];

/** Whether an operand of `op` needs parentheses. */
function wrapsOperand(op: ArithOperator, operand: Term): boolean {
  if (nonAtomic.includes(operand.kind)) return true;
  switch (op) {
    case "plus":
    case "minus":
      return operand.kind === "arith-op";
    case "times":
    case "div":
      return isOperator(operand, "plus", "minus", "div");
  }
}

/**
 * Prints a numeric literal as a decimal with at least one fractional digit.
 * Integral values print as `n.0`; negative zero prints as `0.0`. Other values
 * keep the digits of their shortest round-trip form, without an exponent.
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return "nan";
  if (value === Infinity) return "inf";
  if (value === -Infinity) return "-inf";
  if (Number.isInteger(value)) return `${BigInt(value).toString()}.0`;

  const shortest = String(value);
  // Non-integral doubles only use an exponent below 1e-6.
  const exponent = /^(-?)(\d)(?:\.(\d+))?e-(\d+)$/.exec(shortest);
  if (exponent === null) return shortest;
  const [, sign, lead, fraction = "", power] = exponent;
  return `${sign}0.${"0".repeat(Number(power) - 1)}${lead}${fraction}`;
}

export function linearize(t: Term, style: PrintStyle = "extended"): string {
  switch (t.kind) {
    case "lambda-var":
      return t.name;
    case "lambda-abs": {
      const body = linearize(t.body, style);
      const wrapBody = style === "extended" && t.body.kind === "non-terminal";
      return `${BACKSLASH}${t.name}.${wrapBody ? parens(body) : body}`;
    }
    case "non-terminal": {
      const func = linearize(t.lft, style);
      const arg = linearize(t.rgt, style);
      const wrapArg = nonAtomic.includes(t.rgt.kind) ||
        t.rgt.kind === "arith-op";
      return `${t.lft.kind === "lambda-abs" ? parens(func) : func} ` +
        (wrapArg ? parens(arg) : arg);
    }
    case "arith-op": {
      const lft = linearize(t.lft, style);
      const rgt = linearize(t.rgt, style);
      return `${wrapsOperand(t.op, t.lft) ? parens(lft) : lft}` +
        ` ${operatorSymbol(t.op)} ` +
        `${wrapsOperand(t.op, t.rgt) ? parens(rgt) : rgt}`;
    }
    case "negation": {
      const operand = linearize(t.operand, style);
      const atomic = t.operand.kind === "lambda-var" ||
        t.operand.kind === "num-literal";
      return `-${atomic ? operand : parens(operand)}`;
    }
    case "num-literal":
      return formatNumber(t.value);
  }
}

/**
 * The form printed for a final result. In the `extended` style a top-level
 * abstraction or application is wrapped in parentheses.
 */
export function render(t: Term, style: PrintStyle = "extended"): string {
  const out = linearize(t, style);
  if (
    style === "extended" &&
    (t.kind === "lambda-abs" || t.kind === "non-terminal")
  ) {
    return parens(out);
  }
  return out;
}
