/**
 * Lambda calculus term representation and utilities.
 *
 * This module defines the AST types for lambda calculus terms, including
 * variables, abstractions and applications, plus the arithmetic extension
 * (numeric literals, binary operators and unary negation). Terms are
 * immutable: every transformation in this package builds new nodes.
 *
 * @module
 */

/**
 * This is a single term variable with a name.
 *
 * For instance, in the expression "λx.y", this is just "y".
 */
export interface LambdaVar {
  readonly kind: "lambda-var";
  readonly name: string;
}

export const mkVar = (name: string): LambdaVar => ({
  kind: "lambda-var",
  name,
});

// λx.<body>, where x is a name
export interface LambdaAbs {
  readonly kind: "lambda-abs";
  readonly name: string;
  readonly body: Term;
}

export const mkUntypedAbs = (name: string, body: Term): LambdaAbs => ({
  kind: "lambda-abs",
  name,
  body,
});

/**
 * An application, left operand applied to right.
 */
export interface LambdaApplication {
  readonly kind: "non-terminal";
  readonly lft: Term;
  readonly rgt: Term;
}

/**
 * A numeric literal. Values are IEEE doubles, so infinities and NaN are
 * ordinary values here.
 */
export interface NumLiteral {
  readonly kind: "num-literal";
  readonly value: number;
}

export const mkNum = (value: number): NumLiteral => ({
  kind: "num-literal",
  value,
});

export type ArithOperator = "plus" | "minus" | "times" | "div";

export interface ArithOp {
  readonly kind: "arith-op";
  readonly op: ArithOperator;
  readonly lft: Term;
  readonly rgt: Term;
}

export const mkArith = (
  op: ArithOperator,
  lft: Term,
  rgt: Term,
): ArithOp => ({
  kind: "arith-op",
  op,
  lft,
  rgt,
});

export interface Negation {
  readonly kind: "negation";
  readonly operand: Term;
}

export const mkNeg = (operand: Term): Negation => ({
  kind: "negation",
  operand,
});

/**
 * The legal terms.
 * e ::= x | λx.e | e e | n | e + e | e - e | e * e | e / e | -e
 *
 * The last five productions only appear in the arithmetic dialect.
 */
export type Term =
  | LambdaVar
  | LambdaAbs
  | LambdaApplication
  | NumLiteral
  | ArithOp
  | Negation;

/**
 * Creates an application of one term to another.
 * @param left the function term
 * @param right the argument term
 */
export const createApplication = (
  left: Term,
  right: Term,
): LambdaApplication => ({
  kind: "non-terminal",
  lft: left,
  rgt: right,
});

/**
 * Left-associative application of a non-empty list of terms:
 * `typelessApp(a, b, c)` is `(a b) c`.
 */
export const typelessApp = (head: Term, ...rest: Term[]): Term =>
  rest.reduce<Term>(createApplication, head);

const operatorSymbols: Record<ArithOperator, string> = {
  plus: "+",
  minus: "-",
  times: "*",
  div: "/",
};

export const operatorSymbol = (op: ArithOperator): string =>
  operatorSymbols[op];

/**
 * Pretty-prints a term using λ and full parenthesization. Meant for
 * diagnostics; the surface syntax printer lives in printer/linearize.ts.
 * @param t the term
 * @returns a human-readable string representation
 */
export const prettyPrintUntypedLambda = (t: Term): string => {
  switch (t.kind) {
    case "lambda-var":
      return t.name;
    case "lambda-abs":
      return `λ${t.name}.${prettyPrintUntypedLambda(t.body)}`;
    case "non-terminal":
      return `(${prettyPrintUntypedLambda(t.lft)}` +
        ` ${prettyPrintUntypedLambda(t.rgt)})`;
    case "num-literal":
      return String(t.value);
    case "arith-op":
      return `(${prettyPrintUntypedLambda(t.lft)} ${operatorSymbol(t.op)}` +
        ` ${prettyPrintUntypedLambda(t.rgt)})`;
    case "negation":
      return `(-${prettyPrintUntypedLambda(t.operand)})`;
  }
};

/**
 * Counts the leaves (variables and numeric literals) of a term.
 */
export const leaves = (t: Term): number => {
  switch (t.kind) {
    case "lambda-var":
    case "num-literal":
      return 1;
    case "lambda-abs":
      return leaves(t.body);
    case "negation":
      return leaves(t.operand);
    case "non-terminal":
    case "arith-op":
      return leaves(t.lft) + leaves(t.rgt);
  }
};
