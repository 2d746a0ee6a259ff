/**
 * Parser for the arithmetic dialect.
 *
 * Precedence, loosest first:
 *
 *   sum     ::= product (("+" | "-") product)*      left-associative
 *   product ::= unary (("*" | "/") unary)*          left-associative
 *   unary   ::= "-" unary | chain
 *   chain   ::= atom atom*                          application
 *   atom    ::= number | identifier | "(" sum ")" | ("\" | "λ") identifier "." sum
 *
 * `-5` parses to a negation of the literal 5, never to a negative literal.
 *
 * @module
 */
import {
  type ArithOperator,
  mkArith,
  mkNeg,
  mkNum,
  type Term,
} from "../terms/lambda.js";
import {
  DIGIT_REGEX,
  MINUS,
  PLUS,
  RIGHT_PAREN,
  SLASH,
  STAR,
} from "./consts.js";
import { consume, parseNumber, type ParserState, peek } from "./parserState.js";
import { parseChain } from "./chain.js";
import { parseWithEOF } from "./eof.js";
import { parseSharedAtom } from "./lambda.js";

const CHAIN_STOP: readonly string[] = [RIGHT_PAREN, PLUS, MINUS, STAR, SLASH];

type OperatorTable = Readonly<Partial<Record<string, ArithOperator>>>;

const additive: OperatorTable = {
  [PLUS]: "plus",
  [MINUS]: "minus",
};

const multiplicative: OperatorTable = {
  [STAR]: "times",
  [SLASH]: "div",
};

function parseLeftAssociative(
  state: ParserState,
  operators: OperatorTable,
  parseOperand: (state: ParserState) => [string, Term, ParserState],
): [string, Term, ParserState] {
  const [, first, afterFirst] = parseOperand(state);
  let result = first;
  let currentState = afterFirst;

  for (;;) {
    const [peeked, s] = peek(currentState);
    const op = peeked === null ? undefined : operators[peeked];
    if (op === undefined) break;
    const [, operand, afterOperand] = parseOperand(consume(s));
    result = mkArith(op, result, operand);
    currentState = afterOperand;
  }

  const start = peek(state)[1];
  return [
    state.buf.slice(start.idx, currentState.idx).trimEnd(),
    result,
    currentState,
  ];
}

function parseSum(state: ParserState): [string, Term, ParserState] {
  return parseLeftAssociative(state, additive, parseProduct);
}

function parseProduct(state: ParserState): [string, Term, ParserState] {
  return parseLeftAssociative(state, multiplicative, parseUnary);
}

function parseUnary(state: ParserState): [string, Term, ParserState] {
  const [peeked, s] = peek(state);
  if (peeked === MINUS) {
    const [, operand, afterOperand] = parseUnary(consume(s));
    return [
      s.buf.slice(s.idx, afterOperand.idx).trimEnd(),
      mkNeg(operand),
      afterOperand,
    ];
  }
  return parseChain(s, parseAtomicArithmetic, CHAIN_STOP);
}

function parseAtomicArithmetic(
  state: ParserState,
): [string, Term, ParserState] {
  const [peeked, s] = peek(state);
  if (peeked !== null && DIGIT_REGEX.test(peeked)) {
    const [literal, value, afterNumber] = parseNumber(s);
    return [literal, mkNum(value), afterNumber];
  }
  return parseSharedAtom(s, parseSum);
}

/**
 * Parses an input string into a term of the arithmetic dialect.
 *
 * @throws ParseError on malformed or trailing input
 */
export function parseArithmeticLambda(input: string): [string, Term] {
  const [lit, term] = parseWithEOF(input, parseSum);
  return [lit, term];
}
