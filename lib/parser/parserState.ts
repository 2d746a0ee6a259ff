import { ParseError } from "./parseError.js";
import {
  DIGIT_REGEX,
  DOT,
  IDENTIFIER_CHAR_REGEX,
  IDENTIFIER_START_REGEX,
  LEFT_PAREN,
  RIGHT_PAREN,
  WHITESPACE_REGEX,
} from "./consts.js";

export interface ParserState {
  readonly buf: string;
  readonly idx: number;
}

export function createParserState(buf: string): ParserState {
  return { buf, idx: 0 };
}

export function skipWhitespace(state: ParserState): ParserState {
  let idx = state.idx;
  while (idx < state.buf.length && WHITESPACE_REGEX.test(state.buf[idx])) {
    idx++;
  }
  return { buf: state.buf, idx };
}

export function peek(state: ParserState): [string | null, ParserState] {
  const newState = skipWhitespace(state);
  if (newState.idx < newState.buf.length) {
    return [newState.buf[newState.idx], newState];
  }
  return [null, newState];
}

export function consume(state: ParserState): ParserState {
  return { buf: state.buf, idx: state.idx + 1 };
}

export function matchCh(state: ParserState, ch: string): ParserState {
  const [next, newState] = peek(state);
  if (next !== ch) {
    throw new ParseError(
      `expected '${ch}' but found '${next ?? "EOF"}'`,
      newState.idx,
    );
  }
  return consume(newState);
}

export function matchLP(state: ParserState): ParserState {
  return matchCh(state, LEFT_PAREN);
}

export function matchRP(state: ParserState): ParserState {
  return matchCh(state, RIGHT_PAREN);
}

/**
 * Identifiers are a letter followed by letters or digits.
 */
export function parseIdentifier(state: ParserState): [string, ParserState] {
  let currentState = skipWhitespace(state);
  const start = currentState.idx;
  const first = currentState.buf[start];
  if (first === undefined || !IDENTIFIER_START_REGEX.test(first)) {
    throw new ParseError("expected an identifier", start);
  }
  while (currentState.idx < currentState.buf.length) {
    const ch = currentState.buf[currentState.idx];
    if (!IDENTIFIER_CHAR_REGEX.test(ch)) break;
    currentState = consume(currentState);
  }
  return [currentState.buf.slice(start, currentState.idx), currentState];
}

/**
 * Decimal literals: digits with an optional fractional part.
 */
export function parseNumber(state: ParserState): [string, number, ParserState] {
  let currentState = skipWhitespace(state);
  const start = currentState.idx;

  const digits = (s: ParserState): ParserState => {
    let cur = s;
    while (cur.idx < cur.buf.length && DIGIT_REGEX.test(cur.buf[cur.idx])) {
      cur = consume(cur);
    }
    return cur;
  };

  currentState = digits(currentState);
  if (currentState.idx === start) {
    throw new ParseError("expected a number", start);
  }
  if (currentState.buf[currentState.idx] === DOT) {
    const afterDot = consume(currentState);
    currentState = digits(afterDot);
    if (currentState.idx === afterDot.idx) {
      throw new ParseError("expected a digit after '.'", afterDot.idx);
    }
  }
  const literal = currentState.buf.slice(start, currentState.idx);
  return [literal, Number(literal), currentState];
}

export function remaining(state: ParserState): [boolean, ParserState] {
  const newState = skipWhitespace(state);
  return [newState.idx < newState.buf.length, newState];
}

