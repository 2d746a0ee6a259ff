import { mkUntypedAbs, mkVar, type Term } from "../terms/lambda.js";
import { ABSTRACTION_MARKERS, DOT, LEFT_PAREN, RIGHT_PAREN } from "./consts.js";
import {
  consume,
  matchCh,
  matchLP,
  matchRP,
  parseIdentifier,
  type ParserState,
  peek,
} from "./parserState.js";
import { parseChain } from "./chain.js";
import { parseWithEOF } from "./eof.js";

type TermParser = (state: ParserState) => [string, Term, ParserState];

/**
 * Parses the atoms both dialects share: an abstraction, a parenthesized
 * expression or a variable. `parseExpr` parses an abstraction body and the
 * inside of parentheses, so a body extends as far right as it can.
 */
export function parseSharedAtom(
  state: ParserState,
  parseExpr: TermParser,
): [string, Term, ParserState] {
  const [peeked, s] = peek(state);

  if (peeked !== null && ABSTRACTION_MARKERS.includes(peeked)) {
    const [varLit, stateAfterVar] = parseIdentifier(consume(s));
    const currentState = matchCh(stateAfterVar, DOT);
    const [, bodyTerm, stateAfterBody] = parseExpr(currentState);
    const literal = s.buf.slice(s.idx, stateAfterBody.idx).trimEnd();
    return [literal, mkUntypedAbs(varLit, bodyTerm), stateAfterBody];
  } else if (peeked === LEFT_PAREN) {
    const [, innerTerm, stateAfterInner] = parseExpr(matchLP(s));
    const currentState = matchRP(stateAfterInner);
    const fullLiteral = s.buf.slice(s.idx, currentState.idx);
    return [fullLiteral, innerTerm, currentState];
  } else {
    const [varLit, stateAfterVar] = parseIdentifier(s);
    return [varLit, mkVar(varLit), stateAfterVar];
  }
}

/**
 * Parses a plain lambda term (including applications) by chaining
 * together atomic terms.
 *
 * Returns a triple: [literal, Term, updatedState]
 */
function parseLambdaInternal(
  state: ParserState,
): [string, Term, ParserState] {
  return parseChain(state, parseAtomicLambda, [RIGHT_PAREN]);
}

function parseAtomicLambda(
  state: ParserState,
): [string, Term, ParserState] {
  return parseSharedAtom(state, parseLambdaInternal);
}

/**
 * Parses an input string into a plain lambda term: variables, `\x.body`
 * (or `λx.body`), juxtaposition and parentheses. Numbers and operators are
 * rejected.
 *
 * @throws ParseError on malformed or trailing input
 */
export function parseLambda(input: string): [string, Term] {
  const [lit, term] = parseWithEOF(input, parseLambdaInternal);
  return [lit, term];
}
