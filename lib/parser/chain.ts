import { createApplication, type Term } from "../terms/lambda.js";
import { ParseError } from "./parseError.js";
import {
  type ParserState,
  peek,
  remaining,
  skipWhitespace,
} from "./parserState.js";

/**
 * Parses a chain of juxtaposed atoms into a left-associative application,
 * consuming atomic terms until either the input is exhausted or the next
 * character is one of `stopChars`.
 *
 * @param state the current parser state.
 * @param parseAtomic a function that parses an atomic term from the state,
 *   returning a triple: [literal, term, updatedState].
 * @param stopChars characters that end the chain without being consumed.
 * @returns a triple: [concatenated literal, chained term, updated parser state].
 * @throws ParseError if no term is parsed.
 */
export function parseChain(
  state: ParserState,
  parseAtomic: (state: ParserState) => [string, Term, ParserState],
  stopChars: readonly string[],
): [string, Term, ParserState] {
  const literals: string[] = [];
  let resultTerm: Term | undefined = undefined;
  let currentState = skipWhitespace(state);

  for (;;) {
    const [hasRemaining] = remaining(currentState);
    if (!hasRemaining) break;
    const [peeked] = peek(currentState);

    if (peeked !== null && stopChars.includes(peeked)) break;

    const [atomLit, atomTerm, newState] = parseAtomic(currentState);
    literals.push(atomLit);

    resultTerm = resultTerm === undefined
      ? atomTerm
      : createApplication(resultTerm, atomTerm);

    currentState = skipWhitespace(newState);
  }

  if (resultTerm === undefined) {
    throw new ParseError("expected a term", currentState.idx);
  }

  return [literals.join(" "), resultTerm, currentState];
}
