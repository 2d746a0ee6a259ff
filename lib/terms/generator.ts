/**
 * Random term generation.
 *
 * This module provides functionality for generating random terms with a
 * given number of leaves from a seeded random source, for reproducible
 * property checks.
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
  mkVar,
  type Term,
} from "./lambda.js";

/**
 * Simple interface for random number generation.
 * This allows the generator to work with any random number source
 * without bundling specific dependencies.
 */
export interface RandomSource {
  /** Returns a random integer between min (inclusive) and max (inclusive) */
  intBetween(min: number, max: number): number;
}

export interface GeneratorOptions {
  /** Names used for variables and binders. */
  variables?: readonly string[];
  /** Also generate numeric literals, operators and negations. */
  arithmetic?: boolean;
}

const DEFAULT_VARIABLES: readonly string[] = ["x", "y", "z"];
const OPERATORS: readonly ArithOperator[] = ["plus", "minus", "times", "div"];

const pick = <T>(rs: RandomSource, items: readonly T[]): T =>
  items[rs.intBetween(0, items.length - 1)];

/**
 * Generates a random term with exactly `n` leaves.
 */
export const randTerm = (
  rs: RandomSource,
  n: number,
  options: GeneratorOptions = {},
): Term => {
  if (n <= 0) {
    throw new Error("A valid term must contain at least one leaf.");
  }
  const variables = options.variables ?? DEFAULT_VARIABLES;
  if (variables.length === 0) {
    throw new Error("at least one variable name is required");
  }
  return generate(rs, n, variables, options.arithmetic ?? false);
};

function generate(
  rs: RandomSource,
  n: number,
  variables: readonly string[],
  arithmetic: boolean,
): Term {
  let core: Term;
  if (n === 1) {
    core = arithmetic && rs.intBetween(0, 2) === 0
      ? mkNum(rs.intBetween(0, 9))
      : mkVar(pick(rs, variables));
  } else {
    const split = rs.intBetween(1, n - 1);
    const lft = generate(rs, split, variables, arithmetic);
    const rgt = generate(rs, n - split, variables, arithmetic);
    core = arithmetic && rs.intBetween(0, 2) === 0
      ? mkArith(pick(rs, OPERATORS), lft, rgt)
      : createApplication(lft, rgt);
  }

  const die = rs.intBetween(1, 6);
  if (die <= 2) {
    return mkUntypedAbs(pick(rs, variables), core);
  } else if (die === 3 && arithmetic) {
    return mkNeg(core);
  }
  return core;
}
