import { assert } from "chai";
import rsexport from "random-seed";
import {
  evaluate,
  NonTerminationError,
} from "../lib/evaluator/evaluator.js";
import { STRATEGIES, type Strategy } from "../lib/evaluator/strategy.js";
import { freeVars } from "../lib/reduction/freeVariables.js";
import { substitute } from "../lib/reduction/substitution.js";
import { randTerm } from "../lib/terms/generator.js";
import type { Term } from "../lib/terms/lambda.js";
import { linearize } from "../lib/printer/linearize.js";

const { create } = rsexport;

const BUDGET = 200;

const sample = (seed: string, count: number): Term[] => {
  const rs = create(seed);
  return Array.from(
    { length: count },
    (_, i) => randTerm(rs, 1 + (i % 8), { arithmetic: i % 2 === 1 }),
  );
};

/** Normal form within the budget, or undefined for a term that runs out. */
const tryEvaluate = (t: Term, strategy: Strategy): Term | undefined => {
  try {
    return evaluate(t, strategy, { maxSteps: BUDGET });
  } catch (e) {
    if (e instanceof NonTerminationError) return undefined;
    throw e;
  }
};

const sorted = (s: Iterable<string>): string[] => [...s].sort();

describe("properties", () => {
  const terms = sample("lambda-properties", 150);

  for (const strategy of STRATEGIES) {
    describe(strategy, () => {
      it("is idempotent", () => {
        let checked = 0;
        for (const t of terms) {
          const nf = tryEvaluate(t, strategy);
          if (nf === undefined) continue;
          assert.deepStrictEqual(evaluate(nf, strategy, { maxSteps: 0 }), nf);
          checked++;
        }
        assert.isAbove(checked, 0);
      });

      it("is deterministic", () => {
        for (const t of terms) {
          const first = tryEvaluate(t, strategy);
          const second = tryEvaluate(t, strategy);
          assert.strictEqual(
            second === undefined ? undefined : linearize(second),
            first === undefined ? undefined : linearize(first),
          );
        }
      });
    });
  }

  it("substitution rewrites free variables exactly", () => {
    const replacements = sample("lambda-replacements", 150);
    terms.forEach((t, i) => {
      const r = replacements[i];
      for (const x of ["x", "y", "z"]) {
        const before = freeVars(t);
        const expected = new Set(before);
        expected.delete(x);
        if (before.has(x)) {
          for (const v of freeVars(r)) expected.add(v);
        }
        assert.deepStrictEqual(
          sorted(freeVars(substitute(t, x, r))),
          sorted(expected),
        );
      }
    });
  });
});
