/**
 * Free-variable analysis for lambda terms.
 *
 * @module
 */
import type { Term } from "../terms/lambda.js";

/**
 * Computes the set of variable names occurring free in a term.
 */
export function freeVars(t: Term): Set<string> {
  const free = new Set<string>();

  function collect(t: Term, bound: ReadonlySet<string>) {
    switch (t.kind) {
      case "lambda-var":
        if (!bound.has(t.name)) {
          free.add(t.name);
        }
        break;
      case "lambda-abs":
        collect(t.body, new Set([...bound, t.name]));
        break;
      case "non-terminal":
      case "arith-op":
        collect(t.lft, bound);
        collect(t.rgt, bound);
        break;
      case "negation":
        collect(t.operand, bound);
        break;
      case "num-literal":
        break;
    }
  }

  collect(t, new Set());
  return free;
}
