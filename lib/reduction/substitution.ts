/**
 * Capture-avoiding substitution.
 *
 * `substitute(t, x, r)` computes `t[x := r]`. The replacement is inserted
 * as-is and never evaluated, which is what call-by-name reduction relies on.
 * When a binder inside `t` would capture a free variable of `r`, the binder
 * is renamed to a fresh `VarN` first.
 *
 * @module
 */
import {
  createApplication,
  mkArith,
  mkNeg,
  mkUntypedAbs,
  mkVar,
  type Term,
} from "../terms/lambda.js";
import { freeVars } from "./freeVariables.js";
import { freshVar } from "./fresh.js";

export function substitute(t: Term, x: string, r: Term): Term {
  switch (t.kind) {
    case "lambda-var":
      return t.name === x ? r : t;
    case "lambda-abs": {
      // x is shadowed by this binder: nothing below refers to the outer x.
      if (t.name === x) return t;

      const freeInReplacement = freeVars(r);
      if (freeInReplacement.has(t.name)) {
        const avoid = new Set([
          ...freeInReplacement,
          ...freeVars(t.body),
          x,
        ]);
        const renamed = freshVar(avoid);
        const renamedBody = substitute(t.body, t.name, mkVar(renamed));
        return mkUntypedAbs(renamed, substitute(renamedBody, x, r));
      }
      return mkUntypedAbs(t.name, substitute(t.body, x, r));
    }
    case "non-terminal":
      return createApplication(
        substitute(t.lft, x, r),
        substitute(t.rgt, x, r),
      );
    case "arith-op":
      return mkArith(t.op, substitute(t.lft, x, r), substitute(t.rgt, x, r));
    case "negation":
      return mkNeg(substitute(t.operand, x, r));
    case "num-literal":
      return t;
  }
}

