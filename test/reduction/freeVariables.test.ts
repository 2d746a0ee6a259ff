import { assert } from "chai";
import { freeVars } from "../../lib/reduction/freeVariables.js";
import {
  mkArith,
  mkNeg,
  mkNum,
  mkUntypedAbs,
  mkVar,
  typelessApp,
} from "../../lib/terms/lambda.js";

const sorted = (s: Set<string>): string[] => [...s].sort();

describe("freeVars", () => {
  it("treats a variable as free", () => {
    assert.deepStrictEqual(sorted(freeVars(mkVar("x"))), ["x"]);
  });

  it("removes the binder of an abstraction", () => {
    const term = mkUntypedAbs("x", typelessApp(mkVar("x"), mkVar("y")));
    assert.deepStrictEqual(sorted(freeVars(term)), ["y"]);
  });

  it("keeps occurrences outside the binder's scope", () => {
    // (λx.x) x
    const term = typelessApp(mkUntypedAbs("x", mkVar("x")), mkVar("x"));
    assert.deepStrictEqual(sorted(freeVars(term)), ["x"]);
  });

  it("collects through arithmetic nodes", () => {
    const term = mkArith(
      "div",
      mkNeg(mkVar("a")),
      mkArith("plus", mkNum(1), mkVar("b")),
    );
    assert.deepStrictEqual(sorted(freeVars(term)), ["a", "b"]);
  });

  it("finds nothing in a literal or a closed term", () => {
    assert.strictEqual(freeVars(mkNum(3)).size, 0);
    const k = mkUntypedAbs("x", mkUntypedAbs("y", mkVar("x")));
    assert.strictEqual(freeVars(k).size, 0);
  });
});
