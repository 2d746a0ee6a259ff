import { assert, expect } from "chai";
import { parseLambda } from "../../lib/parser/lambda.js";
import { ParseError } from "../../lib/parser/parseError.js";
import { mkUntypedAbs, mkVar, typelessApp } from "../../lib/terms/lambda.js";

describe("parseLambda", () => {
  describe("applications", () => {
    it("parses juxtaposition", () => {
      const src = "a b";
      const [lit, term] = parseLambda(src);
      expect(lit).to.equal(src);
      expect(term).to.deep.equal(typelessApp(mkVar("a"), mkVar("b")));
    });

    it("parses a parenthesized application", () => {
      const src = "(a b)";
      const [lit, term] = parseLambda(src);
      expect(lit).to.equal(src);
      expect(term).to.deep.equal(typelessApp(mkVar("a"), mkVar("b")));
    });

    it("associates to the left", () => {
      assert.deepStrictEqual(
        parseLambda("a b c")[1],
        typelessApp(mkVar("a"), mkVar("b"), mkVar("c")),
      );
      assert.deepStrictEqual(
        parseLambda("a (b c)")[1],
        typelessApp(mkVar("a"), typelessApp(mkVar("b"), mkVar("c"))),
      );
    });

    it("reads multi-character identifiers", () => {
      assert.deepStrictEqual(
        parseLambda("x1 Var2")[1],
        typelessApp(mkVar("x1"), mkVar("Var2")),
      );
    });
  });

  describe("abstractions", () => {
    it("accepts both markers", () => {
      const expected = mkUntypedAbs("x", mkVar("x"));
      assert.deepStrictEqual(parseLambda("\\x.x")[1], expected);
      assert.deepStrictEqual(parseLambda("λx.x")[1], expected);
    });

    it("extends the body as far right as possible", () => {
      const [lit, term] = parseLambda("\\x.x y");
      expect(lit).to.equal("\\x.x y");
      assert.deepStrictEqual(
        term,
        mkUntypedAbs("x", typelessApp(mkVar("x"), mkVar("y"))),
      );
    });

    it("takes an abstraction as an argument", () => {
      assert.deepStrictEqual(
        parseLambda("a \\x.x b")[1],
        typelessApp(
          mkVar("a"),
          mkUntypedAbs("x", typelessApp(mkVar("x"), mkVar("b"))),
        ),
      );
    });

    it("parses a redex without spaces", () => {
      assert.deepStrictEqual(
        parseLambda("\\x.(\\y.y)x")[1],
        mkUntypedAbs(
          "x",
          typelessApp(mkUntypedAbs("y", mkVar("y")), mkVar("x")),
        ),
      );
    });
  });

  describe("errors", () => {
    it("rejects numbers and operators", () => {
      expect(() => parseLambda("1")).to.throw(ParseError, /expected an identifier/);
      expect(() => parseLambda("a + b")).to.throw(
        ParseError,
        /expected an identifier/,
      );
    });

    it("rejects a binder without a name", () => {
      expect(() => parseLambda("\\.x")).to.throw(
        ParseError,
        /expected an identifier/,
      );
    });

    it("rejects an unclosed parenthesis", () => {
      expect(() => parseLambda("(a b")).to.throw(
        ParseError,
        "expected ')' but found 'EOF' at offset 4",
      );
    });

    it("rejects trailing input", () => {
      expect(() => parseLambda("a)")).to.throw(
        ParseError,
        /unexpected extra input: "\)"/,
      );
    });

    it("rejects empty input", () => {
      expect(() => parseLambda("   ")).to.throw(ParseError, /expected a term/);
    });
  });
});
