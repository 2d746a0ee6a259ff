import { assert } from "chai";
import {
  type CLIOptions,
  type CliIO,
  CliUsageError,
  parseArgs,
  runCli,
} from "../lib/cli.js";
import { VERSION } from "../lib/shared/version.js";

interface Captured extends CliIO {
  out: string[];
  err: string[];
  traced: string[];
}

const capture = (): Captured => {
  const out: string[] = [];
  const err: string[] = [];
  const traced: string[] = [];
  return {
    out,
    err,
    traced,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    trace: (line) => traced.push(line),
  };
};

describe("runCli", () => {
  it("prints the normal form and succeeds", () => {
    const io = capture();
    assert.strictEqual(runCli(["(\\x.x) a"], io), 0);
    assert.deepStrictEqual(io.out, ["a"]);
    assert.deepStrictEqual(io.err, []);
  });

  it("evaluates arithmetic by default", () => {
    const io = capture();
    assert.strictEqual(runCli(["(\\x.x * x + 1) 3"], io), 0);
    assert.deepStrictEqual(io.out, ["10.0"]);
  });

  it("selects the lambda dialect", () => {
    const io = capture();
    assert.strictEqual(runCli(["-d", "lambda", "\\x.(\\y.y)x"], io), 0);
    assert.deepStrictEqual(io.out, ["\\x.x"]);
  });

  it("selects a strategy", () => {
    const io = capture();
    assert.strictEqual(runCli(["--strategy", "eager", "\\x.(\\y.y)x"], io), 0);
    assert.deepStrictEqual(io.out, ["(\\x.x)"]);
  });

  it("takes a leading minus as an expression", () => {
    const io = capture();
    assert.strictEqual(runCli(["-2"], io), 0);
    assert.deepStrictEqual(io.out, ["-2.0"]);
  });

  it("takes a double negation as an expression", () => {
    const io = capture();
    assert.strictEqual(runCli(["--5"], io), 0);
    assert.deepStrictEqual(io.out, ["5.0"]);
    assert.deepStrictEqual(io.err, []);
  });

  it("takes a negated variable as an expression", () => {
    const io = capture();
    assert.strictEqual(runCli(["-x + 1"], io), 0);
    assert.deepStrictEqual(io.out, ["(-x) + 1.0"]);
  });

  it("takes anything after -- as the expression", () => {
    const io = capture();
    assert.strictEqual(runCli(["--", "-x"], io), 0);
    assert.deepStrictEqual(io.out, ["-x"]);

    const flagLike = capture();
    assert.strictEqual(runCli(["--", "-h"], flagLike), 0);
    assert.deepStrictEqual(flagLike.out, ["-h"]);
  });

  it("traces intermediate terms", () => {
    const io = capture();
    assert.strictEqual(runCli(["--trace", "(\\x.\\y.x) a b"], io), 0);
    assert.deepStrictEqual(io.traced, ["1: (\\y.a) b", "2: a"]);
    assert.deepStrictEqual(io.out, ["a"]);
  });

  it("fails on malformed input without printing a result", () => {
    const io = capture();
    assert.strictEqual(runCli(["(\\x.x"], io), 1);
    assert.deepStrictEqual(io.out, []);
    assert.deepStrictEqual(io.err, [
      "parse-failure: expected ')' but found 'EOF' at offset 5",
    ]);
  });

  it("fails when the step budget runs out", () => {
    const io = capture();
    assert.strictEqual(runCli(["-m", "3", "(\\x.x x) (\\x.x x)"], io), 1);
    assert.deepStrictEqual(io.out, []);
    assert.deepStrictEqual(io.err, [
      "non-termination: no normal form reached within 3 steps",
    ]);
  });

  describe("usage errors", () => {
    const cases: [string[], string][] = [
      [[], "Missing expression. Use --help for usage information."],
      [["a", "b"], "Too many arguments."],
      [["--5", "a"], "Too many arguments."],
      [["-s", "fast", "a"], "Unknown strategy: fast"],
      [["-d", "sk", "a"], "Unknown dialect: sk"],
      [["-m", "-1", "a"], "Invalid step count: -1"],
      [["-m", "0", "a"], "Invalid step count: 0"],
      [["a", "-m"], "Missing value for -m"],
    ];

    for (const [args, message] of cases) {
      it(`rejects ${JSON.stringify(args)}`, () => {
        const io = capture();
        assert.strictEqual(runCli(args, io), 1);
        assert.deepStrictEqual(io.out, []);
        assert.strictEqual(io.err[0], message);
      });
    }
  });

  it("prints the version", () => {
    const io = capture();
    assert.strictEqual(runCli(["--version"], io), 0);
    assert.deepStrictEqual(io.out, [VERSION]);
    assert.strictEqual(VERSION, "0.1.0");
  });

  it("prints usage", () => {
    const io = capture();
    assert.strictEqual(runCli(["-h"], io), 0);
    assert.match(io.out[0], /^lambda 0\.1\.0\n\nUsage:\n {2}lambda \[options\] <expression>/);
  });
});

describe("parseArgs", () => {
  it("collects flags and the expression", () => {
    const expected: CLIOptions = {
      help: false,
      version: false,
      trace: true,
      dialect: "lambda",
      strategy: "lazy-no-binder",
      maxSteps: 20,
    };
    assert.deepStrictEqual(
      parseArgs(["-d", "lambda", "-s", "lazy", "-m", "20", "-t", "\\x.x"]),
      { options: expected, expression: "\\x.x" },
    );
  });

  it("treats only exact flags as options", () => {
    const { options, expression } = parseArgs(["--help-me"]);
    assert.isFalse(options.help);
    assert.strictEqual(expression, "--help-me");
  });

  it("throws a usage error for a bad value", () => {
    assert.throws(
      () => parseArgs(["--strategy", "fast", "a"]),
      CliUsageError,
      "Unknown strategy: fast",
    );
  });
});
