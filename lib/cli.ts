/**
 * Command-line front end.
 *
 * Usage:
 *   lambda [options] <expression>
 *
 * Options:
 *   -d, --dialect <lambda|arithmetic>   grammar and printing convention
 *   -s, --strategy <eager|lazy>         reduction strategy
 *   -m, --max-steps <n>                 give up after n reduction steps
 *   -t, --trace                         print every intermediate term
 *   -h, --help
 *   -v, --version
 *
 * Examples:
 *   lambda '(\x.x) a'                        # a
 *   lambda '(\x.x * x + 1) 3'                # 10.0
 *   lambda -d lambda '\x.(\y.y) x'           # \x.x
 *   lambda --5                               # 5.0
 *   lambda -- -h                             # -h
 *
 * @module
 */
import tkexport from "terminal-kit";
import {
  type Dialect,
  DIALECTS,
  defaultStrategy,
  dialectStyle,
  interpret,
} from "./interpreter.js";
import type { Strategy } from "./evaluator/strategy.js";
import { linearize } from "./printer/linearize.js";
import { VERSION } from "./shared/version.js";

export interface CLIOptions {
  help: boolean;
  version: boolean;
  trace: boolean;
  dialect: Dialect;
  strategy?: Strategy;
  maxSteps?: number;
}

/** Where the CLI writes. Each call receives one line without a newline. */
export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
  trace(line: string): void;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const strategyNames: Readonly<Record<string, Strategy>> = {
  eager: "eager",
  lazy: "lazy-no-binder",
};

function isDialect(value: string): value is Dialect {
  return DIALECTS.some((d) => d === value);
}

export function parseArgs(
  args: readonly string[],
): { options: CLIOptions; expression?: string } {
  const options: CLIOptions = {
    help: false,
    version: false,
    trace: false,
    dialect: "arithmetic",
  };
  let expression: string | undefined;
  let positionalOnly = false;

  const valueOf = (i: number, flag: string): string => {
    const value = args[i + 1];
    if (value === undefined) {
      throw new CliUsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (positionalOnly) {
      if (expression !== undefined) {
        throw new CliUsageError("Too many arguments.");
      }
      expression = arg;
      continue;
    }

    switch (arg) {
      case "--":
        positionalOnly = true;
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--version":
      case "-v":
        options.version = true;
        break;
      case "--trace":
      case "-t":
        options.trace = true;
        break;
      case "--dialect":
      case "-d": {
        const value = valueOf(i++, arg);
        if (!isDialect(value)) {
          throw new CliUsageError(`Unknown dialect: ${value}`);
        }
        options.dialect = value;
        break;
      }
      case "--strategy":
      case "-s": {
        const value = valueOf(i++, arg);
        const strategy = Object.hasOwn(strategyNames, value)
          ? strategyNames[value]
          : undefined;
        if (strategy === undefined) {
          throw new CliUsageError(`Unknown strategy: ${value}`);
        }
        options.strategy = strategy;
        break;
      }
      case "--max-steps":
      case "-m": {
        const value = valueOf(i++, arg);
        const maxSteps = Number(value);
        if (!/^[1-9][0-9]*$/.test(value) || !Number.isSafeInteger(maxSteps)) {
          throw new CliUsageError(`Invalid step count: ${value}`);
        }
        options.maxSteps = maxSteps;
        break;
      }
      default:
        // Anything that is not exactly a flag is the expression: "--5".
        if (expression !== undefined) {
          throw new CliUsageError("Too many arguments.");
        }
        expression = arg;
        break;
    }
  }

  return { options, expression };
}

export function usage(): string {
  return `lambda ${VERSION}

Usage:
  lambda [options] <expression>

Options:
  -d, --dialect <lambda|arithmetic>   grammar and printing (default: arithmetic)
  -s, --strategy <eager|lazy>         reduction strategy (default: lazy for
                                      arithmetic, eager for lambda)
  -m, --max-steps <n>                 stop after n reduction steps
  -t, --trace                         print every intermediate term
  -h, --help                          show this help
  -v, --version                       show the version`;
}

const processIO: CliIO = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    console.error(line);
  },
  trace: (line) => {
    tkexport.terminal.cyan(`${line}\n`);
  },
};

/**
 * Runs the CLI and returns the process exit code: 0 when a normal form was
 * printed, 1 otherwise.
 */
export function runCli(args: readonly string[], io: CliIO = processIO): number {
  let parsed: ReturnType<typeof parseArgs>;
  try {
    parsed = parseArgs(args);
  } catch (e) {
    if (!(e instanceof CliUsageError)) throw e;
    io.stderr(e.message);
    io.stderr("Use --help for usage information.");
    return 1;
  }

  const { options, expression } = parsed;
  if (options.help) {
    io.stdout(usage());
    return 0;
  }
  if (options.version) {
    io.stdout(VERSION);
    return 0;
  }
  if (expression === undefined) {
    io.stderr("Missing expression. Use --help for usage information.");
    return 1;
  }

  const style = dialectStyle(options.dialect);
  const strategy = options.strategy ?? defaultStrategy(options.dialect);
  const result = interpret(expression, {
    dialect: options.dialect,
    strategy,
    maxSteps: options.maxSteps,
    onStep: options.trace
      ? (term, step) => io.trace(`${step}: ${linearize(term, style)}`)
      : undefined,
  });

  if (!result.ok) {
    io.stderr(`${result.kind}: ${result.message}`);
    return 1;
  }
  io.stdout(result.output);
  return 0;
}
