#!/usr/bin/env node

/**
 * Lambda calculus reducer CLI.
 *
 * Evaluates one expression to normal form and prints it. See lib/cli.ts for
 * the options.
 */
import { runCli } from "../lib/cli.js";

process.exitCode = runCli(process.argv.slice(2));
