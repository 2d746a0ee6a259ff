/**
 * Fresh variable names for alpha-renaming.
 *
 * @module
 */

const FRESH_PREFIX = "Var";

/**
 * Returns the first of `Var1`, `Var2`, ... that is not in `avoid`.
 *
 * The result depends only on `avoid`, so renaming is reproducible across
 * runs and independent of what was evaluated before.
 */
export function freshVar(avoid: ReadonlySet<string>): string {
  let counter = 1;
  while (avoid.has(`${FRESH_PREFIX}${counter}`)) {
    counter++;
  }
  return `${FRESH_PREFIX}${counter}`;
}
