/**
 * Reduction strategies.
 *
 * - `eager`: normal order. Always the leftmost-outermost redex, including
 *   inside abstraction bodies and application arguments.
 * - `lazy-no-binder`: call-by-name. Arguments are substituted unevaluated,
 *   abstraction bodies are never entered and the search stops at an
 *   application whose function part has no redex.
 *
 * @module
 */
export type Strategy = "eager" | "lazy-no-binder";

export const STRATEGIES: readonly Strategy[] = ["eager", "lazy-no-binder"];

export const reducesUnderBinders = (strategy: Strategy): boolean =>
  strategy === "eager";
