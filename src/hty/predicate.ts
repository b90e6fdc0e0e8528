/**
 * @file Relational predicates over a single float column
 *
 * Ordering operators compare directly. `=` and `!=` compare within an
 * absolute tolerance because values went through a float32 conversion.
 */
import { InvalidPredicateOperatorError } from "./errors";

export type Operator = ">" | ">=" | "<" | "<=" | "=" | "!=";

export const OPERATORS: readonly Operator[] = [">", ">=", "<", "<=", "=", "!="];

/** Accepted spellings; `==` is an alias of `=`. */
const SPELLINGS: Readonly<Record<string, Operator>> = {
  ">": ">",
  ">=": ">=",
  "<": "<",
  "<=": "<=",
  "=": "=",
  "==": "=",
  "!=": "!=",
};

/** Parse an operator token. Throws InvalidPredicateOperatorError for anything else. */
export function parseOperator(token: string): Operator {
  const op = Object.prototype.hasOwnProperty.call(SPELLINGS, token) ? SPELLINGS[token] : undefined;
  if (!op) {
    throw new InvalidPredicateOperatorError(token);
  }
  return op;
}

export type ValuePredicate = (value: number) => boolean;

/** Compile `value <op> threshold` into a predicate. */
export function compilePredicate(op: Operator, threshold: number, tolerance: number): ValuePredicate {
  switch (op) {
    case ">":
      return (v) => v > threshold;
    case ">=":
      return (v) => v >= threshold;
    case "<":
      return (v) => v < threshold;
    case "<=":
      return (v) => v <= threshold;
    case "=":
      return (v) => Math.abs(v - threshold) < tolerance;
    case "!=":
      return (v) => Math.abs(v - threshold) >= tolerance;
  }
}
