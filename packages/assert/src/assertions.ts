/**
 * Assertions that report into the current run.
 *
 * Each call emits exactly one `pass`, `fail` or `error` event. Only `check`
 * throws: it aborts the test body with an AssertionFailure, which the test
 * invocation reports as `fail`.
 */
import { isDeepStrictEqual } from "node:util";
import { AssertionFailure, ConfigurationError, report } from "@nstest/core";
import { describeMismatch, findSubsetMismatch, formatValue } from "./subset.js";

export type ErrorClass<E> = abstract new (...args: never[]) => E;

function reportResult(ok: boolean, message: string | undefined, expected: unknown, actual: unknown): void {
  report({ type: ok ? "pass" : "fail", message, expected, actual });
}

function reportError(message: string | undefined, expected: unknown, actual: unknown): void {
  report({ type: "error", message, expected, actual });
}

/** Passes when `value` is truthy. Returns `value`. */
export function is<T>(value: T, message?: string): T {
  reportResult(Boolean(value), message, "truthy", value);
  return value;
}

export function isEqual(expected: unknown, actual: unknown, message?: string): boolean {
  const ok = isDeepStrictEqual(actual, expected);
  reportResult(ok, message, expected, actual);
  return ok;
}

/**
 * Passes when `actual` contains `subset` (object keys, array prefixes). A
 * failure carries the expected and actual values at the first mismatching path.
 */
export function isSubset(actual: unknown, subset: unknown, message?: string): boolean {
  const mismatch = findSubsetMismatch(actual, subset);
  if (mismatch === null) {
    reportResult(true, message, subset, actual);
    return true;
  }
  reportResult(false, joinMessage(message, describeMismatch(mismatch)), mismatch.expected, mismatch.actual);
  return false;
}

function joinMessage(message: string | undefined, detail: string): string {
  return message ? `${message}: ${detail}` : detail;
}

/**
 * Evaluate `predicate`; a truthy result passes, a falsy one fails, and a
 * throw is reported as `error`.
 */
export function tryExpr(predicate: () => unknown, message?: string): unknown {
  let value: unknown;
  try {
    value = predicate();
  } catch (e) {
    reportError(message, "predicate to complete", e);
    return undefined;
  }
  return is(value, message);
}

/**
 * Passes when `fn` throws an instance of `errorClass`, and returns it.
 * Fails when nothing is thrown; anything else thrown is an `error`.
 */
export function isThrown<E>(errorClass: ErrorClass<E>, fn: () => unknown, message?: string): E | undefined {
  const expected = `thrown ${errorClass.name}`;
  let returned: unknown;
  try {
    returned = fn();
  } catch (e) {
    if (e instanceof errorClass) {
      reportResult(true, message, expected, e);
      return e;
    }
    reportError(message, expected, e);
    return undefined;
  }
  reportResult(false, message, expected, returned);
  return undefined;
}

/**
 * Like isThrown, and the thrown error's message must match `re`.
 */
export function isThrownWithMsg<E extends Error>(
  errorClass: ErrorClass<E>,
  re: RegExp,
  fn: () => unknown,
  message?: string
): E | undefined {
  const expected = `thrown ${errorClass.name} matching ${String(re)}`;
  let returned: unknown;
  try {
    returned = fn();
  } catch (e) {
    if (e instanceof errorClass) {
      const matched = new RegExp(re.source, re.flags.replace(/[gy]/g, "")).test(e.message);
      reportResult(matched, message, expected, e);
      return e;
    }
    reportError(message, expected, e);
    return undefined;
  }
  reportResult(false, message, expected, returned);
  return undefined;
}

/**
 * Template assertions: `template` is applied to successive groups of
 * `arity` values, each result checked like `tryExpr`.
 *
 *   are(2, (x, y) => x === y, 2, 1 + 1, 4, 2 * 2)
 */
export function are(arity: number, template: (...args: unknown[]) => unknown, ...values: unknown[]): void {
  const emptyTemplate = arity === 0 && values.length === 0;
  const wellFormed =
    Number.isInteger(arity) && arity > 0 && values.length > 0 && values.length % arity === 0;
  if (!emptyTemplate && !wellFormed) {
    throw new ConfigurationError(
      "E_ARE_ARITY",
      "The number of args doesn't match are's argv.",
      { arity, values: values.length }
    );
  }
  for (let i = 0; i < values.length; i += arity) {
    const args = values.slice(i, i + arity);
    tryExpr(() => template(...args), `are ${formatValue(args)}`);
  }
}

/**
 * Abort the current test body unless `condition` holds.
 */
export function check(condition: unknown, message = "check failed", expected: unknown = true): asserts condition {
  if (!condition) {
    throw new AssertionFailure(message, expected, condition);
  }
}
