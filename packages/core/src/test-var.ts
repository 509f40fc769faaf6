/**
 * Test invocation: turns one registered test into the actions that run it.
 */
import {
  clearCurrent,
  createEnvironment,
  hasCurrent,
  pop,
  push,
  setCurrent,
  updateCurrent,
  updateCurrentIn,
} from "./env.js";
import { isAssertionFailure, isFatal } from "./errors.js";
import { report } from "./report.js";
import { runBlock } from "./scheduler.js";
import type { Action, AsyncTest, Block, TestBody, TestDef, TestResult } from "./types.js";
import { asyncTest, block, concatBlocks, isAsyncTest, isPromiseLike } from "./types.js";

export const UNCAUGHT_MESSAGE = "Uncaught exception, not in assertion.";

/** Report a value thrown out of a test body as `fail` or `error`. */
export function reportThrown(e: unknown): void {
  if (isFatal(e)) throw e;
  if (isAssertionFailure(e)) {
    report({
      type: "fail",
      message: typeof e.message === "string" ? e.message : undefined,
      expected: e.expected,
      actual: e.actual,
    });
    return;
  }
  report({ type: "error", message: UNCAUGHT_MESSAGE, expected: undefined, actual: e });
}

/**
 * Guard an async body so a synchronous throw from `run` is reported and the
 * run resumes instead of stalling.
 */
function isolateAsync(inner: AsyncTest): AsyncTest {
  return asyncTest((done) => {
    let called = false;
    try {
      inner.run(() => {
        called = true;
        done();
      });
    } catch (e) {
      reportThrown(e);
      if (!called) done();
    }
  });
}

/** Settles when `promise` does; a rejection is reported like a throw. */
export function fromPromise(promise: PromiseLike<unknown>): AsyncTest {
  return asyncTest((done) => {
    void Promise.resolve(promise).then(
      () => done(),
      (e: unknown) => {
        try {
          reportThrown(e);
        } finally {
          done();
        }
      }
    );
  });
}

/**
 * Invoke a test body, turning anything it throws into a report event.
 * Only an async result survives; other return values are ignored.
 */
export function invokeBody(body: TestBody): TestResult {
  let result: ReturnType<TestBody>;
  try {
    result = body();
  } catch (e) {
    reportThrown(e);
    return undefined;
  }
  if (isAsyncTest(result)) return isolateAsync(result);
  if (isPromiseLike(result)) return fromPromise(result);
  return undefined;
}

/**
 * The `test` counter is incremented before `body` (the fixture-wrapped test
 * body) runs, so a fixture that skips its inner thunk still counts.
 */
export function testVarBlock(test: TestDef, body: TestBody = test.body): Block {
  const actions: Action[] = [
    () => {
      updateCurrent(["testingVars"], (vars) => push(vars, test));
      updateCurrentIn(["reportCounters", "test"], (n) => n + 1);
      return invokeBody(body);
    },
    () => {
      updateCurrent(["testingVars"], (vars) => pop(vars));
    },
  ];
  return block(actions);
}

/**
 * Run a single test. Without an active environment one is created for the
 * test and cleared when it completes.
 */
export function testVar(test: TestDef): void {
  const owned = !hasCurrent();
  if (owned) setCurrent(createEnvironment());
  runBlock(
    concatBlocks(testVarBlock(test), [
      () => {
        if (owned) clearCurrent();
      },
    ])
  );
}
