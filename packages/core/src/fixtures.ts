/**
 * Fixture pipeline.
 *
 * Function fixtures wrap execution: once-fixtures wrap a namespace's whole
 * test block, each-fixtures wrap every test body. Map fixtures contribute
 * plain `before`/`after` actions instead. The two styles cannot be mixed in
 * one namespace.
 */
import { ConfigurationError } from "./errors.js";
import { report } from "./report.js";
import { completionResult, startBlock } from "./scheduler.js";
import type { BlockCompletion } from "./scheduler.js";
import { invokeBody, reportThrown, testVarBlock } from "./test-var.js";
import type {
  Action,
  Block,
  Fixture,
  FixtureFn,
  FixtureKind,
  FixtureMap,
  TestBody,
  TestDef,
  TestResult,
} from "./types.js";
import { asyncTest, concatBlocks, isAsyncTest } from "./types.js";

export const FIXTURE_KINDS: readonly FixtureKind[] = ["once", "each"];

export function isFixtureKind(value: unknown): value is FixtureKind {
  return value === "once" || value === "each";
}

export function assertFixtureKind(value: unknown): FixtureKind {
  if (!isFixtureKind(value)) {
    throw new ConfigurationError(
      "E_FIXTURE_KIND",
      `First argument to useFixtures must be 'once' or 'each', got '${String(value)}'.`,
      { kind: value }
    );
  }
  return value;
}

export const defaultFixture: FixtureFn = (inner) => inner();

export function composeFixtures(f1: FixtureFn, f2: FixtureFn): FixtureFn {
  return (inner) => f1(() => f2(inner));
}

/** Outer fixtures first: `joinFixtures([a, b])` runs a(b(inner)). */
export function joinFixtures(fixtures: readonly FixtureFn[]): FixtureFn {
  return fixtures.reduce(composeFixtures, defaultFixture);
}

/**
 * Run `fn` once `result` has completed: immediately for a synchronous
 * result, from the `done` callback for an async one. Meant for teardown in
 * function fixtures.
 */
export function afterResult(result: TestResult, fn: () => void): TestResult {
  if (!isAsyncTest(result)) {
    fn();
    return undefined;
  }
  const pending = result;
  return asyncTest((done) => {
    pending.run(() => {
      fn();
      done();
    });
  });
}

export type ExecutionStrategy = "fn" | "map";

type FixtureStyle = "none" | ExecutionStrategy | "mixed";

function styleOf(fixtures: readonly Fixture[]): FixtureStyle {
  if (fixtures.length === 0) return "none";
  if (fixtures.every((f) => typeof f === "function")) return "fn";
  if (fixtures.every((f) => typeof f !== "function")) return "map";
  return "mixed";
}

export function executionStrategy(
  once: readonly Fixture[],
  each: readonly Fixture[]
): ExecutionStrategy {
  const styles = [styleOf(once), styleOf(each)].filter((s) => s !== "none");
  if (styles.includes("mixed")) {
    throw new ConfigurationError("E_FIXTURE_MIXED", "Fixtures may not be of mixed types.");
  }
  const [first, second] = styles;
  if (second !== undefined && second !== first) {
    throw new ConfigurationError(
      "E_FIXTURE_MIXED",
      "Fixtures specified in 'once' and 'each' must be of the same type."
    );
  }
  return first === "map" ? "map" : "fn";
}

function fixtureFns(fixtures: readonly Fixture[]): FixtureFn[] {
  return fixtures.filter((f): f is FixtureFn => typeof f === "function");
}

function fixtureMaps(fixtures: readonly Fixture[]): FixtureMap[] {
  return fixtures.filter((f): f is FixtureMap => typeof f !== "function");
}

function wrapMapFixtures(fixtures: readonly Fixture[], inner: Block): Block {
  const maps = fixtureMaps(fixtures);
  const before: Action[] = [];
  const after: Action[] = [];
  for (const m of maps) {
    if (m.before) before.push(m.before);
    if (m.after) after.push(m.after);
  }
  return concatBlocks(before, inner, after.reverse());
}

export const DROPPED_ASYNC_MESSAGE =
  "Async test result dropped by fixture; use afterResult or map fixtures.";

/**
 * `body` under an each-fixture. An async result from `inner()` that the
 * fixture does not return would never run, so it is reported as an error.
 */
function underEachFixture(fixture: FixtureFn, body: TestBody): TestBody {
  return () => {
    const seen: { inner?: TestResult } = {};
    const outer = fixture(() => {
      seen.inner = invokeBody(body);
      return seen.inner;
    });
    if (isAsyncTest(seen.inner) && !isAsyncTest(outer)) {
      report({
        type: "error",
        message: DROPPED_ASYNC_MESSAGE,
        expected: "async result returned by fixture",
        actual: outer,
      });
    }
    return outer;
  };
}

/** Completes once the fixture's own result and the block it started are both done. */
function afterBoth(outer: TestResult, started: BlockCompletion | undefined): TestResult {
  const innerPending = started !== undefined && !started.finished;
  if (!isAsyncTest(outer) && !innerPending) return undefined;
  return asyncTest((done) => {
    let resumed = false;
    const afterOuter = () => {
      if (resumed) return;
      resumed = true;
      if (started) started.whenFinished(done);
      else done();
    };
    if (!isAsyncTest(outer)) {
      afterOuter();
      return;
    }
    try {
      outer.run(afterOuter);
    } catch (e) {
      reportThrown(e);
      afterOuter();
    }
  });
}

/**
 * The namespace's tests under a once-fixture. Whatever the fixture throws or
 * returns, the action does not complete before the tests it started.
 */
function underOnceFixture(fixture: FixtureFn, inner: Block): Action {
  return () => {
    const box: { started?: BlockCompletion } = {};
    let outer: TestResult;
    try {
      outer = fixture(() => {
        const started = startBlock(inner);
        box.started = started;
        return completionResult(started);
      });
    } catch (e) {
      reportThrown(e);
      outer = undefined;
    }
    return afterBoth(outer, box.started);
  };
}

/**
 * Build the block that runs `tests` (already in execution order) under the
 * given fixtures.
 */
export function fixtureBlock(
  tests: readonly TestDef[],
  once: readonly Fixture[],
  each: readonly Fixture[]
): Block {
  if (executionStrategy(once, each) === "map") {
    const perTest = tests.map((t) => wrapMapFixtures(each, testVarBlock(t)));
    return wrapMapFixtures(once, concatBlocks(...perTest));
  }

  const eachFixture = joinFixtures(fixtureFns(each));
  const onceFixture = joinFixtures(fixtureFns(once));
  const inner = concatBlocks(
    ...tests.map((t) => testVarBlock(t, underEachFixture(eachFixture, t.body)))
  );
  return concatBlocks([underOnceFixture(onceFixture, inner)]);
}
