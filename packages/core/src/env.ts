/**
 * Run environment: the mutable, run-scoped state of a test run.
 *
 * Environment values are never mutated; every update builds a new value and
 * stores it in the ambient slot. Only one run may use the slot at a time.
 * Runs that need independent state pass their own environment to the run
 * entry points, which install it when they start.
 */
import { NoActiveEnvironmentError } from "./errors.js";
import type { Fixture, ReportCounters, TestDef, TestResult } from "./types.js";
import { asyncTest, isAsyncTest } from "./types.js";

export const DEFAULT_REPORTER = "default";

export interface RunEnvironment {
  testingContexts: readonly string[];
  testingVars: readonly TestDef[];
  reportCounters: ReportCounters;
  onceFixtures: ReadonlyMap<string, readonly Fixture[]>;
  eachFixtures: ReadonlyMap<string, readonly Fixture[]>;
  reporter: string;
}

export interface EnvironmentOptions {
  reporter?: string;
}

export function emptyCounters(): ReportCounters {
  return { test: 0, pass: 0, fail: 0, error: 0 };
}

export function createEnvironment(options: EnvironmentOptions = {}): RunEnvironment {
  return {
    testingContexts: [],
    testingVars: [],
    reportCounters: emptyCounters(),
    onceFixtures: new Map(),
    eachFixtures: new Map(),
    reporter: options.reporter ?? DEFAULT_REPORTER,
  };
}

let current: RunEnvironment | null = null;

export function setCurrent(env: RunEnvironment): void {
  current = env;
}

export function hasCurrent(): boolean {
  return current !== null;
}

export function getCurrent(): RunEnvironment {
  if (current === null) throw new NoActiveEnvironmentError("getCurrent");
  return current;
}

export function clearCurrent(): void {
  current = null;
}

export function getAndClearCurrent(): RunEnvironment {
  const env = getCurrent();
  clearCurrent();
  return env;
}

/**
 * Apply `fn` to the value at `path` and store the result.
 * Returns the new environment.
 */
export function updateCurrent<K extends keyof RunEnvironment, A extends unknown[]>(
  path: readonly [K],
  fn: (value: RunEnvironment[K], ...args: A) => RunEnvironment[K],
  ...args: A
): RunEnvironment {
  if (current === null) throw new NoActiveEnvironmentError("updateCurrent");
  const env = current;
  const [key] = path;
  const next: RunEnvironment = { ...env };
  next[key] = fn(env[key], ...args);
  current = next;
  return next;
}

/**
 * Two-level form of updateCurrent for the counters record:
 * `updateCurrentIn(["reportCounters", "test"], (n) => n + 1)`.
 */
export function updateCurrentIn<C extends keyof ReportCounters, A extends unknown[]>(
  path: readonly ["reportCounters", C],
  fn: (value: ReportCounters[C], ...args: A) => ReportCounters[C],
  ...args: A
): RunEnvironment {
  const [key, field] = path;
  return updateCurrent([key], (counters) => ({
    ...counters,
    [field]: fn(counters[field], ...args),
  }));
}

export function incReportCounter(name: keyof ReportCounters): void {
  updateCurrentIn(["reportCounters", name], (n) => n + 1);
}

// --- Stacks ---

export function push<T>(stack: readonly T[], item: T): readonly T[] {
  return [...stack, item];
}

export function pop<T>(stack: readonly T[]): readonly T[] {
  return stack.slice(0, -1);
}

export function testingContextsStr(env: RunEnvironment = getCurrent()): string {
  return env.testingContexts.join(" ");
}

export function testName(test: TestDef): string {
  return `${test.ns}/${test.name}`;
}

/** `ns/outer ns/inner (line N)`: the running tests, outermost first. */
export function testingVarsStr(env: RunEnvironment = getCurrent()): string {
  const vars = env.testingVars;
  if (vars.length === 0) return "";
  const innermost = vars[vars.length - 1];
  return `${vars.map(testName).join(" ")} (line ${innermost.line})`;
}

/**
 * Add a label to the testing contexts while `body` runs. The label is removed
 * on every exit path; an async body keeps it until its `done` is called.
 */
export function testing(label: string, body: () => TestResult): TestResult {
  updateCurrent(["testingContexts"], (contexts) => push(contexts, label));
  let result: TestResult;
  try {
    result = body();
  } catch (e) {
    updateCurrent(["testingContexts"], (contexts) => pop(contexts));
    throw e;
  }
  if (!isAsyncTest(result)) {
    updateCurrent(["testingContexts"], (contexts) => pop(contexts));
    return result;
  }
  const inner = result;
  return asyncTest((done) => {
    let popped = false;
    const finish = () => {
      if (popped) return;
      popped = true;
      updateCurrent(["testingContexts"], (contexts) => pop(contexts));
    };
    try {
      inner.run(() => {
        finish();
        done();
      });
    } catch (e) {
      finish();
      throw e;
    }
  });
}
