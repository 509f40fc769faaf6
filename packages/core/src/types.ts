/**
 * Core nstest types: actions, blocks, tests, fixtures and report events.
 */

// --- Async continuation ---

/**
 * A test that finishes later. The scheduler calls `run` once with a `done`
 * callback; the test must call `done` exactly once after its assertions.
 */
export interface AsyncTest {
  readonly kind: "async";
  run(done: () => void): void;
}

export function asyncTest(run: (done: () => void) => void): AsyncTest {
  return Object.freeze({ kind: "async" as const, run });
}

export function isAsyncTest(value: unknown): value is AsyncTest {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "async" &&
    "run" in value &&
    typeof value.run === "function"
  );
}

// --- Blocks ---

/** What a test body (or a fixture around it) hands back. */
export type TestResult = void | AsyncTest;

export type ActionResult = TestResult | Block;

export type Action = () => ActionResult;

export interface Block {
  readonly kind: "block";
  readonly actions: readonly Action[];
}

export function block(actions: readonly Action[]): Block {
  return Object.freeze({ kind: "block" as const, actions: Object.freeze([...actions]) });
}

export function isBlock(value: unknown): value is Block {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "block" &&
    "actions" in value &&
    Array.isArray(value.actions)
  );
}

export function concatBlocks(...parts: (Block | readonly Action[])[]): Block {
  const actions: Action[] = [];
  for (const part of parts) {
    actions.push(...(isBlock(part) ? part.actions : part));
  }
  return block(actions);
}

// --- Tests ---

/** Bodies may also return a promise; it is adapted to an async test. */
export type TestBody = () => TestResult | PromiseLike<unknown>;

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

export interface TestDef {
  ns: string;
  name: string;
  /** Sort key within the namespace. Defaults to declaration order. */
  line: number;
  /** Declaration index, breaks ties between equal lines. */
  order: number;
  body: TestBody;
}

// --- Fixtures ---

/** Wraps `inner`; must call it once, directly or from a continuation. */
export type FixtureFn = (inner: () => TestResult) => TestResult;

export interface FixtureMap {
  before?: () => void;
  after?: () => void;
}

export type Fixture = FixtureFn | FixtureMap;

export type FixtureKind = "once" | "each";

/**
 * Replaces per-test enumeration of a namespace. Return a block (see
 * testVarsBlock) rather than calling tests directly, so async tests finish
 * before `end-test-ns`.
 */
export type TestNsHook = () => ActionResult;

// --- Report events ---

export interface ReportCounters {
  test: number;
  pass: number;
  fail: number;
  error: number;
}

export interface AssertionEventFields {
  message?: string;
  expected?: unknown;
  actual?: unknown;
  /** Active `testing` labels, outermost first. */
  context?: string;
  /** `ns/name (line N)` of the running test(s). */
  testVar?: string;
  file?: string;
  line?: number;
}

export type ReportEvent =
  | ({ type: "pass" } & AssertionEventFields)
  | ({ type: "fail" } & AssertionEventFields)
  | ({ type: "error" } & AssertionEventFields)
  | { type: "begin-test-ns"; ns: string }
  | { type: "end-test-ns"; ns: string }
  | { type: "end-test-vars"; tests: string[] }
  | { type: "end-test-all-vars"; ns: string }
  | ({ type: "summary" } & ReportCounters)
  | ({ type: "end-run-tests" } & ReportCounters);

export type ReportEventType = ReportEvent["type"];

export type EventOf<T extends ReportEventType> = Extract<ReportEvent, { type: T }>;

export type CounterEventType = "pass" | "fail" | "error";

export type RunSummary = EventOf<"summary">;
