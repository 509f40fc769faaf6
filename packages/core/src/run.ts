/**
 * Namespace and run composition: the blocks that run a namespace, a list of
 * namespaces, or every registered namespace, and the summary that follows.
 */
import {
  clearCurrent,
  createEnvironment,
  emptyCounters,
  getAndClearCurrent,
  getCurrent,
  hasCurrent,
  setCurrent,
  testName,
  updateCurrent,
} from "./env.js";
import type { RunEnvironment } from "./env.js";
import { fixtureBlock } from "./fixtures.js";
import { getLogger } from "./logger.js";
import { allNamespaces, requireNamespace, sortedTests } from "./registry.js";
import { report } from "./report.js";
import { runBlock } from "./scheduler.js";
import type { Action, Block, ReportCounters, RunSummary, TestDef } from "./types.js";
import { block, concatBlocks } from "./types.js";

export function mergeCounters(a: ReportCounters, b: ReportCounters): ReportCounters {
  return {
    test: a.test + b.test,
    pass: a.pass + b.pass,
    fail: a.fail + b.fail,
    error: a.error + b.error,
  };
}

export function successful(summary: Partial<ReportCounters>): boolean {
  return (summary.fail ?? 0) === 0 && (summary.error ?? 0) === 0;
}

function groupByNs(tests: readonly TestDef[]): Map<string, TestDef[]> {
  const groups = new Map<string, TestDef[]>();
  for (const t of tests) {
    const group = groups.get(t.ns);
    if (group) group.push(t);
    else groups.set(t.ns, [t]);
  }
  return groups;
}

/**
 * Run `tests` grouped by namespace, applying each namespace's fixtures as
 * found in the current environment when the group starts.
 */
export function testVarsBlock(tests: readonly TestDef[]): Block {
  const actions: Action[] = [];
  for (const [ns, group] of groupByNs(tests)) {
    actions.push(() => {
      const env = getCurrent();
      return fixtureBlock(
        group,
        env.onceFixtures.get(ns) ?? [],
        env.eachFixtures.get(ns) ?? []
      );
    });
  }
  return block(actions);
}

/** Run `tests` and report `end-test-vars`. Uses a fresh environment if none is active. */
export function testVars(tests: readonly TestDef[]): void {
  const owned = !hasCurrent();
  if (owned) setCurrent(createEnvironment());
  runBlock(
    concatBlocks(testVarsBlock(tests), [
      () => report({ type: "end-test-vars", tests: tests.map(testName) }),
      () => {
        if (owned) clearCurrent();
      },
    ])
  );
}

/**
 * Every test of `ns` in line order, with the namespace's registered fixtures
 * installed into the current environment first.
 *
 * The environment is looked up when the block's first action runs, not when
 * the block is built: a block composed while no environment is active still
 * uses whichever one is current at run time. Only when none is current then
 * does the block create its own and clear it after the last test.
 */
export function testAllVarsBlock(ns: string): Block {
  const def = requireNamespace(ns);
  let owned = false;
  return concatBlocks(
    [
      () => {
        if (!hasCurrent()) {
          owned = true;
          setCurrent(createEnvironment());
        }
        if (def.onceFixtures.length > 0) {
          updateCurrent(["onceFixtures"], (m) => new Map(m).set(ns, def.onceFixtures));
        }
        if (def.eachFixtures.length > 0) {
          updateCurrent(["eachFixtures"], (m) => new Map(m).set(ns, def.eachFixtures));
        }
      },
    ],
    testVarsBlock(sortedTests(def)),
    [
      () => {
        if (owned) clearCurrent();
      },
    ]
  );
}

/** Run every test of `ns` and report `end-test-all-vars`. Uses a fresh environment if none is active. */
export function testAllVars(ns: string): void {
  const owned = !hasCurrent();
  if (owned) setCurrent(createEnvironment());
  runBlock(
    concatBlocks(testAllVarsBlock(ns), [
      () => report({ type: "end-test-all-vars", ns }),
      () => {
        if (owned) clearCurrent();
      },
    ])
  );
}

/**
 * Install `env`, report `begin-test-ns`, run the namespace hook or every
 * test, report `end-test-ns`. Leaves the environment in place so the caller
 * can collect its counters.
 */
export function testNsBlock(env: RunEnvironment, ns: string): Block {
  const def = requireNamespace(ns);
  return block([
    () => {
      setCurrent(env);
      getLogger().debug({ ns }, "testing namespace");
      report({ type: "begin-test-ns", ns });
      if (def.hook) return def.hook();
      return testAllVarsBlock(ns);
    },
    () => report({ type: "end-test-ns", ns }),
  ]);
}

export function testNs(ns: string, env: RunEnvironment = createEnvironment()): Promise<ReportCounters> {
  let counters: ReportCounters = emptyCounters();
  return settleAfter(
    concatBlocks(testNsBlock(env, ns), [
      () => {
        counters = getAndClearCurrent().reportCounters;
      },
    ]),
    () => counters
  );
}

/**
 * One block running `namespaces` in order, folding each namespace's
 * counters into the summary, then reporting `summary` and `end-run-tests`.
 * Unknown namespaces fail here, before anything runs.
 */
export function runTestsBlock(
  env: RunEnvironment,
  namespaces: readonly string[],
  onSummary?: (summary: RunSummary) => void
): Block {
  for (const ns of namespaces) requireNamespace(ns);
  const unique = [...new Set(namespaces)];
  if (unique.length !== namespaces.length) {
    getLogger().debug({ namespaces: [...namespaces] }, "ignoring repeated namespaces");
  }

  let totals: ReportCounters = emptyCounters();
  const parts = unique.map((ns) =>
    concatBlocks(testNsBlock(env, ns), [
      () => {
        totals = mergeCounters(totals, getAndClearCurrent().reportCounters);
      },
    ])
  );

  return concatBlocks(...parts, [
    () => {
      setCurrent(env);
      const summary: RunSummary = { type: "summary", ...totals };
      report(summary);
      report({ ...totals, type: "end-run-tests" });
      clearCurrent();
      onSummary?.(summary);
    },
  ]);
}

function settleAfter<T>(work: Block, value: () => T): Promise<T> {
  let settle: ((v: T) => void) | undefined;
  const done = new Promise<T>((resolve) => {
    settle = resolve;
  });
  runBlock(work, { onComplete: () => settle?.(value()) });
  return done;
}

/**
 * Run `namespaces` in the given order. Resolves with the summary after
 * `end-run-tests` has been reported; configuration and engine state errors
 * are thrown synchronously.
 */
export function runTests(
  namespaces: readonly string[],
  env: RunEnvironment = createEnvironment()
): Promise<RunSummary> {
  let summary: RunSummary = { type: "summary", ...emptyCounters() };
  return settleAfter(
    runTestsBlock(env, namespaces, (s) => {
      summary = s;
    }),
    () => summary
  );
}

/** Run every registered namespace whose whole name matches `pattern`. */
export function runAllTests(
  pattern?: RegExp | null,
  env: RunEnvironment = createEnvironment()
): Promise<RunSummary> {
  const names = allNamespaces().filter((ns) => !pattern || fullMatch(pattern, ns));
  return runTests(names, env);
}

function fullMatch(pattern: RegExp, text: string): boolean {
  const flags = pattern.flags.replace(/[gy]/g, "");
  return new RegExp(`^(?:${pattern.source})$`, flags).test(text);
}
