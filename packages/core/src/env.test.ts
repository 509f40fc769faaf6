/**
 * Tests for the run environment.
 */
import { afterEach, describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  clearCurrent,
  createEnvironment,
  getAndClearCurrent,
  getCurrent,
  hasCurrent,
  incReportCounter,
  setCurrent,
  testing,
  testingContextsStr,
  testingVarsStr,
  updateCurrent,
  updateCurrentIn,
} from "./env.js";
import { EngineStateError, NoActiveEnvironmentError } from "./errors.js";
import { asyncTest, isAsyncTest } from "./types.js";
import type { TestDef } from "./types.js";

afterEach(() => clearCurrent());

describe("createEnvironment", () => {
  it("starts with zero counters and empty stacks", () => {
    const env = createEnvironment();
    assert.deepEqual(env.reportCounters, { test: 0, pass: 0, fail: 0, error: 0 });
    assert.deepEqual(env.testingContexts, []);
    assert.deepEqual(env.testingVars, []);
    assert.equal(env.onceFixtures.size, 0);
    assert.equal(env.eachFixtures.size, 0);
    assert.equal(env.reporter, "default");
  });

  it("takes a reporter name", () => {
    assert.equal(createEnvironment({ reporter: "ci" }).reporter, "ci");
  });
});

describe("current environment", () => {
  it("throws NoActiveEnvironmentError when none is set", () => {
    assert.equal(hasCurrent(), false);
    assert.throws(() => getCurrent(), NoActiveEnvironmentError);
    assert.throws(
      () => updateCurrent(["testingContexts"], (c) => c),
      (e: unknown) => e instanceof EngineStateError && e.code === "E_NO_ENV"
    );
  });

  it("set, get and clear", () => {
    const env = createEnvironment();
    setCurrent(env);
    assert.equal(getCurrent(), env);
    assert.equal(getAndClearCurrent(), env);
    assert.equal(hasCurrent(), false);
  });

  it("updates functionally, leaving the earlier value untouched", () => {
    const env = createEnvironment();
    setCurrent(env);
    const next = updateCurrent(["testingContexts"], (c, label: string) => [...c, label], "outer");
    assert.deepEqual(next.testingContexts, ["outer"]);
    assert.deepEqual(env.testingContexts, []);
    assert.equal(getCurrent(), next);
  });

  it("updates a single counter through a two-level path", () => {
    const env = createEnvironment();
    setCurrent(env);
    const next = updateCurrentIn(["reportCounters", "fail"], (n, by: number) => n + by, 3);
    assert.deepEqual(next.reportCounters, { test: 0, pass: 0, fail: 3, error: 0 });
    assert.deepEqual(env.reportCounters, { test: 0, pass: 0, fail: 0, error: 0 });
  });

  it("increments report counters by name", () => {
    setCurrent(createEnvironment());
    incReportCounter("pass");
    incReportCounter("pass");
    incReportCounter("error");
    assert.deepEqual(getCurrent().reportCounters, { test: 0, pass: 2, fail: 0, error: 1 });
  });
});

describe("testing", () => {
  it("joins nested labels outermost first", () => {
    setCurrent(createEnvironment());
    let seen = "";
    testing("math", () => {
      testing("addition", () => {
        seen = testingContextsStr();
      });
    });
    assert.equal(seen, "math addition");
    assert.deepEqual(getCurrent().testingContexts, []);
  });

  it("pops the label when the body throws", () => {
    setCurrent(createEnvironment());
    assert.throws(
      () =>
        testing("boom", () => {
          throw new Error("inside");
        }),
      /inside/
    );
    assert.deepEqual(getCurrent().testingContexts, []);
  });

  it("keeps the label of an async body until done is called", () => {
    setCurrent(createEnvironment());
    const pending: { resume?: () => void } = {};
    const result = testing("later", () =>
      asyncTest((done) => {
        pending.resume = done;
      })
    );
    if (!isAsyncTest(result)) throw new Error("expected an async result");
    assert.deepEqual(getCurrent().testingContexts, ["later"]);

    let finished = false;
    result.run(() => {
      finished = true;
    });
    assert.deepEqual(getCurrent().testingContexts, ["later"]);
    pending.resume?.();
    assert.equal(finished, true);
    assert.deepEqual(getCurrent().testingContexts, []);
  });
});

describe("testingVarsStr", () => {
  it("names the running tests with the innermost line", () => {
    const outer: TestDef = { ns: "app.core", name: "outer", line: 3, order: 0, body: () => {} };
    const inner: TestDef = { ns: "app.core", name: "inner", line: 9, order: 1, body: () => {} };
    const env = { ...createEnvironment(), testingVars: [outer, inner] };
    assert.equal(testingVarsStr(env), "app.core/outer app.core/inner (line 9)");
    assert.equal(testingVarsStr(createEnvironment()), "");
  });
});
