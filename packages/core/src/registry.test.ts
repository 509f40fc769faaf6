/**
 * Tests for namespace registration.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { ConfigurationError } from "./errors.js";
import {
  allNamespaces,
  defineNamespace,
  findNamespace,
  removeNamespace,
  requireNamespace,
  sortedTests,
} from "./registry.js";
import { hasCurrent } from "./env.js";

function configError(code: string) {
  return (e: unknown) => e instanceof ConfigurationError && e.code === code;
}

describe("defineNamespace", () => {
  it("registers tests with declaration order as the default line", () => {
    const ns = defineNamespace("reg.defaults");
    ns.deftest("first", () => {});
    ns.deftest("second", () => {});
    const def = requireNamespace("reg.defaults");
    assert.deepEqual(
      def.tests.map((t) => [t.name, t.line, t.order]),
      [
        ["first", 1, 0],
        ["second", 2, 1],
      ]
    );
  });

  it("reopens an existing namespace", () => {
    defineNamespace("reg.reopen").deftest("a", () => {});
    defineNamespace("reg.reopen").deftest("b", () => {});
    assert.deepEqual(
      findNamespace("reg.reopen")?.tests.map((t) => t.name),
      ["a", "b"]
    );
  });

  it("sorts by line, breaking ties by declaration order", () => {
    const ns = defineNamespace("reg.sorted");
    ns.deftest("late", () => {}, { line: 30 });
    ns.deftest("early", () => {}, { line: 10 });
    ns.deftest("tie-a", () => {}, { line: 20 });
    ns.deftest("tie-b", () => {}, { line: 20 });
    assert.deepEqual(
      sortedTests(requireNamespace("reg.sorted")).map((t) => t.name),
      ["early", "tie-a", "tie-b", "late"]
    );
  });

  it("returns a callable that runs the single test", () => {
    let runs = 0;
    const t = defineNamespace("reg.callable").deftest("counted", () => {
      runs++;
    });
    t();
    assert.equal(runs, 1);
    assert.equal(t.test.name, "counted");
    assert.equal(hasCurrent(), false);
  });

  it("rejects duplicate test names", () => {
    const ns = defineNamespace("reg.duplicate");
    ns.deftest("same", () => {});
    assert.throws(() => ns.deftest("same", () => {}), configError("E_DUPLICATE_TEST"));
  });

  it("rejects empty names and bad options", () => {
    assert.throws(() => defineNamespace("  "), configError("E_BAD_DEFINITION"));
    const ns = defineNamespace("reg.invalid");
    assert.throws(() => ns.deftest("", () => {}), configError("E_BAD_DEFINITION"));
    assert.throws(
      () => ns.deftest("negative", () => {}, { line: -4 }),
      /Invalid options for test 'reg.invalid\/negative': line/
    );
  });

  it("rejects unknown fixture kinds", () => {
    const ns = defineNamespace("reg.fixtures");
    assert.throws(() => ns.useFixtures("sometimes", (f) => f()), configError("E_FIXTURE_KIND"));
  });

  it("stores fixtures and the namespace hook", () => {
    const once = (inner: () => void) => inner();
    const hook = () => undefined;
    defineNamespace("reg.stored").useFixtures("once", once).useFixtures("each").setTestNsHook(hook);
    const def = requireNamespace("reg.stored");
    assert.deepEqual(def.onceFixtures, [once]);
    assert.deepEqual(def.eachFixtures, []);
    assert.equal(def.hook, hook);
  });
});

describe("namespace lookup", () => {
  it("lists namespaces in registration order", () => {
    defineNamespace("reg.list-b");
    defineNamespace("reg.list-a");
    const names = allNamespaces();
    assert.ok(names.indexOf("reg.list-b") < names.indexOf("reg.list-a"));
  });

  it("raises for unknown namespaces", () => {
    assert.equal(findNamespace("reg.missing"), undefined);
    assert.throws(() => requireNamespace("reg.missing"), configError("E_UNKNOWN_NS"));
  });

  it("removes namespaces", () => {
    defineNamespace("reg.removed");
    assert.equal(removeNamespace("reg.removed"), true);
    assert.equal(findNamespace("reg.removed"), undefined);
  });
});
