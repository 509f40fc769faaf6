/**
 * nstest namespace registry.
 *
 * Tests are registered explicitly when a suite module loads; the runner reads
 * namespaces, their tests, fixtures and hook from here.
 */
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { assertFixtureKind } from "./fixtures.js";
import { testVar } from "./test-var.js";
import type { Fixture, TestBody, TestDef, TestNsHook } from "./types.js";

export interface NamespaceDef {
  name: string;
  tests: TestDef[];
  onceFixtures: Fixture[];
  eachFixtures: Fixture[];
  hook?: TestNsHook;
}

/** A registered test; calling it runs just that test. */
export interface TestFn {
  (): void;
  readonly test: TestDef;
}

export interface DeftestOptions {
  line?: number;
}

const nameSchema = z
  .string({ invalid_type_error: "name must be a string" })
  .trim()
  .min(1, "name must not be empty");

const deftestOptionsSchema = z
  .object({
    line: z.number().int().positive().optional(),
  })
  .strict();

const namespaces = new Map<string, NamespaceDef>();

function parseName(raw: unknown, what: string): string {
  const parsed = nameSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      "E_BAD_DEFINITION",
      `Invalid ${what} ${JSON.stringify(raw)}: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      { [what]: raw }
    );
  }
  return parsed.data;
}

export class NamespaceBuilder {
  readonly def: NamespaceDef;

  constructor(def: NamespaceDef) {
    this.def = def;
  }

  get name(): string {
    return this.def.name;
  }

  deftest(name: string, body: TestBody, options: DeftestOptions = {}): TestFn {
    const testName = parseName(name, "test name");
    const opts = deftestOptionsSchema.safeParse(options);
    if (!opts.success) {
      const issue = opts.error.issues[0];
      throw new ConfigurationError(
        "E_BAD_DEFINITION",
        `Invalid options for test '${this.def.name}/${testName}': ${issue?.path.join(".") || "options"} ${issue?.message ?? "invalid"}`,
        { test: testName }
      );
    }
    if (typeof body !== "function") {
      throw new ConfigurationError(
        "E_BAD_DEFINITION",
        `Test '${this.def.name}/${testName}' must have a function body.`,
        { test: testName }
      );
    }
    if (this.def.tests.some((t) => t.name === testName)) {
      throw new ConfigurationError(
        "E_DUPLICATE_TEST",
        `Test '${testName}' is already defined in namespace '${this.def.name}'.`,
        { ns: this.def.name, test: testName }
      );
    }

    const order = this.def.tests.length;
    const test: TestDef = {
      ns: this.def.name,
      name: testName,
      line: opts.data.line ?? order + 1,
      order,
      body,
    };
    this.def.tests.push(test);
    return Object.assign(() => testVar(test), { test });
  }

  /** Register fixtures; repeated calls for a kind replace the earlier list. */
  useFixtures(kind: string, ...fixtures: Fixture[]): this {
    const k = assertFixtureKind(kind);
    for (const f of fixtures) {
      if (typeof f !== "function" && (typeof f !== "object" || f === null)) {
        throw new ConfigurationError(
          "E_BAD_DEFINITION",
          `Fixtures must be functions or { before, after } maps.`,
          { ns: this.def.name }
        );
      }
    }
    if (k === "once") {
      this.def.onceFixtures = [...fixtures];
    } else {
      this.def.eachFixtures = [...fixtures];
    }
    return this;
  }

  /** Replace per-test enumeration of this namespace with `hook`. */
  setTestNsHook(hook: TestNsHook): this {
    this.def.hook = hook;
    return this;
  }
}

/**
 * Create (or reopen) the namespace `name`.
 */
export function defineNamespace(name: string): NamespaceBuilder {
  const nsName = parseName(name, "namespace name");
  let def = namespaces.get(nsName);
  if (!def) {
    def = { name: nsName, tests: [], onceFixtures: [], eachFixtures: [] };
    namespaces.set(nsName, def);
  }
  return new NamespaceBuilder(def);
}

export function findNamespace(name: string): NamespaceDef | undefined {
  return namespaces.get(name);
}

export function requireNamespace(name: string): NamespaceDef {
  const def = namespaces.get(name);
  if (!def) {
    throw new ConfigurationError("E_UNKNOWN_NS", `Namespace ${name} does not exist.`, { ns: name });
  }
  return def;
}

/** Registered namespace names, in registration order. */
export function allNamespaces(): string[] {
  return [...namespaces.keys()];
}

export function removeNamespace(name: string): boolean {
  return namespaces.delete(name);
}

/** Execution order: ascending line, ties by declaration order. */
export function sortedTests(def: NamespaceDef): TestDef[] {
  return [...def.tests].sort((a, b) => a.line - b.line || a.order - b.order);
}
