/**
 * Tests for the runner configuration loader.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  DEFAULT_CONFIG,
  PROJECT_CONFIG_FILE,
  environmentFromConfig,
  loadConfig,
  parseConfig,
  resolveConfig,
  selectNamespaces,
} from "./config.js";
import { ConfigurationError } from "./errors.js";

function withTmpDir(fn: (dir: string) => void): void {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "nstest-config-"));
  try {
    fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true });
  }
}

function writeJson(file: string, data: unknown): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(data));
}

describe("resolveConfig", () => {
  it("falls back to defaults when no config files exist", () => {
    withTmpDir((dir) => {
      const resolved = resolveConfig(dir, dir);
      assert.equal(resolved.source, "default");
      assert.equal(resolved.path, null);
      assert.deepEqual(resolved.config, DEFAULT_CONFIG);
    });
  });

  it("loads the project config", () => {
    withTmpDir((dir) => {
      const file = path.join(dir, PROJECT_CONFIG_FILE);
      writeJson(file, { reporter: "dots", include: "app\\..*", logLevel: "debug" });
      const resolved = resolveConfig(dir, dir);
      assert.equal(resolved.source, "project");
      assert.equal(resolved.path, file);
      assert.deepEqual(resolved.config, {
        version: 1,
        reporter: "dots",
        include: "app\\..*",
        logLevel: "debug",
      });
    });
  });

  it("uses the user config when the project has none", () => {
    withTmpDir((dir) => {
      const home = path.join(dir, "home");
      const project = path.join(dir, "project");
      fs.mkdirSync(project);
      writeJson(path.join(home, ".nstest", "config.json"), { reporter: "quiet" });
      const resolved = resolveConfig(project, home);
      assert.equal(resolved.source, "user");
      assert.equal(resolved.config.reporter, "quiet");
    });
  });

  it("prefers the project config over the user config", () => {
    withTmpDir((dir) => {
      writeJson(path.join(dir, ".nstest", "config.json"), { reporter: "user" });
      writeJson(path.join(dir, PROJECT_CONFIG_FILE), { reporter: "project" });
      assert.equal(loadConfig(dir, dir).reporter, "project");
    });
  });

  it("raises on malformed JSON", () => {
    withTmpDir((dir) => {
      fs.writeFileSync(path.join(dir, PROJECT_CONFIG_FILE), "not valid json{{{");
      assert.throws(
        () => resolveConfig(dir, dir),
        (e: unknown) =>
          e instanceof ConfigurationError &&
          e.code === "E_CONFIG" &&
          e.message.startsWith("Cannot read config ")
      );
    });
  });
});

describe("parseConfig", () => {
  it("fills in defaults", () => {
    assert.deepEqual(parseConfig({}, "inline"), { version: 1, reporter: "default" });
  });

  it("rejects an unsupported version", () => {
    assert.throws(() => parseConfig({ version: 2 }, "inline"), /Invalid config inline: 'version'/);
  });

  it("rejects unknown keys", () => {
    assert.throws(() => parseConfig({ reporters: "x" }, "inline"), /Unrecognized key/);
  });

  it("rejects invalid patterns", () => {
    assert.throws(
      () => parseConfig({ include: "(" }, "inline"),
      /^ConfigurationError: Invalid config inline: 'include' must be a valid regular expression$/
    );
  });

  it("rejects unknown log levels", () => {
    assert.throws(
      () => parseConfig({ logLevel: "loud" }, "inline"),
      /'logLevel' must be one of debug, info, warn, error, silent/
    );
  });

  it("rejects values that are not objects", () => {
    assert.throws(() => parseConfig("just a string", "inline"), ConfigurationError);
  });
});

describe("selectNamespaces", () => {
  const names = ["app.core", "app.core.slow", "app.io", "lib.util"];

  it("keeps everything without filters", () => {
    assert.deepEqual(selectNamespaces(names, DEFAULT_CONFIG), names);
  });

  it("matches include and exclude against whole names", () => {
    const config = { ...DEFAULT_CONFIG, include: "app\\..*", exclude: ".*\\.slow" };
    assert.deepEqual(selectNamespaces(names, config), ["app.core", "app.io"]);
    assert.deepEqual(selectNamespaces(names, { ...DEFAULT_CONFIG, include: "app" }), []);
  });
});

describe("environmentFromConfig", () => {
  it("uses the configured reporter", () => {
    const env = environmentFromConfig({ ...DEFAULT_CONFIG, reporter: "dots" });
    assert.equal(env.reporter, "dots");
    assert.deepEqual(env.reportCounters, { test: 0, pass: 0, fail: 0, error: 0 });
  });
});
