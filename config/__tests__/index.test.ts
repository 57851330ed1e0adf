import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  ConfigError,
  loadLabelCatalogue,
  loadLeakPatterns,
  loadReliabilityConfig,
  resolveLogLevel,
} from "../index.js";
import { DEFAULT_LEAK_PATTERNS } from "../../stages/stage-1-label-protection/src/index.js";

describe("config", () => {
  let dir: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), "reliability-config-"));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeJson(name: string, body: string): string {
    const path = join(dir, name);
    writeFileSync(path, body, "utf8");
    return path;
  }

  describe("loadLabelCatalogue", () => {
    it("loads the shipped catalogue", () => {
      const catalogue = loadLabelCatalogue();

      assert.equal(catalogue.length, 11);
      assert.equal(catalogue[0], "Example prompts include:");
      assert.ok(catalogue.includes("**Prerequisites**:"));
    });

    it("loads a catalogue from another file", () => {
      const path = writeJson("labels.json", '{"labels": ["Returns:"]}');

      assert.deepEqual(loadLabelCatalogue(path), ["Returns:"]);
    });

    it("throws ConfigError for a missing file", () => {
      assert.throws(
        () => loadLabelCatalogue(join(dir, "missing.json")),
        ConfigError
      );
    });

    it("throws ConfigError for a multi-line label", () => {
      const path = writeJson("multi.json", '{"labels": ["a\\nb"]}');

      assert.throws(() => loadLabelCatalogue(path), ConfigError);
    });

    it("throws ConfigError for the wrong shape", () => {
      const path = writeJson("shape.json", '{"labels": "Returns:"}');

      assert.throws(() => loadLabelCatalogue(path), ConfigError);
    });
  });

  describe("loadLeakPatterns", () => {
    it("defaults to the built-in token formats", () => {
      assert.equal(loadLeakPatterns(), DEFAULT_LEAK_PATTERNS);
    });

    it("loads patterns from a file", () => {
      const path = writeJson(
        "leaks.json",
        '{"patterns": ["<<<TPL_LABEL_\\\\d+>>>", "\\\\[\\\\[TPL\\\\]\\\\]"]}'
      );

      assert.deepEqual(loadLeakPatterns(path), [
        "<<<TPL_LABEL_\\d+>>>",
        "\\[\\[TPL\\]\\]",
      ]);
    });

    it("throws ConfigError for a pattern that does not compile", () => {
      const path = writeJson("bad-regex.json", '{"patterns": ["(unclosed"]}');

      assert.throws(() => loadLeakPatterns(path), ConfigError);
    });
  });

  describe("resolveLogLevel", () => {
    it("accepts known levels in any case", () => {
      assert.equal(resolveLogLevel("WARN"), "warn");
      assert.equal(resolveLogLevel(" silent "), "silent");
    });

    it("falls back to info", () => {
      assert.equal(resolveLogLevel(undefined), "info");
      assert.equal(resolveLogLevel("verbose"), "info");
    });
  });

  describe("loadReliabilityConfig", () => {
    it("composes the catalogue, leak patterns and log level", () => {
      const config = loadReliabilityConfig({ logLevel: "silent" });

      assert.equal(config.catalogue.length, 11);
      assert.equal(config.leakPatterns, DEFAULT_LEAK_PATTERNS);
      assert.equal(config.logLevel, "silent");
    });
  });
});
