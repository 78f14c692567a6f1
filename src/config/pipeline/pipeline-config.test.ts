/**
 * Tests for pipeline configuration loading and environment overrides.
 *
 * Run: node --import tsx src/config/pipeline/pipeline-config.test.ts
 */

import { strict as assert } from "node:assert";

import {
  ConfigError,
  DEFAULT_PIPELINE_CONFIG,
  PipelineConfigError,
  loadAppConfig,
  loadPipelineConfig,
  loadPipelineConfigFromEnv,
  validatePipelineConfig,
} from "../index.js";
import { optionalEnvBool, optionalEnvInt } from "../env.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function withRetrieval(overrides: Record<string, unknown>): unknown {
  return {
    ...DEFAULT_PIPELINE_CONFIG,
    retrieval: { ...DEFAULT_PIPELINE_CONFIG.retrieval, ...overrides },
  };
}

function withReport(overrides: Record<string, unknown>): unknown {
  return {
    ...DEFAULT_PIPELINE_CONFIG,
    report: { ...DEFAULT_PIPELINE_CONFIG.report, ...overrides },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

section("Pipeline Config — Defaults");

test("default config loads", () => {
  const config = loadPipelineConfig(DEFAULT_PIPELINE_CONFIG);
  assert.equal(config.retrieval.topK, 5);
  assert.equal(config.generation.defaultModel, "gpt-5");
  assert.equal(config.generation.temperature, 0.2);
  assert.deepEqual(config.generation.fixedTemperatureModels, ["gpt-5"]);
  assert.equal(config.report.citationFormat, "[Source: {title}]");
});

test("loaded config is deeply frozen", () => {
  const config = loadPipelineConfig(DEFAULT_PIPELINE_CONFIG);
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.retrieval));
  assert.ok(Object.isFrozen(config.generation.models));
  assert.ok(Object.isFrozen(config.report.geographyParagraphs));
});

test("loading does not freeze the caller's input", () => {
  loadPipelineConfig(DEFAULT_PIPELINE_CONFIG);
  assert.equal(Object.isFrozen(DEFAULT_PIPELINE_CONFIG.retrieval), false);
});

section("Pipeline Config — Validation");

test("rejects topK below 1", () => {
  const result = validatePipelineConfig(withRetrieval({ topK: 0 }));
  assert.equal(result.success, false);
  assert.deepEqual(result.errors?.[0]?.path, ["retrieval", "topK"]);
});

test("rejects a non-integer topK", () => {
  const result = validatePipelineConfig(withRetrieval({ topK: 2.5 }));
  assert.equal(result.success, false);
  assert.deepEqual(result.errors?.[0]?.path, ["retrieval", "topK"]);
});

test("rejects a malformed language code", () => {
  const result = validatePipelineConfig(withRetrieval({ language: "English" }));
  assert.equal(result.success, false);
  assert.deepEqual(result.errors?.[0]?.path, ["retrieval", "language"]);
});

test("rejects an article base URL without trailing slash", () => {
  const result = validatePipelineConfig(
    withRetrieval({ baseArticleUrl: "https://en.wikipedia.org/wiki" })
  );
  assert.equal(result.success, false);
  assert.equal(result.errors?.[0]?.message, "must end with '/'");
});

test("rejects a default model missing from the model list", () => {
  const result = validatePipelineConfig({
    ...DEFAULT_PIPELINE_CONFIG,
    generation: { ...DEFAULT_PIPELINE_CONFIG.generation, defaultModel: "gpt-4o" },
  });
  assert.equal(result.success, false);
  assert.deepEqual(result.errors?.[0]?.path, ["generation", "defaultModel"]);
  assert.equal(result.errors?.[0]?.message, "defaultModel must be one of models");
});

test("rejects an empty word band", () => {
  const result = validatePipelineConfig(withReport({ wordCountMin: 450 }));
  assert.equal(result.success, false);
  assert.equal(result.errors?.length, 1);
  assert.deepEqual(result.errors?.[0]?.path, ["report", "wordCountMin"]);
});

test("rejects geography paragraphs beyond the paragraph count", () => {
  const result = validatePipelineConfig(withReport({ geographyParagraphs: [3, 5] }));
  assert.equal(result.success, false);
  assert.deepEqual(result.errors?.[0]?.path, ["report", "geographyParagraphs"]);
});

test("rejects a citation format without {title}", () => {
  const result = validatePipelineConfig(withReport({ citationFormat: "[Source]" }));
  assert.equal(result.success, false);
  assert.equal(result.errors?.[0]?.message, "must contain {title}");
});

test("rejects unknown keys", () => {
  const result = validatePipelineConfig({ ...DEFAULT_PIPELINE_CONFIG, extra: true });
  assert.equal(result.success, false);
  assert.equal(result.errors?.[0]?.code, "unrecognized_keys");
});

test("loadPipelineConfig throws a formatted PipelineConfigError", () => {
  assert.throws(
    () => loadPipelineConfig(withRetrieval({ topK: 0 })),
    (err: unknown) => {
      assert.ok(err instanceof PipelineConfigError);
      assert.equal(err.message, "Invalid pipeline configuration: 1 validation error(s)");
      const lines = err.format().split("\n");
      assert.equal(lines[0], "Pipeline configuration validation failed:");
      assert.ok(lines[1]?.startsWith("  - retrieval.topK: "));
      return true;
    }
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════

section("Environment — Helpers");

test("optionalEnvInt parses digits and falls back when blank", () => {
  assert.equal(optionalEnvInt("N", 7, { N: " 12 " }), 12);
  assert.equal(optionalEnvInt("N", 7, { N: "  " }), 7);
  assert.equal(optionalEnvInt("N", 7, {}), 7);
});

test("optionalEnvInt rejects non-integers", () => {
  assert.throws(() => optionalEnvInt("N", 7, { N: "3.5" }), ConfigError);
  assert.throws(() => optionalEnvInt("N", 7, { N: "-1" }), ConfigError);
});

test("optionalEnvBool accepts yes/no forms", () => {
  assert.equal(optionalEnvBool("B", false, { B: "YES" }), true);
  assert.equal(optionalEnvBool("B", true, { B: "0" }), false);
  assert.throws(() => optionalEnvBool("B", false, { B: "maybe" }), ConfigError);
});

section("Environment — App Config");

test("defaults apply with an empty environment", () => {
  const app = loadAppConfig({});
  assert.equal(app.env, "development");
  assert.equal(app.debug, false);
  assert.equal(app.logLevel, "info");
  assert.equal(app.logToFile, true);
  assert.equal(app.appName, "industry-snapshot");
  assert.equal(app.openaiApiKey, "");
  assert.equal(app.openaiBaseUrl, undefined);
});

test("environment values override defaults", () => {
  const app = loadAppConfig({
    NODE_ENV: "test",
    DEBUG: "true",
    LOG_LEVEL: "warn",
    OPENAI_API_KEY: "test-secret",
    OPENAI_BASE_URL: "http://localhost:8080/v1",
  });
  assert.equal(app.env, "test");
  assert.equal(app.debug, true);
  assert.equal(app.logLevel, "warn");
  assert.equal(app.openaiApiKey, "test-secret");
  assert.equal(app.openaiBaseUrl, "http://localhost:8080/v1");
});

test("an unknown log level is a ConfigError", () => {
  assert.throws(
    () => loadAppConfig({ LOG_LEVEL: "verbose" }),
    /Invalid LOG_LEVEL: verbose\. Must be one of debug, info, warn, error\./
  );
});

section("Environment — Pipeline Overrides");

test("no overrides yields the defaults", () => {
  const config = loadPipelineConfigFromEnv({});
  assert.deepEqual(config, DEFAULT_PIPELINE_CONFIG);
});

test("RETRIEVAL_TOP_K overrides topK", () => {
  const config = loadPipelineConfigFromEnv({ RETRIEVAL_TOP_K: "3" });
  assert.equal(config.retrieval.topK, 3);
});

test("WIKIPEDIA_LANGUAGE switches both endpoints", () => {
  const config = loadPipelineConfigFromEnv({ WIKIPEDIA_LANGUAGE: "de" });
  assert.equal(config.retrieval.language, "de");
  assert.equal(config.retrieval.apiUrl, "https://de.wikipedia.org/w/api.php");
  assert.equal(config.retrieval.baseArticleUrl, "https://de.wikipedia.org/wiki/");
});

test("RETRIEVAL_TOP_K of 0 is a ConfigError", () => {
  assert.throws(
    () => loadPipelineConfigFromEnv({ RETRIEVAL_TOP_K: "0" }),
    (err: unknown) => err instanceof ConfigError
  );
});

test("RETRIEVAL_TOP_K above the schema maximum is a PipelineConfigError", () => {
  assert.throws(
    () => loadPipelineConfigFromEnv({ RETRIEVAL_TOP_K: "25" }),
    (err: unknown) => err instanceof PipelineConfigError
  );
});

console.log(`\nResults: ${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
