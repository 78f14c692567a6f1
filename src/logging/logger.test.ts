/**
 * Tests for log formatting, level filtering and session IDs.
 *
 * Run: node --import tsx src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  createLogger,
  formatLogEntry,
  generateSessionId,
  getSessionId,
  initSessionId,
} from "./index.js";

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

const AT = new Date("2025-03-04T05:06:07.089Z");

// ═══════════════════════════════════════════════════════════════════════════
// SESSION IDS
// ═══════════════════════════════════════════════════════════════════════════

section("Session IDs");

test("no session ID before init", () => {
  assert.equal(getSessionId(), null);
});

test("formatLogEntry falls back to no-session", () => {
  assert.equal(
    formatLogEntry("info", "Starting", undefined, AT),
    "[2025-03-04T05:06:07.089Z] [INFO ] [no-session] Starting"
  );
});

test("generated IDs carry the date and six hex characters", () => {
  const id = generateSessionId(AT);
  assert.match(id, /^20250304-[0-9a-f]{6}$/);
});

test("initSessionId sets the current ID", () => {
  const id = initSessionId();
  assert.equal(getSessionId(), id);
});

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

section("Formatting");

test("entries include level, session ID and JSON context", () => {
  const id = initSessionId();
  assert.equal(
    formatLogEntry("warn", "Only 2 pages", { industry: "Shipping", pages: 2 }, AT),
    `[2025-03-04T05:06:07.089Z] [WARN ] [${id}] Only 2 pages {"industry":"Shipping","pages":2}`
  );
});

test("an empty context object is omitted", () => {
  const id = initSessionId();
  assert.equal(
    formatLogEntry("error", "Failed", {}, AT),
    `[2025-03-04T05:06:07.089Z] [ERROR] [${id}] Failed`
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════════════════

section("Logger");

test("entries below the level are dropped", () => {
  const lines: string[] = [];
  const logger = createLogger({
    level: "warn",
    console: false,
    file: false,
    sink: (entry) => lines.push(entry),
  });

  logger.debug("a");
  logger.info("b");
  logger.warn("c");
  logger.error("d");

  assert.equal(lines.length, 2);
  assert.ok(lines[0]?.includes("[WARN ]"));
  assert.ok(lines[0]?.endsWith(" c"));
  assert.ok(lines[1]?.endsWith(" d"));
});

test("file output appends one line per entry", () => {
  const dir = mkdtempSync(join(tmpdir(), "industry-snapshot-log-"));
  try {
    const logDir = join(dir, "logs");
    const logger = createLogger({ logDir, logFile: "test.log", console: false });
    assert.ok(existsSync(logDir));

    logger.info("first");
    logger.info("second", { n: 2 });

    const lines = readFileSync(join(logDir, "test.log"), "utf-8").trimEnd().split("\n");
    assert.equal(lines.length, 2);
    assert.ok(lines[0]?.endsWith(" first"));
    assert.ok(lines[1]?.endsWith(' second {"n":2}'));
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("disabled file output creates no directory", () => {
  const dir = mkdtempSync(join(tmpdir(), "industry-snapshot-log-"));
  try {
    const logDir = join(dir, "logs");
    createLogger({ logDir, console: false, file: false }).info("x");
    assert.equal(existsSync(logDir), false);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

console.log(`\nResults: ${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
