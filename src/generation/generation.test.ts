/**
 * Tests for the OpenAI generation adapter.
 *
 * Run: node --import tsx src/generation/generation.test.ts
 *
 * The OpenAI client is replaced by an in-process fake through the
 * adapter's client factory.
 */

import { strict as assert } from "node:assert";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";

import {
  OpenAIGenerator,
  type ChatClient,
  type GenerationRequest,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
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

const REQUEST: GenerationRequest = {
  system: "You are an analyst.",
  user: "Write about Shipping.",
  credential: "test-secret",
  model: "gpt-5",
  temperature: 0.2,
  maxOutputTokens: 800,
};

interface FakeCall {
  credential: string;
  body: ChatCompletionCreateParamsNonStreaming;
}

function fakeGenerator(
  reply: () => Promise<string | null>,
  fixedTemperatureModels?: readonly string[]
): {
  generator: OpenAIGenerator;
  calls: FakeCall[];
} {
  const calls: FakeCall[] = [];
  const generator = new OpenAIGenerator({
    fixedTemperatureModels,
    createClient: (credential): ChatClient => ({
      chat: {
        completions: {
          create: async (body) => {
            calls.push({ credential, body });
            return { choices: [{ message: { content: await reply() } }] };
          },
        },
      },
    }),
  });
  return { generator, calls };
}

// ═══════════════════════════════════════════════════════════════════════════
// OPENAI GENERATOR
// ═══════════════════════════════════════════════════════════════════════════

section("OpenAI Generator — Request");

await test("sends system and user messages with the configured parameters", async () => {
  const { generator, calls } = fakeGenerator(async () => "Report text");

  await generator.generate(REQUEST);
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.credential, "test-secret");
  assert.deepEqual(calls[0]?.body, {
    model: "gpt-5",
    temperature: 0.2,
    max_completion_tokens: 800,
    messages: [
      { role: "system", content: "You are an analyst." },
      { role: "user", content: "Write about Shipping." },
    ],
  });
});

await test("a client is built for each request's credential", async () => {
  const { generator, calls } = fakeGenerator(async () => "Report text");

  await generator.generate(REQUEST);
  await generator.generate({ ...REQUEST, credential: "other-secret" });
  assert.deepEqual(
    calls.map((call) => call.credential),
    ["test-secret", "other-secret"]
  );
});

await test("models on the fixed-temperature list are sent without a temperature", async () => {
  const { generator, calls } = fakeGenerator(async () => "Report text", ["gpt-5"]);

  await generator.generate(REQUEST);
  assert.deepEqual(calls[0]?.body, {
    model: "gpt-5",
    max_completion_tokens: 800,
    messages: [
      { role: "system", content: "You are an analyst." },
      { role: "user", content: "Write about Shipping." },
    ],
  });
});

await test("other models keep the configured temperature", async () => {
  const { generator, calls } = fakeGenerator(async () => "Report text", ["gpt-5"]);

  await generator.generate({ ...REQUEST, model: "gpt-4o" });
  assert.equal(calls[0]?.body.temperature, 0.2);
  assert.equal(calls[0]?.body.model, "gpt-4o");
});

section("OpenAI Generator — Outcomes");

await test("returns the trimmed completion text", async () => {
  const { generator } = fakeGenerator(async () => "\n  Paragraph one.\n\nParagraph two.  \n");

  const outcome = await generator.generate(REQUEST);
  assert.ok(outcome.success);
  assert.equal(outcome.value, "Paragraph one.\n\nParagraph two.");
});

await test("an empty completion is a failure", async () => {
  const { generator } = fakeGenerator(async () => "   ");

  const outcome = await generator.generate(REQUEST);
  assert.equal(outcome.success, false);
  if (!outcome.success) {
    assert.equal(outcome.error.message, "The model returned an empty response.");
  }
});

await test("a null completion is a failure", async () => {
  const { generator } = fakeGenerator(async () => null);

  const outcome = await generator.generate(REQUEST);
  assert.equal(outcome.success, false);
});

await test("a client error becomes a GenerationError carrying the cause", async () => {
  const cause = new Error("401 Incorrect API key provided");
  const { generator } = fakeGenerator(async () => {
    throw cause;
  });

  const outcome = await generator.generate(REQUEST);
  assert.equal(outcome.success, false);
  if (!outcome.success) {
    assert.equal(outcome.error.name, "GenerationError");
    assert.equal(outcome.error.message, "401 Incorrect API key provided");
    assert.equal(outcome.error.cause, cause);
  }
});

await test("a failing client factory is reported, not thrown", async () => {
  const generator = new OpenAIGenerator({
    createClient: () => {
      throw new Error("The apiKey client option must be set");
    },
  });

  const outcome = await generator.generate(REQUEST);
  assert.equal(outcome.success, false);
  if (!outcome.success) {
    assert.equal(outcome.error.message, "The apiKey client option must be set");
  }
});

console.log(`\nResults: ${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
