import test from "node:test";
import assert from "node:assert/strict";
import { AnthropicProvider, createLlmProvider, OpenAiCompatibleProvider } from "../src/llm/provider.js";
import type { LlmConfig } from "../src/types.js";
import { createFetchStub, jsonResponse } from "./helpers/fetch.js";

const OPENAI: LlmConfig = {
  provider: "openai",
  model: "gpt-4o",
  baseUrl: "https://api.openai.com/v1/",
  apiKey: "test-secret",
  maxTokens: 4096,
};

const ANTHROPIC: LlmConfig = {
  provider: "anthropic",
  model: "claude-sonnet-4-5",
  baseUrl: "https://api.anthropic.com/v1",
  apiKey: "test-secret",
  maxTokens: 2000,
};

test("OpenAiCompatibleProvider posts chat completions and returns the first choice", async () => {
  const { fetchImpl, requests } = createFetchStub([
    () => jsonResponse(200, { choices: [{ message: { content: "## Findings" } }] }),
  ]);
  const provider = new OpenAiCompatibleProvider(OPENAI, fetchImpl);

  const text = await provider.complete([{ role: "user", content: "review this" }]);
  assert.equal(text, "## Findings");
  assert.equal(requests[0].url, "https://api.openai.com/v1/chat/completions");
  assert.equal(requests[0].method, "POST");
  assert.equal(requests[0].headers.get("Authorization"), "Bearer test-secret");
  assert.deepEqual(JSON.parse(requests[0].body || "{}"), {
    model: "gpt-4o",
    max_tokens: 4096,
    messages: [{ role: "user", content: "review this" }],
  });
});

test("OpenAiCompatibleProvider surfaces API error details", async () => {
  const { fetchImpl } = createFetchStub([
    () => jsonResponse(401, { error: { message: "bad key", type: "invalid_request_error", code: "invalid_api_key" } }),
  ]);
  const provider = new OpenAiCompatibleProvider(OPENAI, fetchImpl);

  await assert.rejects(
    () => provider.complete([{ role: "user", content: "x" }]),
    { message: "LLM request failed (401 invalid_api_key): bad key" },
  );
});

test("OpenAiCompatibleProvider rejects empty content and missing keys", async () => {
  const { fetchImpl, requests } = createFetchStub([() => jsonResponse(200, { choices: [] })]);

  await assert.rejects(
    () => new OpenAiCompatibleProvider(OPENAI, fetchImpl).complete([{ role: "user", content: "x" }]),
    { message: "LLM response did not include message content." },
  );

  await assert.rejects(
    () =>
      new OpenAiCompatibleProvider({ ...OPENAI, apiKey: undefined }, fetchImpl).complete([
        { role: "user", content: "x" },
      ]),
    { message: "API key is missing for selected LLM provider." },
  );
  assert.equal(requests.length, 1);
});

test("AnthropicProvider splits system text and joins text blocks", async () => {
  const { fetchImpl, requests } = createFetchStub([
    () =>
      jsonResponse(200, {
        content: [
          { type: "text", text: "first" },
          { type: "tool_use" },
          { type: "text", text: "second" },
        ],
      }),
  ]);
  const provider = createLlmProvider(ANTHROPIC, fetchImpl);
  assert.ok(provider instanceof AnthropicProvider);

  const text = await provider.complete([
    { role: "system", content: "be brief" },
    { role: "user", content: "audit" },
  ]);
  assert.equal(text, "first\nsecond");
  assert.equal(requests[0].url, "https://api.anthropic.com/v1/messages");
  assert.equal(requests[0].headers.get("x-api-key"), "test-secret");
  assert.equal(requests[0].headers.get("anthropic-version"), "2023-06-01");
  assert.deepEqual(JSON.parse(requests[0].body || "{}"), {
    model: "claude-sonnet-4-5",
    max_tokens: 2000,
    system: "be brief",
    messages: [{ role: "user", content: "audit" }],
  });
});

test("AnthropicProvider reports plain-text error bodies", async () => {
  const { fetchImpl } = createFetchStub([() => new Response("overloaded", { status: 529 })]);
  await assert.rejects(
    () => new AnthropicProvider(ANTHROPIC, fetchImpl).complete([{ role: "user", content: "x" }]),
    { message: "LLM request failed (529): overloaded" },
  );
});
