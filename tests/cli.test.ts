import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { runCli } from "../src/program.js";
import { resetUiRuntime } from "../src/ui/runtime.js";
import { assetPath } from "../src/utils/path.js";
import { CLEAN_LLM_ENV, withEnv } from "./helpers/env.js";

async function runInSandbox(args: string[]): Promise<{ exitCode: number; stderr: string[] }> {
  const home = await fs.mkdtemp(path.join(os.tmpdir(), "ll-cli-"));
  const stderr: string[] = [];
  try {
    const exitCode = await withEnv({ ...CLEAN_LLM_ENV, LEGACYLENS_HOME: home }, () =>
      runCli(["node", "legacylens", ...args], {
        write: (text: string) => stderr.push(text),
      }),
    );
    return { exitCode, stderr };
  } finally {
    resetUiRuntime();
    await fs.rm(home, { recursive: true, force: true });
  }
}

test("runCli reports command failures on stderr with exit code 1", async (t) => {
  t.mock.method(process.stdout, "write", () => true);
  const missing = path.join(os.tmpdir(), "ll-missing", "nope.py");

  const result = await runInSandbox(["--file", missing, "--demo", "--no-animation"]);

  assert.equal(result.exitCode, 1);
  assert.deepEqual(result.stderr, [`[legacylens] File not found: ${missing}\n`]);
});

test("runCli exits 0 and writes nothing to stderr on success", async (t) => {
  t.mock.method(process.stdout, "write", () => true);

  const result = await runInSandbox([
    "--file",
    assetPath("samples", "order_service.py"),
    "--quality",
    "--demo",
    "--no-animation",
  ]);

  assert.equal(result.exitCode, 0);
  assert.deepEqual(result.stderr, []);
});

test("runCli rejects an unknown provider before analyzing", async (t) => {
  t.mock.method(process.stdout, "write", () => true);

  const result = await runInSandbox([
    "--file",
    assetPath("samples", "order_service.py"),
    "--provider",
    "mistral",
    "--no-animation",
  ]);

  assert.equal(result.exitCode, 1);
  assert.deepEqual(result.stderr, [
    "[legacylens] Unknown LLM provider 'mistral'. Use one of: openai, anthropic, gemini, ollama, openai-compatible.\n",
  ]);
});
