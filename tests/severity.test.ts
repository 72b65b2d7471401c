import test from "node:test";
import assert from "node:assert/strict";
import { detectSeverity, mergeSeverity } from "../src/analysis/severity.js";

test("detectSeverity matches whole words case-insensitively", () => {
  assert.deepEqual(detectSeverity("🔴 CRITICAL - SQL injection on line 12"), { critical: true, high: false });
  assert.deepEqual(detectSeverity("Severity: High"), { critical: false, high: true });
  assert.deepEqual(detectSeverity("highlighting is not a finding, nor is uncritical"), {
    critical: false,
    high: false,
  });
});

test("mergeSeverity ors flags across files", () => {
  assert.deepEqual(
    mergeSeverity([
      { critical: false, high: true },
      { critical: false, high: false },
    ]),
    { critical: false, high: true },
  );
  assert.deepEqual(mergeSeverity([]), { critical: false, high: false });
});
