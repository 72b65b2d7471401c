import test from "node:test";
import assert from "node:assert/strict";
import { computeArtificialDelay, StagePacer } from "../src/ui/scheduler.js";

test("computeArtificialDelay enforces minimum visibility with budget", () => {
  const delay = computeArtificialDelay({
    actualMs: 60,
    minVisibleMs: 350,
    remainingBudgetMs: 120,
    reducedMotion: false,
  });

  assert.equal(delay, 120);
  assert.equal(
    computeArtificialDelay({ actualMs: 60, minVisibleMs: 350, remainingBudgetMs: 500, reducedMotion: true }),
    0,
  );
});

test("StagePacer enforces min stage duration", async () => {
  const waits: number[] = [];
  const pacer = new StagePacer({
    minStageMs: 350,
    maxArtificialDelayMs: 1200,
    reducedMotion: false,
    sleep: async (ms) => {
      waits.push(ms);
    },
  });

  const result = await pacer.enforceStageMinimum(90);
  assert.equal(result.artificialDelayMs, 260);
  assert.equal(result.totalVisibleMs, 350);
  assert.deepEqual(waits, [260]);

  const slow = await pacer.enforceStageMinimum(900);
  assert.equal(slow.artificialDelayMs, 0);
  assert.deepEqual(waits, [260]);
});

test("StagePacer budget resets per run", async () => {
  const pacer = new StagePacer({ minStageMs: 300, maxArtificialDelayMs: 400, sleep: async () => undefined });

  await pacer.enforceStageMinimum(0);
  await pacer.enforceStageMinimum(0);
  assert.equal(pacer.remainingArtificialDelayMs, 0);

  pacer.resetRun();
  assert.equal(pacer.remainingArtificialDelayMs, 400);
});
