export interface SchedulerConfig {
  minStageMs?: number;
  maxArtificialDelayMs?: number;
  reducedMotion?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

export interface EnforceResult {
  actualMs: number;
  artificialDelayMs: number;
  totalVisibleMs: number;
}

export function computeArtificialDelay(input: {
  actualMs: number;
  minVisibleMs: number;
  remainingBudgetMs: number;
  reducedMotion: boolean;
}): number {
  if (input.reducedMotion) {
    return 0;
  }
  const needed = Math.max(0, input.minVisibleMs - input.actualMs);
  return Math.max(0, Math.min(needed, input.remainingBudgetMs));
}

/**
 * Keeps very fast stages (demo answers come from disk) visible long enough
 * to read, within a per-run delay budget.
 */
export class StagePacer {
  private readonly minStageMs: number;
  private readonly maxArtificialDelayMs: number;
  private readonly reducedMotion: boolean;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private artificialDelayUsedMs = 0;

  constructor(config: SchedulerConfig = {}) {
    this.minStageMs = config.minStageMs ?? 300;
    this.maxArtificialDelayMs = config.maxArtificialDelayMs ?? 1500;
    this.reducedMotion = Boolean(config.reducedMotion);
    this.sleepFn = config.sleep || defaultSleep;
  }

  resetRun(): void {
    this.artificialDelayUsedMs = 0;
  }

  get remainingArtificialDelayMs(): number {
    return Math.max(0, this.maxArtificialDelayMs - this.artificialDelayUsedMs);
  }

  async enforceStageMinimum(actualMs: number, minStageMs = this.minStageMs): Promise<EnforceResult> {
    const artificialDelayMs = computeArtificialDelay({
      actualMs,
      minVisibleMs: minStageMs,
      remainingBudgetMs: this.remainingArtificialDelayMs,
      reducedMotion: this.reducedMotion,
    });

    if (artificialDelayMs > 0) {
      this.artificialDelayUsedMs += artificialDelayMs;
      await this.sleepFn(artificialDelayMs);
    }

    return {
      actualMs,
      artificialDelayMs,
      totalVisibleMs: actualMs + artificialDelayMs,
    };
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
