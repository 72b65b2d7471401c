import ora from "ora";
import type { TerminalCapabilities } from "./capabilities.js";
import type { OutputRenderer } from "./renderer.js";
import type { StagePacer } from "./scheduler.js";
import type { UiTheme } from "./theme.js";

export interface SpinnerLike {
  start: () => SpinnerLike;
  succeed: (text?: string) => SpinnerLike;
  fail: (text?: string) => SpinnerLike;
}

export type SpinnerFactory = (text: string, frames: string[]) => SpinnerLike;

export class StageRunner {
  private readonly spinnerFactory: SpinnerFactory;

  constructor(
    private readonly renderer: OutputRenderer,
    private readonly pacer: StagePacer,
    private readonly capabilities: TerminalCapabilities,
    private readonly theme: UiTheme,
    spinnerFactory?: SpinnerFactory,
  ) {
    this.spinnerFactory = spinnerFactory || defaultSpinnerFactory;
  }

  async withStage<T>(stage: string, fn: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();

    let spinner: SpinnerLike | undefined;
    if (this.capabilities.animations) {
      spinner = this.spinnerFactory(`[LegacyLens] ${stage}...`, this.theme.symbols.spinnerFrames).start();
    } else {
      this.renderer.line(`[LegacyLens] ${stage}...`);
    }

    try {
      const result = await fn();
      const actualMs = Date.now() - startedAt;
      await this.pacer.enforceStageMinimum(actualMs);
      const doneText = `${this.theme.symbols.tick} [LegacyLens] ${stage} done in ${actualMs}ms`;

      if (spinner) {
        spinner.succeed(this.theme.colors.ok(doneText));
      } else {
        this.renderer.line(this.theme.colors.ok(doneText));
      }

      return result;
    } catch (error) {
      const actualMs = Date.now() - startedAt;
      const message = error instanceof Error ? error.message : String(error);
      const failText = `${this.theme.symbols.cross} [LegacyLens] ${stage} failed in ${actualMs}ms: ${message}`;

      if (spinner) {
        spinner.fail(this.theme.colors.err(failText));
      } else {
        this.renderer.line(this.theme.colors.err(failText));
      }

      throw error;
    }
  }
}

function defaultSpinnerFactory(text: string, frames: string[]): SpinnerLike {
  const spinner = ora({
    text,
    spinner: {
      frames,
      interval: 80,
    },
    discardStdin: false,
  });

  const adapter: SpinnerLike = {
    start: () => {
      spinner.start();
      return adapter;
    },
    succeed: (value?: string) => {
      spinner.stopAndPersist({ symbol: "", text: value });
      return adapter;
    },
    fail: (value?: string) => {
      spinner.stopAndPersist({ symbol: "", text: value });
      return adapter;
    },
  };

  return adapter;
}
