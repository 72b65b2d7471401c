import { detectTerminalCapabilities, type TerminalCapabilities } from "./capabilities.js";
import { OutputRenderer } from "./renderer.js";
import { StagePacer } from "./scheduler.js";
import { StageRunner } from "./stageRunner.js";
import { createTheme, type UiTheme } from "./theme.js";

export interface UiRuntime {
  capabilities: TerminalCapabilities;
  theme: UiTheme;
  pacer: StagePacer;
  renderer: OutputRenderer;
  stageRunner: StageRunner;
}

let runtime: UiRuntime | undefined;
let animationOverride: boolean | undefined;

export function setAnimationOverride(enabled: boolean): void {
  animationOverride = enabled;
  runtime = undefined;
}

export function getUiRuntime(): UiRuntime {
  if (runtime) {
    return runtime;
  }

  const detected = detectTerminalCapabilities();
  // Animation can be switched off from the CLI but never forced on for a pipe.
  const capabilities: TerminalCapabilities =
    animationOverride === false ? { ...detected, animations: false } : detected;
  const theme = createTheme(capabilities);
  const pacer = new StagePacer({
    reducedMotion: !capabilities.animations,
  });
  const renderer = new OutputRenderer(capabilities, theme);
  const stageRunner = new StageRunner(renderer, pacer, capabilities, theme);

  runtime = {
    capabilities,
    theme,
    pacer,
    renderer,
    stageRunner,
  };

  return runtime;
}

export function resetUiRuntime(): void {
  runtime = undefined;
  animationOverride = undefined;
}
