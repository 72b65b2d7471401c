import { Chalk } from "chalk";
import type { TerminalCapabilities, UiThemeName } from "./capabilities.js";

type Paint = (value: string) => string;

export interface UiTheme {
  name: UiThemeName;
  colors: {
    primary: Paint;
    heading: Paint;
    ok: Paint;
    warn: Paint;
    err: Paint;
    dim: Paint;
  };
  symbols: {
    tick: string;
    cross: string;
    warn: string;
    dot: string;
    spinnerFrames: string[];
  };
  box: {
    tl: string;
    tr: string;
    bl: string;
    br: string;
    h: string;
    v: string;
  };
}

export function createTheme(capabilities: TerminalCapabilities): UiTheme {
  const chalk = new Chalk({ level: capabilities.supportsColor ? 3 : 0 });
  const identity: Paint = (value) => value;
  const mono = capabilities.theme === "mono";

  const colors = mono
    ? {
        primary: identity,
        heading: identity,
        ok: identity,
        warn: identity,
        err: identity,
        dim: identity,
      }
    : {
        primary: (value: string) => chalk.hex("#FFB347")(value),
        heading: (value: string) => chalk.bold.hex("#FFD27F")(value),
        ok: (value: string) => chalk.hex("#7BD88F")(value),
        warn: (value: string) => chalk.hex("#FFD166")(value),
        err: (value: string) => chalk.hex("#FF6B6B")(value),
        dim: (value: string) => chalk.hex("#9A9A9A")(value),
      };

  const symbols =
    capabilities.supportsUnicode && !mono
      ? {
          tick: "✓",
          cross: "✕",
          warn: "⚠",
          dot: "•",
          spinnerFrames: ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"],
        }
      : {
          tick: "[ok]",
          cross: "[x]",
          warn: "[!]",
          dot: "*",
          spinnerFrames: ["-", "\\", "|", "/"],
        };

  const box = capabilities.supportsUnicode
    ? { tl: "┌", tr: "┐", bl: "└", br: "┘", h: "─", v: "│" }
    : { tl: "+", tr: "+", bl: "+", br: "+", h: "-", v: "|" };

  return {
    name: capabilities.theme,
    colors,
    symbols,
    box,
  };
}
