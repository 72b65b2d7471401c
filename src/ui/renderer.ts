import Table from "cli-table3";
import type { TerminalCapabilities } from "./capabilities.js";
import type { UiTheme } from "./theme.js";

export const PANEL_WIDTH = 72;

export interface PanelOptions {
  width?: number;
}

export class OutputRenderer {
  constructor(
    private readonly capabilities: TerminalCapabilities,
    private readonly theme: UiTheme,
  ) {}

  line(text = ""): void {
    process.stdout.write(`${text}\n`);
  }

  /** Writes `text` verbatim, adding a trailing newline when missing. */
  block(text: string): void {
    process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
  }

  section(title: string): void {
    this.line(this.theme.colors.heading(title));
  }

  ok(text: string): void {
    this.line(this.theme.colors.ok(`${this.theme.symbols.tick} ${text}`));
  }

  warn(text: string): void {
    this.line(this.theme.colors.warn(`${this.theme.symbols.warn} ${text}`));
  }

  error(text: string): void {
    this.line(this.theme.colors.err(`${this.theme.symbols.cross} ${text}`));
  }

  panel(title: string, lines: string[], options: PanelOptions = {}): void {
    const body = lines.length > 0 ? lines : [""];
    const contentWidth = Math.max(title.length + 4, ...body.map((line) => line.length + 2));
    const width = options.width ? clamp(options.width, 40, 120) : Math.min(96, Math.max(40, contentWidth + 2));
    const { box } = this.theme;
    const paint = this.theme.colors.primary;

    const titleBar = ` ${title} `;
    this.line(paint(`${box.tl}${box.h}${titleBar}${box.h.repeat(Math.max(0, width - 3 - titleBar.length))}${box.tr}`));
    for (const line of body) {
      this.line(`${paint(box.v)}${pad(` ${line}`, width - 2)}${paint(box.v)}`);
    }
    this.line(paint(`${box.bl}${box.h.repeat(width - 2)}${box.br}`));
    this.line();
  }

  asciiTable(headers: string[], rows: string[][]): void {
    const tableOptions: ConstructorParameters<typeof Table>[0] = {
      head: headers,
      style: {
        head: [],
        border: [],
        compact: true,
      },
    };
    if (this.capabilities.supportsColor) {
      tableOptions.style = {
        head: ["yellow"],
        border: ["gray"],
        compact: true,
      };
    }

    const table = new Table(tableOptions);
    for (const row of rows) {
      table.push(row);
    }
    this.line(table.toString());
  }

  bulletList(items: string[], indent = 0): void {
    const prefix = `${" ".repeat(Math.max(0, indent))}${this.theme.symbols.dot}`;
    for (const item of items) {
      this.line(`${prefix} ${item}`);
    }
  }
}

function pad(value: string, width: number): string {
  if (value.length >= width) return value;
  return `${value}${" ".repeat(width - value.length)}`;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
