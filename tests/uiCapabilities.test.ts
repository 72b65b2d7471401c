import test from "node:test";
import assert from "node:assert/strict";
import { detectTerminalCapabilities, normalizeTheme } from "../src/ui/capabilities.js";
import { createTheme } from "../src/ui/theme.js";

test("detectTerminalCapabilities enables animations and colour on a TTY", () => {
  const caps = detectTerminalCapabilities({
    isTTY: true,
    platform: "linux",
    env: { LEGACYLENS_THEME: "mono" },
  });

  assert.deepEqual(caps, {
    isTTY: true,
    supportsUnicode: true,
    supportsColor: true,
    animations: true,
    theme: "mono",
  });
});

test("NO_COLOR forces the mono theme", () => {
  const caps = detectTerminalCapabilities({
    isTTY: true,
    platform: "linux",
    env: { NO_COLOR: "1", LEGACYLENS_THEME: "amber" },
  });

  assert.equal(caps.supportsColor, false);
  assert.equal(caps.theme, "mono");
  assert.equal(caps.animations, true);
});

test("pipes get no animations", () => {
  const caps = detectTerminalCapabilities({ isTTY: false, env: {} });
  assert.equal(caps.animations, false);
  assert.equal(caps.supportsColor, false);
});

test("legacy Windows consoles fall back to ASCII symbols", () => {
  const caps = detectTerminalCapabilities({ isTTY: true, platform: "win32", env: { TERM: "cygwin" } });
  assert.equal(caps.supportsUnicode, false);

  const theme = createTheme(caps);
  assert.equal(theme.symbols.tick, "[ok]");
  assert.equal(theme.box.tl, "+");

  const terminal = detectTerminalCapabilities({ isTTY: true, platform: "win32", env: { WT_SESSION: "1" } });
  assert.equal(terminal.supportsUnicode, true);
});

test("normalizeTheme defaults to amber", () => {
  assert.equal(normalizeTheme(" MONO "), "mono");
  assert.equal(normalizeTheme("neon"), "amber");
  assert.equal(normalizeTheme(undefined), "amber");
});
