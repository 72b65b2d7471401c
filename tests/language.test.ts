import test from "node:test";
import assert from "node:assert/strict";
import { languageForExtensions, languageForPath, parseExtensionList } from "../src/scanner/language.js";

test("languageForPath maps known extensions and falls back to plain source", () => {
  assert.deepEqual(languageForPath("legacy/orders.py"), { name: "Python", fence: "python" });
  assert.deepEqual(languageForPath("web/App.TSX"), { name: "TypeScript", fence: "tsx" });
  assert.deepEqual(languageForPath("Makefile"), { name: "source", fence: "" });
});

test("languageForExtensions names a single language or falls back", () => {
  assert.equal(languageForExtensions([".py"]), "Python");
  assert.equal(languageForExtensions([".ts", ".tsx"]), "TypeScript");
  assert.equal(languageForExtensions([".py", ".js"]), "source");
});

test("parseExtensionList normalizes dots, case and duplicates", () => {
  assert.deepEqual(parseExtensionList("py, .TS,ts,,js"), [".py", ".ts", ".js"]);
  assert.deepEqual(parseExtensionList(undefined), [".py"]);
  assert.deepEqual(parseExtensionList(" , "), [".py"]);
  assert.deepEqual(parseExtensionList("", [".go"]), [".go"]);
});
