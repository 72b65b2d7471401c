import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

export function toPosixPath(input: string): string {
  return input.split(path.sep).join("/");
}

export function relPosix(from: string, to: string): string {
  return toPosixPath(path.relative(from, to));
}

// Works from both src/ (tsx) and dist/src/ (built).
export function packageRoot(fromUrl: string = import.meta.url): string {
  let dir = path.dirname(fileURLToPath(fromUrl));
  for (;;) {
    if (fs.existsSync(path.join(dir, "package.json"))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return process.cwd();
    }
    dir = parent;
  }
}

export function assetPath(...parts: string[]): string {
  return path.join(packageRoot(), ...parts);
}
