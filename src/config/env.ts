import dotenv from "dotenv";

let loaded = false;

/** Loads `.env` from the working directory once; real env vars win. */
export function loadEnvFile(): void {
  if (loaded) return;
  loaded = true;
  dotenv.config();
}

export function envValue(key: string): string | undefined {
  const value = process.env[key];
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
