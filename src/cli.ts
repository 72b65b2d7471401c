#!/usr/bin/env node
import { loadEnvFile } from "./config/env.js";
import { runCli } from "./program.js";

loadEnvFile();

const exitCode = await runCli(process.argv);
if (exitCode !== 0) {
  process.exitCode = exitCode;
}
