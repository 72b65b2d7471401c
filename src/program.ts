import { Command } from "commander";
import { analyzeCommand, type AnalyzeCliOptions } from "./commands/analyze.js";
import { configCommand, type ConfigCliOptions } from "./commands/config.js";
import { doctorCommand } from "./commands/doctor.js";
import { reviewPrCommand, type ReviewPrCliOptions } from "./commands/reviewPr.js";
import { SUPPORTED_LLM_PROVIDERS } from "./llm/provider.js";
import { TOOL_VERSION } from "./utils/console.js";

export interface ErrorSink {
  write(text: string): unknown;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("legacylens")
    .description("Send legacy source code to an LLM for security, quality, refactoring and migration analysis.")
    .version(TOOL_VERSION)
    .enablePositionalOptions()
    .option("-f, --file <path>", "source file to analyze")
    .option("-d, --dir <path>", "directory to analyze (full analysis per file)")
    .option("--security", "run security analysis only")
    .option("--quality", "run code quality analysis only")
    .option("--refactor", "generate refactored code")
    .option("--migrate", "generate migration plan")
    .option("--full", "run full analysis (security, quality, migration)")
    .option("-o, --output <path>", "also write the result to this file")
    .option("--ext <list>", "extensions scanned by --dir", ".py")
    .option("--provider <provider>", `LLM provider (${SUPPORTED_LLM_PROVIDERS.join(", ")})`)
    .option("--model <string>", "LLM model override")
    .option("--api-key <key>", "LLM API key override (prefer environment or saved credentials)")
    .option("--max-chars <n>", "max source chars sent per prompt", "60000")
    .option("--log-file <path>", "write a JSONL stage log")
    .option("--demo", "use bundled sample responses even when a key is configured", false)
    .option("--no-animation", "disable spinners");

  program.action(async () => {
    await analyzeCommand(program.opts<AnalyzeCliOptions>());
  });

  program
    .command("review-pr")
    .description("Review a GitHub pull request and post the analysis as a comment")
    .requiredOption("-p, --pr <number>", "pull request number")
    .option("-r, --repo <owner/repo>", "repository (defaults to GITHUB_REPOSITORY)")
    .option("--security-only", "run the security scan only", false)
    .option("--fail-on-critical", "exit with code 1 when critical issues are found", false)
    .option("--ext <list>", "extensions to review", ".py")
    .option("--dry-run", "print the comment instead of posting it", false)
    .option("--demo", "use bundled sample responses", false)
    .option("--provider <provider>", `LLM provider (${SUPPORTED_LLM_PROVIDERS.join(", ")})`)
    .option("--model <string>", "LLM model override")
    .option("--log-file <path>", "write a JSONL stage log")
    .option("--no-animation", "disable spinners")
    .action(async (options: ReviewPrCliOptions) => {
      const { exitCode } = await reviewPrCommand(options);
      process.exitCode = exitCode;
    });

  program
    .command("doctor")
    .description("Show the resolved LLM configuration and whether live calls are possible")
    .action(async () => {
      await doctorCommand();
    });

  program
    .command("config")
    .description("Save default provider, model and API key")
    .option("--provider <provider>", `LLM provider (${SUPPORTED_LLM_PROVIDERS.join(", ")})`)
    .option("--model <string>", "default model for the provider")
    .option("--api-key <key>", "API key stored in the user config directory")
    .option("--show", "print the saved configuration", false)
    .action(async (options: ConfigCliOptions) => {
      await configCommand(options);
    });

  return program;
}

/** Resolves to 1 when a command throws, after printing `[legacylens] <message>`; 0 otherwise. */
export async function runCli(argv: string[], stderr: ErrorSink = process.stderr): Promise<number> {
  try {
    await createProgram().parseAsync(argv);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    stderr.write(`[legacylens] ${message}\n`);
    return 1;
  }
}
