import { log } from "../logger.js";
import { PrerequisiteError, UsageError } from "../lib/errors.js";

export const BANNER_WIDTH = 60;

export const banner = (char = "=") => char.repeat(BANNER_WIDTH);

/** Prints a failure and returns the process exit code for it. */
export function reportCliError(error: unknown, usage?: string): number {
  if (error instanceof UsageError) {
    console.error(`Error: ${error.message}`);
    if (usage) {
      console.error(`\n${usage}`);
    }
    return 2;
  }

  if (error instanceof PrerequisiteError) {
    console.error(`Error: ${error.message}`);
    for (const hint of error.hints) {
      console.error(hint);
    }
    return 1;
  }

  log.error({ err: error }, "Run failed");
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  return 1;
}

/** Runs a CLI body, mapping thrown errors to an exit code. */
export async function runCli(body: () => Promise<void>, usage?: string): Promise<void> {
  try {
    await body();
  } catch (error) {
    process.exitCode = reportCliError(error, usage);
  }
}
