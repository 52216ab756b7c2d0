#!/usr/bin/env node
/** Generates a narration script session for voice recording. */
import { env } from "../config/env.js";
import { resolvePaths } from "../config/paths.js";
import { GENERATOR_USAGE, runGeneratorCommand } from "./generator-command.js";
import { runCli } from "./run.js";

async function main() {
  await runCli(async () => {
    await runGeneratorCommand(process.argv.slice(2), {
      env,
      paths: resolvePaths(env.projectRoot),
    });
  }, GENERATOR_USAGE);
}

void main();
