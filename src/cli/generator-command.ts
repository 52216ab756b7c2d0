/**
 * The generate-script flow: config, style, plan, key check, generation,
 * session summary. Kept apart from the entry point so it can run against
 * stub generators.
 */
import type { Env } from "../config/env.js";
import { requireApiKey } from "../config/gemini.js";
import { loadGeneratorConfig, resolveStyle } from "../config/generator.js";
import type { ToolPaths } from "../config/paths.js";
import { wordsForDuration } from "../lib/text-stats.js";
import { buildGenerationPlan } from "../services/chunk-planner.js";
import {
  runScriptGeneration,
  type ScriptGenerationDeps,
  type ScriptGenerationResult,
} from "../services/script-generator.js";
import { listSessionFiles } from "../services/session-writer.js";
import type { GenerationPlan } from "../types/script.js";
import { generatorUsage, parseGeneratorArgs } from "./generator-args.js";
import { banner } from "./run.js";

export type GeneratorCommandContext = {
  env: Pick<Env, "geminiApiKey" | "geminiModel">;
  paths: Pick<ToolPaths, "generatorConfigPath">;
  deps?: ScriptGenerationDeps;
};

export const GENERATOR_USAGE = generatorUsage();

function printPlan(plan: GenerationPlan): void {
  console.log(banner());
  console.log("TEXT GENERATION PLAN");
  console.log(banner());
  console.log(`Total duration: ${plan.totalDurationMinutes} minutes`);
  console.log(`Style: ${plan.style}`);
  console.log(`WPM: ${plan.wpm}`);
  console.log(`Chunks: ${plan.numChunks}`);
  console.log(`Duration per chunk: ${plan.chunkDurationMinutes.toFixed(1)} minutes`);
  console.log(`Words per chunk: ~${wordsForDuration(plan.chunkDurationMinutes, plan.wpm)}`);
  console.log(`Total words: ~${wordsForDuration(plan.totalDurationMinutes, plan.wpm)}`);
  if (plan.topic) {
    console.log(`Topic hint: ${plan.topic}`);
  }
  console.log(banner());
  console.log();
}

/** Runs one generator invocation; resolves undefined when only help was printed. */
export async function runGeneratorCommand(
  argv: string[],
  context: GeneratorCommandContext,
): Promise<ScriptGenerationResult | undefined> {
  const parsed = parseGeneratorArgs(argv);
  if (parsed.help) {
    console.log(GENERATOR_USAGE);
    return undefined;
  }
  const { args } = parsed;

  const config = await loadGeneratorConfig(context.paths.generatorConfigPath);

  const { style, warning } = resolveStyle(args.style, config);
  if (warning) {
    console.warn(`Warning: ${warning}`);
  }

  const plan = buildGenerationPlan({
    totalDurationMinutes: args.durationMinutes,
    chunks: args.chunks,
    chunkDurationMinutes: args.chunkDurationMinutes,
    wpm: args.wpm ?? config.wpm,
    style,
    topic: args.topic,
  });

  const apiKey = requireApiKey(context.env.geminiApiKey);
  printPlan(plan);

  const result = await runScriptGeneration(
    plan,
    { apiKey, model: context.env.geminiModel, outputDir: config.outputDirectory },
    context.deps,
  );

  const totalWords = result.chunks.reduce((sum, chunk) => sum + chunk.actualWords, 0);
  console.log();
  console.log(banner());
  console.log("GENERATION COMPLETE");
  console.log(banner());
  console.log(`Total words generated: ${totalWords}`);
  console.log(`Estimated reading time: ${(totalWords / plan.wpm).toFixed(1)} minutes`);
  console.log(`Output saved to: ${result.session.sessionDir}`);
  console.log();
  console.log("Files created:");
  for (const file of await listSessionFiles(result.session.sessionDir)) {
    console.log(`  - ${file}`);
  }

  return result;
}
