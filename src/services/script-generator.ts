/**
 * Narration script generation: plan chunks, generate each in order, persist
 * the session.
 */
import { log } from "../logger.js";
import { requireApiKey, type GeminiConfig } from "../config/gemini.js";
import { countWords } from "../lib/text-stats.js";
import { planChunks } from "./chunk-planner.js";
import { GeminiClient } from "./gemini-client.js";
import { buildScriptPrompt } from "./script-prompt.js";
import { writeSession } from "./session-writer.js";
import type { TextGenerator } from "../types/capabilities.js";
import type { GenerationPlan, GenerationSession, TextChunk } from "../types/script.js";

export type ScriptGenerationOptions = {
  apiKey: string;
  model: string;
  outputDir: string;
};

export type ScriptGenerationDeps = {
  createGenerator?: (config: GeminiConfig) => TextGenerator;
  now?: () => Date;
};

export type ScriptGenerationResult = {
  chunks: TextChunk[];
  session: GenerationSession;
};

/** Generates every planned chunk sequentially. */
export async function generateChunks(
  plan: GenerationPlan,
  generator: TextGenerator,
): Promise<TextChunk[]> {
  const chunks: TextChunk[] = [];

  for (const spec of planChunks(plan)) {
    log.info(
      { chunk: spec.chunkNumber, totalChunks: spec.totalChunks, targetWords: spec.targetWords },
      "Generating chunk",
    );

    const text = await generator.generate(
      buildScriptPrompt({
        targetWords: spec.targetWords,
        style: plan.style,
        chunkNumber: spec.chunkNumber,
        totalChunks: spec.totalChunks,
        topic: plan.topic,
      }),
    );
    const actualWords = countWords(text);
    log.info({ chunk: spec.chunkNumber, actualWords }, "Generated chunk");

    chunks.push({ ...spec, text, actualWords });
  }

  return chunks;
}

export async function runScriptGeneration(
  plan: GenerationPlan,
  options: ScriptGenerationOptions,
  deps: ScriptGenerationDeps = {},
): Promise<ScriptGenerationResult> {
  const apiKey = requireApiKey(options.apiKey);

  const createGenerator = deps.createGenerator ?? ((config) => new GeminiClient(config));
  const generator = createGenerator({ apiKey, model: options.model });

  const chunks = await generateChunks(plan, generator);
  const session = await writeSession(
    options.outputDir,
    chunks,
    { style: plan.style, totalDurationMinutes: plan.totalDurationMinutes, wpm: plan.wpm },
    (deps.now ?? (() => new Date()))(),
  );

  return { chunks, session };
}
