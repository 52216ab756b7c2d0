import { wordsForDuration } from "../lib/text-stats.js";
import type { ChunkSpec, GenerationPlan } from "../types/script.js";

export type ChunkingOptions = {
  totalDurationMinutes: number;
  /** Explicit chunk count; ignored when `chunkDurationMinutes` is set. */
  chunks?: number;
  chunkDurationMinutes?: number;
};

export type PlanOptions = ChunkingOptions & {
  wpm: number;
  style: string;
  topic?: string;
};

export function resolveChunkCount(options: ChunkingOptions): number {
  const { totalDurationMinutes, chunks, chunkDurationMinutes } = options;
  if (chunkDurationMinutes) {
    return Math.max(1, Math.floor(totalDurationMinutes / chunkDurationMinutes));
  }
  return chunks ?? 1;
}

/** Splits the total duration evenly; remainders are not redistributed. */
export function buildGenerationPlan(options: PlanOptions): GenerationPlan {
  const numChunks = resolveChunkCount(options);
  return {
    totalDurationMinutes: options.totalDurationMinutes,
    wpm: options.wpm,
    style: options.style,
    numChunks,
    chunkDurationMinutes: options.totalDurationMinutes / numChunks,
    topic: options.topic ?? "",
  };
}

export function planChunks(plan: GenerationPlan): ChunkSpec[] {
  const targetWords = wordsForDuration(plan.chunkDurationMinutes, plan.wpm);
  return Array.from({ length: plan.numChunks }, (_, index) => ({
    chunkNumber: index + 1,
    totalChunks: plan.numChunks,
    targetWords,
  }));
}
