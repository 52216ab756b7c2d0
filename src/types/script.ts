import type { IsoDateTime } from "./wpm.js";

export type GenerationPlan = {
  totalDurationMinutes: number;
  wpm: number;
  style: string;
  numChunks: number;
  chunkDurationMinutes: number;
  topic: string;
};

export type ChunkSpec = {
  chunkNumber: number;
  totalChunks: number;
  targetWords: number;
};

export type TextChunk = ChunkSpec & {
  text: string;
  actualWords: number;
};

export interface ChunkMetadata {
  file: string;
  target_word_count: number;
  actual_word_count: number;
  estimated_duration_minutes: number;
}

/** On-disk shape of a session's metadata.json. */
export interface SessionMetadata {
  generated_at: IsoDateTime;
  style: string;
  target_duration_minutes: number;
  wpm_used: number;
  chunks: ChunkMetadata[];
  totals: {
    total_words: number;
    estimated_total_duration_minutes: number;
  };
}

export type GenerationSession = {
  sessionDir: string;
  files: string[];
  metadata: SessionMetadata;
};
