/**
 * Persists one generator run as output/session_<YYYYMMDD_HHMMSS>/.
 */
import fs from "node:fs/promises";
import path from "node:path";

import { log } from "../logger.js";
import { writeJsonFile } from "../lib/json.js";
import { countWords, roundTo } from "../lib/text-stats.js";
import type { GenerationSession, SessionMetadata, TextChunk } from "../types/script.js";

export type SessionSettings = {
  style: string;
  totalDurationMinutes: number;
  wpm: number;
};

const pad2 = (value: number) => String(value).padStart(2, "0");

/** Local-time stamp with second granularity, e.g. 20260314_093005. */
export function formatSessionTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${day}_${time}`;
}

/** `script.txt` for a single chunk, otherwise `chunk_01.txt`, `chunk_02.txt`, ... */
export function chunkFileName(chunkNumber: number, totalChunks: number): string {
  return totalChunks === 1 ? "script.txt" : `chunk_${pad2(chunkNumber)}.txt`;
}

export function buildSessionMetadata(
  chunks: TextChunk[],
  settings: SessionSettings,
  generatedAt: Date,
): SessionMetadata {
  const { wpm } = settings;
  const wordCounts = chunks.map((chunk) => countWords(chunk.text));
  const totalWords = wordCounts.reduce((sum, count) => sum + count, 0);

  return {
    generated_at: generatedAt.toISOString(),
    style: settings.style,
    target_duration_minutes: settings.totalDurationMinutes,
    wpm_used: wpm,
    chunks: chunks.map((chunk, index) => ({
      file: chunkFileName(index + 1, chunks.length),
      target_word_count: chunk.targetWords,
      actual_word_count: wordCounts[index],
      estimated_duration_minutes: roundTo(wordCounts[index] / wpm, 2),
    })),
    totals: {
      total_words: totalWords,
      estimated_total_duration_minutes: roundTo(totalWords / wpm, 2),
    },
  };
}

/**
 * Writes chunk files and metadata.json into a new session directory.
 * The session directory must not already exist; two runs in the same second
 * fail with EEXIST instead of overwriting.
 */
export async function writeSession(
  outputDir: string,
  chunks: TextChunk[],
  settings: SessionSettings,
  now: Date = new Date(),
): Promise<GenerationSession> {
  const sessionDir = path.join(outputDir, `session_${formatSessionTimestamp(now)}`);
  await fs.mkdir(outputDir, { recursive: true });
  await fs.mkdir(sessionDir);

  const files: string[] = [];
  for (const [index, chunk] of chunks.entries()) {
    const fileName = chunkFileName(index + 1, chunks.length);
    await fs.writeFile(path.join(sessionDir, fileName), chunk.text, "utf8");
    files.push(fileName);
  }

  const metadata = buildSessionMetadata(chunks, settings, now);
  await writeJsonFile(path.join(sessionDir, "metadata.json"), metadata);
  files.push("metadata.json");

  log.info({ sessionDir, files: files.length }, "Saved generation session");
  return { sessionDir, files, metadata };
}

/** Names of the files in a session directory, sorted. */
export async function listSessionFiles(sessionDir: string): Promise<string[]> {
  const entries = await fs.readdir(sessionDir);
  return entries.sort();
}
