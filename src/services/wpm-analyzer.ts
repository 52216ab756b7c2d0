/**
 * Speaking-rate analysis over a folder of voice samples.
 * - listAudioFiles: audio files in the input folder, sorted by name
 * - analyzeSample: duration + transcript + word count + WPM for one file
 * - summarizeSamples / buildAnalysisReport: totals and the JSON report
 * - runWpmAnalysis: the whole batch; any failing file aborts the run
 */
import fs from "node:fs/promises";
import path from "node:path";

import { log } from "../logger.js";
import { AUDIO_MIME_TYPES, requireApiKey, type GeminiConfig } from "../config/gemini.js";
import { PrerequisiteError, isErrnoException } from "../lib/errors.js";
import { writeJsonFile } from "../lib/json.js";
import { calculateWpm, countWords, roundTo } from "../lib/text-stats.js";
import { readAudioDurationSeconds } from "./audio-duration.js";
import { GeminiClient } from "./gemini-client.js";
import type { DurationReader, Transcriber } from "../types/capabilities.js";
import type {
  AnalysisReport,
  AnalysisSummary,
  AudioFile,
  AudioSample,
} from "../types/wpm.js";

export type WpmAnalysisOptions = {
  apiKey: string;
  model: string;
  inputDir: string;
  outputPath: string;
};

export type WpmAnalysisDeps = {
  createTranscriber?: (config: GeminiConfig) => Transcriber;
  readDuration?: DurationReader;
  now?: () => Date;
};

export type WpmAnalysisResult = {
  samples: AudioSample[];
  summary: AnalysisSummary;
  report: AnalysisReport;
  outputPath: string;
};

async function assertDirectory(dir: string): Promise<void> {
  try {
    const stats = await fs.stat(dir);
    if (stats.isDirectory()) {
      return;
    }
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }
  throw new PrerequisiteError(`Directory not found: ${dir}`);
}

async function isLinkedFile(linkPath: string): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isFile();
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      log.warn({ linkPath }, "Skipping broken symlink");
      return false;
    }
    throw error;
  }
}

/** Lists the supported audio files directly inside `dir` (symlinks followed), sorted by file name. */
export async function listAudioFiles(dir: string): Promise<AudioFile[]> {
  await assertDirectory(dir);

  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: AudioFile[] = [];

  for (const entry of entries) {
    const mimeType = AUDIO_MIME_TYPES[path.extname(entry.name).toLowerCase()];
    if (!mimeType) {
      continue;
    }
    const filePath = path.join(dir, entry.name);
    if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkedFile(filePath)))) {
      files.push({ name: entry.name, path: filePath, mimeType });
    }
  }

  if (files.length === 0) {
    throw new PrerequisiteError(`No audio files found in ${dir}`);
  }

  return files.sort((a, b) => a.name.localeCompare(b.name));
}

export async function analyzeSample(
  file: AudioFile,
  transcriber: Transcriber,
  readDuration: DurationReader,
): Promise<AudioSample> {
  const durationSeconds = await readDuration(file.path);
  log.info(
    { file: file.name, durationSeconds: roundTo(durationSeconds, 1), durationMinutes: roundTo(durationSeconds / 60, 2) },
    "Measured duration",
  );

  const transcript = await transcriber.transcribe(file);
  const wordCount = countWords(transcript);
  const wpm = calculateWpm(wordCount, durationSeconds);
  log.info({ file: file.name, wordCount, wpm: roundTo(wpm, 1) }, "Analyzed sample");

  return { file: file.name, durationSeconds, transcript, wordCount, wpm };
}

/**
 * Aggregates per-file results as they appear in the report: durations at two
 * decimals, WPM at one. The average is the plain mean of the per-file WPM
 * values, not weighted by duration.
 */
export function summarizeSamples(samples: AudioSample[]): AnalysisSummary {
  const totalWords = samples.reduce((sum, sample) => sum + sample.wordCount, 0);
  const totalDurationSeconds = samples.reduce(
    (sum, sample) => sum + roundTo(sample.durationSeconds, 2),
    0,
  );
  const wpmSum = samples.reduce((sum, sample) => sum + roundTo(sample.wpm, 1), 0);

  return {
    filesAnalyzed: samples.length,
    totalWords,
    totalDurationSeconds,
    averageWpm: samples.length > 0 ? wpmSum / samples.length : 0,
  };
}

export function buildAnalysisReport(samples: AudioSample[], analyzedAt: Date): AnalysisReport {
  const summary = summarizeSamples(samples);
  return {
    analysis_date: analyzedAt.toISOString(),
    summary: {
      files_analyzed: summary.filesAnalyzed,
      total_words: summary.totalWords,
      total_duration_seconds: roundTo(summary.totalDurationSeconds, 2),
      average_wpm: roundTo(summary.averageWpm, 1),
    },
    files: samples.map((sample) => ({
      file: sample.file,
      duration_seconds: roundTo(sample.durationSeconds, 2),
      word_count: sample.wordCount,
      wpm: roundTo(sample.wpm, 1),
      transcript: sample.transcript,
    })),
  };
}

/** Measures every sample in the input folder and writes the JSON report. */
export async function runWpmAnalysis(
  options: WpmAnalysisOptions,
  deps: WpmAnalysisDeps = {},
): Promise<WpmAnalysisResult> {
  const apiKey = requireApiKey(options.apiKey);

  const files = await listAudioFiles(options.inputDir);
  log.info({ count: files.length, inputDir: options.inputDir }, "Found audio files to analyze");

  const createTranscriber = deps.createTranscriber ?? ((config) => new GeminiClient(config));
  const transcriber = createTranscriber({ apiKey, model: options.model });
  const readDuration = deps.readDuration ?? readAudioDurationSeconds;
  const now = deps.now ?? (() => new Date());

  const samples: AudioSample[] = [];
  for (const file of files) {
    samples.push(await analyzeSample(file, transcriber, readDuration));
  }

  const report = buildAnalysisReport(samples, now());
  await writeJsonFile(options.outputPath, report);
  log.info({ outputPath: options.outputPath }, "Saved WPM analysis");

  return { samples, summary: summarizeSamples(samples), report, outputPath: options.outputPath };
}
