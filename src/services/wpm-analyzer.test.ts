import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { PrerequisiteError } from "../lib/errors.js";
import type { Transcriber } from "../types/capabilities.js";
import type { AudioSample } from "../types/wpm.js";
import {
  analyzeSample,
  buildAnalysisReport,
  listAudioFiles,
  runWpmAnalysis,
  summarizeSamples,
} from "./wpm-analyzer.js";

const words = (count: number) => Array.from({ length: count }, (_, i) => `word${i}`).join(" ");

function sample(overrides: Partial<AudioSample>): AudioSample {
  return { file: "a.mp3", durationSeconds: 60, transcript: "", wordCount: 0, wpm: 0, ...overrides };
}

describe("wpm-analyzer", () => {
  let tmpDir: string;
  let inputDir: string;
  let outputPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "wpm-analyzer-"));
    inputDir = path.join(tmpDir, "wpm-measure");
    outputPath = path.join(tmpDir, "user-context", "wpm-analysis.json");
    await fs.mkdir(inputDir);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe("listAudioFiles", () => {
    it("returns supported audio files sorted by name", async () => {
      for (const name of ["b.WAV", "a.mp3", "notes.txt", "c.m4a"]) {
        await fs.writeFile(path.join(inputDir, name), "");
      }
      await fs.mkdir(path.join(inputDir, "nested.mp3"));

      await expect(listAudioFiles(inputDir)).resolves.toEqual([
        { name: "a.mp3", path: path.join(inputDir, "a.mp3"), mimeType: "audio/mpeg" },
        { name: "b.WAV", path: path.join(inputDir, "b.WAV"), mimeType: "audio/wav" },
        { name: "c.m4a", path: path.join(inputDir, "c.m4a"), mimeType: "audio/mp4" },
      ]);
    });

    it("follows symlinked samples and skips broken links", async () => {
      const elsewhere = path.join(tmpDir, "recordings");
      await fs.mkdir(elsewhere);
      await fs.writeFile(path.join(elsewhere, "take1.mp3"), "");
      await fs.symlink(path.join(elsewhere, "take1.mp3"), path.join(inputDir, "linked.mp3"));
      await fs.symlink(path.join(elsewhere, "gone.mp3"), path.join(inputDir, "broken.mp3"));
      await fs.symlink(elsewhere, path.join(inputDir, "folder.mp3"));

      await expect(listAudioFiles(inputDir)).resolves.toEqual([
        { name: "linked.mp3", path: path.join(inputDir, "linked.mp3"), mimeType: "audio/mpeg" },
      ]);
    });

    it("fails when the directory is missing", async () => {
      const missing = path.join(tmpDir, "nope");
      await expect(listAudioFiles(missing)).rejects.toThrow(
        new PrerequisiteError(`Directory not found: ${missing}`),
      );
    });

    it("fails when no audio files are present", async () => {
      await fs.writeFile(path.join(inputDir, "readme.md"), "");
      await expect(listAudioFiles(inputDir)).rejects.toThrow(
        new PrerequisiteError(`No audio files found in ${inputDir}`),
      );
    });
  });

  it("analyzes one sample from its duration and transcript", async () => {
    const transcriber: Transcriber = { transcribe: vi.fn().mockResolvedValue("one two three four") };
    const file = { name: "s.mp3", path: "/samples/s.mp3", mimeType: "audio/mpeg" };

    await expect(analyzeSample(file, transcriber, async () => 2)).resolves.toEqual({
      file: "s.mp3",
      durationSeconds: 2,
      transcript: "one two three four",
      wordCount: 4,
      wpm: 120,
    });
    expect(transcriber.transcribe).toHaveBeenCalledWith(file);
  });

  it("records zero words and zero WPM for an empty transcript", async () => {
    const transcriber: Transcriber = { transcribe: vi.fn().mockResolvedValue("") };
    const file = { name: "silence.wav", path: "/samples/silence.wav", mimeType: "audio/wav" };

    await expect(analyzeSample(file, transcriber, async () => 30)).resolves.toEqual({
      file: "silence.wav",
      durationSeconds: 30,
      transcript: "",
      wordCount: 0,
      wpm: 0,
    });
  });

  describe("summarizeSamples", () => {
    it("averages per-file WPM without weighting by duration", () => {
      const summary = summarizeSamples([
        sample({ durationSeconds: 60, wordCount: 100, wpm: 100 }),
        sample({ durationSeconds: 240, wordCount: 800, wpm: 200 }),
      ]);

      expect(summary).toEqual({
        filesAnalyzed: 2,
        totalWords: 900,
        totalDurationSeconds: 300,
        averageWpm: 150,
      });
    });

    it("is all zeros for no samples", () => {
      expect(summarizeSamples([])).toEqual({
        filesAnalyzed: 0,
        totalWords: 0,
        totalDurationSeconds: 0,
        averageWpm: 0,
      });
    });
  });

  it("rounds report values to the published precision", () => {
    const analyzedAt = new Date("2026-03-14T09:30:05.000Z");
    const report = buildAnalysisReport(
      [sample({ file: "x.mp3", durationSeconds: 61.237, transcript: "hi", wordCount: 157, wpm: 153.8296 })],
      analyzedAt,
    );

    expect(report).toEqual({
      analysis_date: "2026-03-14T09:30:05.000Z",
      summary: {
        files_analyzed: 1,
        total_words: 157,
        total_duration_seconds: 61.24,
        average_wpm: 153.8,
      },
      files: [{ file: "x.mp3", duration_seconds: 61.24, word_count: 157, wpm: 153.8, transcript: "hi" }],
    });
  });

  describe("runWpmAnalysis", () => {
    const durations: Record<string, number> = { "first.mp3": 60, "second.mp3": 120 };
    const transcripts: Record<string, string> = { "first.mp3": words(150), "second.mp3": words(300) };

    const transcriber: Transcriber = {
      transcribe: async (audio) => transcripts[audio.name],
    };
    const readDuration = async (filePath: string) => durations[path.basename(filePath)];

    it("measures every file and writes the report", async () => {
      await fs.writeFile(path.join(inputDir, "second.mp3"), "");
      await fs.writeFile(path.join(inputDir, "first.mp3"), "");
      const createTranscriber = vi.fn(() => transcriber);

      const result = await runWpmAnalysis(
        { apiKey: "test-secret", model: "gemini-test", inputDir, outputPath },
        { createTranscriber, readDuration, now: () => new Date("2026-01-02T03:04:05.000Z") },
      );

      expect(createTranscriber).toHaveBeenCalledWith({ apiKey: "test-secret", model: "gemini-test" });
      expect(result.report.summary).toEqual({
        files_analyzed: 2,
        total_words: 450,
        total_duration_seconds: 180,
        average_wpm: 150,
      });
      expect(result.report.files.map((file) => [file.file, file.wpm])).toEqual([
        ["first.mp3", 150],
        ["second.mp3", 150],
      ]);

      const written: unknown = JSON.parse(await fs.readFile(outputPath, "utf8"));
      expect(written).toEqual(result.report);
    });

    it("fails without an API key and writes nothing", async () => {
      await fs.writeFile(path.join(inputDir, "first.mp3"), "");
      const createTranscriber = vi.fn(() => transcriber);

      await expect(
        runWpmAnalysis({ apiKey: "", model: "gemini-test", inputDir, outputPath }, { createTranscriber, readDuration }),
      ).rejects.toThrow(new PrerequisiteError("GEMINI_API_KEY environment variable not set."));

      expect(createTranscriber).not.toHaveBeenCalled();
      await expect(fs.access(path.dirname(outputPath))).rejects.toMatchObject({ code: "ENOENT" });
    });

    it("keeps going past a silent sample", async () => {
      await fs.writeFile(path.join(inputDir, "first.mp3"), "");
      await fs.writeFile(path.join(inputDir, "quiet.mp3"), "");
      const withSilence: Transcriber = {
        transcribe: async (audio) => (audio.name === "quiet.mp3" ? "" : transcripts[audio.name]),
      };

      const result = await runWpmAnalysis(
        { apiKey: "test-secret", model: "gemini-test", inputDir, outputPath },
        {
          createTranscriber: () => withSilence,
          readDuration: async (filePath) => (path.basename(filePath) === "quiet.mp3" ? 20 : 60),
        },
      );

      expect(result.report.files.map((file) => [file.file, file.word_count, file.wpm])).toEqual([
        ["first.mp3", 150, 150],
        ["quiet.mp3", 0, 0],
      ]);
      expect(result.report.summary.average_wpm).toBe(75);
    });

    it("aborts the batch on the first failing file without writing a report", async () => {
      await fs.writeFile(path.join(inputDir, "first.mp3"), "");
      await fs.writeFile(path.join(inputDir, "second.mp3"), "");
      const failing: Transcriber = {
        transcribe: async (audio) => {
          if (audio.name === "second.mp3") {
            throw new Error("upload failed");
          }
          return transcripts[audio.name];
        },
      };

      await expect(
        runWpmAnalysis(
          { apiKey: "test-secret", model: "gemini-test", inputDir, outputPath },
          { createTranscriber: () => failing, readDuration },
        ),
      ).rejects.toThrow("upload failed");
      await expect(fs.access(outputPath)).rejects.toMatchObject({ code: "ENOENT" });
    });
  });
});
