#!/usr/bin/env node
/** Measures words per minute for every sample in wpm-measure/. */
import { env } from "../config/env.js";
import { resolvePaths } from "../config/paths.js";
import { runWpmAnalysis } from "../services/wpm-analyzer.js";
import { banner, runCli } from "./run.js";

const USAGE = `Usage: analyze-wpm

Transcribes every audio file in wpm-measure/ with Gemini and writes
user-context/wpm-analysis.json. Requires GEMINI_API_KEY.`;

async function main() {
  const args = process.argv.slice(2);
  if (args.includes("-h") || args.includes("--help")) {
    console.log(USAGE);
    return;
  }

  await runCli(async () => {
    const paths = resolvePaths(env.projectRoot);
    const { summary, outputPath } = await runWpmAnalysis({
      apiKey: env.geminiApiKey,
      model: env.geminiModel,
      inputDir: paths.wpmInputDir,
      outputPath: paths.wpmReportPath,
    });

    console.log(banner());
    console.log("SUMMARY");
    console.log(banner());
    console.log(`Files analyzed: ${summary.filesAnalyzed}`);
    console.log(`Total words: ${summary.totalWords}`);
    console.log(
      `Total duration: ${summary.totalDurationSeconds.toFixed(1)} seconds (${(summary.totalDurationSeconds / 60).toFixed(2)} minutes)`,
    );
    console.log(`Average WPM: ${summary.averageWpm.toFixed(1)}`);
    console.log(`\nResults saved to: ${outputPath}`);
  }, USAGE);
}

void main();
