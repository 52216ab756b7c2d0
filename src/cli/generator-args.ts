import { parseArgs } from "node:util";

import { STYLE_NAMES } from "../config/styles.js";
import { UsageError } from "../lib/errors.js";

export type GeneratorArgs = {
  durationMinutes: number;
  style?: string;
  chunks: number;
  chunkDurationMinutes?: number;
  topic: string;
  wpm?: number;
};

export type ParsedGeneratorArgs = { help: true } | { help: false; args: GeneratorArgs };

export function generatorUsage(command = "generate-script"): string {
  const styles = STYLE_NAMES.map((name, index) =>
    `                        ${name}${index === 0 ? " (default)" : ""}`,
  );
  return [
    "Voice Clone Text Generator",
    "",
    `Usage: ${command} -d <duration_minutes> [options]`,
    "",
    "Required:",
    "  -d, --duration      Target total duration in minutes",
    "",
    "Options:",
    "  -s, --style         Text style:",
    ...styles,
    "  -c, --chunks        Number of separate files to generate (default: 1)",
    "  --chunk-duration    Duration per chunk in minutes (alternative to -c)",
    "  -t, --topic         Topic hint for content generation",
    "  --wpm               Override WPM from config",
    "  -h, --help          Show this message",
    "",
    "Examples:",
    `  ${command} -d 30                              # 30 minutes, single file`,
    `  ${command} -d 30 -s narrative                 # 30 min narrative style`,
    `  ${command} -d 30 -c 3                         # 30 min in 3 chunks`,
    `  ${command} -d 30 --chunk-duration 10          # 30 min with 10-min chunks`,
    `  ${command} -d 60 -s technical -t 'AI basics'  # 60 min technical on AI`,
  ].join("\n");
}

function parsePositiveNumber(flag: string, value: string): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isFinite(parsed) || parsed <= 0) {
    throw new UsageError(`--${flag} must be a positive number, got '${value}'`);
  }
  return parsed;
}

function parsePositiveInteger(flag: string, value: string): number {
  const parsed = parsePositiveNumber(flag, value);
  if (!Number.isInteger(parsed)) {
    throw new UsageError(`--${flag} must be a whole number, got '${value}'`);
  }
  return parsed;
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        duration: { type: "string", short: "d" },
        style: { type: "string", short: "s" },
        chunks: { type: "string", short: "c" },
        "chunk-duration": { type: "string" },
        topic: { type: "string", short: "t" },
        wpm: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseGeneratorArgs(argv: string[]): ParsedGeneratorArgs {
  if (argv.length === 0) {
    return { help: true };
  }

  const values = readFlags(argv);

  if (values.help) {
    return { help: true };
  }

  if (values.duration === undefined) {
    throw new UsageError("the following argument is required: -d/--duration");
  }

  const chunkDuration = values["chunk-duration"];

  return {
    help: false,
    args: {
      durationMinutes: parsePositiveNumber("duration", values.duration),
      style: values.style || undefined,
      chunks: values.chunks === undefined ? 1 : parsePositiveInteger("chunks", values.chunks),
      chunkDurationMinutes:
        chunkDuration === undefined ? undefined : parsePositiveNumber("chunk-duration", chunkDuration),
      topic: values.topic ?? "",
      wpm: values.wpm === undefined ? undefined : parsePositiveInteger("wpm", values.wpm),
    },
  };
}
