/**
 * Loads config.json for the script generator.
 * - missing file: PrerequisiteError
 * - invalid JSON or a recognized key of the wrong type: ConfigError
 * - missing keys fall back to defaults
 */
import fs from "node:fs/promises";
import path from "node:path";

import { ConfigError, PrerequisiteError, isErrnoException } from "../lib/errors.js";
import { tryParseJson } from "../lib/json.js";
import { DEFAULT_STYLE } from "./styles.js";

export type GeneratorConfig = {
  wpm: number;
  defaultStyle: string;
  /** Advisory only; undefined when the config does not list styles. */
  availableStyles?: string[];
  /** Absolute path, resolved against the config file's directory. */
  outputDirectory: string;
};

export const DEFAULT_WPM = 150;
export const DEFAULT_OUTPUT_DIRECTORY = "output";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function readWpm(value: unknown): number {
  if (value === undefined) {
    return DEFAULT_WPM;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`Config "wpm" must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readOptionalString(key: string, value: unknown): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`Config "${key}" must be a string`);
  }
  return value;
}

function readStyleList(value: unknown): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isStringArray(value)) {
    throw new ConfigError(`Config "available_styles" must be a list of strings`);
  }
  return value;
}

/** Validates a parsed config object. */
export function parseGeneratorConfig(raw: unknown, baseDir: string): GeneratorConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("Config must be a JSON object");
  }

  const defaultStyle = readOptionalString("default_style", raw.default_style);
  const outputDirectory = readOptionalString("output_directory", raw.output_directory);

  return {
    wpm: readWpm(raw.wpm),
    defaultStyle: defaultStyle || DEFAULT_STYLE,
    availableStyles: readStyleList(raw.available_styles),
    outputDirectory: path.resolve(baseDir, outputDirectory || DEFAULT_OUTPUT_DIRECTORY),
  };
}

export async function loadGeneratorConfig(configPath: string): Promise<GeneratorConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new PrerequisiteError(`Config file not found: ${configPath}`);
    }
    throw error;
  }

  const parsed = tryParseJson(raw);
  if (!parsed.ok) {
    throw new ConfigError(`Config file is not valid JSON (${configPath}): ${parsed.error}`);
  }

  return parseGeneratorConfig(parsed.value, path.dirname(configPath));
}

export type StyleResolution = {
  style: string;
  warning?: string;
};

/** Picks the run's style; styles outside the advisory list warn but are used. */
export function resolveStyle(requested: string | undefined, config: GeneratorConfig): StyleResolution {
  const style = requested || config.defaultStyle;
  const available = config.availableStyles ?? [style];
  if (!available.includes(style)) {
    return {
      style,
      warning: `Style '${style}' not in available styles. Using anyway.`,
    };
  }
  return { style };
}
