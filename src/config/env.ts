import path from "node:path";
import { fileURLToPath } from "node:url";

import { config as loadEnv } from "dotenv";

const currentDir = path.dirname(fileURLToPath(import.meta.url));

loadEnv();

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";

/** Directory holding package.json, config.json and the working folders. */
export const projectRoot = path.resolve(currentDir, "../..");

export type Env = {
  geminiApiKey: string;
  geminiModel: string;
  logLevel: LogLevel;
  projectRoot: string;
};

function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

/** Builds the typed environment from a raw variable map. */
export function resolveEnv(source: NodeJS.ProcessEnv, root = projectRoot): Env {
  return {
    geminiApiKey: source.GEMINI_API_KEY?.trim() ?? "",
    geminiModel: source.GEMINI_MODEL?.trim() || DEFAULT_GEMINI_MODEL,
    logLevel: parseLogLevel(source.LOG_LEVEL),
    projectRoot: root,
  };
}

export const env = resolveEnv(process.env);
