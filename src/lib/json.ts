import fs from "node:fs/promises";
import path from "node:path";

export type JsonParseResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

export function tryParseJson(payload: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(payload) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/** Writes pretty-printed JSON, creating parent directories as needed. */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
}
