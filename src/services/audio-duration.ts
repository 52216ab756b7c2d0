import { parseFile } from "music-metadata";

import { log } from "../logger.js";

/** Reads an audio file's duration in seconds from its container metadata. */
export async function readAudioDurationSeconds(filePath: string): Promise<number> {
  const metadata = await parseFile(filePath, { duration: true });
  const duration = metadata.format.duration;

  if (duration === undefined || !Number.isFinite(duration)) {
    throw new Error(`Could not determine audio duration for ${filePath}`);
  }

  log.debug({ filePath, duration, container: metadata.format.container }, "Read audio duration");
  return duration;
}
