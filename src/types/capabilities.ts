import type { AudioFile } from "./wpm.js";

/** Speech-to-text backend used by the WPM analyzer. */
export interface Transcriber {
  transcribe(audio: AudioFile): Promise<string>;
}

/** Text backend used by the script generator. */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

/** Returns an audio file's length in seconds. */
export type DurationReader = (filePath: string) => Promise<number>;
