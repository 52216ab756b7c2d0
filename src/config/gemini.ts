import { PrerequisiteError } from "../lib/errors.js";

export type GeminiConfig = {
  apiKey: string;
  model: string;
};

/**
 * Instruction sent alongside every uploaded sample. The transcript feeds the
 * word count directly, so the model must return the spoken words only.
 */
export const TRANSCRIPTION_INSTRUCTION =
  "Transcribe this audio exactly as spoken. " +
  "Return ONLY the transcription text, nothing else.";

export const API_KEY_HINT = "Get your API key from: https://aistudio.google.com/apikey";

/** Upload MIME types for the sample formats the analyzer accepts. */
export const AUDIO_MIME_TYPES: Readonly<Record<string, string>> = {
  ".mp3": "audio/mpeg",
  ".wav": "audio/wav",
  ".m4a": "audio/mp4",
  ".aac": "audio/aac",
  ".flac": "audio/flac",
  ".ogg": "audio/ogg",
};

/** Returns the key, or fails the run before any remote call or file write. */
export function requireApiKey(apiKey: string): string {
  if (!apiKey) {
    throw new PrerequisiteError("GEMINI_API_KEY environment variable not set.", [API_KEY_HINT]);
  }
  return apiKey;
}
