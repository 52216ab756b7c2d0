/**
 * Gemini-backed transcription and text generation.
 */
import {
  GoogleGenAI,
  createPartFromUri,
  createUserContent,
  type GenerateContentResponse,
} from "@google/genai";

import { log } from "../logger.js";
import { TRANSCRIPTION_INSTRUCTION, type GeminiConfig } from "../config/gemini.js";
import type { TextGenerator, Transcriber } from "../types/capabilities.js";
import type { AudioFile } from "../types/wpm.js";

function responseText(response: GenerateContentResponse): string {
  const text = response.text?.trim();
  if (!text) {
    log.error("No text returned from Gemini API");
    throw new Error("No text returned from Gemini API");
  }
  return text;
}

export class GeminiClient implements Transcriber, TextGenerator {
  private readonly ai: GoogleGenAI;

  constructor(private readonly config: GeminiConfig) {
    this.ai = new GoogleGenAI({ apiKey: config.apiKey });
  }

  /** Uploads the sample and asks for a verbatim transcript. */
  async transcribe(audio: AudioFile): Promise<string> {
    log.info({ file: audio.name }, "Uploading audio sample");
    const uploaded = await this.ai.files.upload({
      file: audio.path,
      config: { mimeType: audio.mimeType },
    });

    if (!uploaded.uri) {
      throw new Error(`Gemini upload returned no file URI for ${audio.name}`);
    }

    log.info({ file: audio.name, model: this.config.model }, "Transcribing");
    const response = await this.ai.models.generateContent({
      model: this.config.model,
      contents: createUserContent([
        createPartFromUri(uploaded.uri, uploaded.mimeType ?? audio.mimeType),
        TRANSCRIPTION_INSTRUCTION,
      ]),
    });

    // Silent samples come back empty and count as zero words.
    const transcript = response.text?.trim() ?? "";
    if (!transcript) {
      log.warn({ file: audio.name }, "Empty transcript");
    }
    return transcript;
  }

  async generate(prompt: string): Promise<string> {
    log.debug({ model: this.config.model, promptLength: prompt.length }, "Calling Gemini for script text");
    const response = await this.ai.models.generateContent({
      model: this.config.model,
      contents: prompt,
    });

    const text = responseText(response);
    log.debug({ outputLength: text.length }, "Gemini generation complete");
    return text;
  }
}
