import { getStylePrompt } from "../config/styles.js";

export type ScriptPromptOptions = {
  targetWords: number;
  style: string;
  chunkNumber?: number;
  totalChunks?: number;
  topic?: string;
};

const NARRATION_RULES = [
  "Generate ONLY the text to be read aloud",
  "No headers, titles, or metadata",
  "No stage directions or notes",
  "Natural flow suitable for continuous narration",
  "Varied sentence lengths for natural rhythm",
  "Avoid tongue-twisters or overly complex words",
  "Include natural breathing points (commas, periods)",
];

/** Framing for a chunk's place in a multi-part script; empty for single scripts. */
export function describeChunkPosition(chunkNumber: number, totalChunks: number): string {
  if (totalChunks <= 1) {
    return "";
  }
  const part = `This is part ${chunkNumber} of ${totalChunks}. `;
  if (chunkNumber === 1) {
    return `${part}Start fresh with an engaging opening. `;
  }
  if (chunkNumber === totalChunks) {
    return `${part}This is the final part - provide a satisfying conclusion. `;
  }
  return `${part}Continue naturally from a previous section. `;
}

export function buildScriptPrompt(options: ScriptPromptOptions): string {
  const { targetWords, style, chunkNumber = 1, totalChunks = 1, topic } = options;

  const chunkContext = describeChunkPosition(chunkNumber, totalChunks);
  const topicContext = topic ? `Focus on this topic area: ${topic}. ` : "";

  return `Generate text for voice recording/narration.

Target word count: approximately ${targetWords} words (very important - aim for this count)

Style requirements:
${getStylePrompt(style)}

${chunkContext}${topicContext}

Requirements:
${NARRATION_RULES.map((rule) => `- ${rule}`).join("\n")}

Generate the text now:`;
}
