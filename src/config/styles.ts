export const STYLE_NAMES = [
  "conversational",
  "narrative",
  "technical",
  "news_anchor",
  "storytelling",
  "educational",
  "podcast",
] as const;

export type StyleName = (typeof STYLE_NAMES)[number];

export const DEFAULT_STYLE: StyleName = "conversational";

const STYLE_PROMPTS: Record<StyleName, string> = {
  conversational:
    "Write in a natural, conversational tone as if speaking to a friend. " +
    "Include occasional filler words, natural pauses, and casual language. " +
    "Topics can range widely - anecdotes, observations, musings.",
  narrative:
    "Write engaging narrative prose suitable for an audiobook. " +
    "Include descriptive passages, varied sentence structures, " +
    "and compelling storytelling. Can be fiction or creative non-fiction.",
  technical:
    "Write clear technical explanations or tutorials. " +
    "Include precise terminology but maintain readability for narration. " +
    "Topics can include technology, science, programming, or engineering.",
  news_anchor:
    "Write in a professional news broadcast style. " +
    "Clear, authoritative tone with good pacing for broadcast delivery. " +
    "Include varied news topics - current events, features, human interest.",
  storytelling:
    "Write immersive short stories or story excerpts. " +
    "Include dialogue, scene descriptions, and emotional moments. " +
    "Vary between action, reflection, and character development.",
  educational:
    "Write informative educational content suitable for a documentary. " +
    "Include interesting facts, clear explanations, and engaging delivery. " +
    "Topics can span history, nature, culture, science.",
  podcast:
    "Write in an engaging podcast monologue style. " +
    "Include rhetorical questions, audience engagement phrases, " +
    "and natural transitions between topics.",
};

export function isKnownStyle(style: string): style is StyleName {
  return STYLE_NAMES.some((name) => name === style);
}

/** Returns the prompt fragment for a style; unknown styles read as conversational. */
export function getStylePrompt(style: string): string {
  return isKnownStyle(style) ? STYLE_PROMPTS[style] : STYLE_PROMPTS[DEFAULT_STYLE];
}
