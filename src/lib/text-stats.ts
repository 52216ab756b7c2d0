/** Counts whitespace-separated words. */
export function countWords(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) {
    return 0;
  }
  return trimmed.split(/\s+/).length;
}

/** Words per minute for a sample; zero when the duration is zero. */
export function calculateWpm(wordCount: number, durationSeconds: number): number {
  const durationMinutes = durationSeconds / 60;
  if (durationMinutes === 0) {
    return 0;
  }
  return wordCount / durationMinutes;
}

/** Target word count for a span of speech at the given rate. */
export function wordsForDuration(durationMinutes: number, wpm: number): number {
  return Math.floor(durationMinutes * wpm);
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
