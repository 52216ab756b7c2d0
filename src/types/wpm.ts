export type IsoDateTime = string;

/** One measured voice sample. */
export type AudioSample = {
  file: string;
  durationSeconds: number;
  transcript: string;
  wordCount: number;
  wpm: number;
};

export type AudioFile = {
  name: string;
  path: string;
  mimeType: string;
};

export type AnalysisSummary = {
  filesAnalyzed: number;
  totalWords: number;
  totalDurationSeconds: number;
  averageWpm: number;
};

/** On-disk shape of user-context/wpm-analysis.json. */
export interface AnalysisReport {
  analysis_date: IsoDateTime;
  summary: {
    files_analyzed: number;
    total_words: number;
    total_duration_seconds: number;
    average_wpm: number;
  };
  files: Array<{
    file: string;
    duration_seconds: number;
    word_count: number;
    wpm: number;
    transcript: string;
  }>;
}
