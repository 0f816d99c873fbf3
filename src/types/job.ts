import type { TrackOutcomeStatus } from '@/services/subtitle-translation/types';

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface TranslationFileInput {
  fileId: string;
  sourcePath: string;
  sourceLanguage: string;
}

export interface JobCreatePayload {
  files: TranslationFileInput[];
  targetLanguages: string[];
}

/** Result of one file in one target language. */
export interface FileTranslationOutcome {
  fileId: string;
  targetLanguage: string;
  status: TrackOutcomeStatus;
  unresolvedCount: number;
  preserved: number;
  translated: number;
  unresolvedCueIndices: number[];
  outputPath?: string;
  vttPath?: string;
  error?: string;
  finishedAt: string;
}

export interface JobError {
  message: string;
  at: string;
  fileId?: string;
}

export interface JobRecord {
  id: string;
  files: TranslationFileInput[];
  targetLanguages: string[];
  status: JobStatus;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  outcomes: FileTranslationOutcome[];
  errors: JobError[];
}

export interface JobsDb {
  jobs: JobRecord[];
}
