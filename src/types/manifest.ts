export type RunStage = 'scrape' | 'extract' | 'consolidate';
export type EntryStatus = 'succeeded' | 'skipped' | 'warning' | 'failed';

export interface ManifestEntry {
  key: string;
  stage: RunStage;
  status: EntryStatus;
  message?: string;
}

export interface ManifestSummary {
  succeeded: number;
  skipped: number;
  warning: number;
  failed: number;
}
