import type { FetchTarget } from './target.js';

export interface SnapshotMeta {
  key: string;
  url: string;
  capturedAt: string;
  sizeBytes: number;
  /** Absolute path to the saved HTML file */
  htmlPath: string;
}

export interface Snapshot {
  target: FetchTarget;
  html: string;
  url: string;
  capturedAt: Date;
}
