/** Base class for every failure the pipeline raises on purpose. */
export class ScrapeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The page did not load within the navigation timeout. */
export class NavigationError extends ScrapeError {
  constructor(
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(`Navigation to ${url} did not complete`, options);
  }
}

/** An in-page action (pagination, season switch) never replaced the content. */
export class StalePageError extends ScrapeError {
  constructor(
    readonly action: string,
    readonly attempts: number,
    readonly page?: number,
  ) {
    super(`Content unchanged after ${action} (${attempts} checks)`);
  }
}

/** An expected DOM marker is absent; usually means the layout changed. */
export class ContentNotFoundError extends ScrapeError {
  constructor(
    readonly marker: string,
    detail?: string,
    options?: { cause?: unknown },
  ) {
    super(`Expected content not found: ${marker}${detail ? ` (${detail})` : ''}`, options);
  }
}

/** Nothing has been saved under the requested key. */
export class NotFoundError extends ScrapeError {
  constructor(
    readonly key: string,
    options?: { cause?: unknown },
  ) {
    super(`Nothing saved under ${key}`, options);
  }
}

/** Paginated snapshots disagree about the same metric, or belong to different teams. */
export class InconsistentExtractionError extends ScrapeError {
  constructor(
    readonly key: string,
    message: string,
  ) {
    super(`${key}: ${message}`);
  }
}

/** Extracted data violates a dataset-level expectation (row counts, join keys). */
export class DataQualityError extends ScrapeError {
  constructor(
    message: string,
    readonly issues: string[],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
