import { capturePage } from '../browser/capture.js';
import type { PageNavigator } from '../browser/navigator.js';
import { errorMessage } from '../errors.js';
import type { RunManifest } from '../pipeline/manifest.js';
import { targetKey } from '../pipeline/targets.js';
import type { SnapshotStore } from '../snapshots/storage.js';
import type { ManifestSummary } from '../types/manifest.js';
import type { PageProfile } from '../types/profile.js';
import type { SeasonInfo } from '../types/reference.js';
import type { FetchTarget, PageCategory } from '../types/target.js';
import { logger } from '../utils/logger.js';

export interface ScrapeDeps {
  navigator: PageNavigator;
  store: SnapshotStore;
  profiles: Record<PageCategory, PageProfile>;
  seasons: SeasonInfo[];
  manifest: RunManifest;
}

export interface ScrapeOptions {
  /** Re-capture targets that already have a snapshot or were found absent */
  force?: boolean;
  /** Checked between targets; a capture in progress always finishes */
  signal?: AbortSignal;
}

/**
 * Captures targets one at a time through the single navigator. A failing
 * target is logged and recorded, and the run moves on to the next one.
 * Saved snapshots and absent markers double as checkpoints, so a rerun
 * resumes where it stopped.
 */
export async function runScrape(
  deps: ScrapeDeps,
  targets: FetchTarget[],
  options: ScrapeOptions = {},
): Promise<ManifestSummary> {
  const { manifest } = deps;

  for (const [index, target] of targets.entries()) {
    const key = targetKey(target);

    if (options.signal?.aborted) {
      logger.warn({ remaining: targets.length - index }, 'Scrape interrupted');
      for (const rest of targets.slice(index)) {
        manifest.record('scrape', targetKey(rest), 'skipped', 'run interrupted before capture');
      }
      break;
    }

    const log = logger.child({ target: key });

    if (!options.force && (await deps.store.has(target))) {
      log.debug('Already captured, skipping');
      manifest.record('scrape', key, 'skipped', 'already captured');
      continue;
    }
    if (!options.force && (await deps.store.isAbsent(target))) {
      log.debug('Known to be absent, skipping');
      manifest.record('scrape', key, 'skipped', 'known to be absent');
      continue;
    }

    try {
      const season = deps.seasons.find((s) => s.id === target.season);
      if (!season) throw new RangeError(`Unknown season: ${target.season}`);
      const profile = deps.profiles[target.category];

      const startMs = Date.now();
      const result = await capturePage(deps.navigator, profile, target, season);
      if (result.status === 'absent') {
        log.info('Page does not exist on the site');
        await deps.store.markAbsent(target, { url: result.url });
        manifest.record('scrape', key, 'skipped', 'no such page');
        continue;
      }

      const meta = await deps.store.save(target, result.html, { url: result.url });
      log.info({ durationMs: Date.now() - startMs, sizeBytes: meta.sizeBytes }, 'Capture completed');
      manifest.record('scrape', key, 'succeeded');
    } catch (err) {
      const name = err instanceof Error ? err.name : 'Error';
      log.error({ err: errorMessage(err), kind: name }, 'Capture failed');
      manifest.record('scrape', key, 'failed', `${name}: ${errorMessage(err)}`);
    }
  }

  return manifest.summary('scrape');
}
