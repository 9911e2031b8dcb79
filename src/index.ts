/**
 * Runs the pipeline, or one stage of it.
 * Usage: tsx src/index.ts [scrape|extract|consolidate|all] [--season=2022_23,2023_24] [--force]
 */
import 'dotenv/config';
import path from 'node:path';
import { withBrowserSession } from './browser/session.js';
import { PageNavigator } from './browser/navigator.js';
import { createSiteProfiles } from './browser/site-profile.js';
import { UniformPacing } from './compliance/pacing.js';
import { config } from './config.js';
import { MetricRegistry } from './extractors/metric-registry.js';
import { IntermediateStore } from './pipeline/intermediate.js';
import { RunManifest } from './pipeline/manifest.js';
import { buildScrapeTargets } from './pipeline/targets.js';
import { TeamResolver } from './pipeline/team-resolver.js';
import { metrics, seasons as allSeasons, teams } from './reference/index.js';
import { SnapshotStore } from './snapshots/storage.js';
import type { SeasonInfo } from './types/reference.js';
import { onInterrupt } from './utils/interrupt.js';
import { logger } from './utils/logger.js';
import { runConsolidation } from './workers/consolidate-worker.js';
import { runExtraction } from './workers/extract-worker.js';
import { runScrape } from './workers/scrape-worker.js';

const STAGES = ['scrape', 'extract', 'consolidate', 'all'] as const;
type Stage = (typeof STAGES)[number];

interface CliArgs {
  stage: Stage;
  seasons: SeasonInfo[];
  force: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  let stage: Stage = 'all';
  let seasons = allSeasons;
  let force = false;

  for (const arg of argv) {
    if (arg === '--force') {
      force = true;
    } else if (arg.startsWith('--season=')) {
      const ids = arg.slice('--season='.length).split(',');
      seasons = ids.map((id) => {
        const season = allSeasons.find((s) => s.id === id);
        if (!season) throw new Error(`Unknown season: ${id}`);
        return season;
      });
    } else if ((STAGES as readonly string[]).includes(arg)) {
      stage = STAGES.find((s) => s === arg) ?? stage;
    } else {
      throw new Error(`Unrecognised argument: ${arg}`);
    }
  }

  return { stage, seasons, force };
}

async function scrape(args: CliArgs, manifest: RunManifest, signal: AbortSignal): Promise<void> {
  const targets = buildScrapeTargets(args.seasons, config.STATS_PAGES);
  logger.info({ targets: targets.length }, 'Starting scrape');

  await withBrowserSession({ headless: config.HEADLESS }, async (session) => {
    const pacing = new UniformPacing(config.PACING_MIN_MS, config.PACING_MAX_MS);
    const navigator = new PageNavigator(session, pacing, {
      timeoutMs: config.NAV_TIMEOUT_MS,
      paginationRetries: config.PAGINATION_RETRIES,
    });

    const summary = await runScrape(
      {
        navigator,
        store: new SnapshotStore(config.SNAPSHOT_DIR),
        profiles: createSiteProfiles({ tableUrl: config.TABLE_URL, statsUrl: config.STATS_URL }),
        seasons: args.seasons,
        manifest,
      },
      targets,
      { force: args.force, signal },
    );
    logger.info(summary, 'Scrape finished');
  });
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const manifest = new RunManifest();
  const registry = new MetricRegistry(metrics);
  const intermediate = new IntermediateStore(config.EXTRACT_DIR);

  // Stops between targets; the current capture completes first
  const controller = new AbortController();
  const interrupt = onInterrupt(controller);
  process.on('SIGTERM', () => interrupt('SIGTERM'));
  process.on('SIGINT', () => interrupt('SIGINT'));

  try {
    if (args.stage === 'scrape' || args.stage === 'all') {
      await scrape(args, manifest, controller.signal);
    }
    if (controller.signal.aborted) return;

    if (args.stage === 'extract' || args.stage === 'all') {
      await runExtraction(
        {
          snapshots: new SnapshotStore(config.SNAPSHOT_DIR),
          intermediate,
          resolver: new TeamResolver(teams),
          registry,
          manifest,
          statsPages: config.STATS_PAGES,
        },
        args.seasons,
      );
    }

    if (args.stage === 'consolidate' || args.stage === 'all') {
      await runConsolidation({ intermediate, registry, manifest }, args.seasons, config.EXPORT_PATH);
    }
  } finally {
    manifest.report();
    const manifestPath = path.join(
      path.dirname(path.resolve(config.EXPORT_PATH)),
      `manifest-${manifest.startedAt.toISOString().replace(/[:.]/g, '-')}.json`,
    );
    await manifest.write(manifestPath);
  }

  if (manifest.hasFailures()) process.exitCode = 1;
}

main().catch((err) => {
  logger.fatal(err, 'Run failed');
  process.exit(1);
});
