import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { NotFoundError } from '../errors.js';
import { createTarget, targetKey } from '../pipeline/targets.js';
import type { Snapshot, SnapshotMeta } from '../types/snapshot.js';
import type { FetchTarget, PageCategory, SeasonId } from '../types/target.js';

const metaSchema = z.object({
  key: z.string(),
  url: z.string(),
  capturedAt: z.string().datetime(),
  sizeBytes: z.number().int().nonnegative(),
  htmlPath: z.string(),
});

const absentSchema = z.object({
  key: z.string(),
  url: z.string(),
  checkedAt: z.string().datetime(),
});

export type AbsentMarker = z.infer<typeof absentSchema>;

/**
 * Raw rendered pages on disk, one file per target:
 *   <root>/<season>/<category>/<entity>_<page>.html (+ .meta.json)
 * Pages the site does not offer get an `<entity>_<page>.absent.json` marker
 * instead. Saving a target again replaces the previous capture or marker.
 */
export class SnapshotStore {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  htmlPath(target: FetchTarget): string {
    return path.join(
      this.rootDir,
      target.season,
      target.category,
      `${target.entity}_${target.page}.html`,
    );
  }

  async save(
    target: FetchTarget,
    html: string,
    source: { url: string; capturedAt?: Date },
  ): Promise<SnapshotMeta> {
    const htmlPath = this.htmlPath(target);
    await fs.mkdir(path.dirname(htmlPath), { recursive: true });

    const meta: SnapshotMeta = {
      key: targetKey(target),
      url: source.url,
      capturedAt: (source.capturedAt ?? new Date()).toISOString(),
      sizeBytes: Buffer.byteLength(html, 'utf-8'),
      htmlPath,
    };

    // The HTML lands last and via rename, so has() never sees a partial capture.
    await fs.writeFile(metaPath(htmlPath), JSON.stringify(meta, null, 2), 'utf-8');
    const tmpPath = `${htmlPath}.tmp`;
    await fs.writeFile(tmpPath, html, 'utf-8');
    await fs.rename(tmpPath, htmlPath);
    await fs.rm(absentPath(htmlPath), { force: true });

    return meta;
  }

  /** Records that the site showed no such page when the target was visited. */
  async markAbsent(target: FetchTarget, source: { url: string; checkedAt?: Date }): Promise<AbsentMarker> {
    const htmlPath = this.htmlPath(target);
    await fs.mkdir(path.dirname(htmlPath), { recursive: true });

    const marker: AbsentMarker = {
      key: targetKey(target),
      url: source.url,
      checkedAt: (source.checkedAt ?? new Date()).toISOString(),
    };
    await fs.writeFile(absentPath(htmlPath), JSON.stringify(marker, null, 2), 'utf-8');
    return marker;
  }

  async absentMarker(target: FetchTarget): Promise<AbsentMarker | null> {
    try {
      const raw = await fs.readFile(absentPath(this.htmlPath(target)), 'utf-8');
      return absentSchema.parse(JSON.parse(raw));
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async isAbsent(target: FetchTarget): Promise<boolean> {
    return (await this.absentMarker(target)) !== null;
  }

  async load(target: FetchTarget): Promise<Snapshot> {
    const htmlPath = this.htmlPath(target);
    let html: string;
    try {
      html = await fs.readFile(htmlPath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) throw new NotFoundError(targetKey(target), { cause: err });
      throw err;
    }

    const meta = await this.readMeta(htmlPath);
    return {
      target,
      html,
      url: meta?.url ?? '',
      capturedAt: meta ? new Date(meta.capturedAt) : (await fs.stat(htmlPath)).mtime,
    };
  }

  async has(target: FetchTarget): Promise<boolean> {
    try {
      await fs.access(this.htmlPath(target));
      return true;
    } catch (err) {
      if (isMissingFile(err)) return false;
      throw err;
    }
  }

  /** Saved pages of one entity, in page order. */
  async listPages(season: SeasonId, category: PageCategory, entity: string): Promise<FetchTarget[]> {
    let files: string[];
    try {
      files = await fs.readdir(path.join(this.rootDir, season, category));
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const pattern = new RegExp(`^${escapeRegExp(entity)}_(\\d+)\\.html$`);
    const pages: number[] = [];
    for (const file of files) {
      const match = file.match(pattern);
      if (match?.[1]) pages.push(parseInt(match[1], 10));
    }
    return pages
      .sort((a, b) => a - b)
      .map((page) => createTarget(season, entity, category, page));
  }

  private async readMeta(htmlPath: string): Promise<SnapshotMeta | null> {
    try {
      const raw = await fs.readFile(metaPath(htmlPath), 'utf-8');
      return metaSchema.parse(JSON.parse(raw));
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }
}

function metaPath(htmlPath: string): string {
  return htmlPath.replace(/\.html$/, '.meta.json');
}

function absentPath(htmlPath: string): string {
  return htmlPath.replace(/\.html$/, '.absent.json');
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
