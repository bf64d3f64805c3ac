/**
 * Sweeps snapshots and staging directories left behind by runs that never
 * reached COMPLETE or ROLLED_BACK.
 */

import type { Dirent } from 'node:fs';
import { readdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { OrphanCleanupResult } from '../types/index.js';
import { isSnapshotFileName, isStagingDirName } from '../artifacts/paths.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('orphan-collector');

const HOUR_MS = 60 * 60 * 1000;

type OrphanKind = 'snapshot' | 'staging';

export class OrphanCollector {
  constructor(private readonly outputRoot: string) {}

  /**
   * Delete orphans whose mtime is more than `olderThanHours` in the past.
   * Per-item errors are logged and collected; this never throws. An age that
   * is not a finite, non-negative number removes nothing.
   */
  async collect(olderThanHours: number, now: number = Date.now()): Promise<OrphanCleanupResult> {
    const result: OrphanCleanupResult = { snapshotsRemoved: 0, dirsRemoved: 0, failures: [] };
    if (!Number.isFinite(olderThanHours) || olderThanHours < 0) {
      log.warn({ outputRoot: this.outputRoot, olderThanHours }, 'Invalid orphan age; skipping cleanup');
      return result;
    }
    const maxAgeMs = olderThanHours * HOUR_MS;

    let entries: Dirent[];
    try {
      entries = await readdir(this.outputRoot, { withFileTypes: true });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        log.error({ outputRoot: this.outputRoot, error }, 'Error listing output directory');
      }
      return result;
    }

    for (const entry of entries) {
      let kind: OrphanKind | null = null;
      if (entry.isFile() && isSnapshotFileName(entry.name)) {
        kind = 'snapshot';
      } else if (entry.isDirectory() && isStagingDirName(entry.name)) {
        kind = 'staging';
      }
      if (!kind) continue;

      const path = join(this.outputRoot, entry.name);

      try {
        const stats = await stat(path);
        if (now - stats.mtimeMs <= maxAgeMs) continue;

        await rm(path, { recursive: kind === 'staging', force: true });

        if (kind === 'snapshot') {
          result.snapshotsRemoved++;
        } else {
          result.dirsRemoved++;
        }
        log.info({ path, kind }, 'Removed orphaned workflow file');
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        result.failures.push({ path, error: message });
        log.warn({ path, kind, error: message }, 'Failed to remove orphaned workflow file');
      }
    }

    if (result.snapshotsRemoved > 0 || result.dirsRemoved > 0) {
      log.info(
        { snapshotsRemoved: result.snapshotsRemoved, dirsRemoved: result.dirsRemoved },
        'Cleaned up orphaned workflow files'
      );
    }

    return result;
  }
}
