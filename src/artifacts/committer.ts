/**
 * Atomic output commit.
 *
 * Artifacts are written into a staging directory that only one orchestrator
 * owns, then published with a single rename. Readers of the output root see
 * either no final directory or a complete one.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ArticleOutput, ResearchFindings } from '../types/index.js';
import { CommitError } from '../orchestrator/errors.js';
import { persistenceWarning, type PersistResult } from '../orchestrator/state-store.js';
import { ARTICLE_FILE, INDEX_FILE, RESEARCH_FILE, getStagingDir } from './paths.js';
import {
  injectStylesheet,
  renderArticleHtml,
  renderResearchJson,
  renderReviewPage,
} from './render.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('committer');

export interface ArtifactPaths {
  dir: string;
  articlePath: string;
  researchPath: string;
  indexPath: string;
}

export function getArtifactPaths(dir: string): ArtifactPaths {
  return {
    dir,
    articlePath: join(dir, ARTICLE_FILE),
    researchPath: join(dir, RESEARCH_FILE),
    indexPath: join(dir, INDEX_FILE),
  };
}

/**
 * Write article.html, research.json and index.html into `dir`.
 */
export async function writeArtifacts(
  dir: string,
  keyword: string,
  research: ResearchFindings,
  article: ArticleOutput,
  generatedAt: Date
): Promise<ArtifactPaths> {
  const paths = getArtifactPaths(dir);
  await mkdir(dir, { recursive: true });

  await writeFile(paths.articlePath, injectStylesheet(renderArticleHtml(article)), 'utf-8');
  log.debug({ path: paths.articlePath }, 'Saved article');

  await writeFile(paths.researchPath, renderResearchJson(research), 'utf-8');
  log.debug({ path: paths.researchPath }, 'Saved research data');

  await writeFile(paths.indexPath, renderReviewPage(keyword, article, research, generatedAt), 'utf-8');
  log.debug({ path: paths.indexPath }, 'Created review page');

  return paths;
}

export class AtomicOutputCommitter {
  constructor(private readonly outputRoot: string) {}

  /**
   * Create the staging directory for a session. Leftovers from an earlier
   * attempt of the same session are cleared first.
   */
  async stage(sessionId: string): Promise<string> {
    const stagingDir = getStagingDir(this.outputRoot, sessionId);
    await mkdir(this.outputRoot, { recursive: true });
    await rm(stagingDir, { recursive: true, force: true });
    await mkdir(stagingDir);

    log.debug({ stagingDir }, 'Created staging directory');
    return stagingDir;
  }

  writeArtifacts(
    stagingDir: string,
    keyword: string,
    research: ResearchFindings,
    article: ArticleOutput,
    generatedAt: Date
  ): Promise<ArtifactPaths> {
    return writeArtifacts(stagingDir, keyword, research, article, generatedAt);
  }

  /**
   * Publish the staging directory as `finalDir` with one rename.
   * On failure the staging directory stays where it is.
   */
  async commit(stagingDir: string, finalDir: string): Promise<ArtifactPaths> {
    try {
      await rename(stagingDir, finalDir);
    } catch (error) {
      log.error({ stagingDir, finalDir, error }, 'Atomic commit failed');
      throw new CommitError(stagingDir, finalDir, error);
    }

    log.info({ finalDir }, 'Committed outputs');
    return getArtifactPaths(finalDir);
  }

  /**
   * Best-effort removal of a staging directory.
   */
  async discard(stagingDir: string): Promise<PersistResult> {
    try {
      await rm(stagingDir, { recursive: true, force: true });
      log.debug({ stagingDir }, 'Removed staging directory');
      return { ok: true };
    } catch (error) {
      const warning = persistenceWarning('discard', stagingDir, error);
      log.warn({ stagingDir, error: warning.message }, 'Failed to remove staging directory');
      return { ok: false, warning };
    }
  }
}
