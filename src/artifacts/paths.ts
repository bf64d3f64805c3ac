import { basename, join } from 'node:path';
import { nanoid } from 'nanoid';

export const SNAPSHOT_PREFIX = '.workflow_state_';
export const SNAPSHOT_SUFFIX = '.json';
export const STAGING_PREFIX = '.temp_';

export const ARTICLE_FILE = 'article.html';
export const RESEARCH_FILE = 'research.json';
export const INDEX_FILE = 'index.html';

export const MAX_KEYWORD_LENGTH = 200;

// File names are capped at 255 bytes; prefixes, timestamps and suffixes take
// the rest
export const MAX_KEYWORD_SLUG_BYTES = 150;

/**
 * Replace everything but letters, digits, '-' and '_' with '_'.
 */
export function sanitizeKeyword(keyword: string): string {
  return Array.from(keyword.trim())
    .map((c) => (/^[\p{L}\p{N}_-]$/u.test(c) ? c : '_'))
    .join('');
}

/**
 * Sanitized keyword cut to whole characters fitting in `maxBytes` of UTF-8.
 */
export function keywordSlug(keyword: string, maxBytes: number = MAX_KEYWORD_SLUG_BYTES): string {
  let slug = '';
  let bytes = 0;
  for (const c of sanitizeKeyword(keyword)) {
    const size = Buffer.byteLength(c, 'utf-8');
    if (bytes + size > maxBytes) break;
    slug += c;
    bytes += size;
  }
  return slug;
}

/**
 * UTC timestamp in YYYYMMDD_HHMMSS form.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => n.toString().padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Session ids embed keyword and start time; the random suffix keeps two runs
 * started in the same second apart.
 */
export function createSessionId(keyword: string, startedAt: Date): string {
  return `${keywordSlug(keyword)}_${formatTimestamp(startedAt)}_${nanoid(6)}`;
}

export function getSnapshotPath(outputRoot: string, sessionId: string): string {
  return join(outputRoot, `${SNAPSHOT_PREFIX}${sessionId}${SNAPSHOT_SUFFIX}`);
}

export function getStagingDir(outputRoot: string, sessionId: string): string {
  return join(outputRoot, `${STAGING_PREFIX}${sessionId}`);
}

export function getFinalDir(outputRoot: string, keyword: string, committedAt: Date): string {
  return join(outputRoot, `${keywordSlug(keyword)}_${formatTimestamp(committedAt)}`);
}

export function isSnapshotFileName(name: string): boolean {
  return (
    name.startsWith(SNAPSHOT_PREFIX) &&
    name.endsWith(SNAPSHOT_SUFFIX) &&
    name.length > SNAPSHOT_PREFIX.length + SNAPSHOT_SUFFIX.length
  );
}

export function isStagingDirName(name: string): boolean {
  return name.startsWith(STAGING_PREFIX) && name.length > STAGING_PREFIX.length;
}

/**
 * Recover the session id from a snapshot path, or null if the name does not
 * follow the snapshot pattern.
 */
export function sessionIdFromSnapshotPath(path: string): string | null {
  const name = basename(path);
  if (!isSnapshotFileName(name)) {
    return null;
  }
  return name.slice(SNAPSHOT_PREFIX.length, -SNAPSHOT_SUFFIX.length);
}
