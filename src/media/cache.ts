/**
 * Feedgate — Media Cache
 *
 * Downloads item media once at ingestion time so that publishing does
 * not depend on the remote host still serving it. Files are named by
 * URL hash, so a second download of the same URL reuses the file.
 */

import { createHash } from 'crypto';
import { mkdir, readdir, stat, unlink, writeFile, access } from 'fs/promises';
import { join } from 'path';
import type { MediaKind } from '../types';
import { logger, errorMessage } from '../lib/logger';

// ============================================================
// LIMITS
// ============================================================

const IMAGE_TYPES: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
};

const VIDEO_TYPES: Record<string, string> = {
  'video/mp4': '.mp4',
  'video/webm': '.webm',
  'video/quicktime': '.mov',
};

export const MIN_IMAGE_BYTES = 1024;
export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;
export const MAX_VIDEO_BYTES = 50 * 1024 * 1024;
const REQUEST_TIMEOUT_MS = 30_000;

const log = logger.child({ component: 'media' });

export type MediaResult =
  | { success: true; localPath: string; cached: boolean }
  | { success: false; error: string };

export interface MaterializeOptions {
  timeoutMs?: number;
}

// ============================================================
// HELPERS
// ============================================================

export function mediaDir(dataDir: string, kind: MediaKind): string {
  return join(dataDir, kind === 'video' ? 'videos' : 'images');
}

export function mediaFileName(url: string, extension: string): string {
  const hash = createHash('sha256').update(url).digest('hex').slice(0, 16);
  return `${hash}${extension}`;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function sizeError(kind: MediaKind, size: number): string | null {
  if (kind === 'video') {
    return size > MAX_VIDEO_BYTES ? `Video too large: ${size} bytes` : null;
  }
  if (size > MAX_IMAGE_BYTES) return `Image too large: ${size} bytes`;
  if (size < MIN_IMAGE_BYTES) return `Image too small: ${size} bytes`;
  return null;
}

// ============================================================
// MATERIALIZE
// ============================================================

/**
 * Download `url` into the cache. Failures are returned, not thrown.
 */
export async function materializeMedia(
  url: string,
  kind: MediaKind,
  dataDir: string,
  options: MaterializeOptions = {}
): Promise<MediaResult> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { success: false, error: `Invalid URL: ${url}` };
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return { success: false, error: `Invalid scheme: ${parsed.protocol}` };
  }

  const dir = mediaDir(dataDir, kind);
  const allowed = kind === 'video' ? VIDEO_TYPES : IMAGE_TYPES;

  // Reuse any cached file for this URL, whatever its extension.
  for (const extension of new Set(Object.values(allowed))) {
    const candidate = join(dir, mediaFileName(url, extension));
    if (await exists(candidate)) {
      log.debug('Media already cached', { url, localPath: candidate });
      return { success: true, localPath: candidate, cached: true };
    }
  }

  try {
    const res = await fetch(url, {
      redirect: 'follow',
      signal: AbortSignal.timeout(options.timeoutMs ?? REQUEST_TIMEOUT_MS),
    });
    if (!res.ok) {
      return { success: false, error: `HTTP ${res.status}` };
    }

    const contentType = (res.headers.get('content-type') ?? '').split(';')[0].trim().toLowerCase();
    const extension = allowed[contentType];
    if (!extension) {
      return { success: false, error: `Invalid content type: ${contentType || 'none'}` };
    }

    const contentLength = res.headers.get('content-length');
    if (contentLength && Number.isFinite(Number(contentLength))) {
      const error = sizeError(kind, Number(contentLength));
      if (error) return { success: false, error };
    }

    const bytes = Buffer.from(await res.arrayBuffer());
    const error = sizeError(kind, bytes.length);
    if (error) return { success: false, error };

    await mkdir(dir, { recursive: true });
    const localPath = join(dir, mediaFileName(url, extension));
    await writeFile(localPath, bytes);

    log.info('Downloaded media', { url, localPath, bytes: bytes.length });
    return { success: true, localPath, cached: false };
  } catch (error) {
    return { success: false, error: `Download failed: ${errorMessage(error)}` };
  }
}

// ============================================================
// EVICTION
// ============================================================

/**
 * Remove cached files older than `maxAgeDays`. Returns how many were removed.
 */
export async function evictMedia(
  dataDir: string,
  maxAgeDays: number,
  now: Date = new Date()
): Promise<number> {
  const maxAgeMs = maxAgeDays * 24 * 60 * 60 * 1000;
  let removed = 0;

  for (const kind of ['image', 'video'] as const) {
    const dir = mediaDir(dataDir, kind);
    if (!(await exists(dir))) continue;

    for (const name of await readdir(dir)) {
      const path = join(dir, name);
      try {
        const info = await stat(path);
        if (info.isFile() && now.getTime() - info.mtimeMs > maxAgeMs) {
          await unlink(path);
          removed++;
        }
      } catch (error) {
        log.warn('Could not evict cached file', { path, error: errorMessage(error) });
      }
    }
  }

  if (removed > 0) {
    log.info('Evicted cached media', { removed });
  }
  return removed;
}
