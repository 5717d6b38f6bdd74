/**
 * Feedgate — Feed Normalizer
 *
 * Turns feed markup into plain text and picks the media worth posting.
 */

import he from 'he';
import type { MediaKind } from '../types';

// ============================================================
// TEXT
// ============================================================

/**
 * Decode named and numeric HTML entities.
 */
export function decodeEntities(text: string): string {
  return he.decode(text);
}

/**
 * Remove tags, decode entities and collapse whitespace.
 */
export function stripHtml(text: string | undefined | null): string {
  if (!text) return '';
  const withoutTags = text.replace(/<[^>]+>/g, ' ');
  return decodeEntities(withoutTags).replace(/\s+/g, ' ').trim();
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3)}...`;
}

// ============================================================
// MEDIA
// ============================================================

const SKIPPED_IMAGE_PATTERNS = [
  'icon',
  'logo',
  'badge',
  'avatar',
  'emoji',
  'button',
  'pixel',
  'tracking',
  'ads',
  'banner',
  'sprite',
  '1x1',
  'spacer',
];

const MIN_IMAGE_URL_LENGTH = 20;

/**
 * First `<img>` in the markup that does not look like chrome
 * (icons, badges, tracking pixels, inline data).
 */
export function extractImageFromHtml(html: string | undefined | null): string | undefined {
  if (!html) return undefined;

  const pattern = /<img[^>]+src=["']([^"']+)["'][^>]*>/gi;
  for (const match of html.matchAll(pattern)) {
    const url = decodeEntities(match[1] ?? '');
    const lower = url.toLowerCase();

    if (url.startsWith('data:')) continue;
    if (url.length < MIN_IMAGE_URL_LENGTH) continue;
    if (SKIPPED_IMAGE_PATTERNS.some(skip => lower.includes(skip))) continue;

    return url;
  }

  return undefined;
}

const VIDEO_EXTENSIONS = ['.mp4', '.webm', '.mov', '.m3u8'];

/**
 * Media kind from a MIME type, falling back to the URL's extension.
 */
export function detectMediaKind(url: string | undefined, mimeType?: string): MediaKind {
  if (mimeType?.startsWith('video/')) return 'video';
  if (mimeType?.startsWith('image/')) return 'image';
  if (!url) return 'image';

  const path = pathOf(url).toLowerCase();
  return VIDEO_EXTENSIONS.some(ext => path.endsWith(ext)) ? 'video' : 'image';
}

function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
}
