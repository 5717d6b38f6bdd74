/**
 * Feedgate — RSS / Atom Feed Source
 *
 * Fetches a feed over HTTP and parses it with rss-parser.
 * Media priority: media:content, media:thumbnail, enclosure,
 * then the first significant <img> in the entry markup.
 */

import Parser from 'rss-parser';
import { z } from 'zod';
import { FeedSource, USER_AGENT } from '../base';
import { stripHtml, extractImageFromHtml, detectMediaKind } from '../normalizer';
import type { CandidateItem, MediaKind } from '../../types';
import type { SourceDescriptor } from '../../lib/config';

const FEED_TIMEOUT_MS = 30_000;

interface RssExtras {
  mediaContent?: unknown;
  mediaThumbnail?: unknown;
  'content:encoded'?: unknown;
}

type RssEntry = Parser.Item & RssExtras;

const MediaElementSchema = z.object({
  $: z
    .object({
      url: z.string().optional(),
      type: z.string().optional(),
      medium: z.string().optional(),
      width: z.string().optional(),
    })
    .passthrough(),
});
type MediaElement = z.infer<typeof MediaElementSchema>;

function mediaElements(value: unknown): MediaElement[] {
  const parsed = z.array(MediaElementSchema).safeParse(value);
  return parsed.success ? parsed.data : [];
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

interface PickedMedia {
  url: string;
  kind: MediaKind;
}

/**
 * Pick the entry's media, in priority order.
 */
export function pickEntryMedia(entry: RssEntry): PickedMedia | undefined {
  for (const media of mediaElements(entry.mediaContent)) {
    const { url, type, medium } = media.$;
    if (!url) continue;
    if (!type || type.startsWith('image/') || type.startsWith('video/')) {
      const mime = type ?? (medium === 'video' ? 'video/*' : undefined);
      return { url, kind: detectMediaKind(url, mime) };
    }
  }

  const thumbnails = mediaElements(entry.mediaThumbnail).filter(t => t.$.url);
  if (thumbnails.length > 0) {
    const best = thumbnails.reduce((a, b) =>
      Number(b.$.width ?? 0) > Number(a.$.width ?? 0) ? b : a
    );
    if (best.$.url) return { url: best.$.url, kind: 'image' };
  }

  const enclosure = entry.enclosure;
  if (enclosure?.url && enclosure.type && /^(image|video)\//.test(enclosure.type)) {
    return { url: enclosure.url, kind: detectMediaKind(enclosure.url, enclosure.type) };
  }

  const markup = asString(entry['content:encoded']) ?? entry.content ?? entry.summary;
  const image = extractImageFromHtml(markup);
  return image ? { url: image, kind: 'image' } : undefined;
}

/**
 * RSS or Atom feed.
 */
export class RssSource extends FeedSource {
  readonly type = 'rss' as const;

  private readonly url: string;
  private readonly parser: Parser<Record<string, unknown>, RssExtras>;

  constructor(descriptor: Extract<SourceDescriptor, { type: 'rss' }>) {
    super(descriptor);
    this.url = descriptor.url;
    this.parser = new Parser<Record<string, unknown>, RssExtras>({
      customFields: {
        item: [
          ['media:content', 'mediaContent', { keepArray: true }],
          ['media:thumbnail', 'mediaThumbnail', { keepArray: true }],
        ],
      },
    });
  }

  async fetch(): Promise<CandidateItem[]> {
    const res = await fetch(this.url, {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8',
      },
      signal: AbortSignal.timeout(FEED_TIMEOUT_MS),
    });
    if (!res.ok) {
      throw new Error(`Failed to fetch feed: ${res.status}`);
    }

    const feed = await this.parser.parseString(await res.text());
    const candidates: CandidateItem[] = [];

    for (const entry of feed.items.slice(0, this.maxItems)) {
      const url = entry.link?.trim();
      const title = stripHtml(entry.title);
      if (!url || !title) continue;

      const markup = asString(entry['content:encoded']) ?? entry.content ?? entry.summary ?? '';
      const media = pickEntryMedia(entry);

      candidates.push({
        sourceName: this.name,
        sourceType: this.type,
        url,
        title,
        body: stripHtml(markup),
        mediaUrl: media?.url,
        mediaKind: media?.kind ?? 'image',
      });
    }

    return candidates;
  }
}
