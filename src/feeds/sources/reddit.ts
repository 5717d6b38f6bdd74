/**
 * Feedgate — Reddit Feed Source
 *
 * Fetches hot posts from a subreddit through the public JSON listing.
 * Score is the post's upvote count.
 */

import { z } from 'zod';
import { FeedSource, USER_AGENT } from '../base';
import { decodeEntities, detectMediaKind } from '../normalizer';
import type { CandidateItem, MediaKind } from '../../types';
import type { SourceDescriptor } from '../../lib/config';

const REDDIT_BASE = 'https://www.reddit.com';
const LISTING_LIMIT = 25;
const REDDIT_TIMEOUT_MS = 30_000;

const REMOVED_BODIES = new Set(['[removed]', '[deleted]']);
const PLACEHOLDER_THUMBNAILS = new Set(['self', 'default', 'nsfw', 'spoiler', 'image', '']);

const ImageSourceSchema = z.object({
  url: z.string(),
  width: z.number().optional(),
});

const RedditPostSchema = z.object({
  title: z.string(),
  permalink: z.string(),
  url: z.string().optional(),
  selftext: z.string().default(''),
  score: z.number().default(0),
  ups: z.number().optional(),
  stickied: z.boolean().default(false),
  removed_by_category: z.string().nullable().optional(),
  is_video: z.boolean().default(false),
  thumbnail: z.string().optional(),
  post_hint: z.string().optional(),
  media: z
    .object({
      reddit_video: z.object({ fallback_url: z.string() }).optional(),
    })
    .nullable()
    .optional(),
  preview: z
    .object({
      images: z
        .array(
          z.object({
            source: ImageSourceSchema.optional(),
            resolutions: z.array(ImageSourceSchema).default([]),
          })
        )
        .default([]),
    })
    .optional(),
});
export type RedditPost = z.infer<typeof RedditPostSchema>;

const RedditListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ data: z.unknown() })),
  }),
});

interface PickedMedia {
  url: string;
  kind: MediaKind;
}

/**
 * Video from reddit_video, image from the preview (largest available),
 * then a direct image link, then the thumbnail.
 */
export function pickPostMedia(post: RedditPost): PickedMedia | undefined {
  const video = post.media?.reddit_video?.fallback_url;
  if (post.is_video && video) {
    return { url: decodeEntities(video), kind: 'video' };
  }

  const [image] = post.preview?.images ?? [];
  if (image) {
    const best =
      image.source ??
      image.resolutions.reduce<z.infer<typeof ImageSourceSchema> | undefined>(
        (a, b) => (!a || (b.width ?? 0) > (a.width ?? 0) ? b : a),
        undefined
      );
    if (best) return { url: decodeEntities(best.url), kind: 'image' };
  }

  if (post.url && /\.(jpe?g|png|gif|webp)$/i.test(post.url)) {
    return { url: post.url, kind: detectMediaKind(post.url) };
  }

  if (post.thumbnail && !PLACEHOLDER_THUMBNAILS.has(post.thumbnail) && post.thumbnail.startsWith('http')) {
    return { url: decodeEntities(post.thumbnail), kind: 'image' };
  }

  return undefined;
}

/**
 * Hot posts of one subreddit.
 */
export class RedditSource extends FeedSource {
  readonly type = 'reddit' as const;

  private readonly subreddit: string;

  constructor(descriptor: Extract<SourceDescriptor, { type: 'reddit' }>) {
    super(descriptor);
    this.subreddit = descriptor.subreddit;
  }

  get listingUrl(): string {
    return `${REDDIT_BASE}/r/${this.subreddit}/hot.json?limit=${LISTING_LIMIT}`;
  }

  async fetch(): Promise<CandidateItem[]> {
    const res = await fetch(this.listingUrl, {
      headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      signal: AbortSignal.timeout(REDDIT_TIMEOUT_MS),
    });
    if (!res.ok) {
      throw new Error(`Failed to fetch r/${this.subreddit}: ${res.status}`);
    }

    const listing = RedditListingSchema.parse(await res.json());
    const candidates: CandidateItem[] = [];

    for (const child of listing.data.children) {
      const parsed = RedditPostSchema.safeParse(child.data);
      if (!parsed.success) {
        this.logger.debug('Skipping malformed post', { issues: parsed.error.issues.length });
        continue;
      }

      const post = parsed.data;
      if (post.stickied || post.removed_by_category) continue;
      if (REMOVED_BODIES.has(post.selftext.trim())) continue;

      const media = pickPostMedia(post);

      candidates.push({
        sourceName: this.name,
        sourceType: this.type,
        url: `https://reddit.com${post.permalink}`,
        title: decodeEntities(post.title).trim(),
        body: post.selftext.trim(),
        mediaUrl: media?.url,
        score: post.ups ?? post.score,
        mediaKind: media?.kind ?? 'image',
      });
    }

    return candidates;
  }
}
