/**
 * Feedgate — Feed Sources
 *
 * Builds source adapters from validated descriptors.
 */

import type { SourceDescriptor } from '../../lib/config';
import type { FeedSource } from '../base';
import { RssSource } from './rss';
import { RedditSource } from './reddit';

export { RssSource, pickEntryMedia } from './rss';
export { RedditSource, pickPostMedia } from './reddit';

export function createSource(descriptor: SourceDescriptor): FeedSource {
  switch (descriptor.type) {
    case 'rss':
      return new RssSource(descriptor);
    case 'reddit':
      return new RedditSource(descriptor);
  }
}

/**
 * Enabled sources, in the order they are listed.
 */
export function createSources(descriptors: SourceDescriptor[]): FeedSource[] {
  return descriptors.filter(d => d.enabled).map(createSource);
}
