import { isRecord } from '../../lib/util';
import { FetchError, FetchErrorKind } from '../errors/fetch.error';

export interface MediaInfo {
  videoUrl: string;
  caption: string;
  authorUsername?: string;
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function firstVideoVersion(item: Record<string, unknown>): string | undefined {
  const versions = item.video_versions;
  if (!Array.isArray(versions)) return undefined;
  const [best] = versions;
  return isRecord(best) ? str(best.url) : undefined;
}

// v1 API shape: { items: [{ video_versions, caption, user, carousel_media? }] }
function fromItems(items: unknown[]): MediaInfo | undefined {
  const [item] = items;
  if (!isRecord(item)) return undefined;

  let videoUrl = firstVideoVersion(item);
  if (!videoUrl && Array.isArray(item.carousel_media)) {
    for (const child of item.carousel_media) {
      videoUrl = isRecord(child) ? firstVideoVersion(child) : undefined;
      if (videoUrl) break;
    }
  }

  if (!videoUrl) {
    throw new FetchError(FetchErrorKind.NotFound, 'Post has no video');
  }

  const caption = isRecord(item.caption) ? str(item.caption.text) : undefined;
  const user = isRecord(item.user) ? str(item.user.username) : undefined;
  return { videoUrl, caption: caption ?? '', authorUsername: user };
}

// legacy GraphQL shape: { graphql: { shortcode_media: { video_url, ... } } }
function fromShortcodeMedia(media: Record<string, unknown>): MediaInfo {
  const videoUrl = str(media.video_url);
  if (!videoUrl) {
    throw new FetchError(FetchErrorKind.NotFound, 'Post has no video');
  }

  let caption = '';
  const captionEdges = isRecord(media.edge_media_to_caption)
    ? media.edge_media_to_caption.edges
    : undefined;
  if (Array.isArray(captionEdges)) {
    const [edge] = captionEdges;
    if (isRecord(edge) && isRecord(edge.node)) {
      caption = str(edge.node.text) ?? '';
    }
  }

  const owner = isRecord(media.owner) ? str(media.owner.username) : undefined;
  return { videoUrl, caption, authorUsername: owner };
}

/**
 * Extracts the playable video URL, caption and author from a post info
 * payload. Throws `NotFound` when the payload describes no post or a post
 * without video.
 */
export function parseMediaInfo(payload: unknown): MediaInfo {
  if (isRecord(payload)) {
    if (Array.isArray(payload.items) && payload.items.length > 0) {
      const info = fromItems(payload.items);
      if (info) return info;
    }

    if (isRecord(payload.graphql) && isRecord(payload.graphql.shortcode_media)) {
      return fromShortcodeMedia(payload.graphql.shortcode_media);
    }
  }

  throw new FetchError(
    FetchErrorKind.NotFound,
    'Post not found or not accessible (private or removed)',
  );
}
