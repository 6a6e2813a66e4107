/**
 * Post Normalization
 *
 * Converts bird's JSON output into a CanonicalRecord. bird's field names
 * drift between versions (camelCase vs legacy snake_case), so every field
 * is read through an ordered list of fallbacks.
 */

import { MediaItemSchema, type CanonicalRecord, type MediaItem } from '../schemas/index.js';
import { MalformedOutputError } from '../bird/types.js';

// ============================================
// Types
// ============================================

/**
 * Plain JSON object as decoded from bird's stdout
 */
export type RawPost = Record<string, unknown>;

/**
 * Size variants served by X's image host
 */
export type ImageSize = 'orig' | 'large' | 'medium' | 'small' | 'thumb';

/**
 * Options for normalizePost
 */
export interface NormalizeOptions {
  /** Clock used when a timestamp cannot be parsed (default: current time) */
  now?: () => Date;
}

const IMAGE_HOST = 'twimg.com';

// ============================================
// Value Access
// ============================================

/**
 * Check for a plain (non-array) object
 */
export function isRawPost(value: unknown): value is RawPost {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a nested value, returning undefined when any step is missing.
 *
 * @example
 * safeGet(raw, 'legacy', 'conversation_id_str')
 */
export function safeGet(data: unknown, ...keys: string[]): unknown {
  let current: unknown = data;
  for (const key of keys) {
    if (!isRawPost(current)) {
      return undefined;
    }
    current = current[key];
    if (current === undefined || current === null) {
      return undefined;
    }
  }
  return current;
}

/**
 * Coerce an ID-like value (bird emits both strings and numbers).
 * Numbers past 2^53 already lost digits in JSON.parse and count as absent.
 */
function asId(value: unknown): string | undefined {
  if (typeof value === 'string' && value !== '') return value;
  if (typeof value === 'number' && Number.isSafeInteger(value)) return String(value);
  return undefined;
}

/**
 * First non-empty string among candidates
 */
function firstString(...values: unknown[]): string | undefined {
  for (const value of values) {
    if (typeof value === 'string' && value !== '') {
      return value;
    }
  }
  return undefined;
}

/**
 * Media entries that validate as MediaItem. The legacy `video_url`
 * spelling is folded into `videoUrl`; other entries are skipped.
 */
function mediaItems(raw: RawPost): MediaItem[] {
  const media = raw.media;
  if (!Array.isArray(media)) {
    return [];
  }

  const items: MediaItem[] = [];
  for (const entry of media) {
    if (!isRawPost(entry)) continue;
    const parsed = MediaItemSchema.safeParse({
      ...entry,
      videoUrl: firstString(entry.videoUrl, entry.video_url),
    });
    if (parsed.success) {
      items.push(parsed.data);
    }
  }
  return items;
}

// ============================================
// Dates
// ============================================

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// e.g. "Wed Jan 08 20:25:00 +0000 2026"
const NATIVE_DATE_PATTERN =
  /^(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun) ([A-Z][a-z]{2}) (\d{1,2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2}) (\d{4})$/;

const ISO_DATE_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parse X's native timestamp format
 */
function parseNativeDate(value: string): Date | null {
  const match = NATIVE_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [, monthName, day, hours, minutes, seconds, sign, offsetHours, offsetMinutes, year] = match;
  const month = MONTHS.indexOf(monthName);
  if (month === -1) {
    return null;
  }

  const dayNum = Number(day);
  const utc = Date.UTC(Number(year), month, dayNum, Number(hours), Number(minutes), Number(seconds));
  const date = new Date(utc);

  // Date.UTC rolls invalid values over (Feb 31 -> Mar 3); reject those
  if (
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== dayNum ||
    Number(hours) > 23 ||
    Number(minutes) > 59 ||
    Number(seconds) > 59
  ) {
    return null;
  }

  const offsetMs = (Number(offsetHours) * 60 + Number(offsetMinutes)) * 60_000;
  return new Date(utc - (sign === '+' ? offsetMs : -offsetMs));
}

/**
 * Parse ISO 8601, treating a trailing Z as +00:00
 */
function parseIsoDate(value: string): Date | null {
  const normalized = value.endsWith('Z') ? `${value.slice(0, -1)}+00:00` : value;
  if (!ISO_DATE_PATTERN.test(normalized)) {
    return null;
  }

  const date = new Date(normalized.replace(' ', 'T'));
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Parse a post timestamp.
 *
 * Tries X's native format, then ISO 8601, then falls back to `now()`.
 * Never throws.
 *
 * @param value - Raw timestamp string
 * @param now - Clock for the fallback
 */
export function parsePostDate(value: string, now: () => Date = () => new Date()): Date {
  const trimmed = value.trim();
  return parseNativeDate(trimmed) ?? parseIsoDate(trimmed) ?? now();
}

// ============================================
// Media
// ============================================

/**
 * Rewrite an X image URL for the given size variant.
 * URLs off the image host are returned unchanged.
 */
export function formatImageUrl(url: string, size: ImageSize = 'orig'): string {
  if (!url || !url.includes(IMAGE_HOST)) {
    return url;
  }

  const [base] = url.split('?');
  return `${base}?format=jpg&name=${size}`;
}

/**
 * Full-resolution image URLs, in media order.
 *
 * Only photo items on the image host are kept. A URL already carrying the
 * legacy `:orig` suffix is left as is.
 */
export function extractImageUrls(raw: RawPost): string[] {
  const images: string[] = [];

  for (const media of mediaItems(raw)) {
    if (media.type !== 'photo') continue;

    const url = media.url;
    if (!url.includes(IMAGE_HOST)) continue;

    const [base] = url.split('?');
    images.push(base.endsWith(':orig') ? url : formatImageUrl(url, 'orig'));
  }

  return images;
}

/**
 * Highest-bitrate MP4 URLs for video and animated_gif items, in media order.
 * Items without a video URL are dropped.
 */
export function extractVideoUrls(raw: RawPost): string[] {
  const videos: string[] = [];

  for (const media of mediaItems(raw)) {
    if (media.type !== 'video' && media.type !== 'animated_gif') continue;

    if (media.videoUrl) {
      videos.push(media.videoUrl);
    }
  }

  return videos;
}

// ============================================
// Normalization
// ============================================

/**
 * Normalize one decoded bird post.
 *
 * @param raw - Decoded JSON value
 * @param sourceUrl - URL the post was fetched from
 * @throws MalformedOutputError when raw is not a plain object
 */
export function normalizePost(
  raw: unknown,
  sourceUrl: string,
  options: NormalizeOptions = {}
): CanonicalRecord {
  if (!isRawPost(raw)) {
    throw new MalformedOutputError('Bird output is not a JSON object');
  }

  const author = isRawPost(raw.author) ? raw.author : {};
  const id = asId(raw.id) ?? '';

  const createdRaw = firstString(raw.createdAt, raw.created_at);
  const createdAt = createdRaw ? parsePostDate(createdRaw, options.now).toISOString() : '';

  const threadRootId = asId(raw.conversationId) ?? asId(safeGet(raw, 'legacy', 'conversation_id_str'));
  const authorName = firstString(author.name, author.displayName);

  const record: CanonicalRecord = {
    id,
    url: sourceUrl,
    text: firstString(raw.text, raw.full_text) ?? '',
    createdAt,
    authorHandle: firstString(author.username, author.handle, author.screen_name) ?? '',
    images: extractImageUrls(raw),
    videos: extractVideoUrls(raw),
    isThread: threadRootId !== undefined && threadRootId !== id,
  };

  if (authorName) record.authorName = authorName;
  if (threadRootId !== undefined) record.threadRootId = threadRootId;

  return record;
}

/**
 * Decode bird's stdout and normalize it.
 *
 * @throws MalformedOutputError when stdout is not JSON or not an object
 */
export function parsePostOutput(
  stdout: string,
  sourceUrl: string,
  options: NormalizeOptions = {}
): CanonicalRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new MalformedOutputError(`Failed to parse Bird output as JSON: ${detail}`);
  }

  return normalizePost(raw, sourceUrl, options);
}
