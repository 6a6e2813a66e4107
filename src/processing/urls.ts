/**
 * X URL Handling
 */

/**
 * Parsed X/Twitter URL
 */
export interface ParsedXUrl {
  type: 'tweet' | 'profile' | 'unknown';
  username: string | null;
  tweetId: string | null;
}

const TWEET_PATTERN = /^https?:\/\/(?:www\.)?(?:x|twitter)\.com\/([^/]+)\/status\/(\d+)/;
const PROFILE_PATTERN = /^https?:\/\/(?:www\.)?(?:x|twitter)\.com\/([^/]+)\/?$/;

/**
 * Extract username and post ID from an X/Twitter URL.
 *
 * @example
 * parseXUrl('https://x.com/jack/status/20')
 * // { type: 'tweet', username: 'jack', tweetId: '20' }
 */
export function parseXUrl(url: string): ParsedXUrl {
  const trimmed = url.trim();

  const tweet = TWEET_PATTERN.exec(trimmed);
  if (tweet) {
    return { type: 'tweet', username: tweet[1], tweetId: tweet[2] };
  }

  const profile = PROFILE_PATTERN.exec(trimmed);
  if (profile) {
    return { type: 'profile', username: profile[1], tweetId: null };
  }

  return { type: 'unknown', username: null, tweetId: null };
}

/**
 * Rewrite twitter.com URLs to x.com
 */
export function normalizeXUrl(url: string): string {
  return url.trim().replace(/twitter\.com/g, 'x.com');
}
