/**
 * Markdown Output
 *
 * Renders serialized fetch results as markdown.
 */

import type { CanonicalRecord, SerializedResult } from '../schemas/index.js';

/**
 * Truncate text to maxLength, ending with an ellipsis when cut
 */
export function truncateText(text: string, maxLength: number = 280): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, Math.max(0, maxLength - 3))}...`;
}

/**
 * Short plain-text preview of a post, printed after a scrape
 */
export function formatSamplePost(post: CanonicalRecord): string {
  return [
    `@${post.authorHandle || 'unknown'}`,
    '',
    truncateText(post.text),
    '',
    `Images: ${post.images.length} | Videos: ${post.videos.length}`,
  ].join('\n');
}

/**
 * Render one result.
 *
 * Failures render the URL and error; successes render author, text,
 * metadata and media sections, followed by a separator.
 */
export function formatResultMarkdown(result: SerializedResult): string {
  if (!result.success) {
    const error = result.error ?? 'Unknown error';
    return `## ❌ Failed to fetch\n\n**URL:** ${result.url || 'Unknown URL'}\n\n**Error:** ${error}\n`;
  }

  const post = result.data;
  if (!post) {
    return '## ❌ No post data\n';
  }

  const lines: string[] = [];
  const handle = post.authorHandle || 'unknown';
  const url = post.url || result.url;

  lines.push(post.authorName ? `## ${post.authorName} (@${handle})` : `## @${handle}`);
  lines.push('');

  if (post.text) {
    lines.push(post.text);
    lines.push('');
  }

  if (post.createdAt) {
    lines.push(`**Posted:** ${post.createdAt}`);
  }
  if (post.isThread && post.threadRootId) {
    lines.push(`**Thread:** ${post.threadRootId}`);
  }
  lines.push(`**URL:** [${url}](${url})`);
  lines.push('');

  if (post.images.length > 0) {
    lines.push(`### Images (${post.images.length})`);
    lines.push('');
    post.images.forEach((image, i) => {
      lines.push(`![Image ${i + 1}](${image})`);
      lines.push('');
    });
  }

  if (post.videos.length > 0) {
    lines.push(`### Videos (${post.videos.length})`);
    lines.push('');
    post.videos.forEach((video, i) => {
      lines.push(`- [Video ${i + 1}](${video})`);
    });
    lines.push('');
  }

  lines.push('---');
  lines.push('');

  return lines.join('\n');
}

/**
 * Render a batch with a summary header
 */
export function formatBatchMarkdown(results: readonly SerializedResult[]): string {
  if (results.length === 0) {
    return '# No posts fetched\n';
  }

  const succeeded = results.filter((r) => r.success).length;
  const lines = [
    '# Fetched Posts',
    '',
    `**Total:** ${results.length} posts | **Success:** ${succeeded} | **Failed:** ${results.length - succeeded}`,
    '',
    '---',
    '',
    ...results.map(formatResultMarkdown),
  ];

  return lines.join('\n');
}
