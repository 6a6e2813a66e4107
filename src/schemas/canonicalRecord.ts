import { z } from 'zod';

/**
 * Schema Version - written into every serialized batch file
 */
export const SCHEMA_VERSION = '1.0.0' as const;

/**
 * Media types emitted by bird in the `media` array
 */
export const MediaTypeSchema = z.enum(['photo', 'video', 'animated_gif']);
export type MediaType = z.infer<typeof MediaTypeSchema>;

/**
 * MediaItem Schema - one attachment as bird reports it.
 *
 * Transient: consumed during normalization into the image/video URL lists
 * on CanonicalRecord and never persisted on its own.
 */
export const MediaItemSchema = z.object({
  type: MediaTypeSchema,

  /** Direct URL to the media (thumbnail for videos) */
  url: z.string(),

  /** Dimensions are informational; unusable values are dropped */
  width: z.number().int().positive().optional().catch(undefined),
  height: z.number().int().positive().optional().catch(undefined),

  /** For videos: highest bitrate MP4 */
  videoUrl: z.string().optional(),
});
export type MediaItem = z.infer<typeof MediaItemSchema>;

/**
 * CanonicalRecord Schema - one normalized post.
 *
 * createdAt is an ISO 8601 string when the raw post carried a timestamp
 * (unparseable values fall back to the fetch time) and the empty string when
 * the raw post had none.
 */
export const CanonicalRecordSchema = z
  .object({
    // ============================================
    // Identity
    // ============================================

    /** Post ID as reported by bird (empty when absent) */
    id: z.string(),

    /** URL the post was fetched from */
    url: z.string(),

    // ============================================
    // Content
    // ============================================

    text: z.string(),

    createdAt: z.union([z.string().datetime({ offset: true }), z.literal('')]),

    // ============================================
    // Author
    // ============================================

    authorHandle: z.string(),
    authorName: z.string().optional(),

    // ============================================
    // Media
    // ============================================

    /** Full-resolution image URLs, in media order */
    images: z.array(z.string()),

    /** Highest-bitrate MP4 URLs, in media order */
    videos: z.array(z.string()),

    // ============================================
    // Thread
    // ============================================

    isThread: z.boolean(),

    /** Conversation root ID, kept even when it equals the post's own ID */
    threadRootId: z.string().optional(),
  })
  .refine(
    (record) =>
      record.isThread === (record.threadRootId !== undefined && record.threadRootId !== record.id),
    { message: 'isThread must be true exactly when threadRootId differs from id', path: ['isThread'] }
  );

export type CanonicalRecord = z.infer<typeof CanonicalRecordSchema>;
