import { z } from 'zod';

/**
 * Counters arrive as decimal strings and may be missing when the owner hides
 * them; a hidden counter reads as 0.
 */
const counter = z.coerce.number().int().nonnegative().default(0);

export const channelListSchema = z.object({
    items: z
        .array(
            z.object({
                id: z.string(),
                snippet: z.object({ title: z.string() }).optional(),
                statistics: z.object({
                    viewCount: counter,
                    subscriberCount: counter,
                    hiddenSubscriberCount: z.boolean().optional(),
                    videoCount: counter
                })
            })
        )
        .default([])
});

export const videoListSchema = z.object({
    items: z
        .array(
            z.object({
                id: z.string(),
                snippet: z
                    .object({
                        title: z.string(),
                        publishedAt: z.string().optional()
                    })
                    .optional(),
                statistics: z.object({
                    viewCount: counter,
                    likeCount: counter,
                    commentCount: counter
                })
            })
        )
        .default([])
});

/**
 * ISO 8601 duration (`PT1H2M3S`, `P1DT2H`) in seconds; anything else reads as 0.
 */
const duration = z
    .string()
    .optional()
    .transform(value => {
        const match = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/.exec(value ?? '');
        if (!match) {
            return 0;
        }
        const [, days, hours, minutes, seconds] = match.map(part => Number(part ?? 0));
        return (days ?? 0) * 86_400 + (hours ?? 0) * 3600 + (minutes ?? 0) * 60 + (seconds ?? 0);
    });

export const trendingListSchema = z.object({
    items: z
        .array(
            z.object({
                id: z.string(),
                snippet: z.object({
                    title: z.string(),
                    channelTitle: z.string().default(''),
                    categoryId: z.string().default(''),
                    publishedAt: z.string().default(''),
                    description: z.string().default(''),
                    tags: z.array(z.string()).default([])
                }),
                statistics: z
                    .object({
                        viewCount: counter,
                        likeCount: counter,
                        commentCount: counter
                    })
                    .default({}),
                contentDetails: z.object({ duration }).default({})
            })
        )
        .default([])
});

export const playlistItemsSchema = z.object({
    items: z
        .array(
            z.object({
                contentDetails: z.object({ videoId: z.string() })
            })
        )
        .default([])
});

export const commentThreadsSchema = z.object({
    items: z
        .array(
            z.object({
                snippet: z.object({
                    topLevelComment: z.object({
                        snippet: z.object({
                            authorDisplayName: z.string().default('Unknown'),
                            textDisplay: z.string().default(''),
                            likeCount: counter
                        })
                    })
                })
            })
        )
        .default([])
});

/**
 * Error envelope returned with non-success statuses.
 */
export const apiErrorSchema = z.object({
    error: z.object({
        code: z.number().optional(),
        message: z.string().optional(),
        errors: z.array(z.object({ reason: z.string().optional() })).optional()
    })
});
