import { z } from "zod";

// Raw node shapes of the GraphQL responses. Each schema checks a single level;
// nested results stay `unknown` until their own decoder reaches them.

export const UserResultSchema = z.object({
  rest_id: z.string(),
  legacy: z.object({
    screen_name: z.string(),
    name: z.string(),
    description: z.string(),
  }),
});

export const NestedResultSchema = z.object({
  result: z.unknown(),
});

export const TweetResultSchema = z.object({
  core: z.object({
    user_results: NestedResultSchema,
  }),
  legacy: z.object({
    full_text: z.string(),
    display_text_range: z.tuple([z.number().int(), z.number().int()]),
    retweeted_status_result: z.unknown().optional(),
  }),
  quoted_status_result: z.unknown().optional(),
});

export const TypenameSchema = z.object({
  __typename: z.string().optional(),
});

export const TweetEntrySchema = z.object({
  content: z.object({
    itemContent: z.object({
      tweet_results: NestedResultSchema,
    }),
  }),
});

export const CursorEntrySchema = z.object({
  content: z.object({
    value: z.string(),
  }),
});

export const TimelineInstructionSchema = z.object({
  type: z.string(),
  entries: z.array(z.unknown()).optional(),
  entry: z.unknown().optional(),
});

export const TimelineResponseSchema = z.object({
  data: z.object({
    user: z.object({
      result: z.object({
        timeline_v2: z.object({
          timeline: z.object({
            instructions: z.array(TimelineInstructionSchema),
          }),
        }),
      }),
    }),
  }),
});

export const UserResponseSchema = z.object({
  data: z.object({
    user: z.object({
      result: z.unknown(),
    }),
  }),
});
