import { z } from 'zod';

/**
 * Body of POST /image.
 */
export const ImageRequestSchema = z.object({
  prompt: z.string().refine((value) => value.trim().length > 0, {
    message: 'prompt is required',
  }),
});

export type ImageRequestDto = z.infer<typeof ImageRequestSchema>;
