import { z } from 'zod';

const nonBlank = (field: string) =>
  z.string().refine((value) => value.trim().length > 0, {
    message: `${field} is required`,
  });

/**
 * Body of POST /chat: a message that uses the sender's conversation memory.
 */
export const ChatRequestSchema = z.object({
  userId: nonBlank('userId'),
  message: nonBlank('message'),
});

export type ChatRequestDto = z.infer<typeof ChatRequestSchema>;

/**
 * Body of POST /chat/message: a one-off message with no memory.
 */
export const OneShotRequestSchema = z.object({
  message: nonBlank('message'),
});

export type OneShotRequestDto = z.infer<typeof OneShotRequestSchema>;

/**
 * Reply returned by both chat endpoints.
 */
export interface ChatResponseDto {
  response: string;
}
