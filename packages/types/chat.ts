import { z } from 'zod';

/** Body of `POST /chat/messages`. */
export const InboundMessage = z.object({
  userId: z.string().trim().min(1, 'userId is required'),
  text: z.string().trim().min(1, 'text is required').max(4000),
});
export type InboundMessage = z.infer<typeof InboundMessage>;

export const ChatReply = z.object({
  reply: z.string(),
});
export type ChatReply = z.infer<typeof ChatReply>;
