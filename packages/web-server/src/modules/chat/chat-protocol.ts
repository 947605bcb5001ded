import { z } from 'zod';

const idSchema = z.string().min(1);

const joinRoomSchema = z.object({
  type: z.literal('join_room'),
  roomId: idSchema,
});

const messageSchema = z.object({
  type: z.literal('message'),
  roomId: idSchema,
  content: z.string().trim().min(1, 'content is required'),
  replyTo: idSchema.optional(),
});

const typingSchema = z.object({
  type: z.literal('typing'),
  roomId: idSchema,
  isTyping: z.boolean(),
});

const readMessageSchema = z.object({
  type: z.literal('read_message'),
  messageId: idSchema,
});

const editMessageSchema = z.object({
  type: z.literal('edit_message'),
  messageId: idSchema,
  content: z.string().trim().min(1, 'content is required'),
});

export const clientMessageSchema = z.discriminatedUnion('type', [
  joinRoomSchema,
  messageSchema,
  typingSchema,
  readMessageSchema,
  editMessageSchema,
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

export type ParseResult = { ok: true; message: ClientMessage } | { ok: false; error: string };

export const INVALID_JSON = 'Invalid JSON format';

/**
 * Parse one inbound socket frame
 */
export function parseClientMessage(raw: string): ParseResult {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, error: INVALID_JSON };
  }

  const result = clientMessageSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join('.') ?? '';
    const detail = issue === undefined ? 'Invalid message' : issue.message;
    return { ok: false, error: path === '' ? detail : `${path}: ${detail}` };
  }
  return { ok: true, message: result.data };
}

/**
 * `?token=` from the upgrade request URL
 */
export function tokenFromUrl(url: string | undefined): string | undefined {
  if (url === undefined) {
    return undefined;
  }
  const token = new URL(url, 'http://localhost').searchParams.get('token');
  return token === null || token === '' ? undefined : token;
}
