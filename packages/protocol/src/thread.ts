/**
 * Thread schemas
 *
 * Message bodies are a union selected by `type`. Types this package does
 * not model decode to `{ type: "unknown", raw }` and re-encode as `raw`.
 */

import { type JsonObject, parseWith } from "@modrinth-kit/codec";
import { z } from "zod";
import {
  JsonObjectSchema,
  ModrinthIdSchema,
  ProjectStatusSchema,
  ThreadTypeSchema,
  TimestampSchema,
} from "./common.ts";
import { encodeUser, UserSchema } from "./user.ts";

// ============================================================================
// Message Bodies
// ============================================================================

export const MESSAGE_BODY_TYPES = ["text", "status_change", "thread_closure", "deleted"] as const;

export const TextMessageBodySchema = z.object({
  type: z.literal("text"),
  body: z.string(),
  private: z.boolean(),
  replying_to: ModrinthIdSchema.nullable(),
});
export type TextMessageBody = z.infer<typeof TextMessageBodySchema>;

export const StatusChangeMessageBodySchema = z.object({
  type: z.literal("status_change"),
  old_status: ProjectStatusSchema,
  new_status: ProjectStatusSchema,
});
export type StatusChangeMessageBody = z.infer<typeof StatusChangeMessageBodySchema>;

export const ThreadClosureMessageBodySchema = z.object({ type: z.literal("thread_closure") });
export type ThreadClosureMessageBody = z.infer<typeof ThreadClosureMessageBodySchema>;

export const DeletedMessageBodySchema = z.object({ type: z.literal("deleted") });
export type DeletedMessageBody = z.infer<typeof DeletedMessageBodySchema>;

export interface UnknownMessageBody {
  type: "unknown";
  /** The body exactly as received */
  raw: JsonObject;
}

const isKnownType = (raw: JsonObject): boolean =>
  MESSAGE_BODY_TYPES.some((type) => raw.type === type);

const UnknownMessageBodySchema = JsonObjectSchema.refine((raw) => !isKnownType(raw), {
  message: "Malformed message body",
}).transform((raw): UnknownMessageBody => ({ type: "unknown", raw }));

export const MessageBodySchema = z.union([
  TextMessageBodySchema,
  StatusChangeMessageBodySchema,
  ThreadClosureMessageBodySchema,
  DeletedMessageBodySchema,
  UnknownMessageBodySchema,
]);
export type MessageBody = z.output<typeof MessageBodySchema>;
export type MessageBodyJson = z.input<typeof MessageBodySchema>;

export function decodeMessageBody(raw: unknown, path = "body"): MessageBody {
  return parseWith(MessageBodySchema, raw, path);
}

export function encodeMessageBody(body: MessageBody): MessageBodyJson {
  return body.type === "unknown" ? body.raw : body;
}

// ============================================================================
// Thread
// ============================================================================

export const ThreadMessageSchema = z.object({
  id: ModrinthIdSchema,
  author_id: ModrinthIdSchema.nullable(),
  body: MessageBodySchema,
  created: TimestampSchema,
});
export type ThreadMessage = z.output<typeof ThreadMessageSchema>;
export type ThreadMessageJson = z.input<typeof ThreadMessageSchema>;

export const ThreadSchema = z.object({
  id: ModrinthIdSchema,
  type: ThreadTypeSchema,
  project_id: ModrinthIdSchema.nullable(),
  report_id: ModrinthIdSchema.nullable(),
  messages: z.array(ThreadMessageSchema),
  members: z.array(UserSchema),
});
export type Thread = z.output<typeof ThreadSchema>;
export type ThreadJson = z.input<typeof ThreadSchema>;

export function decodeThread(raw: unknown, path = "thread"): Thread {
  return parseWith(ThreadSchema, raw, path);
}

export function encodeThreadMessage(message: ThreadMessage): ThreadMessageJson {
  return { ...message, body: encodeMessageBody(message.body) };
}

export function encodeThread(thread: Thread): ThreadJson {
  return {
    ...thread,
    messages: thread.messages.map(encodeThreadMessage),
    members: thread.members.map(encodeUser),
  };
}

// ============================================================================
// Outgoing Messages
// ============================================================================

/**
 * Body of a new text message. `private` messages are visible to moderators
 * only.
 */
export function textMessageRequest(body: string, options: { private?: boolean; replyingTo?: string } = {}): JsonObject {
  const out: JsonObject = { type: "text", body };
  if (options.private !== undefined) {
    out.private = options.private;
  }
  if (options.replyingTo !== undefined) {
    out.replying_to = options.replyingTo;
  }
  return { body: out };
}
