/**
 * Notification schemas
 */

import { parseWith } from "@modrinth-kit/codec";
import { z } from "zod";
import { ModrinthIdSchema, NotificationTypeSchema, TimestampSchema } from "./common.ts";

/**
 * `[method, path]` of the call that performs an action, path relative to
 * the API root
 */
export const ActionRouteSchema = z.tuple([z.string(), z.string()]);
export type ActionRoute = z.infer<typeof ActionRouteSchema>;

export const NotificationActionSchema = z.object({
  title: z.string(),
  action_route: ActionRouteSchema,
});
export type NotificationAction = z.infer<typeof NotificationActionSchema>;

export const NotificationSchema = z.object({
  id: ModrinthIdSchema,
  user_id: ModrinthIdSchema,
  type: NotificationTypeSchema.nullable(),
  title: z.string(),
  text: z.string(),
  link: z.string(),
  read: z.boolean(),
  created: TimestampSchema,
  actions: z.array(NotificationActionSchema),
});
export type Notification = z.infer<typeof NotificationSchema>;

export function decodeNotification(raw: unknown, path = "notification"): Notification {
  return parseWith(NotificationSchema, raw, path);
}
