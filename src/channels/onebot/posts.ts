/**
 * OneBot v11 post parsing
 *
 * Turns raw JSON frames from the event socket into typed posts. Anything that
 * is not a message or a lifecycle/heartbeat meta event is ignored. Messages
 * the bot account sent itself (`message_sent`, or a `message` whose sender is
 * the bot) come through marked `fromSelf`.
 */

import { z } from "zod";
import { makeScope } from "../../core/scope.js";
import type { InboundEvent } from "../../core/types.js";

const idSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

const segmentSchema = z.object({
  type: z.string(),
  data: z.record(z.string(), z.unknown()).default({}),
});

export type MessageSegment = z.infer<typeof segmentSchema>;

const senderSchema = z.object({
  user_id: idSchema,
  nickname: z.string().optional(),
  card: z.string().optional(),
  role: z.string().optional(),
});

const messagePostSchema = z.object({
  post_type: z.enum(["message", "message_sent"]),
  message_type: z.enum(["private", "group"]),
  message_id: z.number().int(),
  user_id: idSchema.optional(),
  group_id: idSchema.optional(),
  /** Recipient of a private `message_sent`. */
  target_id: idSchema.optional(),
  self_id: idSchema.optional(),
  time: z.number().optional(),
  raw_message: z.string().default(""),
  message: z.union([z.array(segmentSchema), z.string()]).optional(),
  sender: senderSchema,
});

const lifecyclePostSchema = z.object({
  post_type: z.literal("meta_event"),
  meta_event_type: z.literal("lifecycle"),
  self_id: idSchema,
  sub_type: z.string().optional(),
});

const heartbeatPostSchema = z.object({
  post_type: z.literal("meta_event"),
  meta_event_type: z.literal("heartbeat"),
  status: z
    .object({
      online: z.boolean().optional(),
      good: z.boolean().optional(),
    })
    .passthrough()
    .default({}),
  interval: z.number().optional(),
});

export type OneBotPost =
  | { type: "message"; event: InboundEvent }
  | { type: "lifecycle"; selfId: string; subType?: string }
  | { type: "heartbeat"; online: boolean; good: boolean }
  | { type: "ignored"; postType: string }
  | { type: "invalid"; reason: string };

export interface ParseContext {
  /** Bot account id, once known; used to detect mentions. */
  selfId: string | null;
  now: number;
}

export function parsePost(raw: unknown, ctx: ParseContext): OneBotPost {
  if (typeof raw !== "object" || raw === null || !("post_type" in raw)) {
    return { type: "invalid", reason: "missing post_type" };
  }
  const postType = String(raw.post_type);

  if (postType === "meta_event") {
    const lifecycle = lifecyclePostSchema.safeParse(raw);
    if (lifecycle.success) {
      return {
        type: "lifecycle",
        selfId: lifecycle.data.self_id,
        subType: lifecycle.data.sub_type,
      };
    }
    const heartbeat = heartbeatPostSchema.safeParse(raw);
    if (heartbeat.success) {
      return {
        type: "heartbeat",
        online: heartbeat.data.status.online ?? true,
        good: heartbeat.data.status.good ?? true,
      };
    }
    return { type: "ignored", postType };
  }

  if (postType !== "message" && postType !== "message_sent") return { type: "ignored", postType };

  const parsed = messagePostSchema.safeParse(raw);
  if (!parsed.success) {
    return { type: "invalid", reason: formatIssues(parsed.error) };
  }
  const post = parsed.data;

  const selfId = ctx.selfId ?? post.self_id ?? null;
  const fromSelf =
    post.post_type === "message_sent" || (selfId !== null && post.sender.user_id === selfId);
  const scopeId =
    post.message_type === "group"
      ? post.group_id
      : ((fromSelf ? post.target_id : undefined) ?? post.user_id ?? post.sender.user_id);
  if (scopeId === undefined) return { type: "invalid", reason: "group message without group_id" };

  const segments = Array.isArray(post.message) ? post.message : [];
  const flattened = flattenSegments(segments);
  const text = flattened.length > 0 ? flattened : post.raw_message.trim();
  const senderName = post.sender.card || post.sender.nickname || undefined;

  return {
    type: "message",
    event: {
      scope: makeScope(post.message_type, scopeId),
      senderId: post.sender.user_id,
      senderName,
      text,
      receivedAt: post.time !== undefined ? post.time * 1000 : ctx.now,
      sequenceNo: post.message_id,
      messageId: String(post.message_id),
      mentioned: mentionsSelf(segments, selfId),
      fromSelf,
    },
  };
}

/** Plain-text rendering of a segment array. Faces and unknown segments drop out. */
export function flattenSegments(segments: readonly MessageSegment[]): string {
  const parts = segments.map((segment) => {
    switch (segment.type) {
      case "text":
        return stringField(segment, "text") ?? "";
      case "at":
        return `@<${stringField(segment, "qq") ?? ""}>`;
      case "image":
        return `Image<${stringField(segment, "summary") ?? ""} ${stringField(segment, "file") ?? ""}>`;
      default:
        return "";
    }
  });
  return parts.join("").trim();
}

export function mentionsSelf(segments: readonly MessageSegment[], selfId: string | null): boolean {
  return segments.some((segment) => {
    if (segment.type !== "at") return false;
    const qq = stringField(segment, "qq");
    return qq === "all" || (selfId !== null && qq === selfId);
  });
}

function stringField(segment: MessageSegment, key: string): string | undefined {
  const value = segment.data[key];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}
