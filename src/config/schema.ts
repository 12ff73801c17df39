/**
 * Configuration schema (Zod)
 */

import { z } from "zod";
import { permissionPolicySchema } from "../policy/schema.js";
import {
  DEFAULT_FOLLOW_UP_BONUS,
  DEFAULT_FOLLOW_UP_TURNS,
  DEFAULT_KEYWORDS,
  DEFAULT_THRESHOLD,
} from "../gateway/activation.js";

export const gatewayConfigSchema = z.object({
  /** OneBot event socket, e.g. ws://127.0.0.1:3001 */
  websocketUrl: z
    .string()
    .url()
    .refine((url) => /^wss?:\/\//i.test(url), { message: "websocketUrl must use ws:// or wss://" }),
  /** OneBot HTTP command API, e.g. http://127.0.0.1:3000 */
  httpUrl: z.string().url(),
  // token can live in secrets.yaml or MURMUR_GATEWAY_TOKEN
  token: z.string().optional(),
  reconnectMaxMs: z.number().int().positive().default(30_000),
  sendTimeoutMs: z.number().int().positive().default(10_000),
});

export const completionConfigSchema = z.object({
  /** OpenAI-compatible base URL, e.g. https://api.openai.com/v1 */
  baseUrl: z.string().url(),
  model: z.string().min(1),
  // apiKey can live in secrets.yaml or MURMUR_API_KEY
  apiKey: z.string().optional(),
  timeoutMs: z.number().int().positive().default(60_000),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  defaultRetryAfterMs: z.number().int().positive().default(5_000),
});

export const contextConfigSchema = z
  .object({
    /** Turns kept per scope. */
    windowSize: z.number().int().positive().default(20),
    /** Turns older than this are left out of requests (0 keeps all). */
    maxTurnAgeMs: z.number().int().nonnegative().default(0),
  })
  .default({});

export const dispatcherConfigSchema = z
  .object({
    concurrency: z.number().int().positive().default(4),
    maxAttempts: z.number().int().positive().default(3),
    baseDelayMs: z.number().int().positive().default(1_000),
    maxDelayMs: z.number().int().positive().default(30_000),
    rateLimitCapMs: z.number().int().positive().default(60_000),
    maxRateLimitRetries: z.number().int().nonnegative().default(5),
    dedupCapacity: z.number().int().positive().default(1_000),
    shutdownTimeoutMs: z.number().int().nonnegative().default(10_000),
  })
  .default({});

export const groupSchema = z
  .object({
    /** `mention`: answer a group message once its activation score reaches `threshold`. */
    activation: z.enum(["mention", "always"]).default("mention"),
    /** Regexes (or plain substrings) that count as a mention. */
    mentionPatterns: z.array(z.string()).optional(),
    keywords: z.record(z.string(), z.number().int()).default({ ...DEFAULT_KEYWORDS }),
    threshold: z.number().int().nonnegative().default(DEFAULT_THRESHOLD),
    followUpBonus: z.number().int().nonnegative().default(DEFAULT_FOLLOW_UP_BONUS),
    /** User turns after a reply that get `followUpBonus`. */
    followUpTurns: z.number().int().nonnegative().default(DEFAULT_FOLLOW_UP_TURNS),
  })
  .default({});

export const loggingSchema = z
  .object({
    info: z.boolean().default(true),
    warning: z.boolean().default(true),
    error: z.boolean().default(true),
    chat: z.boolean().default(true),
    debug: z.boolean().default(false),
    /** Also append log lines to this file. */
    file: z.string().optional(),
  })
  .default({});

export const storageSchema = z
  .object({
    sqlitePath: z.string().default("${MURMUR_HOME}/murmur.db"),
  })
  .default({});

export const configSchema = z.object({
  /** Seeds the gateway reconnect backoff. */
  heartbeatMs: z.number().int().positive().default(500),
  gateway: gatewayConfigSchema,
  completion: completionConfigSchema,
  persona: z.string().default("You are a friendly, concise chat assistant."),
  timezone: z.string().default("UTC"),
  /** When set, replaces the stored permission policy at startup. */
  permission: permissionPolicySchema.optional(),
  context: contextConfigSchema,
  dispatcher: dispatcherConfigSchema,
  group: groupSchema,
  logging: loggingSchema,
  storage: storageSchema,
});

export type Config = z.infer<typeof configSchema>;
export type GatewayConfig = z.infer<typeof gatewayConfigSchema>;
export type CompletionConfig = z.infer<typeof completionConfigSchema>;
export type DispatcherConfig = z.infer<typeof dispatcherConfigSchema>;
