/**
 * Domain types shared by the dispatch pipeline
 */

import type { Scope } from "./scope.js";

export type TurnRole = "user" | "assistant";

export interface Turn {
  role: TurnRole;
  text: string;
  timestamp: number;
  senderId?: string;
  senderName?: string;
}

/** Ordered window of turns for one scope, oldest first. */
export type ConversationContext = readonly Readonly<Turn>[];

export interface InboundEvent {
  scope: Scope;
  senderId: string;
  senderName?: string;
  text: string;
  receivedAt: number;
  /** Ordering key assigned by the bridge. */
  sequenceNo: number;
  /** The bridge's id for the message. */
  messageId: string;
  /** Whether the bot was @-mentioned. */
  mentioned: boolean;
  /** Sent by the bot's own account (the bridge echoes those). */
  fromSelf?: boolean;
}

export interface CompletionRequest {
  scope: Scope;
  systemPrompt: string;
  turns: ConversationContext;
}

export type DeliveryId = string;
