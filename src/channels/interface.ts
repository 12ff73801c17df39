/**
 * Gateway client interface
 *
 * The gateway bridges the chat platform: it produces inbound events and
 * accepts outbound replies. Events arrive in bridge order, at least once.
 */

import type { Scope } from "../core/scope.js";
import type { DeliveryId, InboundEvent } from "../core/types.js";
import type { GatewayError } from "../core/errors.js";
import type { Result } from "../utils/result.js";

export type GatewayId = "onebot";

export interface GatewayClient {
  readonly id: GatewayId;

  // Lifecycle
  start(): Promise<void>;
  stop(): Promise<void>;
  readonly isConnected: boolean;

  /**
   * Inbound events in arrival order. The iterator ends when `signal` aborts
   * or the client stops; calling again resumes from the next queued event.
   */
  events(signal?: AbortSignal): AsyncIterable<InboundEvent>;

  send(scope: Scope, text: string): Promise<Result<DeliveryId, GatewayError>>;
}
