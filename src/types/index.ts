/**
 * Pub/Sub Types
 *
 * Wire message shapes, delivery tokens and statistics.
 */

import { MessageError } from "../error/index.js";

/**
 * Message for publishing.
 */
export interface PubSubMessage {
  /** Message payload. */
  readonly data: Buffer;
  /** Message attributes (string headers). */
  readonly attributes: Readonly<Record<string, string>>;
  /** Ordering key for ordered delivery. */
  readonly orderingKey?: string;
}

/**
 * Message as delivered by the service.
 */
export interface PubSubMessageData extends PubSubMessage {
  /** Server-assigned message ID. */
  readonly messageId: string;
  /** Publish timestamp. */
  readonly publishTime: Date;
}

/**
 * Message received from a subscription, before it is wrapped with
 * acknowledgment operations.
 */
export interface ReceivedMessage {
  /** Delivery token. */
  readonly ackId: string;
  /** Delivered message. */
  readonly message: PubSubMessageData;
  /** Delivery attempt count, when the service reports it. */
  readonly deliveryAttempt?: number;
}

/**
 * Delivery token identifying one delivery on one subscription.
 */
export interface AckToken {
  /** Fully qualified subscription path. */
  readonly subscriptionPath: string;
  /** Opaque delivery token. */
  readonly ackId: string;
}

/**
 * Acknowledgment state of a delivered message.
 */
export type AckState = "delivered" | "acknowledged" | "nacked";

/**
 * Ordering key state.
 */
export interface OrderingKeyState {
  /** Whether ordering is paused due to error. */
  paused: boolean;
  /** Error that caused the pause. */
  error?: Error;
  /** Pending messages waiting in the key's batch. */
  pendingCount: number;
}

/**
 * Publisher statistics.
 */
export interface PublisherStats {
  /** Total messages published. */
  messagesPublished: number;
  /** Total bytes published. */
  bytesPublished: number;
  /** Total messages whose publish failed. */
  publishErrors: number;
  /** Batches sent. */
  batchesSent: number;
  /** Average batch send latency in ms. */
  avgLatencyMs: number;
  /** Messages waiting in open batches. */
  currentBatchSize: number;
  /** Paused ordering keys. */
  pausedOrderingKeys: string[];
}

/**
 * Subscriber statistics.
 */
export interface SubscriberStats {
  /** Total messages received. */
  messagesReceived: number;
  /** Total messages acknowledged. */
  messagesAcked: number;
  /** Total messages nacked. */
  messagesNacked: number;
  /** Deadline extensions issued. */
  deadlineExtensions: number;
  /** Outstanding messages count. */
  outstandingMessages: number;
  /** Outstanding bytes. */
  outstandingBytes: number;
  /** Average callback latency in ms. */
  avgProcessingLatencyMs: number;
}

/**
 * Maximum message size accepted by the service.
 */
export const MAX_MESSAGE_BYTES = 10 * 1024 * 1024;

/**
 * Maximum attributes per message.
 */
export const MAX_ATTRIBUTES = 100;

/**
 * Create a message from string or binary data.
 */
export function createMessage(
  data: string | Uint8Array,
  attributes: Record<string, string> = {},
  orderingKey?: string
): PubSubMessage {
  return Object.freeze({
    data: typeof data === "string" ? Buffer.from(data, "utf-8") : Buffer.from(data),
    attributes: Object.freeze({ ...attributes }),
    orderingKey: orderingKey || undefined,
  });
}

/**
 * Get message size in bytes.
 */
export function getMessageSize(message: PubSubMessage): number {
  let attributesSize = 0;
  for (const [key, value] of Object.entries(message.attributes)) {
    attributesSize += Buffer.byteLength(key) + Buffer.byteLength(value);
  }

  const orderingKeySize = message.orderingKey
    ? Buffer.byteLength(message.orderingKey)
    : 0;

  return message.data.length + attributesSize + orderingKeySize;
}

/**
 * Validate message constraints.
 */
export function validateMessage(message: PubSubMessage): void {
  const size = getMessageSize(message);
  if (size > MAX_MESSAGE_BYTES) {
    throw new MessageError(`Message size ${size} exceeds maximum of 10MB`, "TooLarge");
  }

  const attrCount = Object.keys(message.attributes).length;
  if (attrCount > MAX_ATTRIBUTES) {
    throw new MessageError(
      `Attribute count ${attrCount} exceeds maximum of ${MAX_ATTRIBUTES}`,
      "TooManyAttributes"
    );
  }

  for (const [key, value] of Object.entries(message.attributes)) {
    if (key.length === 0 || Buffer.byteLength(key) > 256) {
      throw new MessageError(`Attribute key "${key}" must be 1-256 bytes`, "InvalidAttribute");
    }
    if (Buffer.byteLength(value) > 1024) {
      throw new MessageError(
        `Attribute value for "${key}" exceeds maximum of 1024 bytes`,
        "InvalidAttribute"
      );
    }
  }

  if (message.orderingKey && Buffer.byteLength(message.orderingKey) > 1024) {
    throw new MessageError("Ordering key exceeds maximum of 1024 bytes", "InvalidOrderingKey");
  }
}
