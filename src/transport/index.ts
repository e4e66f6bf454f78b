/**
 * Transport contract for the messaging service.
 *
 * Everything above this interface is independent of how requests reach
 * the service. `RestPubSubTransport` talks to the REST API;
 * `InMemoryPubSub` (simulation module) serves the same contract in process.
 */

import type { PubSubMessage, ReceivedMessage } from "../types/index.js";

/**
 * Per-call options.
 */
export interface CallOptions {
  /** Timeout for this call; undefined leaves it to the transport. */
  timeoutMs?: number;
}

/**
 * Pull options.
 */
export interface PullOptions extends CallOptions {
  /** Return at once when no messages are available. */
  returnImmediately?: boolean;
}

/**
 * Topic resource.
 */
export interface TopicInfo {
  /** Fully qualified topic path. */
  name: string;
  labels?: Record<string, string>;
}

/**
 * Subscription resource.
 */
export interface SubscriptionInfo {
  /** Fully qualified subscription path. */
  name: string;
  /** Fully qualified topic path. */
  topic: string;
  ackDeadlineSeconds: number;
  enableMessageOrdering: boolean;
}

/**
 * Subscription creation request.
 */
export interface CreateSubscriptionRequest {
  /** Fully qualified topic path. */
  topic: string;
  ackDeadlineSeconds?: number;
  enableMessageOrdering?: boolean;
}

/**
 * Messaging service transport.
 */
export interface PubSubTransport {
  /** Publish messages in one request; returns IDs in message order. */
  publish(topicPath: string, messages: readonly PubSubMessage[], options?: CallOptions): Promise<string[]>;
  /** Pull up to `maxMessages` messages. */
  pull(subscriptionPath: string, maxMessages: number, options?: PullOptions): Promise<ReceivedMessage[]>;
  /** Acknowledge deliveries. */
  acknowledge(subscriptionPath: string, ackIds: readonly string[], options?: CallOptions): Promise<void>;
  /** Set the deadline of deliveries; 0 makes them available for redelivery. */
  modifyAckDeadline(
    subscriptionPath: string,
    ackIds: readonly string[],
    ackDeadlineSeconds: number,
    options?: CallOptions
  ): Promise<void>;

  createTopic(topicPath: string, options?: CallOptions): Promise<TopicInfo>;
  getTopic(topicPath: string, options?: CallOptions): Promise<TopicInfo>;
  deleteTopic(topicPath: string, options?: CallOptions): Promise<void>;
  listTopics(projectId: string, options?: CallOptions): Promise<TopicInfo[]>;

  createSubscription(
    subscriptionPath: string,
    request: CreateSubscriptionRequest,
    options?: CallOptions
  ): Promise<SubscriptionInfo>;
  getSubscription(subscriptionPath: string, options?: CallOptions): Promise<SubscriptionInfo>;
  deleteSubscription(subscriptionPath: string, options?: CallOptions): Promise<void>;
  listSubscriptions(projectId: string, options?: CallOptions): Promise<SubscriptionInfo[]>;
}

export type { HttpRequest, HttpResponse, HttpTransport } from "./http.js";
export {
  FetchTransport,
  isSuccess,
  getHeader,
  getRequestId,
  parseJsonBody,
} from "./http.js";
export { RestPubSubTransport, createRestTransport } from "./rest.js";
export type { RestTransportOptions } from "./rest.js";
