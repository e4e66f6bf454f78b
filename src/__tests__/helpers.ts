/**
 * Shared fixtures for the test suites.
 */

import {
  DEFAULT_PUBLISHER_SETTINGS,
  DEFAULT_SUBSCRIBER_SETTINGS,
  type PublisherSettings,
  type SubscriberSettings,
} from "../config/index.js";
import type { RetrySettings } from "../retry/index.js";
import { InMemoryPubSub, type InMemoryPubSubOptions } from "../simulation/index.js";

export const PROJECT = "demo";
export const TOPIC = "orders";
export const TOPIC_PATH = `projects/${PROJECT}/topics/${TOPIC}`;
export const SUBSCRIPTION = "orders-sub";
export const SUBSCRIPTION_PATH = `projects/${PROJECT}/subscriptions/${SUBSCRIPTION}`;

export const FAST_RETRY: RetrySettings = {
  totalTimeoutMs: 5000,
  initialRetryDelayMs: 1,
  retryDelayMultiplier: 2,
  maxRetryDelayMs: 5,
  maxAttempts: 0,
  jittered: false,
  initialRpcTimeoutMs: 0,
  rpcTimeoutMultiplier: 1,
  maxRpcTimeoutMs: 0,
};

export function publisherSettings(overrides: Partial<PublisherSettings> = {}): PublisherSettings {
  return { ...DEFAULT_PUBLISHER_SETTINGS, retry: FAST_RETRY, ...overrides };
}

export function subscriberSettings(overrides: Partial<SubscriberSettings> = {}): SubscriberSettings {
  return {
    ...DEFAULT_SUBSCRIBER_SETTINGS,
    retry: FAST_RETRY,
    parallelPullCount: 1,
    pullIntervalMs: 5,
    ...overrides,
  };
}

/**
 * Service with the shared topic and one subscription on it.
 */
export async function seededService(
  ackDeadlineSeconds: number = 10,
  options: InMemoryPubSubOptions = {}
): Promise<InMemoryPubSub> {
  const service = new InMemoryPubSub(options);
  await service.createTopic(TOPIC_PATH);
  await service.createSubscription(SUBSCRIPTION_PATH, { topic: TOPIC_PATH, ackDeadlineSeconds });
  return service;
}

/**
 * Resolves once `condition` holds, polling on the real clock.
 */
export async function waitFor(condition: () => boolean, timeoutMs: number = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("Condition not met in time");
    }
    await new Promise((resolve) => setTimeout(resolve, 2));
  }
}
