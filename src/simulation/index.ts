/**
 * In-process messaging service.
 *
 * Implements the transport contract against in-memory topics and
 * subscriptions so the publisher, subscriber and puller can be exercised
 * without a network. Publishes fan out to every subscription of the topic;
 * pulled messages are leased until acknowledged, nacked (deadline 0) or
 * their deadline lapses, after which the next pull redelivers them.
 */

import { parseResourcePath } from "../config/index.js";
import { SubscriptionError, TopicError } from "../error/index.js";
import type { PubSubMessage, PubSubMessageData, ReceivedMessage } from "../types/index.js";
import type {
  CallOptions,
  CreateSubscriptionRequest,
  PubSubTransport,
  PullOptions,
  SubscriptionInfo,
  TopicInfo,
} from "../transport/index.js";

/**
 * Transport operation names, used for call records and failure injection.
 */
export type TransportOperation =
  | "publish"
  | "pull"
  | "acknowledge"
  | "modifyAckDeadline"
  | "createTopic"
  | "getTopic"
  | "deleteTopic"
  | "listTopics"
  | "createSubscription"
  | "getSubscription"
  | "deleteSubscription"
  | "listSubscriptions";

/**
 * One recorded transport call.
 */
export interface RecordedCall {
  operation: TransportOperation;
  /** Topic path, subscription path or project ID. */
  target: string;
  /** Messages published or delivery tokens sent, where applicable. */
  count?: number;
  timeoutMs?: number;
}

/**
 * Simulation options.
 */
export interface InMemoryPubSubOptions {
  /** Clock for lease deadlines and publish times. */
  now?: () => number;
  /** Delay applied to every call, in milliseconds. */
  latencyMs?: number;
}

interface Lease {
  message: PubSubMessageData;
  deliveryAttempt: number;
  deadline: number;
}

interface Queued {
  message: PubSubMessageData;
  deliveryAttempt: number;
}

interface SubscriptionState {
  info: SubscriptionInfo;
  available: Queued[];
  leased: Map<string, Lease>;
  acknowledged: string[];
}

interface InjectedFailure {
  error: Error;
  remaining: number;
}

/**
 * In-memory messaging service.
 */
export class InMemoryPubSub implements PubSubTransport {
  private readonly topics = new Map<string, TopicInfo>();
  private readonly subscriptions = new Map<string, SubscriptionState>();
  private readonly failures = new Map<TransportOperation, InjectedFailure[]>();
  private readonly now: () => number;
  private readonly latencyMs: number;
  private nextMessageId = 1;
  private nextAckId = 1;

  /** Every call made, in order. */
  readonly calls: RecordedCall[] = [];
  /** Every publish request, in order, as sent. */
  readonly publishRequests: Array<{ topicPath: string; messages: PubSubMessage[] }> = [];

  constructor(options: InMemoryPubSubOptions = {}) {
    this.now = options.now ?? Date.now;
    this.latencyMs = options.latencyMs ?? 0;
  }

  /**
   * Fail the next `times` calls of `operation` with `error`.
   */
  failNext(operation: TransportOperation, error: Error, times: number = 1): this {
    const queue = this.failures.get(operation) ?? [];
    queue.push({ error, remaining: times });
    this.failures.set(operation, queue);
    return this;
  }

  /**
   * Calls recorded for one operation.
   */
  callsOf(operation: TransportOperation): RecordedCall[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  /**
   * Messages waiting for delivery on a subscription.
   */
  availableCount(subscriptionPath: string): number {
    return this.subscriptionState(subscriptionPath).available.length;
  }

  /**
   * Messages delivered and not yet acknowledged, nacked or expired.
   */
  leasedCount(subscriptionPath: string): number {
    return this.subscriptionState(subscriptionPath).leased.size;
  }

  /**
   * Message IDs acknowledged on a subscription, in order.
   */
  acknowledgedIds(subscriptionPath: string): string[] {
    return [...this.subscriptionState(subscriptionPath).acknowledged];
  }

  /**
   * Current lease deadline of a delivery, if it is leased.
   */
  leaseDeadline(subscriptionPath: string, ackId: string): number | undefined {
    return this.subscriptionState(subscriptionPath).leased.get(ackId)?.deadline;
  }

  async publish(topicPath: string, messages: readonly PubSubMessage[], options?: CallOptions): Promise<string[]> {
    await this.enter("publish", topicPath, options, messages.length);
    this.topicInfo(topicPath);

    this.publishRequests.push({ topicPath, messages: [...messages] });

    const publishTime = new Date(this.now());
    const ids: string[] = [];
    for (const message of messages) {
      const messageId = String(this.nextMessageId++);
      ids.push(messageId);
      const stored: PubSubMessageData = {
        data: Buffer.from(message.data),
        attributes: { ...message.attributes },
        orderingKey: message.orderingKey,
        messageId,
        publishTime,
      };
      for (const state of this.subscriptions.values()) {
        if (state.info.topic === topicPath) {
          state.available.push({ message: stored, deliveryAttempt: 0 });
        }
      }
    }
    return ids;
  }

  async pull(subscriptionPath: string, maxMessages: number, options?: PullOptions): Promise<ReceivedMessage[]> {
    await this.enter("pull", subscriptionPath, options);
    const state = this.subscriptionState(subscriptionPath);
    this.expireLeases(state);

    const batch = state.available.splice(0, Math.max(0, maxMessages));
    const deadline = this.now() + state.info.ackDeadlineSeconds * 1000;

    return batch.map(({ message, deliveryAttempt }) => {
      const ackId = `ack-${this.nextAckId++}`;
      const attempt = deliveryAttempt + 1;
      state.leased.set(ackId, { message, deliveryAttempt: attempt, deadline });
      return { ackId, message, deliveryAttempt: attempt };
    });
  }

  async acknowledge(subscriptionPath: string, ackIds: readonly string[], options?: CallOptions): Promise<void> {
    await this.enter("acknowledge", subscriptionPath, options, ackIds.length);
    const state = this.subscriptionState(subscriptionPath);

    for (const ackId of ackIds) {
      const lease = state.leased.get(ackId);
      if (lease) {
        state.leased.delete(ackId);
        state.acknowledged.push(lease.message.messageId);
      }
    }
  }

  async modifyAckDeadline(
    subscriptionPath: string,
    ackIds: readonly string[],
    ackDeadlineSeconds: number,
    options?: CallOptions
  ): Promise<void> {
    await this.enter("modifyAckDeadline", subscriptionPath, options, ackIds.length);
    const state = this.subscriptionState(subscriptionPath);

    const returned: Queued[] = [];
    for (const ackId of ackIds) {
      const lease = state.leased.get(ackId);
      if (!lease) continue;
      if (ackDeadlineSeconds === 0) {
        state.leased.delete(ackId);
        returned.push({ message: lease.message, deliveryAttempt: lease.deliveryAttempt });
      } else {
        lease.deadline = this.now() + ackDeadlineSeconds * 1000;
      }
    }
    state.available.unshift(...returned);
  }

  async createTopic(topicPath: string, options?: CallOptions): Promise<TopicInfo> {
    await this.enter("createTopic", topicPath, options);
    if (this.topics.has(topicPath)) {
      throw new TopicError(`Topic already exists: ${topicPath}`, "AlreadyExists", { topic: shortName(topicPath) });
    }
    const info: TopicInfo = { name: topicPath };
    this.topics.set(topicPath, info);
    return { ...info };
  }

  async getTopic(topicPath: string, options?: CallOptions): Promise<TopicInfo> {
    await this.enter("getTopic", topicPath, options);
    return { ...this.topicInfo(topicPath) };
  }

  async deleteTopic(topicPath: string, options?: CallOptions): Promise<void> {
    await this.enter("deleteTopic", topicPath, options);
    this.topicInfo(topicPath);
    this.topics.delete(topicPath);
  }

  async listTopics(projectId: string, options?: CallOptions): Promise<TopicInfo[]> {
    await this.enter("listTopics", projectId, options);
    const prefix = `projects/${projectId}/topics/`;
    return [...this.topics.values()].filter((topic) => topic.name.startsWith(prefix)).map((topic) => ({ ...topic }));
  }

  async createSubscription(
    subscriptionPath: string,
    request: CreateSubscriptionRequest,
    options?: CallOptions
  ): Promise<SubscriptionInfo> {
    await this.enter("createSubscription", subscriptionPath, options);
    if (this.subscriptions.has(subscriptionPath)) {
      throw new SubscriptionError(`Subscription already exists: ${subscriptionPath}`, "AlreadyExists", {
        subscription: shortName(subscriptionPath),
      });
    }
    this.topicInfo(request.topic);

    const info: SubscriptionInfo = {
      name: subscriptionPath,
      topic: request.topic,
      ackDeadlineSeconds: request.ackDeadlineSeconds ?? 10,
      enableMessageOrdering: request.enableMessageOrdering ?? false,
    };
    this.subscriptions.set(subscriptionPath, { info, available: [], leased: new Map(), acknowledged: [] });
    return { ...info };
  }

  async getSubscription(subscriptionPath: string, options?: CallOptions): Promise<SubscriptionInfo> {
    await this.enter("getSubscription", subscriptionPath, options);
    return { ...this.subscriptionState(subscriptionPath).info };
  }

  async deleteSubscription(subscriptionPath: string, options?: CallOptions): Promise<void> {
    await this.enter("deleteSubscription", subscriptionPath, options);
    this.subscriptionState(subscriptionPath);
    this.subscriptions.delete(subscriptionPath);
  }

  async listSubscriptions(projectId: string, options?: CallOptions): Promise<SubscriptionInfo[]> {
    await this.enter("listSubscriptions", projectId, options);
    const prefix = `projects/${projectId}/subscriptions/`;
    return [...this.subscriptions.values()]
      .filter((state) => state.info.name.startsWith(prefix))
      .map((state) => ({ ...state.info }));
  }

  private async enter(
    operation: TransportOperation,
    target: string,
    options: CallOptions | undefined,
    count?: number
  ): Promise<void> {
    this.calls.push({ operation, target, count, timeoutMs: options?.timeoutMs });

    if (this.latencyMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.latencyMs));
    }

    const queue = this.failures.get(operation);
    const failure = queue?.[0];
    if (queue && failure) {
      failure.remaining--;
      if (failure.remaining <= 0) {
        queue.shift();
      }
      throw failure.error;
    }
  }

  private expireLeases(state: SubscriptionState): void {
    const now = this.now();
    for (const [ackId, lease] of state.leased) {
      if (lease.deadline <= now) {
        state.leased.delete(ackId);
        state.available.push({ message: lease.message, deliveryAttempt: lease.deliveryAttempt });
      }
    }
  }

  private topicInfo(topicPath: string): TopicInfo {
    const info = this.topics.get(topicPath);
    if (!info) {
      throw new TopicError(`Topic not found: ${topicPath}`, "NotFound", { topic: shortName(topicPath) });
    }
    return info;
  }

  private subscriptionState(subscriptionPath: string): SubscriptionState {
    const state = this.subscriptions.get(subscriptionPath);
    if (!state) {
      throw new SubscriptionError(`Subscription not found: ${subscriptionPath}`, "NotFound", {
        subscription: shortName(subscriptionPath),
      });
    }
    return state;
  }
}

function shortName(path: string): string {
  return parseResourcePath(path)?.name ?? path;
}
