/**
 * Topic and subscription administration.
 *
 * Thin pass-through to the transport; topic calls follow the publisher
 * retry policy, subscription calls the subscriber's.
 */

import {
  formatSubscriptionPath,
  formatTopicPath,
  validateSubscriptionName,
  validateTopicName,
} from "../config/index.js";
import { NoopLogger, type Logger } from "../observability/index.js";
import { RetryExecutor, type RetrySettings } from "../retry/index.js";
import type { PubSubTransport, SubscriptionInfo, TopicInfo } from "../transport/index.js";

/**
 * Subscription creation options.
 */
export interface CreateSubscriptionOptions {
  ackDeadlineSeconds?: number;
  enableMessageOrdering?: boolean;
}

/**
 * Admin options.
 */
export interface PubSubAdminOptions {
  projectId: string;
  transport: PubSubTransport;
  topicRetry: RetrySettings;
  subscriptionRetry: RetrySettings;
  logger?: Logger;
}

/**
 * Administrative operations.
 */
export class PubSubAdmin {
  private readonly projectId: string;
  private readonly transport: PubSubTransport;
  private readonly topicRetry: RetryExecutor;
  private readonly subscriptionRetry: RetryExecutor;
  private readonly logger: Logger;

  constructor(options: PubSubAdminOptions) {
    this.projectId = options.projectId;
    this.transport = options.transport;
    this.logger = (options.logger ?? new NoopLogger()).child({ component: "admin" });
    this.topicRetry = new RetryExecutor(options.topicRetry);
    this.subscriptionRetry = new RetryExecutor(options.subscriptionRetry);
  }

  async createTopic(topic: string): Promise<TopicInfo> {
    const path = this.topicPath(topic);
    const info = await this.topicRetry.execute((context) =>
      this.transport.createTopic(path, { timeoutMs: context.timeoutMs })
    );
    this.logger.info("Topic created", { topic: path });
    return info;
  }

  getTopic(topic: string): Promise<TopicInfo> {
    const path = this.topicPath(topic);
    return this.topicRetry.execute((context) => this.transport.getTopic(path, { timeoutMs: context.timeoutMs }));
  }

  async deleteTopic(topic: string): Promise<void> {
    const path = this.topicPath(topic);
    await this.topicRetry.execute((context) => this.transport.deleteTopic(path, { timeoutMs: context.timeoutMs }));
    this.logger.info("Topic deleted", { topic: path });
  }

  listTopics(): Promise<TopicInfo[]> {
    return this.topicRetry.execute((context) =>
      this.transport.listTopics(this.projectId, { timeoutMs: context.timeoutMs })
    );
  }

  async createSubscription(
    subscription: string,
    topic: string,
    options: CreateSubscriptionOptions = {}
  ): Promise<SubscriptionInfo> {
    const path = this.subscriptionPath(subscription);
    const topicPath = this.topicPath(topic);
    const info = await this.subscriptionRetry.execute((context) =>
      this.transport.createSubscription(path, { topic: topicPath, ...options }, { timeoutMs: context.timeoutMs })
    );
    this.logger.info("Subscription created", { subscription: path, topic: topicPath });
    return info;
  }

  getSubscription(subscription: string): Promise<SubscriptionInfo> {
    const path = this.subscriptionPath(subscription);
    return this.subscriptionRetry.execute((context) =>
      this.transport.getSubscription(path, { timeoutMs: context.timeoutMs })
    );
  }

  async deleteSubscription(subscription: string): Promise<void> {
    const path = this.subscriptionPath(subscription);
    await this.subscriptionRetry.execute((context) =>
      this.transport.deleteSubscription(path, { timeoutMs: context.timeoutMs })
    );
    this.logger.info("Subscription deleted", { subscription: path });
  }

  listSubscriptions(): Promise<SubscriptionInfo[]> {
    return this.subscriptionRetry.execute((context) =>
      this.transport.listSubscriptions(this.projectId, { timeoutMs: context.timeoutMs })
    );
  }

  private topicPath(topic: string): string {
    validateTopicName(topic);
    return formatTopicPath(this.projectId, topic);
  }

  private subscriptionPath(subscription: string): string {
    validateSubscriptionName(subscription);
    return formatSubscriptionPath(this.projectId, subscription);
  }
}
