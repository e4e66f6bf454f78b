/**
 * Pub/Sub Client
 *
 * Single entry point composing publisher, subscriber, puller, converter
 * and admin operations over one transport.
 */

import { PubSubAdmin, type CreateSubscriptionOptions } from "../admin/index.js";
import type { ResourceCache } from "../cache/index.js";
import {
  configBuilder,
  formatSubscriptionPath,
  resolveEndpoint,
  PubSubConfigBuilder,
  type BatchingSettings,
  type ConverterKind,
  type PubSubConfig,
  type PublisherSettings,
  type RoleOverrides,
  type SubscriberSettings,
} from "../config/index.js";
import { createConverter, type MessageConverter, type PayloadType } from "../converter/index.js";
import { createAuthProvider } from "../credentials/index.js";
import { ClosedError } from "../error/index.js";
import { ConsoleLogger, NoopLogger, parseLogLevel, type Logger } from "../observability/index.js";
import { PubSubPublisher } from "../publisher/index.js";
import { RetryExecutor } from "../retry/index.js";
import {
  createSubscriptionCache,
  PubSubPuller,
  PubSubSubscriber,
  type AckTarget,
  type AcknowledgeableMessage,
  type ConvertedMessage,
  type ConvertedMessageCallback,
  type MessageCallback,
  type SubscribeOptions,
  type Subscription,
  type SubscriptionHandle,
} from "../subscriber/index.js";
import { createRestTransport, type PubSubTransport, type SubscriptionInfo, type TopicInfo } from "../transport/index.js";
import type { PubSubMessage, PubSubMessageData } from "../types/index.js";

/**
 * Client collaborators.
 */
export interface PubSubClientOptions {
  /** Transport to use; a REST transport is built from the config when omitted. */
  transport?: PubSubTransport;
  logger?: Logger;
  /** Overrides the converter selected by `config.converter`. */
  converter?: MessageConverter;
}

/**
 * Publish options.
 */
export interface PublishOptions {
  orderingKey?: string;
}

/**
 * Pub/Sub Client.
 */
export class PubSubClient {
  readonly config: PubSubConfig;
  readonly converter: MessageConverter;
  readonly admin: PubSubAdmin;
  readonly publisher: PubSubPublisher;
  readonly subscriber: PubSubSubscriber;
  readonly puller: PubSubPuller;
  private readonly logger: Logger;
  private readonly subscriptionCache: ResourceCache<SubscriptionHandle>;
  private closed = false;

  constructor(config: PubSubConfig, options: PubSubClientOptions = {}) {
    this.config = config;
    this.logger = (options.logger ?? new NoopLogger()).child({ projectId: config.projectId });
    this.converter = options.converter ?? createConverter(config.converter);

    const transport =
      options.transport ??
      createRestTransport({
        endpoint: resolveEndpoint(config),
        pullEndpoint: config.subscriber.pullEndpoint,
        authProvider: createAuthProvider(config.credentials),
        timeoutMs: config.timeoutMs,
      });

    const subscriptionCache = createSubscriptionCache({
      transport,
      retry: new RetryExecutor(config.subscriber.retry),
      verifyResources: config.verifyResources,
      logger: this.logger,
    });
    this.subscriptionCache = subscriptionCache;

    this.admin = new PubSubAdmin({
      projectId: config.projectId,
      transport,
      topicRetry: config.publisher.retry,
      subscriptionRetry: config.subscriber.retry,
      logger: this.logger,
    });
    this.publisher = new PubSubPublisher({
      projectId: config.projectId,
      transport,
      settings: config.publisher,
      verifyResources: config.verifyResources,
      logger: this.logger,
    });
    this.puller = new PubSubPuller({
      projectId: config.projectId,
      transport,
      settings: config.subscriber,
      converter: this.converter,
      cache: subscriptionCache,
      logger: this.logger,
    });
    this.subscriber = new PubSubSubscriber({
      projectId: config.projectId,
      transport,
      settings: config.subscriber,
      acks: this.puller,
      converter: this.converter,
      cache: subscriptionCache,
      logger: this.logger,
    });
  }

  /**
   * Get the project ID.
   */
  get projectId(): string {
    return this.config.projectId;
  }

  // ---------------------------------------------------------------------------
  // Publishing
  // ---------------------------------------------------------------------------

  /**
   * Convert a payload and publish it.
   *
   * @returns The server-assigned message ID
   */
  async publish(
    topic: string,
    payload: unknown,
    headers?: Record<string, string>,
    options: PublishOptions = {}
  ): Promise<string> {
    this.assertOpen();
    const message = this.converter.toWireFormat(payload, headers, options.orderingKey);
    return this.publisher.publish(topic, message);
  }

  /**
   * Publish a prepared message.
   */
  async publishMessage(topic: string, message: PubSubMessage): Promise<string> {
    this.assertOpen();
    return this.publisher.publish(topic, message);
  }

  /**
   * Resume publishing on an ordering key paused by a failed batch.
   */
  resumePublish(topic: string, orderingKey: string): Promise<void> {
    return this.publisher.resumePublish(topic, orderingKey);
  }

  // ---------------------------------------------------------------------------
  // Subscribing
  // ---------------------------------------------------------------------------

  async subscribe(subscription: string, callback: MessageCallback, options?: SubscribeOptions): Promise<Subscription> {
    this.assertOpen();
    return this.subscriber.subscribe(subscription, callback, options);
  }

  async subscribeAndConvert<T>(
    subscription: string,
    type: PayloadType<T>,
    callback: ConvertedMessageCallback<T>,
    options?: SubscribeOptions
  ): Promise<Subscription> {
    this.assertOpen();
    return this.subscriber.subscribeAndConvert(subscription, type, callback, options);
  }

  // ---------------------------------------------------------------------------
  // Pulling
  // ---------------------------------------------------------------------------

  async pull(subscription: string, maxMessages: number): Promise<AcknowledgeableMessage[]> {
    this.assertOpen();
    return this.puller.pull(subscription, maxMessages);
  }

  async pullNext(subscription: string): Promise<PubSubMessageData | undefined> {
    this.assertOpen();
    return this.puller.pullNext(subscription);
  }

  async pullAndAck(subscription: string, maxMessages: number): Promise<PubSubMessageData[]> {
    this.assertOpen();
    return this.puller.pullAndAck(subscription, maxMessages);
  }

  async pullAndConvert<T>(subscription: string, maxMessages: number, type: PayloadType<T>): Promise<ConvertedMessage<T>[]> {
    this.assertOpen();
    return this.puller.pullAndConvert(subscription, maxMessages, type);
  }

  ack(targets: readonly AckTarget[]): Promise<void> {
    return this.puller.ack(targets);
  }

  nack(targets: readonly AckTarget[]): Promise<void> {
    return this.puller.nack(targets);
  }

  modifyAckDeadline(targets: readonly AckTarget[], seconds: number): Promise<void> {
    return this.puller.modifyAckDeadline(targets, seconds);
  }

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  async createTopic(topic: string): Promise<TopicInfo> {
    this.assertOpen();
    return this.admin.createTopic(topic);
  }

  async getTopic(topic: string): Promise<TopicInfo> {
    this.assertOpen();
    return this.admin.getTopic(topic);
  }

  /**
   * Delete a topic and drop its cached publisher.
   */
  async deleteTopic(topic: string): Promise<void> {
    this.assertOpen();
    await this.admin.deleteTopic(topic);
    await this.publisher.invalidate(topic);
  }

  async listTopics(): Promise<TopicInfo[]> {
    this.assertOpen();
    return this.admin.listTopics();
  }

  async createSubscription(
    subscription: string,
    topic: string,
    options?: CreateSubscriptionOptions
  ): Promise<SubscriptionInfo> {
    this.assertOpen();
    return this.admin.createSubscription(subscription, topic, options);
  }

  async getSubscription(subscription: string): Promise<SubscriptionInfo> {
    this.assertOpen();
    return this.admin.getSubscription(subscription);
  }

  /**
   * Delete a subscription, stopping any running consumer of it.
   */
  async deleteSubscription(subscription: string): Promise<void> {
    this.assertOpen();
    await this.admin.deleteSubscription(subscription);

    const path = formatSubscriptionPath(this.projectId, subscription);
    await Promise.all(
      this.subscriber
        .getSubscriptions()
        .filter((running) => running.subscriptionPath === path)
        .map((running) => running.stop())
    );
    await this.subscriptionCache.invalidate(path);
  }

  async listSubscriptions(): Promise<SubscriptionInfo[]> {
    this.assertOpen();
    return this.admin.listSubscriptions();
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Send every pending publish batch.
   */
  flush(): Promise<void> {
    return this.publisher.flush();
  }

  /**
   * Stop subscriptions, force-flush publishers and release cached handles.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await this.subscriber.close();
    await this.publisher.close();
    this.puller.close();
    this.logger.info("Client closed");
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ClosedError("Client");
    }
  }
}

/**
 * Create a Pub/Sub client.
 */
export function createClient(config: PubSubConfig, options: PubSubClientOptions = {}): PubSubClient {
  return new PubSubClient(config, options);
}

/**
 * Create a Pub/Sub client from environment.
 *
 * `PUBSUB_LOG_LEVEL` enables console logging at the given level.
 */
export function createClientFromEnv(env: NodeJS.ProcessEnv = process.env): PubSubClient {
  const config = configBuilder().fromEnv(env).build();
  const level = env["PUBSUB_LOG_LEVEL"] ? parseLogLevel(env["PUBSUB_LOG_LEVEL"]) : undefined;
  const logger = level === undefined ? undefined : new ConsoleLogger({ level, context: { component: "pubsub" } });
  return new PubSubClient(config, { logger });
}

/**
 * Client builder for fluent configuration.
 */
export class PubSubClientBuilder {
  private readonly configBuilder: PubSubConfigBuilder;
  private readonly options: PubSubClientOptions = {};

  constructor() {
    this.configBuilder = configBuilder();
  }

  /**
   * Set project ID.
   */
  projectId(projectId: string): this {
    this.configBuilder.projectId(projectId);
    return this;
  }

  /**
   * Use explicit access token.
   */
  accessToken(token: string): this {
    this.configBuilder.accessToken(token);
    return this;
  }

  /**
   * Set custom endpoint (for emulator).
   */
  endpoint(url: string): this {
    this.configBuilder.endpoint(url);
    return this;
  }

  /**
   * Load from environment.
   */
  fromEnv(env?: NodeJS.ProcessEnv): this {
    this.configBuilder.fromEnv(env);
    return this;
  }

  /**
   * Apply dotted properties.
   */
  fromProperties(properties: Record<string, unknown>): this {
    this.configBuilder.fromProperties(properties);
    return this;
  }

  /**
   * Configure batch settings.
   */
  batching(settings: Partial<BatchingSettings>): this {
    this.configBuilder.batching(settings);
    return this;
  }

  /**
   * Enable message ordering.
   */
  enableMessageOrdering(enable: boolean = true): this {
    this.configBuilder.enableMessageOrdering(enable);
    return this;
  }

  publisherSettings(settings: RoleOverrides<PublisherSettings>): this {
    this.configBuilder.publisherSettings(settings);
    return this;
  }

  subscriberSettings(settings: RoleOverrides<SubscriberSettings>): this {
    this.configBuilder.subscriberSettings(settings);
    return this;
  }

  /**
   * Select the payload converter.
   */
  converter(kind: ConverterKind): this {
    this.configBuilder.converter(kind);
    return this;
  }

  verifyResources(enable: boolean = true): this {
    this.configBuilder.verifyResources(enable);
    return this;
  }

  /**
   * Use the given transport instead of the REST transport.
   */
  transport(transport: PubSubTransport): this {
    this.options.transport = transport;
    return this;
  }

  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  /**
   * Build the client.
   */
  build(): PubSubClient {
    const config = this.configBuilder.build();
    return new PubSubClient(config, { ...this.options });
  }
}

/**
 * Create a client builder.
 */
export function clientBuilder(): PubSubClientBuilder {
  return new PubSubClientBuilder();
}
