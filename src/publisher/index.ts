/**
 * Pub/Sub Publisher
 *
 * Message publishing with batching, ordering, and flow control.
 */

import { ResourceCache } from "../cache/index.js";
import {
  formatTopicPath,
  validateTopicName,
  type BatchingSettings,
  type PublisherSettings,
} from "../config/index.js";
import { ClosedError, MessageError, ServerError, toError } from "../error/index.js";
import { FlowController } from "../flow-control/index.js";
import { NoopLogger, type Logger } from "../observability/index.js";
import { RetryExecutor } from "../retry/index.js";
import type { PubSubTransport } from "../transport/index.js";
import {
  getMessageSize,
  validateMessage,
  type OrderingKeyState,
  type PubSubMessage,
  type PublisherStats,
} from "../types/index.js";

/**
 * Pending message in batch.
 */
interface PendingMessage {
  message: PubSubMessage;
  bytes: number;
  resolve: (messageId: string) => void;
  reject: (error: Error) => void;
}

/**
 * Message batch.
 */
interface MessageBatch {
  messages: PendingMessage[];
  bytes: number;
  orderingKey?: string;
  createdAt: number;
  timer?: ReturnType<typeof setTimeout>;
}

/**
 * Handle for a message accepted into a batch.
 */
export interface PublishHandle {
  /** Settles once the message's batch has been sent. */
  readonly messageId: Promise<string>;
}

/**
 * Topic publisher options.
 */
export interface TopicPublisherOptions {
  projectId: string;
  /** Topic short name or fully qualified path. */
  topic: string;
  transport: PubSubTransport;
  settings: PublisherSettings;
  logger?: Logger;
}

/**
 * Publisher for one topic.
 */
export class TopicPublisher {
  readonly topicPath: string;
  private readonly transport: PubSubTransport;
  private readonly batching: BatchingSettings;
  private readonly enableOrdering: boolean;
  private readonly logger: Logger;
  private readonly retry: RetryExecutor;
  private readonly flowControl: FlowController;
  private readonly flushGate: FlowController;

  // Batching state
  private defaultBatch: MessageBatch | null = null;
  private readonly orderedBatches = new Map<string, MessageBatch>();
  private readonly pausedOrderingKeys = new Map<string, Error>();
  private readonly keyChains = new Map<string, Promise<void>>();
  private readonly inFlight = new Set<Promise<void>>();

  // Statistics
  private stats = {
    messagesPublished: 0,
    bytesPublished: 0,
    publishErrors: 0,
    batchesSent: 0,
  };
  private latencySum = 0;
  private latencyCount = 0;

  private closed = false;

  constructor(options: TopicPublisherOptions) {
    validateTopicName(options.topic);

    const { settings } = options;
    this.topicPath = formatTopicPath(options.projectId, options.topic);
    this.transport = options.transport;
    this.batching = settings.batching;
    this.enableOrdering = settings.enableMessageOrdering;
    this.logger = (options.logger ?? new NoopLogger()).child({ component: "publisher", topic: this.topicPath });
    this.flowControl = new FlowController(settings.flowControl);
    this.flushGate = new FlowController({
      maxOutstandingElementCount: settings.executorThreads,
      limitExceededBehavior: "Block",
    });
    this.retry = new RetryExecutor(settings.retry, {
      hooks: {
        onRetry: (attempt, error, delayMs) =>
          this.logger.debug("Retrying publish", { attempt, delayMs, error }),
        onExhausted: (error, attempts) =>
          this.logger.warn("Publish retries exhausted", { attempts, error }),
      },
    });
  }

  /**
   * Publish a single message.
   *
   * @returns The server-assigned message ID once the batch is sent
   */
  async publish(message: PubSubMessage): Promise<string> {
    const handle = await this.enqueue(message);
    return handle.messageId;
  }

  /**
   * Reserve capacity for a message and add it to its batch.
   *
   * Settles once the message is accepted; the handle settles once it is sent.
   */
  async enqueue(message: PubSubMessage): Promise<PublishHandle> {
    this.assertAccepting(message);

    const bytes = getMessageSize(message);
    const reservation = this.flowControl.reserve(1, bytes);
    if (this.flowControl.waiting > 0) {
      // Unsent batches hold the capacity this reservation waits for.
      this.dispatchOpenBatches();
    }
    await reservation;

    try {
      this.assertAccepting(message);
    } catch (error) {
      this.flowControl.release(1, bytes);
      throw error;
    }

    const messageId = new Promise<string>((resolve, reject) => {
      this.addToBatch({ message, bytes, resolve, reject });
    });
    return { messageId };
  }

  /**
   * Send every open batch and wait for all sends in flight.
   */
  async flush(): Promise<void> {
    this.dispatchOpenBatches();
    await Promise.all([...this.inFlight]);
  }

  /**
   * Resume a paused ordering key.
   */
  resumePublish(orderingKey: string): void {
    if (this.pausedOrderingKeys.delete(orderingKey)) {
      this.logger.info("Resumed ordering key", { orderingKey });
    }
  }

  /**
   * Get ordering key state.
   */
  getOrderingKeyState(orderingKey: string): OrderingKeyState {
    const error = this.pausedOrderingKeys.get(orderingKey);
    const batch = this.orderedBatches.get(orderingKey);

    return {
      paused: error !== undefined,
      error,
      pendingCount: batch?.messages.length ?? 0,
    };
  }

  /**
   * Get publisher statistics.
   */
  getStats(): PublisherStats {
    let currentBatchSize = this.defaultBatch?.messages.length ?? 0;
    for (const batch of this.orderedBatches.values()) {
      currentBatchSize += batch.messages.length;
    }

    return {
      ...this.stats,
      currentBatchSize,
      avgLatencyMs: this.latencyCount > 0 ? this.latencySum / this.latencyCount : 0,
      pausedOrderingKeys: [...this.pausedOrderingKeys.keys()],
    };
  }

  /**
   * Whether close has been called.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Stop accepting messages and force-flush every pending batch.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.flush();
    this.logger.debug("Publisher closed", { ...this.stats });
  }

  private assertAccepting(message: PubSubMessage): void {
    if (this.closed) {
      throw new ClosedError("Publisher");
    }

    validateMessage(message);

    const key = this.orderingKeyOf(message);
    const pausedBy = key === undefined ? undefined : this.pausedOrderingKeys.get(key);
    if (pausedBy) {
      throw new MessageError(
        `Ordering key "${key}" is paused due to previous error: ${pausedBy.message}`,
        "OrderingKeyPaused"
      );
    }
  }

  private dispatchOpenBatches(): void {
    if (this.defaultBatch) {
      this.dispatch(this.defaultBatch);
    }
    for (const batch of [...this.orderedBatches.values()]) {
      this.dispatch(batch);
    }
  }

  private orderingKeyOf(message: PubSubMessage): string | undefined {
    return this.enableOrdering && message.orderingKey ? message.orderingKey : undefined;
  }

  /**
   * Add message to appropriate batch.
   */
  private addToBatch(pending: PendingMessage): void {
    const orderingKey = this.orderingKeyOf(pending.message);

    if (!this.batching.enabled) {
      const single = this.createBatch(orderingKey, false);
      single.messages.push(pending);
      single.bytes = pending.bytes;
      this.dispatch(single);
      return;
    }

    let batch = this.openBatch(orderingKey);

    // A message that would overflow the byte threshold starts a new batch.
    const { requestByteThreshold, elementCountThreshold } = this.batching;
    if (
      requestByteThreshold !== undefined &&
      batch.messages.length > 0 &&
      batch.bytes + pending.bytes > requestByteThreshold
    ) {
      this.dispatch(batch);
      batch = this.openBatch(orderingKey);
    }

    batch.messages.push(pending);
    batch.bytes += pending.bytes;

    if (
      (elementCountThreshold !== undefined && batch.messages.length >= elementCountThreshold) ||
      (requestByteThreshold !== undefined && batch.bytes >= requestByteThreshold)
    ) {
      this.dispatch(batch);
    }
  }

  private openBatch(orderingKey: string | undefined): MessageBatch {
    if (orderingKey === undefined) {
      if (!this.defaultBatch) {
        this.defaultBatch = this.createBatch(undefined, true);
      }
      return this.defaultBatch;
    }

    let batch = this.orderedBatches.get(orderingKey);
    if (!batch) {
      batch = this.createBatch(orderingKey, true);
      this.orderedBatches.set(orderingKey, batch);
    }
    return batch;
  }

  /**
   * Create new batch, arming its delay timer.
   */
  private createBatch(orderingKey: string | undefined, timed: boolean): MessageBatch {
    const batch: MessageBatch = {
      messages: [],
      bytes: 0,
      orderingKey,
      createdAt: Date.now(),
    };

    const delay = this.batching.delayThresholdMs;
    if (timed && delay !== undefined) {
      batch.timer = setTimeout(() => this.dispatch(batch), delay);
    }

    return batch;
  }

  /**
   * Detach a batch and hand it to the sender. Batches of one ordering key
   * are sent one after another.
   */
  private dispatch(batch: MessageBatch): void {
    if (batch.timer) {
      clearTimeout(batch.timer);
      batch.timer = undefined;
    }

    if (this.defaultBatch === batch) {
      this.defaultBatch = null;
    } else if (batch.orderingKey !== undefined && this.orderedBatches.get(batch.orderingKey) === batch) {
      this.orderedBatches.delete(batch.orderingKey);
    }

    if (batch.messages.length === 0) return;

    const key = batch.orderingKey;
    let send: Promise<void>;
    if (key === undefined) {
      send = this.sendBatch(batch);
    } else {
      const previous = this.keyChains.get(key) ?? Promise.resolve();
      send = previous.then(() => this.sendBatch(batch));
      this.keyChains.set(key, send);
    }

    this.inFlight.add(send);
    void send.then(
      () => this.settled(send, key),
      (error: unknown) => {
        this.settled(send, key);
        this.logger.error("Batch send failed unexpectedly", { error });
      }
    );
  }

  private settled(send: Promise<void>, key: string | undefined): void {
    this.inFlight.delete(send);
    if (key !== undefined && this.keyChains.get(key) === send) {
      this.keyChains.delete(key);
    }
  }

  /**
   * Send batch through the retry engine. Never rejects: the outcome is
   * delivered to each message's handle.
   */
  private async sendBatch(batch: MessageBatch): Promise<void> {
    const messages = batch.messages;

    await this.flushGate.reserve(1, 0);
    try {
      const pausedBy = batch.orderingKey === undefined ? undefined : this.pausedOrderingKeys.get(batch.orderingKey);
      if (pausedBy) {
        this.failBatch(
          batch,
          new MessageError(
            `Ordering key "${batch.orderingKey}" is paused due to previous error: ${pausedBy.message}`,
            "OrderingKeyPaused"
          )
        );
        return;
      }

      const startTime = Date.now();
      const payload = messages.map((pending) => pending.message);
      const ids = await this.retry.execute((context) =>
        this.transport.publish(this.topicPath, payload, { timeoutMs: context.timeoutMs })
      );

      messages.forEach((pending, index) => {
        const messageId = ids[index];
        if (messageId === undefined) {
          pending.reject(new ServerError(`No message ID returned for message ${index}`, "InternalError"));
          this.stats.publishErrors++;
          return;
        }
        pending.resolve(messageId);
        this.stats.messagesPublished++;
        this.stats.bytesPublished += pending.bytes;
      });

      const latency = Date.now() - startTime;
      this.latencySum += latency;
      this.latencyCount++;
      this.stats.batchesSent++;

      this.logger.debug("Batch published", {
        messages: messages.length,
        bytes: batch.bytes,
        orderingKey: batch.orderingKey,
        latencyMs: latency,
        waitedMs: startTime - batch.createdAt,
      });
    } catch (thrown) {
      const error = toError(thrown);
      this.failBatch(batch, error);
      this.logger.warn("Batch publish failed", {
        messages: messages.length,
        orderingKey: batch.orderingKey,
        error,
      });

      // Pause ordering key on error
      if (batch.orderingKey !== undefined) {
        this.pausedOrderingKeys.set(batch.orderingKey, error);
      }
    } finally {
      this.flowControl.release(messages.length, batch.bytes);
      this.flushGate.release(1, 0);
    }
  }

  private failBatch(batch: MessageBatch, error: Error): void {
    for (const pending of batch.messages) {
      pending.reject(error);
      this.stats.publishErrors++;
    }
  }
}

/**
 * Multi-topic publisher options.
 */
export interface PubSubPublisherOptions {
  projectId: string;
  transport: PubSubTransport;
  settings: PublisherSettings;
  /** Check that a topic exists before building its publisher. */
  verifyResources?: boolean;
  logger?: Logger;
}

/**
 * Publisher for any topic of one project, caching one `TopicPublisher`
 * per topic.
 */
export class PubSubPublisher {
  private readonly options: PubSubPublisherOptions;
  private readonly logger: Logger;
  private readonly cache: ResourceCache<TopicPublisher>;
  private readonly retry: RetryExecutor;
  private closed = false;

  constructor(options: PubSubPublisherOptions) {
    this.options = options;
    this.logger = options.logger ?? new NoopLogger();
    this.retry = new RetryExecutor(options.settings.retry);
    this.cache = new ResourceCache<TopicPublisher>({
      create: (topicPath) => this.createPublisher(topicPath),
      destroy: (publisher) => publisher.close(),
      logger: this.logger.child({ component: "publisher-cache" }),
    });
  }

  /**
   * Publish a message to a topic.
   */
  async publish(topic: string, message: PubSubMessage): Promise<string> {
    const handle = await this.cache.lease(this.topicPath(topic), (publisher) => publisher.enqueue(message));
    return handle.messageId;
  }

  /**
   * Get the cached publisher for a topic, creating it if needed.
   */
  async getPublisher(topic: string): Promise<TopicPublisher> {
    return this.cache.getOrCreate(this.topicPath(topic));
  }

  /**
   * Resume a paused ordering key on a topic.
   */
  async resumePublish(topic: string, orderingKey: string): Promise<void> {
    const publisher = await this.getPublisher(topic);
    publisher.resumePublish(orderingKey);
  }

  /**
   * Close and forget a topic's publisher; pending messages are flushed.
   */
  invalidate(topic: string): Promise<void> {
    return this.cache.invalidate(formatTopicPath(this.options.projectId, topic));
  }

  /**
   * Flush every cached publisher.
   */
  async flush(): Promise<void> {
    const publishers = await Promise.allSettled(this.cache.names().map((name) => this.cache.getOrCreate(name)));
    await Promise.all(
      publishers.map((result) => (result.status === "fulfilled" ? result.value.flush() : undefined))
    );
  }

  /**
   * Close every cached publisher, force-flushing pending batches.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.cache.close();
  }

  private topicPath(topic: string): string {
    if (this.closed) {
      throw new ClosedError("Publisher");
    }
    validateTopicName(topic);
    return formatTopicPath(this.options.projectId, topic);
  }

  private async createPublisher(topicPath: string): Promise<TopicPublisher> {
    if (this.options.verifyResources) {
      await this.retry.execute((context) =>
        this.options.transport.getTopic(topicPath, { timeoutMs: context.timeoutMs })
      );
    }

    return new TopicPublisher({
      projectId: this.options.projectId,
      topic: topicPath,
      transport: this.options.transport,
      settings: this.options.settings,
      logger: this.logger,
    });
  }
}
