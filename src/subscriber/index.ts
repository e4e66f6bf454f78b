/**
 * Pub/Sub Subscriber
 *
 * Streaming-style consumption over pull: background workers pull batches,
 * dispatch each message to a callback, extend deadlines of messages still
 * being processed, and acknowledge or nack once the callback settles.
 */

import type { ResourceCache } from "../cache/index.js";
import type { SubscriberSettings } from "../config/index.js";
import type { MessageConverter, PayloadType } from "../converter/index.js";
import { SimpleMessageConverter } from "../converter/index.js";
import { ClosedError, FlowControlError, isRetryableError, toError } from "../error/index.js";
import { FlowController } from "../flow-control/index.js";
import { NoopLogger, type Logger } from "../observability/index.js";
import { RetryExecutor } from "../retry/index.js";
import type { PubSubTransport } from "../transport/index.js";
import { getMessageSize, type ReceivedMessage, type SubscriberStats } from "../types/index.js";
import { createSubscriptionCache, resolveSubscriptionPath, type SubscriptionHandle } from "./handle.js";
import { AcknowledgeableMessage, type AckHandler } from "./puller.js";

export { AcknowledgeableMessage, PubSubPuller } from "./puller.js";
export type { AckHandler, AckTarget, ConvertedMessage, PubSubPullerOptions } from "./puller.js";
export { createSubscriptionCache, resolveSubscriptionPath } from "./handle.js";
export type { SubscriptionCacheOptions, SubscriptionHandle } from "./handle.js";

/**
 * Callback receiving each delivered message.
 *
 * Returning without resolving the message acknowledges it; throwing
 * (or rejecting) nacks it.
 */
export type MessageCallback = (message: AcknowledgeableMessage) => void | Promise<void>;

/**
 * Callback receiving a decoded payload with its delivery.
 */
export type ConvertedMessageCallback<T> = (payload: T, message: AcknowledgeableMessage) => void | Promise<void>;

/**
 * Subscription lifecycle state.
 */
export type SubscriptionState = "stopped" | "running" | "draining";

/**
 * Per-subscription options.
 */
export interface SubscribeOptions {
  /** Receives the failure that stopped the subscription. */
  onError?: (error: Error) => void;
}

/**
 * Collaborators of one running subscription.
 */
export interface SubscriptionContext {
  /** Fully qualified subscription path. */
  path: string;
  ackDeadlineSeconds: number;
  transport: PubSubTransport;
  settings: SubscriberSettings;
  retry: RetryExecutor;
  acks: AckHandler;
  logger: Logger;
}

/**
 * A running subscription.
 */
export class Subscription {
  readonly subscriptionPath: string;
  private currentState: SubscriptionState = "stopped";
  private readonly context: SubscriptionContext;
  private readonly callback: MessageCallback;
  private readonly options: SubscribeOptions;
  private readonly logger: Logger;
  private readonly abort = new AbortController();
  private readonly flowControl: FlowController;
  private readonly callbackGate: FlowController;
  private readonly outstanding = new Set<AcknowledgeableMessage>();
  private readonly inFlight = new Set<Promise<void>>();
  private workers: Promise<void>[] = [];
  private extensionTimer?: ReturnType<typeof setInterval>;
  private extending = false;
  private stopping?: Promise<void>;
  private readonly stopped = deferred();

  // Statistics
  private stats = {
    messagesReceived: 0,
    messagesAcked: 0,
    messagesNacked: 0,
    deadlineExtensions: 0,
  };
  private latencySum = 0;
  private latencyCount = 0;

  constructor(context: SubscriptionContext, callback: MessageCallback, options: SubscribeOptions = {}) {
    this.context = context;
    this.subscriptionPath = context.path;
    this.callback = callback;
    this.options = options;
    this.logger = context.logger;
    this.flowControl = new FlowController(context.settings.flowControl);
    this.callbackGate = new FlowController({
      maxOutstandingElementCount: context.settings.executorThreads,
      limitExceededBehavior: "Block",
    });
  }

  get state(): SubscriptionState {
    return this.currentState;
  }

  /**
   * Start the pull workers and the deadline extension loop.
   */
  start(): void {
    if (this.currentState !== "stopped" || this.abort.signal.aborted) {
      return;
    }
    this.currentState = "running";

    const { parallelPullCount, maxAckExtensionPeriodSeconds } = this.context.settings;
    this.workers = Array.from({ length: parallelPullCount }, (_, index) => this.runWorker(index));

    if (maxAckExtensionPeriodSeconds > 0) {
      const period = Math.max(1, (this.context.ackDeadlineSeconds * 1000) / 2);
      this.extensionTimer = setInterval(() => {
        void this.extendDeadlines();
      }, period);
    }

    this.logger.info("Subscription started", { workers: parallelPullCount });
  }

  /**
   * Stop pulling, wait for dispatched callbacks, then release resources.
   */
  stop(): Promise<void> {
    if (this.currentState === "stopped" && !this.stopping) {
      return Promise.resolve();
    }
    if (!this.stopping) {
      this.stopping = this.drain();
    }
    return this.stopping;
  }

  /**
   * Settles once the subscription has stopped, however the stop was caused.
   */
  whenStopped(): Promise<void> {
    return this.stopped.promise;
  }

  /**
   * Get subscriber statistics.
   */
  getStats(): SubscriberStats {
    const usage = this.flowControl.getOutstanding();
    return {
      ...this.stats,
      outstandingMessages: usage.elementCount,
      outstandingBytes: usage.byteSize,
      avgProcessingLatencyMs: this.latencyCount > 0 ? this.latencySum / this.latencyCount : 0,
    };
  }

  private async drain(): Promise<void> {
    this.currentState = "draining";
    this.abort.abort();
    this.logger.info("Subscription draining", { inFlight: this.inFlight.size });

    await Promise.all(this.workers);
    await Promise.all([...this.inFlight]);

    if (this.extensionTimer) {
      clearInterval(this.extensionTimer);
      this.extensionTimer = undefined;
    }
    this.currentState = "stopped";
    this.stopped.resolve();
    this.logger.info("Subscription stopped", { ...this.stats });
  }

  private fail(error: Error): void {
    if (this.currentState !== "running") return;
    this.logger.error("Subscription failed", { error });
    void this.stop();
    this.options.onError?.(error);
  }

  private async runWorker(worker: number): Promise<void> {
    const { settings, retry, transport, path } = this.context;
    const signal = this.abort.signal;

    while (!signal.aborted) {
      const maxMessages = this.pullSize();
      if (maxMessages === 0) {
        await sleep(settings.pullIntervalMs, signal);
        continue;
      }

      let received: ReceivedMessage[];
      try {
        received = await retry.execute(
          (context) => transport.pull(path, maxMessages, { timeoutMs: context.timeoutMs, returnImmediately: false }),
          signal
        );
      } catch (thrown) {
        if (signal.aborted) {
          return;
        }
        const error = toError(thrown);
        if (!isRetryableError(error)) {
          this.fail(error);
          return;
        }
        this.logger.warn("Pull failed; backing off", { worker, error });
        await sleep(settings.pullIntervalMs, signal);
        continue;
      }

      if (received.length === 0) {
        await sleep(settings.pullIntervalMs, signal);
        continue;
      }

      this.stats.messagesReceived += received.length;
      // Tracked from receipt so deadlines of messages waiting for a slot are extended too.
      const messages = received.map(
        (raw) => new AcknowledgeableMessage(raw, path, this.context.acks, this.context.ackDeadlineSeconds)
      );
      for (const message of messages) this.outstanding.add(message);
      for (const message of messages) {
        await this.dispatch(message);
      }
    }
  }

  /**
   * Room for the next pull under the element limit; 0 means wait.
   */
  private pullSize(): number {
    const { maxMessagesPerPull, flowControl } = this.context.settings;
    const limit = flowControl.maxOutstandingElementCount;
    if (limit === undefined || flowControl.limitExceededBehavior === "Ignore") {
      return maxMessagesPerPull;
    }
    return Math.max(0, Math.min(maxMessagesPerPull, limit - this.flowControl.getOutstanding().elementCount));
  }

  private async dispatch(message: AcknowledgeableMessage): Promise<void> {
    const bytes = getMessageSize(message.message);

    try {
      await this.flowControl.reserve(1, bytes);
    } catch (thrown) {
      const error = toError(thrown);
      const level = error instanceof FlowControlError && error.code === "FlowControl.RequestTooLarge" ? "error" : "warn";
      this.logger[level]("Message rejected by flow control", { messageId: message.message.messageId, error });
      await this.settle(message, false);
      this.outstanding.delete(message);
      return;
    }

    await this.callbackGate.reserve(1, 0);

    if (this.abort.signal.aborted) {
      // Pulled while draining.
      await this.settle(message, false);
      this.outstanding.delete(message);
      this.callbackGate.release(1, 0);
      this.flowControl.release(1, bytes);
      return;
    }

    const run = this.process(message, bytes);
    this.inFlight.add(run);
    void run.then(
      () => this.inFlight.delete(run),
      (error: unknown) => {
        this.inFlight.delete(run);
        this.logger.error("Message processing failed unexpectedly", { error });
      }
    );
  }

  private async process(message: AcknowledgeableMessage, bytes: number): Promise<void> {
    const startTime = Date.now();

    let succeeded = true;
    try {
      await this.callback(message);
    } catch (thrown) {
      succeeded = false;
      this.logger.warn("Message callback failed; nacking", {
        messageId: message.message.messageId,
        error: toError(thrown),
      });
    }

    try {
      await this.settle(message, succeeded);
    } finally {
      this.outstanding.delete(message);
      this.latencySum += Date.now() - startTime;
      this.latencyCount++;
      this.flowControl.release(1, bytes);
      this.callbackGate.release(1, 0);
    }
  }

  /**
   * Ack or nack a message the callback left unresolved, then count the outcome.
   */
  private async settle(message: AcknowledgeableMessage, ack: boolean): Promise<void> {
    try {
      if (ack) {
        await message.ack();
      } else {
        await message.nack();
      }
    } catch (error) {
      this.logger.warn(ack ? "Failed to acknowledge message" : "Failed to nack message", {
        messageId: message.message.messageId,
        error,
      });
    }

    if (message.state === "acknowledged") {
      this.stats.messagesAcked++;
    } else if (message.state === "nacked") {
      this.stats.messagesNacked++;
    }
  }

  /**
   * Extend deadlines of messages not yet resolved, up to the
   * maximum extension period since receipt.
   */
  private async extendDeadlines(): Promise<void> {
    if (this.extending) return;
    this.extending = true;

    try {
      const { ackDeadlineSeconds, settings, acks, path } = this.context;
      const now = Date.now();
      const horizon = settings.maxAckExtensionPeriodSeconds * 1000;
      const due = [...this.outstanding].filter(
        (message) => message.state === "delivered" && now - message.receivedAt < horizon
      );
      if (due.length === 0) return;

      await acks.sendModifyAckDeadline(
        path,
        due.map((message) => message.ackId),
        ackDeadlineSeconds
      );

      const deadline = now + ackDeadlineSeconds * 1000;
      for (const message of due) message.extendedTo(deadline);
      this.stats.deadlineExtensions += due.length;
      this.logger.debug("Extended ack deadlines", { count: due.length, ackDeadlineSeconds });
    } catch (error) {
      this.logger.warn("Deadline extension failed", { error });
    } finally {
      this.extending = false;
    }
  }
}

/**
 * Subscriber options.
 */
export interface PubSubSubscriberOptions {
  projectId: string;
  transport: PubSubTransport;
  settings: SubscriberSettings;
  /** Sends acknowledgments; usually the client's puller. */
  acks: AckHandler;
  converter?: MessageConverter;
  /** Shared subscription handle cache; one is created when omitted. */
  cache?: ResourceCache<SubscriptionHandle>;
  verifyResources?: boolean;
  logger?: Logger;
}

/**
 * Asynchronous subscriber managing any number of subscriptions.
 */
export class PubSubSubscriber {
  private readonly options: PubSubSubscriberOptions;
  private readonly logger: Logger;
  private readonly retry: RetryExecutor;
  private readonly cache: ResourceCache<SubscriptionHandle>;
  private readonly converter: MessageConverter;
  private readonly active = new Set<Subscription>();
  private closed = false;

  constructor(options: PubSubSubscriberOptions) {
    this.options = options;
    this.logger = (options.logger ?? new NoopLogger()).child({ component: "subscriber" });
    this.converter = options.converter ?? new SimpleMessageConverter();
    this.retry = new RetryExecutor(options.settings.retry, {
      hooks: {
        onRetry: (attempt, error, delayMs) => this.logger.debug("Retrying pull", { attempt, delayMs, error }),
        onExhausted: (error, attempts) => this.logger.warn("Pull retries exhausted", { attempts, error }),
      },
    });
    this.cache =
      options.cache ??
      createSubscriptionCache({
        transport: options.transport,
        retry: this.retry,
        verifyResources: options.verifyResources ?? false,
        logger: this.logger,
      });
  }

  /**
   * Start consuming a subscription.
   */
  async subscribe(subscription: string, callback: MessageCallback, options: SubscribeOptions = {}): Promise<Subscription> {
    if (this.closed) {
      throw new ClosedError("Subscriber");
    }

    const path = resolveSubscriptionPath(this.options.projectId, subscription);
    const handle = await this.cache.getOrCreate(path);

    const running = new Subscription(
      {
        path,
        ackDeadlineSeconds: handle.info?.ackDeadlineSeconds ?? this.options.settings.ackDeadlineSeconds,
        transport: this.options.transport,
        settings: this.options.settings,
        retry: this.retry,
        acks: this.options.acks,
        logger: this.logger.child({ subscription: path }),
      },
      callback,
      options
    );

    this.active.add(running);
    running.start();
    void this.cache
      .lease(path, async () => {
        await running.whenStopped();
        this.active.delete(running);
      })
      .catch((error: unknown) => {
        this.active.delete(running);
        this.logger.warn("Subscription handle lease failed", { subscription: path, error });
      });
    return running;
  }

  /**
   * Start consuming a subscription, decoding each payload into `type`.
   * A payload that fails to decode is nacked.
   */
  subscribeAndConvert<T>(
    subscription: string,
    type: PayloadType<T>,
    callback: ConvertedMessageCallback<T>,
    options: SubscribeOptions = {}
  ): Promise<Subscription> {
    return this.subscribe(
      subscription,
      (message) => callback(this.converter.fromWireFormat(message.message, type), message),
      options
    );
  }

  /**
   * Subscriptions that have not yet stopped.
   */
  getSubscriptions(): Subscription[] {
    return [...this.active];
  }

  /**
   * Stop every subscription and release cached handles.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await Promise.all([...this.active].map((subscription) => subscription.stop()));
    await this.cache.close();
  }
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
