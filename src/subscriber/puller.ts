/**
 * Synchronous pulls with explicit acknowledgment.
 */

import type { ResourceCache } from "../cache/index.js";
import type { SubscriberSettings } from "../config/index.js";
import type { MessageConverter, PayloadType } from "../converter/index.js";
import { SimpleMessageConverter } from "../converter/index.js";
import { AcknowledgmentError, ClosedError } from "../error/index.js";
import { NoopLogger, type Logger } from "../observability/index.js";
import { RetryExecutor } from "../retry/index.js";
import type { PubSubTransport } from "../transport/index.js";
import type { AckState, AckToken, PubSubMessageData, ReceivedMessage } from "../types/index.js";
import { createSubscriptionCache, resolveSubscriptionPath, type SubscriptionHandle } from "./handle.js";

/**
 * Sends acknowledgment RPCs for one or more deliveries.
 */
export interface AckHandler {
  sendAck(subscriptionPath: string, ackIds: readonly string[]): Promise<void>;
  sendModifyAckDeadline(subscriptionPath: string, ackIds: readonly string[], seconds: number): Promise<void>;
}

/**
 * A delivered message with its acknowledgment operations.
 *
 * Resolving is idempotent: once acknowledged or nacked, further `ack`
 * and `nack` calls return without an RPC. Calls made while a resolution
 * is in flight share its outcome.
 */
export class AcknowledgeableMessage implements AckToken {
  readonly subscriptionPath: string;
  readonly ackId: string;
  readonly message: PubSubMessageData;
  readonly deliveryAttempt?: number;
  /** Receipt time in epoch milliseconds. */
  readonly receivedAt: number;

  private readonly handler: AckHandler;
  private currentState: AckState = "delivered";
  private deadlineMs: number;
  private pending?: Promise<void>;

  constructor(
    received: ReceivedMessage,
    subscriptionPath: string,
    handler: AckHandler,
    ackDeadlineSeconds: number,
    now: number = Date.now()
  ) {
    this.subscriptionPath = subscriptionPath;
    this.ackId = received.ackId;
    this.message = received.message;
    this.deliveryAttempt = received.deliveryAttempt;
    this.receivedAt = now;
    this.handler = handler;
    this.deadlineMs = now + ackDeadlineSeconds * 1000;
  }

  get state(): AckState {
    return this.currentState;
  }

  /**
   * Current acknowledgment deadline.
   */
  get deadline(): Date {
    return new Date(this.deadlineMs);
  }

  /**
   * Delivery token for batched acknowledgment.
   */
  get token(): AckToken {
    return { subscriptionPath: this.subscriptionPath, ackId: this.ackId };
  }

  ack(): Promise<void> {
    return this.resolveWith("acknowledged", () => this.handler.sendAck(this.subscriptionPath, [this.ackId]));
  }

  /**
   * Release the delivery for immediate redelivery.
   */
  nack(): Promise<void> {
    return this.resolveWith("nacked", () =>
      this.handler.sendModifyAckDeadline(this.subscriptionPath, [this.ackId], 0)
    );
  }

  /**
   * Extend (or shorten) the acknowledgment deadline.
   */
  async modifyAckDeadline(seconds: number): Promise<void> {
    if (this.currentState !== "delivered") return;
    await this.handler.sendModifyAckDeadline(this.subscriptionPath, [this.ackId], seconds);
    this.extendedTo(Date.now() + seconds * 1000);
  }

  /**
   * Move from delivered to a terminal state; false when already resolved.
   * @internal
   */
  tryResolve(state: "acknowledged" | "nacked"): boolean {
    if (this.currentState !== "delivered") return false;
    this.currentState = state;
    return true;
  }

  /**
   * The resolution RPC currently in flight, if any.
   * @internal
   */
  get inFlight(): Promise<void> | undefined {
    return this.pending;
  }

  /**
   * Record the resolution RPC in flight until it settles.
   * @internal
   */
  track(request: Promise<void>): void {
    this.pending = request;
    const clear = (): void => {
      if (this.pending === request) this.pending = undefined;
    };
    void request.then(clear, clear);
  }

  /**
   * Undo `tryResolve` after a failed RPC.
   * @internal
   */
  revert(): void {
    this.currentState = "delivered";
  }

  /** @internal */
  extendedTo(deadlineMs: number): void {
    this.deadlineMs = deadlineMs;
  }

  private resolveWith(state: "acknowledged" | "nacked", send: () => Promise<void>): Promise<void> {
    if (this.pending) return this.pending;
    if (!this.tryResolve(state)) return Promise.resolve();
    const request = send().catch((error: unknown) => {
      this.revert();
      throw error;
    });
    this.track(request);
    return request;
  }
}

/**
 * Something that identifies a delivery.
 */
export type AckTarget = AckToken | AcknowledgeableMessage;

/**
 * Decoded payload with its delivery.
 */
export interface ConvertedMessage<T> {
  readonly payload: T;
  readonly message: AcknowledgeableMessage;
}

/**
 * Puller options.
 */
export interface PubSubPullerOptions {
  projectId: string;
  transport: PubSubTransport;
  settings: SubscriberSettings;
  converter?: MessageConverter;
  /** Shared subscription handle cache; one is created when omitted. */
  cache?: ResourceCache<SubscriptionHandle>;
  verifyResources?: boolean;
  logger?: Logger;
}

/**
 * On-demand puller.
 */
export class PubSubPuller implements AckHandler {
  private readonly projectId: string;
  private readonly transport: PubSubTransport;
  private readonly settings: SubscriberSettings;
  private readonly converter: MessageConverter;
  private readonly cache: ResourceCache<SubscriptionHandle>;
  private readonly retry: RetryExecutor;
  private readonly logger: Logger;
  private closed = false;

  constructor(options: PubSubPullerOptions) {
    this.projectId = options.projectId;
    this.transport = options.transport;
    this.settings = options.settings;
    this.converter = options.converter ?? new SimpleMessageConverter();
    this.logger = (options.logger ?? new NoopLogger()).child({ component: "puller" });
    this.retry = new RetryExecutor(options.settings.retry, {
      hooks: {
        onRetry: (attempt, error, delayMs) => this.logger.debug("Retrying subscriber call", { attempt, delayMs, error }),
        onExhausted: (error, attempts) => this.logger.warn("Subscriber call retries exhausted", { attempts, error }),
      },
    });
    this.cache =
      options.cache ??
      createSubscriptionCache({
        transport: this.transport,
        retry: this.retry,
        verifyResources: options.verifyResources ?? false,
        logger: this.logger,
      });
  }

  /**
   * Pull up to `maxMessages` messages; returns what is available, possibly none.
   */
  async pull(
    subscription: string,
    maxMessages: number,
    options: { returnImmediately?: boolean } = {}
  ): Promise<AcknowledgeableMessage[]> {
    const handle = await this.handle(subscription);
    const returnImmediately = options.returnImmediately ?? true;

    const received = await this.retry.execute((context) =>
      this.transport.pull(handle.path, maxMessages, { timeoutMs: context.timeoutMs, returnImmediately })
    );

    const ackDeadlineSeconds = handle.info?.ackDeadlineSeconds ?? this.settings.ackDeadlineSeconds;
    this.logger.debug("Pulled messages", { subscription: handle.path, count: received.length });
    return received.map((message) => new AcknowledgeableMessage(message, handle.path, this, ackDeadlineSeconds));
  }

  /**
   * Pull at most one message and acknowledge it.
   *
   * An acknowledgment failure is logged; the message is returned anyway.
   */
  async pullNext(subscription: string): Promise<PubSubMessageData | undefined> {
    const [message] = await this.pull(subscription, 1);
    if (!message) {
      return undefined;
    }

    try {
      await message.ack();
    } catch (error) {
      this.logger.warn("Failed to acknowledge pulled message", {
        subscription: message.subscriptionPath,
        messageId: message.message.messageId,
        error,
      });
    }
    return message.message;
  }

  /**
   * Pull messages and acknowledge all of them in one RPC.
   *
   * An acknowledgment failure is logged; the messages are returned anyway.
   */
  async pullAndAck(subscription: string, maxMessages: number): Promise<PubSubMessageData[]> {
    const messages = await this.pull(subscription, maxMessages);
    if (messages.length === 0) {
      return [];
    }

    try {
      await this.ack(messages);
    } catch (error) {
      this.logger.warn("Failed to acknowledge pulled messages", {
        subscription: messages[0]?.subscriptionPath,
        count: messages.length,
        error,
      });
    }
    return messages.map((message) => message.message);
  }

  /**
   * Pull messages and decode each payload into `type`.
   *
   * When any payload fails to decode, every pulled message is nacked and
   * the conversion error is thrown.
   */
  async pullAndConvert<T>(
    subscription: string,
    maxMessages: number,
    type: PayloadType<T>
  ): Promise<ConvertedMessage<T>[]> {
    const messages = await this.pull(subscription, maxMessages);

    try {
      return messages.map((message) => ({
        payload: this.converter.fromWireFormat(message.message, type),
        message,
      }));
    } catch (error) {
      await this.nack(messages).catch((nackError: unknown) =>
        this.logger.warn("Failed to nack unconvertible messages", { error: nackError })
      );
      throw error;
    }
  }

  /**
   * Acknowledge deliveries of one subscription in one RPC.
   *
   * @throws AcknowledgmentError when targets span subscriptions
   */
  async ack(targets: readonly AckTarget[]): Promise<void> {
    await this.resolveBatch(targets, "acknowledged", (path, ackIds) => this.sendAck(path, ackIds));
  }

  /**
   * Nack deliveries of one subscription in one RPC.
   *
   * @throws AcknowledgmentError when targets span subscriptions
   */
  async nack(targets: readonly AckTarget[]): Promise<void> {
    await this.resolveBatch(targets, "nacked", (path, ackIds) => this.sendModifyAckDeadline(path, ackIds, 0));
  }

  /**
   * Set the deadline of deliveries of one subscription in one RPC.
   */
  async modifyAckDeadline(targets: readonly AckTarget[], seconds: number): Promise<void> {
    const path = commonSubscription(targets);
    if (path === undefined) return;

    const open = targets.filter((target) => !(target instanceof AcknowledgeableMessage) || target.state === "delivered");
    const ackIds = unique(open.map((target) => target.ackId));
    if (ackIds.length === 0) return;

    await this.sendModifyAckDeadline(path, ackIds, seconds);
    const deadline = Date.now() + seconds * 1000;
    for (const target of open) {
      if (target instanceof AcknowledgeableMessage) target.extendedTo(deadline);
    }
  }

  async sendAck(subscriptionPath: string, ackIds: readonly string[]): Promise<void> {
    this.assertOpen();
    await this.retry.execute((context) =>
      this.transport.acknowledge(subscriptionPath, ackIds, { timeoutMs: context.timeoutMs })
    );
  }

  async sendModifyAckDeadline(subscriptionPath: string, ackIds: readonly string[], seconds: number): Promise<void> {
    this.assertOpen();
    await this.retry.execute((context) =>
      this.transport.modifyAckDeadline(subscriptionPath, ackIds, seconds, { timeoutMs: context.timeoutMs })
    );
  }

  /**
   * Refuse further calls.
   */
  close(): void {
    this.closed = true;
  }

  private async handle(subscription: string): Promise<SubscriptionHandle> {
    this.assertOpen();
    return this.cache.getOrCreate(resolveSubscriptionPath(this.projectId, subscription));
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ClosedError("Subscriber");
    }
  }

  private async resolveBatch(
    targets: readonly AckTarget[],
    state: "acknowledged" | "nacked",
    send: (path: string, ackIds: string[]) => Promise<void>
  ): Promise<void> {
    const path = commonSubscription(targets);
    if (path === undefined) return;

    const claimed: AcknowledgeableMessage[] = [];
    const inFlight: Promise<void>[] = [];
    const ackIds: string[] = [];
    for (const target of targets) {
      if (target instanceof AcknowledgeableMessage) {
        const pending = target.inFlight;
        if (pending) {
          inFlight.push(pending);
          continue;
        }
        if (!target.tryResolve(state)) continue;
        claimed.push(target);
      }
      ackIds.push(target.ackId);
    }

    const distinct = unique(ackIds);
    if (distinct.length === 0) {
      await Promise.all(inFlight);
      return;
    }

    const request = send(path, distinct).catch((error: unknown) => {
      for (const message of claimed) message.revert();
      throw error;
    });
    for (const message of claimed) message.track(request);
    await Promise.all([request, ...inFlight]);
  }
}

/**
 * The one subscription all targets belong to; undefined for no targets.
 */
function commonSubscription(targets: readonly AckTarget[]): string | undefined {
  const paths = new Set(targets.map((target) => target.subscriptionPath));
  if (paths.size > 1) {
    throw new AcknowledgmentError(
      `Delivery tokens span ${paths.size} subscriptions; acknowledge each subscription separately`,
      "InvalidArgument",
      { ackIds: targets.map((target) => target.ackId) }
    );
  }
  const [path] = paths;
  return path;
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}
