/**
 * Pub/Sub Configuration Module
 *
 * Typed configuration with defaults, a fluent builder, and the dotted
 * property surface (`subscriber.executorThreads`, `publisher.retry.maxAttempts`, ...)
 * validated with zod.
 */

import { availableParallelism } from "node:os";
import { z } from "zod";
import { ConfigurationError } from "../error/index.js";
import type { AuthProvider } from "../credentials/index.js";
import {
  FlowControlSettings,
  LimitExceededBehavior,
  DEFAULT_FLOW_CONTROL_SETTINGS,
} from "../flow-control/index.js";
import { RetrySettings, DEFAULT_RETRY_SETTINGS } from "../retry/index.js";

/**
 * Credentials used by the REST transport.
 */
export type Credentials =
  | { type: "none" } // For emulator
  | { type: "access_token"; token: string }
  | { type: "provider"; provider: AuthProvider };

/**
 * Publisher batching settings. Unset thresholds do not trigger flushes.
 */
export interface BatchingSettings {
  /** Flush once a batch holds this many messages. */
  elementCountThreshold?: number;
  /** Flush once a batch holds this many bytes. */
  requestByteThreshold?: number;
  /** Flush this long after the first message entered an empty batch. */
  delayThresholdMs?: number;
  /** When false every message is sent in its own request. */
  enabled: boolean;
}

/**
 * Settings shared by both roles.
 */
export interface RoleSettings {
  /** Concurrency bound for the role's background work. */
  executorThreads: number;
  /** Retry policy for the role's remote calls. */
  retry: RetrySettings;
  /** Flow control for the role's outstanding messages. */
  flowControl: FlowControlSettings;
}

/**
 * Publisher settings.
 */
export interface PublisherSettings extends RoleSettings {
  batching: BatchingSettings;
  /** Batch and pause per ordering key. */
  enableMessageOrdering: boolean;
}

/**
 * Subscriber settings.
 */
export interface SubscriberSettings extends RoleSettings {
  /** Concurrent pull loops per subscription. */
  parallelPullCount: number;
  /** How long deadlines are extended for one message; 0 disables extension. */
  maxAckExtensionPeriodSeconds: number;
  /** Deadline requested on each extension, in seconds. */
  ackDeadlineSeconds: number;
  /** Maximum messages requested per pull by the pull loops. */
  maxMessagesPerPull: number;
  /** Back-off after an empty pull, in milliseconds. */
  pullIntervalMs: number;
  /** Alternate endpoint for pull requests. */
  pullEndpoint?: string;
}

/**
 * Converter selection.
 */
export type ConverterKind = "simple" | "json";

/**
 * Pub/Sub client configuration.
 */
export interface PubSubConfig {
  /** Project qualifying every resource name. */
  projectId: string;
  /** Credentials for the REST transport. */
  credentials: Credentials;
  /** Custom endpoint (for emulator). */
  endpoint?: string;
  /** Default request timeout in milliseconds. */
  timeoutMs: number;
  /** Publisher role settings. */
  publisher: PublisherSettings;
  /** Subscriber role settings. */
  subscriber: SubscriberSettings;
  /** Payload converter. */
  converter: ConverterKind;
  /** Check that a topic or subscription exists before caching its handle. */
  verifyResources: boolean;
}

/**
 * Default batching settings (batching disabled).
 */
export const DEFAULT_BATCHING_SETTINGS: BatchingSettings = {
  enabled: false,
};

/**
 * Default publisher settings.
 */
export const DEFAULT_PUBLISHER_SETTINGS: PublisherSettings = {
  executorThreads: 4,
  retry: DEFAULT_RETRY_SETTINGS,
  flowControl: DEFAULT_FLOW_CONTROL_SETTINGS,
  batching: DEFAULT_BATCHING_SETTINGS,
  enableMessageOrdering: false,
};

/**
 * Default subscriber settings.
 */
export const DEFAULT_SUBSCRIBER_SETTINGS: SubscriberSettings = {
  executorThreads: 4,
  retry: DEFAULT_RETRY_SETTINGS,
  flowControl: DEFAULT_FLOW_CONTROL_SETTINGS,
  parallelPullCount: availableParallelism(),
  maxAckExtensionPeriodSeconds: 0,
  ackDeadlineSeconds: 10,
  maxMessagesPerPull: 100,
  pullIntervalMs: 100,
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<PubSubConfig, "projectId"> = {
  credentials: { type: "none" },
  timeoutMs: 30000,
  publisher: DEFAULT_PUBLISHER_SETTINGS,
  subscriber: DEFAULT_SUBSCRIBER_SETTINGS,
  converter: "simple",
  verifyResources: false,
};

/**
 * Default service endpoint.
 */
export const DEFAULT_ENDPOINT = "https://pubsub.googleapis.com";

// ---------------------------------------------------------------------------
// Property surface
// ---------------------------------------------------------------------------

const positiveInt = z.coerce.number().int().positive();
const seconds = z.coerce.number().min(0);
const flag = z.union([
  z.boolean(),
  z.enum(["true", "false"]).transform((value) => value === "true"),
]);

const RetryPropertiesSchema = z
  .object({
    totalTimeoutSeconds: seconds.optional(),
    initialRetryDelaySeconds: seconds.optional(),
    retryDelayMultiplier: z.coerce.number().min(1).optional(),
    maxRetryDelaySeconds: seconds.optional(),
    maxAttempts: z.coerce.number().int().min(0).optional(),
    jittered: flag.optional(),
    initialRpcTimeoutSeconds: seconds.optional(),
    rpcTimeoutMultiplier: z.coerce.number().min(1).optional(),
    maxRpcTimeoutSeconds: seconds.optional(),
  })
  .strict();

const FlowControlPropertiesSchema = z
  .object({
    maxOutstandingElementCount: positiveInt.optional(),
    maxOutstandingRequestBytes: positiveInt.optional(),
    limitExceededBehavior: z.enum(["Block", "Ignore", "ThrowException"]).optional(),
  })
  .strict();

const BatchingPropertiesSchema = z
  .object({
    elementCountThreshold: positiveInt.max(1000).optional(),
    requestByteThreshold: positiveInt.max(10 * 1024 * 1024).optional(),
    delayThresholdSeconds: z.coerce.number().positive().optional(),
    enabled: flag.optional(),
  })
  .strict();

const rolePropertiesShape = {
  executorThreads: positiveInt.optional(),
  retry: RetryPropertiesSchema.optional(),
  flowControl: FlowControlPropertiesSchema.optional(),
};

const PubSubPropertiesSchema = z
  .object({
    projectId: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
    emulatorHost: z.string().min(1).optional(),
    timeoutSeconds: z.coerce.number().positive().optional(),
    converter: z.enum(["simple", "json"]).optional(),
    verifyResources: flag.optional(),
    publisher: z
      .object({
        ...rolePropertiesShape,
        batching: BatchingPropertiesSchema.optional(),
        enableMessageOrdering: flag.optional(),
      })
      .strict()
      .optional(),
    subscriber: z
      .object({
        ...rolePropertiesShape,
        parallelPullCount: positiveInt.optional(),
        maxAckExtensionPeriod: seconds.optional(),
        ackDeadlineSeconds: z.coerce.number().int().min(10).max(600).optional(),
        maxMessagesPerPull: positiveInt.max(1000).optional(),
        pullEndpoint: z.string().url().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/**
 * Validated property tree.
 */
export type PubSubProperties = z.infer<typeof PubSubPropertiesSchema>;

type RetryProperties = z.infer<typeof RetryPropertiesSchema>;
type FlowControlProperties = z.infer<typeof FlowControlPropertiesSchema>;

/**
 * Parse dotted properties such as `{"subscriber.executorThreads": "8"}`.
 *
 * @throws ConfigurationError listing every invalid or unknown property
 */
export function parseProperties(properties: Record<string, unknown>): PubSubProperties {
  const result = PubSubPropertiesSchema.safeParse(unflatten(properties));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ConfigurationError(
      `Invalid Pub/Sub properties: ${issues.join("; ")}`,
      "InvalidConfig",
      { issues }
    );
  }
  return result.data;
}

function unflatten(properties: Record<string, unknown>): Record<string, unknown> {
  const root: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(properties)) {
    const segments = key.split(".");
    let node = root;
    for (const segment of segments.slice(0, -1)) {
      const child = node[segment];
      if (child === undefined) {
        const created: Record<string, unknown> = {};
        node[segment] = created;
        node = created;
      } else if (isRecord(child)) {
        node = child;
      } else {
        throw new ConfigurationError(`Property "${key}" conflicts with "${segment}"`, "InvalidConfig");
      }
    }
    const leaf = segments[segments.length - 1] ?? key;
    if (isRecord(node[leaf])) {
      throw new ConfigurationError(`Property "${key}" conflicts with nested properties`, "InvalidConfig");
    }
    node[leaf] = value;
  }
  return root;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toMs(value: number | undefined): number | undefined {
  return value === undefined ? undefined : Math.round(value * 1000);
}

function retryOverrides(props: RetryProperties | undefined): Partial<RetrySettings> {
  const retry: Partial<RetrySettings> = {};
  if (!props) return retry;
  assignDefined(retry, "totalTimeoutMs", toMs(props.totalTimeoutSeconds));
  assignDefined(retry, "initialRetryDelayMs", toMs(props.initialRetryDelaySeconds));
  assignDefined(retry, "retryDelayMultiplier", props.retryDelayMultiplier);
  assignDefined(retry, "maxRetryDelayMs", toMs(props.maxRetryDelaySeconds));
  assignDefined(retry, "maxAttempts", props.maxAttempts);
  assignDefined(retry, "jittered", props.jittered);
  assignDefined(retry, "initialRpcTimeoutMs", toMs(props.initialRpcTimeoutSeconds));
  assignDefined(retry, "rpcTimeoutMultiplier", props.rpcTimeoutMultiplier);
  assignDefined(retry, "maxRpcTimeoutMs", toMs(props.maxRpcTimeoutSeconds));
  return retry;
}

function flowControlOverrides(props: FlowControlProperties | undefined): Partial<FlowControlSettings> {
  const flowControl: Partial<FlowControlSettings> = {};
  if (!props) return flowControl;
  assignDefined(flowControl, "maxOutstandingElementCount", props.maxOutstandingElementCount);
  assignDefined(flowControl, "maxOutstandingRequestBytes", props.maxOutstandingRequestBytes);
  assignDefined(flowControl, "limitExceededBehavior", props.limitExceededBehavior);
  return flowControl;
}

function assignDefined<T, K extends keyof T>(target: Partial<T>, key: K, value: T[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Partial role settings accepted by the builder.
 */
export type RoleOverrides<S extends RoleSettings> = Partial<Omit<S, "retry" | "flowControl">> & {
  retry?: Partial<RetrySettings>;
  flowControl?: Partial<FlowControlSettings>;
};

/**
 * Pub/Sub configuration builder.
 */
export class PubSubConfigBuilder {
  private config: Partial<Omit<PubSubConfig, "publisher" | "subscriber">> = {};
  private publisher: PublisherSettings = cloneRole(DEFAULT_PUBLISHER_SETTINGS);
  private subscriber: SubscriberSettings = cloneRole(DEFAULT_SUBSCRIBER_SETTINGS);

  /**
   * Set the project ID.
   */
  projectId(projectId: string): this {
    this.config.projectId = projectId;
    return this;
  }

  /**
   * Set explicit credentials.
   */
  credentials(credentials: Credentials): this {
    this.config.credentials = credentials;
    return this;
  }

  /**
   * Use explicit access token.
   */
  accessToken(token: string): this {
    this.config.credentials = { type: "access_token", token };
    return this;
  }

  /**
   * Set custom endpoint (for emulator).
   */
  endpoint(url: string): this {
    this.config.endpoint = url;
    return this;
  }

  /**
   * Set request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeoutMs = ms;
    return this;
  }

  /**
   * Select the payload converter.
   */
  converter(kind: ConverterKind): this {
    this.config.converter = kind;
    return this;
  }

  /**
   * Check resource existence when handles are created.
   */
  verifyResources(enable: boolean = true): this {
    this.config.verifyResources = enable;
    return this;
  }

  /**
   * Configure batch settings.
   */
  batching(settings: Partial<BatchingSettings>): this {
    this.publisher.batching = { ...this.publisher.batching, ...settings };
    return this;
  }

  /**
   * Enable message ordering.
   */
  enableMessageOrdering(enable: boolean = true): this {
    this.publisher.enableMessageOrdering = enable;
    return this;
  }

  /**
   * Merge publisher settings.
   */
  publisherSettings(settings: RoleOverrides<PublisherSettings>): this {
    this.publisher = mergeRole(this.publisher, settings);
    return this;
  }

  /**
   * Merge subscriber settings.
   */
  subscriberSettings(settings: RoleOverrides<SubscriberSettings>): this {
    this.subscriber = mergeRole(this.subscriber, settings);
    return this;
  }

  /**
   * Load configuration from environment variables.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const projectId = env["GOOGLE_CLOUD_PROJECT"] ?? env["GCLOUD_PROJECT"] ?? env["GCP_PROJECT"];
    if (projectId) {
      this.config.projectId = projectId;
    }

    const accessToken = env["PUBSUB_ACCESS_TOKEN"];
    if (accessToken) {
      this.config.credentials = { type: "access_token", token: accessToken };
    }

    const emulatorHost = env["PUBSUB_EMULATOR_HOST"];
    if (emulatorHost) {
      this.useEmulator(emulatorHost);
    }

    return this;
  }

  /**
   * Apply dotted properties (see `parseProperties`).
   */
  fromProperties(properties: Record<string, unknown>): this {
    const props = parseProperties(properties);

    if (props.projectId) this.config.projectId = props.projectId;
    if (props.endpoint) this.config.endpoint = props.endpoint;
    if (props.emulatorHost) this.useEmulator(props.emulatorHost);
    if (props.timeoutSeconds !== undefined) this.config.timeoutMs = Math.round(props.timeoutSeconds * 1000);
    if (props.converter) this.config.converter = props.converter;
    if (props.verifyResources !== undefined) this.config.verifyResources = props.verifyResources;

    const publisher = props.publisher;
    if (publisher) {
      const overrides: RoleOverrides<PublisherSettings> = {
        retry: retryOverrides(publisher.retry),
        flowControl: flowControlOverrides(publisher.flowControl),
      };
      assignDefined(overrides, "executorThreads", publisher.executorThreads);
      assignDefined(overrides, "enableMessageOrdering", publisher.enableMessageOrdering);
      if (publisher.batching) {
        const batching: BatchingSettings = { ...this.publisher.batching };
        assignDefined(batching, "elementCountThreshold", publisher.batching.elementCountThreshold);
        assignDefined(batching, "requestByteThreshold", publisher.batching.requestByteThreshold);
        assignDefined(batching, "delayThresholdMs", toMs(publisher.batching.delayThresholdSeconds));
        assignDefined(batching, "enabled", publisher.batching.enabled);
        overrides.batching = batching;
      }
      this.publisher = mergeRole(this.publisher, overrides);
    }

    const subscriber = props.subscriber;
    if (subscriber) {
      const overrides: RoleOverrides<SubscriberSettings> = {
        retry: retryOverrides(subscriber.retry),
        flowControl: flowControlOverrides(subscriber.flowControl),
      };
      assignDefined(overrides, "executorThreads", subscriber.executorThreads);
      assignDefined(overrides, "parallelPullCount", subscriber.parallelPullCount);
      assignDefined(overrides, "maxAckExtensionPeriodSeconds", subscriber.maxAckExtensionPeriod);
      assignDefined(overrides, "ackDeadlineSeconds", subscriber.ackDeadlineSeconds);
      assignDefined(overrides, "maxMessagesPerPull", subscriber.maxMessagesPerPull);
      assignDefined(overrides, "pullEndpoint", subscriber.pullEndpoint);
      this.subscriber = mergeRole(this.subscriber, overrides);
    }

    return this;
  }

  /**
   * Build the configuration.
   */
  build(): PubSubConfig {
    const projectId = this.config.projectId;
    if (!projectId) {
      throw new ConfigurationError(
        "Project ID must be specified (set GOOGLE_CLOUD_PROJECT or call projectId())",
        "MissingProject"
      );
    }

    const config: PubSubConfig = {
      ...DEFAULT_CONFIG,
      ...this.config,
      projectId,
      publisher: cloneRole(this.publisher),
      subscriber: cloneRole(this.subscriber),
    };

    validateConfig(config);
    return config;
  }

  private useEmulator(host: string): void {
    this.config.endpoint = host.startsWith("http") ? host : `http://${host}`;
    this.config.credentials = { type: "none" };
  }
}

/**
 * Create a new Pub/Sub config builder.
 */
export function configBuilder(): PubSubConfigBuilder {
  return new PubSubConfigBuilder();
}

function cloneRole<S extends RoleSettings>(settings: S): S {
  return {
    ...settings,
    retry: { ...settings.retry },
    flowControl: { ...settings.flowControl },
  };
}

function mergeRole<S extends RoleSettings>(base: S, overrides: RoleOverrides<S>): S {
  return {
    ...base,
    ...overrides,
    retry: { ...base.retry, ...overrides.retry },
    flowControl: { ...base.flowControl, ...overrides.flowControl },
  };
}

/**
 * Validate a complete configuration.
 */
export function validateConfig(config: PubSubConfig): void {
  for (const url of [config.endpoint, config.subscriber.pullEndpoint]) {
    if (url === undefined) continue;
    try {
      new URL(url);
    } catch {
      throw new ConfigurationError(`Invalid API endpoint URL: ${url}`, "InvalidConfig");
    }
  }

  const { batching } = config.publisher;
  if (batching.elementCountThreshold !== undefined && batching.elementCountThreshold > 1000) {
    throw new ConfigurationError("Batch element count threshold cannot exceed 1000", "InvalidConfig");
  }
  if (batching.requestByteThreshold !== undefined && batching.requestByteThreshold > 10 * 1024 * 1024) {
    throw new ConfigurationError("Batch byte threshold cannot exceed 10MB", "InvalidConfig");
  }

  for (const role of ["publisher", "subscriber"] as const) {
    const settings = config[role];
    if (!Number.isInteger(settings.executorThreads) || settings.executorThreads < 1) {
      throw new ConfigurationError(`${role}.executorThreads must be a positive integer`, "InvalidConfig");
    }
    if (settings.retry.retryDelayMultiplier < 1 || settings.retry.rpcTimeoutMultiplier < 1) {
      throw new ConfigurationError(`${role}.retry multipliers must be at least 1`, "InvalidConfig");
    }
    validateBehavior(settings.flowControl.limitExceededBehavior, role);
  }

  if (config.subscriber.parallelPullCount < 1) {
    throw new ConfigurationError("subscriber.parallelPullCount must be at least 1", "InvalidConfig");
  }
}

function validateBehavior(behavior: LimitExceededBehavior, role: string): void {
  if (behavior !== "Block" && behavior !== "Ignore" && behavior !== "ThrowException") {
    throw new ConfigurationError(
      `${role}.flowControl.limitExceededBehavior must be Block, Ignore or ThrowException`,
      "InvalidConfig"
    );
  }
}

// ---------------------------------------------------------------------------
// Resource names
// ---------------------------------------------------------------------------

const RESOURCE_NAME = /^[a-zA-Z][a-zA-Z0-9._~+%-]*$/;

/**
 * Resolve the service endpoint.
 */
export function resolveEndpoint(config: Pick<PubSubConfig, "endpoint">): string {
  return config.endpoint ?? DEFAULT_ENDPOINT;
}

/**
 * Format topic path.
 */
export function formatTopicPath(projectId: string, topic: string): string {
  if (topic.startsWith("projects/")) {
    return topic;
  }
  return `projects/${projectId}/topics/${topic}`;
}

/**
 * Format subscription path.
 */
export function formatSubscriptionPath(projectId: string, subscription: string): string {
  if (subscription.startsWith("projects/")) {
    return subscription;
  }
  return `projects/${projectId}/subscriptions/${subscription}`;
}

/**
 * Split a fully qualified path into project and short name.
 */
export function parseResourcePath(
  path: string
): { projectId: string; kind: "topics" | "subscriptions"; name: string } | undefined {
  const match = /^projects\/([^/]+)\/(topics|subscriptions)\/([^/]+)$/.exec(path);
  if (!match) return undefined;
  const [, projectId, kind, name] = match;
  if (!projectId || !name || (kind !== "topics" && kind !== "subscriptions")) return undefined;
  return { projectId, kind, name };
}

/**
 * Validate topic name.
 */
export function validateTopicName(topic: string): void {
  validateResourceName(topic, "topics", "Topic", "InvalidTopic");
}

/**
 * Validate subscription name.
 */
export function validateSubscriptionName(subscription: string): void {
  validateResourceName(subscription, "subscriptions", "Subscription", "InvalidSubscription");
}

function validateResourceName(
  value: string,
  kind: "topics" | "subscriptions",
  label: string,
  code: "InvalidTopic" | "InvalidSubscription"
): void {
  if (!value) {
    throw new ConfigurationError(`${label} name cannot be empty`, code);
  }

  let name = value;
  if (value.startsWith("projects/")) {
    const parsed = parseResourcePath(value);
    if (!parsed || parsed.kind !== kind) {
      throw new ConfigurationError(`Malformed ${label.toLowerCase()} path: ${value}`, code);
    }
    name = parsed.name;
  }

  if (name.length < 3 || name.length > 255) {
    throw new ConfigurationError(`${label} name must be 3-255 characters`, code);
  }

  if (!RESOURCE_NAME.test(name)) {
    throw new ConfigurationError(
      `${label} name must start with a letter and contain only letters, numbers, and ._~+%-`,
      code
    );
  }

  if (name.toLowerCase().startsWith("goog")) {
    throw new ConfigurationError(`${label} name must not start with "goog"`, code);
  }
}
