/**
 * Pub/Sub operations layer
 *
 * Publish, subscribe, pull and acknowledge over a managed messaging
 * service, with cached per-resource handles, batching, flow control and a
 * uniform retry policy.
 *
 * @module pubsub-operations
 */

// Client
export {
  PubSubClient,
  createClient,
  createClientFromEnv,
  PubSubClientBuilder,
  clientBuilder,
} from "./client/index.js";
export type { PubSubClientOptions, PublishOptions } from "./client/index.js";

// Admin
export { PubSubAdmin } from "./admin/index.js";
export type { CreateSubscriptionOptions, PubSubAdminOptions } from "./admin/index.js";

// Configuration
export {
  PubSubConfigBuilder,
  configBuilder,
  parseProperties,
  validateConfig,
  DEFAULT_CONFIG,
  DEFAULT_ENDPOINT,
  DEFAULT_BATCHING_SETTINGS,
  DEFAULT_PUBLISHER_SETTINGS,
  DEFAULT_SUBSCRIBER_SETTINGS,
  resolveEndpoint,
  formatTopicPath,
  formatSubscriptionPath,
  parseResourcePath,
  validateTopicName,
  validateSubscriptionName,
} from "./config/index.js";
export type {
  PubSubConfig,
  PubSubProperties,
  Credentials,
  BatchingSettings,
  RoleSettings,
  RoleOverrides,
  PublisherSettings,
  SubscriberSettings,
  ConverterKind,
} from "./config/index.js";

// Resource cache
export { ResourceCache } from "./cache/index.js";
export type { ResourceCacheOptions } from "./cache/index.js";

// Retry
export {
  RetrySchedule,
  RetryExecutor,
  createRetryExecutor,
  DEFAULT_RETRY_SETTINGS,
  DEFAULT_INITIAL_RETRY_DELAY_MS,
} from "./retry/index.js";
export type { RetrySettings, RetryHooks, RetryExecutorOptions, AttemptContext } from "./retry/index.js";

// Flow control
export { FlowController, DEFAULT_FLOW_CONTROL_SETTINGS } from "./flow-control/index.js";
export type { FlowControlSettings, LimitExceededBehavior, OutstandingUsage } from "./flow-control/index.js";

// Types
export {
  createMessage,
  getMessageSize,
  validateMessage,
  MAX_MESSAGE_BYTES,
  MAX_ATTRIBUTES,
} from "./types/index.js";
export type {
  PubSubMessage,
  PubSubMessageData,
  ReceivedMessage,
  AckToken,
  AckState,
  OrderingKeyState,
  PublisherStats,
  SubscriberStats,
} from "./types/index.js";

// Publisher
export { TopicPublisher, PubSubPublisher } from "./publisher/index.js";
export type { PublishHandle, TopicPublisherOptions, PubSubPublisherOptions } from "./publisher/index.js";

// Subscriber
export {
  PubSubSubscriber,
  Subscription,
  PubSubPuller,
  AcknowledgeableMessage,
  createSubscriptionCache,
  resolveSubscriptionPath,
} from "./subscriber/index.js";
export type {
  MessageCallback,
  ConvertedMessageCallback,
  SubscriptionState,
  SubscribeOptions,
  SubscriptionContext,
  PubSubSubscriberOptions,
  PubSubPullerOptions,
  AckHandler,
  AckTarget,
  ConvertedMessage,
  SubscriptionHandle,
  SubscriptionCacheOptions,
} from "./subscriber/index.js";

// Converter
export {
  PayloadTypes,
  SimpleMessageConverter,
  JsonMessageConverter,
  createConverter,
} from "./converter/index.js";
export type { PayloadType, MessageConverter } from "./converter/index.js";

// Credentials
export { NoAuthProvider, StaticTokenAuthProvider, createAuthProvider } from "./credentials/index.js";
export type { AuthProvider } from "./credentials/index.js";

// Transport
export {
  RestPubSubTransport,
  createRestTransport,
  FetchTransport,
  isSuccess,
  getHeader,
  getRequestId,
  parseJsonBody,
} from "./transport/index.js";
export type {
  PubSubTransport,
  CallOptions,
  PullOptions,
  TopicInfo,
  SubscriptionInfo,
  CreateSubscriptionRequest,
  RestTransportOptions,
  HttpRequest,
  HttpResponse,
  HttpTransport,
} from "./transport/index.js";

// Simulation
export { InMemoryPubSub } from "./simulation/index.js";
export type { InMemoryPubSubOptions, RecordedCall, TransportOperation } from "./simulation/index.js";

// Observability
export { LogLevel, ConsoleLogger, NoopLogger, InMemoryLogger, parseLogLevel } from "./observability/index.js";
export type { Logger, LogEntry } from "./observability/index.js";

// Errors
export {
  PubSubError,
  ConfigurationError,
  AuthenticationError,
  TopicError,
  SubscriptionError,
  MessageError,
  AcknowledgmentError,
  ConversionError,
  FlowControlError,
  NetworkError,
  ServerError,
  ClosedError,
  GrpcStatus,
  parseGrpcError,
  isRetryableError,
} from "./error/index.js";
export type { ServerErrorCode } from "./error/index.js";
