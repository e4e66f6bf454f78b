/**
 * Pub/Sub Error Types
 *
 * Every failure raised by this package is a PubSubError carrying the
 * service status it maps to and whether the retry engine may retry it.
 */

/**
 * gRPC status codes used by the messaging service.
 */
export enum GrpcStatus {
  OK = 0,
  CANCELLED = 1,
  UNKNOWN = 2,
  INVALID_ARGUMENT = 3,
  DEADLINE_EXCEEDED = 4,
  NOT_FOUND = 5,
  ALREADY_EXISTS = 6,
  PERMISSION_DENIED = 7,
  RESOURCE_EXHAUSTED = 8,
  FAILED_PRECONDITION = 9,
  ABORTED = 10,
  OUT_OF_RANGE = 11,
  UNIMPLEMENTED = 12,
  INTERNAL = 13,
  UNAVAILABLE = 14,
  DATA_LOSS = 15,
  UNAUTHENTICATED = 16,
}

/**
 * Base Pub/Sub error class.
 */
export class PubSubError extends Error {
  public readonly code: string;
  public readonly status: GrpcStatus;
  public readonly requestId?: string;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: { status?: GrpcStatus; requestId?: string; retryable?: boolean }
  ) {
    super(message);
    this.name = "PubSubError";
    this.code = code;
    this.status = options?.status ?? GrpcStatus.UNKNOWN;
    this.requestId = options?.requestId;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, PubSubError.prototype);
  }
}

/**
 * Configuration or argument error.
 */
export class ConfigurationError extends PubSubError {
  public readonly issues?: string[];

  constructor(
    message: string,
    code:
      | "InvalidTopic"
      | "InvalidSubscription"
      | "InvalidCredentials"
      | "MissingProject"
      | "InvalidConfig"
      | "InvalidArgument" = "InvalidConfig",
    options?: { issues?: string[] }
  ) {
    super(message, `Configuration.${code}`, { status: GrpcStatus.INVALID_ARGUMENT });
    this.name = "ConfigurationError";
    this.issues = options?.issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Authentication or authorization error.
 */
export class AuthenticationError extends PubSubError {
  constructor(
    message: string,
    code: "PermissionDenied" | "Unauthenticated" | "InvalidCredentials" = "InvalidCredentials",
    options?: { requestId?: string }
  ) {
    super(message, `Authentication.${code}`, {
      status: code === "PermissionDenied" ? GrpcStatus.PERMISSION_DENIED : GrpcStatus.UNAUTHENTICATED,
      requestId: options?.requestId,
    });
    this.name = "AuthenticationError";
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Topic-related error.
 */
export class TopicError extends PubSubError {
  public readonly topic?: string;

  constructor(
    message: string,
    code: "NotFound" | "AlreadyExists",
    options?: { topic?: string; requestId?: string }
  ) {
    super(message, `Topic.${code}`, {
      status: code === "NotFound" ? GrpcStatus.NOT_FOUND : GrpcStatus.ALREADY_EXISTS,
      requestId: options?.requestId,
    });
    this.name = "TopicError";
    this.topic = options?.topic;
    Object.setPrototypeOf(this, TopicError.prototype);
  }
}

/**
 * Subscription-related error.
 */
export class SubscriptionError extends PubSubError {
  public readonly subscription?: string;

  constructor(
    message: string,
    code: "NotFound" | "AlreadyExists",
    options?: { subscription?: string; requestId?: string }
  ) {
    super(message, `Subscription.${code}`, {
      status: code === "NotFound" ? GrpcStatus.NOT_FOUND : GrpcStatus.ALREADY_EXISTS,
      requestId: options?.requestId,
    });
    this.name = "SubscriptionError";
    this.subscription = options?.subscription;
    Object.setPrototypeOf(this, SubscriptionError.prototype);
  }
}

/**
 * Message-related error.
 */
export class MessageError extends PubSubError {
  constructor(
    message: string,
    code: "TooLarge" | "TooManyAttributes" | "InvalidAttribute" | "InvalidOrderingKey" | "OrderingKeyPaused",
    options?: { requestId?: string }
  ) {
    super(message, `Message.${code}`, {
      status: code === "OrderingKeyPaused" ? GrpcStatus.FAILED_PRECONDITION : GrpcStatus.INVALID_ARGUMENT,
      requestId: options?.requestId,
    });
    this.name = "MessageError";
    Object.setPrototypeOf(this, MessageError.prototype);
  }
}

/**
 * Acknowledgment error.
 */
export class AcknowledgmentError extends PubSubError {
  public readonly ackIds?: string[];

  constructor(
    message: string,
    code: "InvalidArgument" | "AckFailed",
    options?: { ackIds?: string[]; requestId?: string }
  ) {
    super(message, `Acknowledgment.${code}`, {
      status: code === "InvalidArgument" ? GrpcStatus.INVALID_ARGUMENT : GrpcStatus.INTERNAL,
      requestId: options?.requestId,
    });
    this.name = "AcknowledgmentError";
    this.ackIds = options?.ackIds;
    Object.setPrototypeOf(this, AcknowledgmentError.prototype);
  }
}

/**
 * Payload conversion error.
 */
export class ConversionError extends PubSubError {
  constructor(message: string, code: "UnsupportedType" | "InvalidPayload") {
    super(message, `Conversion.${code}`, { status: GrpcStatus.INVALID_ARGUMENT });
    this.name = "ConversionError";
    Object.setPrototypeOf(this, ConversionError.prototype);
  }
}

/**
 * Flow control rejection or misuse.
 */
export class FlowControlError extends PubSubError {
  constructor(message: string, code: "LimitExceeded" | "RequestTooLarge" | "InvalidRelease" | "InvalidAmount") {
    super(message, `FlowControl.${code}`, { status: FLOW_CONTROL_STATUS[code] });
    this.name = "FlowControlError";
    Object.setPrototypeOf(this, FlowControlError.prototype);
  }
}

const FLOW_CONTROL_STATUS: Record<"LimitExceeded" | "RequestTooLarge" | "InvalidRelease" | "InvalidAmount", GrpcStatus> = {
  LimitExceeded: GrpcStatus.RESOURCE_EXHAUSTED,
  RequestTooLarge: GrpcStatus.RESOURCE_EXHAUSTED,
  InvalidRelease: GrpcStatus.FAILED_PRECONDITION,
  InvalidAmount: GrpcStatus.INVALID_ARGUMENT,
};

/**
 * Network/transport error.
 */
export class NetworkError extends PubSubError {
  constructor(
    message: string,
    code: "ConnectionFailed" | "Timeout" | "DnsResolutionFailed" | "TlsError" | "Cancelled",
    options?: { retryable?: boolean }
  ) {
    super(message, `Network.${code}`, {
      status: code === "Timeout" ? GrpcStatus.DEADLINE_EXCEEDED : GrpcStatus.UNAVAILABLE,
      retryable: options?.retryable ?? (code !== "TlsError" && code !== "Cancelled"),
    });
    this.name = "NetworkError";
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Server-side error codes.
 */
export type ServerErrorCode =
  | "InternalError"
  | "ServiceUnavailable"
  | "QuotaExceeded"
  | "DeadlineExceeded"
  | "Aborted";

/**
 * Server-side error.
 */
export class ServerError extends PubSubError {
  constructor(
    message: string,
    code: ServerErrorCode,
    options?: { requestId?: string; retryable?: boolean }
  ) {
    super(message, `Server.${code}`, {
      status: SERVER_STATUS[code],
      requestId: options?.requestId,
      retryable: options?.retryable ?? RETRYABLE_SERVER_CODES.has(code),
    });
    this.name = "ServerError";
    Object.setPrototypeOf(this, ServerError.prototype);
  }
}

const SERVER_STATUS: Record<ServerErrorCode, GrpcStatus> = {
  InternalError: GrpcStatus.INTERNAL,
  ServiceUnavailable: GrpcStatus.UNAVAILABLE,
  QuotaExceeded: GrpcStatus.RESOURCE_EXHAUSTED,
  DeadlineExceeded: GrpcStatus.DEADLINE_EXCEEDED,
  Aborted: GrpcStatus.ABORTED,
};

const RETRYABLE_SERVER_CODES: ReadonlySet<ServerErrorCode> = new Set<ServerErrorCode>([
  "ServiceUnavailable",
  "DeadlineExceeded",
  "Aborted",
]);

/**
 * Operation on a closed publisher, subscriber or client.
 */
export class ClosedError extends PubSubError {
  constructor(component: "Client" | "Publisher" | "Subscriber") {
    super(`${component} is closed`, `${component}Closed`, { status: GrpcStatus.FAILED_PRECONDITION });
    this.name = "ClosedError";
    Object.setPrototypeOf(this, ClosedError.prototype);
  }
}

/**
 * Map a service status onto the error hierarchy.
 *
 * `resource` disambiguates NOT_FOUND and ALREADY_EXISTS.
 */
export function parseGrpcError(
  status: GrpcStatus,
  message: string,
  options?: { requestId?: string; resource?: { kind: "topic" | "subscription"; name: string } }
): PubSubError {
  const requestId = options?.requestId;
  const resource = options?.resource;

  switch (status) {
    case GrpcStatus.CANCELLED:
      return new NetworkError(message || "Request cancelled", "Cancelled");

    case GrpcStatus.INVALID_ARGUMENT:
    case GrpcStatus.OUT_OF_RANGE:
      return new ConfigurationError(message, "InvalidArgument");

    case GrpcStatus.DEADLINE_EXCEEDED:
      return new ServerError(message, "DeadlineExceeded", { requestId });

    case GrpcStatus.NOT_FOUND:
    case GrpcStatus.ALREADY_EXISTS: {
      const code = status === GrpcStatus.NOT_FOUND ? "NotFound" : "AlreadyExists";
      if (resource?.kind === "subscription") {
        return new SubscriptionError(message, code, { subscription: resource.name, requestId });
      }
      return new TopicError(message, code, { topic: resource?.name, requestId });
    }

    case GrpcStatus.PERMISSION_DENIED:
      return new AuthenticationError(message, "PermissionDenied", { requestId });

    case GrpcStatus.UNAUTHENTICATED:
      return new AuthenticationError(message, "Unauthenticated", { requestId });

    case GrpcStatus.RESOURCE_EXHAUSTED:
      return new ServerError(message, "QuotaExceeded", { requestId });

    case GrpcStatus.FAILED_PRECONDITION:
      return new PubSubError(message, "FailedPrecondition", { status, requestId });

    case GrpcStatus.ABORTED:
      return new ServerError(message, "Aborted", { requestId });

    case GrpcStatus.UNAVAILABLE:
      return new ServerError(message, "ServiceUnavailable", { requestId });

    case GrpcStatus.UNIMPLEMENTED:
      return new PubSubError(message, "Unimplemented", { status, requestId });

    case GrpcStatus.OK:
    case GrpcStatus.INTERNAL:
    case GrpcStatus.UNKNOWN:
    case GrpcStatus.DATA_LOSS:
    default:
      return new ServerError(message, "InternalError", { requestId });
  }
}

/**
 * Whether the retry engine may retry this error.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof PubSubError && error.retryable;
}

/**
 * Normalize a thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
