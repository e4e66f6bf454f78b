/**
 * Tests for the error hierarchy.
 */

import { describe, it, expect } from "vitest";
import {
  AuthenticationError,
  ClosedError,
  ConfigurationError,
  GrpcStatus,
  NetworkError,
  PubSubError,
  ServerError,
  SubscriptionError,
  TopicError,
  isRetryableError,
  parseGrpcError,
  toError,
} from "../error/index.js";

describe("PubSubError", () => {
  it("should keep the prototype chain of subclasses", () => {
    const error = new TopicError("missing", "NotFound", { topic: "projects/p/topics/t" });

    expect(error).toBeInstanceOf(TopicError);
    expect(error).toBeInstanceOf(PubSubError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("TopicError");
    expect(error.code).toBe("Topic.NotFound");
    expect(error.status).toBe(GrpcStatus.NOT_FOUND);
    expect(error.topic).toBe("projects/p/topics/t");
  });

  it("should mark transient server errors retryable", () => {
    expect(new ServerError("x", "ServiceUnavailable").retryable).toBe(true);
    expect(new ServerError("x", "DeadlineExceeded").retryable).toBe(true);
    expect(new ServerError("x", "Aborted").retryable).toBe(true);
    expect(new ServerError("x", "InternalError").retryable).toBe(false);
    expect(new ServerError("x", "QuotaExceeded").retryable).toBe(false);
  });

  it("should mark network errors retryable except TLS and cancellation", () => {
    expect(new NetworkError("x", "ConnectionFailed").retryable).toBe(true);
    expect(new NetworkError("x", "Timeout").retryable).toBe(true);
    expect(new NetworkError("x", "TlsError").retryable).toBe(false);
    expect(new NetworkError("x", "Cancelled").retryable).toBe(false);
  });

  it("should name the closed component", () => {
    const error = new ClosedError("Publisher");
    expect(error.message).toBe("Publisher is closed");
    expect(error.code).toBe("PublisherClosed");
  });
});

describe("parseGrpcError", () => {
  it("should map NOT_FOUND on a subscription to SubscriptionError", () => {
    const error = parseGrpcError(GrpcStatus.NOT_FOUND, "gone", {
      requestId: "req-1",
      resource: { kind: "subscription", name: "projects/p/subscriptions/s" },
    });

    expect(error).toBeInstanceOf(SubscriptionError);
    expect(error.code).toBe("Subscription.NotFound");
    expect(error.requestId).toBe("req-1");
  });

  it("should map ALREADY_EXISTS to TopicError by default", () => {
    const error = parseGrpcError(GrpcStatus.ALREADY_EXISTS, "exists");
    expect(error).toBeInstanceOf(TopicError);
    expect(error.code).toBe("Topic.AlreadyExists");
  });

  it("should map authentication statuses", () => {
    expect(parseGrpcError(GrpcStatus.PERMISSION_DENIED, "no")).toBeInstanceOf(AuthenticationError);
    expect(parseGrpcError(GrpcStatus.UNAUTHENTICATED, "no").code).toBe("Authentication.Unauthenticated");
  });

  it("should map INVALID_ARGUMENT to a configuration error", () => {
    expect(parseGrpcError(GrpcStatus.INVALID_ARGUMENT, "bad")).toBeInstanceOf(ConfigurationError);
  });

  it("should map UNAVAILABLE to a retryable server error", () => {
    const error = parseGrpcError(GrpcStatus.UNAVAILABLE, "down");
    expect(error).toBeInstanceOf(ServerError);
    expect(isRetryableError(error)).toBe(true);
  });

  it("should map unknown statuses to an internal error", () => {
    expect(parseGrpcError(GrpcStatus.DATA_LOSS, "lost").code).toBe("Server.InternalError");
  });
});

describe("helpers", () => {
  it("should treat foreign errors as non-retryable", () => {
    expect(isRetryableError(new Error("x"))).toBe(false);
    expect(isRetryableError("x")).toBe(false);
  });

  it("should wrap non-error values", () => {
    const error = toError("plain");
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe("plain");
  });
});
