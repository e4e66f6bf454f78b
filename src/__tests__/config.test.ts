/**
 * Tests for configuration, properties and resource names.
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_CONFIG,
  configBuilder,
  formatSubscriptionPath,
  formatTopicPath,
  parseProperties,
  parseResourcePath,
  resolveEndpoint,
  validateSubscriptionName,
  validateTopicName,
} from "../config/index.js";
import { ConfigurationError } from "../error/index.js";

describe("parseProperties", () => {
  it("should nest dotted keys and coerce values", () => {
    const props = parseProperties({
      "projectId": "demo",
      "subscriber.executorThreads": "8",
      "publisher.retry.maxAttempts": "3",
      "publisher.retry.jittered": "false",
    });

    expect(props).toEqual({
      projectId: "demo",
      subscriber: { executorThreads: 8 },
      publisher: { retry: { maxAttempts: 3, jittered: false } },
    });
  });

  it("should reject unknown properties", () => {
    expect(() => parseProperties({ "subscriber.bogus": "1" })).toThrow(/Unrecognized key/);
  });

  it("should list every invalid property", () => {
    try {
      parseProperties({
        "subscriber.ackDeadlineSeconds": "5",
        "publisher.flowControl.limitExceededBehavior": "Drop",
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ code: "Configuration.InvalidConfig" });
      if (error instanceof ConfigurationError) {
        expect(error.issues).toHaveLength(2);
      }
    }
  });

  it("should reject a key that collides with a nested group", () => {
    expect(() => parseProperties({ subscriber: "x", "subscriber.executorThreads": 1 })).toThrow(
      'Property "subscriber.executorThreads" conflicts with "subscriber"'
    );
  });
});

describe("PubSubConfigBuilder", () => {
  it("should require a project", () => {
    expect(() => configBuilder().build()).toThrow(ConfigurationError);
  });

  it("should fill defaults", () => {
    const config = configBuilder().projectId("demo").build();

    expect(config.projectId).toBe("demo");
    expect(config.timeoutMs).toBe(DEFAULT_CONFIG.timeoutMs);
    expect(config.credentials).toEqual({ type: "none" });
    expect(config.publisher.batching.enabled).toBe(false);
    expect(config.subscriber.ackDeadlineSeconds).toBe(10);
    expect(config.subscriber.parallelPullCount).toBeGreaterThanOrEqual(1);
  });

  it("should read the project and emulator from the environment", () => {
    const config = configBuilder()
      .accessToken("test-token")
      .fromEnv({ GOOGLE_CLOUD_PROJECT: "env-project", PUBSUB_EMULATOR_HOST: "localhost:8085" })
      .build();

    expect(config.projectId).toBe("env-project");
    expect(config.endpoint).toBe("http://localhost:8085");
    expect(config.credentials).toEqual({ type: "none" });
    expect(resolveEndpoint(config)).toBe("http://localhost:8085");
  });

  it("should apply properties to each role", () => {
    const config = configBuilder()
      .fromProperties({
        "projectId": "demo",
        "timeoutSeconds": "2.5",
        "publisher.batching.enabled": "true",
        "publisher.batching.elementCountThreshold": "50",
        "publisher.batching.delayThresholdSeconds": "0.05",
        "publisher.retry.initialRetryDelaySeconds": "0.2",
        "subscriber.maxAckExtensionPeriod": "60",
        "subscriber.flowControl.maxOutstandingElementCount": "500",
      })
      .build();

    expect(config.timeoutMs).toBe(2500);
    expect(config.publisher.batching).toEqual({ enabled: true, elementCountThreshold: 50, delayThresholdMs: 50 });
    expect(config.publisher.retry.initialRetryDelayMs).toBe(200);
    expect(config.publisher.retry.retryDelayMultiplier).toBe(1);
    expect(config.subscriber.maxAckExtensionPeriodSeconds).toBe(60);
    expect(config.subscriber.flowControl).toEqual({
      maxOutstandingElementCount: 500,
      limitExceededBehavior: "Block",
    });
  });

  it("should keep role settings independent", () => {
    const config = configBuilder()
      .projectId("demo")
      .subscriberSettings({ retry: { maxAttempts: 2 } })
      .build();

    expect(config.subscriber.retry.maxAttempts).toBe(2);
    expect(config.publisher.retry.maxAttempts).toBe(0);
  });

  it("should reject a non-positive executor count", () => {
    expect(() => configBuilder().projectId("demo").publisherSettings({ executorThreads: 0 }).build()).toThrow(
      "publisher.executorThreads must be a positive integer"
    );
  });

  it("should reject an invalid endpoint", () => {
    expect(() => configBuilder().projectId("demo").endpoint("not a url").build()).toThrow(/Invalid API endpoint/);
  });
});

describe("resource names", () => {
  it("should qualify short names", () => {
    expect(formatTopicPath("demo", "orders")).toBe("projects/demo/topics/orders");
    expect(formatSubscriptionPath("demo", "orders-sub")).toBe("projects/demo/subscriptions/orders-sub");
  });

  it("should keep qualified names", () => {
    expect(formatTopicPath("demo", "projects/other/topics/orders")).toBe("projects/other/topics/orders");
  });

  it("should parse qualified paths", () => {
    expect(parseResourcePath("projects/demo/subscriptions/s1")).toEqual({
      projectId: "demo",
      kind: "subscriptions",
      name: "s1",
    });
    expect(parseResourcePath("topics/orders")).toBeUndefined();
  });

  it("should validate names", () => {
    expect(() => validateTopicName("orders")).not.toThrow();
    expect(() => validateTopicName("ab")).toThrow(/3-255 characters/);
    expect(() => validateTopicName("1orders")).toThrow(/start with a letter/);
    expect(() => validateTopicName("google-orders")).toThrow(/"goog"/);
    expect(() => validateTopicName("projects/demo/subscriptions/orders")).toThrow(/Malformed topic path/);
    expect(() => validateSubscriptionName("")).toThrow("Subscription name cannot be empty");
  });
});
