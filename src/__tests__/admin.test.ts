/**
 * Tests for topic and subscription administration.
 */

import { describe, it, expect } from "vitest";
import { PubSubAdmin } from "../admin/index.js";
import { ConfigurationError, SubscriptionError, TopicError } from "../error/index.js";
import { InMemoryLogger, LogLevel } from "../observability/index.js";
import { InMemoryPubSub } from "../simulation/index.js";
import { FAST_RETRY, PROJECT, SUBSCRIPTION_PATH, TOPIC_PATH } from "./helpers.js";

function adminFor(service: InMemoryPubSub, logger = new InMemoryLogger()): PubSubAdmin {
  return new PubSubAdmin({
    projectId: PROJECT,
    transport: service,
    topicRetry: FAST_RETRY,
    subscriptionRetry: FAST_RETRY,
    logger,
  });
}

describe("PubSubAdmin", () => {
  it("should create, list and delete topics", async () => {
    const service = new InMemoryPubSub();
    const logger = new InMemoryLogger();
    const admin = adminFor(service, logger);

    await expect(admin.createTopic("orders")).resolves.toEqual({ name: TOPIC_PATH });
    await expect(admin.listTopics()).resolves.toEqual([{ name: TOPIC_PATH }]);
    await admin.deleteTopic("orders");
    await expect(admin.listTopics()).resolves.toEqual([]);

    expect(logger.getLogsByLevel(LogLevel.Info).map((entry) => entry.message)).toEqual([
      "Topic created",
      "Topic deleted",
    ]);
  });

  it("should create subscriptions with options", async () => {
    const service = new InMemoryPubSub();
    const admin = adminFor(service);
    await admin.createTopic("orders");

    const info = await admin.createSubscription("orders-sub", "orders", {
      ackDeadlineSeconds: 30,
      enableMessageOrdering: true,
    });

    expect(info).toEqual({
      name: SUBSCRIPTION_PATH,
      topic: TOPIC_PATH,
      ackDeadlineSeconds: 30,
      enableMessageOrdering: true,
    });
    await expect(admin.getSubscription("orders-sub")).resolves.toEqual(info);
    await expect(admin.listSubscriptions()).resolves.toEqual([info]);
  });

  it("should report existing and missing resources", async () => {
    const service = new InMemoryPubSub();
    const admin = adminFor(service);
    await admin.createTopic("orders");

    await expect(admin.createTopic("orders")).rejects.toBeInstanceOf(TopicError);
    await expect(admin.getTopic("missing")).rejects.toMatchObject({ code: "Topic.NotFound" });
    await expect(admin.deleteSubscription("missing")).rejects.toBeInstanceOf(SubscriptionError);
  });

  it("should validate names before calling the service", async () => {
    const service = new InMemoryPubSub();
    const admin = adminFor(service);

    await expect(admin.createTopic("no")).rejects.toBeInstanceOf(ConfigurationError);
    await expect(admin.createSubscription("goog-sub", "orders")).rejects.toBeInstanceOf(ConfigurationError);
    expect(service.calls).toEqual([]);
  });
});
