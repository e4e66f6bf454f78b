/**
 * Tests for the REST transport against a scripted HTTP layer.
 */

import { describe, it, expect } from "vitest";
import { RestPubSubTransport, type HttpRequest, type HttpResponse, type HttpTransport } from "../transport/index.js";
import { StaticTokenAuthProvider } from "../credentials/index.js";
import { PubSubError, ServerError, SubscriptionError } from "../error/index.js";
import { createMessage } from "../types/index.js";
import { SUBSCRIPTION_PATH, TOPIC_PATH } from "./helpers.js";

class ScriptedHttp implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly responses: HttpResponse[] = [];

  reply(status: number, body?: unknown, headers: Record<string, string> = {}): this {
    this.responses.push({
      status,
      statusText: "",
      headers,
      body: Buffer.from(body === undefined ? "" : typeof body === "string" ? body : JSON.stringify(body)),
    });
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const response = this.responses.shift();
    if (!response) {
      throw new Error(`No response scripted for ${request.method} ${request.url}`);
    }
    return response;
  }
}

function transportWith(http: ScriptedHttp, token?: string): RestPubSubTransport {
  return new RestPubSubTransport({
    endpoint: "http://localhost:8085/",
    pullEndpoint: "http://pull.local",
    authProvider: token === undefined ? undefined : new StaticTokenAuthProvider(token),
    http,
  });
}

describe("RestPubSubTransport", () => {
  describe("publish", () => {
    it("should send base64 data with a bearer token", async () => {
      const http = new ScriptedHttp().reply(200, { messageIds: ["m1"] });
      const transport = transportWith(http, "test-token");

      const ids = await transport.publish(TOPIC_PATH, [createMessage("hi", { k: "v" })], { timeoutMs: 1500 });

      expect(ids).toEqual(["m1"]);
      expect(http.requests[0]).toEqual({
        method: "POST",
        url: "http://localhost:8085/v1/projects/demo/topics/orders:publish",
        headers: { "Content-Type": "application/json", Authorization: "Bearer test-token" },
        body: '{"messages":[{"data":"aGk=","attributes":{"k":"v"}}]}',
        timeout: 1500,
      });
    });

    it("should omit the authorization header without a token", async () => {
      const http = new ScriptedHttp().reply(200, { messageIds: ["m1"] });

      await transportWith(http).publish(TOPIC_PATH, [createMessage("hi")]);

      expect(http.requests[0]?.headers).toEqual({ "Content-Type": "application/json" });
      expect(http.requests[0]?.timeout).toBe(30000);
    });

    it("should reject a response with the wrong number of IDs", async () => {
      const http = new ScriptedHttp().reply(200, { messageIds: ["m1"] });
      const transport = transportWith(http);

      await expect(transport.publish(TOPIC_PATH, [createMessage("a"), createMessage("b")])).rejects.toThrow(
        "Publish returned 1 IDs for 2 messages"
      );
    });
  });

  describe("pull", () => {
    it("should decode received messages from the pull endpoint", async () => {
      const http = new ScriptedHttp().reply(200, {
        receivedMessages: [
          {
            ackId: "a1",
            deliveryAttempt: 2,
            message: {
              data: "aGVsbG8=",
              attributes: { source: "test" },
              messageId: "7",
              publishTime: "2024-01-02T03:04:05.000Z",
              orderingKey: "",
            },
          },
        ],
      });
      const transport = transportWith(http);

      const [received] = await transport.pull(SUBSCRIPTION_PATH, 5000, { returnImmediately: true });

      expect(http.requests[0]?.url).toBe("http://pull.local/v1/projects/demo/subscriptions/orders-sub:pull");
      expect(http.requests[0]?.body).toBe('{"maxMessages":1000,"returnImmediately":true}');
      expect(received?.ackId).toBe("a1");
      expect(received?.deliveryAttempt).toBe(2);
      expect(received?.message.data.toString("utf-8")).toBe("hello");
      expect(received?.message.attributes).toEqual({ source: "test" });
      expect(received?.message.orderingKey).toBeUndefined();
      expect(received?.message.publishTime.toISOString()).toBe("2024-01-02T03:04:05.000Z");
    });

    it("should treat an empty response as no messages", async () => {
      const http = new ScriptedHttp().reply(200, {});
      await expect(transportWith(http).pull(SUBSCRIPTION_PATH, 10)).resolves.toEqual([]);
    });
  });

  describe("acknowledgment", () => {
    it("should skip the request for no delivery tokens", async () => {
      const http = new ScriptedHttp();
      const transport = transportWith(http);

      await transport.acknowledge(SUBSCRIPTION_PATH, []);
      await transport.modifyAckDeadline(SUBSCRIPTION_PATH, [], 0);

      expect(http.requests).toHaveLength(0);
    });

    it("should send deadline changes to the pull endpoint", async () => {
      const http = new ScriptedHttp().reply(200, {});

      await transportWith(http).modifyAckDeadline(SUBSCRIPTION_PATH, ["a1", "a2"], 0);

      expect(http.requests[0]?.url).toBe(
        "http://pull.local/v1/projects/demo/subscriptions/orders-sub:modifyAckDeadline"
      );
      expect(http.requests[0]?.body).toBe('{"ackIds":["a1","a2"],"ackDeadlineSeconds":0}');
    });
  });

  describe("administration", () => {
    it("should follow list pages", async () => {
      const http = new ScriptedHttp()
        .reply(200, { topics: [{ name: "projects/demo/topics/a" }], nextPageToken: "p2" })
        .reply(200, { topics: [{ name: "projects/demo/topics/b" }] });

      const topics = await transportWith(http).listTopics("demo");

      expect(topics.map((topic) => topic.name)).toEqual(["projects/demo/topics/a", "projects/demo/topics/b"]);
      expect(http.requests.map((request) => request.url)).toEqual([
        "http://localhost:8085/v1/projects/demo/topics",
        "http://localhost:8085/v1/projects/demo/topics?pageToken=p2",
      ]);
    });

    it("should fill subscription defaults", async () => {
      const http = new ScriptedHttp().reply(200, { name: SUBSCRIPTION_PATH, topic: TOPIC_PATH });

      await expect(transportWith(http).getSubscription(SUBSCRIPTION_PATH)).resolves.toEqual({
        name: SUBSCRIPTION_PATH,
        topic: TOPIC_PATH,
        ackDeadlineSeconds: 10,
        enableMessageOrdering: false,
      });
    });

    it("should create resources with PUT", async () => {
      const http = new ScriptedHttp().reply(200, { name: TOPIC_PATH });

      await transportWith(http).createTopic(TOPIC_PATH);

      expect(http.requests[0]?.method).toBe("PUT");
      expect(http.requests[0]?.body).toBe("{}");
    });
  });

  describe("errors", () => {
    it("should map a missing subscription with its request ID", async () => {
      const http = new ScriptedHttp().reply(
        404,
        { error: { code: 404, message: "Resource not found", status: "NOT_FOUND" } },
        { "X-Goog-Request-Id": "req-9" }
      );

      const error = await transportWith(http)
        .getSubscription(SUBSCRIPTION_PATH)
        .catch((thrown: unknown) => thrown);

      expect(error).toBeInstanceOf(SubscriptionError);
      expect(error).toMatchObject({
        message: "Resource not found",
        code: "Subscription.NotFound",
        subscription: "orders-sub",
        requestId: "req-9",
      });
    });

    it("should prefer the status named in the body", async () => {
      const http = new ScriptedHttp().reply(400, {
        error: { message: "Ordering disabled", status: "FAILED_PRECONDITION" },
      });

      const error = await transportWith(http)
        .publish(TOPIC_PATH, [createMessage("x")])
        .catch((thrown: unknown) => thrown);

      expect(error).toBeInstanceOf(PubSubError);
      expect(error).toMatchObject({ code: "FailedPrecondition", message: "Ordering disabled" });
    });

    it("should map an empty 503 to a retryable server error", async () => {
      const http = new ScriptedHttp().reply(503);

      const error = await transportWith(http)
        .listSubscriptions("demo")
        .catch((thrown: unknown) => thrown);

      expect(error).toBeInstanceOf(ServerError);
      expect(error).toMatchObject({ message: "HTTP 503", code: "Server.ServiceUnavailable", retryable: true });
    });

    it("should report a malformed error body", async () => {
      const http = new ScriptedHttp().reply(500, "{oops");

      await expect(transportWith(http).getTopic(TOPIC_PATH)).rejects.toThrow(/^Malformed error body: SyntaxError/);
    });
  });
});
