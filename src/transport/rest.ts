/**
 * REST transport for the messaging service.
 */

import { z } from "zod";
import { type AuthProvider, NoAuthProvider } from "../credentials/index.js";
import { DEFAULT_ENDPOINT, parseResourcePath } from "../config/index.js";
import { GrpcStatus, PubSubError, ServerError, parseGrpcError } from "../error/index.js";
import type { PubSubMessage, ReceivedMessage } from "../types/index.js";
import {
  FetchTransport,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  getRequestId,
  isSuccess,
  parseJsonBody,
} from "./http.js";
import type {
  CallOptions,
  CreateSubscriptionRequest,
  PubSubTransport,
  PullOptions,
  SubscriptionInfo,
  TopicInfo,
} from "./index.js";

const PublishResponseSchema = z.object({
  messageIds: z.array(z.string()),
});

const PullResponseSchema = z.object({
  receivedMessages: z
    .array(
      z.object({
        ackId: z.string(),
        message: z.object({
          data: z.string().optional(),
          attributes: z.record(z.string()).optional(),
          messageId: z.string(),
          publishTime: z.string(),
          orderingKey: z.string().optional(),
        }),
        deliveryAttempt: z.number().int().optional(),
      })
    )
    .optional(),
});

const TopicSchema = z.object({
  name: z.string(),
  labels: z.record(z.string()).optional(),
});

const SubscriptionSchema = z.object({
  name: z.string(),
  topic: z.string(),
  ackDeadlineSeconds: z.number().int().default(10),
  enableMessageOrdering: z.boolean().default(false),
});

const TopicListSchema = z.object({
  topics: z.array(TopicSchema).optional(),
  nextPageToken: z.string().optional(),
});

const SubscriptionListSchema = z.object({
  subscriptions: z.array(SubscriptionSchema).optional(),
  nextPageToken: z.string().optional(),
});

const ErrorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

const STATUS_BY_NAME = new Map(
  Object.entries(GrpcStatus).filter(
    (entry): entry is [string, GrpcStatus] => typeof entry[1] === "number"
  )
);

const STATUS_BY_HTTP_CODE: Record<number, GrpcStatus> = {
  400: GrpcStatus.INVALID_ARGUMENT,
  401: GrpcStatus.UNAUTHENTICATED,
  403: GrpcStatus.PERMISSION_DENIED,
  404: GrpcStatus.NOT_FOUND,
  409: GrpcStatus.ALREADY_EXISTS,
  429: GrpcStatus.RESOURCE_EXHAUSTED,
  499: GrpcStatus.CANCELLED,
  500: GrpcStatus.INTERNAL,
  501: GrpcStatus.UNIMPLEMENTED,
  503: GrpcStatus.UNAVAILABLE,
  504: GrpcStatus.DEADLINE_EXCEEDED,
};

/**
 * REST transport options.
 */
export interface RestTransportOptions {
  /** Service endpoint. */
  endpoint?: string;
  /** Endpoint for pull, acknowledge and deadline requests. */
  pullEndpoint?: string;
  authProvider?: AuthProvider;
  http?: HttpTransport;
  /** Default request timeout in milliseconds. */
  timeoutMs?: number;
}

/**
 * Messaging service transport over the REST API.
 */
export class RestPubSubTransport implements PubSubTransport {
  private readonly endpoint: string;
  private readonly pullEndpoint: string;
  private readonly authProvider: AuthProvider;
  private readonly http: HttpTransport;
  private readonly timeoutMs: number;

  constructor(options: RestTransportOptions = {}) {
    this.endpoint = trimSlash(options.endpoint ?? DEFAULT_ENDPOINT);
    this.pullEndpoint = trimSlash(options.pullEndpoint ?? this.endpoint);
    this.authProvider = options.authProvider ?? new NoAuthProvider();
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.http = options.http ?? new FetchTransport(this.timeoutMs);
  }

  async publish(topicPath: string, messages: readonly PubSubMessage[], options?: CallOptions): Promise<string[]> {
    const body = await this.call("POST", `${this.endpoint}/v1/${topicPath}:publish`, options, {
      messages: messages.map((message) => ({
        data: message.data.toString("base64"),
        attributes: message.attributes,
        orderingKey: message.orderingKey,
      })),
    });
    const { messageIds } = PublishResponseSchema.parse(body);
    if (messageIds.length !== messages.length) {
      throw new ServerError(
        `Publish returned ${messageIds.length} IDs for ${messages.length} messages`,
        "InternalError"
      );
    }
    return messageIds;
  }

  async pull(subscriptionPath: string, maxMessages: number, options?: PullOptions): Promise<ReceivedMessage[]> {
    const body = await this.call("POST", `${this.pullEndpoint}/v1/${subscriptionPath}:pull`, options, {
      maxMessages: Math.min(maxMessages, 1000),
      returnImmediately: options?.returnImmediately ?? false,
    });
    const { receivedMessages = [] } = PullResponseSchema.parse(body);

    return receivedMessages.map((raw) => {
      const publishTime = new Date(raw.message.publishTime);
      return {
        ackId: raw.ackId,
        deliveryAttempt: raw.deliveryAttempt,
        message: {
          data: raw.message.data ? Buffer.from(raw.message.data, "base64") : Buffer.alloc(0),
          attributes: raw.message.attributes ?? {},
          orderingKey: raw.message.orderingKey || undefined,
          messageId: raw.message.messageId,
          publishTime,
        },
      };
    });
  }

  async acknowledge(subscriptionPath: string, ackIds: readonly string[], options?: CallOptions): Promise<void> {
    if (ackIds.length === 0) return;
    await this.call("POST", `${this.pullEndpoint}/v1/${subscriptionPath}:acknowledge`, options, { ackIds });
  }

  async modifyAckDeadline(
    subscriptionPath: string,
    ackIds: readonly string[],
    ackDeadlineSeconds: number,
    options?: CallOptions
  ): Promise<void> {
    if (ackIds.length === 0) return;
    await this.call("POST", `${this.pullEndpoint}/v1/${subscriptionPath}:modifyAckDeadline`, options, {
      ackIds,
      ackDeadlineSeconds,
    });
  }

  async createTopic(topicPath: string, options?: CallOptions): Promise<TopicInfo> {
    return TopicSchema.parse(await this.call("PUT", `${this.endpoint}/v1/${topicPath}`, options, {}));
  }

  async getTopic(topicPath: string, options?: CallOptions): Promise<TopicInfo> {
    return TopicSchema.parse(await this.call("GET", `${this.endpoint}/v1/${topicPath}`, options));
  }

  async deleteTopic(topicPath: string, options?: CallOptions): Promise<void> {
    await this.call("DELETE", `${this.endpoint}/v1/${topicPath}`, options);
  }

  async listTopics(projectId: string, options?: CallOptions): Promise<TopicInfo[]> {
    const topics: TopicInfo[] = [];
    let pageToken: string | undefined;
    do {
      const url = withPageToken(`${this.endpoint}/v1/projects/${projectId}/topics`, pageToken);
      const page = TopicListSchema.parse(await this.call("GET", url, options));
      topics.push(...(page.topics ?? []));
      pageToken = page.nextPageToken || undefined;
    } while (pageToken);
    return topics;
  }

  async createSubscription(
    subscriptionPath: string,
    request: CreateSubscriptionRequest,
    options?: CallOptions
  ): Promise<SubscriptionInfo> {
    const body = await this.call("PUT", `${this.endpoint}/v1/${subscriptionPath}`, options, request);
    return SubscriptionSchema.parse(body);
  }

  async getSubscription(subscriptionPath: string, options?: CallOptions): Promise<SubscriptionInfo> {
    return SubscriptionSchema.parse(await this.call("GET", `${this.endpoint}/v1/${subscriptionPath}`, options));
  }

  async deleteSubscription(subscriptionPath: string, options?: CallOptions): Promise<void> {
    await this.call("DELETE", `${this.endpoint}/v1/${subscriptionPath}`, options);
  }

  async listSubscriptions(projectId: string, options?: CallOptions): Promise<SubscriptionInfo[]> {
    const subscriptions: SubscriptionInfo[] = [];
    let pageToken: string | undefined;
    do {
      const url = withPageToken(`${this.endpoint}/v1/projects/${projectId}/subscriptions`, pageToken);
      const page = SubscriptionListSchema.parse(await this.call("GET", url, options));
      subscriptions.push(...(page.subscriptions ?? []));
      pageToken = page.nextPageToken || undefined;
    } while (pageToken);
    return subscriptions;
  }

  private async call(
    method: HttpRequest["method"],
    url: string,
    options: CallOptions | undefined,
    body?: unknown
  ): Promise<unknown> {
    const token = await this.authProvider.getAccessToken();
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (token) {
      headers["Authorization"] = `Bearer ${token}`;
    }

    const response = await this.http.send({
      method,
      url,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      timeout: options?.timeoutMs ?? this.timeoutMs,
    });

    if (!isSuccess(response)) {
      throw parseErrorResponse(response, url);
    }
    return parseJsonBody(response);
  }
}

/**
 * Map an error response onto the error hierarchy.
 */
export function parseErrorResponse(response: HttpResponse, url: string): PubSubError {
  const requestId = getRequestId(response);
  const resource = resourceFromUrl(url);

  let status = STATUS_BY_HTTP_CODE[response.status] ?? GrpcStatus.UNKNOWN;
  let message = `HTTP ${response.status}`;

  const parsed = ErrorBodySchema.safeParse(readErrorBody(response));
  if (parsed.success) {
    const named = parsed.data.error.status ? STATUS_BY_NAME.get(parsed.data.error.status) : undefined;
    status = named ?? status;
    message = parsed.data.error.message || message;
  }

  return parseGrpcError(status, message, { requestId, resource });
}

function readErrorBody(response: HttpResponse): unknown {
  const text = response.body.toString("utf-8");
  if (!text.trimStart().startsWith("{")) return undefined;
  try {
    return JSON.parse(text);
  } catch (error) {
    return { error: { message: `Malformed error body: ${String(error)}` } };
  }
}

function resourceFromUrl(url: string): { kind: "topic" | "subscription"; name: string } | undefined {
  const match = /\/v1\/(projects\/[^/:?]+\/(?:topics|subscriptions)\/[^/:?]+)/.exec(url);
  const parsed = match?.[1] ? parseResourcePath(match[1]) : undefined;
  if (!parsed) return undefined;
  return { kind: parsed.kind === "topics" ? "topic" : "subscription", name: parsed.name };
}

function withPageToken(url: string, pageToken: string | undefined): string {
  return pageToken ? `${url}?pageToken=${encodeURIComponent(pageToken)}` : url;
}

function trimSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

/**
 * Create a REST transport.
 */
export function createRestTransport(options: RestTransportOptions = {}): RestPubSubTransport {
  return new RestPubSubTransport(options);
}
