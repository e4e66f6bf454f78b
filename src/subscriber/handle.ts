/**
 * Cached subscription handles shared by the puller and the subscriber.
 */

import { ResourceCache } from "../cache/index.js";
import { formatSubscriptionPath, validateSubscriptionName } from "../config/index.js";
import type { Logger } from "../observability/index.js";
import type { RetryExecutor } from "../retry/index.js";
import type { PubSubTransport, SubscriptionInfo } from "../transport/index.js";

/**
 * Handle for one subscription.
 */
export interface SubscriptionHandle {
  /** Fully qualified subscription path. */
  readonly path: string;
  /** Resource description, present when existence was verified. */
  readonly info?: SubscriptionInfo;
}

/**
 * Options for a subscription handle cache.
 */
export interface SubscriptionCacheOptions {
  transport: PubSubTransport;
  retry: RetryExecutor;
  /** Fetch the subscription before caching its handle. */
  verifyResources: boolean;
  logger?: Logger;
}

/**
 * Create a cache of subscription handles keyed by subscription path.
 */
export function createSubscriptionCache(options: SubscriptionCacheOptions): ResourceCache<SubscriptionHandle> {
  return new ResourceCache<SubscriptionHandle>({
    create: async (path) => {
      if (!options.verifyResources) {
        return { path };
      }
      const info = await options.retry.execute((context) =>
        options.transport.getSubscription(path, { timeoutMs: context.timeoutMs })
      );
      return { path, info };
    },
    logger: options.logger?.child({ component: "subscription-cache" }),
  });
}

/**
 * Validate a subscription name and qualify it with the project.
 */
export function resolveSubscriptionPath(projectId: string, subscription: string): string {
  validateSubscriptionName(subscription);
  return formatSubscriptionPath(projectId, subscription);
}
