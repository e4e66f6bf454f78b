/**
 * Flow control for outstanding messages.
 *
 * Tracks outstanding element count and byte size against optional limits.
 * The same controller bounds unsent publishes, unacknowledged deliveries
 * and, with an element limit only, concurrently running tasks.
 */

import { FlowControlError } from "../error/index.js";

/**
 * What `reserve` does when a limit would be exceeded.
 */
export type LimitExceededBehavior = "Block" | "Ignore" | "ThrowException";

/**
 * Flow control settings for one role.
 */
export interface FlowControlSettings {
  /** Maximum outstanding elements; unset means unlimited. */
  maxOutstandingElementCount?: number;
  /** Maximum outstanding bytes; unset means unlimited. */
  maxOutstandingRequestBytes?: number;
  /** Behavior when a limit would be exceeded. */
  limitExceededBehavior: LimitExceededBehavior;
}

/**
 * Default flow control settings (unlimited, blocking).
 */
export const DEFAULT_FLOW_CONTROL_SETTINGS: FlowControlSettings = {
  limitExceededBehavior: "Block",
};

/**
 * Outstanding usage snapshot.
 */
export interface OutstandingUsage {
  elementCount: number;
  byteSize: number;
}

interface Waiter {
  elementCount: number;
  byteSize: number;
  resolve: () => void;
}

/**
 * Flow controller.
 */
export class FlowController {
  private readonly settings: FlowControlSettings;
  private elementCount = 0;
  private byteSize = 0;
  private readonly waiters: Waiter[] = [];

  constructor(settings: FlowControlSettings = DEFAULT_FLOW_CONTROL_SETTINGS) {
    this.settings = settings;
  }

  /**
   * Reserve capacity for `elementCount` elements of `byteSize` bytes.
   *
   * Under Block the returned promise settles once capacity is available;
   * waiters are admitted in arrival order.
   */
  async reserve(elementCount: number, byteSize: number): Promise<void> {
    assertAmount(elementCount, byteSize);

    switch (this.settings.limitExceededBehavior) {
      case "Ignore":
        this.admit(elementCount, byteSize);
        return;

      case "ThrowException":
        if (!this.fits(elementCount, byteSize)) {
          throw new FlowControlError(
            `Flow control limits exceeded: ${this.describe(elementCount, byteSize)}`,
            "LimitExceeded"
          );
        }
        this.admit(elementCount, byteSize);
        return;

      case "Block":
        if (this.waiters.length === 0 && this.fits(elementCount, byteSize)) {
          this.admit(elementCount, byteSize);
          return;
        }
        if (this.exceedsLimits(elementCount, byteSize)) {
          throw new FlowControlError(
            `Request can never be admitted: ${this.describe(elementCount, byteSize)}`,
            "RequestTooLarge"
          );
        }
        return new Promise<void>((resolve) => {
          this.waiters.push({ elementCount, byteSize, resolve });
        });
    }
  }

  /**
   * Release previously reserved capacity.
   *
   * @throws FlowControlError when releasing more than is outstanding
   */
  release(elementCount: number, byteSize: number): void {
    assertAmount(elementCount, byteSize);

    if (elementCount > this.elementCount || byteSize > this.byteSize) {
      throw new FlowControlError(
        `Release of ${elementCount} elements / ${byteSize} bytes exceeds outstanding ` +
          `${this.elementCount} elements / ${this.byteSize} bytes`,
        "InvalidRelease"
      );
    }

    this.elementCount -= elementCount;
    this.byteSize -= byteSize;
    this.drain();
  }

  /**
   * Current outstanding usage.
   */
  getOutstanding(): OutstandingUsage {
    return { elementCount: this.elementCount, byteSize: this.byteSize };
  }

  /**
   * Number of reservations waiting for capacity.
   */
  get waiting(): number {
    return this.waiters.length;
  }

  private admit(elementCount: number, byteSize: number): void {
    this.elementCount += elementCount;
    this.byteSize += byteSize;
  }

  private drain(): void {
    let next = this.waiters[0];
    while (next && this.fits(next.elementCount, next.byteSize)) {
      this.waiters.shift();
      this.admit(next.elementCount, next.byteSize);
      next.resolve();
      next = this.waiters[0];
    }
  }

  private fits(elementCount: number, byteSize: number): boolean {
    const { maxOutstandingElementCount, maxOutstandingRequestBytes } = this.settings;
    return (
      (maxOutstandingElementCount === undefined ||
        this.elementCount + elementCount <= maxOutstandingElementCount) &&
      (maxOutstandingRequestBytes === undefined ||
        this.byteSize + byteSize <= maxOutstandingRequestBytes)
    );
  }

  private exceedsLimits(elementCount: number, byteSize: number): boolean {
    const { maxOutstandingElementCount, maxOutstandingRequestBytes } = this.settings;
    return (
      (maxOutstandingElementCount !== undefined && elementCount > maxOutstandingElementCount) ||
      (maxOutstandingRequestBytes !== undefined && byteSize > maxOutstandingRequestBytes)
    );
  }

  private describe(elementCount: number, byteSize: number): string {
    const { maxOutstandingElementCount, maxOutstandingRequestBytes } = this.settings;
    return (
      `requested ${elementCount} elements / ${byteSize} bytes, ` +
      `outstanding ${this.elementCount} / ${this.byteSize}, ` +
      `limits ${maxOutstandingElementCount ?? "unlimited"} / ${maxOutstandingRequestBytes ?? "unlimited"}`
    );
  }
}

function assertAmount(elementCount: number, byteSize: number): void {
  if (!Number.isInteger(elementCount) || elementCount < 0 || !Number.isInteger(byteSize) || byteSize < 0) {
    throw new FlowControlError(
      `Element count and byte size must be non-negative integers (got ${elementCount}, ${byteSize})`,
      "InvalidAmount"
    );
  }
}
