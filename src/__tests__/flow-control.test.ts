/**
 * Tests for the flow controller.
 */

import { describe, it, expect } from "vitest";
import { FlowController } from "../flow-control/index.js";
import { FlowControlError } from "../error/index.js";

async function settled(promise: Promise<void>): Promise<boolean> {
  let done = false;
  void promise.then(() => {
    done = true;
  });
  await new Promise((resolve) => setTimeout(resolve, 0));
  return done;
}

describe("FlowController", () => {
  it("should admit requests within the limits", async () => {
    const controller = new FlowController({
      maxOutstandingElementCount: 2,
      maxOutstandingRequestBytes: 100,
      limitExceededBehavior: "Block",
    });

    await controller.reserve(1, 40);
    await controller.reserve(1, 60);

    expect(controller.getOutstanding()).toEqual({ elementCount: 2, byteSize: 100 });
  });

  it("should admit everything when no limits are set", async () => {
    const controller = new FlowController();
    await controller.reserve(1000, 1_000_000);
    expect(controller.getOutstanding()).toEqual({ elementCount: 1000, byteSize: 1_000_000 });
  });

  describe("Block", () => {
    it("should wait until capacity is released", async () => {
      const controller = new FlowController({ maxOutstandingElementCount: 1, limitExceededBehavior: "Block" });
      await controller.reserve(1, 10);

      const blocked = controller.reserve(1, 20);
      expect(await settled(blocked)).toBe(false);
      expect(controller.waiting).toBe(1);

      controller.release(1, 10);
      await blocked;
      expect(controller.getOutstanding()).toEqual({ elementCount: 1, byteSize: 20 });
      expect(controller.waiting).toBe(0);
    });

    it("should admit waiters in arrival order", async () => {
      const controller = new FlowController({ maxOutstandingRequestBytes: 100, limitExceededBehavior: "Block" });
      await controller.reserve(1, 90);
      const order: string[] = [];

      const large = controller.reserve(1, 80).then(() => order.push("large"));
      const small = controller.reserve(1, 5).then(() => order.push("small"));
      expect(controller.waiting).toBe(2);

      controller.release(1, 90);
      await Promise.all([large, small]);
      expect(order).toEqual(["large", "small"]);
    });

    it("should reject a request larger than the limits", async () => {
      const controller = new FlowController({ maxOutstandingRequestBytes: 100, limitExceededBehavior: "Block" });

      await expect(controller.reserve(1, 101)).rejects.toMatchObject({ code: "FlowControl.RequestTooLarge" });
    });
  });

  describe("ThrowException", () => {
    it("should throw instead of waiting", async () => {
      const controller = new FlowController({
        maxOutstandingElementCount: 1,
        limitExceededBehavior: "ThrowException",
      });
      await controller.reserve(1, 0);

      await expect(controller.reserve(1, 0)).rejects.toBeInstanceOf(FlowControlError);
      await expect(controller.reserve(1, 0)).rejects.toMatchObject({ code: "FlowControl.LimitExceeded" });
      expect(controller.getOutstanding()).toEqual({ elementCount: 1, byteSize: 0 });
    });
  });

  describe("Ignore", () => {
    it("should admit beyond the limits and keep counting", async () => {
      const controller = new FlowController({ maxOutstandingElementCount: 1, limitExceededBehavior: "Ignore" });
      await controller.reserve(1, 5);
      await controller.reserve(1, 5);

      expect(controller.getOutstanding()).toEqual({ elementCount: 2, byteSize: 10 });
    });
  });

  describe("release", () => {
    it("should refuse to release more than is outstanding", async () => {
      const controller = new FlowController();
      await controller.reserve(1, 10);

      expect(() => controller.release(2, 10)).toThrow(FlowControlError);
      expect(() => controller.release(1, 11)).toThrow(/exceeds outstanding/);
      expect(controller.getOutstanding()).toEqual({ elementCount: 1, byteSize: 10 });
    });

    it("should reject negative or fractional amounts", async () => {
      const controller = new FlowController();

      await expect(controller.reserve(-1, 0)).rejects.toMatchObject({ code: "FlowControl.InvalidAmount" });
      expect(() => controller.release(0, 1.5)).toThrow(FlowControlError);
    });
  });
});
