/**
 * Tests for message helpers.
 */

import { describe, it, expect } from "vitest";
import { createMessage, getMessageSize, validateMessage, MAX_ATTRIBUTES } from "../types/index.js";
import { MessageError } from "../error/index.js";

describe("createMessage", () => {
  it("should encode string data as UTF-8", () => {
    const message = createMessage("héllo", { source: "test" }, "key-1");

    expect(message.data.toString("utf-8")).toBe("héllo");
    expect(message.data.length).toBe(6);
    expect(message.attributes).toEqual({ source: "test" });
    expect(message.orderingKey).toBe("key-1");
  });

  it("should copy binary data", () => {
    const bytes = new Uint8Array([1, 2, 3]);
    const message = createMessage(bytes);
    bytes[0] = 9;

    expect([...message.data]).toEqual([1, 2, 3]);
  });

  it("should drop an empty ordering key", () => {
    expect(createMessage("x", {}, "").orderingKey).toBeUndefined();
  });
});

describe("getMessageSize", () => {
  it("should count data, attributes and ordering key", () => {
    const message = createMessage("abcd", { ab: "cde" }, "key");
    expect(getMessageSize(message)).toBe(4 + 5 + 3);
  });
});

describe("validateMessage", () => {
  it("should accept a regular message", () => {
    expect(() => validateMessage(createMessage("ok", { a: "b" }))).not.toThrow();
  });

  it("should reject too many attributes", () => {
    const attributes: Record<string, string> = {};
    for (let i = 0; i <= MAX_ATTRIBUTES; i++) attributes[`k${i}`] = "v";

    expect(() => validateMessage(createMessage("x", attributes))).toThrow(MessageError);
  });

  it("should reject an empty attribute key", () => {
    expect(() => validateMessage(createMessage("x", { "": "v" }))).toThrow(/1-256 bytes/);
  });

  it("should reject an oversized attribute value", () => {
    expect(() => validateMessage(createMessage("x", { k: "v".repeat(1025) }))).toThrow(/1024 bytes/);
  });

  it("should reject an oversized ordering key", () => {
    try {
      validateMessage(createMessage("x", {}, "k".repeat(1025)));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MessageError);
      expect(error).toMatchObject({ code: "Message.InvalidOrderingKey" });
    }
  });
});
