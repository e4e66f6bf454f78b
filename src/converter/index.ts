/**
 * Payload conversion between typed values and wire messages.
 *
 * Converters hold no state; one instance serves every topic and
 * subscription.
 */

import { z } from "zod";
import { ConversionError } from "../error/index.js";
import type { ConverterKind } from "../config/index.js";
import { createMessage, type PubSubMessage } from "../types/index.js";

/**
 * Target type for decoding a message payload.
 */
export interface PayloadType<T> {
  /** Wire decoding applied before `parse`. */
  readonly kind: "bytes" | "string" | "json";
  /** Name used in error messages. */
  readonly name: string;
  /** Narrow a decoded value to `T`; throws ConversionError otherwise. */
  parse(value: unknown): T;
}

/**
 * Built-in payload types.
 */
export const PayloadTypes = {
  bytes: {
    kind: "bytes",
    name: "bytes",
    parse(value: unknown): Buffer {
      if (Buffer.isBuffer(value)) return value;
      throw new ConversionError(`Expected bytes, got ${describe(value)}`, "InvalidPayload");
    },
  } satisfies PayloadType<Buffer>,

  string: {
    kind: "string",
    name: "string",
    parse(value: unknown): string {
      if (typeof value === "string") return value;
      throw new ConversionError(`Expected string, got ${describe(value)}`, "InvalidPayload");
    },
  } satisfies PayloadType<string>,

  /**
   * JSON payload validated by a zod schema.
   */
  json<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, name: string = "json"): PayloadType<T> {
    return {
      kind: "json",
      name,
      parse(value: unknown): T {
        const result = schema.safeParse(value);
        if (!result.success) {
          const issues = result.error.issues
            .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
            .join("; ");
          throw new ConversionError(`Payload does not match ${name}: ${issues}`, "InvalidPayload");
        }
        return result.data;
      },
    };
  },
};

/**
 * Conversion strategy.
 */
export interface MessageConverter {
  /** Encode a payload with optional headers into a message. */
  toWireFormat(payload: unknown, headers?: Record<string, string>, orderingKey?: string): PubSubMessage;
  /** Decode a message payload into `type`. */
  fromWireFormat<T>(message: PubSubMessage, type: PayloadType<T>): T;
}

/**
 * Converter for byte and string payloads.
 */
export class SimpleMessageConverter implements MessageConverter {
  toWireFormat(payload: unknown, headers: Record<string, string> = {}, orderingKey?: string): PubSubMessage {
    if (typeof payload === "string" || payload instanceof Uint8Array) {
      return createMessage(payload, headers, orderingKey);
    }
    throw new ConversionError(
      `Unsupported payload type ${describe(payload)}; expected bytes or string`,
      "UnsupportedType"
    );
  }

  fromWireFormat<T>(message: PubSubMessage, type: PayloadType<T>): T {
    switch (type.kind) {
      case "bytes":
        return type.parse(Buffer.from(message.data));
      case "string":
        return type.parse(message.data.toString("utf-8"));
      case "json":
        throw new ConversionError(
          `Unsupported target type ${type.name}; expected bytes or string`,
          "UnsupportedType"
        );
    }
  }
}

/**
 * Converter adding JSON payloads on top of bytes and strings.
 */
export class JsonMessageConverter implements MessageConverter {
  private readonly simple = new SimpleMessageConverter();

  toWireFormat(payload: unknown, headers: Record<string, string> = {}, orderingKey?: string): PubSubMessage {
    if (typeof payload === "string" || payload instanceof Uint8Array) {
      return this.simple.toWireFormat(payload, headers, orderingKey);
    }

    let json: string | undefined;
    try {
      json = JSON.stringify(payload);
    } catch (error) {
      throw new ConversionError(
        `Payload is not serializable: ${error instanceof Error ? error.message : String(error)}`,
        "UnsupportedType"
      );
    }
    if (json === undefined) {
      throw new ConversionError(`Unsupported payload type ${describe(payload)}`, "UnsupportedType");
    }

    return createMessage(json, { "content-type": "application/json", ...headers }, orderingKey);
  }

  fromWireFormat<T>(message: PubSubMessage, type: PayloadType<T>): T {
    if (type.kind !== "json") {
      return this.simple.fromWireFormat(message, type);
    }

    let value: unknown;
    try {
      value = JSON.parse(message.data.toString("utf-8"));
    } catch (error) {
      throw new ConversionError(
        `Payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        "InvalidPayload"
      );
    }
    return type.parse(value);
  }
}

/**
 * Select a converter by configuration.
 */
export function createConverter(kind: ConverterKind = "simple"): MessageConverter {
  return kind === "json" ? new JsonMessageConverter() : new SimpleMessageConverter();
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}
