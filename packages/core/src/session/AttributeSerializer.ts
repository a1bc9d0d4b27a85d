import { deserialize as v8Deserialize, serialize as v8Serialize } from "node:v8";

/**
 * Byte codec for session attribute values. Whatever is stored through
 * `serialize` must come back deep-equal from `deserialize`.
 */
export type AttributeSerializer = {
  serialize: (value: unknown) => Uint8Array;
  deserialize: (bytes: Uint8Array) => unknown;
};

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * UTF-8 JSON codec for plain data. `Date`, `Map`, `Set` and `NaN` do not
 * survive it; {@link createV8AttributeSerializer} is the repository default.
 */
export function createJsonAttributeSerializer(): AttributeSerializer {
  return {
    serialize(value) {
      const json = JSON.stringify(value);
      if (json === undefined) {
        throw new TypeError(`Value of type ${typeof value} has no JSON representation.`);
      }
      return encoder.encode(json);
    },
    deserialize(bytes) {
      return JSON.parse(decoder.decode(bytes)) as unknown;
    },
  };
}

/**
 * Structured-clone codec backed by `node:v8`.
 */
export function createV8AttributeSerializer(): AttributeSerializer {
  return {
    serialize(value) {
      return v8Serialize(value);
    },
    deserialize(bytes) {
      return v8Deserialize(bytes) as unknown;
    },
  };
}

export function isAttributeSerializer(value: unknown): value is AttributeSerializer {
  if (!value || typeof value !== "object") {
    return false;
  }

  const target = value as Partial<AttributeSerializer>;
  return typeof target.serialize === "function" && typeof target.deserialize === "function";
}
