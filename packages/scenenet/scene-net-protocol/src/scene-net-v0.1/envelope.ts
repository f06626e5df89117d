import { CborValue } from "../cbor";

/**
 * One `[message_type, payload]` pair. A transport message is a flat CBOR array holding one or
 * more of these back to back.
 */
export type EnvelopePair = {
  messageType: number;
  payload: unknown;
};

export type EnvelopeReadResult = {
  pairs: Array<EnvelopePair>;
  // Set when reading stopped before the end of the array
  stoppedEarly: "truncated" | "invalidMessageType" | null;
};

export function flattenPairs(pairs: Array<[number, CborValue]>): Array<CborValue> {
  const flat: Array<CborValue> = [];
  for (const [messageType, payload] of pairs) {
    flat.push(messageType, payload);
  }
  return flat;
}

/**
 * Walks a decoded transport message two elements at a time. An odd trailing element or a
 * message type that is not a non-negative integer ends the walk; the pairs read up to that
 * point are still returned.
 */
export function readEnvelopePairs(content: unknown): EnvelopeReadResult | Error {
  if (!Array.isArray(content)) {
    return new Error("Messages must be CBOR arrays");
  }
  const elements: Array<unknown> = content;
  const pairs: Array<EnvelopePair> = [];
  for (let i = 0; i < elements.length; i += 2) {
    const messageType = elements[i];
    if (typeof messageType !== "number" || !Number.isInteger(messageType) || messageType < 0) {
      return { pairs, stoppedEarly: "invalidMessageType" };
    }
    if (i + 1 >= elements.length) {
      return { pairs, stoppedEarly: "truncated" };
    }
    pairs.push({ messageType, payload: elements[i + 1] });
  }
  return { pairs, stoppedEarly: null };
}
