import { decode, encode } from "cborg";

/**
 * Values that can appear inside replicated component content and message payloads.
 */
export type CborValue =
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | Array<CborValue>
  | { [key: string]: CborValue };

/**
 * String-keyed map of a replicated component. Component lists add an `id` key holding the
 * object's wire identity.
 */
export type ComponentContent = { [key: string]: CborValue };

export function encodeCbor(value: CborValue): Uint8Array {
  return encode(value);
}

// Throws on malformed input, including trailing bytes after the first item
export function decodeCbor(bytes: Uint8Array): unknown {
  const decoded: unknown = decode(bytes);
  return decoded;
}

export function isCborValue(value: unknown): value is CborValue {
  switch (typeof value) {
    case "undefined":
    case "boolean":
    case "number":
    case "bigint":
    case "string":
      return true;
    case "object":
      if (value === null || value instanceof Uint8Array) {
        return true;
      }
      if (Array.isArray(value)) {
        return value.every(isCborValue);
      }
      return Object.values(value).every(isCborValue);
    default:
      return false;
  }
}
