import { CborValue, encodeCbor } from "../cbor";
import { flattenPairs } from "./envelope";
import {
  encodeCreate,
  encodeDelete,
  encodeSnapshotComplete,
  encodeUpdate,
  SceneNetV01ServerMessage,
} from "./messages";

export function encodeServerMessage(message: SceneNetV01ServerMessage): [number, CborValue] {
  switch (message.type) {
    case "create":
      return encodeCreate(message);
    case "update":
      return encodeUpdate(message);
    case "delete":
      return encodeDelete(message);
    case "snapshotComplete":
      return encodeSnapshotComplete();
  }
}

/**
 * Encodes the messages as one transport message. Throws if any message cannot be encoded.
 */
export function encodeServerMessages(messages: ReadonlyArray<SceneNetV01ServerMessage>): Uint8Array {
  return encodeCbor(flattenPairs(messages.map(encodeServerMessage)));
}
