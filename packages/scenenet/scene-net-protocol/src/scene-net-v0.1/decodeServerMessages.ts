import { decodeCbor } from "../cbor";
import { lookupComponentMessageType } from "../componentCategories";
import { readEnvelopePairs } from "./envelope";
import { decodeCreate, decodeDelete, decodeUpdate, SceneNetV01ServerMessage } from "./messages";
import { SnapshotCompleteMessageType } from "./messageTypes";

export function decodeServerMessages(bytes: Uint8Array): Array<SceneNetV01ServerMessage> {
  const read = readEnvelopePairs(decodeCbor(bytes));
  if (read instanceof Error) {
    throw read;
  }
  if (read.stoppedEarly !== null) {
    throw new Error(`Malformed server message: ${read.stoppedEarly}`);
  }
  const messages: Array<SceneNetV01ServerMessage> = [];
  for (const { messageType, payload } of read.pairs) {
    if (messageType === SnapshotCompleteMessageType) {
      messages.push({ type: "snapshotComplete" });
      continue;
    }
    const lookup = lookupComponentMessageType(messageType);
    if (lookup === null) {
      throw new Error(`Unknown message type: ${messageType}`);
    }
    const [category, kind] = lookup;
    let decoded: SceneNetV01ServerMessage | Error;
    switch (kind) {
      case "create":
        decoded = decodeCreate(category, payload);
        break;
      case "update":
        decoded = decodeUpdate(category, payload);
        break;
      case "delete":
        decoded = decodeDelete(category, payload);
        break;
    }
    if (decoded instanceof Error) {
      throw decoded;
    }
    messages.push(decoded);
  }
  return messages;
}
