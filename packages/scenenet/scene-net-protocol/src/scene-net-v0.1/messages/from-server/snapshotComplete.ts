import { CborValue } from "../../../cbor";
import { SnapshotCompleteMessageType } from "../../messageTypes";

/**
 * Sent once after the full dump that answers an introduction. Everything before it in the same
 * transport message describes the scene as it stood when the client was admitted.
 */
export type SceneNetV01SnapshotCompleteMessage = {
  type: "snapshotComplete";
};

export function encodeSnapshotComplete(): [number, CborValue] {
  return [SnapshotCompleteMessageType, true];
}
