import {
  SceneNetV01CreateMessage,
  SceneNetV01DeleteMessage,
  SceneNetV01UpdateMessage,
} from "./componentMessages";
import { SceneNetV01SnapshotCompleteMessage } from "./snapshotComplete";

export * from "./componentMessages";
export * from "./snapshotComplete";

export type SceneNetV01ServerMessage =
  | SceneNetV01CreateMessage
  | SceneNetV01UpdateMessage
  | SceneNetV01DeleteMessage
  | SceneNetV01SnapshotCompleteMessage;
