import { CborValue, encodeCbor } from "../cbor";
import { flattenPairs } from "./envelope";
import { encodeIntroduction, encodeInvoke } from "./messages";

export type SceneNetV01OutgoingClientMessage =
  | { type: "introduction"; clientName: string }
  | { type: "invoke"; payload: CborValue };

export function encodeClientMessages(
  messages: ReadonlyArray<SceneNetV01OutgoingClientMessage>,
): Uint8Array {
  return encodeCbor(
    flattenPairs(
      messages.map((message) => {
        switch (message.type) {
          case "introduction":
            return encodeIntroduction(message);
          case "invoke":
            return encodeInvoke(message.payload);
        }
      }),
    ),
  );
}
