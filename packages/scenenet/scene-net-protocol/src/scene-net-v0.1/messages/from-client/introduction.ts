import { CborValue } from "../../../cbor";
import { IntroductionMessageType } from "../../messageTypes";

/**
 * First message a client sends. The server answers with the full scene followed by the
 * snapshot-complete marker, after which the client receives every broadcast.
 */
export type SceneNetV01IntroductionMessage = {
  type: "introduction";
  clientName: string;
};

export function encodeIntroduction(message: SceneNetV01IntroductionMessage): [number, CborValue] {
  return [IntroductionMessageType, { client_name: message.clientName }];
}

export function decodeIntroduction(payload: unknown): SceneNetV01IntroductionMessage | Error {
  if (
    typeof payload === "object" &&
    payload !== null &&
    "client_name" in payload &&
    typeof payload.client_name === "string"
  ) {
    return {
      type: "introduction",
      clientName: payload.client_name,
    };
  }
  return new Error("Introduction payload must contain a client_name string");
}
