import { CborValue } from "../../../cbor";
import { InvokeMessageType } from "../../messageTypes";

/**
 * A request for the scene authority. The payload is passed through untouched.
 */
export type SceneNetV01InvokeMessage = {
  type: "invoke";
  payload: unknown;
};

export function encodeInvoke(payload: CborValue): [number, CborValue] {
  return [InvokeMessageType, payload];
}

export function decodeInvoke(payload: unknown): SceneNetV01InvokeMessage {
  return { type: "invoke", payload };
}
