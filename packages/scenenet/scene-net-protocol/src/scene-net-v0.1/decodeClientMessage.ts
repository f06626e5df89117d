import { EnvelopePair } from "./envelope";
import { decodeIntroduction, decodeInvoke, SceneNetV01ClientMessage } from "./messages";
import { IntroductionMessageType, InvokeMessageType } from "./messageTypes";

/**
 * Decodes one pair sent by a client. Returns null for message types the server does not handle.
 */
export function decodeClientMessage(pair: EnvelopePair): SceneNetV01ClientMessage | Error | null {
  switch (pair.messageType) {
    case IntroductionMessageType:
      return decodeIntroduction(pair.payload);
    case InvokeMessageType:
      return decodeInvoke(pair.payload);
    default:
      return null;
  }
}
