import { SceneNetV01ServerMessage } from "@scenenet/scene-net-protocol";

export type ClientId = string;

/**
 * One unit of outbound work. The messages are encoded once into a single transport message.
 * A null target means every active client; `promote` moves a pending target to active before
 * delivery.
 */
export type OutboundEnvelope = {
  messages: Array<SceneNetV01ServerMessage>;
  target: ClientId | null;
  promote: boolean;
};

export function broadcastEnvelope(messages: Array<SceneNetV01ServerMessage>): OutboundEnvelope {
  return { messages, target: null, promote: false };
}

export function targetedEnvelope(
  target: ClientId,
  messages: Array<SceneNetV01ServerMessage>,
  promote = false,
): OutboundEnvelope {
  return { messages, target, promote };
}
