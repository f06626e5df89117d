import { encodeServerMessages } from "@scenenet/scene-net-protocol";
import { AsyncQueue, CancelledError } from "@scenenet/scene-net-websocket";

import { ConnectionRegistry } from "./ConnectionRegistry";
import { OutboundEnvelope } from "./OutboundEnvelope";
import { SceneNetLogger } from "./SceneNetLogger";
import { SceneNetServerError, SceneNetServerErrors } from "./SceneNetServerError";

/**
 * Consumes the outbound queue. Each envelope is encoded once and the same bytes are handed to
 * every recipient's queue, so all clients see one producer's messages in the same order.
 */
export class OutboundDispatcher {
  constructor(
    private readonly queue: AsyncQueue<OutboundEnvelope>,
    private readonly registry: ConnectionRegistry,
    private readonly logger: SceneNetLogger,
  ) {}

  // Resolves once `signal` fires or the queue is closed
  public async run(signal: AbortSignal): Promise<void> {
    for (;;) {
      let envelope: OutboundEnvelope;
      try {
        envelope = await this.queue.dequeue(signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          return;
        }
        throw error;
      }
      this.dispatch(envelope);
    }
  }

  // Dispatches whatever is queued without waiting for more
  public drain(): void {
    for (const envelope of this.queue.drain()) {
      this.dispatch(envelope);
    }
  }

  public dispatch(envelope: OutboundEnvelope): void {
    let bytes: Uint8Array;
    try {
      bytes = encodeServerMessages(envelope.messages);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(
        new SceneNetServerError(
          SceneNetServerErrors.ENCODE_FAILURE_ERROR_TYPE,
          `Dropping envelope of ${envelope.messages.length} message(s): ${reason}`,
        ),
      );
      return;
    }

    if (envelope.target === null) {
      for (const client of this.registry.activeClients()) {
        client.outgoing.enqueue(bytes);
      }
      return;
    }

    if (envelope.promote && !this.registry.promote(envelope.target)) {
      this.logger.warn(`Unable to bring client ${envelope.target} to active status`);
    }
    const client = this.registry.getActive(envelope.target);
    if (client === null) {
      this.logger.debug(`Dropping envelope for inactive client ${envelope.target}`);
      return;
    }
    client.outgoing.enqueue(bytes);
  }
}
