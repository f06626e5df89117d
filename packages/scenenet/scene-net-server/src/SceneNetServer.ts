import { randomUUID } from "node:crypto";

import { decodeClientMessage, readEnvelopePairs } from "@scenenet/scene-net-protocol";
import { AsyncQueue } from "@scenenet/scene-net-websocket";

import { ConnectionRegistry } from "./ConnectionRegistry";
import { OutboundDispatcher } from "./OutboundDispatcher";
import { ClientId, OutboundEnvelope, targetedEnvelope } from "./OutboundEnvelope";
import { InboundMessage, MessageSocket, SceneNetClient } from "./SceneNetClient";
import { SceneNetConsoleLogger, SceneNetLogger } from "./SceneNetLogger";
import { SceneNetServerError, SceneNetServerErrors } from "./SceneNetServerError";
import { SceneWorld } from "./SceneWorld";

/**
 * Owner of the scene. Receives the requests clients make with invoke messages.
 */
export type SceneAuthority = {
  onInvoke: (clientId: ClientId, payload: unknown) => void;
};

export type SceneNetServerOptions = {
  authority?: SceneAuthority;
  // Largest reassembled message accepted from a client
  maxMessageLength?: number;
  // How long stop() waits for clients to receive their final messages
  closeTimeoutMs?: number;
};

export class SceneNetServer {
  public readonly world: SceneWorld;
  public readonly registry = new ConnectionRegistry<SceneNetClient>();

  private readonly outbound = new AsyncQueue<OutboundEnvelope>();
  private readonly inbound = new AsyncQueue<InboundMessage>();
  private readonly dispatcher: OutboundDispatcher;
  private readonly abortController = new AbortController();
  private readonly dispatcherAbortController = new AbortController();
  private dispatcherRun: Promise<void> | null = null;
  private stopped = false;

  constructor(
    private readonly options: SceneNetServerOptions = {},
    private readonly logger: SceneNetLogger = new SceneNetConsoleLogger(),
  ) {
    this.world = new SceneWorld(this.outbound);
    this.dispatcher = new OutboundDispatcher(this.outbound, this.registry, this.logger);
  }

  public get signal(): AbortSignal {
    return this.abortController.signal;
  }

  // Starts the outbound consumer
  public start(): void {
    if (this.dispatcherRun !== null || this.stopped) {
      return;
    }
    this.dispatcherRun = this.dispatcher
      .run(this.dispatcherAbortController.signal)
      .catch((error: unknown) => {
        this.logger.error("Outbound dispatcher stopped", error);
      });
  }

  public addConnection(socket: MessageSocket): SceneNetClient {
    if (this.stopped) {
      throw new Error("This SceneNetServer has been stopped");
    }
    const client = new SceneNetClient(randomUUID(), socket, {
      logger: this.logger,
      maxMessageLength: this.options.maxMessageLength,
      onInbound: (message) => {
        this.inbound.enqueue(message);
      },
      onDisconnect: (disconnected) => {
        if (this.registry.remove(disconnected.id) !== null) {
          this.logger.info(`Client ${disconnected.id} disconnected`);
        }
      },
    });
    this.registry.addPending(client);
    this.logger.info(`Client ${client.id} connected from ${socket.remoteAddress}`);
    client.start(this.abortController.signal);
    return client;
  }

  /**
   * Handles every inbound message received since the previous tick.
   */
  public tick(): void {
    for (const message of this.inbound.drain()) {
      this.handleInbound(message);
    }
  }

  /**
   * Deletes every component, gives clients up to `closeTimeoutMs` to receive what is queued for
   * them, then disconnects them all.
   */
  public async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.dispatcherAbortController.abort();
    await this.dispatcherRun;

    this.world.disposeAll();
    this.dispatcher.drain();

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, this.options.closeTimeoutMs ?? 1000);
    });
    await Promise.race([
      Promise.all(this.registry.allClients().map((client) => client.close())),
      timeout,
    ]);
    clearTimeout(timer);

    this.abortController.abort();
    this.outbound.close();
    this.inbound.close();
  }

  private handleInbound({ clientId, content }: InboundMessage): void {
    const read = readEnvelopePairs(content);
    if (read instanceof Error) {
      this.logger.warn(`Discarding message from client ${clientId}: ${read.message}`);
      return;
    }
    for (const pair of read.pairs) {
      const message = decodeClientMessage(pair);
      if (message === null) {
        this.logger.debug(`Ignoring message type ${pair.messageType} from client ${clientId}`);
        continue;
      }
      if (message instanceof Error) {
        this.logger.warn(
          new SceneNetServerError(
            SceneNetServerErrors.INVALID_MESSAGE_ERROR_TYPE,
            `Invalid message type ${pair.messageType} from client ${clientId}: ${message.message}`,
          ),
        );
        continue;
      }
      switch (message.type) {
        case "introduction":
          this.introduce(clientId, message.clientName);
          break;
        case "invoke":
          this.invoke(clientId, message.payload);
          break;
      }
    }
    if (read.stoppedEarly !== null) {
      this.logger.warn(`Message from client ${clientId} stopped early: ${read.stoppedEarly}`);
    }
  }

  // A throwing authority only loses that one invoke
  private invoke(clientId: ClientId, payload: unknown): void {
    const authority = this.options.authority;
    if (authority === undefined) {
      return;
    }
    try {
      authority.onInvoke(clientId, payload);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(
        new SceneNetServerError(
          SceneNetServerErrors.INVOKE_FAILED_ERROR_TYPE,
          `Invoke from client ${clientId} failed: ${reason}`,
        ),
      );
    }
  }

  private introduce(clientId: ClientId, clientName: string): void {
    this.logger.info(`Client ${clientId} introduced itself as ${clientName}`);
    this.outbound.enqueue(
      targetedEnvelope(
        clientId,
        [...this.world.snapshotAll(), { type: "snapshotComplete" }],
        true,
      ),
    );
  }
}
