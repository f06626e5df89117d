import { decodeCbor } from "@scenenet/scene-net-protocol";
import {
  AsyncQueue,
  CancelledError,
  DEFAULT_MAX_PAYLOAD_LENGTH,
  SceneWebSocketError,
  SceneWebSocketErrors,
  SceneWebSocketFrame,
} from "@scenenet/scene-net-websocket";

import { ClientId } from "./OutboundEnvelope";
import { SceneNetLogger } from "./SceneNetLogger";

/**
 * The part of a WebSocket a client connection uses.
 */
export type MessageSocket = {
  readonly remoteAddress: string;
  receive(signal?: AbortSignal): Promise<SceneWebSocketFrame>;
  send(bytes: Uint8Array, lastMessage?: boolean): Promise<void>;
  pong(payload?: Uint8Array): Promise<void>;
  close(): Promise<void>;
};

export type InboundMessage = {
  clientId: ClientId;
  // Top-level CBOR array
  content: Array<unknown>;
};

export type SceneNetClientOptions = {
  onInbound: (message: InboundMessage) => void;
  onDisconnect: (client: SceneNetClient) => void;
  logger: SceneNetLogger;
  // Largest reassembled message accepted from the client
  maxMessageLength?: number;
};

/**
 * One connected observer. A reader loop reassembles and decodes incoming messages; a writer
 * loop sends whatever is put on `outgoing`. Either loop ending disconnects the client.
 */
export class SceneNetClient {
  public readonly outgoing = new AsyncQueue<Uint8Array>();
  private readonly abortController = new AbortController();
  private readonly maxMessageLength: number;
  private disconnected = false;
  private finished: Promise<void> | null = null;
  private detachServerSignal: (() => void) | null = null;

  constructor(
    public readonly id: ClientId,
    private readonly socket: MessageSocket,
    private readonly options: SceneNetClientOptions,
  ) {
    this.maxMessageLength = options.maxMessageLength ?? DEFAULT_MAX_PAYLOAD_LENGTH;
  }

  public get remoteAddress(): string {
    return this.socket.remoteAddress;
  }

  public get isDisconnected(): boolean {
    return this.disconnected;
  }

  // Starts both loops; `serverSignal` firing disconnects the client
  public start(serverSignal: AbortSignal): void {
    if (this.finished !== null) {
      return;
    }
    if (serverSignal.aborted) {
      this.finished = this.disconnect();
      return;
    }
    const onServerAbort = () => {
      this.disconnect().catch((error: unknown) => {
        this.options.logger.error(`Disconnecting client ${this.id} failed`, error);
      });
    };
    serverSignal.addEventListener("abort", onServerAbort, { once: true });
    this.detachServerSignal = () => serverSignal.removeEventListener("abort", onServerAbort);
    this.finished = Promise.all([this.readLoop(), this.writeLoop()]).then(() => undefined);
  }

  /**
   * Lets the writer send what is already queued, then disconnects. Resolves once both loops
   * have ended.
   */
  public async close(): Promise<void> {
    this.outgoing.close();
    if (this.finished === null) {
      await this.disconnect();
      return;
    }
    await this.finished;
  }

  public async disconnect(): Promise<void> {
    if (this.disconnected) {
      return;
    }
    this.disconnected = true;
    this.abortController.abort();
    this.outgoing.close();
    this.detachServerSignal?.();
    this.detachServerSignal = null;
    this.options.onDisconnect(this);
    try {
      await this.socket.close();
    } catch (error) {
      this.options.logger.debug(`Closing socket of client ${this.id} failed`, error);
    }
  }

  private async readLoop(): Promise<void> {
    const signal = this.abortController.signal;
    try {
      while (!signal.aborted) {
        const bytes = await this.readMessage(signal);
        if (bytes === null) {
          this.options.logger.info(`Client ${this.id} closed the connection`);
          break;
        }
        let content: unknown;
        try {
          content = decodeCbor(bytes);
        } catch (error) {
          this.options.logger.warn(`Undecodable message from client ${this.id}`, error);
          break;
        }
        if (!Array.isArray(content)) {
          this.options.logger.warn(`Message from client ${this.id} is not an array`);
          break;
        }
        this.options.onInbound({ clientId: this.id, content });
      }
    } catch (error) {
      if (!(error instanceof CancelledError)) {
        this.options.logger.info(`Connection to client ${this.id} lost`, error);
      }
    } finally {
      await this.disconnect();
    }
  }

  // Null when the client sent a close frame
  private async readMessage(signal: AbortSignal): Promise<Uint8Array | null> {
    const parts: Array<Uint8Array> = [];
    let length = 0;
    for (;;) {
      const frame = await this.socket.receive(signal);
      switch (frame.kind) {
        case "closing":
          return null;
        case "ping":
          await this.socket.pong(frame.payload);
          break;
        case "message":
          length += frame.payload.length;
          if (length > this.maxMessageLength) {
            throw new SceneWebSocketError(
              SceneWebSocketErrors.FRAME_TOO_LARGE_ERROR_TYPE,
              `Message exceeds ${this.maxMessageLength} bytes`,
            );
          }
          parts.push(frame.payload);
          if (frame.fin) {
            return parts.length === 1 ? parts[0] : Buffer.concat(parts, length);
          }
          break;
      }
    }
  }

  private async writeLoop(): Promise<void> {
    const signal = this.abortController.signal;
    try {
      for (;;) {
        const bytes = await this.outgoing.dequeue(signal);
        await this.socket.send(bytes, true);
      }
    } catch (error) {
      if (!(error instanceof CancelledError)) {
        this.options.logger.info(`Sending to client ${this.id} failed`, error);
      }
    } finally {
      await this.disconnect();
    }
  }
}
