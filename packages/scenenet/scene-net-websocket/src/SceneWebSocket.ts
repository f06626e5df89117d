import { Socket } from "node:net";

import { AsyncQueue } from "./AsyncQueue";
import { CancelledError, SceneWebSocketError, SceneWebSocketErrors } from "./errors";
import {
  DEFAULT_MAX_PAYLOAD_LENGTH,
  encodeControlFrame,
  encodeFrames,
  FrameDecoder,
  NORMAL_CLOSE_FRAME,
  PongOpcode,
  SceneWebSocketFrame,
} from "./frames";
import {
  buildHandshakeResponse,
  computeAcceptKey,
  DEFAULT_MAX_HANDSHAKE_BYTES,
  parseHandshakeRequest,
} from "./handshake";

export type SceneWebSocketOptions = {
  // Largest payload a received frame may declare (default 100,000,000 bytes)
  maxPayloadLength?: number;
  // Largest payload per sent frame. Defaults to the socket's writable high water mark
  maxFramePayload?: number;
  maxHandshakeBytes?: number;
};

const HEADER_TERMINATOR = Buffer.from("\r\n\r\n", "latin1");

function handshakeFailed(message: string): SceneWebSocketError {
  return new SceneWebSocketError(SceneWebSocketErrors.HANDSHAKE_FAILED_ERROR_TYPE, message);
}

function transportLost(message: string): SceneWebSocketError {
  return new SceneWebSocketError(SceneWebSocketErrors.TRANSPORT_LOST_ERROR_TYPE, message);
}

/**
 * A server side WebSocket over an accepted TCP socket. Only the framing this protocol needs is
 * implemented: no extensions, no subprotocols, and no automatic ping replies.
 */
export class SceneWebSocket {
  private readonly frames = new AsyncQueue<SceneWebSocketFrame>();
  private readonly decoder: FrameDecoder;
  private readonly chunkLimit: number;
  private closed = false;

  private constructor(
    private readonly socket: Socket,
    options: SceneWebSocketOptions,
  ) {
    this.decoder = new FrameDecoder(options.maxPayloadLength ?? DEFAULT_MAX_PAYLOAD_LENGTH);
    this.chunkLimit = options.maxFramePayload ?? socket.writableHighWaterMark;
    socket.setNoDelay(true);
    socket.on("error", (error) => {
      this.frames.close(transportLost(`Socket error: ${error.message}`));
    });
  }

  /**
   * Reads the upgrade request from `socket` and answers it. On failure the socket is destroyed
   * and the returned promise rejects with a `HANDSHAKE_FAILED` error, or `CancelledError` when
   * `signal` fires first.
   */
  public static async accept(
    socket: Socket,
    options: SceneWebSocketOptions = {},
    signal?: AbortSignal,
  ): Promise<SceneWebSocket> {
    const webSocket = new SceneWebSocket(socket, options);
    try {
      await webSocket.handshake(options.maxHandshakeBytes ?? DEFAULT_MAX_HANDSHAKE_BYTES, signal);
    } catch (error) {
      socket.destroy();
      throw error;
    }
    return webSocket;
  }

  public get remoteAddress(): string {
    return `${this.socket.remoteAddress ?? "unknown"}:${this.socket.remotePort ?? 0}`;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves with the next message, closing or ping frame. Rejects with a transport error once
   * the connection fails or ends, or with `CancelledError` when `signal` fires.
   */
  public receive(signal?: AbortSignal): Promise<SceneWebSocketFrame> {
    return this.frames.dequeue(signal);
  }

  public async send(bytes: Uint8Array, lastMessage = true): Promise<void> {
    if (this.closed) {
      throw transportLost("WebSocket is closed");
    }
    for (const frame of encodeFrames(bytes, this.chunkLimit, lastMessage)) {
      await this.write(frame);
    }
  }

  public async pong(payload: Uint8Array = new Uint8Array(0)): Promise<void> {
    if (this.closed) {
      throw transportLost("WebSocket is closed");
    }
    await this.write(encodeControlFrame(PongOpcode, payload));
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.frames.close(transportLost("WebSocket closed locally"));
    if (this.socket.destroyed || !this.socket.writable) {
      this.socket.destroy();
      return;
    }
    try {
      await this.write(NORMAL_CLOSE_FRAME);
    } finally {
      this.socket.end();
    }
  }

  private write(bytes: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.socket.write(bytes, (error) => {
        if (error) {
          reject(transportLost(`Write failed: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  private async handshake(maxHandshakeBytes: number, signal?: AbortSignal): Promise<void> {
    const { head, rest } = await this.readHandshake(maxHandshakeBytes, signal);
    const request = parseHandshakeRequest(head);
    if (request instanceof Error) {
      throw request;
    }
    await this.write(Buffer.from(buildHandshakeResponse(computeAcceptKey(request.key)), "utf8"));

    this.socket.on("data", (chunk: Buffer) => this.onBytes(chunk));
    this.socket.once("end", () => this.frames.close(transportLost("Connection ended by peer")));
    this.socket.once("close", () => this.frames.close(transportLost("Connection closed")));
    this.onBytes(rest);
    this.socket.resume();
  }

  private readHandshake(
    maxHandshakeBytes: number,
    signal?: AbortSignal,
  ): Promise<{ head: string; rest: Buffer }> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }
      let received = Buffer.alloc(0);

      const cleanup = () => {
        this.socket.off("data", onData);
        this.socket.off("end", onEnd);
        this.socket.off("close", onEnd);
        this.socket.off("error", onError);
        signal?.removeEventListener("abort", onAbort);
      };
      const fail = (error: Error) => {
        cleanup();
        reject(error);
      };
      const onData = (chunk: Buffer) => {
        received = Buffer.concat([received, chunk]);
        const end = received.indexOf(HEADER_TERMINATOR);
        if (end !== -1 && end + HEADER_TERMINATOR.length <= maxHandshakeBytes) {
          // Frames that follow the request are read once the decoder is listening
          this.socket.pause();
          cleanup();
          resolve({
            head: received.subarray(0, end).toString("utf8"),
            rest: received.subarray(end + HEADER_TERMINATOR.length),
          });
        } else if (end !== -1 || received.length > maxHandshakeBytes) {
          fail(handshakeFailed(`Handshake request exceeds ${maxHandshakeBytes} bytes`));
        }
      };
      const onEnd = () => fail(handshakeFailed("Connection ended during handshake"));
      const onError = (error: Error) =>
        fail(handshakeFailed(`Socket error during handshake: ${error.message}`));
      const onAbort = () => fail(new CancelledError());

      this.socket.on("data", onData);
      this.socket.once("end", onEnd);
      this.socket.once("close", onEnd);
      this.socket.once("error", onError);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private onBytes(bytes: Uint8Array): void {
    this.decoder.push(bytes);
    for (;;) {
      const frame = this.decoder.nextFrame();
      if (frame === null) {
        return;
      }
      if (frame instanceof Error) {
        this.frames.close(frame);
        this.closed = true;
        this.socket.destroy();
        return;
      }
      this.frames.enqueue(frame);
    }
  }
}
