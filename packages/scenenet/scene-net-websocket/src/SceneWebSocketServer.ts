import { AddressInfo, createServer, Server, Socket } from "node:net";

import { AsyncQueue } from "./AsyncQueue";
import { CancelledError } from "./errors";
import { SceneWebSocket, SceneWebSocketOptions } from "./SceneWebSocket";

export type SceneWebSocketServerOptions = SceneWebSocketOptions & {
  // Called when a connection fails its handshake. The socket has already been destroyed
  onHandshakeFailure?: (error: Error, remoteAddress: string) => void;
};

/**
 * Listens for TCP connections and upgrades them. Handshakes run concurrently; completed
 * connections are handed out in order by `nextClient`.
 */
export class SceneWebSocketServer {
  private server: Server | null = null;
  private readonly accepted = new AsyncQueue<SceneWebSocket>();
  private readonly sockets = new Set<Socket>();
  private readonly abortController = new AbortController();

  constructor(private readonly options: SceneWebSocketServerOptions = {}) {}

  public listen(port: number, host = "0.0.0.0"): Promise<AddressInfo> {
    if (this.server !== null) {
      return Promise.reject(new Error("SceneWebSocketServer is already listening"));
    }
    const server = createServer((socket) => this.onConnection(socket));
    this.server = server;
    return new Promise<AddressInfo>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        const address = server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("Listener did not bind to a TCP address"));
          return;
        }
        resolve(address);
      });
    });
  }

  public address(): AddressInfo | null {
    const address = this.server?.address();
    if (address === undefined || address === null || typeof address === "string") {
      return null;
    }
    return address;
  }

  /**
   * Resolves with the next connection that completed its handshake. Rejects with
   * `CancelledError` when `signal` fires or the server stops.
   */
  public nextClient(signal?: AbortSignal): Promise<SceneWebSocket> {
    return this.accepted.dequeue(signal);
  }

  public stop(): Promise<void> {
    this.abortController.abort();
    this.accepted.close(new CancelledError("SceneWebSocketServer stopped"));
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
    const server = this.server;
    this.server = null;
    if (server === null) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  private onConnection(socket: Socket): void {
    if (this.abortController.signal.aborted) {
      socket.destroy();
      return;
    }
    const remoteAddress = `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;
    this.sockets.add(socket);
    socket.once("close", () => {
      this.sockets.delete(socket);
    });

    SceneWebSocket.accept(socket, this.options, this.abortController.signal).then(
      (webSocket) => {
        if (!this.accepted.enqueue(webSocket)) {
          socket.destroy();
        }
      },
      (error: unknown) => {
        if (error instanceof CancelledError) {
          return;
        }
        const failure = error instanceof Error ? error : new Error(String(error));
        this.options.onHandshakeFailure?.(failure, remoteAddress);
      },
    );
  }
}
