import {
  RegisteredBuffer,
  RegisteredBufferOptions,
  RegisteredTexture,
  RegisteredTextureOptions,
  SceneAuthority,
  SceneNetConsoleLogger,
  SceneNetLogger,
  SceneNetServer,
  SceneWorld,
} from "@scenenet/scene-net-server";
import { CancelledError, SceneWebSocketServer } from "@scenenet/scene-net-websocket";

import { SceneNetConfig } from "./config";
import { HttpAssetServer } from "./HttpAssetServer";

export type SceneNetServiceOptions = {
  authority?: SceneAuthority;
  logger?: SceneNetLogger;
};

export type SceneNetServiceAddress = {
  port: number;
  assetPort: number;
};

/**
 * Wires the WebSocket listener, the replication server, the tick timer and the asset server
 * together.
 */
export class SceneNetService {
  public readonly server: SceneNetServer;
  public readonly assetServer: HttpAssetServer;

  private readonly logger: SceneNetLogger;
  private readonly webSocketServer: SceneWebSocketServer;
  private readonly abortController = new AbortController();
  private tickInterval: NodeJS.Timeout | null = null;
  private acceptLoop: Promise<void> | null = null;
  private stopPromise: Promise<void> | null = null;
  // Released before the world is cleared so hosted assets are removed too
  private readonly registered: Array<RegisteredBuffer | RegisteredTexture> = [];

  constructor(
    private readonly config: SceneNetConfig,
    options: SceneNetServiceOptions = {},
  ) {
    this.logger = options.logger ?? new SceneNetConsoleLogger();
    this.server = new SceneNetServer(
      { authority: options.authority, maxMessageLength: config.maxPayloadLength },
      this.logger,
    );
    this.assetServer = new HttpAssetServer(config.assetPort, this.logger);
    this.webSocketServer = new SceneWebSocketServer({
      maxPayloadLength: config.maxPayloadLength,
      onHandshakeFailure: (error, remoteAddress) => {
        this.logger.warn(`Handshake with ${remoteAddress} failed: ${error.message}`);
      },
    });
  }

  public get world(): SceneWorld {
    return this.server.world;
  }

  public registerBuffer(bytes: Uint8Array, options: RegisteredBufferOptions = {}): RegisteredBuffer {
    const buffer = RegisteredBuffer.create(this.world, bytes, this.assetServer, {
      inlineLimit: this.config.inlineLimit,
      ...options,
    });
    this.registered.push(buffer);
    return buffer;
  }

  public registerTexture(
    encodedImage: Uint8Array,
    options: RegisteredTextureOptions = {},
  ): RegisteredTexture {
    const texture = RegisteredTexture.create(this.world, encodedImage, this.assetServer, {
      inlineLimit: this.config.inlineLimit,
      ...options,
    });
    this.registered.push(texture);
    return texture;
  }

  public async start(): Promise<SceneNetServiceAddress> {
    if (this.acceptLoop !== null) {
      throw new Error("SceneNetService has already been started");
    }
    const assetPort = await this.assetServer.listen(this.config.host);
    const { port } = await this.webSocketServer.listen(this.config.port, this.config.host);
    this.server.start();
    this.acceptLoop = this.acceptConnections(this.abortController.signal);
    this.tickInterval = setInterval(() => {
      this.server.tick();
    }, this.config.tickMs);
    this.logger.info(`Scene replication listening on ws://${this.config.host}:${port}/`);
    return { port, assetPort };
  }

  public stop(): Promise<void> {
    if (this.stopPromise === null) {
      this.stopPromise = this.shutdown();
    }
    return this.stopPromise;
  }

  private async shutdown(): Promise<void> {
    if (this.tickInterval !== null) {
      clearInterval(this.tickInterval);
      this.tickInterval = null;
    }
    this.abortController.abort();
    await this.acceptLoop;
    for (const registered of this.registered.splice(0).reverse()) {
      registered.dispose();
    }
    await this.server.stop();
    await this.webSocketServer.stop();
    await this.assetServer.stop();
    this.logger.info("Scene replication stopped");
  }

  private async acceptConnections(signal: AbortSignal): Promise<void> {
    for (;;) {
      try {
        const webSocket = await this.webSocketServer.nextClient(signal);
        this.server.addConnection(webSocket);
      } catch (error) {
        if (!(error instanceof CancelledError)) {
          this.logger.error("Accepting connections failed", error);
        }
        return;
      }
    }
  }
}
