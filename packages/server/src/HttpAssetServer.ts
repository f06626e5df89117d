import { Server } from "node:http";

import { AssetHost, InstalledAsset, SceneNetConsoleLogger, SceneNetLogger } from "@scenenet/scene-net-server";
import cors from "cors";
import express from "express";

/**
 * Serves installed assets at `GET /<identity>` to any origin.
 */
export class HttpAssetServer implements AssetHost {
  public readonly app: express.Express;
  private readonly assets = new Map<string, Uint8Array>();
  private server: Server | null = null;
  private boundPort: number;

  constructor(
    port: number,
    private readonly logger: SceneNetLogger = new SceneNetConsoleLogger(),
  ) {
    this.boundPort = port;
    this.app = express();
    this.app.use(cors({ origin: "*", maxAge: 3600, optionsSuccessStatus: 200 }));
    this.app.get("/:identity", (req: express.Request, res: express.Response) => {
      const { identity } = req.params;
      const bytes = this.assets.get(identity);
      if (bytes === undefined) {
        this.logger.debug(`Asset ${identity} not found`);
        res.status(404).end();
        return;
      }
      res.type("application/octet-stream");
      res.send(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.length));
    });
  }

  public get port(): number {
    return this.boundPort;
  }

  public get assetCount(): number {
    return this.assets.size;
  }

  // Resolves with the bound port
  public listen(host = "0.0.0.0"): Promise<number> {
    if (this.server !== null) {
      return Promise.reject(new Error("HttpAssetServer is already listening"));
    }
    return new Promise<number>((resolve, reject) => {
      const server = this.app.listen(this.boundPort, host);
      this.server = server;
      server.once("error", reject);
      server.once("listening", () => {
        server.off("error", reject);
        const address = server.address();
        if (address !== null && typeof address !== "string") {
          this.boundPort = address.port;
        }
        this.logger.info(`Asset server listening on http://${host}:${this.boundPort}/`);
        resolve(this.boundPort);
      });
    });
  }

  public install(identity: string, bytes: Uint8Array): InstalledAsset {
    this.logger.debug(`Installing asset ${identity} (${bytes.length} bytes)`);
    this.assets.set(identity, bytes);
    return { path: identity, port: this.boundPort };
  }

  public remove(identity: string): void {
    this.logger.debug(`Removing asset ${identity}`);
    this.assets.delete(identity);
  }

  public stop(): Promise<void> {
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
      server.closeAllConnections();
    });
  }
}
