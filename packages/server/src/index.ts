import dotenv from "dotenv";

import { SceneNetConsoleLogger } from "@scenenet/scene-net-server";

import { loadSceneNetConfig } from "./config";
import { SceneNetService } from "./SceneNetService";

dotenv.config();

const logger = new SceneNetConsoleLogger();

async function main(): Promise<void> {
  const config = loadSceneNetConfig();
  const service = new SceneNetService(config, {
    logger,
    authority: {
      onInvoke: (clientId, payload) => {
        logger.info(`Invoke from client ${clientId}`, payload);
      },
    },
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    service.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  const { port, assetPort } = await service.start();
  logger.info(`Listening on port ${port}, assets on port ${assetPort}`);
}

main().catch((error: unknown) => {
  logger.error("Failed to start", error);
  process.exit(1);
});
