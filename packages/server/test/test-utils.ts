import { jest } from "@jest/globals";
import { SceneNetLogFunction, SceneNetLogger } from "@scenenet/scene-net-server";

export function waitUntil(checkFn: () => boolean, message?: string): Promise<void> {
  return new Promise((resolve, reject) => {
    if (checkFn()) {
      resolve();
      return;
    }
    const started = Date.now();
    const interval = setInterval(() => {
      if (checkFn()) {
        clearInterval(interval);
        resolve();
      } else if (Date.now() - started > 3000) {
        clearInterval(interval);
        reject(new Error(`waitUntil timed out${message ? `: ${message}` : ""}`));
      }
    }, 10);
  });
}

export function createQuietLogger(): SceneNetLogger {
  return {
    trace: jest.fn<SceneNetLogFunction>(),
    debug: jest.fn<SceneNetLogFunction>(),
    info: jest.fn<SceneNetLogFunction>(),
    warn: jest.fn<SceneNetLogFunction>(),
    error: jest.fn<SceneNetLogFunction>(),
  };
}
