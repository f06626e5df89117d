import { once } from "node:events";

import { jest } from "@jest/globals";
import {
  decodeServerMessages,
  encodeClientMessages,
  SceneNetV01ServerMessage,
} from "@scenenet/scene-net-protocol";
import WebSocket from "ws";

import { SceneNetConfig } from "../src/config";
import { SceneNetService } from "../src/SceneNetService";
import { createQuietLogger, waitUntil } from "./test-utils";

const config: SceneNetConfig = {
  host: "127.0.0.1",
  port: 0,
  assetPort: 0,
  maxPayloadLength: 1_000_000,
  inlineLimit: 4,
  tickMs: 10,
};

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) {
    return new Uint8Array(Buffer.concat(data));
  }
  return new Uint8Array(data);
}

let service: SceneNetService | null = null;
const clients: Array<WebSocket> = [];

afterEach(async () => {
  for (const client of clients.splice(0)) {
    client.terminate();
  }
  if (service) {
    await service.stop();
    service = null;
  }
});

describe("SceneNetService", () => {
  test("replicates the scene and hosts large buffers over HTTP", async () => {
    const onInvoke = jest.fn<(clientId: string, payload: unknown) => void>();
    const started = new SceneNetService(config, { logger: createQuietLogger(), authority: { onInvoke } });
    service = started;
    const { port, assetPort } = await started.start();

    const hosted = started.registerBuffer(Uint8Array.of(1, 2, 3, 4, 5, 6));
    expect(hosted.isInline).toEqual(false);

    const client = new WebSocket(`ws://127.0.0.1:${port}`);
    clients.push(client);
    const received: Array<Array<SceneNetV01ServerMessage>> = [];
    client.on("message", (data) => {
      received.push(decodeServerMessages(toBytes(data)));
    });
    await once(client, "open");

    client.send(encodeClientMessages([{ type: "introduction", clientName: "viewer" }]));
    await waitUntil(() => received.length === 1, "snapshot");
    expect(received[0]).toEqual([
      {
        type: "create",
        category: "buffer",
        content: {
          size: 6,
          uri_bytes: { scheme: "http", path: hosted.assetIdentity, port: String(assetPort) },
          id: [0, 0],
        },
      },
      { type: "snapshotComplete" },
    ]);

    const response = await fetch(`http://127.0.0.1:${assetPort}/${hosted.assetIdentity}`);
    expect(Array.from(new Uint8Array(await response.arrayBuffer()))).toEqual([1, 2, 3, 4, 5, 6]);

    client.send(encodeClientMessages([{ type: "invoke", payload: { action: "select" } }]));
    await waitUntil(() => onInvoke.mock.calls.length === 1, "invoke");
    expect(onInvoke.mock.calls[0][1]).toEqual({ action: "select" });

    const closed = once(client, "close");
    await started.stop();
    const [code] = await closed;
    expect(code).toEqual(1000);
    expect(received[received.length - 1]).toEqual([
      { type: "delete", category: "buffer", id: { slot: 0, gen: 0 } },
    ]);
  });

  test("small buffers travel inline", async () => {
    const started = new SceneNetService(config, { logger: createQuietLogger() });
    service = started;
    await started.start();

    const inline = started.registerBuffer(Uint8Array.of(5, 6));
    expect(inline.isInline).toEqual(true);
    expect(inline.component.read()).toEqual({ size: 2, inline_bytes: Uint8Array.of(5, 6), id: [0, 0] });
    expect(started.assetServer.assetCount).toEqual(0);
  });

  test("stopping removes hosted assets of registered buffers and textures", async () => {
    const started = new SceneNetService(config, { logger: createQuietLogger() });
    service = started;
    await started.start();

    const buffer = started.registerBuffer(Uint8Array.of(1, 2, 3, 4, 5));
    const texture = started.registerTexture(Uint8Array.of(0x89, 0x50, 0x4e, 0x47, 0x0d));
    expect(started.assetServer.assetCount).toEqual(2);

    await started.stop();
    expect(started.assetServer.assetCount).toEqual(0);
    expect(buffer.component.isDisposed).toBe(true);
    expect(texture.buffer.component.isDisposed).toBe(true);
    expect(started.world.componentCount).toEqual(0);
  });

  test("cannot be started twice", async () => {
    const started = new SceneNetService(config, { logger: createQuietLogger() });
    service = started;
    await started.start();
    await expect(started.start()).rejects.toThrow("SceneNetService has already been started");
  });
});
