import { jest } from "@jest/globals";
import { encodeCbor } from "@scenenet/scene-net-protocol";

import { SceneAuthority, SceneNetServer, SceneNetServerError } from "../src";
import { MockMessageSocket } from "./mock.message-socket";
import { createTestLogger, flushAsync, TestLogger } from "./test-utils";

let currentServer: SceneNetServer | null = null;
let logger: TestLogger;

function startServer(authority?: SceneAuthority): SceneNetServer {
  logger = createTestLogger();
  const server = new SceneNetServer({ authority, closeTimeoutMs: 200 }, logger);
  server.start();
  currentServer = server;
  return server;
}

// Reads what clients have sent, then handles it on a tick
async function tick(server: SceneNetServer): Promise<void> {
  await flushAsync();
  server.tick();
}

afterEach(async () => {
  if (currentServer) {
    await currentServer.stop();
    currentServer = null;
  }
});

describe("SceneNetServer", () => {
  test("an introduction is answered with the scene and the client becomes active", async () => {
    const server = startServer();
    const root = server.world.entities.register({ name: "root" });
    server.world.materials.register({ name: "paint", pbr_info: { base_color: [1, 0, 0, 1] } });

    const socket = new MockMessageSocket();
    const client = server.addConnection(socket);
    expect(server.registry.stateOf(client.id)).toEqual("pending");

    socket.sendToServer([{ type: "introduction", clientName: "viewer" }]);
    await tick(server);

    expect(await socket.waitForTotalMessageCount(3)).toEqual([
      {
        type: "create",
        category: "material",
        content: { name: "paint", pbr_info: { base_color: [1, 0, 0, 1] }, id: [0, 0] },
      },
      { type: "create", category: "entity", content: { name: "root", id: [0, 0] } },
      { type: "snapshotComplete" },
    ]);
    expect(socket.sent.length).toEqual(1);
    expect(server.registry.stateOf(client.id)).toEqual("active");

    root.patch({ transform: [2, 0, 0, 0, 0, 2, 0, 0, 0, 0, 2, 0, 0, 0, 0, 1] });
    expect((await socket.waitForTotalMessageCount(4))[3]).toEqual({
      type: "update",
      category: "entity",
      id: { slot: 0, gen: 0 },
      delta: { transform: [2, 0, 0, 0, 0, 2, 0, 0, 0, 0, 2, 0, 0, 0, 0, 1] },
    });
  });

  test("pending clients receive no broadcasts", async () => {
    const server = startServer();
    const viewer = new MockMessageSocket();
    const lurker = new MockMessageSocket();
    server.addConnection(viewer);
    server.addConnection(lurker);

    viewer.sendToServer([{ type: "introduction", clientName: "viewer" }]);
    await tick(server);
    await viewer.waitForTotalMessageCount(1);

    server.world.entities.register({ name: "late" });
    await viewer.waitForTotalMessageCount(2);
    expect(lurker.sent).toEqual([]);

    lurker.sendToServer([{ type: "introduction", clientName: "lurker" }]);
    await tick(server);
    expect(await lurker.waitForTotalMessageCount(2)).toEqual([
      { type: "create", category: "entity", content: { name: "late", id: [0, 0] } },
      { type: "snapshotComplete" },
    ]);
  });

  test("every active client receives identical bytes", async () => {
    const server = startServer();
    const sockets = [new MockMessageSocket(), new MockMessageSocket(), new MockMessageSocket()];
    for (const [index, socket] of sockets.entries()) {
      server.addConnection(socket);
      socket.sendToServer([{ type: "introduction", clientName: `viewer ${index}` }]);
    }
    await tick(server);
    for (const socket of sockets) {
      await socket.waitForTotalMessageCount(1);
    }

    server.world.buffers.register({ size: 2, inline_bytes: Uint8Array.of(1, 2) });
    for (const socket of sockets) {
      await socket.waitForTotalMessageCount(2);
    }
    const [first, second, third] = sockets.map((socket) => socket.sent[1]);
    expect(second).toEqual(first);
    expect(third).toEqual(first);
  });

  test("invoke payloads go to the authority", async () => {
    const onInvoke = jest.fn<SceneAuthority["onInvoke"]>();
    const server = startServer({ onInvoke });
    const socket = new MockMessageSocket();
    const client = server.addConnection(socket);

    socket.sendToServer([{ type: "invoke", payload: { method: [3, 0], args: ["go"] } }]);
    await tick(server);

    expect(onInvoke).toHaveBeenCalledWith(client.id, { method: [3, 0], args: ["go"] });
  });

  test("a failing invoke does not stop other messages in the same tick", async () => {
    const onInvoke = jest.fn<SceneAuthority["onInvoke"]>(() => {
      throw new Error("authority rejected payload");
    });
    const server = startServer({ onInvoke });
    const failingSocket = new MockMessageSocket();
    const failing = server.addConnection(failingSocket);
    const viewerSocket = new MockMessageSocket();
    const viewer = server.addConnection(viewerSocket);

    failingSocket.sendToServer([{ type: "invoke", payload: "explode" }]);
    viewerSocket.sendToServer([{ type: "introduction", clientName: "viewer" }]);
    await flushAsync();
    expect(() => server.tick()).not.toThrow();

    expect(await viewerSocket.waitForTotalMessageCount(1)).toEqual([{ type: "snapshotComplete" }]);
    expect(server.registry.stateOf(viewer.id)).toEqual("active");
    expect(server.registry.stateOf(failing.id)).toEqual("pending");
    expect(logger.error).toHaveBeenCalledWith(
      new SceneNetServerError(
        "INVOKE_FAILED",
        `Invoke from client ${failing.id} failed: authority rejected payload`,
      ),
    );
    expect(logger.error.mock.calls[0][0]).toMatchObject({ errorType: "INVOKE_FAILED" });
  });

  test("several pairs in one message are handled in order", async () => {
    const onInvoke = jest.fn<SceneAuthority["onInvoke"]>();
    const server = startServer({ onInvoke });
    const socket = new MockMessageSocket();
    const client = server.addConnection(socket);

    socket.sendBytesToServer(
      encodeCbor([7, { ignored: true }, 1, "first", 0, { client_name: "viewer" }, 1, "second", 1]),
    );
    await tick(server);

    expect(onInvoke.mock.calls).toEqual([
      [client.id, "first"],
      [client.id, "second"],
    ]);
    expect(await socket.waitForTotalMessageCount(1)).toEqual([{ type: "snapshotComplete" }]);
    expect(logger.debug).toHaveBeenCalledWith(`Ignoring message type 7 from client ${client.id}`);
    expect(logger.warn).toHaveBeenCalledWith(
      `Message from client ${client.id} stopped early: truncated`,
    );
  });

  test("an invalid introduction is skipped", async () => {
    const server = startServer();
    const socket = new MockMessageSocket();
    const client = server.addConnection(socket);

    socket.sendBytesToServer(encodeCbor([0, { name: "no client_name" }]));
    await tick(server);

    expect(server.registry.stateOf(client.id)).toEqual("pending");
    expect(logger.warn.mock.calls[0][0]).toMatchObject({ errorType: "INVALID_MESSAGE" });
  });

  test("a message split over several frames is reassembled", async () => {
    const server = startServer();
    const socket = new MockMessageSocket();
    const client = server.addConnection(socket);

    const bytes = encodeCbor([0, { client_name: "fragmented viewer" }]);
    socket.sendBytesToServer(bytes.subarray(0, 5), false);
    socket.sendFrameToServer({ kind: "ping", payload: Uint8Array.of(9), fin: true });
    socket.sendBytesToServer(bytes.subarray(5), true);
    await tick(server);

    expect(await socket.waitForTotalMessageCount(1)).toEqual([{ type: "snapshotComplete" }]);
    expect(server.registry.stateOf(client.id)).toEqual("active");
    expect(socket.pongs).toEqual([Uint8Array.of(9)]);
  });

  test("a message that is not an array ends the connection", async () => {
    const server = startServer();
    const socket = new MockMessageSocket();
    const client = server.addConnection(socket);

    socket.sendBytesToServer(encodeCbor({ client_name: "viewer" }));
    await flushAsync();

    expect(socket.closed).toBe(true);
    expect(server.registry.stateOf(client.id)).toBeNull();
    expect(client.isDisconnected).toBe(true);
  });

  test("undecodable bytes end the connection", async () => {
    const server = startServer();
    const socket = new MockMessageSocket();
    server.addConnection(socket);

    socket.sendBytesToServer(Uint8Array.of(0x82, 0x00));
    await flushAsync();

    expect(socket.closed).toBe(true);
    expect(server.registry.size).toEqual(0);
  });

  test("a close frame ends the connection", async () => {
    const server = startServer();
    const socket = new MockMessageSocket();
    const client = server.addConnection(socket);

    socket.sendFrameToServer({ kind: "closing", payload: Uint8Array.of(0x03, 0xe8), fin: true });
    await flushAsync();

    expect(socket.closed).toBe(true);
    expect(server.registry.size).toEqual(0);
    expect(logger.info).toHaveBeenCalledWith(`Client ${client.id} closed the connection`);
  });

  test("a lost connection removes only that client", async () => {
    const server = startServer();
    const staying = new MockMessageSocket();
    const leaving = new MockMessageSocket();
    server.addConnection(staying);
    const gone = server.addConnection(leaving);
    staying.sendToServer([{ type: "introduction", clientName: "staying" }]);
    leaving.sendToServer([{ type: "introduction", clientName: "leaving" }]);
    await tick(server);
    await leaving.waitForTotalMessageCount(1);

    leaving.dropConnection();
    await flushAsync();
    expect(server.registry.stateOf(gone.id)).toBeNull();

    server.world.entities.register({ name: "after" });
    expect((await staying.waitForTotalMessageCount(2))[1]).toMatchObject({ type: "create" });
    expect(leaving.sent.length).toEqual(1);
  });

  test("a failing send disconnects the client", async () => {
    const server = startServer();
    const socket = new MockMessageSocket();
    const client = server.addConnection(socket);
    socket.breakSends();

    socket.sendToServer([{ type: "introduction", clientName: "viewer" }]);
    await tick(server);
    await flushAsync();

    expect(client.isDisconnected).toBe(true);
    expect(server.registry.size).toEqual(0);
  });

  test("stop deletes every component on active clients and closes them", async () => {
    const server = startServer();
    const socket = new MockMessageSocket();
    server.addConnection(socket);
    server.world.entities.register({ name: "a" });
    server.world.buffers.register({ size: 0, inline_bytes: new Uint8Array(0) });
    socket.sendToServer([{ type: "introduction", clientName: "viewer" }]);
    await tick(server);
    await socket.waitForTotalMessageCount(3);

    await server.stop();
    currentServer = null;

    expect(socket.receivedMessages().slice(3)).toEqual([
      { type: "delete", category: "entity", id: { slot: 0, gen: 0 } },
      { type: "delete", category: "buffer", id: { slot: 0, gen: 0 } },
    ]);
    expect(socket.closed).toBe(true);
    expect(server.registry.size).toEqual(0);
    expect(() => server.addConnection(new MockMessageSocket())).toThrow(
      "This SceneNetServer has been stopped",
    );
  });
});
