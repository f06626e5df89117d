export * from "./AsyncQueue";
export * from "./errors";
export * from "./frames";
export * from "./handshake";
export * from "./SceneWebSocket";
export * from "./SceneWebSocketServer";
