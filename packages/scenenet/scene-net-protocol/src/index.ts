export * from "./cbor";
export * from "./componentCategories";
export * from "./contents";
export * from "./ObjectId";
export * from "./scene-net-v0.1/decodeClientMessage";
export * from "./scene-net-v0.1/decodeServerMessages";
export * from "./scene-net-v0.1/encodeClientMessages";
export * from "./scene-net-v0.1/encodeServerMessages";
export * from "./scene-net-v0.1/envelope";
export * from "./scene-net-v0.1/messages";
export * from "./scene-net-v0.1/messageTypes";
