export * from "./AssetHost";
export * from "./ComponentList";
export * from "./ConnectionRegistry";
export * from "./IdentifierAllocator";
export * from "./OutboundDispatcher";
export * from "./OutboundEnvelope";
export * from "./RegisteredBuffer";
export * from "./RegisteredTexture";
export * from "./ReplicatedObjectCache";
export * from "./SceneNetClient";
export * from "./SceneNetLogger";
export * from "./SceneNetServer";
export * from "./SceneNetServerError";
export * from "./SceneWorld";
