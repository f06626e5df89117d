import { randomUUID } from "node:crypto";

import { BufferContent, ObjectId } from "@scenenet/scene-net-protocol";

import { AssetHost } from "./AssetHost";
import { SceneComponent } from "./ComponentList";
import { SceneWorld } from "./SceneWorld";

export const DEFAULT_INLINE_LIMIT = 1024;

export type RegisteredBufferOptions = {
  // Payloads up to this many bytes travel inside the create message
  inlineLimit?: number;
  name?: string;
};

/**
 * A buffer component together with the asset that holds its bytes when they are too large to
 * send inline.
 */
export class RegisteredBuffer {
  private disposed = false;

  private constructor(
    public readonly component: SceneComponent<BufferContent>,
    private readonly assetHost: AssetHost,
    public readonly assetIdentity: string | null,
  ) {}

  public static create(
    world: SceneWorld,
    bytes: Uint8Array,
    assetHost: AssetHost,
    options: RegisteredBufferOptions = {},
  ): RegisteredBuffer {
    const inlineLimit = options.inlineLimit ?? DEFAULT_INLINE_LIMIT;
    const named = options.name !== undefined ? { name: options.name } : {};
    if (bytes.length <= inlineLimit) {
      const component = world.buffers.register({
        ...named,
        size: bytes.length,
        inline_bytes: bytes,
      });
      return new RegisteredBuffer(component, assetHost, null);
    }

    const identity = randomUUID();
    const { path, port } = assetHost.install(identity, bytes);
    const component = world.buffers.register({
      ...named,
      size: bytes.length,
      uri_bytes: { scheme: "http", path, port: String(port) },
    });
    return new RegisteredBuffer(component, assetHost, identity);
  }

  public get id(): ObjectId {
    return this.component.id;
  }

  public get isInline(): boolean {
    return this.assetIdentity === null;
  }

  public dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.component.dispose();
    if (this.assetIdentity !== null) {
      this.assetHost.remove(this.assetIdentity);
    }
  }
}
