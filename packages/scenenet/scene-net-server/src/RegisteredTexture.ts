import {
  BufferViewContent,
  ImageContent,
  ObjectId,
  TextureContent,
} from "@scenenet/scene-net-protocol";

import { AssetHost } from "./AssetHost";
import { SceneComponent } from "./ComponentList";
import { RegisteredBuffer, RegisteredBufferOptions } from "./RegisteredBuffer";
import { SceneWorld } from "./SceneWorld";

export type RegisteredTextureOptions = RegisteredBufferOptions;

/**
 * An encoded image (PNG, JPEG) published as buffer, buffer view, image and texture components.
 * The texture is what materials reference.
 */
export class RegisteredTexture {
  private disposed = false;

  private constructor(
    public readonly buffer: RegisteredBuffer,
    public readonly bufferView: SceneComponent<BufferViewContent>,
    public readonly image: SceneComponent<ImageContent>,
    public readonly texture: SceneComponent<TextureContent>,
  ) {}

  public static create(
    world: SceneWorld,
    encodedImage: Uint8Array,
    assetHost: AssetHost,
    options: RegisteredTextureOptions = {},
  ): RegisteredTexture {
    const buffer = RegisteredBuffer.create(world, encodedImage, assetHost, options);
    const bufferView = world.bufferViews.register({
      source_buffer: buffer.component.wireId,
      type: "IMAGE",
      offset: 0,
      length: encodedImage.length,
    });
    const image = world.images.register({ buffer_source: bufferView.wireId });
    const texture = world.textures.register({
      ...(options.name !== undefined ? { name: options.name } : {}),
      image: image.wireId,
    });
    return new RegisteredTexture(buffer, bufferView, image, texture);
  }

  public get id(): ObjectId {
    return this.texture.id;
  }

  // Referencing components go first
  public dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.texture.dispose();
    this.image.dispose();
    this.bufferView.dispose();
    this.buffer.dispose();
  }
}
