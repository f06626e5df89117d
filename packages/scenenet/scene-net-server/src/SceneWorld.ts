import {
  BufferContent,
  BufferViewContent,
  ComponentCategory,
  EntityContent,
  GeometryContent,
  ImageContent,
  MaterialContent,
  SceneNetV01ServerMessage,
  snapshotCategoryOrder,
  TextureContent,
} from "@scenenet/scene-net-protocol";
import { AsyncQueue } from "@scenenet/scene-net-websocket";

import { ComponentList } from "./ComponentList";
import { OutboundEnvelope } from "./OutboundEnvelope";

type AnyComponentList =
  | ComponentList<BufferContent>
  | ComponentList<BufferViewContent>
  | ComponentList<ImageContent>
  | ComponentList<TextureContent>
  | ComponentList<MaterialContent>
  | ComponentList<GeometryContent>
  | ComponentList<EntityContent>;

/**
 * The replicated scene: one component list per category, all posting to the same outbound
 * queue.
 */
export class SceneWorld {
  public readonly buffers: ComponentList<BufferContent>;
  public readonly bufferViews: ComponentList<BufferViewContent>;
  public readonly images: ComponentList<ImageContent>;
  public readonly textures: ComponentList<TextureContent>;
  public readonly materials: ComponentList<MaterialContent>;
  public readonly geometries: ComponentList<GeometryContent>;
  public readonly entities: ComponentList<EntityContent>;

  private readonly lists: Record<ComponentCategory, AnyComponentList>;

  constructor(outbound: AsyncQueue<OutboundEnvelope>) {
    this.buffers = new ComponentList("buffer", outbound);
    this.bufferViews = new ComponentList("bufferView", outbound);
    this.images = new ComponentList("image", outbound);
    this.textures = new ComponentList("texture", outbound);
    this.materials = new ComponentList("material", outbound);
    this.geometries = new ComponentList("geometry", outbound);
    this.entities = new ComponentList("entity", outbound);
    this.lists = {
      buffer: this.buffers,
      bufferView: this.bufferViews,
      image: this.images,
      texture: this.textures,
      material: this.materials,
      geometry: this.geometries,
      entity: this.entities,
    };
  }

  public get componentCount(): number {
    let count = 0;
    for (const category of snapshotCategoryOrder) {
      count += this.lists[category].size;
    }
    return count;
  }

  // Create messages for the whole scene, referenced categories before the ones referencing them
  public snapshotAll(): Array<SceneNetV01ServerMessage> {
    const messages: Array<SceneNetV01ServerMessage> = [];
    for (const category of snapshotCategoryOrder) {
      messages.push(...this.lists[category].snapshot());
    }
    return messages;
  }

  public disposeAll(): void {
    for (const category of [...snapshotCategoryOrder].reverse()) {
      this.lists[category].disposeAll();
    }
  }
}
