import {
  ComponentCategory,
  ComponentContent,
  ComponentMessageTypes,
  componentMessageTypes,
  encodeObjectId,
  ObjectId,
  objectIdKey,
  ObjectIdWire,
  SceneNetV01CreateMessage,
  SceneNetV01ServerMessage,
} from "@scenenet/scene-net-protocol";
import { AsyncQueue } from "@scenenet/scene-net-websocket";

import { IdentifierAllocator } from "./IdentifierAllocator";
import { broadcastEnvelope, OutboundEnvelope } from "./OutboundEnvelope";
import { SceneNetServerError, SceneNetServerErrors } from "./SceneNetServerError";

export type StoredContent<T extends ComponentContent> = T & { id: ObjectIdWire };

export type ContentDelta<T extends ComponentContent> = Partial<T> & ComponentContent;

/**
 * A live replicated object. Its content is only changed through `patch`, and it leaves the
 * scene when `dispose` is called.
 */
export class SceneComponent<T extends ComponentContent> {
  private disposed = false;

  constructor(
    public readonly id: ObjectId,
    private content: StoredContent<T>,
    private readonly list: ComponentList<T>,
  ) {}

  public get category(): ComponentCategory {
    return this.list.category;
  }

  public get isDisposed(): boolean {
    return this.disposed;
  }

  public get wireId(): ObjectIdWire {
    return encodeObjectId(this.id);
  }

  // Deep copy; changing it does not change the component
  public read(): StoredContent<T> {
    return structuredClone(this.content);
  }

  /**
   * Upserts every key of `delta` and broadcasts exactly those keys. The `id` key cannot be
   * changed.
   */
  public patch(delta: ContentDelta<T>): void {
    if (this.disposed) {
      throw new SceneNetServerError(
        SceneNetServerErrors.COMPONENT_DISPOSED_ERROR_TYPE,
        `Cannot patch ${this.category} ${objectIdKey(this.id)} after it was disposed`,
      );
    }
    if (this.list.messageTypes.update === null) {
      throw new SceneNetServerError(
        SceneNetServerErrors.PATCH_NOT_SUPPORTED_ERROR_TYPE,
        `Components of category ${this.category} cannot be patched`,
      );
    }
    const copy = structuredClone(delta);
    this.content = { ...this.content, ...copy, id: this.content.id };
    this.list.post({ type: "update", category: this.category, id: this.id, delta: copy });
  }

  public dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.list.release(this);
  }

  public toCreateMessage(): SceneNetV01CreateMessage {
    return { type: "create", category: this.category, content: { ...this.content } };
  }
}

/**
 * Live components of one category. Every change is posted to the outbound queue as a
 * broadcast envelope.
 */
export class ComponentList<T extends ComponentContent> {
  public readonly messageTypes: ComponentMessageTypes;
  private readonly allocator = new IdentifierAllocator();
  private readonly active = new Map<string, SceneComponent<T>>();

  constructor(
    public readonly category: ComponentCategory,
    private readonly outbound: AsyncQueue<OutboundEnvelope>,
  ) {
    this.messageTypes = componentMessageTypes[category];
  }

  public get size(): number {
    return this.active.size;
  }

  public register(content: T): SceneComponent<T> {
    const id = this.allocator.allocate();
    const stored: StoredContent<T> = { ...structuredClone(content), id: encodeObjectId(id) };
    const component = new SceneComponent(id, stored, this);
    this.active.set(objectIdKey(id), component);
    this.post(component.toCreateMessage());
    return component;
  }

  public get(id: ObjectId): SceneComponent<T> | null {
    return this.active.get(objectIdKey(id)) ?? null;
  }

  public components(): Array<SceneComponent<T>> {
    return Array.from(this.active.values());
  }

  // Create messages for every live component, oldest first
  public snapshot(): Array<SceneNetV01CreateMessage> {
    return this.components().map((component) => component.toCreateMessage());
  }

  public disposeAll(): void {
    for (const component of this.components()) {
      component.dispose();
    }
  }

  public post(message: SceneNetV01ServerMessage): void {
    this.outbound.enqueue(broadcastEnvelope([message]));
  }

  public release(component: SceneComponent<T>): void {
    const key = objectIdKey(component.id);
    if (this.active.get(key) !== component) {
      return;
    }
    this.active.delete(key);
    this.allocator.release(component.id);
    this.post({ type: "delete", category: this.category, id: component.id });
  }
}
