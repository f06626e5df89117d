import {
  BufferCreateMessageType,
  BufferDeleteMessageType,
  BufferViewCreateMessageType,
  BufferViewDeleteMessageType,
  EntityCreateMessageType,
  EntityDeleteMessageType,
  EntityUpdateMessageType,
  GeometryCreateMessageType,
  GeometryDeleteMessageType,
  ImageCreateMessageType,
  ImageDeleteMessageType,
  MaterialCreateMessageType,
  MaterialDeleteMessageType,
  MaterialUpdateMessageType,
  TextureCreateMessageType,
  TextureDeleteMessageType,
} from "./scene-net-v0.1/messageTypes";

export type ComponentCategory =
  | "buffer"
  | "bufferView"
  | "image"
  | "texture"
  | "material"
  | "geometry"
  | "entity";

export type ComponentMessageTypes = {
  create: number;
  // null for categories whose components are immutable once created
  update: number | null;
  delete: number;
};

export const componentMessageTypes: Readonly<Record<ComponentCategory, ComponentMessageTypes>> = {
  buffer: { create: BufferCreateMessageType, update: null, delete: BufferDeleteMessageType },
  bufferView: {
    create: BufferViewCreateMessageType,
    update: null,
    delete: BufferViewDeleteMessageType,
  },
  image: { create: ImageCreateMessageType, update: null, delete: ImageDeleteMessageType },
  texture: { create: TextureCreateMessageType, update: null, delete: TextureDeleteMessageType },
  material: {
    create: MaterialCreateMessageType,
    update: MaterialUpdateMessageType,
    delete: MaterialDeleteMessageType,
  },
  geometry: { create: GeometryCreateMessageType, update: null, delete: GeometryDeleteMessageType },
  entity: {
    create: EntityCreateMessageType,
    update: EntityUpdateMessageType,
    delete: EntityDeleteMessageType,
  },
};

/**
 * Order in which categories are dumped to a new client. Anything a component can reference
 * (a view's buffer, a texture's image, an entity's geometry) comes before it.
 */
export const snapshotCategoryOrder: ReadonlyArray<ComponentCategory> = [
  "buffer",
  "bufferView",
  "image",
  "texture",
  "material",
  "geometry",
  "entity",
];

export type ComponentMessageKind = "create" | "update" | "delete";

const categoryByMessageType = new Map<number, [ComponentCategory, ComponentMessageKind]>();
for (const category of snapshotCategoryOrder) {
  const types = componentMessageTypes[category];
  categoryByMessageType.set(types.create, [category, "create"]);
  if (types.update !== null) {
    categoryByMessageType.set(types.update, [category, "update"]);
  }
  categoryByMessageType.set(types.delete, [category, "delete"]);
}

export function lookupComponentMessageType(
  messageType: number,
): [ComponentCategory, ComponentMessageKind] | null {
  return categoryByMessageType.get(messageType) ?? null;
}
