import { CborValue, ComponentContent, isCborValue } from "../../../cbor";
import { ComponentCategory, componentMessageTypes } from "../../../componentCategories";
import { decodeObjectId, encodeObjectId, ObjectId } from "../../../ObjectId";

/**
 * Announces a new component. The content carries the component's `id`.
 */
export type SceneNetV01CreateMessage = {
  type: "create";
  category: ComponentCategory;
  content: ComponentContent;
};

/**
 * Keys to upsert into an existing component. Keys absent from the delta keep their value.
 */
export type SceneNetV01UpdateMessage = {
  type: "update";
  category: ComponentCategory;
  id: ObjectId;
  delta: ComponentContent;
};

export type SceneNetV01DeleteMessage = {
  type: "delete";
  category: ComponentCategory;
  id: ObjectId;
};

export function encodeCreate(message: SceneNetV01CreateMessage): [number, CborValue] {
  return [componentMessageTypes[message.category].create, message.content];
}

export function encodeUpdate(message: SceneNetV01UpdateMessage): [number, CborValue] {
  const updateType = componentMessageTypes[message.category].update;
  if (updateType === null) {
    throw new Error(`Components of category ${message.category} cannot be updated`);
  }
  return [updateType, { ...message.delta, id: encodeObjectId(message.id) }];
}

export function encodeDelete(message: SceneNetV01DeleteMessage): [number, CborValue] {
  return [componentMessageTypes[message.category].delete, { id: encodeObjectId(message.id) }];
}

function asContent(payload: unknown): ComponentContent | Error {
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    return new Error("Component payload must be a map");
  }
  const content: ComponentContent = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!isCborValue(value)) {
      return new Error(`Component payload key ${key} holds an unsupported value`);
    }
    content[key] = value;
  }
  return content;
}

export function decodeCreate(
  category: ComponentCategory,
  payload: unknown,
): SceneNetV01CreateMessage | Error {
  const content = asContent(payload);
  if (content instanceof Error) {
    return content;
  }
  return { type: "create", category, content };
}

export function decodeUpdate(
  category: ComponentCategory,
  payload: unknown,
): SceneNetV01UpdateMessage | Error {
  const content = asContent(payload);
  if (content instanceof Error) {
    return content;
  }
  const { id: wireId, ...delta } = content;
  const id = decodeObjectId(wireId);
  if (id instanceof Error) {
    return id;
  }
  return { type: "update", category, id, delta };
}

export function decodeDelete(
  category: ComponentCategory,
  payload: unknown,
): SceneNetV01DeleteMessage | Error {
  const content = asContent(payload);
  if (content instanceof Error) {
    return content;
  }
  const id = decodeObjectId(content.id);
  if (id instanceof Error) {
    return id;
  }
  return { type: "delete", category, id };
}
