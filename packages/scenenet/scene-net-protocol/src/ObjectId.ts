/**
 * Largest uint32. Reserved: an identity holding it in either field refers to no object.
 */
export const OBJECT_ID_SENTINEL = 0xffffffff;

/**
 * Identity of a replicated object. The slot is reused once its previous occupant is deleted; the
 * generation tells successive occupants of the same slot apart.
 */
export type ObjectId = {
  readonly slot: number;
  readonly gen: number;
};

/** The `[slot, gen]` pair an {@link ObjectId} is written as on the wire. */
export type ObjectIdWire = [number, number];

export const NULL_OBJECT_ID: ObjectId = Object.freeze({
  slot: OBJECT_ID_SENTINEL,
  gen: OBJECT_ID_SENTINEL,
});

export function objectIdEquals(a: ObjectId, b: ObjectId): boolean {
  return a.slot === b.slot && a.gen === b.gen;
}

export function isNullObjectId(id: ObjectId): boolean {
  return id.slot === OBJECT_ID_SENTINEL || id.gen === OBJECT_ID_SENTINEL;
}

/**
 * Stable string form usable as a Map key, since two equal ids are distinct objects.
 */
export function objectIdKey(id: ObjectId): string {
  return `${id.slot}/${id.gen}`;
}

export function encodeObjectId(id: ObjectId): ObjectIdWire {
  return [id.slot, id.gen];
}

function isUint32(value: unknown): value is number {
  return (
    typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= OBJECT_ID_SENTINEL
  );
}

export function decodeObjectId(value: unknown): ObjectId | Error {
  if (!Array.isArray(value) || value.length !== 2) {
    return new Error("Object id must be a two element array");
  }
  const [slot, gen]: Array<unknown> = value;
  if (!isUint32(slot) || !isUint32(gen)) {
    return new Error(`Object id fields must be uint32 values, got [${String(slot)}, ${String(gen)}]`);
  }
  return { slot, gen };
}
