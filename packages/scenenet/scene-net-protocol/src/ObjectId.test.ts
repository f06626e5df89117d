import {
  decodeObjectId,
  encodeObjectId,
  isNullObjectId,
  NULL_OBJECT_ID,
  OBJECT_ID_SENTINEL,
  objectIdEquals,
  objectIdKey,
} from "./ObjectId";

describe("ObjectId", () => {
  test("ids are equal only when both fields match", () => {
    expect(objectIdEquals({ slot: 3, gen: 1 }, { slot: 3, gen: 1 })).toBe(true);
    expect(objectIdEquals({ slot: 3, gen: 1 }, { slot: 3, gen: 2 })).toBe(false);
    expect(objectIdEquals({ slot: 3, gen: 1 }, { slot: 4, gen: 1 })).toBe(false);
  });

  test("the sentinel in either field means no object", () => {
    expect(isNullObjectId(NULL_OBJECT_ID)).toBe(true);
    expect(isNullObjectId({ slot: OBJECT_ID_SENTINEL, gen: 0 })).toBe(true);
    expect(isNullObjectId({ slot: 0, gen: OBJECT_ID_SENTINEL })).toBe(true);
    expect(isNullObjectId({ slot: 0, gen: 0 })).toBe(false);
  });

  test("keys distinguish generations of the same slot", () => {
    expect(objectIdKey({ slot: 7, gen: 0 })).toEqual("7/0");
    expect(objectIdKey({ slot: 7, gen: 1 })).toEqual("7/1");
  });

  test("wire form is a slot, generation pair", () => {
    expect(encodeObjectId({ slot: 12, gen: 5 })).toEqual([12, 5]);
    expect(decodeObjectId([12, 5])).toEqual({ slot: 12, gen: 5 });
    expect(decodeObjectId(encodeObjectId(NULL_OBJECT_ID))).toEqual(NULL_OBJECT_ID);
  });

  test("rejects malformed wire ids", () => {
    expect(decodeObjectId([1])).toBeInstanceOf(Error);
    expect(decodeObjectId({ slot: 1, gen: 2 })).toBeInstanceOf(Error);
    expect(decodeObjectId([1, -1])).toBeInstanceOf(Error);
    expect(decodeObjectId([1.5, 0])).toBeInstanceOf(Error);
    expect(decodeObjectId([OBJECT_ID_SENTINEL + 1, 0])).toBeInstanceOf(Error);
  });
});
