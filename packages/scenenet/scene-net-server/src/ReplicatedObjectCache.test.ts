import { jest } from "@jest/globals";

import { ReplicatedObjectCache } from "./ReplicatedObjectCache";

type FakeObject = { name: string; dispose: jest.Mock<() => void> };

function fakeObject(name: string): FakeObject {
  return { name, dispose: jest.fn<() => void>() };
}

describe("ReplicatedObjectCache", () => {
  test("the factory runs once per key", () => {
    const cache = new ReplicatedObjectCache<string, FakeObject>();
    const factory = jest.fn((key: string) => fakeObject(key));
    const first = cache.getOrCreate("mesh", factory);
    const second = cache.getOrCreate("mesh", factory);
    expect(second).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(cache.get("mesh")).toBe(first);
    expect(cache.get("other")).toBeNull();
  });

  test("invalidate disposes and forgets the entry", () => {
    const cache = new ReplicatedObjectCache<string, FakeObject>();
    const first = cache.getOrCreate("mesh", fakeObject);
    expect(cache.invalidate("mesh")).toBe(true);
    expect(first.dispose).toHaveBeenCalledTimes(1);
    expect(cache.invalidate("mesh")).toBe(false);

    const rebuilt = cache.getOrCreate("mesh", fakeObject);
    expect(rebuilt).not.toBe(first);
  });

  test("clear disposes every entry", () => {
    const cache = new ReplicatedObjectCache<number, FakeObject>();
    const objects = [1, 2, 3].map((key) => cache.getOrCreate(key, (k) => fakeObject(`object ${k}`)));
    cache.clear();
    expect(cache.size).toEqual(0);
    for (const object of objects) {
      expect(object.dispose).toHaveBeenCalledTimes(1);
    }
  });
});
