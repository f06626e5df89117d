import { OBJECT_ID_SENTINEL, ObjectId } from "@scenenet/scene-net-protocol";

/**
 * Hands out slot/generation identities for one component category. Released slots are reused
 * most recent first, each reuse bumping the generation. A slot whose next generation would be
 * the sentinel is retired instead.
 */
export class IdentifierAllocator {
  private highWater = 0;
  private freeList: Array<ObjectId> = [];

  public get slotCount(): number {
    return this.highWater;
  }

  public get freeCount(): number {
    return this.freeList.length;
  }

  public allocate(): ObjectId {
    const released = this.freeList.pop();
    if (released !== undefined && released.gen + 1 < OBJECT_ID_SENTINEL) {
      return { slot: released.slot, gen: released.gen + 1 };
    }
    if (this.highWater >= OBJECT_ID_SENTINEL) {
      throw new RangeError("Identifier slots exhausted");
    }
    return { slot: this.highWater++, gen: 0 };
  }

  // Each allocated id must be released at most once
  public release(id: ObjectId): void {
    this.freeList.push(id);
  }
}
