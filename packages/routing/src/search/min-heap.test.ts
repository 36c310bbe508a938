import { describe, it, expect } from "vitest";
import { MinHeap } from "./min-heap.js";

function drain<T>(heap: MinHeap<T>): T[] {
  const out: T[] = [];
  for (let entry = heap.pop(); entry; entry = heap.pop()) {
    out.push(entry.value);
  }
  return out;
}

describe("MinHeap", () => {
  it("pops in ascending key order", () => {
    const heap = new MinHeap<string>();
    for (const [key, value] of [[5, "e"], [1, "a"], [4, "d"], [2, "b"], [3, "c"]] as const) {
      heap.push(key, value);
    }
    expect(heap.size).toBe(5);
    expect(drain(heap)).toEqual(["a", "b", "c", "d", "e"]);
    expect(heap.size).toBe(0);
  });

  it("returns undefined when empty", () => {
    expect(new MinHeap<number>().pop()).toBeUndefined();
  });

  it("breaks key ties by the secondary key", () => {
    const heap = new MinHeap<string>();
    heap.push(10, "far", 8);
    heap.push(10, "near", 2);
    heap.push(10, "middle", 5);
    expect(drain(heap)).toEqual(["near", "middle", "far"]);
  });

  it("falls back to push order when both keys tie", () => {
    const heap = new MinHeap<string>();
    heap.push(1, "first");
    heap.push(1, "second");
    heap.push(0, "zero");
    heap.push(1, "third");
    expect(drain(heap)).toEqual(["zero", "first", "second", "third"]);
  });

  it("keeps duplicate values as separate entries", () => {
    const heap = new MinHeap<string>();
    heap.push(7, "X");
    heap.push(3, "X");
    expect(heap.pop()).toEqual({ key: 3, value: "X" });
    expect(heap.pop()).toEqual({ key: 7, value: "X" });
  });
});
