import { describe, expect, it } from "vitest";
import { MinHeap } from "../utils/MinHeap/MinHeap";

describe("MinHeap", () => {
  it("pops the smallest key first", () => {
    const heap = new MinHeap<string>();
    heap.push(5, "five");
    heap.push(1, "one");
    heap.push(3, "three");
    expect(heap.size()).toBe(3);
    expect([heap.pop(), heap.pop(), heap.pop()]).toEqual(["one", "three", "five"]);
  });

  it("returns undefined when empty", () => {
    const heap = new MinHeap<number>();
    expect(heap.pop()).toBeUndefined();
    expect(heap.size()).toBe(0);
  });

  it("breaks ties by insertion order", () => {
    const heap = new MinHeap<string>();
    heap.push(2, "a");
    heap.push(1, "x");
    heap.push(2, "b");
    heap.push(2, "c");
    expect([heap.pop(), heap.pop(), heap.pop(), heap.pop()]).toEqual(["x", "a", "b", "c"]);
  });

  it("stays ordered over many interleaved keys", () => {
    const heap = new MinHeap<number>();
    for (let i = 0; i < 30; i++) heap.push(i % 4, i);
    const expected = Array.from({ length: 30 }, (_, i) => i).sort(
      (a, b) => a % 4 - b % 4 || a - b
    );
    const popped: number[] = [];
    for (let v = heap.pop(); v !== undefined; v = heap.pop()) popped.push(v);
    expect(popped).toEqual(expected);
  });
});
