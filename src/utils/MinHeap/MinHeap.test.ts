import { describe, expect, it } from "vitest";
import { MinHeap } from "./MinHeap";

type Item = { k: number; seq: number };

describe("MinHeap", () => {
  it("pops in comparator order", () => {
    const heap = new MinHeap<Item>((a, b) => (a.k !== b.k ? a.k < b.k : a.seq < b.seq));
    const keys = [5, 1, 4, 1, 3, 9, 2];
    keys.forEach((k, seq) => heap.push({ k, seq }));

    const out: Item[] = [];
    for (let item = heap.pop(); item; item = heap.pop()) out.push(item);

    expect(out.map((i) => i.k)).toEqual([1, 1, 2, 3, 4, 5, 9]);
    // equal keys come out in insertion order
    expect(out.slice(0, 2).map((i) => i.seq)).toEqual([1, 3]);
  });

  it("reports size and peeks without removing", () => {
    const heap = new MinHeap<Item>((a, b) => a.k < b.k);
    expect(heap.pop()).toBeUndefined();
    expect(heap.peek()).toBeUndefined();

    heap.push({ k: 2, seq: 0 });
    heap.push({ k: 1, seq: 1 });

    expect(heap.size()).toBe(2);
    expect(heap.peek()).toEqual({ k: 1, seq: 1 });
    expect(heap.size()).toBe(2);
  });
});
