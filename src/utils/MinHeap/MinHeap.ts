export class MinHeap<T extends object> {
  private a: T[] = [];
  constructor(private less: (x: T, y: T) => boolean) {}
  size() {
    return this.a.length;
  }
  push(v: T) {
    this.a.push(v);
    this.bubbleUp(this.a.length - 1);
  }
  pop(): T | undefined {
    const top = this.a[0];
    const last = this.a.pop();
    if (this.a.length && last !== undefined) {
      this.a[0] = last;
      this.bubbleDown(0);
    }
    return top;
  }
  peek(): T | undefined {
    return this.a[0];
  }
  private bubbleUp(i: number) {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(this.a[i], this.a[p])) break;
      [this.a[p], this.a[i]] = [this.a[i], this.a[p]];
      i = p;
    }
  }
  private bubbleDown(i: number) {
    const n = this.a.length;
    while (true) {
      const l = i * 2 + 1,
        r = l + 1;
      let m = i;
      if (l < n && this.less(this.a[l], this.a[m])) m = l;
      if (r < n && this.less(this.a[r], this.a[m])) m = r;
      if (m === i) break;
      [this.a[m], this.a[i]] = [this.a[i], this.a[m]];
      i = m;
    }
  }
}
