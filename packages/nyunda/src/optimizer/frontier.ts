/**
 * Min-heap frontier for the optimizer search. Lower score pops first;
 * equal scores pop in insertion order.
 *
 * @module optimizer/frontier
 */

interface Entry<T> {
  item: T;
  score: number;
  seq: number;
}

export class PriorityFrontier<T> {
  private readonly heap: Entry<T>[] = [];
  private seq = 0;

  constructor(private readonly scoreOf: (item: T) => number) {}

  push(item: T): void {
    this.heap.push({ item, score: this.scoreOf(item), seq: this.seq++ });
    let i = this.heap.length - 1;
    while (i > 0) {
      const p = Math.floor((i - 1) / 2);
      if (!this.before(this.heap[i], this.heap[p])) break;
      [this.heap[p], this.heap[i]] = [this.heap[i], this.heap[p]];
      i = p;
    }
  }

  pop(): T | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;

    if (this.heap.length > 0) {
      this.heap[0] = last;
      let i = 0;
      while (true) {
        const l = 2 * i + 1;
        const r = 2 * i + 2;
        let m = i;
        if (l < this.heap.length && this.before(this.heap[l], this.heap[m])) m = l;
        if (r < this.heap.length && this.before(this.heap[r], this.heap[m])) m = r;
        if (m === i) break;
        [this.heap[i], this.heap[m]] = [this.heap[m], this.heap[i]];
        i = m;
      }
    }
    return top.item;
  }

  private before(a: Entry<T>, b: Entry<T>): boolean {
    return a.score < b.score || (a.score === b.score && a.seq < b.seq);
  }
}
