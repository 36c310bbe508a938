/**
 * Binary min-heap used as the A* frontier.
 *
 * There is no decrease-key: callers push a fresh entry when a priority
 * improves and discard stale entries when they are popped. Ties between
 * equal keys fall back to a caller-supplied secondary key, then to push
 * order (earlier first), so the pop sequence is deterministic.
 */

interface HeapEntry<T> {
  key: number;
  tieBreak: number;
  seq: number;
  value: T;
}

export class MinHeap<T> {
  private readonly entries: HeapEntry<T>[] = [];
  private nextSeq = 0;

  get size(): number {
    return this.entries.length;
  }

  push(key: number, value: T, tieBreak = 0): void {
    this.entries.push({ key, tieBreak, seq: this.nextSeq++, value });
    this.up(this.entries.length - 1);
  }

  pop(): { key: number; value: T } | undefined {
    const top = this.entries[0];
    const last = this.entries.pop();
    if (!top || !last) return undefined;
    if (this.entries.length > 0) {
      this.entries[0] = last;
      this.down(0);
    }
    return { key: top.key, value: top.value };
  }

  private less(i: number, j: number): boolean {
    const a = this.entries[i];
    const b = this.entries[j];
    if (!a || !b) return false;
    if (a.key !== b.key) return a.key < b.key;
    if (a.tieBreak !== b.tieBreak) return a.tieBreak < b.tieBreak;
    return a.seq < b.seq;
  }

  private swap(i: number, j: number): void {
    const a = this.entries[i];
    const b = this.entries[j];
    if (!a || !b) return;
    this.entries[i] = b;
    this.entries[j] = a;
  }

  private up(i: number): void {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(i, p)) break;
      this.swap(i, p);
      i = p;
    }
  }

  private down(i: number): void {
    const n = this.entries.length;
    while (true) {
      let m = i;
      const l = i * 2 + 1;
      const r = l + 1;
      if (l < n && this.less(l, m)) m = l;
      if (r < n && this.less(r, m)) m = r;
      if (m === i) break;
      this.swap(m, i);
      i = m;
    }
  }
}
