/** Half-open byte range `[start, end)`. */
export type Interval = Readonly<{
  start: number;
  end: number;
}>;

/** Adjacent intervals merge too, not just overlapping ones. */
export function canMerge(a: Interval, b: Interval): boolean {
  return (a.start <= b.start && b.start <= a.end) || (b.start <= a.start && a.start <= b.end);
}

/**
 * Tracks which bytes of the image a parse has claimed. Linear scan per add;
 * the stores used here hold at most a few hundred ranges.
 */
export class IntervalStore {
  private intervals: Interval[] = [];

  public add(start: number, end: number): void {
    if (end < start) throw new Error(`Invalid interval [${start}, ${end})`);

    let merged: Interval = { start, end };
    const kept: Interval[] = [];
    for (const iv of this.intervals) {
      if (canMerge(iv, merged)) {
        merged = { start: Math.min(iv.start, merged.start), end: Math.max(iv.end, merged.end) };
      } else {
        kept.push(iv);
      }
    }
    kept.push(merged);
    this.intervals = kept;
  }

  /** Sorted copy of the merged ranges. */
  public getIntervals(): Interval[] {
    return [...this.intervals].sort((a, b) => a.start - b.start || a.end - b.end);
  }

  /** Unclaimed ranges between the first start and the last end. */
  public gaps(): Interval[] {
    const sorted = this.getIntervals();
    const out: Interval[] = [];
    for (let i = 1; i < sorted.length; i++) {
      out.push({ start: sorted[i - 1]!.end, end: sorted[i]!.start });
    }
    return out;
  }
}
