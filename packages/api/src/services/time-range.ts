export interface TimeRange {
  start: Date;
  end: Date;
}

/**
 * Half-open [start, end) overlap test.
 *
 * Covers an existing range containing the new start, containing the new end,
 * or lying entirely inside the new range. Touching ends do not overlap.
 */
export function rangesOverlap(a: TimeRange, b: TimeRange): boolean {
  return !(a.end.getTime() <= b.start.getTime() || a.start.getTime() >= b.end.getTime());
}

/** Whether `range` starts before `now`. */
export function startsInPast(range: TimeRange, now: Date): boolean {
  return range.start.getTime() < now.getTime();
}
