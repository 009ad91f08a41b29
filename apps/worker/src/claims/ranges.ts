/**
 * Range batcher
 *
 * Groups pending segments into maximal runs of consecutive sequence numbers
 * whose receipts are complete. An incomplete segment ends the run before it
 * and is left out of every range; it stays pending for a later cycle.
 */

import type { SegmentRange } from "./types";

export function makeRanges(
  pending: Iterable<number>,
  isComplete: (seqNo: number) => boolean
): SegmentRange[] {
  const seqNos = [...pending].sort((a, b) => a - b);
  const ranges: SegmentRange[] = [];
  let start: number | null = null;

  for (let i = 0; i < seqNos.length; i++) {
    const seqNo = seqNos[i];

    if (!isComplete(seqNo)) {
      // Only a complete, contiguous predecessor can be open here
      if (start !== null) {
        ranges.push([start, seqNos[i - 1]]);
        start = null;
      }
      continue;
    }

    if (start === null) {
      start = seqNo;
    }

    const isLast = i + 1 === seqNos.length;
    if (isLast || seqNos[i + 1] !== seqNo + 1) {
      ranges.push([start, seqNo]);
      start = null;
    }
  }

  return ranges;
}

export function rangeLength(range: SegmentRange): number {
  return range[1] - range[0] + 1;
}

export function* seqNosIn(range: SegmentRange): Generator<number> {
  for (let seqNo = range[0]; seqNo <= range[1]; seqNo++) {
    yield seqNo;
  }
}
