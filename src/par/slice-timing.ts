import { roundTo } from './values';

/**
 * Philips "interleaved ascending from bottom" acquisition order, as 0-based
 * slice indices: odd 1-based positions first (1, 3, 5, ...), then even ones.
 */
export function interleavedAcquisitionOrder(sliceCount: number): number[] {
  const order: number[] = [];
  for (let slice = 1; slice <= sliceCount; slice += 2) order.push(slice - 1);
  for (let slice = 2; slice <= sliceCount; slice += 2) order.push(slice - 1);
  return order;
}

/**
 * Acquisition offset of each physical slice within one TR (seconds, 6 decimals).
 * The k-th slice acquired starts at k * TR / n.
 */
export function computeSliceTiming(repetitionTime: number, sliceCount: number): number[] {
  if (!Number.isInteger(sliceCount) || sliceCount < 1) {
    throw new RangeError(`Slice count must be a positive integer, got ${sliceCount}`);
  }

  const timePerSlice = repetitionTime / sliceCount;
  const timing = new Array<number>(sliceCount).fill(0);

  interleavedAcquisitionOrder(sliceCount).forEach((sliceIndex, rank) => {
    timing[sliceIndex] = roundTo(rank * timePerSlice, 6);
  });

  return timing;
}
