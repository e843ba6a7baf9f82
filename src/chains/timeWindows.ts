import { ChainLeg } from './chainLeg';

/**
 * Partition legs into opening-time windows. Timestamped legs are sorted and a new
 * window starts whenever the gap to the previous leg exceeds the threshold. Legs
 * without a timestamp each get a singleton window, appended after the timed ones.
 */
export const groupByTimeWindows = (legs: ChainLeg[], thresholdMs: number): ChainLeg[][] => {
  const timed = legs
    .filter((l): l is ChainLeg & { createdAtMs: number } => l.createdAtMs !== undefined)
    .sort((a, b) => a.createdAtMs - b.createdAtMs);
  const windows: ChainLeg[][] = [];
  let current: ChainLeg[] = [];
  let previous: number | undefined;
  for (const leg of timed) {
    if (previous !== undefined && leg.createdAtMs - previous > thresholdMs) {
      windows.push(current);
      current = [];
    }
    current.push(leg);
    previous = leg.createdAtMs;
  }
  if (current.length) windows.push(current);
  legs.filter((l) => l.createdAtMs === undefined).forEach((l) => windows.push([l]));
  return windows;
};
