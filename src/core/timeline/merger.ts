import type { TimelineEntry } from '../../types/index.js';

export const MERGE_GAP_SECONDS = 1.0;

/**
 * Coalesce neighbouring entries that show the same slide with less than
 * a second between them. The first entry's confidence is kept.
 */
export function mergeConsecutiveSlides(timeline: TimelineEntry[]): TimelineEntry[] {
  if (timeline.length === 0) {
    return [];
  }

  const merged: TimelineEntry[] = [];
  let current: TimelineEntry = { ...timeline[0] };

  for (const next of timeline.slice(1)) {
    const sameSlide = current.slide.index === next.slide.index;
    const contiguous = Math.abs(next.startTime - current.endTime) < MERGE_GAP_SECONDS;

    if (sameSlide && contiguous) {
      current.endTime = next.endTime;
      current.duration = current.endTime - current.startTime;
      current.speechText = `${current.speechText} ${next.speechText}`;
    } else {
      merged.push(current);
      current = { ...next };
    }
  }

  merged.push(current);
  return merged;
}
