import type { ClipSpec, TimelineEntry } from '../../types/index.js';

export const MIN_CLIP_SECONDS = 1.0;

// Display durations are floored here, at the hand-off to the compositor.
export function planClips(timeline: TimelineEntry[], minSeconds: number = MIN_CLIP_SECONDS): ClipSpec[] {
  return timeline.map((entry) => ({
    slidePath: entry.slide.path,
    slideName: entry.slide.name,
    start: entry.startTime,
    duration: Math.max(entry.duration, minSeconds),
  }));
}
