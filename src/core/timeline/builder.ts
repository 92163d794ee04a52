import { ValidationError } from '../errors.js';
import type { PipelineCallbacks } from '../events.js';
import type { MatchCandidate, SlideCorpus, TimelineEntry } from '../../types/index.js';

function checkCandidate(
  match: MatchCandidate,
  slideCount: number,
  duration: number,
  previousStart: number | undefined
): string | null {
  if (!Number.isInteger(match.slideIndex) || match.slideIndex < 0 || match.slideIndex >= slideCount) {
    return `slide index ${match.slideIndex} is outside [0, ${slideCount})`;
  }
  if (match.startTime < 0) {
    return `start time ${match.startTime}s is negative`;
  }
  if (match.endTime > duration) {
    return `end time ${match.endTime}s exceeds audio duration ${duration}s`;
  }
  if (match.endTime <= match.startTime) {
    return `empty range ${match.startTime}s - ${match.endTime}s`;
  }
  if (previousStart !== undefined && match.startTime < previousStart) {
    return `start time ${match.startTime}s precedes previous entry at ${previousStart}s`;
  }
  return null;
}

/**
 * Turn match candidates into timeline entries, 1:1 and in order.
 * Invalid candidates are reported through `onValidationError` and dropped.
 */
export function buildTimeline(
  matches: MatchCandidate[],
  corpus: SlideCorpus,
  duration: number,
  callbacks: PipelineCallbacks = {}
): TimelineEntry[] {
  const timeline: TimelineEntry[] = [];

  matches.forEach((match, i) => {
    const previous = timeline[timeline.length - 1];
    const problem = checkCandidate(match, corpus.length, duration, previous?.startTime);

    if (problem) {
      callbacks.onValidationError?.(new ValidationError(`Dropped match ${i}: ${problem}`, i));
      return;
    }

    timeline.push({
      startTime: match.startTime,
      endTime: match.endTime,
      duration: match.endTime - match.startTime,
      slide: corpus[match.slideIndex],
      speechText: match.segmentText,
      confidence: match.confidence,
    });
  });

  return timeline;
}
