import type { MatchCandidate, SlideCorpus, Transcript } from '../../types/index.js';

export const FALLBACK_CONFIDENCE = 0.6;
export const FALLBACK_REASON = 'Assigned by position in the audio timeline';

/**
 * Spread slides evenly over the audio: a segment goes to the slide whose
 * share of the timeline contains the segment's start.
 */
export function fallbackMatches(transcript: Transcript, corpus: SlideCorpus): MatchCandidate[] {
  const slideCount = corpus.length;
  if (transcript.segments.length === 0 || slideCount === 0 || transcript.duration <= 0) {
    return [];
  }

  return transcript.segments.map((segment) => {
    const progress = segment.start / transcript.duration;
    const slideIndex = Math.min(Math.floor(progress * slideCount), slideCount - 1);

    return {
      slideIndex,
      startTime: segment.start,
      endTime: segment.end,
      confidence: FALLBACK_CONFIDENCE,
      reason: FALLBACK_REASON,
      segmentText: segment.text,
    };
  });
}
