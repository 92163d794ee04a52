import { describe, it, expect } from 'vitest';
import { fallbackMatches, FALLBACK_CONFIDENCE, FALLBACK_REASON } from './fallback.js';
import { describeSlide } from '../ingest/slides.js';
import type { Transcript } from '../../types/index.js';

const corpus = [
  describeSlide(0, 'slides/01.png', 'Welcome'),
  describeSlide(1, 'slides/02.png', 'Topic A'),
  describeSlide(2, 'slides/03.png', 'Topic B'),
];

const transcript: Transcript = {
  duration: 100,
  segments: [
    { start: 0, end: 30, text: 'intro' },
    { start: 30, end: 70, text: 'topicA' },
    { start: 70, end: 100, text: 'topicB' },
  ],
};

describe('fallbackMatches', () => {
  it('assigns slides by the proportion of elapsed audio', () => {
    const matches = fallbackMatches(transcript, corpus);
    expect(matches.map((m) => m.slideIndex)).toEqual([0, 0, 2]);
  });

  it('copies segment times and text with the low confidence', () => {
    const [first] = fallbackMatches(transcript, corpus);
    expect(first).toEqual({
      slideIndex: 0,
      startTime: 0,
      endTime: 30,
      confidence: FALLBACK_CONFIDENCE,
      reason: FALLBACK_REASON,
      segmentText: 'intro',
    });
    expect(FALLBACK_CONFIDENCE).toBe(0.6);
  });

  it('never points past the last slide', () => {
    const late: Transcript = {
      duration: 10,
      segments: [{ start: 9.99, end: 10, text: 'bye' }],
    };
    expect(fallbackMatches(late, corpus)[0].slideIndex).toBe(2);
  });

  it('returns identical results for identical input', () => {
    expect(fallbackMatches(transcript, corpus)).toEqual(fallbackMatches(transcript, corpus));
  });

  it('returns no matches for an empty transcript or corpus', () => {
    expect(fallbackMatches({ duration: 0, segments: [] }, corpus)).toEqual([]);
    expect(fallbackMatches(transcript, [])).toEqual([]);
  });
});
