import type { SlideDescriptor } from './slides.js';

export type AlignmentStrategy = 'guided' | 'fallback';

export interface MatchCandidate {
  slideIndex: number;
  startTime: number;
  endTime: number;
  confidence: number;
  reason: string;
  segmentText: string;
}

export interface AlignmentResult {
  strategy: AlignmentStrategy;
  matches: MatchCandidate[];
}

export interface TimelineEntry {
  startTime: number;
  endTime: number;
  duration: number;
  slide: SlideDescriptor;
  speechText: string;
  confidence: number;
}

export interface ClipSpec {
  slidePath: string;
  slideName: string;
  start: number;
  /**
   * Never below the minimum display duration. The compositor holds each slide
   * until the next clip starts, so only the last clip's duration is rendered.
   */
  duration: number;
}
