import type { ReasoningService } from '../gemini/client.js';
import {
  createAlignmentSystemPrompt,
  createAlignmentUserPrompt,
  type CondensedSegment,
  type CondensedSlide,
} from '../gemini/prompts.js';
import type { PipelineCallbacks } from '../events.js';
import { fallbackMatches } from './fallback.js';
import { parseSlideTimings, type SlideTiming } from './response.js';
import type {
  AlignmentResult,
  MatchCandidate,
  SlideCorpus,
  Transcript,
} from '../../types/index.js';

export const GUIDED_CONFIDENCE = 0.9;
export const DEFAULT_SLIDE_TEXT_LIMIT = 200;

export interface ContentAlignerOptions {
  reasoning?: ReasoningService;
  slideTextLimit?: number;
}

export function condenseSlides(corpus: SlideCorpus, textLimit: number): CondensedSlide[] {
  return corpus.map((slide) => ({
    index: slide.index,
    name: slide.name,
    content: slide.extractedText.slice(0, textLimit),
  }));
}

export function condenseSegments(transcript: Transcript): CondensedSegment[] {
  return transcript.segments.map(({ start, end, text }) => ({ start, end, text }));
}

/**
 * Speech text fully inside [startTime, endTime], or a placeholder naming the range.
 */
export function collectSegmentText(transcript: Transcript, startTime: number, endTime: number): string {
  const inRange = transcript.segments.filter(
    (segment) => segment.start >= startTime && segment.end <= endTime
  );
  if (inRange.length === 0) {
    return `Time range ${startTime.toFixed(1)}s - ${endTime.toFixed(1)}s`;
  }
  return inRange.map((segment) => segment.text).join(' ');
}

export function timingsToMatches(timings: SlideTiming[], transcript: Transcript): MatchCandidate[] {
  return timings.map((timing) => {
    const endTime = Math.min(timing.endTime, transcript.duration);
    return {
      slideIndex: timing.slideIndex,
      startTime: timing.startTime,
      endTime,
      confidence: GUIDED_CONFIDENCE,
      reason: timing.reason,
      segmentText: collectSegmentText(transcript, timing.startTime, endTime),
    };
  });
}

/**
 * Chooses one strategy per run: guided when a reasoning service is present,
 * fallback otherwise. A failed guided attempt is never retried as fallback.
 */
export class ContentAligner {
  private reasoning?: ReasoningService;
  private slideTextLimit: number;

  constructor(options: ContentAlignerOptions = {}) {
    this.reasoning = options.reasoning;
    this.slideTextLimit = options.slideTextLimit ?? DEFAULT_SLIDE_TEXT_LIMIT;
  }

  get strategy(): AlignmentResult['strategy'] {
    return this.reasoning ? 'guided' : 'fallback';
  }

  async align(
    transcript: Transcript,
    corpus: SlideCorpus,
    callbacks: PipelineCallbacks = {}
  ): Promise<AlignmentResult> {
    if (!this.reasoning) {
      callbacks.onProgress?.('Using proportional time-based matching');
      return { strategy: 'fallback', matches: fallbackMatches(transcript, corpus) };
    }

    if (transcript.segments.length === 0 || corpus.length === 0) {
      return { strategy: 'guided', matches: [] };
    }

    callbacks.onProgress?.(
      `Asking reasoning service to place ${corpus.length} slides over ${transcript.segments.length} segments`
    );

    const reply = await this.reasoning.complete(
      createAlignmentSystemPrompt(),
      createAlignmentUserPrompt(
        condenseSlides(corpus, this.slideTextLimit),
        condenseSegments(transcript)
      )
    );
    callbacks.onDebug?.(`Reasoning service reply:\n${reply}`);

    const matches = timingsToMatches(parseSlideTimings(reply), transcript);
    callbacks.onProgress?.(`Guided alignment produced ${matches.length} slide ranges`);

    return { strategy: 'guided', matches };
  }
}
