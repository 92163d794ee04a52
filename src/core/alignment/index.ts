export {
  ContentAligner,
  GUIDED_CONFIDENCE,
  DEFAULT_SLIDE_TEXT_LIMIT,
  collectSegmentText,
  condenseSegments,
  condenseSlides,
  timingsToMatches,
  type ContentAlignerOptions,
} from './aligner.js';
export { fallbackMatches, FALLBACK_CONFIDENCE, FALLBACK_REASON } from './fallback.js';
export { parseSlideTimings, DEFAULT_TIMING_REASON, type SlideTiming } from './response.js';
