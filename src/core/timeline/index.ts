export { buildTimeline } from './builder.js';
export { mergeConsecutiveSlides, MERGE_GAP_SECONDS } from './merger.js';
export { planClips, MIN_CLIP_SECONDS } from './clips.js';
