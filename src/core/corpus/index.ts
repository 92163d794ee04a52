export {
  SlideCorpusBuilder,
  listSlideImages,
  SLIDE_EXTENSIONS,
  type SlideCorpusBuilderOptions,
  type SlideTextExtractor,
} from './builder.js';
export {
  MemoryResourceGuard,
  NoopResourceGuard,
  type ResourceGuard,
  type MemoryProbe,
} from './resource-guard.js';
