export {
  LecturePipeline,
  createPipeline,
  type PipelineDependencies,
  type PipelineInput,
  type PipelineResult,
  type TimelineResult,
} from './pipeline.js';
export { loadConfig, type ConfigOverrides, type Env } from './config.js';
export type { PipelineCallbacks, PipelineStage } from './events.js';
export * from './errors.js';
export * from './alignment/index.js';
export * from './timeline/index.js';
export * from './output/index.js';
export * from './corpus/index.js';
export * from './state/index.js';
export * from './video/index.js';
export * from './gemini/index.js';
export {
  parseTranscript,
  JsonTranscriptSource,
  type DurationProbe,
  type Transcriber,
} from './ingest/transcript.js';
export { parseSlideCorpus, describeSlide, countWords } from './ingest/slides.js';
