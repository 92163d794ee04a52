export * from './transcript.js';
export * from './slides.js';
export * from './alignment.js';
export * from './report.js';
export * from './checkpoint.js';

export interface ReasoningConfig {
  apiKey?: string;
  projectId?: string;
  location: string;
  model: string;
}

export interface PipelineConfig {
  reasoning: ReasoningConfig;
  fps: number;
  slideTextLimit: number;
  memoryLimitMb?: number;
  reportDir: string;
  checkpointPath: string;
  minClipSeconds: number;
}
