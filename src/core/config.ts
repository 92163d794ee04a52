import { join } from 'path';
import { DEFAULT_SLIDE_TEXT_LIMIT } from './alignment/aligner.js';
import { MIN_CLIP_SECONDS } from './timeline/clips.js';
import type { PipelineConfig } from '../types/index.js';

export type Env = Record<string, string | undefined>;

export interface ConfigOverrides {
  model?: string;
  fps?: number;
  slideTextLimit?: number;
  memoryLimitMb?: number;
  reportDir?: string;
  checkpointPath?: string;
}

function parseNumber(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive number, got "${value}"`);
  }
  return parsed;
}

/**
 * Resolve configuration once, from the environment plus explicit overrides.
 * The result is passed into the pipeline; nothing reads the environment later.
 */
export function loadConfig(env: Env, overrides: ConfigOverrides = {}): PipelineConfig {
  const reportDir = overrides.reportDir ?? env.REPORT_DIR ?? 'logs';

  return {
    reasoning: {
      apiKey: env.GEMINI_API_KEY || undefined,
      projectId: env.GOOGLE_CLOUD_PROJECT || undefined,
      location: env.GOOGLE_CLOUD_LOCATION || 'us-central1',
      model: overrides.model ?? env.GEMINI_MODEL ?? 'gemini-2.5-flash',
    },
    fps: overrides.fps ?? parseNumber(env.VIDEO_FPS, 'VIDEO_FPS') ?? 25,
    slideTextLimit:
      overrides.slideTextLimit ??
      parseNumber(env.SLIDE_TEXT_LIMIT, 'SLIDE_TEXT_LIMIT') ??
      DEFAULT_SLIDE_TEXT_LIMIT,
    memoryLimitMb: overrides.memoryLimitMb ?? parseNumber(env.MEMORY_LIMIT_MB, 'MEMORY_LIMIT_MB'),
    reportDir,
    checkpointPath: overrides.checkpointPath ?? join(reportDir, 'slides_checkpoint.json'),
    minClipSeconds: MIN_CLIP_SECONDS,
  };
}
