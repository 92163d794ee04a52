import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      reasoning: {
        apiKey: undefined,
        projectId: undefined,
        location: 'us-central1',
        model: 'gemini-2.5-flash',
      },
      fps: 25,
      slideTextLimit: 200,
      memoryLimitMb: undefined,
      reportDir: 'logs',
      checkpointPath: join('logs', 'slides_checkpoint.json'),
      minClipSeconds: 1,
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      GEMINI_API_KEY: 'test-key',
      GEMINI_MODEL: 'gemini-2.5-pro',
      VIDEO_FPS: '30',
      SLIDE_TEXT_LIMIT: '500',
      MEMORY_LIMIT_MB: '2048',
      REPORT_DIR: 'reports',
    });

    expect(config.reasoning.apiKey).toBe('test-key');
    expect(config.reasoning.model).toBe('gemini-2.5-pro');
    expect(config.fps).toBe(30);
    expect(config.slideTextLimit).toBe(500);
    expect(config.memoryLimitMb).toBe(2048);
    expect(config.checkpointPath).toBe(join('reports', 'slides_checkpoint.json'));
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadConfig({ VIDEO_FPS: '30', GEMINI_MODEL: 'env-model' }, { fps: 24, model: 'cli-model' });
    expect(config.fps).toBe(24);
    expect(config.reasoning.model).toBe('cli-model');
  });

  it('rejects non-numeric thresholds', () => {
    expect(() => loadConfig({ VIDEO_FPS: 'fast' })).toThrow('VIDEO_FPS must be a positive number');
  });
});
