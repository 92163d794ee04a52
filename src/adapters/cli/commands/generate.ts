import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import { access } from 'fs/promises';
import {
  ResourceExhaustionError,
  createPipeline,
  isFatal,
  loadConfig,
  type PipelineCallbacks,
} from '../../../core/index.js';

loadEnv();

export interface GenerateOptions {
  audio: string;
  slides: string;
  output: string;
  transcript?: string;
  model?: string;
  fps?: string;
  slideTextLimit?: string;
  memoryLimit?: string;
  reportDir?: string;
  checkpoint?: string;
  video: boolean;
  verbose?: boolean;
}

function parseOptionalNumber(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${flag} must be a positive number, got "${value}"`);
  }
  return parsed;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * The audio is needed to transcribe and to render; only a transcript-file run
 * with `--no-video` may go without it.
 */
export async function findMissingInput(
  options: Pick<GenerateOptions, 'audio' | 'slides' | 'transcript' | 'video'>
): Promise<string | undefined> {
  const audioNeeded = !options.transcript || options.video;
  if (audioNeeded && !(await exists(options.audio))) {
    return `Audio file not found: ${options.audio}`;
  }
  if (!(await exists(options.slides))) {
    return `Slides folder not found: ${options.slides}`;
  }
  return undefined;
}

export function createGenerateCommand(): Command {
  const command = new Command('generate')
    .description('Align narration with slides and render the lecture video')
    .option('-a, --audio <file>', 'narration audio file', 'audio.mp3')
    .option('-s, --slides <dir>', 'folder of slide images (sorted by file name)', 'images')
    .option('-o, --output <file>', 'output video path', 'lecture_video.mp4')
    .option('-t, --transcript <file>', 'use an existing transcript JSON instead of transcribing')
    .option('-m, --model <model>', 'Gemini model name')
    .option('--fps <number>', 'video frame rate')
    .option('--slide-text-limit <number>', 'characters of slide text sent for alignment')
    .option('--memory-limit <mb>', 'stop slide extraction above this heap usage (MB)')
    .option('--report-dir <dir>', 'directory for matching reports and checkpoints')
    .option('--checkpoint <path>', 'slide extraction checkpoint file')
    .option('--no-video', 'only write the timeline report')
    .option('--verbose', 'verbose output')
    .action(async (options: GenerateOptions) => {
      const missing = await findMissingInput(options);
      if (missing) {
        console.error(`❌ ${missing}`);
        process.exit(1);
      }

      const callbacks: PipelineCallbacks = {
        onStage: (stage) => console.log(`\n▶️  ${stage}`),
        onProgress: (message) => console.log(`ℹ️  ${message}`),
        onDebug: options.verbose ? (message) => console.log(`🔍 ${message}`) : undefined,
        onWarning: (message) => console.warn(`⚠️  ${message}`),
        onValidationError: (error) => console.warn(`⚠️  ${error.message}`),
        onItemError: (error) => console.warn(`⚠️  ${error.message} (using empty text)`),
      };

      try {
        const config = loadConfig(process.env, {
          model: options.model,
          fps: parseOptionalNumber(options.fps, '--fps'),
          slideTextLimit: parseOptionalNumber(options.slideTextLimit, '--slide-text-limit'),
          memoryLimitMb: parseOptionalNumber(options.memoryLimit, '--memory-limit'),
          reportDir: options.reportDir,
          checkpointPath: options.checkpoint,
        });

        if (options.verbose) {
          console.log(`🤖 Gemini model: ${config.reasoning.model}`);
        }

        const pipeline = createPipeline(config, callbacks, {
          withVideo: options.video,
          probeAudio: await exists(options.audio),
        });
        console.log(`🧭 Alignment strategy: ${pipeline.strategy}`);

        const result = await pipeline.run(
          {
            audioPath: options.audio,
            slidesDir: options.slides,
            outputPath: options.output,
            transcriptPath: options.transcript,
          },
          callbacks
        );

        console.log(`\n📊 Report: ${result.reportPath}`);
        if (result.videoPath) {
          console.log(`🎉 Video: ${result.videoPath}`);
        }
      } catch (error) {
        if (error instanceof Error) {
          console.error(`❌ ${isFatal(error) ? 'Fatal error' : 'Error'}: ${error.message}`);
          if (error instanceof ResourceExhaustionError) {
            console.error('💾 Checkpoint kept; rerun the same command to resume.');
          }
          if (error.cause) {
            console.error(`🔗 Cause: ${error.cause}`);
          }
          if (options.verbose && error.stack) {
            console.error(`📋 Stack trace:\n${error.stack}`);
          }
        } else {
          console.error('❌ Error:', error);
        }
        process.exit(1);
      }
    });

  return command;
}
