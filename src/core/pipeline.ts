import { ContentAligner } from './alignment/aligner.js';
import { SlideCorpusBuilder, type SlideTextExtractor } from './corpus/builder.js';
import { MemoryResourceGuard, NoopResourceGuard, type ResourceGuard } from './corpus/resource-guard.js';
import { ConfigurationError, IngestError } from './errors.js';
import type { PipelineCallbacks } from './events.js';
import { GeminiClient, type ReasoningService } from './gemini/client.js';
import { GeminiSlideExtractor } from './gemini/extractor.js';
import { GeminiTranscriber } from './gemini/transcriber.js';
import { JsonTranscriptSource, type DurationProbe, type Transcriber } from './ingest/transcript.js';
import { ReportWriter, createReport } from './output/report.js';
import { CheckpointStore } from './state/checkpoint.js';
import { buildTimeline } from './timeline/builder.js';
import { planClips } from './timeline/clips.js';
import { mergeConsecutiveSlides } from './timeline/merger.js';
import { FfmpegCompositor, probeDuration, type VideoCompositor } from './video/ffmpeg.js';
import type {
  AlignmentStrategy,
  MatchCandidate,
  PipelineConfig,
  SlideCorpus,
  TimelineEntry,
  Transcript,
} from '../types/index.js';

export interface PipelineDependencies {
  transcriber: Transcriber;
  extractor: SlideTextExtractor;
  reasoning?: ReasoningService;
  compositor?: VideoCompositor;
  resourceGuard?: ResourceGuard;
  // Measures the audio when the transcript comes from a file
  probeDuration?: DurationProbe;
}

export interface PipelineInput {
  audioPath: string;
  slidesDir: string;
  outputPath: string;
  transcriptPath?: string;
}

export interface TimelineResult {
  strategy: AlignmentStrategy;
  matches: MatchCandidate[];
  timeline: TimelineEntry[];
}

export interface PipelineResult extends TimelineResult {
  transcript: Transcript;
  corpus: SlideCorpus;
  reportPath: string;
  videoPath?: string;
}

export class LecturePipeline {
  private config: PipelineConfig;
  private deps: PipelineDependencies;
  private aligner: ContentAligner;

  constructor(config: PipelineConfig, deps: PipelineDependencies) {
    this.config = config;
    this.deps = deps;
    this.aligner = new ContentAligner({
      reasoning: deps.reasoning,
      slideTextLimit: config.slideTextLimit,
    });
  }

  get strategy(): AlignmentStrategy {
    return this.aligner.strategy;
  }

  /**
   * Align → Validate → Merge. A guided-alignment failure propagates unchanged.
   */
  async align(
    transcript: Transcript,
    corpus: SlideCorpus,
    callbacks: PipelineCallbacks = {}
  ): Promise<TimelineResult> {
    callbacks.onStage?.('align');
    const { strategy, matches } = await this.aligner.align(transcript, corpus, callbacks);

    callbacks.onStage?.('validate');
    const entries = buildTimeline(matches, corpus, transcript.duration, callbacks);

    callbacks.onStage?.('merge');
    const timeline = mergeConsecutiveSlides(entries);
    callbacks.onProgress?.(`Timeline: ${timeline.length} segments from ${matches.length} matches`);

    return { strategy, matches, timeline };
  }

  async run(input: PipelineInput, callbacks: PipelineCallbacks = {}): Promise<PipelineResult> {
    callbacks.onStage?.('ingest');

    const transcriber = input.transcriptPath
      ? new JsonTranscriptSource(input.transcriptPath, this.deps.probeDuration)
      : this.deps.transcriber;
    callbacks.onProgress?.('Transcribing narration...');
    const transcript = await transcriber.transcribe(input.audioPath);
    callbacks.onProgress?.(
      `Transcript: ${transcript.segments.length} segments, ${transcript.duration.toFixed(1)}s`
    );

    const corpusBuilder = new SlideCorpusBuilder({
      extractor: this.deps.extractor,
      checkpoint: new CheckpointStore(this.config.checkpointPath),
      resourceGuard: this.deps.resourceGuard,
    });
    const corpus = await corpusBuilder.build(input.slidesDir, callbacks);
    if (corpus.length === 0) {
      throw new IngestError(`No slide images found in ${input.slidesDir}`);
    }

    const { strategy, matches, timeline } = await this.align(transcript, corpus, callbacks);

    callbacks.onStage?.('emit');
    const report = createReport(strategy, matches, timeline);
    const reportPath = await new ReportWriter(this.config.reportDir).write(report);
    callbacks.onProgress?.(`Matching report saved: ${reportPath}`);

    let videoPath: string | undefined;
    if (this.deps.compositor && timeline.length > 0) {
      const plan = planClips(timeline, this.config.minClipSeconds);
      callbacks.onProgress?.(`Composing video from ${plan.length} clips...`);
      videoPath = await this.deps.compositor.compose(plan, input.audioPath, input.outputPath);
      callbacks.onProgress?.(`Video saved: ${videoPath}`);
    } else if (timeline.length === 0) {
      callbacks.onWarning?.('Timeline is empty; no video was composed');
    }

    return { strategy, matches, timeline, transcript, corpus, reportPath, videoPath };
  }
}

export interface CreatePipelineOptions {
  withVideo?: boolean;
  // Set to false when the audio file is absent and only a transcript file is used
  probeAudio?: boolean;
}

/**
 * Wire the default adapters. Without Gemini credentials the pipeline aligns
 * with the time-based fallback, skips slide text extraction and needs a
 * transcript file.
 */
export function createPipeline(
  config: PipelineConfig,
  callbacks: PipelineCallbacks = {},
  options: CreatePipelineOptions = {}
): LecturePipeline {
  let client: GeminiClient | undefined;
  try {
    client = new GeminiClient(config.reasoning, {
      onRetry: (attempt, maxAttempts, detail, delayMs) =>
        callbacks.onWarning?.(
          `Gemini request failed (attempt ${attempt}/${maxAttempts}): ${detail}. Retrying in ${delayMs / 1000}s...`
        ),
    });
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    callbacks.onWarning?.(`${error.message}; using time-based fallback alignment`);
  }

  const noTranscriber: Transcriber = {
    transcribe: async () => {
      throw new IngestError(
        'Audio transcription requires Gemini credentials; pass a transcript file instead'
      );
    },
  };
  if (!client) {
    callbacks.onWarning?.('Slide text extraction skipped; slides will carry no text');
  }
  const probe: DurationProbe | undefined =
    options.probeAudio === false ? undefined : (audioPath) => probeDuration(audioPath);

  return new LecturePipeline(config, {
    transcriber: client ? new GeminiTranscriber(client, probe) : noTranscriber,
    extractor: client ? new GeminiSlideExtractor(client) : { extract: async () => '' },
    reasoning: client,
    compositor:
      options.withVideo === false
        ? undefined
        : new FfmpegCompositor(config.fps, { debug: callbacks.onDebug }),
    resourceGuard:
      config.memoryLimitMb !== undefined
        ? new MemoryResourceGuard(config.memoryLimitMb)
        : new NoopResourceGuard(),
    probeDuration: probe,
  });
}
