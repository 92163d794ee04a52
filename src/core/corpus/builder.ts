import { readdir } from 'fs/promises';
import { basename, extname, join } from 'path';
import { IngestError, ItemProcessingError } from '../errors.js';
import type { PipelineCallbacks } from '../events.js';
import { describeSlide, parseSlideCorpus } from '../ingest/slides.js';
import { CheckpointStore, fromCheckpointUnit } from '../state/checkpoint.js';
import { NoopResourceGuard, type ResourceGuard } from './resource-guard.js';
import type { SlideCorpus, SlideDescriptor } from '../../types/index.js';

export interface SlideTextExtractor {
  extract(slidePath: string): Promise<string>;
}

export const SLIDE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png']);

export async function listSlideImages(slidesDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(slidesDir);
  } catch (error) {
    throw new IngestError(`Cannot read slides folder ${slidesDir}`, { cause: error });
  }

  return entries
    .filter((name) => SLIDE_EXTENSIONS.has(extname(name).toLowerCase()))
    .sort()
    .map((name) => join(slidesDir, name));
}

export interface SlideCorpusBuilderOptions {
  extractor: SlideTextExtractor;
  checkpoint: CheckpointStore;
  resourceGuard?: ResourceGuard;
}

/**
 * Extracts text slide by slide, persisting a checkpoint after each one so an
 * interrupted pass resumes where it stopped.
 */
export class SlideCorpusBuilder {
  private extractor: SlideTextExtractor;
  private checkpoint: CheckpointStore;
  private resourceGuard: ResourceGuard;

  constructor(options: SlideCorpusBuilderOptions) {
    this.extractor = options.extractor;
    this.checkpoint = options.checkpoint;
    this.resourceGuard = options.resourceGuard ?? new NoopResourceGuard();
  }

  async build(slidesDir: string, callbacks: PipelineCallbacks = {}): Promise<SlideCorpus> {
    const slidePaths = await listSlideImages(slidesDir);
    const resumed = await this.checkpoint.load();
    const done = new Map<number, SlideDescriptor>();

    for (const unit of resumed?.processed ?? []) {
      const slidePath = slidePaths[unit.index];
      if (slidePath !== undefined && unit.path === slidePath) {
        done.set(unit.index, fromCheckpointUnit(unit));
      }
    }
    if (done.size > 0) {
      callbacks.onProgress?.(`Resuming from checkpoint: ${done.size}/${slidePaths.length} slides already processed`);
    }

    const corpus: SlideDescriptor[] = [];

    for (const [index, slidePath] of slidePaths.entries()) {
      const previous = done.get(index);
      if (previous) {
        corpus.push(previous);
        continue;
      }

      const slideName = basename(slidePath);
      this.resourceGuard.check(slideName);
      callbacks.onProgress?.(`Extracting slide ${index + 1}/${slidePaths.length}: ${slideName}`);

      let text = '';
      try {
        text = await this.extractor.extract(slidePath);
      } catch (error) {
        callbacks.onItemError?.(new ItemProcessingError(slideName, { cause: error }));
      }

      const slide = describeSlide(index, slidePath, text);
      callbacks.onDebug?.(
        slide.extractedText ? `  text: ${slide.extractedText.slice(0, 80)}` : '  no text detected'
      );
      corpus.push(slide);
      await this.checkpoint.save(corpus);
    }

    await this.checkpoint.clear();
    callbacks.onProgress?.(`Slide corpus ready: ${corpus.length} slides`);
    return parseSlideCorpus(corpus);
  }
}
