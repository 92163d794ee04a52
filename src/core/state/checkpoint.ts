import { readFile, writeFile, mkdir, access, rm } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { CheckpointUnit, CorpusCheckpoint, SlideDescriptor } from '../../types/index.js';

const checkpointSchema = z.object({
  timestamp: z.string(),
  processed_count: z.number().int().nonnegative(),
  processed: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      name: z.string(),
      path: z.string(),
      extracted_text: z.string(),
      word_count: z.number().int().nonnegative(),
    })
  ),
});

export function toCheckpointUnit(slide: SlideDescriptor): CheckpointUnit {
  return {
    index: slide.index,
    name: slide.name,
    path: slide.path,
    extracted_text: slide.extractedText,
    word_count: slide.wordCount,
  };
}

export function fromCheckpointUnit(unit: CheckpointUnit): SlideDescriptor {
  return {
    index: unit.index,
    name: unit.name,
    path: unit.path,
    extractedText: unit.extracted_text,
    wordCount: unit.word_count,
  };
}

/**
 * Partial progress of a corpus-building pass, persisted after every unit.
 */
export class CheckpointStore {
  private checkpoint: CorpusCheckpoint | null = null;

  constructor(private readonly checkpointPath: string) {}

  get path(): string {
    return this.checkpointPath;
  }

  // Missing or unreadable checkpoints mean "start from scratch".
  async load(): Promise<CorpusCheckpoint | null> {
    try {
      await access(this.checkpointPath);
      const content = await readFile(this.checkpointPath, 'utf-8');
      const result = checkpointSchema.safeParse(JSON.parse(content));
      this.checkpoint = result.success ? result.data : null;
    } catch {
      this.checkpoint = null;
    }
    return this.checkpoint;
  }

  getCheckpoint(): CorpusCheckpoint | null {
    return this.checkpoint;
  }

  async save(processed: SlideDescriptor[]): Promise<CorpusCheckpoint> {
    this.checkpoint = {
      timestamp: new Date().toISOString(),
      processed_count: processed.length,
      processed: processed.map(toCheckpointUnit),
    };

    await mkdir(dirname(this.checkpointPath), { recursive: true });
    await writeFile(this.checkpointPath, JSON.stringify(this.checkpoint, null, 2));
    return this.checkpoint;
  }

  async clear(): Promise<void> {
    this.checkpoint = null;
    await rm(this.checkpointPath, { force: true });
  }
}
