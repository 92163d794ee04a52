import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile, access } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { SlideCorpusBuilder, listSlideImages, type SlideTextExtractor } from './builder.js';
import { MemoryResourceGuard, type ResourceGuard } from './resource-guard.js';
import { CheckpointStore } from '../state/checkpoint.js';
import { IngestError, ItemProcessingError, ResourceExhaustionError } from '../errors.js';
import type { CorpusCheckpoint } from '../../types/index.js';

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('SlideCorpusBuilder', () => {
  let dir: string;
  let slidesDir: string;
  let checkpointPath: string;

  const texts: Record<string, string> = {
    '01-title.png': 'Data Structures',
    '02-arrays.jpg': 'Arrays and lists',
    '03-trees.PNG': 'Trees',
  };

  function textExtractor() {
    return {
      extract: vi.fn(async (slidePath: string) => texts[basename(slidePath)] ?? ''),
    };
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'corpus-test-'));
    slidesDir = join(dir, 'slides');
    checkpointPath = join(dir, 'logs', 'checkpoint.json');
    await mkdir(slidesDir);
    for (const name of [...Object.keys(texts), 'notes.txt']) {
      await writeFile(join(slidesDir, name), 'fake image');
    }
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists slide images sorted by name, ignoring other files', async () => {
    expect(await listSlideImages(slidesDir)).toEqual([
      join(slidesDir, '01-title.png'),
      join(slidesDir, '02-arrays.jpg'),
      join(slidesDir, '03-trees.PNG'),
    ]);
  });

  it('fails on a missing folder', async () => {
    await expect(listSlideImages(join(dir, 'nope'))).rejects.toBeInstanceOf(IngestError);
  });

  it('builds an indexed corpus and removes the checkpoint when done', async () => {
    const extractor = textExtractor();
    const builder = new SlideCorpusBuilder({
      extractor,
      checkpoint: new CheckpointStore(checkpointPath),
    });

    const corpus = await builder.build(slidesDir);

    expect(corpus.map((slide) => [slide.index, slide.name, slide.extractedText, slide.wordCount])).toEqual([
      [0, '01-title.png', 'Data Structures', 2],
      [1, '02-arrays.jpg', 'Arrays and lists', 3],
      [2, '03-trees.PNG', 'Trees', 1],
    ]);
    expect(extractor.extract).toHaveBeenCalledTimes(3);
    expect(await fileExists(checkpointPath)).toBe(false);
  });

  it('resumes from a checkpoint without re-extracting processed slides', async () => {
    const checkpoint: CorpusCheckpoint = {
      timestamp: '2024-01-01T00:00:00.000Z',
      processed_count: 1,
      processed: [
        {
          index: 0,
          name: '01-title.png',
          path: join(slidesDir, '01-title.png'),
          extracted_text: 'Cached title',
          word_count: 2,
        },
      ],
    };
    await mkdir(join(dir, 'logs'));
    await writeFile(checkpointPath, JSON.stringify(checkpoint));

    const extractor = textExtractor();
    const progress: string[] = [];
    const corpus = await new SlideCorpusBuilder({
      extractor,
      checkpoint: new CheckpointStore(checkpointPath),
    }).build(slidesDir, { onProgress: (message) => progress.push(message) });

    expect(corpus[0].extractedText).toBe('Cached title');
    expect(extractor.extract).toHaveBeenCalledTimes(2);
    expect(extractor.extract).not.toHaveBeenCalledWith(join(slidesDir, '01-title.png'));
    expect(progress[0]).toBe('Resuming from checkpoint: 1/3 slides already processed');
  });

  it('substitutes empty text when a slide fails', async () => {
    const extractor: SlideTextExtractor = {
      extract: async (slidePath) => {
        if (slidePath.endsWith('02-arrays.jpg')) throw new Error('model refused');
        return 'ok';
      },
    };
    const itemErrors: ItemProcessingError[] = [];

    const corpus = await new SlideCorpusBuilder({
      extractor,
      checkpoint: new CheckpointStore(checkpointPath),
    }).build(slidesDir, { onItemError: (error) => itemErrors.push(error) });

    expect(corpus).toHaveLength(3);
    expect(corpus[1]).toMatchObject({ index: 1, extractedText: '', wordCount: 0 });
    expect(itemErrors).toHaveLength(1);
    expect(itemErrors[0].message).toBe('Failed to process 02-arrays.jpg: model refused');
  });

  it('keeps the checkpoint when the resource guard trips', async () => {
    let checks = 0;
    const guard: ResourceGuard = {
      check: (unit) => {
        checks++;
        if (checks === 3) throw new ResourceExhaustionError(900, 512, unit);
      },
    };

    const builder = new SlideCorpusBuilder({
      extractor: textExtractor(),
      checkpoint: new CheckpointStore(checkpointPath),
      resourceGuard: guard,
    });

    await expect(builder.build(slidesDir)).rejects.toBeInstanceOf(ResourceExhaustionError);

    const saved: CorpusCheckpoint = JSON.parse(await readFile(checkpointPath, 'utf-8'));
    expect(saved.processed_count).toBe(2);
    expect(saved.processed.map((unit) => unit.name)).toEqual(['01-title.png', '02-arrays.jpg']);

    // A second pass picks up where the first stopped
    const extractor = textExtractor();
    const corpus = await new SlideCorpusBuilder({
      extractor,
      checkpoint: new CheckpointStore(checkpointPath),
    }).build(slidesDir);
    expect(corpus).toHaveLength(3);
    expect(extractor.extract).toHaveBeenCalledTimes(1);
    expect(await fileExists(checkpointPath)).toBe(false);
  });

  it('stops under memory pressure with a real guard', async () => {
    const guard = new MemoryResourceGuard(100, () => 200 * 1024 * 1024, () => undefined);
    const builder = new SlideCorpusBuilder({
      extractor: textExtractor(),
      checkpoint: new CheckpointStore(checkpointPath),
      resourceGuard: guard,
    });

    await expect(builder.build(slidesDir)).rejects.toThrow(
      'Memory usage 200.0MB exceeds limit 100MB before processing 01-title.png'
    );
  });
});
