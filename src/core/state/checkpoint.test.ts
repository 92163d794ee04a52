import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CheckpointStore } from './checkpoint.js';
import { describeSlide } from '../ingest/slides.js';

describe('CheckpointStore', () => {
  let dir: string;
  let store: CheckpointStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'checkpoint-test-'));
    store = new CheckpointStore(join(dir, 'nested', 'checkpoint.json'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null when nothing was saved', async () => {
    expect(await store.load()).toBeNull();
  });

  it('saves processed units and loads them back', async () => {
    const saved = await store.save([describeSlide(0, '/deck/01.png', 'Hello world')]);
    expect(saved.processed_count).toBe(1);

    const loaded = await new CheckpointStore(store.path).load();
    expect(loaded).toEqual(saved);
    expect(loaded?.processed).toEqual([
      { index: 0, name: '01.png', path: '/deck/01.png', extracted_text: 'Hello world', word_count: 2 },
    ]);
  });

  it('treats a corrupt file as no checkpoint', async () => {
    const path = join(dir, 'corrupt.json');
    await writeFile(path, '{"timestamp": 1');
    expect(await new CheckpointStore(path).load()).toBeNull();
  });

  it('deletes the file on clear', async () => {
    await store.save([]);
    await store.clear();
    expect(await store.load()).toBeNull();
    expect(store.getCheckpoint()).toBeNull();
  });
});
