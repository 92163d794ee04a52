import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { findMissingInput } from './generate.js';

describe('findMissingInput', () => {
  let dir: string;
  let slides: string;
  let audio: string;
  let missingAudio: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'generate-test-'));
    slides = join(dir, 'images');
    audio = join(dir, 'audio.mp3');
    missingAudio = join(dir, 'absent.mp3');
    await mkdir(slides);
    await writeFile(audio, 'fake audio');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('accepts present audio and slides', async () => {
    expect(await findMissingInput({ audio, slides, video: true })).toBeUndefined();
  });

  it('requires the audio file when rendering video from a transcript file', async () => {
    expect(
      await findMissingInput({ audio: missingAudio, slides, transcript: 'transcript.json', video: true })
    ).toBe(`Audio file not found: ${missingAudio}`);
  });

  it('requires the audio file when there is no transcript file', async () => {
    expect(await findMissingInput({ audio: missingAudio, slides, video: false })).toBe(
      `Audio file not found: ${missingAudio}`
    );
  });

  it('allows missing audio for a report-only run from a transcript file', async () => {
    expect(
      await findMissingInput({ audio: missingAudio, slides, transcript: 'transcript.json', video: false })
    ).toBeUndefined();
  });

  it('reports a missing slides folder', async () => {
    const absentSlides = join(dir, 'no-slides');
    expect(await findMissingInput({ audio, slides: absentSlides, video: true })).toBe(
      `Slides folder not found: ${absentSlides}`
    );
  });
});
