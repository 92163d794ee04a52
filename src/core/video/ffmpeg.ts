import { spawn } from 'child_process';
import { mkdir, writeFile, unlink, access } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import type { ClipSpec } from '../../types/index.js';

export interface VideoCompositor {
  compose(plan: ClipSpec[], audioPath: string, outputPath: string): Promise<string>;
}

export interface CompositorLogger {
  debug?: (message: string) => void;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export function runCommand(command: string, args: string[]): Promise<CommandResult> {
  return new Promise((resolvePromise) => {
    const proc = spawn(command, args);
    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      resolvePromise({ stdout, stderr, code: code || 0 });
    });

    proc.on('error', (err) => {
      resolvePromise({ stdout, stderr: err.message, code: 1 });
    });
  });
}

function quoteConcatPath(filePath: string): string {
  return `'${filePath.replace(/'/g, "'\\''")}'`;
}

/**
 * ffconcat script for the clip plan. Each slide is held until the next clip
 * starts; the first one is shown from 0s and the last for its own duration.
 * Clips fully covered by their successor are left out.
 */
export function buildConcatScript(plan: ClipSpec[]): string {
  const lines = ['ffconcat version 1.0'];
  let lastPath: string | null = null;

  for (let i = 0; i < plan.length; i++) {
    const clip = plan[i];
    const next = i + 1 < plan.length ? plan[i + 1] : undefined;
    const start = i === 0 ? 0 : clip.start;
    const hold = next ? next.start - start : clip.start - start + clip.duration;
    if (hold <= 0) continue;

    lastPath = resolve(clip.slidePath);
    lines.push(`file ${quoteConcatPath(lastPath)}`);
    lines.push(`duration ${hold.toFixed(3)}`);
  }

  // The concat demuxer ignores the duration of the final entry unless the file is repeated
  if (lastPath) {
    lines.push(`file ${quoteConcatPath(lastPath)}`);
  }

  return `${lines.join('\n')}\n`;
}

export class FfmpegCompositor implements VideoCompositor {
  private fps: number;
  private runner: CommandRunner;
  private logger?: CompositorLogger;

  constructor(fps: number = 25, logger?: CompositorLogger, runner: CommandRunner = runCommand) {
    this.fps = fps;
    this.logger = logger;
    this.runner = runner;
  }

  async compose(plan: ClipSpec[], audioPath: string, outputPath: string): Promise<string> {
    if (plan.length === 0) {
      throw new Error('Cannot compose a video from an empty clip plan');
    }

    await mkdir(dirname(outputPath), { recursive: true });
    const listPath = join(dirname(outputPath), `.slides-${Date.now()}.ffconcat`);
    await writeFile(listPath, buildConcatScript(plan), 'utf-8');

    const args = [
      '-y',
      '-f', 'concat',
      '-safe', '0',
      '-i', listPath,
      '-i', audioPath,
      '-vf', 'scale=1280:720:force_original_aspect_ratio=decrease,pad=1280:720:(ow-iw)/2:(oh-ih)/2,format=yuv420p',
      '-r', String(this.fps),
      '-c:v', 'libx264',
      '-c:a', 'aac',
      '-shortest',
      outputPath,
    ];

    try {
      this.logger?.debug?.(`ffmpeg ${args.join(' ')}`);
      const result = await this.runner('ffmpeg', args);
      if (result.code !== 0) {
        throw new Error(`ffmpeg failed (code ${result.code}): ${result.stderr.slice(-500)}`);
      }
      await access(outputPath);
      return outputPath;
    } finally {
      try {
        await unlink(listPath);
      } catch {
        // Ignore cleanup errors
      }
    }
  }
}

export async function probeDuration(
  audioPath: string,
  runner: CommandRunner = runCommand
): Promise<number> {
  const result = await runner('ffprobe', [
    '-v', 'error',
    '-show_entries', 'format=duration',
    '-of', 'default=noprint_wrappers=1:nokey=1',
    audioPath,
  ]);
  const seconds = Number.parseFloat(result.stdout.trim());
  if (result.code !== 0 || !Number.isFinite(seconds)) {
    throw new Error(`ffprobe could not read duration of ${audioPath}: ${result.stderr.slice(0, 300)}`);
  }
  return seconds;
}
