import { readFile } from 'fs/promises';
import { z } from 'zod';
import { IngestError } from '../errors.js';
import type { SpeechSegment, Transcript } from '../../types/index.js';

const segmentSchema = z
  .object({
    start: z.number().nonnegative(),
    end: z.number(),
    text: z.string().transform((text) => text.trim()),
  })
  .refine((segment) => segment.end > segment.start, {
    message: 'segment end must be greater than start',
  });

const rawTranscriptSchema = z.object({
  segments: z.array(segmentSchema),
  duration: z.number().nonnegative().optional(),
});

export type RawTranscript = z.input<typeof rawTranscriptSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a loosely-typed transcript and return a trusted one.
 * `probedDuration` (e.g. from ffprobe) wins when it is longer than the speech.
 */
export function parseTranscript(raw: unknown, probedDuration?: number): Transcript {
  const result = rawTranscriptSchema.safeParse(raw);
  if (!result.success) {
    throw new IngestError(`Invalid transcript: ${formatIssues(result.error)}`);
  }

  const segments: SpeechSegment[] = result.data.segments;

  for (let i = 1; i < segments.length; i++) {
    const prev = segments[i - 1];
    const current = segments[i];
    if (current.start < prev.start) {
      throw new IngestError(`Invalid transcript: segment ${i} starts before segment ${i - 1}`);
    }
    if (current.start < prev.end) {
      throw new IngestError(`Invalid transcript: segment ${i} overlaps segment ${i - 1}`);
    }
  }

  const lastEnd = segments.length > 0 ? segments[segments.length - 1].end : 0;
  const declared = result.data.duration;
  if (declared !== undefined && declared < lastEnd) {
    throw new IngestError(
      `Invalid transcript: duration ${declared}s is shorter than last segment end ${lastEnd}s`
    );
  }

  return {
    segments,
    duration: Math.max(declared ?? lastEnd, probedDuration ?? 0),
  };
}

export interface Transcriber {
  transcribe(audioPath: string): Promise<Transcript>;
}

export type DurationProbe = (audioPath: string) => Promise<number>;

// Reads a transcript previously produced by any speech-to-text engine.
export class JsonTranscriptSource implements Transcriber {
  constructor(
    private readonly transcriptPath: string,
    private readonly probeDuration?: DurationProbe
  ) {}

  async transcribe(audioPath: string): Promise<Transcript> {
    let content: string;
    try {
      content = await readFile(this.transcriptPath, 'utf-8');
    } catch (error) {
      throw new IngestError(`Cannot read transcript file ${this.transcriptPath}`, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new IngestError(`Transcript file ${this.transcriptPath} is not valid JSON`, {
        cause: error,
      });
    }
    const probed = this.probeDuration ? await this.probeDuration(audioPath) : undefined;
    return parseTranscript(raw, probed);
  }
}
