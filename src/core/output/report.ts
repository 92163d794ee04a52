import { writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type {
  AlignmentStrategy,
  MatchCandidate,
  MatchingReport,
  TimelineEntry,
} from '../../types/index.js';

const reportSchema = z.object({
  generation_time: z.string(),
  strategy: z.enum(['guided', 'fallback']),
  total_matches: z.number().int().nonnegative(),
  total_timeline_segments: z.number().int().nonnegative(),
  matches: z.array(
    z.object({
      slide_index: z.number().int(),
      start_time: z.number(),
      end_time: z.number(),
      confidence: z.number().min(0).max(1),
      reason: z.string(),
      segment_text: z.string(),
    })
  ),
  timeline: z.array(
    z.object({
      start_time: z.number(),
      end_time: z.number(),
      duration: z.number(),
      slide_name: z.string(),
      speech_text: z.string(),
      confidence: z.number().min(0).max(1),
    })
  ),
});

export function createReport(
  strategy: AlignmentStrategy,
  matches: MatchCandidate[],
  timeline: TimelineEntry[],
  generatedAt: Date = new Date()
): MatchingReport {
  return {
    generation_time: generatedAt.toISOString(),
    strategy,
    total_matches: matches.length,
    total_timeline_segments: timeline.length,
    matches: matches.map((match) => ({
      slide_index: match.slideIndex,
      start_time: match.startTime,
      end_time: match.endTime,
      confidence: match.confidence,
      reason: match.reason,
      segment_text: match.segmentText,
    })),
    timeline: timeline.map((entry) => ({
      start_time: entry.startTime,
      end_time: entry.endTime,
      duration: entry.duration,
      slide_name: entry.slide.name,
      speech_text: entry.speechText,
      confidence: entry.confidence,
    })),
  };
}

export function serializeReport(report: MatchingReport): string {
  return JSON.stringify(report, null, 2);
}

export function parseReport(json: string): MatchingReport {
  const result = reportSchema.safeParse(JSON.parse(json));
  if (!result.success) {
    throw new Error(`Invalid matching report: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return result.data;
}

function formatFileTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class ReportWriter {
  constructor(private readonly reportDir: string) {}

  reportPathFor(date: Date): string {
    return join(this.reportDir, `matching_report_${formatFileTimestamp(date)}.json`);
  }

  async write(report: MatchingReport): Promise<string> {
    const reportPath = this.reportPathFor(new Date(report.generation_time));
    await mkdir(this.reportDir, { recursive: true });
    await writeFile(reportPath, serializeReport(report), 'utf-8');
    return reportPath;
  }
}
