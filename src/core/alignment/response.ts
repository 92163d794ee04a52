import { z } from 'zod';
import { MalformedResponseError } from '../errors.js';
import { extractJsonText } from '../gemini/json.js';

export interface SlideTiming {
  slideIndex: number;
  startTime: number;
  endTime: number;
  reason: string;
}

export const DEFAULT_TIMING_REASON = 'Slides presented in order';

// `end` is accepted in place of `end_time`; no other key substitutions.
const timingSchema = z
  .object({
    slide_index: z.number().int(),
    start_time: z.number(),
    end_time: z.number().optional(),
    end: z.number().optional(),
    reason: z.string().optional(),
  })
  .transform((timing, ctx) => {
    const endTime = timing.end_time ?? timing.end;
    if (endTime === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'end_time is required' });
      return z.NEVER;
    }
    return {
      slideIndex: timing.slide_index,
      startTime: timing.start_time,
      endTime,
      reason: timing.reason || DEFAULT_TIMING_REASON,
    };
  });

const responseSchema = z.object({
  slide_timings: z.array(timingSchema),
});

/**
 * Parse the reasoning service reply into slide timings.
 * Any deviation from the expected structure is a MalformedResponseError.
 */
export function parseSlideTimings(text: string): SlideTiming[] {
  const jsonText = extractJsonText(text);

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch (error) {
    throw new MalformedResponseError('Reasoning service reply is not valid JSON', text, {
      cause: error,
    });
  }

  const result = responseSchema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MalformedResponseError(`Reasoning service reply has unexpected shape: ${detail}`, text);
  }

  return result.data.slide_timings;
}
