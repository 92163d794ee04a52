import { basename } from 'path';
import { z } from 'zod';
import { IngestError } from '../errors.js';
import type { SlideCorpus, SlideDescriptor } from '../../types/index.js';

const slideSchema = z.object({
  index: z.number().int().nonnegative(),
  name: z.string().min(1),
  path: z.string(),
  extractedText: z.string(),
  wordCount: z.number().int().nonnegative(),
});

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function describeSlide(index: number, path: string, extractedText: string): SlideDescriptor {
  const text = extractedText.trim();
  return {
    index,
    name: basename(path),
    path,
    extractedText: text,
    wordCount: countWords(text),
  };
}

/**
 * Validate a slide corpus: indices must run 0..N-1 in order.
 */
export function parseSlideCorpus(raw: unknown): SlideCorpus {
  const result = z.array(slideSchema).safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new IngestError(`Invalid slide corpus: ${detail}`);
  }

  result.data.forEach((slide, position) => {
    if (slide.index !== position) {
      throw new IngestError(
        `Invalid slide corpus: slide "${slide.name}" has index ${slide.index}, expected ${position}`
      );
    }
  });

  return result.data;
}
