export interface SlideDescriptor {
  index: number; // 0-based, contiguous
  name: string;
  path: string;
  extractedText: string;
  wordCount: number;
}

export type SlideCorpus = SlideDescriptor[];
