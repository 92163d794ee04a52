import { GeminiClient } from './client.js';
import { fileToInlinePart } from './media.js';
import { createSlideExtractionPrompt } from './prompts.js';
import type { SlideTextExtractor } from '../corpus/builder.js';

export class GeminiSlideExtractor implements SlideTextExtractor {
  constructor(private readonly client: GeminiClient) {}

  async extract(slidePath: string): Promise<string> {
    const imagePart = await fileToInlinePart(slidePath);
    const text = await this.client.generateText([imagePart, { text: createSlideExtractionPrompt() }]);
    return text.trim();
  }
}
