import { GeminiClient } from './client.js';
import { extractJsonText } from './json.js';
import { fileToInlinePart } from './media.js';
import { createTranscriptionPrompt } from './prompts.js';
import { IngestError } from '../errors.js';
import { parseTranscript, type DurationProbe, type Transcriber } from '../ingest/transcript.js';
import type { Transcript } from '../../types/index.js';

export class GeminiTranscriber implements Transcriber {
  constructor(
    private readonly client: GeminiClient,
    private readonly probeDuration?: DurationProbe
  ) {}

  async transcribe(audioPath: string): Promise<Transcript> {
    const audioPart = await fileToInlinePart(audioPath);
    const text = await this.client.generateText([audioPart, { text: createTranscriptionPrompt() }], {
      responseMimeType: 'application/json',
    });

    let raw: unknown;
    try {
      raw = JSON.parse(extractJsonText(text));
    } catch (error) {
      throw new IngestError(`Transcription of ${audioPath} did not return JSON`, { cause: error });
    }

    // Some replies are a bare segment list
    const payload = Array.isArray(raw) ? { segments: raw } : raw;
    const probed = this.probeDuration ? await this.probeDuration(audioPath) : undefined;
    return parseTranscript(payload, probed);
  }
}
