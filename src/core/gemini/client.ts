import { GoogleGenAI } from '@google/genai';
import type { Part } from '@google/genai';
import { ConfigurationError, MalformedResponseError, toError } from '../errors.js';

export interface ReasoningService {
  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface GeminiClientConfig {
  apiKey?: string;
  projectId?: string;
  location?: string;
  model?: string;
  temperature?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

export interface GeminiClientLogger {
  onRetry?: (attempt: number, maxAttempts: number, detail: string, delayMs: number) => void;
}

export interface GenerateOptions {
  systemInstruction?: string;
  responseMimeType?: string;
}

const PLACEHOLDER_API_KEY = 'your-api-key-here';

export function hasReasoningCredentials(config: GeminiClientConfig): boolean {
  const apiKey = config.apiKey?.trim();
  return Boolean((apiKey && apiKey !== PLACEHOLDER_API_KEY) || config.projectId?.trim());
}

/**
 * Build the SDK client from either an API key or a Vertex AI project.
 * Throws ConfigurationError when neither is usable.
 */
export function createGoogleGenAI(config: GeminiClientConfig): GoogleGenAI {
  if (!hasReasoningCredentials(config)) {
    throw new ConfigurationError(
      'No Gemini credentials: set GEMINI_API_KEY or GOOGLE_CLOUD_PROJECT'
    );
  }

  const apiKey = config.apiKey?.trim();
  if (apiKey && apiKey !== PLACEHOLDER_API_KEY) {
    return new GoogleGenAI({ apiKey });
  }

  return new GoogleGenAI({
    vertexai: true,
    project: config.projectId,
    location: config.location || 'us-central1',
  });
}

export class GeminiClient implements ReasoningService {
  private client: GoogleGenAI;
  private modelName: string;
  private temperature: number;
  private maxRetries: number;
  private retryDelayMs: number;
  private logger?: GeminiClientLogger;

  constructor(config: GeminiClientConfig, logger?: GeminiClientLogger) {
    this.client = createGoogleGenAI(config);
    this.modelName = config.model || 'gemini-2.5-flash';
    this.temperature = config.temperature ?? 0.3;
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 5000;
    this.logger = logger;
  }

  get model(): string {
    return this.modelName;
  }

  private async sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private isRetryableError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;

    const message = error.message.toLowerCase();
    return (
      message.includes('fetch failed') ||
      message.includes('network') ||
      message.includes('timeout') ||
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('socket hang up') ||
      message.includes('503') ||
      message.includes('502') ||
      message.includes('429') ||
      message.includes('rate limit')
    );
  }

  private getErrorDetail(error: Error): string {
    const parts: string[] = [error.message];

    const cause = error.cause;
    if (cause instanceof Error) {
      parts.push(`[cause: ${cause.message}]`);
      if (cause.cause instanceof Error) {
        parts.push(`[root: ${cause.cause.message}]`);
      }
    } else if (cause) {
      parts.push(`[cause: ${String(cause)}]`);
    }

    const code = 'code' in error ? error.code : undefined;
    if (typeof code === 'string') {
      parts.push(`[code: ${code}]`);
    }

    return parts.join(' ');
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    return this.generateText([{ text: userPrompt }], { systemInstruction: systemPrompt });
  }

  async generateText(parts: Part[], options: GenerateOptions = {}): Promise<string> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.client.models.generateContent({
          model: this.modelName,
          config: {
            systemInstruction: options.systemInstruction,
            responseMimeType: options.responseMimeType,
            temperature: this.temperature,
            maxOutputTokens: 10000,
          },
          contents: [{ role: 'user', parts }],
        });

        const text = response.text;
        if (!text) {
          throw new MalformedResponseError('No text content in Gemini response');
        }
        return text;
      } catch (error) {
        if (error instanceof MalformedResponseError) {
          throw error;
        }
        lastError = toError(error);

        if (attempt < this.maxRetries && this.isRetryableError(lastError)) {
          const delayMs = this.retryDelayMs * Math.pow(2, attempt);
          this.logger?.onRetry?.(attempt + 1, this.maxRetries + 1, this.getErrorDetail(lastError), delayMs);
          await this.sleep(delayMs);
          continue;
        }

        throw new Error(`Gemini API error: ${lastError.message}`, { cause: lastError });
      }
    }

    throw new Error(`Gemini API error: ${lastError?.message || 'Unknown error'}`);
  }
}
