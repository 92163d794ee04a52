export {
  GeminiClient,
  createGoogleGenAI,
  hasReasoningCredentials,
  type ReasoningService,
  type GeminiClientConfig,
  type GeminiClientLogger,
} from './client.js';
export { GeminiTranscriber } from './transcriber.js';
export { GeminiSlideExtractor } from './extractor.js';
export { extractJsonText } from './json.js';
