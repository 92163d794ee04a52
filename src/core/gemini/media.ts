import { readFile } from 'fs/promises';
import { extname } from 'path';
import type { Part } from '@google/genai';

const MIME_TYPES: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.m4a': 'audio/mp4',
  '.aac': 'audio/aac',
  '.ogg': 'audio/ogg',
  '.flac': 'audio/flac',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

export function mimeTypeFor(filePath: string): string {
  const mimeType = MIME_TYPES[extname(filePath).toLowerCase()];
  if (!mimeType) {
    throw new Error(`Unsupported media type: ${filePath}`);
  }
  return mimeType;
}

export async function fileToInlinePart(filePath: string): Promise<Part> {
  const data = await readFile(filePath);
  return {
    inlineData: {
      data: data.toString('base64'),
      mimeType: mimeTypeFor(filePath),
    },
  };
}
