const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)\s*```/i;

/**
 * Return the JSON payload of a model reply: the body of the first fenced
 * code block when there is one, otherwise the trimmed reply.
 */
export function extractJsonText(text: string): string {
  const match = FENCED_BLOCK.exec(text);
  return (match ? match[1] : text).trim();
}
