export interface CondensedSlide {
  index: number;
  name: string;
  content: string;
}

export interface CondensedSegment {
  start: number;
  end: number;
  text: string;
}

export function createAlignmentSystemPrompt(): string {
  return `You are a production assistant for narrated lecture videos.
The slide deck was designed in order: every slide corresponds to one passage of the narration.
Analyze the narration and the slide contents carefully and decide when each slide should be on screen.

## Switching rules (MUST FOLLOW)
- Slides are shown strictly in order (0 → 1 → 2 → 3 ...). Never skip a slide, never repeat one.
- Only switch when the narration clearly starts discussing the topic of the next slide.
- While the narration is still on the current slide's topic, do not switch.
- Look for explicit section titles, numbering, or topic transitions.
- The last slide stays on screen until the end of the audio.
- Every slide needs enough screen time; avoid very short displays.

## Switching signals
- A new topic title is spoken.
- The narration matches the title of the next slide.
- The current topic clearly ends and a new concept begins.

## Output format
Return ONLY valid JSON with the time range of every slide:
\`\`\`json
{
  "slide_timings": [
    {
      "slide_index": 1,
      "start_time": 60.0,
      "end_time": 120.0,
      "reason": "The narration introduces the concept named in the title of slide 1"
    }
  ]
}
\`\`\``;
}

export function createAlignmentUserPrompt(
  slides: CondensedSlide[],
  segments: CondensedSegment[]
): string {
  return `Slide contents:
${JSON.stringify(slides, null, 2)}

Narration segments:
${JSON.stringify(segments, null, 2)}`;
}

export function createTranscriptionPrompt(): string {
  return `You are an expert transcriber.
Transcribe the following audio file accurately.

Output strictly in JSON format:
{
  "segments": [
    { "start": number (seconds), "end": number (seconds), "text": "string" }
  ]
}
Segments must be in chronological order and must not overlap.
Do not wrap in markdown code blocks. Just the raw JSON.`;
}

export function createSlideExtractionPrompt(): string {
  return 'Transcribe all visible text on this presentation slide exactly as it appears. ' +
    'Output only the text, in reading order, without commentary. ' +
    'If the slide has no text, output nothing.';
}
