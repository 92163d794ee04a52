export interface SpeechSegment {
  start: number; // seconds
  end: number;
  text: string;
}

export interface Transcript {
  segments: SpeechSegment[];
  duration: number; // seconds, >= last segment end
}
