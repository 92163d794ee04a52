import type { AlignmentStrategy } from './alignment.js';

export interface ReportMatch {
  slide_index: number;
  start_time: number;
  end_time: number;
  confidence: number;
  reason: string;
  segment_text: string;
}

export interface ReportTimelineEntry {
  start_time: number;
  end_time: number;
  duration: number;
  slide_name: string;
  speech_text: string;
  confidence: number;
}

export interface MatchingReport {
  generation_time: string;
  strategy: AlignmentStrategy;
  total_matches: number;
  total_timeline_segments: number;
  matches: ReportMatch[];
  timeline: ReportTimelineEntry[];
}
