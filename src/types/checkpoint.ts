export interface CheckpointUnit {
  index: number;
  name: string;
  path: string;
  extracted_text: string;
  word_count: number;
}

export interface CorpusCheckpoint {
  timestamp: string;
  processed_count: number;
  processed: CheckpointUnit[];
}
