import type { ItemProcessingError, ValidationError } from './errors.js';

export type PipelineStage = 'ingest' | 'align' | 'validate' | 'merge' | 'emit';

/**
 * Event sink for everything the pipeline wants to tell the outside world.
 * Core modules never write to the console themselves.
 */
export interface PipelineCallbacks {
  onStage?: (stage: PipelineStage) => void;
  onProgress?: (message: string) => void;
  onDebug?: (message: string) => void;
  onWarning?: (message: string) => void;
  onValidationError?: (error: ValidationError) => void;
  onItemError?: (error: ItemProcessingError) => void;
}
