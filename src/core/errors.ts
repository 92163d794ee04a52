export interface LectureSyncErrorOptions {
  cause?: unknown;
}

/**
 * Base class for every error the pipeline raises on purpose.
 * `fatal` tells the orchestrator whether the run must stop.
 */
export abstract class LectureSyncError extends Error {
  abstract readonly fatal: boolean;

  constructor(message: string, options: LectureSyncErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
  }
}

// No usable reasoning-service credentials. Selects the fallback strategy.
export class ConfigurationError extends LectureSyncError {
  readonly fatal = false;
}

export class MalformedResponseError extends LectureSyncError {
  readonly fatal = true;
  readonly responseText?: string;

  constructor(message: string, responseText?: string, options: LectureSyncErrorOptions = {}) {
    super(message, options);
    this.responseText = responseText;
  }
}

export class ValidationError extends LectureSyncError {
  readonly fatal = false;
  readonly itemIndex: number;

  constructor(message: string, itemIndex: number, options: LectureSyncErrorOptions = {}) {
    super(message, options);
    this.itemIndex = itemIndex;
  }
}

export class ResourceExhaustionError extends LectureSyncError {
  readonly fatal = true;
  readonly usedMb: number;
  readonly limitMb: number;

  constructor(usedMb: number, limitMb: number, unit: string) {
    super(
      `Memory usage ${usedMb.toFixed(1)}MB exceeds limit ${limitMb}MB before processing ${unit}`
    );
    this.usedMb = usedMb;
    this.limitMb = limitMb;
  }
}

export class ItemProcessingError extends LectureSyncError {
  readonly fatal = false;
  readonly itemName: string;

  constructor(itemName: string, options: LectureSyncErrorOptions = {}) {
    const detail = options.cause instanceof Error ? options.cause.message : String(options.cause);
    super(`Failed to process ${itemName}: ${detail}`, options);
    this.itemName = itemName;
  }
}

// Input that cannot be turned into a valid transcript or slide corpus.
export class IngestError extends LectureSyncError {
  readonly fatal = true;
}

export function isFatal(error: unknown): boolean {
  return error instanceof LectureSyncError ? error.fatal : true;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
