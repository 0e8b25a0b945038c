export type EngineErrorCode =
  | 'INVALID_INDEX'
  | 'INVALID_SELECTION_SIZE'
  | 'ILLEGAL_TRANSITION'
  | 'INSUFFICIENT_COINS'
  | 'COLLECTION_FULL'
  | 'INSUFFICIENT_RESOURCE'
  | 'INSUFFICIENT_CARDS'
  | 'INVALID_CONFIG'
  | 'CORRUPT_SAVE';

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: EngineErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.details = details;
  }
}

export function isEngineError(e: unknown): e is EngineError {
  return e instanceof EngineError;
}
