/**
 * Analysis Error Classes
 * Error taxonomy for the document analysis pipeline
 */

/**
 * Base error for all analysis errors
 */
export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'AnalysisError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Boundary errors (surfaced to callers, never retried)
 */

export class DocumentNotFoundError extends AnalysisError {
  constructor(public readonly documentId: string) {
    super(`Document with ID ${documentId} not found`, 'DOCUMENT_NOT_FOUND');
    this.name = 'DocumentNotFoundError';
  }
}

export class DocumentAnalysisError extends AnalysisError {
  constructor(
    public readonly documentId: string,
    reason: string = 'document has no extractable text',
  ) {
    super(
      `Document ${documentId} cannot be analyzed: ${reason}`,
      'DOCUMENT_NOT_ANALYZABLE',
    );
    this.name = 'DocumentAnalysisError';
  }
}

export class ValidationError extends AnalysisError {
  constructor(
    message: string,
    public readonly details: string[] = [],
  ) {
    super(message, 'VALIDATION_FAILED');
    this.name = 'ValidationError';
  }
}

export class AnalysisNotFoundError extends AnalysisError {
  constructor(public readonly documentId: string) {
    super(`No analysis found for document ${documentId}`, 'ANALYSIS_NOT_FOUND');
    this.name = 'AnalysisNotFoundError';
  }
}

/**
 * Model-backed path errors (absorbed by the heuristic fallback)
 */

export class AIServiceError extends AnalysisError {
  constructor(message: string, cause?: unknown) {
    super(message, 'AI_SERVICE_FAILURE');
    this.name = 'AIServiceError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class ProviderError extends AnalysisError {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    super(
      `Provider call "${operation}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'PROVIDER_FAILURE',
      true,
    );
    this.name = 'ProviderError';
    this.cause = cause;
  }
}

export class ChunkingConfigError extends AnalysisError {
  constructor(message: string) {
    super(message, 'CHUNK_INVALID_CONFIG');
    this.name = 'ChunkingConfigError';
  }
}
