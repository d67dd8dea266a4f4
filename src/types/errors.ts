/**
 * DocQuery Error Types
 * Three families, surfaced differently at the HTTP boundary:
 * - validation: caller sent something unusable, message is shown as-is
 * - state: the session is not in a state that allows the operation
 * - external: a collaborator (extractor, model, vector store) failed;
 *   callers only see a generic message, the detail is logged
 */

export type ErrorCategory = 'validation' | 'state' | 'external';

export type DocQueryErrorCode =
    | 'UNSUPPORTED_FORMAT'
    | 'EMPTY_DOCUMENT_SET'
    | 'EMPTY_QUESTION'
    | 'INVALID_CHUNKING_OPTIONS'
    | 'INVALID_QUERY'
    | 'NO_ACTIVE_SESSION'
    | 'SESSION_REBUILDING'
    | 'EMPTY_INDEX'
    | 'EXTRACTION_FAILED'
    | 'EMBEDDING_SERVICE_ERROR'
    | 'VECTOR_INDEX_ERROR'
    | 'DIMENSION_MISMATCH'
    | 'REWRITE_FAILED'
    | 'SYNTHESIS_FAILED'
    | 'OPERATION_TIMEOUT';

export abstract class DocQueryError extends Error {
    abstract readonly category: ErrorCategory;

    constructor(
        message: string,
        public readonly code: DocQueryErrorCode,
        public readonly statusCode: number,
        public readonly details?: Record<string, unknown>,
        public readonly originalError?: unknown
    ) {
        super(message);
        this.name = 'DocQueryError';
    }

    /**
     * Message that is safe to return to the client
     */
    get publicMessage(): string {
        return this.message;
    }
}

// ============================================
// Validation
// ============================================

export class InputValidationError extends DocQueryError {
    readonly category = 'validation' as const;

    constructor(
        message: string,
        code: DocQueryErrorCode,
        details?: Record<string, unknown>
    ) {
        super(message, code, 400, details);
        this.name = 'InputValidationError';
    }
}

export class UnsupportedFormatError extends InputValidationError {
    constructor(filename: string, contentType: string) {
        super(
            `Invalid file type: ${filename}. Please upload only PDF files.`,
            'UNSUPPORTED_FORMAT',
            { filename, contentType }
        );
        this.name = 'UnsupportedFormatError';
    }
}

export class EmptyDocumentSetError extends InputValidationError {
    constructor() {
        super('No PDF files were provided.', 'EMPTY_DOCUMENT_SET');
        this.name = 'EmptyDocumentSetError';
    }
}

export class EmptyQuestionError extends InputValidationError {
    constructor() {
        super('Question must not be empty.', 'EMPTY_QUESTION');
        this.name = 'EmptyQuestionError';
    }
}

// ============================================
// State
// ============================================

export class StateError extends DocQueryError {
    readonly category = 'state' as const;

    constructor(message: string, code: DocQueryErrorCode, statusCode: number) {
        super(message, code, statusCode);
        this.name = 'StateError';
    }
}

export class NoActiveSessionError extends StateError {
    constructor() {
        super(
            'No documents have been processed. Please upload one or more PDFs first.',
            'NO_ACTIVE_SESSION',
            400
        );
        this.name = 'NoActiveSessionError';
    }
}

export class SessionRebuildingError extends StateError {
    constructor() {
        super(
            'Documents are being processed. Please retry once processing completes.',
            'SESSION_REBUILDING',
            409
        );
        this.name = 'SessionRebuildingError';
    }
}

export class EmptyIndexError extends StateError {
    constructor() {
        super('The vector index has no entries yet.', 'EMPTY_INDEX', 409);
        this.name = 'EmptyIndexError';
    }
}

// ============================================
// External
// ============================================

const GENERIC_EXTERNAL_MESSAGE =
    'An upstream service failed while handling the request.';

export class ExternalServiceError extends DocQueryError {
    readonly category = 'external' as const;

    constructor(
        message: string,
        code: DocQueryErrorCode,
        statusCode: number = 502,
        originalError?: unknown,
        private readonly clientMessage: string = GENERIC_EXTERNAL_MESSAGE
    ) {
        super(message, code, statusCode, undefined, originalError);
        this.name = 'ExternalServiceError';
    }

    get publicMessage(): string {
        return this.clientMessage;
    }
}

export class ExtractionFailedError extends ExternalServiceError {
    constructor(message: string, originalError?: unknown) {
        super(
            message,
            'EXTRACTION_FAILED',
            500,
            originalError,
            'Failed to extract text from the provided PDFs.'
        );
        this.name = 'ExtractionFailedError';
    }
}

export class EmbeddingServiceError extends ExternalServiceError {
    constructor(message: string, originalError?: unknown) {
        super(message, 'EMBEDDING_SERVICE_ERROR', 502, originalError);
        this.name = 'EmbeddingServiceError';
    }
}

export class VectorIndexError extends ExternalServiceError {
    constructor(message: string, originalError?: unknown) {
        super(message, 'VECTOR_INDEX_ERROR', 502, originalError);
        this.name = 'VectorIndexError';
    }
}

export class DimensionMismatchError extends ExternalServiceError {
    constructor(message: string) {
        super(message, 'DIMENSION_MISMATCH', 500);
        this.name = 'DimensionMismatchError';
    }
}

export class RewriteFailedError extends ExternalServiceError {
    constructor(originalError?: unknown) {
        super(
            `Query rewrite failed: ${describeError(originalError)}`,
            'REWRITE_FAILED',
            502,
            originalError
        );
        this.name = 'RewriteFailedError';
    }
}

export class SynthesisFailedError extends ExternalServiceError {
    constructor(originalError?: unknown) {
        super(
            `Answer synthesis failed: ${describeError(originalError)}`,
            'SYNTHESIS_FAILED',
            502,
            originalError,
            'An error occurred while generating the answer.'
        );
        this.name = 'SynthesisFailedError';
    }
}

export class OperationTimeoutError extends ExternalServiceError {
    constructor(operation: string, timeoutMs: number) {
        super(
            `${operation} timed out after ${timeoutMs}ms`,
            'OPERATION_TIMEOUT',
            504,
            undefined,
            `The ${operation} took too long and was abandoned.`
        );
        this.name = 'OperationTimeoutError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
