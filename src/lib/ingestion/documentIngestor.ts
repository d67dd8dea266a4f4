// lib/ingestion/documentIngestor.ts
import type { Document, TextSegment } from '../../types/document';
import {
    EmptyDocumentSetError,
    ExtractionFailedError,
    UnsupportedFormatError,
    describeError,
} from '../../types/errors';
import { PDF_MIME_TYPE } from '../../config/storage';
import type { IParser } from '../parsers';
import type { ITempFileStorage } from '../storage';
import { ddl } from '../dd';

export interface IngestionResult {
    segments: TextSegment[];
    filenames: string[];
}

/**
 * Turns uploaded PDFs into page-level text segments.
 * A batch is all-or-nothing: one bad type or one failed extraction aborts
 * everything, and nothing from the batch is returned.
 */
export class DocumentIngestor {
    constructor(
        private readonly parser: IParser,
        private readonly tempStorage: ITempFileStorage
    ) {}

    async ingest(documents: Document[]): Promise<IngestionResult> {
        if (documents.length === 0) {
            throw new EmptyDocumentSetError();
        }

        // Validate every declared type before extracting anything
        for (const document of documents) {
            if (document.contentType !== PDF_MIME_TYPE) {
                throw new UnsupportedFormatError(
                    document.filename,
                    document.contentType
                );
            }
        }

        const segments: TextSegment[] = [];

        for (const document of documents) {
            segments.push(...(await this.extract(document)));
        }

        if (segments.length === 0) {
            throw new ExtractionFailedError(
                'Failed to load any documents from the provided PDFs.'
            );
        }

        return {
            segments,
            filenames: documents.map((document) => document.filename),
        };
    }

    private async extract(document: Document): Promise<TextSegment[]> {
        try {
            const parsed = await this.tempStorage.withTempFile(
                document.bytes,
                '.pdf',
                (filePath) => this.parser.parseFromPath(filePath)
            );

            ddl(
                `extracted ${parsed.metadata.pageCount} pages from ${document.filename}`
            );

            return parsed.pages
                .filter((page) => page.text.trim().length > 0)
                .map((page) => ({
                    content: page.text,
                    sourceFilename: document.filename,
                    pageNumber: page.pageNumber,
                }));
        } catch (error) {
            throw new ExtractionFailedError(
                `Failed to extract text from ${document.filename}: ${describeError(error)}`,
                error
            );
        }
    }
}
