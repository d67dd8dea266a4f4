// lib/parsers/index.ts
import { pdfParser } from './pdfParser';
import type { IParser } from './pdfParser';

export type ParserType = 'pdf';

export const getParser = (type: ParserType): IParser => {
    switch (type) {
        case 'pdf':
            return pdfParser;
        default:
            throw new Error(`Unsupported parser type: ${type}`);
    }
};

export { pdfParser };
export type { IParser, IParsedDocument, IPageContent } from './pdfParser';
