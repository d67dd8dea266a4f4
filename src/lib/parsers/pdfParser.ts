// lib/parsers/pdfParser.ts
import { PDFParse } from 'pdf-parse';
import fs from 'fs/promises';
import { ddl } from '../dd';
import { cleanTextForChunking } from '../textUtils';

export interface IParsedDocument {
    text: string;
    metadata: {
        title?: string;
        author?: string;
        pageCount: number;
    };
    pages: IPageContent[];
    totalCharacters: number;
    totalWords: number;
}

export interface IPageContent {
    pageNumber: number;
    text: string;
    charCount: number;
}

export interface IParser {
    parseFromPath(filePath: string): Promise<IParsedDocument>;
    parseFromBuffer(buffer: Uint8Array): Promise<IParsedDocument>;
}

const stringOrUndefined = (value: unknown): string | undefined =>
    typeof value === 'string' && value.length > 0 ? value : undefined;

class PDFParserService implements IParser {
    /**
     * Parse PDF from file path
     */
    async parseFromPath(filePath: string): Promise<IParsedDocument> {
        const buffer = await fs.readFile(filePath);
        ddl('pdf bytes ->', buffer.length);
        return this.parseFromBuffer(new Uint8Array(buffer));
    }

    /**
     * Parse PDF from buffer
     */
    async parseFromBuffer(buffer: Uint8Array): Promise<IParsedDocument> {
        const pdf = new PDFParse({ data: buffer });
        try {
            const info = await pdf.getInfo();
            const textData = await pdf.getText();

            // v2 returns per-page text in result.pages
            const pages: IPageContent[] = textData.pages.map((page, index) => {
                const text = cleanTextForChunking(page.text);
                return {
                    pageNumber: index + 1,
                    text,
                    charCount: text.length,
                };
            });

            const fullText = pages.map((page) => page.text).join('\n\n');

            return {
                text: fullText,
                metadata: {
                    title: stringOrUndefined(info.info?.Title),
                    author: stringOrUndefined(info.info?.Author),
                    pageCount: info.total,
                },
                pages,
                totalCharacters: fullText.length,
                totalWords: this.countWords(fullText),
            };
        } finally {
            await pdf.destroy();
        }
    }

    /**
     * Count words in text
     */
    private countWords(text: string): number {
        return text.split(/\s+/).filter((word) => word.length > 0).length;
    }
}

export const pdfParser = new PDFParserService();
