// lib/rag/retriever.ts
import type { TextEmbedder } from '../../types/embedding';
import type { VectorSearch } from '../../types/vectorIndex';
import type { ScoredChunk } from '../../types/document';
import type {
    ConversationHistory,
    SearchQuery,
} from '../../types/conversation';
import { RewriteFailedError } from '../../types/errors';
import { assertValidK } from '../vectorIndex/memoryVectorIndex';
import { QueryRewriter } from './queryRewriter';

export interface RetrievalResult {
    searchQuery: SearchQuery;
    chunks: ScoredChunk[];
}

export interface RetrieverOptions {
    k: number;
    /**
     * Search with the raw question when the rewrite step fails
     */
    fallbackToQuestion: boolean;
}

export class Retriever {
    constructor(
        private readonly rewriter: QueryRewriter,
        private readonly embedder: TextEmbedder,
        private readonly options: RetrieverOptions
    ) {
        assertValidK(options.k);
    }

    async retrieve(
        search: VectorSearch,
        question: string,
        history: ConversationHistory
    ): Promise<RetrievalResult> {
        const searchQuery = await this.resolveSearchQuery(question, history);
        const vector = await this.embedder.embed(searchQuery);
        const chunks = await search.query(vector, this.options.k);

        return { searchQuery, chunks };
    }

    private async resolveSearchQuery(
        question: string,
        history: ConversationHistory
    ): Promise<SearchQuery> {
        try {
            return await this.rewriter.rewrite(question, history);
        } catch (error) {
            if (error instanceof RewriteFailedError && this.options.fallbackToQuestion) {
                console.warn(
                    `[Retriever] ${error.message}; searching with the raw question`
                );
                return question;
            }
            throw error;
        }
    }
}
